import os from 'node:os';
import path from 'node:path';
import { createLogger } from '@pika/shared';

const logger = createLogger('Config');

const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_MODEL = 'openai/gpt-3.5-turbo';
const DEFAULT_VISION_MODEL = 'openai/gpt-4-turbo';
const DEFAULT_VOICE_ID = '21m00Tcm4TlvDq8ikWAM';

export interface OpenRouterConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  backupModels: string[];
  visionModel: string;
  ocrModel: string;
  timeoutMs: number;
}

export interface ElevenLabsConfig {
  apiKey?: string;
  voiceId: string;
  timeoutMs: number;
}

export interface AudioConfig {
  save: boolean;
  outputDir: string;
}

export interface TimerConfig {
  callbackUrl: string;
  callbackTimeoutMs: number;
  shortcut: boolean;
}

export interface AssistantConfig {
  openRouter: OpenRouterConfig;
  elevenLabs: ElevenLabsConfig;
  audio: AudioConfig;
  timers: TimerConfig;
  port: number;
}

const parseInteger = (name: string, raw: string | undefined, fallback: number, min = 1): number => {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
};

export const parseModelList = (raw: string | undefined): string[] =>
  (raw ?? '')
    .split(',')
    .map((m) => m.trim())
    .filter((m) => m.length > 0);

const resolveOcrModel = (raw: string | undefined): string => {
  const model = raw?.trim() || DEFAULT_VISION_MODEL;
  if (model.toLowerCase().includes('gemini-pro-vision')) {
    logger.warn(`Invalid OCR model '${model}' detected. Using default '${DEFAULT_VISION_MODEL}' instead.`);
    return DEFAULT_VISION_MODEL;
  }
  return model;
};

/**
 * Reads the assistant configuration from the environment.
 * Throws when the provider key is missing or a numeric value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AssistantConfig {
  const apiKey = env.OPENROUTER_API_KEY?.trim();
  if (!apiKey) {
    throw new Error('OPENROUTER_API_KEY not found in environment variables');
  }
  if (!apiKey.startsWith('sk-or-v1-')) {
    logger.warn(`API key format may be incorrect. Expected format: sk-or-v1-... (starts with ${apiKey.slice(0, 10)}...)`);
  }

  const port = parseInteger('PORT', env.PORT, 5000);
  if (port > 65535) {
    throw new Error(`PORT must be <= 65535 (got ${port})`);
  }

  const elevenLabsTimeout = parseInteger('ELEVENLABS_TIMEOUT_MS', env.ELEVENLABS_TIMEOUT_MS, 30_000);

  return {
    openRouter: {
      apiKey,
      baseUrl: env.OPENROUTER_BASE_URL?.trim() || DEFAULT_BASE_URL,
      model: env.OPENROUTER_MODEL?.trim() || DEFAULT_MODEL,
      backupModels: parseModelList(env.OPENROUTER_BACKUP_MODELS),
      visionModel: env.OPENROUTER_VISION_MODEL?.trim() || DEFAULT_VISION_MODEL,
      ocrModel: resolveOcrModel(env.OPENROUTER_OCR_MODEL),
      timeoutMs: parseInteger('OPENROUTER_TIMEOUT_MS', env.OPENROUTER_TIMEOUT_MS, 60_000),
    },
    elevenLabs: {
      apiKey: env.ELEVENLABS_API_KEY?.trim() || undefined,
      voiceId: env.ELEVENLABS_VOICE_ID?.trim() || DEFAULT_VOICE_ID,
      timeoutMs: elevenLabsTimeout,
    },
    audio: {
      save: env.AUDIO_SAVE !== 'false',
      outputDir: env.AUDIO_OUTPUT_DIR?.trim() || path.join(os.tmpdir(), 'pika-audio'),
    },
    timers: {
      callbackUrl: env.TIMER_CALLBACK_URL?.trim() || 'http://localhost:4000/setTimer',
      callbackTimeoutMs: parseInteger('TIMER_CALLBACK_TIMEOUT_MS', env.TIMER_CALLBACK_TIMEOUT_MS, 5000),
      shortcut: env.ASSISTANT_TIMER_SHORTCUT !== 'false',
    },
    port,
  };
}
