import { createLogger } from '@pika/shared';
import type { AssistantConfig } from './config.js';
import { Assistant } from './services/assistant.js';
import { ElevenLabsClient } from './services/elevenlabs-client.js';
import { OpenRouterClient } from './services/openrouter-client.js';
import { SpeechService } from './services/speech.js';
import { TimerService } from './services/timers.js';
import { VisionAnalyzer } from './services/vision.js';
import type { AssistantDeps } from './types.js';

const logger = createLogger('Assistant');

/**
 * Constructs every service from configuration. Audio stays disabled
 * when no ElevenLabs key is configured.
 */
export function createServices(config: AssistantConfig): AssistantDeps {
  const llm = new OpenRouterClient({
    apiKey: config.openRouter.apiKey,
    baseUrl: config.openRouter.baseUrl,
    model: config.openRouter.model,
    backupModels: config.openRouter.backupModels,
    visionModel: config.openRouter.visionModel,
    timeoutMs: config.openRouter.timeoutMs,
  });

  const timers = new TimerService({
    callbackUrl: config.timers.callbackUrl,
    callbackTimeoutMs: config.timers.callbackTimeoutMs,
  });

  let elevenLabs: ElevenLabsClient | undefined;
  if (config.elevenLabs.apiKey) {
    elevenLabs = new ElevenLabsClient({
      apiKey: config.elevenLabs.apiKey,
      voiceId: config.elevenLabs.voiceId,
      timeoutMs: config.elevenLabs.timeoutMs,
    });
    logger.info('ElevenLabs audio enabled');
  } else {
    logger.warn('ELEVENLABS_API_KEY not set, audio disabled');
  }

  return {
    assistant: new Assistant({ llm, timers, timerShortcut: config.timers.shortcut }),
    vision: new VisionAnalyzer({
      llm,
      ocrModel: config.openRouter.ocrModel,
      visionModel: config.openRouter.visionModel,
    }),
    speech: new SpeechService({
      client: elevenLabs,
      outputDir: config.audio.save ? config.audio.outputDir : undefined,
    }),
    timers,
  };
}
