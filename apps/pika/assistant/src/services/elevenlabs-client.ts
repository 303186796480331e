import { isRecord, type AudioPayload } from '@pika/shared';
import { ProviderError, messageOf } from '../errors.js';

const BASE_URL = 'https://api.elevenlabs.io/v1';
const TTS_MODEL = 'eleven_monolingual_v1';
const AUDIO_MIME = 'audio/mpeg';

export interface VoiceSettings {
  voiceId?: string;
  stability?: number;
  similarityBoost?: number;
  style?: number;
  useSpeakerBoost?: boolean;
}

export interface SynthesizedAudio {
  audioBase64: string;
  bytes: Buffer;
  format: 'mp3';
  mimeType: string;
  sizeBytes: number;
}

export interface Voice {
  voice_id: string;
  name: string;
}

export interface ElevenLabsClientOptions {
  apiKey: string;
  voiceId?: string;
  timeoutMs?: number;
  baseUrl?: string;
}

interface ProviderResponse {
  status: number;
  ok: boolean;
  body: Buffer;
}

/**
 * ElevenLabs text-to-speech and speech-to-text over plain fetch.
 */
export class ElevenLabsClient {
  private apiKey: string;
  private voice: string;
  private timeoutMs: number;
  private baseUrl: string;

  constructor(options: ElevenLabsClientOptions) {
    if (!options.apiKey) {
      throw new Error('ElevenLabs API key is required. Set ELEVENLABS_API_KEY.');
    }
    this.apiKey = options.apiKey;
    this.voice = options.voiceId ?? '21m00Tcm4TlvDq8ikWAM';
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.baseUrl = options.baseUrl ?? BASE_URL;
  }

  get voiceId(): string {
    return this.voice;
  }

  changeVoice(voiceId: string): void {
    this.voice = voiceId;
  }

  async textToSpeech(text: string, settings: VoiceSettings = {}): Promise<SynthesizedAudio> {
    if (!text || !text.trim()) {
      throw new Error('Text cannot be empty');
    }

    const voiceId = settings.voiceId ?? this.voice;
    const response = await this.request(`/text-to-speech/${voiceId}`, {
      method: 'POST',
      headers: {
        Accept: AUDIO_MIME,
        'Content-Type': 'application/json',
        'xi-api-key': this.apiKey,
      },
      body: JSON.stringify({
        text,
        model_id: TTS_MODEL,
        voice_settings: {
          stability: settings.stability ?? 0.5,
          similarity_boost: settings.similarityBoost ?? 0.75,
          style: settings.style ?? 0,
          use_speaker_boost: settings.useSpeakerBoost ?? true,
        },
      }),
    }, this.timeoutMs);

    if (!response.ok) {
      const detail = response.body.toString('utf8');
      throw new ProviderError('elevenlabs', `ElevenLabs API error (${response.status}): ${detail}`, {
        status: response.status,
      });
    }

    const bytes = response.body;
    return {
      audioBase64: bytes.toString('base64'),
      bytes,
      format: 'mp3',
      mimeType: AUDIO_MIME,
      sizeBytes: bytes.length,
    };
  }

  /**
   * Transcribes base64 audio. Transcription gets twice the synthesis timeout.
   */
  async speechToText(audioBase64: string, mimeType = 'audio/webm', modelId = 'scribe_v1'): Promise<string> {
    if (!audioBase64) {
      throw new Error('Audio data cannot be empty');
    }

    const form = new FormData();
    form.append('file', new Blob([Buffer.from(audioBase64, 'base64')], { type: mimeType }), 'audio.webm');
    form.append('model_id', modelId);

    const response = await this.request('/speech-to-text', {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'xi-api-key': this.apiKey,
      },
      body: form,
    }, this.timeoutMs * 2);

    const raw = response.body.toString('utf8');
    let parsed: unknown = null;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = null;
    }

    if (response.status >= 400) {
      throw new ProviderError('elevenlabs', `HTTP ${response.status} error from ElevenLabs STT: ${raw}`, {
        status: response.status,
      });
    }
    if (!isRecord(parsed)) {
      throw new ProviderError('elevenlabs', 'ElevenLabs STT returned a non-JSON response');
    }

    const text = typeof parsed.text === 'string' && parsed.text
      ? parsed.text
      : typeof parsed.transcription === 'string'
        ? parsed.transcription
        : '';
    if (!text.trim()) {
      throw new ProviderError('elevenlabs', 'No transcription text in response');
    }
    return text.trim();
  }

  async getVoices(): Promise<Voice[]> {
    const response = await this.request('/voices', { headers: { 'xi-api-key': this.apiKey } }, this.timeoutMs);
    if (!response.ok) {
      throw new ProviderError('elevenlabs', `Error fetching voices: HTTP ${response.status}`, {
        status: response.status,
      });
    }
    const data: unknown = JSON.parse(response.body.toString('utf8'));
    if (!isRecord(data) || !Array.isArray(data.voices)) return [];
    return data.voices.filter(
      (v): v is Voice => isRecord(v) && typeof v.voice_id === 'string' && typeof v.name === 'string'
    );
  }

  /**
   * The timeout covers the whole exchange, body included.
   */
  private async request(path: string, init: RequestInit, timeoutMs: number): Promise<ProviderResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(`${this.baseUrl}${path}`, { ...init, signal: controller.signal });
      const body = Buffer.from(await response.arrayBuffer());
      return { status: response.status, ok: response.ok, body };
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : messageOf(error);
      throw new ProviderError('elevenlabs', `ElevenLabs request failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function toAudioPayload(audio: SynthesizedAudio): AudioPayload {
  return {
    data: audio.audioBase64,
    format: audio.format,
    mime_type: audio.mimeType,
    data_url: `data:${audio.mimeType};base64,${audio.audioBase64}`,
  };
}
