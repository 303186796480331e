import { createLogger, type AudioPayload, type Logger } from '@pika/shared';
import { messageOf } from '../errors.js';
import { saveAudio } from '../utils/audio-store.js';
import { toAudioPayload, type ElevenLabsClient, type VoiceSettings } from './elevenlabs-client.js';

const PIKA_VOICE: VoiceSettings = {
  stability: 0.5,
  similarityBoost: 0.75,
  style: 0.2,
  useSpeakerBoost: true,
};

export interface SpeechServiceOptions {
  client?: ElevenLabsClient;
  /** Directory for debug copies of synthesized audio; omit to skip saving. */
  outputDir?: string;
  logger?: Logger;
}

/**
 * Optional voice layer. Without an ElevenLabs client every synthesis
 * resolves to undefined and transcription throws.
 */
export class SpeechService {
  private client?: ElevenLabsClient;
  private outputDir?: string;
  private logger: Logger;
  private welcomeCache?: { message: string; audio: AudioPayload };

  constructor(options: SpeechServiceOptions = {}) {
    this.client = options.client;
    this.outputDir = options.outputDir;
    this.logger = options.logger ?? createLogger('Speech');
  }

  get enabled(): boolean {
    return this.client !== undefined;
  }

  /**
   * Best effort: failures are logged and yield undefined.
   */
  async synthesize(text: string, label = 'response'): Promise<AudioPayload | undefined> {
    if (!this.client || !text.trim()) return undefined;

    try {
      const audio = await this.client.textToSpeech(text, PIKA_VOICE);
      if (this.outputDir) {
        try {
          const saved = await saveAudio(this.outputDir, audio.bytes, text);
          this.logger.info(`Saved ${label} audio: ${saved}`);
        } catch (error) {
          this.logger.warn(`Failed to save ${label} audio: ${messageOf(error)}`);
        }
      }
      return toAudioPayload(audio);
    } catch (error) {
      this.logger.warn(`Failed to generate ${label} audio: ${messageOf(error)}`);
      return undefined;
    }
  }

  async welcomeAudio(message: string): Promise<AudioPayload | undefined> {
    if (this.welcomeCache?.message === message) {
      return this.welcomeCache.audio;
    }
    const audio = await this.synthesize(message, 'welcome');
    if (audio) {
      this.welcomeCache = { message, audio };
    }
    return audio;
  }

  clearWelcomeCache(): void {
    this.welcomeCache = undefined;
  }

  async transcribe(audioBase64: string, mimeType?: string): Promise<string> {
    if (!this.client) {
      throw new Error('Audio transcription not available. ElevenLabs client not initialized.');
    }
    return this.client.speechToText(audioBase64, mimeType);
  }
}
