/**
 * Services the assistant API is built from
 */

import type { Assistant } from './services/assistant.js';
import type { SpeechService } from './services/speech.js';
import type { TimerService } from './services/timers.js';
import type { VisionAnalyzer } from './services/vision.js';

export interface AssistantDeps {
  assistant: Assistant;
  vision: VisionAnalyzer;
  speech: SpeechService;
  timers: TimerService;
}
