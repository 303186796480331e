import type { Logger } from '@pika/shared';
import type { GatewayConfig } from './config.js';
import type { CaptureStore } from './services/capture-store.js';
import type { AssistantForwarder } from './services/forwarder.js';

export interface GatewayDeps {
  forwarder: Pick<AssistantForwarder, 'forward'>;
  captures: Pick<CaptureStore, 'save'>;
  config: Pick<GatewayConfig, 'assistantUrl' | 'captureIntervalMs'>;
  logger?: Logger;
}
