/**
 * Gateway server
 * Entry point: relays browser captures to the assistant server
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createLogger } from '@pika/shared';
import { createGatewayApp } from './app.js';
import { loadConfig } from './config.js';
import { CaptureStore } from './services/capture-store.js';
import { AssistantForwarder } from './services/forwarder.js';
import { AssistantLauncher } from './services/launcher.js';

const log = createLogger('Gateway');

// Start server only if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const config = loadConfig();

  const launcher = new AssistantLauncher({ command: config.assistantCommand });
  if (config.autostart) launcher.start();

  const app = createGatewayApp({
    forwarder: new AssistantForwarder({ baseUrl: config.assistantUrl, timeoutMs: config.forwardTimeoutMs }),
    captures: new CaptureStore(config.captureDir),
    config,
    logger: log,
  });

  log.info(`Forwarding to ${config.assistantUrl}`);
  log.info(`Saving captures to ${config.captureDir}`);

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info(`Gateway running at http://localhost:${info.port}`);
  });

  const shutdown = () => {
    launcher.stop();
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

export { createGatewayApp } from './app.js';
