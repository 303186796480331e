/**
 * Assistant API server
 * Entry point: loads configuration, builds services and listens
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createLogger } from '@pika/shared';
import { createAssistantApp } from './app.js';
import { loadConfig } from './config.js';
import { createServices } from './container.js';

const log = createLogger('Assistant');

// Start server only if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const config = loadConfig();
  const deps = createServices(config);
  const app = createAssistantApp(deps);

  log.info(`Starting Virtual AI Assistant API on port ${config.port}...`);
  log.info(`Primary model: ${config.openRouter.model}`);
  if (config.openRouter.backupModels.length > 0) {
    log.info(`Backup models: ${config.openRouter.backupModels.join(', ')}`);
  }

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info(`API running at http://localhost:${info.port}`);
  });

  const shutdown = () => {
    const cancelled = deps.timers.cancelAll();
    if (cancelled > 0) log.info(`Cancelled ${cancelled} pending timer(s)`);
    deps.assistant.stop();
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

export { createAssistantApp } from './app.js';
export { createServices } from './container.js';
