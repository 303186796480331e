import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { createLogger, type HealthResponse, type StatusResponse } from '@pika/shared';
import { createConversationRoutes } from './routes/conversation.js';
import { createDetectRoutes } from './routes/detect.js';
import { createTimerRoutes } from './routes/timers.js';
import type { AssistantDeps } from './types.js';

const log = createLogger('Assistant');

/**
 * Builds the assistant API around explicitly constructed services.
 */
export function createAssistantApp(deps: AssistantDeps) {
  const app = new Hono();

  app.use('*', logger());
  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
  }));

  app.get('/health', (c) => {
    const result: HealthResponse = { status: 'healthy', service: 'Virtual AI Assistant API' };
    return c.json(result);
  });

  app.get('/status', (c) => {
    const llm = deps.assistant.llmClient;
    const result: StatusResponse = {
      is_active: deps.assistant.isActive,
      model: llm.model,
      backup_models: llm.backupModels,
      audio_enabled: deps.speech.enabled,
      active_timers: deps.timers.size,
      status: 'success',
    };
    return c.json(result);
  });

  app.route('/', createConversationRoutes(deps));
  app.route('/', createDetectRoutes(deps));
  app.route('/timers', createTimerRoutes(deps));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    log.error('Server error:', err);
    return c.json({ error: 'Internal server error', message: err.message }, 500);
  });

  return app;
}
