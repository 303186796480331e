import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { createLogger } from '@pika/shared';
import { createCaptureRoutes } from './routes/capture.js';
import { createPredictRoutes } from './routes/predict.js';
import type { GatewayDeps } from './types.js';

/**
 * HTTP front door for the frontend: capture endpoints, health and the placeholder model.
 */
export function createGatewayApp(deps: GatewayDeps) {
  const app = new Hono();
  const log = deps.logger ?? createLogger('Gateway');

  app.use('*', logger());
  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
  }));

  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      service: 'Pika Gateway',
      assistant_url: deps.config.assistantUrl,
      capture_interval_ms: deps.config.captureIntervalMs,
    });
  });

  app.route('/api', createCaptureRoutes(deps));
  app.route('/predict', createPredictRoutes(deps));

  app.notFound((c) => {
    return c.json({ success: false, error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    log.error('Server error:', err);
    return c.json({ success: false, error: err.message }, 500);
  });

  return app;
}
