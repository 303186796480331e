import { Hono } from 'hono';
import { createLogger, type PredictResponse } from '@pika/shared';
import { hasData, predict } from '../services/model.js';
import type { GatewayDeps } from '../types.js';

export function createPredictRoutes(deps: GatewayDeps) {
  const app = new Hono();
  const log = deps.logger ?? createLogger('Gateway');

  app.post('/', async (c) => {
    let data: unknown;
    try {
      data = await c.req.json();
    } catch {
      data = undefined;
    }
    if (!hasData(data)) {
      return c.json({ success: false, error: 'No data provided' }, 400);
    }

    try {
      const result: PredictResponse = { success: true, prediction: predict(data) };
      return c.json(result);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`Prediction failed: ${message}`);
      return c.json({ success: false, error: message }, 500);
    }
  });

  return app;
}
