/**
 * Pending timer routes
 */

import { Hono } from 'hono';
import type { TimersResponse } from '@pika/shared';
import { toTimerSummary } from '../services/timers.js';
import type { AssistantDeps } from '../types.js';
import { errorBody } from './request.js';

export function createTimerRoutes({ timers }: AssistantDeps) {
  const routes = new Hono();

  // GET /timers
  routes.get('/', (c) => {
    const result: TimersResponse = { timers: timers.list().map(toTimerSummary), status: 'success' };
    return c.json(result);
  });

  // DELETE /timers/:id
  routes.delete('/:id', (c) => {
    const id = c.req.param('id');
    if (!timers.cancel(id)) {
      return c.json(errorBody(`Timer ${id} not found`), 404);
    }
    return c.json({ cancelled: true, id, status: 'success' });
  });

  return routes;
}
