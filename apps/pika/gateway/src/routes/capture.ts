import { Hono, type Context } from 'hono';
import { createLogger, INPUT_TYPES, type GatewayResponse, type InputType, type Result } from '@pika/shared';
import { normalizePayload, type PayloadSource } from '../services/payload-normalizer.js';
import type { GatewayDeps } from '../types.js';

const readSource = async (c: Context): Promise<Result<PayloadSource, string>> => {
  const contentType = c.req.header('Content-Type') ?? '';
  if (contentType.includes('multipart/form-data') || contentType.includes('application/x-www-form-urlencoded')) {
    try {
      const fields: Record<string, unknown> = await c.req.parseBody();
      return { ok: true, value: { kind: 'multipart', fields } };
    } catch {
      return { ok: false, error: 'Request body must be valid form data' };
    }
  }
  try {
    const body: unknown = await c.req.json();
    return { ok: true, value: { kind: 'json', body } };
  } catch {
    return { ok: false, error: 'Request body must be valid JSON' };
  }
};

/**
 * `POST /api/<type>` for every input type: normalize, keep a debug copy, forward.
 */
export function createCaptureRoutes(deps: GatewayDeps) {
  const app = new Hono();
  const log = deps.logger ?? createLogger('Gateway');

  const handle = async (c: Context, inputType: InputType) => {
    const source = await readSource(c);
    if (!source.ok) {
      const result: GatewayResponse = { success: false, input_type: inputType, error: source.error };
      return c.json(result, 400);
    }

    const normalized = await normalizePayload(inputType, source.value);
    if (!normalized.ok) {
      const result: GatewayResponse = { success: false, input_type: inputType, error: normalized.error.message };
      return c.json(result, 400);
    }
    const payload = normalized.value;

    let savedPath: string | undefined;
    try {
      savedPath = await deps.captures.save(payload);
      if (savedPath) log.debug(`Saved ${inputType} capture to ${savedPath}`);
    } catch (error) {
      log.warn(`Could not save ${inputType} capture:`, error);
    }

    const forwarded = await deps.forwarder.forward(payload);
    if (!forwarded.ok) {
      log.error(`Forwarding ${inputType} failed: ${forwarded.error.message}`);
      const result: GatewayResponse = {
        success: false,
        input_type: inputType,
        saved_path: savedPath,
        error: forwarded.error.message,
      };
      return c.json(result, 502);
    }

    const result: GatewayResponse = {
      ...forwarded.value,
      success: true,
      input_type: inputType,
      saved_path: savedPath,
    };
    return c.json(result);
  };

  for (const inputType of INPUT_TYPES) {
    app.post(`/${inputType}`, (c) => handle(c, inputType));
  }

  return app;
}
