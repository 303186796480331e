import type { Context } from 'hono';
import { isRecord, type ErrorResponse } from '@pika/shared';

export type JsonObject = Record<string, unknown>;

/**
 * Parsed JSON object body, or null when the body is missing, malformed or not an object.
 */
export async function readJsonObject(c: Context): Promise<JsonObject | null> {
  try {
    const body: unknown = await c.req.json();
    return isRecord(body) && Object.keys(body).length > 0 ? body : null;
  } catch {
    return null;
  }
}

export function stringField(body: JsonObject, key: string): string {
  const value = body[key];
  return typeof value === 'string' ? value.trim() : '';
}

export const errorBody = (error: string): ErrorResponse => ({ error, status: 'error' });
