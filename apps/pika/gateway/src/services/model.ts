import { isRecord } from '@pika/shared';

/**
 * Placeholder model: doubles `value` for objects, tags anything else.
 */
export function predict(data: unknown): number | string {
  if (isRecord(data)) {
    const raw = data.value ?? 0;
    const value =
      typeof raw === 'number' || typeof raw === 'boolean' || (typeof raw === 'string' && raw.trim() !== '') ? Number(raw) : NaN;
    if (!Number.isFinite(value)) {
      throw new Error(`could not convert value to a number: ${JSON.stringify(raw)}`);
    }
    return value * 2;
  }
  return `${String(data)}_predicted`;
}

/** Empty bodies carry nothing to predict on. */
export const hasData = (data: unknown): boolean => {
  if (data === null || data === undefined || data === false || data === 0 || data === '') return false;
  if (Array.isArray(data)) return data.length > 0;
  if (isRecord(data)) return Object.keys(data).length > 0;
  return true;
};
