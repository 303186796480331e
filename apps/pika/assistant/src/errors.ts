/**
 * Error types for provider calls
 */

export type ProviderName = 'openrouter' | 'elevenlabs' | 'timer-callback';

/**
 * Thrown by provider clients. `status` is the HTTP status when the provider answered.
 */
export class ProviderError extends Error {
  readonly provider: ProviderName;
  readonly status?: number;

  constructor(provider: ProviderName, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.provider = provider;
    this.status = options.status;
  }
}

/**
 * Reads an HTTP status from any thrown value that carries one
 * (ProviderError, the openai SDK's APIError, fetch wrappers).
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
