import { randomUUID } from 'node:crypto';
import { createLogger, type Logger, type TimerSummary } from '@pika/shared';
import { messageOf } from '../errors.js';
import type { TimerDuration } from './timer-intent.js';

export type TimerOutcome =
  | { status: 'fired' }
  | { status: 'callback_failed'; error: string }
  | { status: 'cancelled' };

export interface TimerHandle {
  readonly id: string;
  readonly seconds: number;
  readonly formatted: string;
  readonly startedAt: Date;
  readonly firesAt: Date;
  /** Returns false when the timer already fired or was cancelled. */
  cancel(): boolean;
  readonly done: Promise<TimerOutcome>;
}

// Longest delay a single setTimeout honours; longer timers re-arm in chunks.
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export interface TimerServiceOptions {
  callbackUrl: string;
  callbackTimeoutMs?: number;
  logger?: Logger;
}

interface PendingTimer {
  handle: TimerHandle;
  timeout?: NodeJS.Timeout;
  settle: (outcome: TimerOutcome) => void;
}

/**
 * Background timers. Each timer waits without blocking the caller, then
 * notifies the frontend once with `{time, seconds, id}`.
 */
export class TimerService {
  private pending = new Map<string, PendingTimer>();
  private callbackUrl: string;
  private callbackTimeoutMs: number;
  private logger: Logger;

  constructor(options: TimerServiceOptions) {
    this.callbackUrl = options.callbackUrl;
    this.callbackTimeoutMs = options.callbackTimeoutMs ?? 5000;
    this.logger = options.logger ?? createLogger('Timer');
  }

  start(duration: TimerDuration): TimerHandle {
    if (!Number.isFinite(duration.seconds) || duration.seconds <= 0) {
      throw new Error('Timer duration must be greater than zero');
    }

    const id = randomUUID();
    const startedAt = new Date();
    const firesAt = new Date(startedAt.getTime() + duration.seconds * 1000);

    let settle: (outcome: TimerOutcome) => void = () => undefined;
    const done = new Promise<TimerOutcome>((resolve) => {
      settle = resolve;
    });

    const handle: TimerHandle = {
      id,
      seconds: duration.seconds,
      formatted: duration.formatted,
      startedAt,
      firesAt,
      cancel: () => this.cancel(id),
      done,
    };

    const entry: PendingTimer = { handle, settle };
    this.pending.set(id, entry);
    this.arm(entry, duration.seconds * 1000);
    this.logger.info(`Timer ${id} set for ${duration.formatted}`);
    return handle;
  }

  private arm(entry: PendingTimer, remainingMs: number): void {
    const delay = Math.min(remainingMs, MAX_TIMEOUT_MS);
    entry.timeout = setTimeout(() => {
      if (remainingMs > delay) {
        this.arm(entry, remainingMs - delay);
        return;
      }
      this.pending.delete(entry.handle.id);
      void this.notify(entry.handle).then(entry.settle);
    }, delay);
    entry.timeout.unref();
  }

  get(id: string): TimerHandle | undefined {
    return this.pending.get(id)?.handle;
  }

  list(): TimerHandle[] {
    return [...this.pending.values()].map((entry) => entry.handle);
  }

  get size(): number {
    return this.pending.size;
  }

  cancel(id: string): boolean {
    const entry = this.pending.get(id);
    if (!entry) return false;

    clearTimeout(entry.timeout);
    this.pending.delete(id);
    entry.settle({ status: 'cancelled' });
    this.logger.info(`Timer ${id} cancelled`);
    return true;
  }

  cancelAll(): number {
    const ids = [...this.pending.keys()];
    for (const id of ids) this.cancel(id);
    return ids.length;
  }

  private async notify(handle: TimerHandle): Promise<TimerOutcome> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.callbackTimeoutMs);

    try {
      const response = await fetch(this.callbackUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ time: handle.formatted, seconds: handle.seconds, id: handle.id }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = `Callback responded with ${response.status}`;
        this.logger.warn(`Timer ${handle.id} fired but ${error}`);
        return { status: 'callback_failed', error };
      }

      this.logger.info(`Timer ${handle.id} fired (${handle.formatted})`);
      return { status: 'fired' };
    } catch (err) {
      const error = controller.signal.aborted
        ? `Callback timed out after ${this.callbackTimeoutMs}ms`
        : messageOf(err);
      this.logger.warn(`Timer ${handle.id} fired but the callback failed: ${error}`);
      return { status: 'callback_failed', error };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function toTimerSummary(handle: TimerHandle): TimerSummary {
  return {
    id: handle.id,
    seconds: handle.seconds,
    time: handle.formatted,
    started_at: handle.startedAt.toISOString(),
    fires_at: handle.firesAt.toISOString(),
  };
}
