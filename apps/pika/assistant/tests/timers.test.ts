import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { silentLogger } from '@pika/shared';
import { MAX_TIMEOUT_MS, TimerService, toTimerSummary } from '../src/services/timers.js';

const CALLBACK_URL = 'http://frontend.test/setTimer';

describe('TimerService', () => {
    const fetchMock = vi.fn();
    let service: TimerService;

    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
        service = new TimerService({ callbackUrl: CALLBACK_URL, logger: silentLogger });
    });

    afterEach(() => {
        service.cancelAll();
        vi.useRealTimers();
        vi.unstubAllGlobals();
    });

    it('returns a handle immediately and notifies the frontend after the duration', async () => {
        fetchMock.mockResolvedValue(new Response(null, { status: 200 }));

        const handle = service.start({ seconds: 5, formatted: '00:00:05' });
        expect(handle.startedAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
        expect(handle.firesAt.toISOString()).toBe('2026-01-01T00:00:05.000Z');
        expect(service.list()).toEqual([handle]);
        expect(service.get(handle.id)).toBe(handle);

        await vi.advanceTimersByTimeAsync(4999);
        expect(fetchMock).not.toHaveBeenCalled();

        await vi.advanceTimersByTimeAsync(1);
        await expect(handle.done).resolves.toEqual({ status: 'fired' });

        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe(CALLBACK_URL);
        expect(init.method).toBe('POST');
        expect(JSON.parse(init.body)).toEqual({ time: '00:00:05', seconds: 5, id: handle.id });
        expect(service.size).toBe(0);
    });

    it('waits out durations longer than a single timeout allows', async () => {
        fetchMock.mockResolvedValue(new Response(null, { status: 200 }));
        const seconds = 30 * 24 * 3600;
        expect(seconds * 1000).toBeGreaterThan(MAX_TIMEOUT_MS);

        const handle = service.start({ seconds, formatted: '720:00:00' });

        await vi.advanceTimersByTimeAsync(1000);
        expect(fetchMock).not.toHaveBeenCalled();

        await vi.advanceTimersByTimeAsync(MAX_TIMEOUT_MS);
        expect(fetchMock).not.toHaveBeenCalled();
        expect(service.size).toBe(1);

        await vi.advanceTimersByTimeAsync(seconds * 1000 - MAX_TIMEOUT_MS - 1002);
        expect(fetchMock).not.toHaveBeenCalled();

        await vi.advanceTimersByTimeAsync(2);
        await expect(handle.done).resolves.toEqual({ status: 'fired' });
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('cancels a long timer between chunks', async () => {
        const handle = service.start({ seconds: 30 * 24 * 3600, formatted: '720:00:00' });

        await vi.advanceTimersByTimeAsync(MAX_TIMEOUT_MS + 1);
        expect(handle.cancel()).toBe(true);

        await vi.advanceTimersByTimeAsync(30 * 24 * 3600 * 1000);
        expect(fetchMock).not.toHaveBeenCalled();
        await expect(handle.done).resolves.toEqual({ status: 'cancelled' });
    });

    it('reports a failed callback without throwing', async () => {
        fetchMock.mockRejectedValue(new Error('connect ECONNREFUSED'));

        const handle = service.start({ seconds: 1, formatted: '00:00:01' });
        await vi.advanceTimersByTimeAsync(1000);

        await expect(handle.done).resolves.toEqual({ status: 'callback_failed', error: 'connect ECONNREFUSED' });
    });

    it('reports a non-2xx callback response', async () => {
        fetchMock.mockResolvedValue(new Response('down', { status: 503 }));

        const handle = service.start({ seconds: 1, formatted: '00:00:01' });
        await vi.advanceTimersByTimeAsync(1000);

        await expect(handle.done).resolves.toEqual({ status: 'callback_failed', error: 'Callback responded with 503' });
    });

    it('cancels a pending timer through its handle', async () => {
        const handle = service.start({ seconds: 10, formatted: '00:00:10' });

        expect(handle.cancel()).toBe(true);
        expect(handle.cancel()).toBe(false);
        await expect(handle.done).resolves.toEqual({ status: 'cancelled' });

        await vi.advanceTimersByTimeAsync(10_000);
        expect(fetchMock).not.toHaveBeenCalled();
        expect(service.list()).toEqual([]);
    });

    it('cancels by id and in bulk', () => {
        const first = service.start({ seconds: 10, formatted: '00:00:10' });
        service.start({ seconds: 20, formatted: '00:00:20' });
        service.start({ seconds: 30, formatted: '00:00:30' });

        expect(service.cancel(first.id)).toBe(true);
        expect(service.cancel('missing')).toBe(false);
        expect(service.cancelAll()).toBe(2);
        expect(service.size).toBe(0);
    });

    it('rejects non-positive durations', () => {
        expect(() => service.start({ seconds: 0, formatted: '00:00:00' })).toThrow(
            'Timer duration must be greater than zero'
        );
    });

    it('summarizes a handle for the API', () => {
        const handle = service.start({ seconds: 90, formatted: '00:01:30' });

        expect(toTimerSummary(handle)).toEqual({
            id: handle.id,
            seconds: 90,
            time: '00:01:30',
            started_at: '2026-01-01T00:00:00.000Z',
            fires_at: '2026-01-01T00:01:30.000Z',
        });
    });
});
