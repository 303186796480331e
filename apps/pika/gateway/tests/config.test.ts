import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
    it('applies defaults', () => {
        expect(loadConfig({})).toEqual({
            assistantUrl: 'http://localhost:5000',
            forwardTimeoutMs: 60_000,
            captureDir: path.join(os.tmpdir(), 'pika-captures'),
            autostart: false,
            assistantCommand: 'npm run start --workspace @pika/assistant',
            captureIntervalMs: 5000,
            port: 3000,
        });
    });

    it('reads overrides', () => {
        const config = loadConfig({
            ASSISTANT_URL: 'http://assistant.test:8000/',
            FORWARD_TIMEOUT_MS: '1500',
            CAPTURE_DIR: '/var/tmp/caps',
            ASSISTANT_AUTOSTART: 'true',
            CAPTURE_INTERVAL_MS: '2000',
            PORT: '8080',
        });

        expect(config.assistantUrl).toBe('http://assistant.test:8000');
        expect(config.forwardTimeoutMs).toBe(1500);
        expect(config.captureDir).toBe('/var/tmp/caps');
        expect(config.autostart).toBe(true);
        expect(config.captureIntervalMs).toBe(2000);
        expect(config.port).toBe(8080);
    });

    it('rejects invalid numbers', () => {
        expect(() => loadConfig({ FORWARD_TIMEOUT_MS: '-5' })).toThrow('FORWARD_TIMEOUT_MS must be an integer >= 1 (got "-5")');
        expect(() => loadConfig({ PORT: '70000' })).toThrow('PORT must be <= 65535 (got 70000)');
    });
});
