import http from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { ElevenLabsClient } from '../src/services/elevenlabs-client.js';

describe('ElevenLabsClient against a stalled response body', () => {
    // Sends headers and a first chunk, then never finishes
    const server = http.createServer((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'audio/mpeg' });
        res.write('ID');
    });
    let baseUrl = '';

    beforeAll(async () => {
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('applies the timeout while reading the audio', async () => {
        const client = new ElevenLabsClient({ apiKey: 'test-secret', baseUrl, timeoutMs: 200 });
        const started = Date.now();

        await expect(client.textToSpeech('Meow!')).rejects.toThrow('ElevenLabs request failed: timed out after 200ms');
        expect(Date.now() - started).toBeLessThan(5000);
    });

    it('applies the doubled timeout while reading a transcript', async () => {
        const client = new ElevenLabsClient({ apiKey: 'test-secret', baseUrl, timeoutMs: 100 });

        await expect(client.speechToText('QUJD')).rejects.toThrow('ElevenLabs request failed: timed out after 200ms');
    });
});
