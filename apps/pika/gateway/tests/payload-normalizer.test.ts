import { File } from 'node:buffer';
import { describe, expect, it } from 'vitest';
import { cleanBase64, decodeBase64, normalizePayload } from '../src/services/payload-normalizer.js';

const ABC = Buffer.from('ABC');

describe('cleanBase64', () => {
    it('drops whitespace and accepts both alphabets', () => {
        expect(cleanBase64('QU\nJD ')).toBe('QUJD');
        expect(cleanBase64('ab-_')).toBe('ab-_');
        expect(cleanBase64('QUI=')).toBe('QUI=');
    });

    it('rejects anything else', () => {
        expect(cleanBase64('not base64!')).toBeNull();
        expect(cleanBase64('')).toBeNull();
        expect(cleanBase64('==')).toBeNull();
    });
});

describe('decodeBase64', () => {
    it('returns the raw bytes', () => {
        expect(decodeBase64('QUJD')).toEqual(ABC);
    });
});

describe('normalizePayload (JSON)', () => {
    it('strips a data URL header and keeps its mime type', async () => {
        const res = await normalizePayload('screen', { kind: 'json', body: { image: 'data:image/png;base64,QU JD\n' } });

        expect(res).toEqual({
            ok: true,
            value: { inputType: 'screen', base64: 'QUJD', bytes: ABC, mimeType: 'image/png' },
        });
    });

    it('prefers the type-specific key over image', async () => {
        const res = await normalizePayload('camera', { kind: 'json', body: { image: 'QUJD', camera: 'QUJE' } });

        expect(res.ok && res.value.inputType === 'camera' ? res.value.base64 : null).toBe('QUJE');
    });

    it('accepts a video frame', async () => {
        const res = await normalizePayload('video', { kind: 'json', body: { frame: 'QUJD' } });

        expect(res).toEqual({ ok: true, value: { inputType: 'video', base64: 'QUJD', bytes: ABC } });
    });

    it('trims text and reads the message alias', async () => {
        const res = await normalizePayload('text', { kind: 'json', body: { message: '  hi pika  ' } });

        expect(res).toEqual({ ok: true, value: { inputType: 'text', text: 'hi pika' } });
    });

    it('defaults the audio format', async () => {
        const res = await normalizePayload('voice', { kind: 'json', body: { audio: 'QUJD' } });

        expect(res).toEqual({
            ok: true,
            value: { inputType: 'voice', base64: 'QUJD', bytes: ABC, format: 'audio/webm' },
        });
    });

    it('takes the format from the field, then the data URL', async () => {
        const fromHeader = await normalizePayload('voice', { kind: 'json', body: { audio: 'data:audio/ogg;base64,QUJD' } });
        const explicit = await normalizePayload('voice', {
            kind: 'json',
            body: { audio: 'data:audio/ogg;base64,QUJD', format: 'audio/wav' },
        });

        expect(fromHeader.ok && fromHeader.value.inputType === 'voice' ? fromHeader.value.format : null).toBe('audio/ogg');
        expect(explicit.ok && explicit.value.inputType === 'voice' ? explicit.value.format : null).toBe('audio/wav');
    });

    it('reads recorder data URLs that carry codec parameters', async () => {
        const res = await normalizePayload('voice', {
            kind: 'json',
            body: { audio: 'data:audio/webm;codecs=opus;base64,QUJD' },
        });

        expect(res).toEqual({
            ok: true,
            value: { inputType: 'voice', base64: 'QUJD', bytes: ABC, mimeType: 'audio/webm', format: 'audio/webm' },
        });
    });

    it('rejects invalid base64', async () => {
        const res = await normalizePayload('screen', { kind: 'json', body: { image: 'not base64!' } });

        expect(res).toEqual({
            ok: false,
            error: { type: 'validation_error', message: 'Field "image" is not valid base64' },
        });
    });

    it('names the accepted keys when nothing matches', async () => {
        const missing = await normalizePayload('screen', { kind: 'json', body: { picture: 'QUJD' } });
        const notObject = await normalizePayload('text', { kind: 'json', body: ['hello'] });
        const blank = await normalizePayload('text', { kind: 'json', body: { text: '   ' } });

        expect(missing).toEqual({
            ok: false,
            error: { type: 'validation_error', message: 'No screen data provided. Expected one of: screen, image' },
        });
        expect(notObject.ok ? null : notObject.error.message).toBe('No text data provided. Expected one of: text, message');
        expect(blank.ok ? null : blank.error.message).toBe('No text data provided. Expected one of: text, message');
    });
});

describe('normalizePayload (multipart)', () => {
    it('reads an uploaded file', async () => {
        const file = new File(['ABC'], 'shot.png', { type: 'image/png' });

        const res = await normalizePayload('screen', { kind: 'multipart', fields: { file } });

        expect(res).toEqual({
            ok: true,
            value: { inputType: 'screen', base64: 'QUJD', bytes: ABC, mimeType: 'image/png', filename: 'shot.png' },
        });
    });

    it('treats a string field like its JSON counterpart', async () => {
        const res = await normalizePayload('voice', { kind: 'multipart', fields: { audio: 'QUJD', format: 'audio/ogg' } });

        expect(res).toEqual({
            ok: true,
            value: { inputType: 'voice', base64: 'QUJD', bytes: ABC, format: 'audio/ogg' },
        });
    });

    it('uses the file type as the audio format', async () => {
        const audio = new File(['ABC'], 'clip.ogg', { type: 'audio/ogg' });

        const res = await normalizePayload('voice', { kind: 'multipart', fields: { audio } });

        expect(res.ok && res.value.inputType === 'voice' ? res.value.format : null).toBe('audio/ogg');
    });

    it('lists file among the accepted keys', async () => {
        const res = await normalizePayload('voice', { kind: 'multipart', fields: { other: 'x' } });

        expect(res).toEqual({
            ok: false,
            error: { type: 'validation_error', message: 'No voice data provided. Expected one of: file, audio' },
        });
    });
});
