import { randomBytes } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Payload } from './payload-normalizer.js';

const EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/webp': 'webp',
  'image/gif': 'gif',
  'audio/webm': 'webm',
  'audio/ogg': 'ogg',
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'audio/mpeg': 'mp3',
  'audio/mp4': 'm4a',
  'video/webm': 'webm',
  'video/mp4': 'mp4',
};

/**
 * File extension for a capture: mime type first (parameters such as
 * `;codecs=opus` ignored), then the uploaded filename, then `bin`.
 */
export function captureExtension(mimeType?: string, filename?: string): string {
  const mime = mimeType?.split(';')[0]?.trim().toLowerCase();
  const known = mime ? EXTENSIONS[mime] : undefined;
  if (known) return known;

  const fromName = filename ? path.extname(filename).slice(1).toLowerCase() : '';
  return /^[a-z0-9]{1,8}$/.test(fromName) ? fromName : 'bin';
}

/**
 * Keeps a debug copy of every decoded image or audio upload.
 */
export class CaptureStore {
  constructor(
    readonly dir: string,
    private readonly now: () => number = Date.now
  ) {}

  /** Absolute path of the written file; text payloads are not saved. */
  async save(payload: Payload): Promise<string | undefined> {
    if (payload.inputType === 'text') return undefined;

    const mimeType = payload.inputType === 'voice' ? payload.mimeType ?? payload.format : payload.mimeType;
    const ext = captureExtension(mimeType, payload.filename);
    const name = `${payload.inputType}-${this.now()}-${randomBytes(4).toString('hex')}.${ext}`;

    await mkdir(this.dir, { recursive: true });
    const filePath = path.resolve(this.dir, name);
    await writeFile(filePath, payload.bytes);
    return filePath;
  }
}
