import crypto from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local timestamp as `YYYYMMDD_HHMMSS`.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * First 30 characters of the text, reduced to alphanumerics, spaces, `-` and `_`,
 * with spaces turned into underscores.
 */
export function textSnippet(text: string): string {
  return [...text.slice(0, 30)]
    .filter((c) => /[\p{L}\p{N} _-]/u.test(c))
    .join('')
    .trim()
    .replace(/ /g, '_');
}

export function audioFilename(text: string, now: Date = new Date()): string {
  const hash = crypto.createHash('md5').update(text).digest('hex').slice(0, 8);
  return `${formatTimestamp(now)}_${hash}_${textSnippet(text)}.mp3`;
}

/**
 * Writes synthesized audio for debugging and returns the file path.
 */
export async function saveAudio(outputDir: string, bytes: Uint8Array, text: string, now?: Date): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const filePath = path.resolve(outputDir, audioFilename(text, now));
  await writeFile(filePath, bytes);
  return filePath;
}
