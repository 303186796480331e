import { isRecord, stripDataUrl, type InputType, type Result } from '@pika/shared';

interface MediaFields {
  base64: string;
  bytes: Buffer;
  mimeType?: string;
  filename?: string;
}

export type Payload =
  | ({ inputType: 'screen' | 'camera' | 'video' } & MediaFields)
  | ({ inputType: 'voice'; format: string } & MediaFields)
  | { inputType: 'text'; text: string };

export type PayloadSource =
  | { kind: 'multipart'; fields: Record<string, unknown> }
  | { kind: 'json'; body: unknown };

export interface ValidationError {
  type: 'validation_error';
  message: string;
}

export const ACCEPTED_KEYS: Record<InputType, readonly string[]> = {
  screen: ['screen', 'image'],
  camera: ['camera', 'image'],
  video: ['video', 'frame', 'image'],
  text: ['text', 'message'],
  voice: ['audio'],
};

const DEFAULT_AUDIO_FORMAT = 'audio/webm';
const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

type RawValue = { kind: 'string'; key: string; value: string } | { kind: 'file'; key: string; file: Blob };

const fileName = (file: Blob): string | undefined =>
  'name' in file && typeof file.name === 'string' && file.name !== '' ? file.name : undefined;

const invalid = (message: string): { ok: false; error: ValidationError } => ({
  ok: false,
  error: { type: 'validation_error', message },
});

export const decodeBase64 = (value: string): Buffer => Buffer.from(value, 'base64');

/**
 * Removes whitespace and checks the base64 alphabet (standard or URL-safe).
 * Returns null when the value is not base64.
 */
export function cleanBase64(value: string): string | null {
  const compact = value.replace(/\s+/g, '');
  return BASE64_PATTERN.test(compact) ? compact : null;
}

function pickValue(inputType: InputType, source: PayloadSource): RawValue | null {
  const keys = ACCEPTED_KEYS[inputType];

  if (source.kind === 'json') {
    if (!isRecord(source.body)) return null;
    for (const key of keys) {
      const value = source.body[key];
      if (typeof value === 'string' && value.trim() !== '') return { kind: 'string', key, value };
    }
    return null;
  }

  for (const key of ['file', ...keys]) {
    const entry = source.fields[key];
    const value: unknown = Array.isArray(entry) ? entry[0] : entry;
    if (value instanceof Blob && value.size > 0) return { kind: 'file', key, file: value };
    if (typeof value === 'string' && value.trim() !== '' && key !== 'file') return { kind: 'string', key, value };
  }
  return null;
}

function readFormat(source: PayloadSource): string | undefined {
  const raw = source.kind === 'json' ? (isRecord(source.body) ? source.body.format : undefined) : source.fields.format;
  return typeof raw === 'string' && raw.trim() !== '' ? raw.trim() : undefined;
}

async function readMedia(raw: RawValue): Promise<Result<MediaFields, ValidationError>> {
  if (raw.kind === 'file') {
    const bytes = Buffer.from(await raw.file.arrayBuffer());
    return {
      ok: true,
      value: {
        base64: bytes.toString('base64'),
        bytes,
        mimeType: raw.file.type || undefined,
        filename: fileName(raw.file),
      },
    };
  }

  const { base64, mimeType } = stripDataUrl(raw.value.trim());
  const cleaned = cleanBase64(base64);
  if (cleaned === null) return invalid(`Field "${raw.key}" is not valid base64`);
  return { ok: true, value: { base64: cleaned, bytes: decodeBase64(cleaned), mimeType } };
}

/**
 * Turns a multipart form or JSON body into a typed payload for one input type.
 * Never throws for bad input; returns a validation error naming the accepted keys.
 */
export async function normalizePayload(
  inputType: InputType,
  source: PayloadSource
): Promise<Result<Payload, ValidationError>> {
  const raw = pickValue(inputType, source);
  if (!raw) {
    const keys = ACCEPTED_KEYS[inputType];
    const accepted = source.kind === 'multipart' ? ['file', ...keys] : keys;
    return invalid(`No ${inputType} data provided. Expected one of: ${accepted.join(', ')}`);
  }

  if (inputType === 'text') {
    const text = raw.kind === 'file' ? (await raw.file.text()).trim() : raw.value.trim();
    if (text === '') return invalid('No text data provided. Expected one of: text, message');
    return { ok: true, value: { inputType, text } };
  }

  const media = await readMedia(raw);
  if (!media.ok) return media;

  if (inputType === 'voice') {
    const format = readFormat(source) ?? media.value.mimeType ?? DEFAULT_AUDIO_FORMAT;
    return { ok: true, value: { inputType, format, ...media.value } };
  }
  return { ok: true, value: { inputType, ...media.value } };
}
