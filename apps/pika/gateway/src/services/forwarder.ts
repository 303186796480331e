import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { isRecord, type Result } from '@pika/shared';
import type { Payload } from './payload-normalizer.js';

export interface ForwardError {
  type: 'timeout' | 'http_error' | 'network_error' | 'malformed_response';
  message: string;
  status?: number;
}

export interface ForwardRequest {
  path: string;
  body: Record<string, string>;
}

export interface ForwarderOptions {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Assistant endpoint and body for a payload. Video frames go to camera detection.
 */
export function buildForwardRequest(payload: Payload): ForwardRequest {
  switch (payload.inputType) {
    case 'screen':
      return { path: '/detectscreen', body: { image: payload.base64 } };
    case 'camera':
    case 'video':
      return { path: '/detectcamera', body: { image: payload.base64 } };
    case 'text':
      return { path: '/chat', body: { message: payload.text } };
    case 'voice':
      return { path: '/voice', body: { audio: payload.base64, format: payload.format } };
  }
}

const describeBody = (data: unknown): string => {
  if (isRecord(data) && typeof data.error === 'string') return data.error;
  if (typeof data === 'string') return data;
  return JSON.stringify(data) ?? '';
};

/**
 * Thin HTTP client relaying normalized payloads to the assistant server.
 * One attempt per call with a fixed timeout.
 */
export class AssistantForwarder {
  private client: AxiosInstance;

  constructor(private options: ForwarderOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  async forward(payload: Payload): Promise<Result<Record<string, unknown>, ForwardError>> {
    const { path, body } = buildForwardRequest(payload);

    try {
      const response = await this.client.post<unknown>(path, body);
      if (!isRecord(response.data)) {
        return { ok: false, error: { type: 'malformed_response', message: 'Assistant returned a malformed response' } };
      }
      return { ok: true, value: response.data };
    } catch (error) {
      return { ok: false, error: this.toForwardError(error) };
    }
  }

  private toForwardError(error: unknown): ForwardError {
    if (isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return { type: 'timeout', message: `Assistant request timed out after ${this.options.timeoutMs}ms` };
      }
      if (error.response) {
        const status = error.response.status;
        return {
          type: 'http_error',
          status,
          message: `Assistant responded with ${status}: ${describeBody(error.response.data)}`,
        };
      }
      return { type: 'network_error', message: `Assistant request failed: ${error.message}` };
    }
    return { type: 'network_error', message: error instanceof Error ? error.message : String(error) };
  }
}
