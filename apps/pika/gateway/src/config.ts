import os from 'node:os';
import path from 'node:path';

export interface GatewayConfig {
  assistantUrl: string;
  forwardTimeoutMs: number;
  captureDir: string;
  autostart: boolean;
  assistantCommand: string;
  captureIntervalMs: number;
  port: number;
}

const parseInteger = (name: string, raw: string | undefined, fallback: number, max = Number.MAX_SAFE_INTEGER): number => {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be an integer >= 1 (got "${raw}")`);
  }
  if (value > max) {
    throw new Error(`${name} must be <= ${max} (got ${value})`);
  }
  return value;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  return {
    assistantUrl: (env.ASSISTANT_URL?.trim() || 'http://localhost:5000').replace(/\/+$/, ''),
    forwardTimeoutMs: parseInteger('FORWARD_TIMEOUT_MS', env.FORWARD_TIMEOUT_MS, 60_000),
    captureDir: env.CAPTURE_DIR?.trim() || path.join(os.tmpdir(), 'pika-captures'),
    autostart: env.ASSISTANT_AUTOSTART === 'true',
    assistantCommand: env.ASSISTANT_COMMAND?.trim() || 'npm run start --workspace @pika/assistant',
    captureIntervalMs: parseInteger('CAPTURE_INTERVAL_MS', env.CAPTURE_INTERVAL_MS, 5000),
    port: parseInteger('PORT', env.PORT, 3000, 65535),
  };
}
