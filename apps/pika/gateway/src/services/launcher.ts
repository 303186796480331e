import { spawn, type SpawnOptions } from 'node:child_process';
import { createLogger, type Logger } from '@pika/shared';

export interface LaunchedProcess {
  pid?: number;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => LaunchedProcess;

export interface LauncherOptions {
  command: string;
  spawn?: SpawnFn;
  logger?: Logger;
}

/**
 * Starts the assistant server as a child process of the gateway.
 */
export class AssistantLauncher {
  private child?: LaunchedProcess;
  private spawnFn: SpawnFn;
  private log: Logger;

  constructor(private options: LauncherOptions) {
    this.spawnFn = options.spawn ?? spawn;
    this.log = options.logger ?? createLogger('Launcher');
  }

  get running(): boolean {
    return this.child !== undefined;
  }

  start(): LaunchedProcess {
    if (this.child) return this.child;

    this.log.info(`Starting assistant: ${this.options.command}`);
    const child = this.spawnFn('sh', ['-c', this.options.command], { stdio: 'inherit', env: process.env });
    child.on('exit', (code, signal) => {
      if (signal) this.log.info(`Assistant stopped by ${signal}`);
      else if (code === 0) this.log.info('Assistant exited');
      else this.log.error(`Assistant exited with code ${code}`);
      if (this.child === child) this.child = undefined;
    });
    child.on('error', (error) => {
      this.log.error(`Assistant process failed: ${error.message}`);
      if (this.child === child) this.child = undefined;
    });
    this.child = child;
    return child;
  }

  stop(): boolean {
    if (!this.child) return false;
    const sent = this.child.kill('SIGTERM');
    this.child = undefined;
    return sent;
  }
}
