/**
 * Interactive terminal mode for the assistant
 */

import 'dotenv/config';
import { stdin as input, stdout as output } from 'node:process';
import { createInterface } from 'node:readline/promises';
import { createLogger } from '@pika/shared';
import { loadConfig } from './config.js';
import { createServices } from './container.js';
import type { Assistant } from './services/assistant.js';

const log = createLogger('CLI');

const EXIT_WORDS = new Set(['quit', 'exit', 'stop']);

export interface ChatLoopIO {
  prompt(): Promise<string | null>;
  print(line: string): void;
}

/**
 * Runs the conversation until an exit word or end of input.
 */
export async function runChatLoop(assistant: Assistant, io: ChatLoopIO): Promise<void> {
  io.print(`Pika: ${await assistant.start()}`);

  for (;;) {
    const line = await io.prompt();
    if (line === null) break;

    const text = line.trim();
    if (!text) continue;
    if (EXIT_WORDS.has(text.toLowerCase())) break;

    const reply = await assistant.processUserInput(text);
    io.print(`Assistant: ${reply.content}`);
  }

  assistant.stop();
}

async function main(): Promise<void> {
  const deps = createServices(loadConfig());
  const rl = createInterface({ input, output });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });
  rl.on('SIGINT', () => rl.close());

  try {
    await runChatLoop(deps.assistant, {
      prompt: async () => {
        if (closed) return null;
        try {
          return await rl.question('You: ');
        } catch (error) {
          if (closed) return null;
          throw error;
        }
      },
      print: (line) => output.write(`${line}\n`),
    });
  } finally {
    deps.timers.cancelAll();
    rl.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    log.error('Fatal error:', error);
    process.exitCode = 1;
  });
}
