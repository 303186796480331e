import { describe, it, expect, vi, afterEach } from 'vitest';
import { silentLogger } from '@pika/shared';
import { runChatLoop } from '../src/cli.js';
import { Assistant } from '../src/services/assistant.js';
import type { LLMClient } from '../src/services/openrouter-client.js';
import { TimerService } from '../src/services/timers.js';

describe('runChatLoop', () => {
    const timers = new TimerService({ callbackUrl: 'http://frontend.test/setTimer', logger: silentLogger });

    afterEach(() => {
        timers.cancelAll();
    });

    it('prints the welcome, answers each line and stops on an exit word', async () => {
        const generateText = vi.fn<LLMClient['generateText']>(async (messages) => ({
            content: messages.length === 2 && messages[1]?.content === 'hello' ? 'Meow, hello!' : 'Hi, I am Pika!',
            toolCalls: [],
            modelUsed: 'test/model',
            wasBackup: false,
        }));
        const llm: LLMClient = { model: 'test/model', backupModels: [], generateText, analyzeImage: vi.fn() };
        const assistant = new Assistant({ llm, timers, logger: silentLogger });

        const lines = ['', '  hello  ', 'QUIT', 'never read'];
        const printed: string[] = [];

        await runChatLoop(assistant, {
            prompt: async () => lines.shift() ?? null,
            print: (line) => printed.push(line),
        });

        expect(printed).toEqual(['Pika: Hi, I am Pika!', 'Assistant: Meow, hello!']);
        expect(lines).toEqual(['never read']);
        expect(assistant.isActive).toBe(false);
    });

    it('stops at end of input', async () => {
        const generateText = vi.fn<LLMClient['generateText']>(async () => ({
            content: 'Welcome!',
            toolCalls: [],
            modelUsed: 'test/model',
            wasBackup: false,
        }));
        const llm: LLMClient = { model: 'test/model', backupModels: [], generateText, analyzeImage: vi.fn() };
        const assistant = new Assistant({ llm, timers, logger: silentLogger });
        const printed: string[] = [];

        await runChatLoop(assistant, { prompt: async () => null, print: (line) => printed.push(line) });

        expect(printed).toEqual(['Pika: Welcome!']);
        expect(generateText).toHaveBeenCalledTimes(1);
    });
});
