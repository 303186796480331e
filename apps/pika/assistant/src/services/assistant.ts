import { createLogger, type Logger } from '@pika/shared';
import { messageOf, statusOf } from '../errors.js';
import {
  EMPTY_REPLY,
  FALLBACK_WELCOME,
  GOODBYE,
  INACTIVE_REPLY,
  SYSTEM_PROMPT,
  WELCOME_INSTRUCTION,
} from '../prompts.js';
import type { ChatMessage, Completion, GenerateOptions, LLMClient, ToolCall } from './openrouter-client.js';
import { detectTimerRequest, mentionsTimer } from './timer-intent.js';
import { SET_TIMER, createTimerTool, type TimerTool, type TimerToolResult } from './timer-tool.js';
import type { TimerService } from './timers.js';

const TOOL_KEYWORDS = ['set a timer', 'set timer'];

const CHAT_OPTIONS = { temperature: 0.85, maxTokens: 300 } satisfies GenerateOptions;

export interface AssistantOptions {
  llm: LLMClient;
  timers: TimerService;
  logger?: Logger;
  /** Start timers locally, without a provider call, when the message names a duration. */
  timerShortcut?: boolean;
  systemPrompt?: string;
}

export interface AssistantReply {
  content: string;
  /** Id of the timer started while handling this message. */
  timerId?: string;
  /** Provider failure behind an apology reply. */
  error?: string;
}

/**
 * Conversational dispatcher: keeps the single in-memory conversation,
 * attaches the timer tool when the message looks timer-related and runs
 * at most one tool round before the final reply.
 */
export class Assistant {
  private llm: LLMClient;
  private timers: TimerService;
  private timerTool: TimerTool;
  private logger: Logger;
  private timerShortcut: boolean;
  private systemPrompt: string;
  private conversation: ChatMessage[] = [];
  private active = false;

  constructor(options: AssistantOptions) {
    this.llm = options.llm;
    this.timers = options.timers;
    this.timerTool = createTimerTool(options.timers);
    this.logger = options.logger ?? createLogger('Assistant');
    this.timerShortcut = options.timerShortcut ?? false;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
  }

  get isActive(): boolean {
    return this.active;
  }

  get history(): readonly ChatMessage[] {
    return [...this.conversation];
  }

  get llmClient(): LLMClient {
    return this.llm;
  }

  async start(): Promise<string> {
    this.active = true;
    const welcome = await this.generateWelcome();
    this.logger.info(`Pika: ${welcome}`);
    return welcome;
  }

  stop(): void {
    this.active = false;
    this.conversation = [];
    this.logger.info(`Pika: ${GOODBYE}`);
  }

  async reset(): Promise<string> {
    this.stop();
    return this.start();
  }

  async generateWelcome(): Promise<string> {
    try {
      const completion = await this.llm.generateText(
        [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: WELCOME_INSTRUCTION },
        ],
        { temperature: 0.9, maxTokens: 150 }
      );
      return completion.content.trim() || FALLBACK_WELCOME;
    } catch (error) {
      this.logger.warn(`Welcome generation failed, using fallback: ${messageOf(error)}`);
      return FALLBACK_WELCOME;
    }
  }

  buildMessages(): ChatMessage[] {
    return [{ role: 'system', content: this.systemPrompt }, ...this.conversation];
  }

  async processUserInput(text: string): Promise<AssistantReply> {
    if (!this.active) {
      return { content: INACTIVE_REPLY };
    }

    if (this.timerShortcut) {
      const duration = detectTimerRequest(text);
      if (duration) {
        const handle = this.timers.start(duration);
        return { content: `Timer set for ${duration.formatted}!`, timerId: handle.id };
      }
    }

    this.conversation.push({ role: 'user', content: text });
    const messages = this.buildMessages();
    const withTools = mentionsTimer(text, TOOL_KEYWORDS);

    try {
      const response = await this.complete(messages, withTools);

      if (response.toolCalls.length === 0) {
        const content = response.content || EMPTY_REPLY;
        this.conversation.push({ role: 'assistant', content });
        return { content };
      }

      const assistantMessage: ChatMessage = {
        role: 'assistant',
        content: response.content,
        tool_calls: response.toolCalls,
      };
      this.conversation.push(assistantMessage);

      let timerId: string | undefined;
      const toolMessages: ChatMessage[] = response.toolCalls.map((call) => {
        const result = this.runTool(call);
        if (result.success) timerId = result.timer_id;
        return { role: 'tool', tool_call_id: call.id, content: JSON.stringify(result) };
      });
      this.conversation.push(...toolMessages);

      const final = await this.llm.generateText([...messages, assistantMessage, ...toolMessages], CHAT_OPTIONS);
      this.conversation.push({ role: 'assistant', content: final.content });
      return { content: final.content, timerId };
    } catch (error) {
      this.logger.error('Failed to process user input', error);
      const reason = messageOf(error).replace(/\.+$/, '');
      return { content: `Oh no! Something went wrong: ${reason}. Let's try again!`, error: reason };
    }
  }

  private async complete(messages: ChatMessage[], withTools: boolean): Promise<Completion> {
    if (!withTools) {
      return this.llm.generateText(messages, CHAT_OPTIONS);
    }

    try {
      return await this.llm.generateText(messages, {
        ...CHAT_OPTIONS,
        tools: [this.timerTool.definition],
        toolChoice: 'auto',
      });
    } catch (error) {
      if (statusOf(error) !== 400) throw error;
      this.logger.warn(`Tool calling failed, retrying without tools: ${messageOf(error)}`);
      return this.llm.generateText(messages, CHAT_OPTIONS);
    }
  }

  private runTool(call: ToolCall): TimerToolResult {
    const name = call.function.name;
    if (name !== SET_TIMER) {
      return { success: false, error: `Unknown tool: ${name}` };
    }

    let args: unknown;
    try {
      args = JSON.parse(call.function.arguments);
    } catch (error) {
      return { success: false, error: `Invalid tool arguments: ${messageOf(error)}` };
    }

    try {
      return this.timerTool.execute(args);
    } catch (error) {
      return { success: false, error: messageOf(error) };
    }
  }
}
