import OpenAI from 'openai';
import { createLogger, type Logger } from '@pika/shared';
import { ProviderError, messageOf, statusOf } from '../errors.js';

export type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;
export type ChatTool = OpenAI.Chat.ChatCompletionTool;
export type ToolCall = OpenAI.Chat.ChatCompletionMessageToolCall;
export type ToolChoice = OpenAI.Chat.ChatCompletionToolChoiceOption;

type CompletionParams = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
  tools?: ChatTool[];
  toolChoice?: ToolChoice;
  useBackup?: boolean;
}

export interface AnalyzeImageOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  useBackup?: boolean;
}

export interface Completion {
  content: string;
  toolCalls: ToolCall[];
  modelUsed: string;
  wasBackup: boolean;
}

export interface OpenRouterClientOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  backupModels?: string[];
  visionModel?: string;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * The surface the assistant and the vision analyzer depend on.
 */
export interface LLMClient {
  readonly model: string;
  readonly backupModels: string[];
  generateText(messages: ChatMessage[], options?: GenerateOptions): Promise<Completion>;
  analyzeImage(imageBase64: string, prompt: string, options?: AnalyzeImageOptions): Promise<Completion>;
}

const VISION_KEYWORDS = ['gpt-4', 'claude-3', 'gemini', 'vision'];

/**
 * OpenRouter client with backup model support.
 *
 * Talks to the OpenAI-compatible chat completions endpoint. Each model gets a
 * single attempt with a fixed timeout; on any failure the next backup model is
 * tried, and when every model fails a ProviderError carrying the last error is
 * thrown.
 */
export class OpenRouterClient implements LLMClient {
  private client: OpenAI;
  private primaryModel: string;
  private backups: string[];
  private visionModel: string;
  private logger: Logger;

  constructor(options: OpenRouterClientOptions) {
    if (!options.apiKey) {
      throw new Error('OpenRouter API key is required. Set OPENROUTER_API_KEY.');
    }
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl ?? 'https://openrouter.ai/api/v1',
      timeout: options.timeoutMs ?? 60_000,
      maxRetries: 0,
      defaultHeaders: {
        'HTTP-Referer': 'http://localhost',
        'X-Title': 'Pika Study Companion',
      },
    });
    this.primaryModel = options.model ?? 'openai/gpt-3.5-turbo';
    this.backups = options.backupModels ?? [];
    this.visionModel = options.visionModel ?? 'openai/gpt-4-turbo';
    this.logger = options.logger ?? createLogger('OpenRouter');
  }

  get model(): string {
    return this.primaryModel;
  }

  get backupModels(): string[] {
    return [...this.backups];
  }

  changeModel(model: string): void {
    this.primaryModel = model;
  }

  setBackupModels(models: string[]): void {
    this.backups = [...models];
  }

  async generateText(messages: ChatMessage[], options: GenerateOptions = {}): Promise<Completion> {
    const base = {
      messages,
      temperature: options.temperature ?? 0.7,
      max_tokens: options.maxTokens ?? 500,
    };
    const tools = options.tools && options.tools.length > 0
      ? { tools: options.tools, tool_choice: options.toolChoice ?? 'auto' }
      : {};

    const models = [this.primaryModel];
    if (options.useBackup !== false) models.push(...this.backups);

    return this.tryModels(models, (model) => ({ model, ...base, ...tools }), 'Model');
  }

  async analyzeImage(imageBase64: string, prompt: string, options: AnalyzeImageOptions = {}): Promise<Completion> {
    let image = imageBase64;
    if (image.startsWith('data:image')) {
      image = image.split(',')[1] ?? '';
    }

    const messages: ChatMessage[] = [
      {
        role: 'user',
        content: [
          { type: 'text', text: prompt },
          { type: 'image_url', image_url: { url: `data:image/jpeg;base64,${image}` } },
        ],
      },
    ];

    const models = [options.model ?? this.visionModel];
    if (options.useBackup !== false) {
      models.push(
        ...this.backups.filter((m) => VISION_KEYWORDS.some((keyword) => m.toLowerCase().includes(keyword)))
      );
    }

    return this.tryModels(
      models,
      (model) => ({
        model,
        messages,
        temperature: options.temperature ?? 0.7,
        max_tokens: options.maxTokens ?? 1000,
      }),
      'Vision model'
    );
  }

  async listModels(): Promise<string[]> {
    try {
      const page = await this.client.models.list();
      return page.data.map((m) => m.id);
    } catch (error) {
      throw new ProviderError('openrouter', `Error fetching models: ${messageOf(error)}`, {
        status: statusOf(error),
        cause: error,
      });
    }
  }

  private async tryModels(
    models: string[],
    buildParams: (model: string) => CompletionParams,
    label: string
  ): Promise<Completion> {
    let lastError: unknown;

    for (const [index, model] of models.entries()) {
      try {
        const completion = await this.client.chat.completions.create(buildParams(model));
        const choice = completion.choices[0];
        if (!choice) {
          throw new ProviderError('openrouter', 'Provider returned no choices');
        }
        if (index > 0) {
          this.logger.info(`Using backup model: ${model} (primary model unavailable)`);
        }
        return {
          content: choice.message.content ?? '',
          toolCalls: choice.message.tool_calls ?? [],
          modelUsed: model,
          wasBackup: index > 0,
        };
      } catch (error) {
        lastError = error;
        if (index < models.length - 1) {
          this.logger.warn(`${label} ${model} failed: ${messageOf(error)}. Trying backup...`);
        }
      }
    }

    throw new ProviderError('openrouter', `All models failed. Last error: ${messageOf(lastError)}`, {
      status: statusOf(lastError),
      cause: lastError,
    });
  }
}
