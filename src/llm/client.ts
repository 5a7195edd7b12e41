import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';

import { OptimizationError, messageOf } from '../errors';

type ChatCompletionResult = {
  choices: Array<{ message: { content: string | null } }>;
};

/** The slice of the OpenAI SDK the invoker talks to. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletionResult>;
    };
  };
}

export interface ModelInvoker {
  invoke(prompt: string): Promise<string>;
}

type ModelInvokerOptions = {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  maxTokens?: number;
  temperature?: number;
  client?: ChatCompletionsClient;
};

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
const OPENROUTER_MODEL = 'mistralai/mistral-small-3.2-24b-instruct:free';

const REJECTED_STATUSES = new Set([400, 401, 403, 404, 422]);

const getStatus = (error: unknown): number | undefined => {
  if (error && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
};

export const classifyProviderError = (error: unknown): OptimizationError => {
  if (error instanceof OptimizationError) {
    return error;
  }

  const detail = messageOf(error);

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new OptimizationError('ProviderTimeout', `Model request timed out: ${detail}`, { cause: error });
  }

  const status = getStatus(error);

  if (status === 429) {
    return new OptimizationError('ProviderThrottled', `Model provider is rate limiting: ${detail}`, { cause: error });
  }

  if (status === 408) {
    return new OptimizationError('ProviderTimeout', `Model request timed out: ${detail}`, { cause: error });
  }

  if (typeof status === 'number' && REJECTED_STATUSES.has(status)) {
    return new OptimizationError(
      'ProviderRejected',
      `Model provider rejected the request (status ${status}): ${detail}`,
      { cause: error },
    );
  }

  const prefix = typeof status === 'number' ? `status ${status}: ` : '';
  return new OptimizationError('ProviderUnavailable', `Model provider unavailable (${prefix}${detail})`, {
    cause: error,
  });
};

export class OpenRouterModelInvoker implements ModelInvoker {
  private client: ChatCompletionsClient | null;

  private readonly apiKey?: string;

  private readonly baseUrl: string;

  private readonly model: string;

  private readonly timeoutMs: number;

  private readonly maxTokens: number;

  private readonly temperature: number;

  constructor(options: ModelInvokerOptions = {}) {
    this.client = options.client ?? null;
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? OPENROUTER_BASE_URL;
    this.model = options.model ?? OPENROUTER_MODEL;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.maxTokens = options.maxTokens ?? 4000;
    this.temperature = options.temperature ?? 0.3;
  }

  private getClient(): ChatCompletionsClient {
    if (this.client) {
      return this.client;
    }

    if (!this.apiKey) {
      throw new OptimizationError(
        'ProviderRejected',
        'LLM API key not configured. Set OPENAI_API_KEY to your OpenRouter token.',
      );
    }

    // Retries are owned by the pipeline, never by the SDK.
    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });

    return this.client;
  }

  async invoke(prompt: string): Promise<string> {
    const client = this.getClient();
    const startedAt = Date.now();

    let response: ChatCompletionResult;

    try {
      response = await client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (error) {
      const classified = classifyProviderError(error);
      console.warn(`[LLM] ${this.model} failed after ${Date.now() - startedAt}ms: ${classified.kind}`);
      throw classified;
    }

    const content = response.choices[0]?.message?.content;

    if (!content || !content.trim()) {
      throw new OptimizationError('MalformedModelOutput', 'LLM response did not contain any content.');
    }

    console.info(`[LLM] ${this.model} replied with ${content.length} chars in ${Date.now() - startedAt}ms`);

    return content;
  }
}
