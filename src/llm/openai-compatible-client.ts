// OpenAI-compatible chat completions client (OpenAI, Anthropic's compatible
// endpoint, Ollama)

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { ChatClient, ChatCompletionResponse, ChatMessage, JudgeConfig } from './types.js';

// Retry configuration
const MAX_RETRIES = 3;
const INITIAL_RETRY_DELAY_MS = 1000;
const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

const completionSchema = z.object({
  id: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

async function fetchWithRetry(
  fetchFn: FetchFn,
  url: string,
  options: RequestInit,
  maxRetries: number = MAX_RETRIES
): Promise<Response> {
  let lastError: Error | null = null;
  let delay = INITIAL_RETRY_DELAY_MS;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const response = await fetchFn(url, options);

      if (!response.ok && RETRYABLE_STATUS_CODES.includes(response.status) && attempt < maxRetries) {
        const retryAfter = Number.parseInt(response.headers.get('Retry-After') ?? '', 10);
        const waitTime = Number.isFinite(retryAfter) ? retryAfter * 1000 : delay;
        logger.warn(`Judge API returned ${response.status}, retrying in ${waitTime}ms...`);
        await sleep(waitTime);
        delay *= 2; // Exponential backoff
        continue;
      }

      return response;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      // A timed-out call is not retried: the timeout is the caller's budget
      if (lastError.name === 'TimeoutError' || lastError.name === 'AbortError') {
        break;
      }

      if (attempt < maxRetries) {
        logger.warn(`Network error, retrying in ${delay}ms...`);
        await sleep(delay);
        delay *= 2;
        continue;
      }
    }
  }

  throw lastError || new Error('Request failed after retries');
}

export class OpenAICompatibleClient implements ChatClient {
  constructor(
    private readonly config: JudgeConfig,
    private readonly providerName: string = 'OpenAI-compatible',
    private readonly fetchFn: FetchFn = fetch
  ) {}

  private get chatEndpoint(): string {
    const base = this.config.endpoint.replace(/\/$/, '');
    return `${base}/chat/completions`;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };

    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    return headers;
  }

  async chat(messages: ChatMessage[]): Promise<ChatCompletionResponse> {
    const body = {
      model: this.config.model,
      messages,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      stream: false,
    };

    const response = await fetchWithRetry(this.fetchFn, this.chatEndpoint, {
      method: 'POST',
      headers: this.getHeaders(),
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw this.createApiError(response.status, errorText);
    }

    return this.parseResponse(await response.json());
  }

  private parseResponse(data: unknown): ChatCompletionResponse {
    const parsed = completionSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Invalid ${this.providerName} response: missing choices array`);
    }

    const [first] = parsed.data.choices;
    const usage = parsed.data.usage;
    return {
      id: parsed.data.id ?? 'unknown',
      content: first.message?.content ?? '',
      finishReason: first.finish_reason ?? 'stop',
      usage: usage
        ? {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
    };
  }

  private createApiError(status: number, errorText: string): Error {
    let message = `${this.providerName} API error (${status})`;

    try {
      const errorData: unknown = JSON.parse(errorText);
      const detail = z.object({ error: z.object({ message: z.string() }) }).safeParse(errorData);
      message = detail.success ? `${message}: ${detail.data.error.message}` : `${message}: ${errorText}`;
    } catch {
      message = `${message}: ${errorText}`;
    }

    if (status === 401) {
      message += '\n\nHint: Check your API key configuration.';
    } else if (status === 404) {
      message += '\n\nHint: Check the endpoint URL and model name.';
    } else if (status === 429) {
      message += '\n\nHint: Rate limit exceeded. Wait a moment before retrying.';
    }

    return new Error(message);
  }
}
