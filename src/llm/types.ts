// Judge client type definitions

export type JudgeProvider = 'openai' | 'anthropic' | 'ollama';

export const JUDGE_PROVIDERS: readonly JudgeProvider[] = ['openai', 'anthropic', 'ollama'];

export interface JudgeConfig {
  provider: JudgeProvider;
  endpoint: string;
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  /** Per-call timeout; a call that exceeds it fails */
  timeoutMs: number;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionResponse {
  id: string;
  content: string;
  finishReason: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface ChatClient {
  chat(messages: ChatMessage[]): Promise<ChatCompletionResponse>;
}

/**
 * The external text-in/text-out service that scores candidates and infers
 * goals. Model and provider are the caller's business.
 */
export type Judge = (prompt: string) => Promise<string>;
