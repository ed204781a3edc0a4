// Judge factory - turns configuration into a text-in/text-out judge

import { HandledError } from '../utils/error-handler.js';
import { OpenAICompatibleClient } from './openai-compatible-client.js';
import type { FetchFn } from './openai-compatible-client.js';
import type { ChatClient, Judge, JudgeConfig, JudgeProvider } from './types.js';

// Default configurations for each provider
export const PROVIDER_DEFAULTS: Record<JudgeProvider, { endpoint: string; model: string; label: string }> = {
  openai: {
    endpoint: 'https://api.openai.com/v1',
    model: 'gpt-4o',
    label: 'OpenAI',
  },
  anthropic: {
    endpoint: 'https://api.anthropic.com/v1',
    model: 'claude-sonnet-4-5',
    label: 'Anthropic',
  },
  ollama: {
    endpoint: 'http://localhost:11434/v1',
    model: 'qwen2.5-coder:7b',
    label: 'Ollama',
  },
};

export function createChatClient(config: JudgeConfig, fetchFn?: FetchFn): ChatClient {
  const label = PROVIDER_DEFAULTS[config.provider].label;

  if (config.provider !== 'ollama' && !config.apiKey) {
    throw new HandledError(
      `API key is required for the ${label} judge. Set JUDGE_API_KEY or judge.apiKey in config.`,
      'judge'
    );
  }

  return new OpenAICompatibleClient(config, label, fetchFn);
}

/**
 * Wrap a chat client as a single-turn judge.
 */
export function judgeFromClient(client: ChatClient): Judge {
  return async (prompt: string) => {
    const response = await client.chat([{ role: 'user', content: prompt }]);
    return response.content;
  };
}

export function createJudge(config: JudgeConfig, fetchFn?: FetchFn): Judge {
  return judgeFromClient(createChatClient(config, fetchFn));
}
