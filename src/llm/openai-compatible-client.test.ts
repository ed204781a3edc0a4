import { HandledError } from '../utils/error-handler.js';
import { OpenAICompatibleClient } from './openai-compatible-client.js';
import type { FetchFn } from './openai-compatible-client.js';
import { createChatClient, createJudge } from './provider-factory.js';
import type { JudgeConfig } from './types.js';

const config: JudgeConfig = {
  provider: 'openai',
  endpoint: 'http://judge.test/v1/',
  apiKey: 'test-secret',
  model: 'test-model',
  maxTokens: 256,
  temperature: 0,
  timeoutMs: 5_000,
};

interface RecordedCall {
  url: string;
  init: RequestInit;
}

function jsonResponse(body: unknown, status: number = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function completion(content: string): unknown {
  return {
    id: 'cmpl-1',
    choices: [{ message: { role: 'assistant', content }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
  };
}

function scriptedFetch(responses: Response[], calls: RecordedCall[]): FetchFn {
  return async (url, init) => {
    calls.push({ url, init });
    const next = responses.shift();
    if (!next) throw new Error('no more responses');
    return next;
  };
}

describe('OpenAICompatibleClient', () => {
  it('posts a chat completion request and maps the response', async () => {
    const calls: RecordedCall[] = [];
    const client = new OpenAICompatibleClient(config, 'Test', scriptedFetch([jsonResponse(completion('[]'))], calls));

    const response = await client.chat([{ role: 'user', content: 'score these' }]);

    expect(response).toEqual({
      id: 'cmpl-1',
      content: '[]',
      finishReason: 'stop',
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('http://judge.test/v1/chat/completions');
    expect(calls[0].init.method).toBe('POST');
    expect(calls[0].init.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(JSON.parse(String(calls[0].init.body))).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'score these' }],
      max_tokens: 256,
      temperature: 0,
      stream: false,
    });
  });

  it('retries a retryable status', async () => {
    const calls: RecordedCall[] = [];
    const fetchFn = scriptedFetch(
      [jsonResponse({ error: { message: 'busy' } }, 503, { 'Retry-After': '0' }), jsonResponse(completion('ok'))],
      calls
    );

    const response = await new OpenAICompatibleClient(config, 'Test', fetchFn).chat([{ role: 'user', content: 'hi' }]);

    expect(response.content).toBe('ok');
    expect(calls).toHaveLength(2);
  });

  it('reports API errors with a hint', async () => {
    const calls: RecordedCall[] = [];
    const fetchFn = scriptedFetch([jsonResponse({ error: { message: 'Invalid API key' } }, 401)], calls);

    await expect(new OpenAICompatibleClient(config, 'Test', fetchFn).chat([])).rejects.toThrow(
      'Test API error (401): Invalid API key\n\nHint: Check your API key configuration.'
    );
    expect(calls).toHaveLength(1);
  });

  it('rejects a response without choices', async () => {
    const fetchFn = scriptedFetch([jsonResponse({ id: 'x', choices: [] })], []);

    await expect(new OpenAICompatibleClient(config, 'Test', fetchFn).chat([])).rejects.toThrow(
      'Invalid Test response: missing choices array'
    );
  });
});

describe('provider factory', () => {
  it('requires an API key for hosted providers', () => {
    expect(() => createChatClient({ ...config, apiKey: undefined })).toThrow(HandledError);
  });

  it('lets a local provider run without a key', () => {
    expect(() => createChatClient({ ...config, provider: 'ollama', apiKey: undefined })).not.toThrow();
  });

  it('turns a chat client into a single-turn judge', async () => {
    const calls: RecordedCall[] = [];
    const judge = createJudge(config, scriptedFetch([jsonResponse(completion('{"immediate": "x"}'))], calls));

    expect(await judge('infer the goal')).toBe('{"immediate": "x"}');
    expect(JSON.parse(String(calls[0].init.body)).messages).toEqual([{ role: 'user', content: 'infer the goal' }]);
  });
});
