// Agent hook input - the prompt an agent hands to `prime --format hook` on stdin

import { extractJsonObject } from '../utils/json-extract.js';

export type HookInput = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Everything on `stream` as UTF-8 text. An interactive terminal has no hook
 * payload and reads as empty.
 */
export async function readHookInput(stream: HookInput): Promise<string> {
  if (stream.isTTY) return '';

  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
  }
  return chunks.join('');
}

/**
 * The submitted prompt in a hook payload (`user_prompt`, or `prompt`), or
 * `undefined` when there is none.
 */
export function taskFromHookInput(input: string): string | undefined {
  const payload = extractJsonObject(input).parsed;
  if (!payload) return undefined;

  for (const field of ['user_prompt', 'prompt']) {
    const value = payload[field];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return undefined;
}
