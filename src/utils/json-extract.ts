export interface ExtractJsonResult<T = unknown> {
  jsonText?: string;
  parsed?: T;
  error?: string;
}

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)\s*```/gi;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e) {
    return { ok: false, message: e instanceof Error ? e.message : String(e) };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find the index of the bracket closing the one at `start`, skipping over
 * string literals. Returns -1 when the text ends first.
 */
function findClosingBracket(text: string, start: number): number {
  const open = text[start];
  const close = open === '[' ? ']' : '}';
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

/**
 * Extract and parse a JSON object from text.
 * - Accepts raw JSON, a JSON code fence, or text containing a single JSON object.
 * - Returns parsed object and the exact JSON substring used.
 */
export function extractJsonObject(text: string): ExtractJsonResult<Record<string, unknown>> {
  const trimmed = (text || '').trim();
  if (!trimmed) return { error: 'Empty output' };

  const direct = tryParse(trimmed);
  if (direct.ok && isPlainObject(direct.value)) {
    return { parsed: direct.value, jsonText: trimmed };
  }

  const fence = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fence && fence[1]) {
    const candidate = fence[1].trim();
    const fenced = tryParse(candidate);
    if (fenced.ok && isPlainObject(fenced.value)) {
      return { parsed: fenced.value, jsonText: candidate };
    }
    if (!fenced.ok) {
      return { error: `Failed to parse JSON in code fence: ${fenced.message}` };
    }
  }

  // Best-effort substring extraction: first "{" .. last "}"
  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start !== -1 && end !== -1 && end > start) {
    const candidate = trimmed.slice(start, end + 1);
    const sliced = tryParse(candidate);
    if (sliced.ok && isPlainObject(sliced.value)) {
      return { parsed: sliced.value, jsonText: candidate };
    }
    return {
      error: sliced.ok
        ? 'JSON substring is not an object'
        : `Failed to parse JSON object substring: ${sliced.message}`,
    };
  }

  return { error: 'Could not locate a JSON object in output' };
}

/**
 * Extract the first well-formed JSON array from free text.
 *
 * Order of attempts: the whole text, each ```json fence in turn, then every
 * "[" in the text from left to right, bracket-matched and parsed. The judge
 * is free to wrap its answer in prose or markdown. In that scan only arrays
 * holding at least one object count, so bracketed prose like `[0]` is passed
 * over.
 */
export function extractJsonArray(text: string): ExtractJsonResult<unknown[]> {
  const trimmed = (text || '').trim();
  if (!trimmed) return { error: 'Empty output' };

  const direct = tryParse(trimmed);
  if (direct.ok && Array.isArray(direct.value)) {
    return { parsed: direct.value, jsonText: trimmed };
  }

  for (const match of trimmed.matchAll(FENCE_PATTERN)) {
    const candidate = (match[1] ?? '').trim();
    const fenced = tryParse(candidate);
    if (fenced.ok && Array.isArray(fenced.value)) {
      return { parsed: fenced.value, jsonText: candidate };
    }
  }

  let lastError: string | undefined;
  let from = trimmed.indexOf('[');
  while (from !== -1) {
    const end = findClosingBracket(trimmed, from);
    if (end !== -1) {
      const candidate = trimmed.slice(from, end + 1);
      const sliced = tryParse(candidate);
      if (sliced.ok && Array.isArray(sliced.value) && sliced.value.some(isPlainObject)) {
        return { parsed: sliced.value, jsonText: candidate };
      }
      if (!sliced.ok) lastError = sliced.message;
    }
    from = trimmed.indexOf('[', from + 1);
  }

  return {
    error: lastError
      ? `Failed to parse JSON array: ${lastError}`
      : 'Could not locate a JSON array in output',
  };
}
