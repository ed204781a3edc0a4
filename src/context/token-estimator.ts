// Token estimation utility
// Approximate token counts used as the size of every candidate

// ~4 characters per token across mixed prose and code
export const CHARS_PER_TOKEN = 4;

/**
 * Estimate the token cost of a piece of text. Pure function of its length.
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

export function estimateTotalTokens(texts: Iterable<string>): number {
  let total = 0;
  for (const text of texts) {
    total += estimateTokens(text);
  }
  return total;
}
