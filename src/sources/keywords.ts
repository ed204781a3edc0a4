// Keyword extraction for heuristic file search (no judge call)

export const DEFAULT_MAX_KEYWORDS = 10;

/**
 * English function words plus the imperative verbs task descriptions open
 * with. Neither narrows a file search.
 */
export const TASK_STOP_WORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'the', 'is', 'are', 'was', 'were', 'be', 'been', 'being',
  'have', 'has', 'had', 'do', 'does', 'did', 'will', 'would', 'could',
  'should', 'may', 'might', 'shall', 'can', 'need', 'must',
  'i', 'me', 'my', 'we', 'our', 'you', 'your', 'he', 'she', 'it',
  'they', 'them', 'this', 'that', 'these', 'those',
  'and', 'but', 'or', 'nor', 'not', 'so', 'yet', 'both',
  'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by', 'from',
  'up', 'out', 'if', 'then', 'than', 'too', 'very',
  'just', 'about', 'also', 'all', 'any', 'each', 'every',
  'how', 'what', 'when', 'where', 'which', 'who', 'why',
  'add', 'fix', 'update', 'change', 'modify', 'create', 'make',
  'implement', 'write', 'build', 'improve', 'refactor', 'remove',
  'delete', 'get', 'set', 'use', 'new', 'old',
]);

export interface KeywordOptions {
  maxKeywords?: number;
  stopWords?: ReadonlySet<string>;
}

const TOKEN_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/g;

/**
 * Turn a task description into at most `maxKeywords` search terms, in order
 * of first appearance. An empty result means no heuristic ranking is
 * possible; it is not an error.
 */
export function extractKeywords(task: string, options: KeywordOptions = {}): string[] {
  const maxKeywords = options.maxKeywords ?? DEFAULT_MAX_KEYWORDS;
  const stopWords = options.stopWords ?? TASK_STOP_WORDS;
  const seen = new Set<string>();
  const keywords: string[] = [];

  for (const match of task.matchAll(TOKEN_PATTERN)) {
    const word = match[0].toLowerCase();
    if (word.length < 2 || stopWords.has(word) || seen.has(word)) {
      continue;
    }
    seen.add(word);
    keywords.push(word);
    if (keywords.length >= maxKeywords) break;
  }

  return keywords;
}
