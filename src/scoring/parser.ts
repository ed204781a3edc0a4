// Score parsing - judge free text to one ScoredCandidate per pool member

import { z } from 'zod';
import { extractJsonArray } from '../utils/json-extract.js';
import { logger } from '../utils/logger.js';
import type { Candidate, ScoredCandidate } from '../sources/types.js';

/** Every candidate's score when the response holds no usable array. */
export const FAIL_CLOSED_SCORE = 0.2;
/** Score of a candidate the judge left out of its array. */
export const UNSCORED_SCORE = 0.3;
/** Score of an entry that names a candidate but carries no usable score. */
export const DEFAULT_ENTRY_SCORE = 0.5;

export const FAIL_CLOSED_RATIONALE = 'Scoring parse failed (fail-closed)';
export const UNSCORED_RATIONALE = 'Not scored';

const judgeEntrySchema = z.object({
  index: z.number().int(),
  score: z.unknown().optional(),
  reasoning: z.unknown().optional(),
  rationale: z.unknown().optional(),
});

type JudgeEntry = z.infer<typeof judgeEntrySchema>;

export function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}

function entryScore(raw: unknown): number {
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value === 'number' && Number.isFinite(value)) {
    return clampScore(value);
  }
  return DEFAULT_ENTRY_SCORE;
}

function entryRationale(entry: JudgeEntry): string {
  const text = entry.reasoning ?? entry.rationale;
  return typeof text === 'string' ? text : '';
}

function failClosed(pool: readonly Candidate[]): ScoredCandidate[] {
  return pool.map((candidate) => ({
    candidate,
    relevance: FAIL_CLOSED_SCORE,
    rationale: FAIL_CLOSED_RATIONALE,
  }));
}

/**
 * Map a judge response back onto the candidate pool.
 *
 * The result covers every pool member exactly once, in pool order:
 * - no parseable array: all members at {@link FAIL_CLOSED_SCORE};
 * - entries map by `index`, first entry per index wins, out-of-range and
 *   malformed entries are skipped without stopping the rest;
 * - members the array never names get {@link UNSCORED_SCORE}.
 */
export function parseScores(responseText: string, pool: readonly Candidate[]): ScoredCandidate[] {
  const extracted = extractJsonArray(responseText);
  if (!extracted.parsed) {
    logger.debug(`[score] ${extracted.error ?? 'no array'}; failing closed`);
    return failClosed(pool);
  }

  const byIndex = new Map<number, JudgeEntry>();
  for (const item of extracted.parsed) {
    const entry = judgeEntrySchema.safeParse(item);
    if (!entry.success) continue;

    const { index } = entry.data;
    if (index < 0 || index >= pool.length || byIndex.has(index)) continue;
    byIndex.set(index, entry.data);
  }

  return pool.map((candidate, index) => {
    const entry = byIndex.get(index);
    if (!entry) {
      return { candidate, relevance: UNSCORED_SCORE, rationale: UNSCORED_RATIONALE };
    }
    return {
      candidate,
      relevance: entryScore(entry.score),
      rationale: entryRationale(entry),
    };
  });
}
