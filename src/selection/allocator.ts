// Budget allocation - two-bucket, threshold-gated selection of scored
// candidates
//
// A single greedy fill by score lets a few large, high-scoring source files
// take the whole budget and squeeze out memory notes and project priorities,
// which score well but are individually cheap. The budget is therefore
// split before anything is admitted: reserved categories fill a protected
// share, everything else fills the rest, and neither bucket borrows from the
// other.

import { z } from 'zod';
import { validateWith } from '../utils/error-handler.js';
import { DEFAULT_RESERVED_FRACTION, splitBudget } from '../context/budget.js';
import type { BudgetSplit } from '../context/budget.js';
import { sortByRelevance } from '../scoring/scorer.js';
import { CANDIDATE_CATEGORIES } from '../sources/types.js';
import type { CandidateCategory, ScoredCandidate, SelectionResult } from '../sources/types.js';

export const DEFAULT_THRESHOLD = 0.5;

export const DEFAULT_RESERVED_CATEGORIES: ReadonlySet<CandidateCategory> = new Set<CandidateCategory>([
  'memory',
  'project-config',
]);

export interface SelectionOptions {
  /** Minimum relevance, inclusive */
  threshold: number;
  budgetTokens: number;
  reservedCategories?: ReadonlySet<CandidateCategory>;
  reservedFraction?: number;
}

const selectionOptionsSchema = z.object({
  threshold: z.number().min(0).max(1),
  budgetTokens: z.number().int().nonnegative(),
  reservedCategories: z.set(z.enum(CANDIDATE_CATEGORIES)).optional(),
  reservedFraction: z.number().min(0).max(1).optional(),
});

export interface BucketFill {
  accepted: ScoredCandidate[];
  rejected: ScoredCandidate[];
  used: number;
  budget: number;
}

export interface SelectionReport {
  selected: SelectionResult;
  excluded: ScoredCandidate[];
  budget: BudgetSplit;
  reserved: BucketFill;
  general: BucketFill;
}

/**
 * Walk `pool` in order, admitting each candidate at or above `threshold`
 * whose size still fits. A candidate that does not fit is skipped, not a
 * reason to stop.
 */
export function fillBucket(pool: readonly ScoredCandidate[], threshold: number, budget: number): BucketFill {
  let used = 0;
  const accepted: ScoredCandidate[] = [];
  const rejected: ScoredCandidate[] = [];

  for (const entry of pool) {
    const size = entry.candidate.sizeEstimate;
    if (entry.relevance < threshold || used + size > budget) {
      rejected.push(entry);
      continue;
    }
    accepted.push(entry);
    used += size;
  }

  return { accepted, rejected, used, budget };
}

/**
 * Select candidates for the primed context and report what was left out.
 *
 * @throws ValidationError when the threshold is outside [0, 1], the budget
 *   is negative or not whole, or the reserved fraction is outside [0, 1]
 */
export function allocate(scored: readonly ScoredCandidate[], options: SelectionOptions): SelectionReport {
  const validated = validateWith(selectionOptionsSchema, options, 'selection options');
  const reservedCategories = validated.reservedCategories ?? DEFAULT_RESERVED_CATEGORIES;
  const budget = splitBudget(validated.budgetTokens, validated.reservedFraction ?? DEFAULT_RESERVED_FRACTION);

  const ordered = sortByRelevance(scored);
  const reservedPool = ordered.filter((entry) => reservedCategories.has(entry.candidate.category));
  const generalPool = ordered.filter((entry) => !reservedCategories.has(entry.candidate.category));

  const reserved = fillBucket(reservedPool, validated.threshold, budget.reserved);
  const general = fillBucket(generalPool, validated.threshold, budget.general);

  return {
    selected: sortByRelevance([...reserved.accepted, ...general.accepted]),
    excluded: sortByRelevance([...reserved.rejected, ...general.rejected]),
    budget,
    reserved,
    general,
  };
}

/**
 * The selection alone, highest relevance first.
 */
export function selectCandidates(scored: readonly ScoredCandidate[], options: SelectionOptions): SelectionResult {
  return allocate(scored, options).selected;
}
