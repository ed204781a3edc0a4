import { logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/error-handler.js';
import type { Judge } from '../llm/types.js';
import type { Candidate, ScoredCandidate } from '../sources/types.js';
import { parseScores } from './parser.js';
import { buildScoringPrompt } from './prompts.js';

/**
 * Highest relevance first; equal scores keep their input order.
 */
export function sortByRelevance(scored: readonly ScoredCandidate[]): ScoredCandidate[] {
  return scored
    .map((entry, position) => ({ entry, position }))
    .sort((left, right) => right.entry.relevance - left.entry.relevance || left.position - right.position)
    .map(({ entry }) => entry);
}

/**
 * Ask the judge to score every candidate against the task.
 *
 * A judge that throws is treated like one that answered nothing usable, so
 * the pool fails closed instead of aborting the run.
 */
export async function scoreCandidates(
  task: string,
  pool: readonly Candidate[],
  judge: Judge
): Promise<ScoredCandidate[]> {
  if (pool.length === 0) return [];

  let response = '';
  try {
    response = await judge(buildScoringPrompt(task, pool));
  } catch (error) {
    logger.warn(`[score] judge call failed: ${ErrorHandler.getErrorMessage(error)}`);
  }

  return sortByRelevance(parseScores(response, pool));
}
