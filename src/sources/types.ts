// Candidate model shared by gathering, ranking, scoring and selection

export const CANDIDATE_CATEGORIES = [
  'memory',
  'codebase-summary',
  'source-file',
  'version-control',
  'project-config',
] as const;

export type CandidateCategory = (typeof CANDIDATE_CATEGORIES)[number];

/**
 * A unit of retrievable material. Created once per gathering run and never
 * mutated afterwards; every derived view below wraps it.
 */
export interface Candidate {
  readonly category: CandidateCategory;
  /** Human-readable name, unique within its category for one run */
  readonly identifier: string;
  readonly content: string;
  /** Token cost proxy; see estimateTokens */
  readonly sizeEstimate: number;
}

/**
 * Heuristic weight for a file path, accumulated over ranking signals before
 * any judge call.
 */
export interface RankedPath {
  path: string;
  weight: number;
}

export interface RankedCandidate {
  readonly candidate: Candidate;
  readonly matchWeight: number;
}

export interface ScoredCandidate {
  readonly candidate: Candidate;
  /** Clamped to [0, 1] */
  readonly relevance: number;
  readonly rationale: string;
}

/**
 * Ordered by descending relevance. Every member met the threshold and fit
 * its bucket.
 */
export type SelectionResult = ScoredCandidate[];
