import { estimateTokens } from '../context/token-estimator.js';
import type { Candidate, CandidateCategory } from './types.js';

export interface CandidateInit {
  category: CandidateCategory;
  identifier: string;
  content: string;
  /** Overrides the estimate derived from `content` */
  sizeEstimate?: number;
}

export function createCandidate(init: CandidateInit): Candidate {
  const sizeEstimate =
    init.sizeEstimate !== undefined && init.sizeEstimate >= 0
      ? init.sizeEstimate
      : estimateTokens(init.content);

  return Object.freeze({
    category: init.category,
    identifier: init.identifier,
    content: init.content,
    sizeEstimate,
  });
}

/**
 * All candidates collected for one project, in gathering order.
 */
export class GatheredSources {
  readonly candidates: readonly Candidate[];

  constructor(
    candidates: Candidate[],
    readonly projectDir: string
  ) {
    this.candidates = Object.freeze([...candidates]);
  }

  get totalTokens(): number {
    return this.candidates.reduce((sum, c) => sum + c.sizeEstimate, 0);
  }

  byCategory(category: CandidateCategory): Candidate[] {
    return this.candidates.filter((c) => c.category === category);
  }
}
