// context-prime - library entry point

export * from './sources/types.js';
export { createCandidate, GatheredSources } from './sources/candidate.js';
export type { CandidateInit } from './sources/candidate.js';
export { extractKeywords, TASK_STOP_WORDS, DEFAULT_MAX_KEYWORDS } from './sources/keywords.js';
export {
  rankFiles,
  readRankedFiles,
  mergeSignals,
  sortRankedPaths,
  defaultSignals,
  contentMatchSignal,
  nameMatchSignal,
  recencySignal,
  CONTENT_MATCH_WEIGHT,
  NAME_MATCH_WEIGHT,
  RECENCY_WEIGHT,
} from './sources/ranker.js';
export type { RankingSignal, RankingContext, RankFilesOptions, ReadRankedOptions } from './sources/ranker.js';
export { GitCli, firstNonEmpty, recencyStrategies } from './sources/git.js';
export type { VersionControl, ChangedFilesStrategy } from './sources/git.js';
export {
  gatherAll,
  gatherMemories,
  gatherCodebaseSummary,
  gatherSourceFiles,
  gatherVersionControl,
  gatherProjectConfig,
} from './sources/gather.js';
export type { GatherOptions, RankingSettings } from './sources/gather.js';

export { estimateTokens, estimateTotalTokens } from './context/token-estimator.js';
export {
  PLATFORM_CONTEXT_BUDGETS,
  platformContextSize,
  resolveTokenBudget,
  splitBudget,
} from './context/budget.js';
export type { BudgetSplit } from './context/budget.js';

export { parseScores, clampScore } from './scoring/parser.js';
export { scoreCandidates, sortByRelevance } from './scoring/scorer.js';
export { inferHierarchy, parseHierarchy, buildProjectContext, UNKNOWN_HIERARCHY } from './scoring/hierarchy.js';
export type { OutcomeHierarchy } from './scoring/hierarchy.js';

export { allocate, selectCandidates, fillBucket, DEFAULT_RESERVED_CATEGORIES } from './selection/allocator.js';
export type { SelectionOptions, SelectionReport, BucketFill } from './selection/allocator.js';

export { assembleContext, createSessionContext } from './synthesis/assemble.js';

export { primeTask, primeFromSources, summarizeSources } from './pipeline/prime.js';
export type { PrimeOptions, PrimeResult, PrimeStats, SelectRunOptions } from './pipeline/prime.js';

export { createJudge, createChatClient, judgeFromClient } from './llm/provider-factory.js';
export type { Judge, JudgeConfig, JudgeProvider } from './llm/types.js';

export { HandledError, ValidationError } from './utils/error-handler.js';
export { loadConfig } from './utils/config.js';
export type { AppConfig } from './utils/config.js';
