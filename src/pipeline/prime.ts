// Priming pipeline - gather, score, select, infer the goal, assemble
//
// Stages run strictly in sequence. Nothing here holds state between runs,
// so several runs (different tasks, or one pool scored for several tasks)
// can proceed concurrently.

import path from 'path';
import { estimateTokens } from '../context/token-estimator.js';
import { resolveTokenBudget, PLATFORM_CONTEXT_BUDGETS } from '../context/budget.js';
import type { BudgetSplit } from '../context/budget.js';
import type { Judge } from '../llm/types.js';
import { buildProjectContext, inferHierarchy } from '../scoring/hierarchy.js';
import type { OutcomeHierarchy } from '../scoring/hierarchy.js';
import { scoreCandidates } from '../scoring/scorer.js';
import { allocate } from '../selection/allocator.js';
import { assembleContext } from '../synthesis/assemble.js';
import { gatherAll } from '../sources/gather.js';
import type { RankingSettings } from '../sources/gather.js';
import type { GatheredSources } from '../sources/candidate.js';
import type { VersionControl } from '../sources/git.js';
import type { CandidateCategory, ScoredCandidate, SelectionResult } from '../sources/types.js';
import { logger } from '../utils/logger.js';

export type PrimeStage = 'gather' | 'score' | 'select' | 'hierarchy' | 'assemble';

export interface SelectionSettings {
  threshold: number;
  maxTokens?: number;
  platform: string;
  budgetFraction: number;
  reservedFraction: number;
  reservedCategories: readonly CandidateCategory[];
  /** Platform → coding context size; defaults to the built-in table */
  platformBudgets?: Readonly<Record<string, number>>;
}

export const DEFAULT_SELECTION_SETTINGS: SelectionSettings = {
  threshold: 0.5,
  platform: 'claude-code',
  budgetFraction: 0.25,
  reservedFraction: 0.15,
  reservedCategories: ['memory', 'project-config'],
};

export interface SelectRunOptions {
  task: string;
  sources: GatheredSources;
  judge: Judge;
  selection?: Partial<SelectionSettings>;
  /** Ask the judge for an executive summary at the top (default: true) */
  summary?: boolean;
  onStage?: (stage: PrimeStage) => void;
}

export interface PrimeOptions extends Omit<SelectRunOptions, 'sources'> {
  projectDir: string;
  memoryPaths?: string[];
  homeDir?: string;
  treeDepth?: number;
  commitCount?: number;
  ranking?: Partial<RankingSettings>;
  vcs?: VersionControl;
}

export interface SourceSummary {
  identifier: string;
  category: CandidateCategory;
  relevance: number;
  sizeEstimate: number;
}

export interface PrimeStats {
  totalSourcesGathered: number;
  sourcesIncluded: number;
  sourcesExcluded: number;
  totalTokensGathered: number;
  tokensInPrimedContext: number;
  budget: BudgetSplit;
}

export interface PrimeResult {
  primedContext: string;
  hierarchy: OutcomeHierarchy;
  included: SelectionResult;
  excluded: ScoredCandidate[];
  stats: PrimeStats;
}

function summarize(entry: ScoredCandidate): SourceSummary {
  return {
    identifier: entry.candidate.identifier,
    category: entry.candidate.category,
    relevance: entry.relevance,
    sizeEstimate: entry.candidate.sizeEstimate,
  };
}

export function summarizeSources(entries: readonly ScoredCandidate[]): SourceSummary[] {
  return entries.map(summarize);
}

/**
 * Score an already gathered pool for one task and assemble the result.
 * The pool is only read, so it may be shared between concurrent runs.
 */
export async function primeFromSources(options: SelectRunOptions): Promise<PrimeResult> {
  const settings = { ...DEFAULT_SELECTION_SETTINGS, ...options.selection };
  const { task, sources, judge } = options;

  options.onStage?.('score');
  const scored = await scoreCandidates(task, sources.candidates, judge);

  options.onStage?.('select');
  const budgetTokens = resolveTokenBudget(
    {
      maxTokens: settings.maxTokens,
      platform: settings.platform,
      budgetFraction: settings.budgetFraction,
    },
    settings.platformBudgets ?? PLATFORM_CONTEXT_BUDGETS
  );
  const report = allocate(scored, {
    threshold: settings.threshold,
    budgetTokens,
    reservedCategories: new Set(settings.reservedCategories),
    reservedFraction: settings.reservedFraction,
  });
  logger.debug(
    `[select] kept ${report.selected.length}/${scored.length} ` +
      `(reserved ${report.reserved.used}/${report.budget.reserved}, general ${report.general.used}/${report.budget.general})`
  );

  options.onStage?.('hierarchy');
  const hierarchy = await inferHierarchy(task, buildProjectContext(report.selected), judge);

  options.onStage?.('assemble');
  const primedContext = await assembleContext(task, hierarchy, report.selected, {
    judge: options.summary === false ? undefined : judge,
  });

  return {
    primedContext,
    hierarchy,
    included: report.selected,
    excluded: report.excluded,
    stats: {
      totalSourcesGathered: sources.candidates.length,
      sourcesIncluded: report.selected.length,
      sourcesExcluded: report.excluded.length,
      totalTokensGathered: sources.totalTokens,
      tokensInPrimedContext: estimateTokens(primedContext),
      budget: report.budget,
    },
  };
}

/**
 * Full run against a project directory.
 */
export async function primeTask(options: PrimeOptions): Promise<PrimeResult> {
  options.onStage?.('gather');
  const sources = await gatherAll({
    projectDir: path.resolve(options.projectDir),
    task: options.task,
    memoryPaths: options.memoryPaths,
    homeDir: options.homeDir,
    treeDepth: options.treeDepth,
    commitCount: options.commitCount,
    ranking: options.ranking,
    vcs: options.vcs,
  });
  logger.debug(`[gather] ${sources.candidates.length} sources (~${sources.totalTokens} tokens)`);

  return primeFromSources({ ...options, sources });
}
