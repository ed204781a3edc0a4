// Candidate ranking - multi-signal, judge-free relevance hints for files
//
// Each signal independently produces (path, increment) pairs; mergeSignals
// folds them into one weight per path. A path found by several signals gets
// the sum of their increments.

import path from 'path';
import { logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/error-handler.js';
import { createCandidate } from './candidate.js';
import {
  CODE_EXTENSIONS,
  DEFAULT_MAX_FILE_BYTES,
  LOCK_FILES,
  SKIP_DIRS,
  hasAllowedExtension,
  listProjectFiles,
  readCandidateFile,
  readTextFileWithin,
} from './filesystem.js';
import { DEFAULT_RECENT_COMMIT_WINDOW, firstNonEmpty, recencyStrategies } from './git.js';
import type { ChangedFilesStrategy, VersionControl } from './git.js';
import type { RankedCandidate, RankedPath } from './types.js';

export const CONTENT_MATCH_WEIGHT = 1;
export const NAME_MATCH_WEIGHT = 3;
export const RECENCY_WEIGHT = 0.5;

export const DEFAULT_MAX_RANKED_FILES = 50;
export const DEFAULT_RANKING_DEPTH = 8;

export interface RankingContext {
  root: string;
  keywords: readonly string[];
  maxDepth: number;
  extensions: ReadonlySet<string>;
  skipDirs: readonly string[];
  /** Files larger than this are not searched. */
  maxFileBytes: number;
  vcs?: VersionControl;
}

export interface RankingSignal {
  name: string;
  collect(context: RankingContext): Promise<RankedPath[]>;
}

/**
 * One hit per (keyword, file) whose content contains the keyword,
 * case-insensitively. Only allow-listed extensions up to `maxFileBytes` are
 * searched.
 */
export const contentMatchSignal: RankingSignal = {
  name: 'content-match',
  async collect(context) {
    if (context.keywords.length === 0) return [];

    const files = await listProjectFiles(context.root, {
      maxDepth: context.maxDepth,
      skipDirs: context.skipDirs,
    });
    const hits: RankedPath[] = [];

    for (const file of files) {
      if (!hasAllowedExtension(file, context.extensions)) continue;

      const content = await readTextFileWithin(path.join(context.root, file), context.maxFileBytes);
      if (content === null) continue;

      const haystack = content.toLowerCase();
      for (const keyword of context.keywords) {
        if (haystack.includes(keyword.toLowerCase())) {
          hits.push({ path: file, weight: CONTENT_MATCH_WEIGHT });
        }
      }
    }

    return hits;
  },
};

/**
 * One hit per (keyword, file) whose file name contains the keyword,
 * case-insensitively. Any extension counts here; the read step filters.
 */
export const nameMatchSignal: RankingSignal = {
  name: 'name-match',
  async collect(context) {
    if (context.keywords.length === 0) return [];

    const files = await listProjectFiles(context.root, {
      maxDepth: context.maxDepth,
      skipDirs: context.skipDirs,
    });
    const hits: RankedPath[] = [];

    for (const file of files) {
      const name = path.posix.basename(file).toLowerCase();
      for (const keyword of context.keywords) {
        if (name.includes(keyword.toLowerCase())) {
          hits.push({ path: file, weight: NAME_MATCH_WEIGHT });
        }
      }
    }

    return hits;
  },
};

/**
 * Files touched recently, from the first change-listing strategy that has
 * an answer.
 */
export function recencySignal(
  strategies: readonly ChangedFilesStrategy[] = recencyStrategies(DEFAULT_RECENT_COMMIT_WINDOW)
): RankingSignal {
  return {
    name: 'recency',
    async collect(context) {
      if (!context.vcs) return [];

      const hit = await firstNonEmpty(strategies, context.vcs);
      if (!hit) return [];

      logger.debug(`[rank] recency from ${hit.strategy}: ${hit.files.length} files`);
      return hit.files.map((file) => ({ path: file, weight: RECENCY_WEIGHT }));
    },
  };
}

/**
 * Sum every signal's increments per path.
 */
export function mergeSignals(signalResults: ReadonlyArray<readonly RankedPath[]>): Map<string, number> {
  return signalResults.reduce((merged, hits) => {
    for (const hit of hits) {
      merged.set(hit.path, (merged.get(hit.path) ?? 0) + hit.weight);
    }
    return merged;
  }, new Map<string, number>());
}

/**
 * Heaviest first; ties broken by path so runs are reproducible.
 */
export function sortRankedPaths(weights: ReadonlyMap<string, number>): RankedPath[] {
  return [...weights.entries()]
    .map(([filePath, weight]) => ({ path: filePath, weight }))
    .sort((left, right) => right.weight - left.weight || left.path.localeCompare(right.path));
}

export interface RankFilesOptions {
  vcs?: VersionControl;
  signals?: readonly RankingSignal[];
  maxDepth?: number;
  extensions?: ReadonlySet<string>;
  skipDirs?: readonly string[];
  maxFileBytes?: number;
  recentCommitWindow?: number;
}

export function defaultSignals(recentCommitWindow: number = DEFAULT_RECENT_COMMIT_WINDOW): RankingSignal[] {
  return [contentMatchSignal, nameMatchSignal, recencySignal(recencyStrategies(recentCommitWindow))];
}

/**
 * Run every ranking signal in turn and merge their weights. A signal that
 * fails contributes nothing; the others still count.
 */
export async function rankFiles(
  root: string,
  keywords: readonly string[],
  options: RankFilesOptions = {}
): Promise<Map<string, number>> {
  const context: RankingContext = {
    root,
    keywords,
    maxDepth: options.maxDepth ?? DEFAULT_RANKING_DEPTH,
    extensions: options.extensions ?? CODE_EXTENSIONS,
    skipDirs: options.skipDirs ?? SKIP_DIRS,
    maxFileBytes: options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES,
    vcs: options.vcs,
  };
  const signals = options.signals ?? defaultSignals(options.recentCommitWindow);

  const results: RankedPath[][] = [];
  for (const signal of signals) {
    try {
      const hits = await signal.collect(context);
      logger.debug(`[rank] ${signal.name}: ${hits.length} hits`);
      results.push(hits);
    } catch (error) {
      logger.debug(`[rank] ${signal.name} contributed nothing: ${ErrorHandler.getErrorMessage(error)}`);
    }
  }

  return mergeSignals(results);
}

export interface ReadRankedOptions {
  maxFiles?: number;
  maxFileBytes?: number;
  extensions?: ReadonlySet<string>;
  lockFiles?: ReadonlySet<string>;
}

/**
 * Walk the ranked paths heaviest first and read up to `maxFiles` of them as
 * source-file candidates, keeping each one's heuristic weight. A file that
 * fails the read rules does not use up a slot; the next one in line takes it.
 */
export async function readRankedFiles(
  root: string,
  weights: ReadonlyMap<string, number>,
  options: ReadRankedOptions = {}
): Promise<RankedCandidate[]> {
  const maxFiles = options.maxFiles ?? DEFAULT_MAX_RANKED_FILES;
  const rules = {
    maxFileBytes: options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES,
    extensions: options.extensions ?? CODE_EXTENSIONS,
    lockFiles: options.lockFiles ?? LOCK_FILES,
  };
  const selected: RankedCandidate[] = [];

  for (const ranked of sortRankedPaths(weights)) {
    if (selected.length >= maxFiles) break;

    const content = await readCandidateFile(root, ranked.path, rules);
    if (content === null) {
      logger.debug(`[rank] skipped ${ranked.path}`);
      continue;
    }

    selected.push({
      candidate: createCandidate({ category: 'source-file', identifier: ranked.path, content }),
      matchWeight: ranked.weight,
    });
  }

  return selected;
}
