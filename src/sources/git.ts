// Version-control collaborator: read-only git queries
//
// Every query may be unavailable (no repository, git not installed, timeout).
// That is not an error: the query answers null or an empty list.

import { DEFAULT_COMMAND_TIMEOUT_MS, outputLines, runCommand } from '../utils/exec.js';
import { logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/error-handler.js';

export interface VersionControl {
  /** One line per commit, newest first */
  recentCommits(count: number): Promise<string | null>;
  /** Paths changed across a commit range such as `HEAD~10..HEAD` */
  changedFilesInRange(range: string): Promise<string[]>;
  /** Paths differing between the working tree and HEAD */
  uncommittedFiles(): Promise<string[]>;
  /** Paths staged in the index */
  stagedFiles(): Promise<string[]>;
  currentBranch(): Promise<string | null>;
  shortStatus(): Promise<string | null>;
  diffStat(range: string): Promise<string | null>;
}

function trimmedOrNull(output: string | null): string | null {
  const trimmed = output?.trim();
  return trimmed ? trimmed : null;
}

export class GitCli implements VersionControl {
  constructor(
    private readonly cwd: string,
    private readonly timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS
  ) {}

  private run(args: string[]): Promise<string | null> {
    return runCommand('git', args, { cwd: this.cwd, timeoutMs: this.timeoutMs });
  }

  async recentCommits(count: number): Promise<string | null> {
    return trimmedOrNull(await this.run(['log', '--oneline', `-${count}`, '--no-decorate']));
  }

  async changedFilesInRange(range: string): Promise<string[]> {
    return outputLines(await this.run(['diff', '--name-only', '--relative', range]));
  }

  async uncommittedFiles(): Promise<string[]> {
    return outputLines(await this.run(['diff', '--name-only', '--relative', 'HEAD']));
  }

  async stagedFiles(): Promise<string[]> {
    return outputLines(await this.run(['diff', '--name-only', '--relative', '--cached']));
  }

  async currentBranch(): Promise<string | null> {
    return trimmedOrNull(await this.run(['branch', '--show-current']));
  }

  async shortStatus(): Promise<string | null> {
    return trimmedOrNull(await this.run(['status', '--short']));
  }

  async diffStat(range: string): Promise<string | null> {
    return trimmedOrNull(await this.run(['diff', '--stat', range]));
  }
}

/**
 * One way of asking "which files changed lately?".
 */
export interface ChangedFilesStrategy {
  name: string;
  run(vcs: VersionControl): Promise<string[]>;
}

export const DEFAULT_RECENT_COMMIT_WINDOW = 10;

/**
 * Recent commits, then uncommitted work, then the index. Append to the list
 * to add a strategy.
 */
export function recencyStrategies(commitWindow: number = DEFAULT_RECENT_COMMIT_WINDOW): ChangedFilesStrategy[] {
  return [
    { name: 'recent-commits', run: (vcs) => vcs.changedFilesInRange(`HEAD~${commitWindow}..HEAD`) },
    { name: 'uncommitted', run: (vcs) => vcs.uncommittedFiles() },
    { name: 'staged', run: (vcs) => vcs.stagedFiles() },
  ];
}

export interface StrategyHit {
  strategy: string;
  files: string[];
}

/**
 * Try `strategies` in order and return the first non-empty answer. A
 * strategy that throws counts as empty.
 */
export async function firstNonEmpty(
  strategies: readonly ChangedFilesStrategy[],
  vcs: VersionControl
): Promise<StrategyHit | null> {
  for (const strategy of strategies) {
    let files: string[];
    try {
      files = await strategy.run(vcs);
    } catch (error) {
      logger.debug(`[git] ${strategy.name} failed: ${ErrorHandler.getErrorMessage(error)}`);
      continue;
    }
    if (files.length > 0) {
      return { strategy: strategy.name, files };
    }
  }
  return null;
}
