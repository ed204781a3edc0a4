// Shared helpers for tests: temporary projects, a scripted version-control
// collaborator and candidate builders

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createCandidate } from '../sources/candidate.js';
import type { VersionControl } from '../sources/git.js';
import type { Candidate, CandidateCategory, ScoredCandidate } from '../sources/types.js';

export async function makeTempDir(prefix: string = 'context-prime-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write `files` (relative path → content) under `root`, creating parents.
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relPath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content, 'utf-8');
  }
}

export interface FakeVersionControlState {
  commits?: string | null;
  ranges?: Record<string, string[]>;
  uncommitted?: string[];
  staged?: string[];
  branch?: string | null;
  status?: string | null;
  diffStats?: Record<string, string>;
}

/**
 * In-memory version control. Records every range it is asked about.
 */
export class FakeVersionControl implements VersionControl {
  readonly requestedRanges: string[] = [];

  constructor(private readonly state: FakeVersionControlState = {}) {}

  async recentCommits(): Promise<string | null> {
    return this.state.commits ?? null;
  }

  async changedFilesInRange(range: string): Promise<string[]> {
    this.requestedRanges.push(range);
    return this.state.ranges?.[range] ?? [];
  }

  async uncommittedFiles(): Promise<string[]> {
    return this.state.uncommitted ?? [];
  }

  async stagedFiles(): Promise<string[]> {
    return this.state.staged ?? [];
  }

  async currentBranch(): Promise<string | null> {
    return this.state.branch ?? null;
  }

  async shortStatus(): Promise<string | null> {
    return this.state.status ?? null;
  }

  async diffStat(range: string): Promise<string | null> {
    return this.state.diffStats?.[range] ?? null;
  }
}

export function candidate(
  category: CandidateCategory,
  identifier: string,
  sizeEstimate?: number,
  content: string = `${identifier} content`
): Candidate {
  return createCandidate({ category, identifier, content, sizeEstimate });
}

export function scored(
  category: CandidateCategory,
  identifier: string,
  relevance: number,
  sizeEstimate: number
): ScoredCandidate {
  return { candidate: candidate(category, identifier, sizeEstimate), relevance, rationale: '' };
}
