// Source gathering - memories, codebase summary, ranked source files,
// version-control history and project priorities.
//
// Gathering over-collects on purpose: scoring and selection do the
// filtering. A gatherer that cannot reach its source returns fewer
// candidates, never an error.

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import fg from 'fast-glob';
import { logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/error-handler.js';
import { DEFAULT_COMMAND_TIMEOUT_MS } from '../utils/exec.js';
import { createCandidate, GatheredSources } from './candidate.js';
import { listProjectFiles, readTextFile, truncateContent } from './filesystem.js';
import { GitCli } from './git.js';
import type { VersionControl } from './git.js';
import { extractKeywords } from './keywords.js';
import { rankFiles, readRankedFiles } from './ranker.js';
import type { Candidate } from './types.js';

export const KEY_PROJECT_FILES: readonly string[] = [
  'README.md', 'readme.md',
  'package.json', 'pyproject.toml', 'Cargo.toml', 'go.mod',
  'CLAUDE.md', '.claude/CLAUDE.md', 'AGENTS.md',
  'Makefile', 'docker-compose.yml',
];

export const PRIORITY_FILES: readonly string[] = [
  'TODO.md', 'PRIORITIES.md', 'ROADMAP.md',
  '.github/ISSUE_TEMPLATE.md',
  'CONTRIBUTING.md',
];

const KEY_FILE_CHAR_LIMIT = 8000;
const PRIORITY_FILE_CHAR_LIMIT = 4000;

export interface RankingSettings {
  maxKeywords: number;
  maxFiles: number;
  maxFileBytes: number;
  maxDepth: number;
  recentCommitWindow: number;
  commandTimeoutMs: number;
}

export const DEFAULT_RANKING_SETTINGS: RankingSettings = {
  maxKeywords: 10,
  maxFiles: 50,
  maxFileBytes: 100_000,
  maxDepth: 8,
  recentCommitWindow: 10,
  commandTimeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
};

export interface GatherOptions {
  projectDir: string;
  task?: string;
  /** Replaces the default memory locations */
  memoryPaths?: string[];
  /** Home directory searched for global and per-project memory */
  homeDir?: string;
  treeDepth?: number;
  commitCount?: number;
  ranking?: Partial<RankingSettings>;
  vcs?: VersionControl;
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}

async function exists(target: string): Promise<boolean> {
  return (await isFile(target)) || (await isDirectory(target));
}

/**
 * Memory directory kept for this project under `<home>/.claude/projects`,
 * whose entries are named after the absolute project path with `/` turned
 * into `-`. Only the first matching entry is considered.
 */
async function findProjectMemoryDir(projectDir: string, homeDir: string): Promise<string | null> {
  const projectsDir = path.join(homeDir, '.claude', 'projects');
  if (!(await isDirectory(projectsDir))) return null;

  const encoded = path.resolve(projectDir).split(path.sep).join('-');
  const entries = (await fs.readdir(projectsDir, { withFileTypes: true }))
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  const match = entries.find((name) => encoded.includes(name) || name.includes(encoded));
  if (!match) return null;

  const memoryDir = path.join(projectsDir, match, 'memory');
  return (await isDirectory(memoryDir)) ? memoryDir : null;
}

async function defaultMemoryPaths(projectDir: string, homeDir: string): Promise<string[]> {
  const candidates = [path.join(projectDir, 'MEMORY.md'), path.join(projectDir, '.claude', 'memory')];

  const globalMemory = path.join(homeDir, '.claude', 'memory');
  if (await isDirectory(globalMemory)) {
    candidates.push(globalMemory);
  }

  const projectMemory = await findProjectMemoryDir(projectDir, homeDir);
  if (projectMemory) {
    candidates.push(projectMemory);
  }

  const found: string[] = [];
  for (const candidate of candidates) {
    if (await exists(candidate)) found.push(candidate);
  }
  return found;
}

/**
 * Markdown memory notes: a single file is named by its base name, files
 * found inside a directory by their path relative to it.
 */
export async function gatherMemories(
  projectDir: string,
  memoryPaths?: string[],
  homeDir: string = os.homedir()
): Promise<Candidate[]> {
  const searchPaths = memoryPaths
    ? memoryPaths.map((p) => path.resolve(projectDir, p))
    : await defaultMemoryPaths(projectDir, homeDir);
  const candidates: Candidate[] = [];

  for (const searchPath of searchPaths) {
    if ((await isFile(searchPath)) && path.extname(searchPath) === '.md') {
      const content = await readTextFile(searchPath);
      if (content?.trim()) {
        candidates.push(createCandidate({ category: 'memory', identifier: path.basename(searchPath), content }));
      }
    } else if (await isDirectory(searchPath)) {
      const notes = (await fg('**/*.md', { cwd: searchPath, onlyFiles: true, suppressErrors: true })).sort();
      for (const note of notes) {
        const content = await readTextFile(path.join(searchPath, note));
        if (content?.trim()) {
          candidates.push(createCandidate({ category: 'memory', identifier: note, content }));
        }
      }
    }
  }

  return candidates;
}

/**
 * File tree for orientation plus the handful of files that describe a
 * project (README, manifests, agent instructions).
 */
export async function gatherCodebaseSummary(projectDir: string, treeDepth: number = 4): Promise<Candidate[]> {
  const candidates: Candidate[] = [];

  const tree = await listProjectFiles(projectDir, { maxDepth: treeDepth });
  if (tree.length > 0) {
    candidates.push(
      createCandidate({ category: 'codebase-summary', identifier: 'directory_structure', content: tree.join('\n') })
    );
  }

  // Case-insensitive filesystems resolve README.md and readme.md to one file
  const seenInodes = new Set<number>();
  for (const name of KEY_PROJECT_FILES) {
    const fullPath = path.join(projectDir, name);
    let inode: number;
    try {
      const stats = await fs.stat(fullPath);
      if (!stats.isFile()) continue;
      inode = stats.ino;
    } catch {
      continue;
    }
    if (seenInodes.has(inode)) continue;
    seenInodes.add(inode);

    const content = await readTextFile(fullPath);
    if (content?.trim()) {
      candidates.push(
        createCandidate({
          category: 'codebase-summary',
          identifier: name,
          content: truncateContent(content, KEY_FILE_CHAR_LIMIT),
        })
      );
    }
  }

  return candidates;
}

/**
 * Source files ranked against the task's keywords and read from disk.
 * Nothing is gathered without a task or when the task has no keywords.
 */
export async function gatherSourceFiles(
  projectDir: string,
  task: string,
  vcs?: VersionControl,
  settings: Partial<RankingSettings> = {}
): Promise<Candidate[]> {
  const ranking = { ...DEFAULT_RANKING_SETTINGS, ...settings };
  if (!task.trim()) return [];

  const keywords = extractKeywords(task, { maxKeywords: ranking.maxKeywords });
  if (keywords.length === 0) {
    logger.debug('[gather] task has no keywords; skipping source-file ranking');
    return [];
  }
  logger.debug(`[gather] keywords: ${keywords.join(', ')}`);

  const weights = await rankFiles(projectDir, keywords, {
    vcs,
    maxDepth: ranking.maxDepth,
    maxFileBytes: ranking.maxFileBytes,
    recentCommitWindow: ranking.recentCommitWindow,
  });
  const ranked = await readRankedFiles(projectDir, weights, {
    maxFiles: ranking.maxFiles,
    maxFileBytes: ranking.maxFileBytes,
  });
  return ranked.map((entry) => entry.candidate);
}

/**
 * Recent commits, current branch and status, and the shape of recent changes.
 */
export async function gatherVersionControl(vcs: VersionControl, commitCount: number = 20): Promise<Candidate[]> {
  const candidates: Candidate[] = [];

  const commits = await vcs.recentCommits(commitCount);
  if (commits) {
    candidates.push(createCandidate({ category: 'version-control', identifier: 'recent_commits', content: commits }));
  }

  const branch = await vcs.currentBranch();
  const status = await vcs.shortStatus();
  if (branch || status) {
    candidates.push(
      createCandidate({
        category: 'version-control',
        identifier: 'current_state',
        content: `Branch: ${branch || 'unknown'}\n\nStatus:\n${status || 'clean'}`,
      })
    );
  }

  const diff = await vcs.diffStat('HEAD~5..HEAD');
  if (diff) {
    candidates.push(createCandidate({ category: 'version-control', identifier: 'recent_changes', content: diff }));
  }

  return candidates;
}

/**
 * Roadmaps, TODO lists and contribution rules.
 */
export async function gatherProjectConfig(projectDir: string): Promise<Candidate[]> {
  const candidates: Candidate[] = [];

  for (const name of PRIORITY_FILES) {
    const fullPath = path.join(projectDir, name);
    if (!(await isFile(fullPath))) continue;

    const content = await readTextFile(fullPath);
    if (content?.trim()) {
      candidates.push(
        createCandidate({
          category: 'project-config',
          identifier: name,
          content: truncateContent(content, PRIORITY_FILE_CHAR_LIMIT),
        })
      );
    }
  }

  return candidates;
}

async function collect(name: string, gatherer: () => Promise<Candidate[]>): Promise<Candidate[]> {
  try {
    const candidates = await gatherer();
    logger.debug(`[gather] ${name}: ${candidates.length} candidates`);
    return candidates;
  } catch (error) {
    logger.debug(`[gather] ${name} failed: ${ErrorHandler.getErrorMessage(error)}`);
    return [];
  }
}

/**
 * Run every gatherer against a project, in a fixed order.
 */
export async function gatherAll(options: GatherOptions): Promise<GatheredSources> {
  const projectDir = path.resolve(options.projectDir);
  const ranking = { ...DEFAULT_RANKING_SETTINGS, ...options.ranking };
  const vcs = options.vcs ?? new GitCli(projectDir, ranking.commandTimeoutMs);
  const task = options.task ?? '';

  const candidates = [
    ...(await collect('memory', () => gatherMemories(projectDir, options.memoryPaths, options.homeDir))),
    ...(await collect('codebase-summary', () => gatherCodebaseSummary(projectDir, options.treeDepth))),
    ...(await collect('source-file', () => gatherSourceFiles(projectDir, task, vcs, ranking))),
    ...(await collect('version-control', () => gatherVersionControl(vcs, options.commitCount))),
    ...(await collect('project-config', () => gatherProjectConfig(projectDir))),
  ];

  return new GatheredSources(candidates, projectDir);
}
