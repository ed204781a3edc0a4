// Read-only filesystem access for gathering and ranking

import { promises as fs } from 'fs';
import path from 'path';
import fg from 'fast-glob';
import { logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/error-handler.js';

export const DEFAULT_MAX_FILE_BYTES = 100_000;

/** Extensions treated as source-like text. */
export const CODE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.py', '.js', '.ts', '.jsx', '.tsx', '.go', '.rs', '.rb', '.java',
  '.kt', '.swift', '.c', '.cpp', '.h', '.hpp', '.cs', '.php', '.lua',
  '.sh', '.bash', '.zsh', '.sql', '.graphql', '.proto',
  '.yaml', '.yml', '.toml', '.json',
  '.css', '.scss', '.less', '.html', '.svelte', '.vue',
  '.tf', '.hcl',
  '.md',
]);

/** Build output, dependency and VCS directories never searched. */
export const SKIP_DIRS: readonly string[] = [
  '.git', 'node_modules', '.venv', 'venv', '__pycache__', '.next',
  '.nuxt', 'dist', 'build', '.cache', '.tox', '.mypy_cache',
  '.pytest_cache', 'target', 'vendor', '.terraform',
  'coverage', '.nyc_output',
];

/** Lock files: large, generated and never useful to read. */
export const LOCK_FILES: ReadonlySet<string> = new Set([
  'package-lock.json', 'yarn.lock', 'pnpm-lock.yaml',
  'poetry.lock', 'Pipfile.lock', 'Gemfile.lock',
  'composer.lock', 'Cargo.lock', 'go.sum',
]);

export interface ListFilesOptions {
  maxDepth?: number;
  skipDirs?: readonly string[];
}

function toPosix(relPath: string): string {
  return relPath.split(path.sep).join('/');
}

export function hasAllowedExtension(
  relPath: string,
  extensions: ReadonlySet<string> = CODE_EXTENSIONS
): boolean {
  return extensions.has(path.extname(relPath).toLowerCase());
}

/**
 * Recursively list regular files under `root` as sorted, `/`-separated
 * paths relative to it, pruning `skipDirs` at any depth.
 */
export async function listProjectFiles(root: string, options: ListFilesOptions = {}): Promise<string[]> {
  const skipDirs = options.skipDirs ?? SKIP_DIRS;
  const entries = await fg('**/*', {
    cwd: root,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    deep: options.maxDepth ?? Infinity,
    ignore: skipDirs.map((dir) => `**/${dir}/**`),
  });
  return entries.map(toPosix).sort();
}

/**
 * Read a file as UTF-8 text, or `null` when it cannot be read.
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    logger.debug(`[fs] cannot read ${filePath}: ${ErrorHandler.getErrorMessage(error)}`);
    return null;
  }
}

/**
 * Like {@link readTextFile}, but `null` for anything that is not a regular
 * file of at most `maxBytes` bytes. The size is checked before reading.
 */
export async function readTextFileWithin(filePath: string, maxBytes: number): Promise<string | null> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile() || stats.size > maxBytes) return null;
  } catch (error) {
    logger.debug(`[fs] cannot stat ${filePath}: ${ErrorHandler.getErrorMessage(error)}`);
    return null;
  }
  return readTextFile(filePath);
}

export interface ReadableFileRules {
  maxFileBytes?: number;
  extensions?: ReadonlySet<string>;
  lockFiles?: ReadonlySet<string>;
}

/**
 * Read a ranked file if it is worth handing to the agent: a regular,
 * non-empty file under the size cap, with an allowed extension and not a
 * lock file. Returns `null` otherwise.
 */
export async function readCandidateFile(
  root: string,
  relPath: string,
  rules: ReadableFileRules = {}
): Promise<string | null> {
  const maxFileBytes = rules.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  const extensions = rules.extensions ?? CODE_EXTENSIONS;
  const lockFiles = rules.lockFiles ?? LOCK_FILES;

  if (lockFiles.has(path.basename(relPath)) || !hasAllowedExtension(relPath, extensions)) {
    return null;
  }

  const fullPath = path.resolve(root, relPath);
  let size: number;
  try {
    const stats = await fs.stat(fullPath);
    if (!stats.isFile()) return null;
    size = stats.size;
  } catch {
    return null;
  }

  if (size === 0 || size > maxFileBytes) {
    return null;
  }

  const content = await readTextFile(fullPath);
  if (content === null || !content.trim()) {
    return null;
  }
  return content;
}

/**
 * Cut `content` at `limit` characters, marking the cut.
 */
export function truncateContent(content: string, limit: number): string {
  if (content.length <= limit) return content;
  return content.slice(0, limit) + '\n\n... [truncated]';
}
