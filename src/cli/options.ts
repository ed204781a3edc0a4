// Shared option handling for CLI commands

import { InvalidArgumentError } from 'commander';
import type { AppConfig } from '../utils/config.js';
import type { JudgeConfig } from '../llm/types.js';
import type { PrimeOptions } from '../pipeline/prime.js';

export type OutputFormat = 'text' | 'json' | 'hook';
export type PrimeMode = 'task' | 'session';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'hook'];
export const PRIME_MODES: readonly PrimeMode[] = ['task', 'session'];

/** Task used when `prime` runs in task mode without `--task` */
export const DEFAULT_TASK = 'General development work';

export interface CommonOptions {
  project: string;
  memory?: string[];
  task?: string;
}

export interface PrimeCommandOptions extends CommonOptions {
  model?: string;
  threshold?: number;
  maxTokens?: number;
  platform?: string;
  mode: PrimeMode;
  format: OutputFormat;
  summary: boolean;
  verbose?: boolean;
}

export function parseFloatOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseIntegerOption(value: string): number {
  const parsed = parseFloatOption(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * `-m a.md,notes/` → `['a.md', 'notes/']`
 */
export function parseListOption(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export function choiceParser<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value) => {
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
      throw new InvalidArgumentError(`Allowed choices are ${choices.join(', ')}.`);
    }
    return match;
  };
}

export function judgeConfigFrom(config: AppConfig, options: Pick<PrimeCommandOptions, 'model'> = {}): JudgeConfig {
  return {
    ...config.judge,
    model: options.model ?? config.judge.model,
  };
}

/**
 * Pipeline options from the loaded configuration, overridden by flags.
 * The judge is supplied by the caller.
 */
export function primeOptionsFrom(
  config: AppConfig,
  options: PrimeCommandOptions
): Omit<PrimeOptions, 'judge' | 'task'> {
  return {
    projectDir: options.project,
    memoryPaths: options.memory ?? config.gathering.memoryPaths,
    treeDepth: config.gathering.treeDepth,
    commitCount: config.gathering.commitCount,
    ranking: config.ranking,
    summary: options.summary,
    selection: {
      threshold: options.threshold ?? config.selection.threshold,
      maxTokens: options.maxTokens ?? config.selection.maxTokens,
      platform: options.platform ?? config.selection.platform,
      budgetFraction: config.selection.budgetFraction,
      reservedFraction: config.selection.reservedFraction,
      reservedCategories: config.selection.reservedCategories,
    },
  };
}
