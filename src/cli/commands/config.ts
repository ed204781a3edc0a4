// Configuration management command

import chalk from 'chalk';
import { getConfigFilePath } from '../../utils/app-paths.js';
import { getConfigValue, loadConfig, setConfigValue } from '../../utils/config.js';
import type { AppConfig } from '../../utils/config.js';
import { HandledError } from '../../utils/error-handler.js';
import { log } from '../../utils/logger.js';

export interface ConfigCommandOptions {
  set?: string;
  get?: string;
  list?: boolean;
  path?: boolean;
}

const API_KEY_PATH = 'judge.apiKey';

export function maskSecret(secret: string): string {
  return secret.length <= 8 ? '********' : `${secret.slice(0, 4)}...${secret.slice(-4)}`;
}

/**
 * Copy of the configuration safe to print.
 */
export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    judge: {
      ...config.judge,
      apiKey: config.judge.apiKey ? maskSecret(config.judge.apiKey) : undefined,
    },
  };
}

/**
 * Split `key=value` at the first `=`.
 */
export function parseAssignment(assignment: string): { key: string; value: string } {
  const eqIndex = assignment.indexOf('=');
  if (eqIndex <= 0) {
    throw new HandledError('Invalid format. Use: --set key=value', 'config');
  }
  return { key: assignment.slice(0, eqIndex), value: assignment.slice(eqIndex + 1) };
}

function printValue(value: unknown): void {
  const text = typeof value === 'object' && value !== null ? JSON.stringify(value, null, 2) : String(value);
  process.stdout.write(text + '\n');
}

export async function configCommand(options: ConfigCommandOptions): Promise<void> {
  if (options.path) {
    process.stdout.write(getConfigFilePath() + '\n');
    return;
  }

  if (options.list) {
    printValue(redactConfig(await loadConfig()));
    return;
  }

  if (options.get) {
    const value = await getConfigValue(options.get);
    if (value === undefined) {
      log.warn(`Key not found: ${options.get}`);
      return;
    }
    printValue(options.get === API_KEY_PATH && typeof value === 'string' ? maskSecret(value) : value);
    return;
  }

  if (options.set) {
    const { key, value } = parseAssignment(options.set);
    await setConfigValue(key, value);
    log.success(`✓ Set ${key} = ${key === API_KEY_PATH ? maskSecret(value) : value}`);
    return;
  }

  log.info(chalk.yellow('Use --set, --get, --list or --path'));
  log.info(chalk.gray('Examples:'));
  log.info(chalk.gray('  context-prime config --list'));
  log.info(chalk.gray('  context-prime config --get selection.threshold'));
  log.info(chalk.gray('  context-prime config --set judge.provider=ollama'));
}
