import execa from 'execa';
import { logger } from './logger.js';
import { ErrorHandler } from './error-handler.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;

export interface RunCommandOptions {
  cwd: string;
  timeoutMs?: number;
}

/**
 * Run an external read-only command and return its stdout.
 *
 * Returns `null` when the executable is missing, the command times out or
 * exits non-zero. Callers treat `null` as "this source has nothing to say".
 */
export async function runCommand(
  file: string,
  args: string[],
  options: RunCommandOptions
): Promise<string | null> {
  const label = `${file} ${args.join(' ')}`;

  try {
    const result = await execa(file, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
      reject: false,
      stdin: 'ignore',
    });

    if (result.timedOut) {
      logger.debug(`[exec] ${label} timed out`);
      return null;
    }
    if (result.failed || result.exitCode !== 0) {
      logger.debug(`[exec] ${label} exited with ${result.exitCode ?? 'no code'}`);
      return null;
    }
    return result.stdout;
  } catch (error) {
    logger.debug(`[exec] ${label} failed: ${ErrorHandler.getErrorMessage(error)}`);
    return null;
  }
}

/**
 * Split command output into trimmed, non-empty lines.
 */
export function outputLines(output: string | null): string[] {
  if (!output) return [];
  return output
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}
