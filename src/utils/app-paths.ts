import path from 'path';
import os from 'os';

/**
 * Base directory for context-prime state on disk.
 *
 * Override with `CONTEXT_PRIME_HOME` (useful for sandboxes/tests/portable installs).
 * Default: `~/.context-prime`
 */
export function getContextPrimeHomeDir(): string {
  const override = process.env.CONTEXT_PRIME_HOME?.trim();
  if (override) return override;
  return path.join(os.homedir(), '.context-prime');
}

export function getConfigFilePath(): string {
  return path.join(getContextPrimeHomeDir(), 'config.json');
}
