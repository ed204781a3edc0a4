// CLI setup with Commander

import { Command } from 'commander';
import { primeCommand } from './commands/prime.js';
import { gatherCommand } from './commands/gather.js';
import { configCommand } from './commands/config.js';
import {
  OUTPUT_FORMATS,
  PRIME_MODES,
  choiceParser,
  parseFloatOption,
  parseIntegerOption,
  parseListOption,
} from './options.js';
import type { PrimeCommandOptions } from './options.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('context-prime')
    .description('Prime a coding agent with task-relevant project context')
    .version('0.1.0');

  program
    .command('prime')
    .description('Gather, score and select project sources for a task')
    .option('-t, --task <task>', 'Task description')
    .option('-p, --project <path>', 'Project directory', process.cwd())
    .option('-m, --memory <paths>', 'Comma-separated memory files or directories', parseListOption)
    .option('--model <model>', 'Judge model (overrides judge.model)')
    .option('--threshold <n>', 'Minimum relevance, 0 to 1', parseFloatOption)
    .option('--max-tokens <n>', 'Token budget (overrides the platform budget)', parseIntegerOption)
    .option('--platform <name>', 'Target agent platform for the budget')
    .option('--mode <mode>', 'task | session', choiceParser(PRIME_MODES), 'task')
    .option('--format <format>', 'text | json | hook (task from stdin JSON, never fails)', choiceParser(OUTPUT_FORMATS), 'text')
    .option('--no-summary', 'Skip the executive summary')
    .option('-v, --verbose', 'Log each stage to stderr')
    .action((options: PrimeCommandOptions) => primeCommand(options));

  program
    .command('gather')
    .description('Gather sources only (no judge calls)')
    .option('-p, --project <path>', 'Project directory', process.cwd())
    .option('-m, --memory <paths>', 'Comma-separated memory files or directories', parseListOption)
    .option('-t, --task <task>', 'Task used to rank source files')
    .option('--format <format>', 'text | json', choiceParser(['text', 'json'] as const), 'text')
    .action(gatherCommand);

  program
    .command('config')
    .description('Manage configuration')
    .option('--set <key=value>', 'Set configuration value')
    .option('--get <key>', 'Get configuration value')
    .option('--list', 'List all configuration')
    .option('--path', 'Print the configuration file location')
    .action(configCommand);

  return program;
}
