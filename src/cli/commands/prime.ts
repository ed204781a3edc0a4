// Prime command - run the pipeline and print the primed context

import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../../utils/config.js';
import type { AppConfig } from '../../utils/config.js';
import { ErrorHandler } from '../../utils/error-handler.js';
import { LogLevel, log } from '../../utils/logger.js';
import { createJudge } from '../../llm/provider-factory.js';
import type { Judge, JudgeConfig } from '../../llm/types.js';
import { gatherAll } from '../../sources/gather.js';
import { createSessionContext } from '../../synthesis/assemble.js';
import { primeTask } from '../../pipeline/prime.js';
import type { PrimeOptions, PrimeStage } from '../../pipeline/prime.js';
import { formatPrimeJson, formatPrimeStats } from '../format.js';
import { readHookInput, taskFromHookInput } from '../hook.js';
import type { HookInput } from '../hook.js';
import { DEFAULT_TASK, judgeConfigFrom, primeOptionsFrom } from '../options.js';
import type { PrimeCommandOptions } from '../options.js';

const STAGE_LABELS: Record<PrimeStage, string> = {
  gather: 'Gathering sources...',
  score: 'Scoring relevance...',
  select: 'Selecting within budget...',
  hierarchy: 'Inferring outcome hierarchy...',
  assemble: 'Assembling primed context...',
};

export interface PrimeCommandDeps {
  loadConfig: () => Promise<AppConfig>;
  createJudge: (config: JudgeConfig) => Judge;
  stdin: HookInput;
  stdout: { write(text: string): unknown };
  /** Home directory and version control the pipeline works against */
  pipeline?: Pick<PrimeOptions, 'homeDir' | 'vcs'>;
}

const defaultDeps: PrimeCommandDeps = {
  loadConfig: () => loadConfig(),
  createJudge: (config) => createJudge(config),
  stdin: process.stdin,
  stdout: process.stdout,
};

/**
 * Hook format never fails the agent session: any error leaves stdout empty
 * and the command succeeds.
 */
export async function primeCommand(options: PrimeCommandOptions, deps: PrimeCommandDeps = defaultDeps): Promise<void> {
  if (options.verbose) {
    log.setLevel(LogLevel.DEBUG);
  }

  if (options.format !== 'hook') {
    await runPrime(options, deps);
    return;
  }

  try {
    await runPrime(options, deps);
  } catch (error) {
    log.debug(`[hook] priming skipped: ${ErrorHandler.getErrorMessage(error)}`);
  }
}

async function runPrime(options: PrimeCommandOptions, deps: PrimeCommandDeps): Promise<void> {
  const config = await deps.loadConfig();
  const runOptions = { ...primeOptionsFrom(config, options), ...deps.pipeline };

  if (options.mode === 'session' && !options.task) {
    const sources = await gatherAll({
      projectDir: runOptions.projectDir,
      memoryPaths: runOptions.memoryPaths,
      homeDir: runOptions.homeDir,
      treeDepth: runOptions.treeDepth,
      commitCount: runOptions.commitCount,
      ranking: runOptions.ranking,
      vcs: runOptions.vcs,
    });
    log.debug(`[gather] ${sources.candidates.length} sources (~${sources.totalTokens} tokens)`);
    deps.stdout.write(createSessionContext(sources) + '\n');
    return;
  }

  let task = options.task;
  if (!task && options.format === 'hook') {
    task = taskFromHookInput(await readHookInput(deps.stdin));
    if (!task) {
      log.debug('[hook] no prompt in hook input; nothing to prime');
      return;
    }
  }

  const judge = deps.createJudge(judgeConfigFrom(config, options));

  const showSpinner = options.format === 'text' && !options.verbose && Boolean(process.stderr.isTTY);
  const spinner: ReturnType<typeof ora> | null = showSpinner ? ora({ text: 'Starting...', stream: process.stderr }).start() : null;

  try {
    const result = await primeTask({
      ...runOptions,
      task: task || DEFAULT_TASK,
      judge,
      onStage: (stage) => {
        if (spinner) {
          spinner.text = STAGE_LABELS[stage];
        } else {
          log.debug(`[${stage}] ${STAGE_LABELS[stage]}`);
        }
      },
    });

    spinner?.succeed(formatPrimeStats(result));
    if (!spinner) {
      log.debug(formatPrimeStats(result));
    }

    if (options.format === 'json') {
      deps.stdout.write(formatPrimeJson(result) + '\n');
    } else {
      deps.stdout.write(result.primedContext + '\n');
    }
  } catch (error) {
    spinner?.fail(chalk.red('Priming failed'));
    throw error;
  }
}
