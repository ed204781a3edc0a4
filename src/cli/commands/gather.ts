// Gather command - list what would be considered, without a judge

import { loadConfig } from '../../utils/config.js';
import { gatherAll } from '../../sources/gather.js';
import { formatGatherJson, formatGatherText } from '../format.js';
import type { CommonOptions } from '../options.js';

export interface GatherCommandOptions extends CommonOptions {
  format: 'text' | 'json';
}

export async function gatherCommand(options: GatherCommandOptions): Promise<void> {
  const config = await loadConfig();

  const sources = await gatherAll({
    projectDir: options.project,
    task: options.task,
    memoryPaths: options.memory ?? config.gathering.memoryPaths,
    treeDepth: config.gathering.treeDepth,
    commitCount: config.gathering.commitCount,
    ranking: config.ranking,
  });

  const output = options.format === 'json' ? formatGatherJson(sources) : formatGatherText(sources);
  process.stdout.write(output + '\n');
}
