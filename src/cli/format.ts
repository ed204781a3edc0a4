// Rendering of command results for stdout

import type { GatheredSources } from '../sources/candidate.js';
import { summarizeSources } from '../pipeline/prime.js';
import type { PrimeResult } from '../pipeline/prime.js';

const GATHER_PREVIEW_CHARS = 200;

export function formatGatherText(sources: GatheredSources): string {
  const lines = [`Gathered ${sources.candidates.length} sources (~${sources.totalTokens} tokens)`, ''];
  for (const candidate of sources.candidates) {
    lines.push(`  [${candidate.category}] ${candidate.identifier} (~${candidate.sizeEstimate} tokens)`);
  }
  return lines.join('\n');
}

export function formatGatherJson(sources: GatheredSources): string {
  return JSON.stringify(
    {
      projectDir: sources.projectDir,
      totalSources: sources.candidates.length,
      totalTokens: sources.totalTokens,
      sources: sources.candidates.map((candidate) => ({
        category: candidate.category,
        identifier: candidate.identifier,
        tokens: candidate.sizeEstimate,
        preview: candidate.content.slice(0, GATHER_PREVIEW_CHARS),
      })),
    },
    null,
    2
  );
}

export function formatPrimeJson(result: PrimeResult): string {
  return JSON.stringify(
    {
      primedContext: result.primedContext,
      hierarchy: result.hierarchy,
      included: summarizeSources(result.included),
      excluded: summarizeSources(result.excluded),
      stats: result.stats,
    },
    null,
    2
  );
}

/**
 * One-line run summary for stderr.
 */
export function formatPrimeStats(result: PrimeResult): string {
  const { stats } = result;
  return (
    `Included ${stats.sourcesIncluded}/${stats.totalSourcesGathered} sources ` +
    `(~${stats.tokensInPrimedContext} of ${stats.totalTokensGathered} gathered tokens)`
  );
}
