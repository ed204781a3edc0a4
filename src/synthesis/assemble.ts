// Context assembly - selected candidates to a primed-context markdown block
//
// Full content, not summaries: the value is in what was selected.

import { logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/error-handler.js';
import type { Judge } from '../llm/types.js';
import type { OutcomeHierarchy } from '../scoring/hierarchy.js';
import { buildSummaryPrompt } from '../scoring/prompts.js';
import type { GatheredSources } from '../sources/candidate.js';
import type { ScoredCandidate } from '../sources/types.js';

export const PRIMED_CONTEXT_HEADING = '# Primed Context';

const SESSION_PREVIEW_CHARS = 500;

export interface AssembleOptions {
  /** When given, one judge call writes an executive summary */
  judge?: Judge;
}

function hierarchyLines(task: string, hierarchy: OutcomeHierarchy): string[] {
  const lines: string[] = [];
  if (hierarchy.final) lines.push(`- **Final goal:** ${hierarchy.final}`);
  if (hierarchy.midterm) lines.push(`- **Mid-term:** ${hierarchy.midterm}`);
  lines.push(`- **Immediate task:** ${hierarchy.immediate || task}`);
  return lines;
}

async function executiveSummary(
  task: string,
  hierarchy: OutcomeHierarchy,
  selection: readonly ScoredCandidate[],
  judge: Judge
): Promise<string | null> {
  const sourceNames = selection
    .map((entry) => `${entry.candidate.identifier} (${entry.candidate.category})`)
    .join(', ');
  try {
    const summary = await judge(
      buildSummaryPrompt({
        task,
        immediate: hierarchy.immediate || task,
        midterm: hierarchy.midterm,
        final: hierarchy.final,
        sourceNames,
      })
    );
    return summary.trim() || null;
  } catch (error) {
    logger.warn(`[assemble] summary call failed: ${ErrorHandler.getErrorMessage(error)}`);
    return null;
  }
}

export async function assembleContext(
  task: string,
  hierarchy: OutcomeHierarchy,
  selection: readonly ScoredCandidate[],
  options: AssembleOptions = {}
): Promise<string> {
  const parts: string[] = [];

  parts.push(`${PRIMED_CONTEXT_HEADING}\n`);
  parts.push('> Auto-assembled from project sources scored for task relevance.\n');

  parts.push('## Outcome Hierarchy\n');
  parts.push(...hierarchyLines(task, hierarchy));
  parts.push('');

  if (options.judge) {
    const summary = await executiveSummary(task, hierarchy, selection, options.judge);
    if (summary) {
      parts.push('## Summary\n');
      parts.push(summary);
      parts.push('');
    }
  }

  parts.push('## Relevant Sources\n');
  for (const entry of selection) {
    parts.push(
      `### [${entry.candidate.category}] ${entry.candidate.identifier} (relevance: ${entry.relevance.toFixed(2)})\n`
    );
    parts.push(entry.candidate.content);
    parts.push('');
  }

  return parts.join('\n');
}

/**
 * Task-less context for the start of a session: a preview of the codebase
 * summary and project priorities, then every memory note in full.
 */
export function createSessionContext(sources: GatheredSources): string {
  let output = '## Project Context (auto-primed at session start)\n\n';

  for (const candidate of sources.candidates) {
    if (candidate.category === 'codebase-summary' || candidate.category === 'project-config') {
      output += `### ${candidate.identifier}\n${candidate.content.slice(0, SESSION_PREVIEW_CHARS)}\n\n`;
    }
  }

  for (const candidate of sources.byCategory('memory')) {
    output += `### Memory: ${candidate.identifier}\n${candidate.content}\n\n`;
  }

  return output;
}
