// Judge prompt templates

import type { Candidate } from '../sources/types.js';

export const SOURCE_PREVIEW_CHARS = 1000;
export const HIERARCHY_CONTEXT_CHARS = 3000;

export function buildScoringPrompt(task: string, pool: readonly Candidate[]): string {
  const sourcesBlock = pool
    .map((candidate, index) => {
      const preview =
        candidate.content.length > SOURCE_PREVIEW_CHARS
          ? candidate.content.slice(0, SOURCE_PREVIEW_CHARS) + '...'
          : candidate.content;
      return `\n### Source ${index}: [${candidate.category}] ${candidate.identifier}\n${preview}\n`;
    })
    .join('');

  return `Score the relevance of each source to the given task.

## Task
${task}

## Sources
${sourcesBlock}

## Instructions
For each source, return a JSON array of objects:
\`\`\`json
[
  {"index": 0, "score": 0.85, "reasoning": "Directly relevant because..."},
  ...
]
\`\`\`

Score meaning:
- 0.9-1.0: Directly addresses the task (must include)
- 0.7-0.9: Provides important context (should include)
- 0.4-0.7: Tangentially related (include if space permits)
- 0.0-0.4: Not relevant to this task (exclude)

Be aggressive with low scores. Surface only what matters for THIS task,
not everything that might be vaguely useful.

Return ONLY the JSON array, no other text.`;
}

export function buildHierarchyPrompt(task: string, projectContext: string): string {
  const context =
    projectContext.length > HIERARCHY_CONTEXT_CHARS
      ? projectContext.slice(0, HIERARCHY_CONTEXT_CHARS) + '\n... [truncated]'
      : projectContext;

  return `Analyze this task and infer the outcome hierarchy.

## Task
${task}

## Project Context
${context}

## Instructions
Infer three levels of outcomes. The user stated the immediate task, but
there is usually a mid-term goal it serves and a final outcome beyond that.

If you cannot confidently infer higher levels from the context, say so
rather than inventing goals.

Return as JSON:
\`\`\`json
{
  "immediate": "The specific task to complete right now",
  "midterm": "The milestone or goal this task contributes to (or null if unclear)",
  "final": "The ultimate outcome this work serves (or null if unclear)",
  "reasoning": "Brief explanation of how you inferred the hierarchy",
  "confidence": "high|medium|low"
}
\`\`\`

Return ONLY the JSON, no other text.`;
}

export interface SummaryPromptInput {
  task: string;
  immediate: string;
  midterm: string | null;
  final: string | null;
  sourceNames: string;
}

export function buildSummaryPrompt(input: SummaryPromptInput): string {
  return `Write a 3-5 sentence executive summary for a coding agent about to work on this task.

Task: ${input.task}

Outcome Hierarchy:
- Immediate: ${input.immediate}
- Mid-term: ${input.midterm ?? 'Not inferred'}
- Final: ${input.final ?? 'Not inferred'}

Key sources available: ${input.sourceNames}

Write ONLY the summary paragraph. Be specific about what files to touch, what to watch out for, and what the real goal is. No headers, no formatting, just the paragraph.`;
}
