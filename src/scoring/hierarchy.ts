// Outcome hierarchy - the goal behind the literal task

import { z } from 'zod';
import { extractJsonObject } from '../utils/json-extract.js';
import { logger } from '../utils/logger.js';
import { ErrorHandler } from '../utils/error-handler.js';
import type { Judge } from '../llm/types.js';
import type { ScoredCandidate } from '../sources/types.js';
import { buildHierarchyPrompt } from './prompts.js';

export type HierarchyConfidence = 'high' | 'medium' | 'low';

export interface OutcomeHierarchy {
  immediate: string;
  midterm: string | null;
  final: string | null;
  reasoning: string;
  confidence: HierarchyConfidence;
}

export const UNKNOWN_HIERARCHY: Readonly<OutcomeHierarchy> = Object.freeze({
  immediate: 'Unknown',
  midterm: null,
  final: null,
  reasoning: 'Failed to parse hierarchy',
  confidence: 'low',
});

const optionalText = z
  .string()
  .nullable()
  .optional()
  .transform((value) => (value && value.trim() ? value : null));

const hierarchySchema = z.object({
  immediate: z.string().optional(),
  midterm: optionalText,
  final: optionalText,
  reasoning: z.string().optional(),
  confidence: z.unknown().optional(),
});

const CONTEXT_CANDIDATES = 5;
const CONTEXT_CHARS_PER_CANDIDATE = 500;

/**
 * Opening text of the top selected candidates, used to ground the inference.
 */
export function buildProjectContext(selection: readonly ScoredCandidate[]): string {
  return selection
    .slice(0, CONTEXT_CANDIDATES)
    .map((entry) => entry.candidate.content.slice(0, CONTEXT_CHARS_PER_CANDIDATE))
    .join('\n');
}

export function parseHierarchy(responseText: string): OutcomeHierarchy {
  const extracted = extractJsonObject(responseText);
  if (!extracted.parsed) {
    return { ...UNKNOWN_HIERARCHY };
  }

  const parsed = hierarchySchema.safeParse(extracted.parsed);
  if (!parsed.success) {
    return { ...UNKNOWN_HIERARCHY };
  }

  const { immediate, midterm, final, reasoning, confidence } = parsed.data;
  return {
    immediate: immediate ?? UNKNOWN_HIERARCHY.immediate,
    midterm,
    final,
    reasoning: reasoning ?? '',
    confidence: confidence === 'high' || confidence === 'medium' || confidence === 'low' ? confidence : 'low',
  };
}

export async function inferHierarchy(task: string, projectContext: string, judge: Judge): Promise<OutcomeHierarchy> {
  try {
    return parseHierarchy(await judge(buildHierarchyPrompt(task, projectContext)));
  } catch (error) {
    logger.warn(`[hierarchy] judge call failed: ${ErrorHandler.getErrorMessage(error)}`);
    return { ...UNKNOWN_HIERARCHY };
  }
}
