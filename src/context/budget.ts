// Context Budget - derives the token budget a primed context may occupy

/**
 * Coding-available context size, in tokens, for each agent platform a primed
 * context is prepared for.
 *
 * These are not the raw model windows: the figures leave out what the
 * platform itself keeps for tool schemas, system instructions and the like.
 * Unknown platforms fall back to the `default` entry.
 *
 * @remarks
 * The table is passed explicitly into {@link resolveTokenBudget} rather than
 * read as ambient state, so one process can prime for several platforms at
 * once without them seeing each other's overrides.
 */
export const PLATFORM_CONTEXT_BUDGETS: Readonly<Record<string, number>> = Object.freeze({
  'claude-code': 120_000,
  'claude-api': 200_000,
  opencode: 128_000,
  'gemini-cli': 1_000_000,
  'codex-cli': 200_000,
  default: 128_000,
});

/** Fraction of the platform context a primed context may use by default. */
export const DEFAULT_BUDGET_FRACTION = 0.25;

/** Share of the total budget protected for reserved categories by default. */
export const DEFAULT_RESERVED_FRACTION = 0.15;

export interface BudgetRequest {
  /** Explicit token cap. When present the platform table is not consulted. */
  maxTokens?: number;
  /** Platform name looked up in `table` (default: `"default"`). */
  platform?: string;
  /** Fraction of the platform context to use (default: 0.25). */
  budgetFraction?: number;
}

/**
 * The two independent allocations a selection run checks candidates against.
 */
export interface BudgetSplit {
  total: number;
  reserved: number;
  general: number;
}

/**
 * Look up the coding context size of a platform.
 *
 * @returns The table entry for `platform`, or the table's `default` entry.
 */
export function platformContextSize(
  platform: string | undefined,
  table: Readonly<Record<string, number>> = PLATFORM_CONTEXT_BUDGETS
): number {
  if (platform && Object.prototype.hasOwnProperty.call(table, platform)) {
    return table[platform];
  }
  return table.default ?? PLATFORM_CONTEXT_BUDGETS.default;
}

/**
 * Resolve the total token budget for a priming run.
 *
 * An explicit `maxTokens` wins. Otherwise the budget is
 * `floor(platformContextSize * budgetFraction)`.
 *
 * @example
 * ```typescript
 * resolveTokenBudget({ platform: 'claude-code' });             // 30000
 * resolveTokenBudget({ platform: 'unknown', budgetFraction: 0.5 }); // 64000
 * resolveTokenBudget({ maxTokens: 5000, platform: 'claude-code' }); // 5000
 * ```
 */
export function resolveTokenBudget(
  request: BudgetRequest,
  table: Readonly<Record<string, number>> = PLATFORM_CONTEXT_BUDGETS
): number {
  if (request.maxTokens !== undefined) {
    return request.maxTokens;
  }
  const fraction = request.budgetFraction ?? DEFAULT_BUDGET_FRACTION;
  return Math.floor(platformContextSize(request.platform ?? 'default', table) * fraction);
}

/**
 * Split a total budget into the reserved and general buckets.
 *
 * The reserved share is rounded down; the general bucket gets the rest, so
 * `reserved + general === total` always holds. The partition is static:
 * capacity one bucket leaves unused is never handed to the other.
 */
export function splitBudget(total: number, reservedFraction: number): BudgetSplit {
  const reserved = Math.floor(total * reservedFraction);
  return {
    total,
    reserved,
    general: total - reserved,
  };
}
