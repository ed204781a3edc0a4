import { PLATFORM_CONTEXT_BUDGETS, platformContextSize, resolveTokenBudget, splitBudget } from './budget.js';

describe('platformContextSize', () => {
  it('looks up known platforms and falls back to the default entry', () => {
    expect(platformContextSize('claude-code')).toBe(120_000);
    expect(platformContextSize('gemini-cli')).toBe(1_000_000);
    expect(platformContextSize('some-new-agent')).toBe(128_000);
    expect(platformContextSize(undefined)).toBe(128_000);
  });

  it('does not treat inherited object keys as platforms', () => {
    expect(platformContextSize('toString')).toBe(128_000);
  });

  it('reads an explicitly passed table', () => {
    const table = { local: 8_000, default: 4_000 };
    expect(platformContextSize('local', table)).toBe(8_000);
    expect(platformContextSize('other', table)).toBe(4_000);
  });

  it('keeps the built-in table immutable', () => {
    expect(Object.isFrozen(PLATFORM_CONTEXT_BUDGETS)).toBe(true);
  });
});

describe('resolveTokenBudget', () => {
  it('takes a quarter of the platform context by default', () => {
    expect(resolveTokenBudget({ platform: 'claude-code' })).toBe(30_000);
  });

  it('rounds down fractional budgets', () => {
    expect(resolveTokenBudget({ platform: 'local', budgetFraction: 0.3 }, { local: 1_001, default: 0 })).toBe(300);
  });

  it('prefers an explicit token cap', () => {
    expect(resolveTokenBudget({ maxTokens: 5_000, platform: 'claude-code' })).toBe(5_000);
    expect(resolveTokenBudget({ maxTokens: 0 })).toBe(0);
  });
});

describe('splitBudget', () => {
  it('rounds the reserved share down and gives the rest to the general bucket', () => {
    expect(splitBudget(1_000, 0.15)).toEqual({ total: 1_000, reserved: 150, general: 850 });
    expect(splitBudget(999, 0.15)).toEqual({ total: 999, reserved: 149, general: 850 });
  });

  it('handles the extremes', () => {
    expect(splitBudget(500, 0)).toEqual({ total: 500, reserved: 0, general: 500 });
    expect(splitBudget(500, 1)).toEqual({ total: 500, reserved: 500, general: 0 });
  });
});
