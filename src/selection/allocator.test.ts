import { scored } from '../test/fixtures.js';
import { ValidationError } from '../utils/error-handler.js';
import { allocate, fillBucket, selectCandidates } from './allocator.js';

function ids(entries: readonly { candidate: { identifier: string } }[]): string[] {
  return entries.map((entry) => entry.candidate.identifier);
}

const base = { threshold: 0.5, budgetTokens: 1000, reservedFraction: 0.15 };

describe('allocate', () => {
  it('splits the budget into reserved and general buckets', () => {
    const report = allocate([], base);
    expect(report.budget).toEqual({ total: 1000, reserved: 150, general: 850 });
  });

  it('selects from both buckets and orders the union by relevance', () => {
    const memory = scored('memory', 'lessons.md', 0.55, 50);
    const source = scored('source-file', 'src/auth.ts', 0.95, 900);

    const report = allocate([memory, source], base);

    expect(ids(report.selected)).toEqual(['src/auth.ts', 'lessons.md']);
    expect(report.reserved.used).toBe(50);
    expect(report.general.used).toBe(900);
  });

  it('excludes a candidate larger than its bucket and keeps the rest', () => {
    const memory = scored('memory', 'lessons.md', 0.55, 50);
    const source = scored('source-file', 'src/auth.ts', 0.95, 2000);

    const report = allocate([memory, source], base);

    expect(ids(report.selected)).toEqual(['lessons.md']);
    expect(ids(report.excluded)).toEqual(['src/auth.ts']);
  });

  it('protects reserved categories from high-scoring bulk', () => {
    const memory = scored('memory', 'lessons.md', 0.6, 100);
    const sources = Array.from({ length: 9 }, (_, i) => scored('source-file', `src/file${i}.ts`, 0.9, 111));
    const pool = [...sources, memory];

    const shared = fillBucket(pool, 0.5, 1000);
    expect(ids(shared.accepted)).not.toContain('lessons.md');

    const selected = selectCandidates(pool, base);
    expect(ids(selected)).toContain('lessons.md');
    expect(selected).toHaveLength(8);
    expect(selected[selected.length - 1].candidate.identifier).toBe('lessons.md');
  });

  it('never lends unused capacity from one bucket to the other', () => {
    const note = scored('memory', 'long-note.md', 0.9, 200);
    const report = allocate([note], base);

    expect(report.selected).toEqual([]);
    expect(report.general.used).toBe(0);
  });

  it('skips a candidate that does not fit instead of stopping', () => {
    const big = scored('source-file', 'big.ts', 0.9, 800);
    const bigger = scored('source-file', 'bigger.ts', 0.85, 100);
    const small = scored('source-file', 'small.ts', 0.8, 40);

    expect(ids(selectCandidates([big, bigger, small], base))).toEqual(['big.ts', 'small.ts']);
  });

  it('applies the threshold inclusively in both buckets', () => {
    const pool = [
      scored('memory', 'at.md', 0.5, 10),
      scored('memory', 'below.md', 0.49, 10),
      scored('source-file', 'at.ts', 0.5, 10),
      scored('source-file', 'below.ts', 0.2, 10),
    ];

    const report = allocate(pool, base);

    expect(ids(report.selected)).toEqual(['at.md', 'at.ts']);
    expect(ids(report.excluded)).toEqual(['below.md', 'below.ts']);
  });

  it('excludes everything when the judge failed closed', () => {
    const pool = [scored('memory', 'a.md', 0.2, 10), scored('source-file', 'b.ts', 0.2, 10)];
    expect(selectCandidates(pool, base)).toEqual([]);
  });

  it('honours custom reserved categories', () => {
    const commits = scored('version-control', 'recent_commits', 0.7, 100);
    const report = allocate([commits], { ...base, reservedCategories: new Set(['version-control'] as const) });

    expect(report.reserved.accepted).toEqual([commits]);
    expect(report.general.accepted).toEqual([]);
  });

  it('never selects fewer candidates when the budget grows', () => {
    const pool = [
      scored('memory', 'm1.md', 0.9, 20),
      scored('memory', 'm2.md', 0.7, 60),
      scored('source-file', 's1.ts', 0.95, 100),
      scored('source-file', 's2.ts', 0.8, 300),
      scored('project-config', 'TODO.md', 0.6, 90),
      scored('source-file', 's3.ts', 0.6, 700),
    ];

    let previous = 0;
    for (const budgetTokens of [0, 100, 250, 500, 1000, 2000, 5000]) {
      const count = selectCandidates(pool, { ...base, budgetTokens }).length;
      expect(count).toBeGreaterThanOrEqual(previous);
      previous = count;
    }
    expect(previous).toBe(6);
  });

  it('does not mutate its input', () => {
    const pool = [scored('source-file', 'b.ts', 0.6, 10), scored('source-file', 'a.ts', 0.9, 10)];
    allocate(pool, base);
    expect(ids(pool)).toEqual(['b.ts', 'a.ts']);
  });

  it('rejects invalid options', () => {
    expect(() => allocate([], { ...base, threshold: 1.5 })).toThrow(ValidationError);
    expect(() => allocate([], { ...base, threshold: -0.1 })).toThrow(ValidationError);
    expect(() => allocate([], { ...base, budgetTokens: -1 })).toThrow(ValidationError);
    expect(() => allocate([], { ...base, budgetTokens: 10.5 })).toThrow(ValidationError);
    expect(() => allocate([], { ...base, reservedFraction: 2 })).toThrow(ValidationError);
  });

  it('names the offending field in the validation error', () => {
    try {
      allocate([], { ...base, threshold: 2 });
      throw new Error('expected a ValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0].startsWith('threshold: ')).toBe(true);
      }
    }
  });
});
