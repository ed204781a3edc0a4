import { candidate, scored } from '../test/fixtures.js';
import { FAIL_CLOSED_SCORE } from './parser.js';
import { scoreCandidates, sortByRelevance } from './scorer.js';

describe('sortByRelevance', () => {
  it('orders by descending relevance and keeps input order for ties', () => {
    const sorted = sortByRelevance([
      scored('memory', 'a', 0.5, 1),
      scored('memory', 'b', 0.9, 1),
      scored('memory', 'c', 0.5, 1),
      scored('memory', 'd', 0.7, 1),
    ]);

    expect(sorted.map((entry) => entry.candidate.identifier)).toEqual(['b', 'd', 'a', 'c']);
  });
});

describe('scoreCandidates', () => {
  const pool = [
    candidate('memory', 'lessons.md', undefined, 'Always rotate refresh tokens.'),
    candidate('source-file', 'src/auth.ts', undefined, 'export function login() {}'),
  ];

  it('sends every candidate to the judge and returns scores highest first', async () => {
    const prompts: string[] = [];
    const judge = jest.fn(async (prompt: string) => {
      prompts.push(prompt);
      return '[{"index": 0, "score": 0.6}, {"index": 1, "score": 0.9}]';
    });

    const result = await scoreCandidates('Harden login', pool, judge);

    expect(judge).toHaveBeenCalledTimes(1);
    expect(prompts[0]).toContain('## Task\nHarden login');
    expect(prompts[0]).toContain('### Source 0: [memory] lessons.md\nAlways rotate refresh tokens.');
    expect(prompts[0]).toContain('### Source 1: [source-file] src/auth.ts\nexport function login() {}');
    expect(result.map((entry) => [entry.candidate.identifier, entry.relevance])).toEqual([
      ['src/auth.ts', 0.9],
      ['lessons.md', 0.6],
    ]);
  });

  it('fails closed when the judge throws', async () => {
    const judge = jest.fn(async () => {
      throw new Error('503 Service Unavailable');
    });

    const result = await scoreCandidates('Harden login', pool, judge);

    expect(result.map((entry) => entry.relevance)).toEqual([FAIL_CLOSED_SCORE, FAIL_CLOSED_SCORE]);
  });

  it('truncates long previews in the prompt', async () => {
    const long = candidate('source-file', 'big.ts', undefined, 'y'.repeat(1500));
    let prompt = '';
    await scoreCandidates('task', [long], async (text) => {
      prompt = text;
      return '[]';
    });

    expect(prompt).toContain(`### Source 0: [source-file] big.ts\n${'y'.repeat(1000)}...\n`);
  });

  it('does not call the judge for an empty pool', async () => {
    const judge = jest.fn(async () => '[]');

    expect(await scoreCandidates('task', [], judge)).toEqual([]);
    expect(judge).not.toHaveBeenCalled();
  });
});
