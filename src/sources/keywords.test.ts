import { extractKeywords, TASK_STOP_WORDS } from './keywords.js';

describe('extractKeywords', () => {
  it('drops stop words and imperative verbs', () => {
    expect(extractKeywords('Fix the auth handler for login timeouts')).toEqual([
      'auth',
      'handler',
      'login',
      'timeouts',
    ]);
  });

  it('lower-cases and keeps first-seen order without duplicates', () => {
    expect(extractKeywords('Session TOKEN refresh: session token expiry')).toEqual([
      'session',
      'token',
      'refresh',
      'expiry',
    ]);
  });

  it('splits on punctuation and keeps underscores and digits inside tokens', () => {
    expect(extractKeywords('rename parse_v2() in config-loader.ts')).toEqual([
      'rename',
      'parse_v2',
      'config',
      'loader',
      'ts',
    ]);
  });

  it('discards single-character tokens', () => {
    expect(extractKeywords('x y z query')).toEqual(['query']);
  });

  it('caps the result at ten keywords by default', () => {
    const task = 'alpha bravo charlie delta echo foxtrot golf hotel india juliet kilo lima';
    expect(extractKeywords(task)).toEqual([
      'alpha',
      'bravo',
      'charlie',
      'delta',
      'echo',
      'foxtrot',
      'golf',
      'hotel',
      'india',
      'juliet',
    ]);
  });

  it('honours a custom cap and stop-word set', () => {
    expect(extractKeywords('alpha bravo charlie', { maxKeywords: 2 })).toEqual(['alpha', 'bravo']);
    expect(extractKeywords('alpha bravo', { stopWords: new Set(['alpha']) })).toEqual(['bravo']);
  });

  it('returns an empty list for empty or all-stop-word input', () => {
    expect(extractKeywords('')).toEqual([]);
    expect(extractKeywords('Fix and add the new')).toEqual([]);
  });

  it('treats common task verbs as stop words', () => {
    for (const verb of ['fix', 'add', 'implement', 'refactor']) {
      expect(TASK_STOP_WORDS.has(verb)).toBe(true);
    }
  });
});
