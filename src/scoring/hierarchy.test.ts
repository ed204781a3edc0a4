import { scored } from '../test/fixtures.js';
import { UNKNOWN_HIERARCHY, buildProjectContext, inferHierarchy, parseHierarchy } from './hierarchy.js';

describe('parseHierarchy', () => {
  it('reads a fenced JSON object', () => {
    const response = [
      'Here is the hierarchy:',
      '```json',
      JSON.stringify({
        immediate: 'Fix token refresh',
        midterm: 'Stable login flow',
        final: 'Ship the mobile release',
        reasoning: 'TODO.md lists the release',
        confidence: 'medium',
      }),
      '```',
    ].join('\n');

    expect(parseHierarchy(response)).toEqual({
      immediate: 'Fix token refresh',
      midterm: 'Stable login flow',
      final: 'Ship the mobile release',
      reasoning: 'TODO.md lists the release',
      confidence: 'medium',
    });
  });

  it('turns blank or missing higher levels into null', () => {
    const result = parseHierarchy('{"immediate": "Fix it", "midterm": "  ", "confidence": "high"}');

    expect(result.midterm).toBeNull();
    expect(result.final).toBeNull();
    expect(result.reasoning).toBe('');
    expect(result.confidence).toBe('high');
  });

  it('downgrades an unknown confidence to low', () => {
    expect(parseHierarchy('{"immediate": "Fix it", "confidence": "certain"}').confidence).toBe('low');
  });

  it('falls back to the unknown hierarchy on unparseable output', () => {
    expect(parseHierarchy('I could not tell.')).toEqual(UNKNOWN_HIERARCHY);
    expect(parseHierarchy('{"immediate": 42}')).toEqual(UNKNOWN_HIERARCHY);
  });
});

describe('inferHierarchy', () => {
  it('passes the task and project context to the judge', async () => {
    let prompt = '';
    const hierarchy = await inferHierarchy('Fix token refresh', 'README: mobile app', async (text) => {
      prompt = text;
      return '{"immediate": "Fix token refresh", "confidence": "low"}';
    });

    expect(prompt).toContain('## Task\nFix token refresh');
    expect(prompt).toContain('## Project Context\nREADME: mobile app');
    expect(hierarchy.immediate).toBe('Fix token refresh');
  });

  it('returns the unknown hierarchy when the judge throws', async () => {
    const hierarchy = await inferHierarchy('task', '', async () => {
      throw new Error('timeout');
    });

    expect(hierarchy).toEqual(UNKNOWN_HIERARCHY);
  });

  it('truncates long project context', async () => {
    let prompt = '';
    await inferHierarchy('task', 'z'.repeat(3500), async (text) => {
      prompt = text;
      return '{}';
    });

    expect(prompt).toContain(`## Project Context\n${'z'.repeat(3000)}\n... [truncated]\n`);
  });
});

describe('buildProjectContext', () => {
  it('joins the opening of the top five selected candidates', () => {
    const selection = ['a', 'b', 'c', 'd', 'e', 'f'].map((name) => scored('memory', name, 0.9, 1));

    expect(buildProjectContext(selection)).toBe(
      ['a content', 'b content', 'c content', 'd content', 'e content'].join('\n')
    );
  });
});
