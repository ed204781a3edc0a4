import { z } from 'zod';
import { ErrorHandler, HandledError, ValidationError, validateWith } from './error-handler.js';

describe('validateWith', () => {
  const schema = z.object({ threshold: z.number().max(1), budget: z.number().int() });

  it('returns the parsed value', () => {
    expect(validateWith(schema, { threshold: 0.5, budget: 10 }, 'options')).toEqual({ threshold: 0.5, budget: 10 });
  });

  it('collects every issue into a ValidationError', () => {
    let caught: unknown;
    try {
      validateWith(schema, { threshold: 2, budget: 1.5 }, 'options');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toBeInstanceOf(HandledError);
    if (caught instanceof ValidationError) {
      expect(caught.context).toBe('options');
      expect(caught.issues.map((issue) => issue.split(':')[0])).toEqual(['threshold', 'budget']);
      expect(caught.message.startsWith('Invalid options:\n  - threshold: ')).toBe(true);
    }
  });
});

describe('ErrorHandler', () => {
  it('extracts messages from anything thrown', () => {
    expect(ErrorHandler.getErrorMessage(new Error('boom'))).toBe('boom');
    expect(ErrorHandler.getErrorMessage('plain')).toBe('plain');
    expect(ErrorHandler.getStackTrace('plain')).toBeUndefined();
  });
});
