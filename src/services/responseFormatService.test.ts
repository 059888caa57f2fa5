import { describe, expect, it } from 'vitest';
import { FormatContractViolation } from '../utils/errors.js';
import { ResponseFormatValidator } from './responseFormatService.js';

describe('ResponseFormatValidator', () => {
  const validator = new ResponseFormatValidator(50);

  it('accepts a short reply with one question', () => {
    const result = validator.check(
      'I hear you. Being criticized in front of the team really stings. What part of it hurts most?'
    );

    expect(result).toEqual({ valid: true, violations: [], questionMarks: 1, wordCount: 18, acknowledged: false });
  });

  it('rejects more than one question', () => {
    expect(validator.check('What happened? How did you respond?').violations).toEqual(['asks 2 questions instead of one']);
  });

  it('accepts an acknowledgment without a question', () => {
    const result = validator.check("That's a real insight. Seeing the fear under the defensiveness takes honesty.");

    expect(result.valid).toBe(true);
    expect(result.acknowledged).toBe(true);
  });

  it('matches acknowledgment phrases written with curly apostrophes', () => {
    expect(validator.isAcknowledgment('That’s a real insight.')).toBe(true);
  });

  it('rejects a statement that neither asks nor acknowledges', () => {
    expect(validator.check('I see. That sounds hard.').violations).toEqual([
      'neither asks a question nor acknowledges an insight',
    ]);
  });

  it('rejects replies over the word limit', () => {
    const strict = new ResponseFormatValidator(10);

    expect(strict.check('I hear how heavy this week has been for you lately, friend?').violations).toEqual([
      'has 12 words, limit is 10',
    ]);
  });

  it('rejects bulleted lists', () => {
    expect(validator.check('Try this:\n- breathe slowly\n- take a walk\nWhich feels doable?').violations).toEqual([
      'contains a list or multi-step instructions',
    ]);
  });

  it('rejects inline enumerations', () => {
    expect(validator.check('You could 1) rest and 2) call a friend. Which fits?').violations).toEqual([
      'contains a list or multi-step instructions',
    ]);
  });

  it('rejects an empty reply', () => {
    expect(validator.check('   ').violations).toEqual(['reply is empty']);
  });

  it('throws from assertValid with every violation', () => {
    expect(() => validator.assertValid('What? Why?')).toThrow(FormatContractViolation);
    expect(() => validator.assertValid('How are you feeling?')).not.toThrow();
  });
});
