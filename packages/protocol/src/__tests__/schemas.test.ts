// packages/protocol/src/__tests__/schemas.test.ts
//
// Wire-level validation: codes, feedback and request defaults.

import { codeSchema, feedbackSchema, guessReq, newGameReq } from '../index.js';

describe('codeSchema', () => {
  it('accepts 4 unique digits', () => {
    expect(codeSchema.safeParse('0123').success).toBe(true);
  });

  it.each(['1123', '123', '12345', '12a4'])('rejects %j', (s) => {
    expect(codeSchema.safeParse(s).success).toBe(false);
  });
});

describe('feedbackSchema', () => {
  it('accepts reachable feedback', () => {
    expect(feedbackSchema.parse({ bulls: 1, cows: 2 })).toEqual({ bulls: 1, cows: 2 });
  });

  it('rejects counts no guess can receive', () => {
    expect(feedbackSchema.safeParse({ bulls: 2, cows: 3 }).success).toBe(false);
    expect(feedbackSchema.safeParse({ bulls: 3, cows: 1 }).success).toBe(false);
    expect(feedbackSchema.safeParse({ bulls: 1.5, cows: 0 }).success).toBe(false);
  });
});

describe('requests', () => {
  it('defaults a new game to play mode', () => {
    expect(newGameReq.parse({})).toEqual({ mode: 'play' });
  });

  it('leaves feedback optional on guesses', () => {
    expect(guessReq.parse({ gameId: 'g1', guess: '9876' })).toEqual({
      gameId: 'g1',
      guess: '9876',
    });
  });
});
