// packages/game-core/src/scoring.ts
//
// Bulls & Cows scoring, shared by the engine, the server and the console.
//
//   - bulls: correct digit, correct position
//   - cows:  correct digit, wrong position
//
// Digits never repeat inside a code, so cows is simply the size of the digit
// intersection minus the bulls; no per-digit counting is needed.

import { isCode, type Code } from './code.js';
import { InvalidNumberError } from './errors.js';

export type Feedback = { readonly bulls: number; readonly cows: number };

/** Compact key of a feedback value: bulls·5 + cows (0–24). */
export type FeedbackKey = number;

/**
 * evaluate scores a guess against the secret.
 *
 * @throws InvalidNumberError if either argument is not 4 unique digits
 *
 * Example:
 *   secret = 1234, guess = 1325 → { bulls: 1, cows: 2 }
 */
export function evaluate(secret: Code, guess: Code): Feedback {
  if (!isCode(secret)) throw new InvalidNumberError(secret);
  if (!isCode(guess)) throw new InvalidNumberError(guess);
  return fromKey(scoreKey(secret, guess));
}

/**
 * scoreKey is the unchecked hot path used when both codes are already known
 * to be valid (universe members, or validated once up front).
 */
export function scoreKey(secret: Code, guess: Code): FeedbackKey {
  let bulls = 0;
  let mask = 0;
  for (let i = 0; i < 4; i++) {
    if (secret[i] === guess[i]) bulls++;
    mask |= 1 << secret[i];
  }
  let common = 0;
  for (let i = 0; i < 4; i++) if (mask & (1 << guess[i])) common++;
  return bulls * 5 + (common - bulls);
}

export function toKey(feedback: Feedback): FeedbackKey {
  return feedback.bulls * 5 + feedback.cows;
}

export function fromKey(key: FeedbackKey): Feedback {
  return { bulls: Math.floor(key / 5), cows: key % 5 };
}

export function isSolved(feedback: Feedback): boolean {
  return feedback.bulls === 4;
}

/**
 * isFeedback checks that a value could have been produced by evaluate():
 * integer counts with bulls + cows ≤ 4, excluding 3 bulls + 1 cow (the
 * fourth shared digit would have nowhere to go but the last position).
 */
export function isFeedback(value: unknown): value is Feedback {
  if (typeof value !== 'object' || value === null) return false;
  if (!('bulls' in value) || !('cows' in value)) return false;
  const { bulls, cows } = value;
  if (typeof bulls !== 'number' || typeof cows !== 'number') return false;
  if (!Number.isInteger(bulls) || !Number.isInteger(cows)) return false;
  if (bulls < 0 || cows < 0 || bulls + cows > 4) return false;
  return !(bulls === 3 && cows === 1);
}

/** "1B2C" */
export function formatFeedback(feedback: Feedback): string {
  return `${feedback.bulls}B${feedback.cows}C`;
}
