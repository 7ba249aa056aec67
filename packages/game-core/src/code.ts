// packages/game-core/src/code.ts
//
// The secret, every guess and every candidate are the same thing: an ordered
// sequence of 4 distinct digits 0–9 ("code"). There are 10·9·8·7 = 5040 of
// them. Codes are frozen tuples, so they can be shared freely between the
// universe, candidate sets and game history.

import { InvalidNumberError } from './errors.js';

export const CODE_LENGTH = 4;

export type Code = readonly [number, number, number, number];

function freeze(a: number, b: number, c: number, d: number): Code {
  return Object.freeze([a, b, c, d] as const);
}

/**
 * UNIVERSE lists all 5040 codes in lexicographic order
 * (0123, 0124, …, 9876). Pool iteration order, and so tie-breaking in
 * suggestions, follows this order.
 */
export const UNIVERSE: readonly Code[] = (() => {
  const all: Code[] = [];
  for (let a = 0; a <= 9; a++)
    for (let b = 0; b <= 9; b++) {
      if (b === a) continue;
      for (let c = 0; c <= 9; c++) {
        if (c === a || c === b) continue;
        for (let d = 0; d <= 9; d++) {
          if (d === a || d === b || d === c) continue;
          all.push(freeze(a, b, c, d));
        }
      }
    }
  return Object.freeze(all);
})();

/** Structural check: 4 integer digits in 0–9, none repeated. */
export function isCode(value: unknown): value is Code {
  if (!Array.isArray(value) || value.length !== CODE_LENGTH) return false;
  let seen = 0;
  for (const d of value) {
    if (typeof d !== 'number' || !Number.isInteger(d) || d < 0 || d > 9)
      return false;
    if (seen & (1 << d)) return false;
    seen |= 1 << d;
  }
  return true;
}

export function toCode(digits: readonly number[]): Code {
  if (!isCode(digits)) throw new InvalidNumberError(digits);
  return freeze(digits[0], digits[1], digits[2], digits[3]);
}

/**
 * parseCode turns raw player input into a code.
 *
 * Surrounding whitespace is ignored; anything other than exactly four
 * distinct decimal digits is rejected.
 *
 * Example:
 *   parseCode(' 0123 ') → [0, 1, 2, 3]
 *   parseCode('1123')   → throws InvalidNumberError
 */
export function parseCode(input: string): Code {
  const s = input.trim();
  if (!/^[0-9]{4}$/.test(s) || new Set(s).size !== CODE_LENGTH) {
    throw new InvalidNumberError(input);
  }
  return toCode(Array.from(s, Number));
}

export function formatCode(code: Code): string {
  return code.join('');
}

export function sameCode(a: Code, b: Code): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3];
}

/** Uniform pick from the universe. `random` must return values in [0, 1). */
export function randomCode(random: () => number = Math.random): Code {
  return UNIVERSE[Math.floor(random() * UNIVERSE.length)];
}

/**
 * seededCode picks a code deterministically from a seed string
 * (32-bit FNV-1a), so that seeded/daily games share the same secret.
 */
export function seededCode(seed: string): Code {
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  return UNIVERSE[Math.abs(h) % UNIVERSE.length];
}
