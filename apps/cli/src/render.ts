// apps/cli/src/render.ts
//
// Text for the console game. Kept free of I/O so the game loop can be tested
// against captured lines.

import {
  formatCode,
  type Code,
  type Feedback,
  type Hint,
} from '@bulls-cows/game-core';

export const BANNER = [
  '=========================================',
  '   BULLS & COWS: ENTROPY EDITION',
  '=========================================',
];

export const PLAY_RULES = [
  'Find the secret: 4 digits, none repeated.',
  'Every guess lowers the uncertainty; 0 bits means solved.',
];

export const SOLVE_RULES = [
  'Think of 4 digits, none repeated. I will find them.',
  'Answer each guess with bulls and cows, e.g. "1 2" or "1B2C".',
];

export const INVALID_GUESS = 'Invalid input! Must be 4 unique digits.';
export const INVALID_FEEDBACK =
  'Invalid feedback! Enter bulls and cows, e.g. "1 2" or "1B2C".';
export const CONTRADICTION =
  'Contradiction detected: no number fits the feedback. Aborting game.';

export function bits(value: number): string {
  return `${value.toFixed(4)} bits`;
}

export function turnHeader(turn: number, uncertainty: number, remaining: number): string[] {
  return [
    '',
    `--- Turn ${turn} ---`,
    `Uncertainty: ${bits(uncertainty)} (${remaining} possible numbers)`,
  ];
}

export function hintLine(label: string, hint: Hint): string {
  return `${label}: ${formatCode(hint.guess)} (expected gain ${bits(hint.gain)})`;
}

export function resultLine(feedback: Feedback): string {
  return `Result: ${feedback.bulls} Bulls, ${feedback.cows} Cows`;
}

export function gainLine(gained: number): string {
  return `Information gained: ${bits(gained)}`;
}

export function solvedLine(secret: Code, attempts: number): string {
  return `Solved! The secret was ${formatCode(secret)}. Total guesses: ${attempts}`;
}

export function foundLine(code: Code, attempts: number): string {
  return `Got it: ${formatCode(code)} in ${attempts} guesses.`;
}
