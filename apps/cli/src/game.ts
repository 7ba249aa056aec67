// apps/cli/src/game.ts
//
// Console game loops over a line-based Io.
//
//   • playGame  → the computer holds the secret; the player guesses and may
//                 ask for an entropy-based hint before each guess.
//   • solveGame → the player holds the secret; the computer guesses and the
//                 player answers with bulls and cows.
//
// Both loops end when the game is solved, when the feedback turns out to be
// contradictory, or when input runs out / the player types "q".

import {
  isFeedback,
  parseCode,
  InvalidNumberError,
  type Feedback,
  type GameSession,
  type SolverSession,
  type TurnResult,
} from '@bulls-cows/game-core';

import {
  BANNER,
  CONTRADICTION,
  INVALID_FEEDBACK,
  INVALID_GUESS,
  PLAY_RULES,
  SOLVE_RULES,
  foundLine,
  gainLine,
  hintLine,
  resultLine,
  solvedLine,
  turnHeader,
} from './render.js';

export interface Io {
  /** Resolves to null once input is closed. */
  ask(prompt: string): Promise<string | null>;
  print(line: string): void;
}

export type Outcome = 'solved' | 'contradiction' | 'aborted';

const QUIT = /^\s*q(uit)?\s*$/i;
const YES = /^\s*y/i;

/**
 * parseFeedbackInput reads "1 2", "1,2" or "1B2C" (case-insensitive).
 * Returns null for anything else, including impossible counts.
 */
export function parseFeedbackInput(raw: string): Feedback | null {
  const m = /^\s*([0-4])\s*b?\s*[ ,]?\s*([0-4])\s*c?\s*$/i.exec(raw);
  if (!m) return null;
  const feedback = { bulls: Number(m[1]), cows: Number(m[2]) };
  return isFeedback(feedback) ? feedback : null;
}

function printAll(io: Io, lines: string[]): void {
  for (const line of lines) io.print(line);
}

export async function playGame(io: Io, game: GameSession): Promise<Outcome> {
  printAll(io, [...BANNER, ...PLAY_RULES]);

  while (game.status === 'playing') {
    printAll(io, turnHeader(game.attempts + 1, game.uncertainty(), game.remaining));

    const wantHint = await io.ask('Would you like an entropy-based hint? (y/n): ');
    if (wantHint === null || QUIT.test(wantHint)) return 'aborted';
    if (YES.test(wantHint)) io.print(hintLine('Recommended guess', game.hint()));

    const raw = await io.ask('Enter your guess: ');
    if (raw === null || QUIT.test(raw)) return 'aborted';

    let turn: TurnResult;
    try {
      turn = game.guess(parseCode(raw));
    } catch (e) {
      if (!(e instanceof InvalidNumberError)) throw e;
      io.print(INVALID_GUESS);
      continue;
    }

    io.print(resultLine(turn.feedback));
    if (turn.status === 'solved') {
      io.print(solvedLine(game.reveal(), turn.attempt));
      return 'solved';
    }
    if (turn.informationGained === null) {
      io.print(CONTRADICTION);
      return 'contradiction';
    }
    io.print(gainLine(turn.informationGained));
  }
  return game.status === 'solved' ? 'solved' : 'contradiction';
}

export async function solveGame(io: Io, solver: SolverSession): Promise<Outcome> {
  printAll(io, [...BANNER, ...SOLVE_RULES]);

  while (solver.status === 'playing') {
    printAll(io, turnHeader(solver.attempts + 1, solver.uncertainty(), solver.remaining));
    const hint = solver.hint();
    io.print(hintLine('My guess', hint));

    let feedback: Feedback | null = null;
    while (feedback === null) {
      const raw = await io.ask('Bulls and cows: ');
      if (raw === null || QUIT.test(raw)) return 'aborted';
      feedback = parseFeedbackInput(raw);
      if (feedback === null) io.print(INVALID_FEEDBACK);
    }

    const turn = solver.observe(hint.guess, feedback);
    if (turn.status === 'solved') {
      io.print(foundLine(hint.guess, turn.attempt));
      return 'solved';
    }
    if (turn.informationGained === null) {
      io.print(CONTRADICTION);
      return 'contradiction';
    }
    io.print(gainLine(turn.informationGained));
  }
  return solver.status === 'solved' ? 'solved' : 'contradiction';
}
