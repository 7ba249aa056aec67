// packages/game-core/src/errors.ts
//
// Error kinds raised by the game core. Every error carries a `kind`
// discriminant so callers (HTTP server, console) can map them without
// string-matching messages.
//
//   • InvalidNumber     → argument is not 4 distinct digits 0–9
//   • InvalidFeedback   → reported (bulls, cows) no guess could receive
//   • EmptyCandidateSet → no candidate survives the feedback so far
//   • EmptyPool         → suggestBestGuess() was handed nothing to rank
//   • GameOver          → a guess was submitted after the game ended
//   • GameInProgress    → the secret was requested before the game ended

export type GameCoreErrorKind =
  | 'InvalidNumber'
  | 'InvalidFeedback'
  | 'EmptyCandidateSet'
  | 'EmptyPool'
  | 'GameOver'
  | 'GameInProgress';

export class GameCoreError extends Error {
  readonly kind: GameCoreErrorKind;

  constructor(kind: GameCoreErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class InvalidNumberError extends GameCoreError {
  constructor(readonly input: unknown) {
    super('InvalidNumber', `Not a number of 4 unique digits: ${show(input)}`);
  }
}

export class InvalidFeedbackError extends GameCoreError {
  constructor(readonly input: unknown) {
    super('InvalidFeedback', `Not a possible feedback: ${JSON.stringify(input)}`);
  }
}

export class EmptyCandidateSetError extends GameCoreError {
  constructor() {
    super(
      'EmptyCandidateSet',
      'No candidates remain: the feedback received so far is contradictory',
    );
  }
}

export class EmptyPoolError extends GameCoreError {
  constructor() {
    super('EmptyPool', 'Cannot suggest a guess from an empty pool');
  }
}

export class GameOverError extends GameCoreError {
  constructor() {
    super('GameOver', 'Game finished');
  }
}

export class GameInProgressError extends GameCoreError {
  constructor() {
    super('GameInProgress', 'The secret is only revealed once the game is over');
  }
}

export function isGameCoreError(e: unknown): e is GameCoreError {
  return e instanceof GameCoreError;
}

function show(input: unknown): string {
  if (typeof input === 'string') return JSON.stringify(input);
  if (Array.isArray(input)) return `[${input.join(',')}]`;
  return String(input);
}
