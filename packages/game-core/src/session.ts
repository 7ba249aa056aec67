// packages/game-core/src/session.ts
//
// Game sessions: a candidate engine plus the turn history, in two modes.
//
//   • GameSession   → the session holds the secret; the player guesses and
//                     feedback comes from scoring against it.
//   • SolverSession → the player holds the secret; guesses (usually the
//                     engine's hints) are entered together with the feedback
//                     the player reports. Misreported feedback can leave no
//                     candidate, which ends the session as a contradiction.
//
// Hints come only from the engine, which sees nothing but the feedback
// already given.

import { CandidateEngine } from './candidateEngine.js';
import { randomCode, toCode, UNIVERSE, type Code } from './code.js';
import {
  GameInProgressError,
  GameOverError,
  InvalidFeedbackError,
} from './errors.js';
import { evaluate, isFeedback, isSolved, type Feedback } from './scoring.js';

/** Which guesses a hint may recommend. */
export type HintPool = 'candidates' | 'universe';

export type GameStatus = 'playing' | 'solved' | 'contradiction';

export type Turn = {
  guess: Code;
  feedback: Feedback;
  remainingBefore: number;
  remainingAfter: number;
  /** Bits gained by this turn; null when the candidates ran out. */
  informationGained: number | null;
};

export type TurnResult = Turn & { attempt: number; status: GameStatus };

export type Hint = { guess: Code; gain: number };

export type SessionOptions = {
  hintPool?: HintPool;
  /**
   * Suggested while no feedback has been received yet; null searches the
   * pool even then (5040 × pool evaluations).
   */
  openingGuess?: Code | null;
};

export type GameSessionOptions = SessionOptions & { secret?: Code };

export const DEFAULT_OPENING_GUESS: Code = toCode([0, 1, 2, 3]);

export abstract class Session {
  private readonly engine = new CandidateEngine();
  readonly hintPool: HintPool;
  private readonly openingGuess: Code | null;
  private readonly turns: Turn[] = [];
  private state: GameStatus = 'playing';

  constructor(opts: SessionOptions = {}) {
    this.hintPool = opts.hintPool ?? 'candidates';
    this.openingGuess =
      opts.openingGuess === undefined
        ? DEFAULT_OPENING_GUESS
        : opts.openingGuess && toCode(opts.openingGuess);
  }

  get status(): GameStatus {
    return this.state;
  }

  get attempts(): number {
    return this.turns.length;
  }

  get history(): readonly Turn[] {
    return this.turns;
  }

  get remaining(): number {
    return this.engine.size;
  }

  uncertainty(): number {
    return this.engine.uncertainty();
  }

  /** The one candidate left, if the feedback has pinned it down. */
  protected get lastCandidate(): Code | null {
    return this.engine.size === 1 ? this.engine.candidates[0] : null;
  }

  /** Best next guess over the configured pool, with its expected gain. */
  hint(): Hint {
    let guess: Code;
    if (this.openingGuess && this.engine.size === UNIVERSE.length) {
      guess = this.openingGuess;
    } else {
      const pool =
        this.hintPool === 'universe' ? UNIVERSE : this.engine.candidates;
      guess = this.engine.suggestBestGuess(pool);
    }
    return { guess, gain: this.engine.expectedInformationGain(guess) };
  }

  /**
   * record prunes the engine with one observation and appends the turn.
   * 4 bulls solves the game; an empty candidate set ends it as a
   * contradiction.
   */
  protected record(guess: Code, feedback: Feedback): TurnResult {
    if (this.state !== 'playing') throw new GameOverError();
    const remainingBefore = this.engine.size;
    const before = this.engine.uncertainty();

    this.engine.prune(guess, feedback);
    const remainingAfter = this.engine.size;
    if (remainingAfter === 0) this.state = 'contradiction';
    else if (isSolved(feedback)) this.state = 'solved';

    const turn: Turn = {
      guess,
      feedback,
      remainingBefore,
      remainingAfter,
      informationGained:
        remainingAfter === 0 ? null : before - this.engine.uncertainty(),
    };
    this.turns.push(turn);
    return { ...turn, attempt: this.turns.length, status: this.state };
  }
}

export class GameSession extends Session {
  private readonly secret: Code;

  constructor(opts: GameSessionOptions = {}) {
    super(opts);
    this.secret = opts.secret ? toCode(opts.secret) : randomCode();
  }

  /**
   * guess plays one turn against the secret.
   *
   * @throws GameOverError once the game has ended
   * @throws InvalidNumberError if `code` is not 4 unique digits
   */
  guess(code: Code): TurnResult {
    if (this.status !== 'playing') throw new GameOverError();
    return this.record(code, evaluate(this.secret, code));
  }

  /** The secret, once the game is over. */
  reveal(): Code {
    if (this.status === 'playing') throw new GameInProgressError();
    return this.secret;
  }
}

export class SolverSession extends Session {
  /**
   * observe records the feedback the player reports for `guess`.
   *
   * @throws InvalidFeedbackError if no pair of codes could produce `feedback`
   */
  observe(guess: Code, feedback: Feedback): TurnResult {
    if (!isFeedback(feedback)) throw new InvalidFeedbackError(feedback);
    return this.record(toCode(guess), feedback);
  }

  /** The secret, once it is pinned down (solved, or a single candidate). */
  solution(): Code | null {
    if (this.status === 'contradiction') return null;
    return this.lastCandidate;
  }
}
