// apps/server/src/app.ts
//
// Express application for the Bulls & Cows API.
//
// Responsibilities:
//   • Manage game sessions in two modes ("play": server holds the secret,
//     "solve": the player does and reports feedback).
//   • Keep game state in memory (non-persistent), keyed by nanoid ids.
//   • Validate every request body with the shared zod protocol.
//   • Map game-core error kinds onto HTTP statuses in one place.

import express, {
  type NextFunction,
  type Request,
  type Response,
} from 'express';
import cors from 'cors';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';

import {
  formatCode,
  formatFeedback,
  GameSession,
  isGameCoreError,
  parseCode,
  seededCode,
  SolverSession,
  type GameCoreErrorKind,
  type HintPool,
  type TurnResult,
} from '@bulls-cows/game-core';
import {
  gameStateRes,
  guessReq,
  guessRes,
  hintReq,
  hintRes,
  newGameReq,
  newGameRes,
  type ErrorRes,
} from '@bulls-cows/protocol';

type PlayGame = { id: string; mode: 'play'; session: GameSession };
type SolveGame = { id: string; mode: 'solve'; session: SolverSession };
type Game = PlayGame | SolveGame;

export type AppOptions = {
  logger: Logger;
  /** Pool used when a new game does not pick one. */
  hintPool: HintPool;
};

const STATUS_BY_KIND: Record<GameCoreErrorKind, number> = {
  InvalidNumber: 400,
  InvalidFeedback: 400,
  EmptyCandidateSet: 409,
  GameOver: 409,
  GameInProgress: 409,
  EmptyPool: 500,
};

function errorBody(kind: string, message: string): ErrorRes {
  return { error: { kind, message } };
}

function uncertaintyOf(game: Game): number | null {
  return game.session.remaining === 0 ? null : game.session.uncertainty();
}

export function createApp({ logger: log, hintPool }: AppOptions) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  // ⚠️ All game state lives only in memory.
  const games = new Map<string, Game>();

  /* ------------------------------------------------------------------------ */
  /*                                  Routes                                  */
  /* ------------------------------------------------------------------------ */
  app.post('/api/new', (req, res) => {
    const parsed = newGameReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());
    const { mode, seed } = parsed.data;
    const pool = parsed.data.hintPool ?? hintPool;
    const id = nanoid();

    const game: Game =
      mode === 'play'
        ? {
            id,
            mode,
            session: new GameSession({
              hintPool: pool,
              secret: seed === undefined ? undefined : seededCode(seed),
            }),
          }
        : { id, mode, session: new SolverSession({ hintPool: pool }) };

    games.set(id, game);
    log.info({ gameId: id, mode, hintPool: pool, seeded: seed !== undefined }, 'game created');
    res.json(
      newGameRes.parse({
        gameId: id,
        mode,
        hintPool: pool,
        remaining: game.session.remaining,
        uncertainty: game.session.uncertainty(),
      }),
    );
  });

  app.post('/api/guess', (req, res) => {
    const parsed = guessReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());
    const { gameId, guess, feedback } = parsed.data;
    const game = games.get(gameId);
    if (!game) return res.status(404).json(errorBody('NotFound', 'Game not found'));

    const code = parseCode(guess);
    let turn: TurnResult;
    if (game.mode === 'play') {
      turn = game.session.guess(code);
    } else {
      if (!feedback) {
        return res
          .status(400)
          .json(errorBody('MissingFeedback', 'feedback is required in solve mode'));
      }
      turn = game.session.observe(code, feedback);
    }

    const gameLog = log.child({ gameId });
    gameLog.info(
      {
        attempt: turn.attempt,
        guess,
        feedback: formatFeedback(turn.feedback),
        remaining: turn.remainingAfter,
      },
      'turn',
    );
    if (turn.status === 'contradiction') gameLog.warn('no candidates left');

    res.json(
      guessRes.parse({
        feedback: turn.feedback,
        attempt: turn.attempt,
        state: turn.status,
        remaining: turn.remainingAfter,
        uncertainty: uncertaintyOf(game),
        informationGained: turn.informationGained,
      }),
    );
  });

  app.post('/api/hint', (req, res) => {
    const parsed = hintReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());
    const game = games.get(parsed.data.gameId);
    if (!game) return res.status(404).json(errorBody('NotFound', 'Game not found'));

    const started = Date.now();
    const hint = game.session.hint();
    log.debug(
      { gameId: game.id, pool: game.session.hintPool, ms: Date.now() - started },
      'hint computed',
    );
    res.json(
      hintRes.parse({
        guess: formatCode(hint.guess),
        gain: hint.gain,
        pool: game.session.hintPool,
      }),
    );
  });

  app.get('/api/game/:id', (req, res) => {
    const game = games.get(req.params.id);
    if (!game) return res.status(404).json(errorBody('NotFound', 'Game not found'));
    const { session } = game;

    let secret: string | undefined;
    let solution: string | undefined;
    if (game.mode === 'play') {
      if (game.session.status !== 'playing') secret = formatCode(game.session.reveal());
    } else {
      const solved = game.session.solution();
      if (solved) solution = formatCode(solved);
    }

    res.json(
      gameStateRes.parse({
        gameId: game.id,
        mode: game.mode,
        state: session.status,
        attempts: session.attempts,
        remaining: session.remaining,
        uncertainty: uncertaintyOf(game),
        history: session.history.map((t) => ({
          guess: formatCode(t.guess),
          feedback: t.feedback,
          remainingAfter: t.remainingAfter,
          informationGained: t.informationGained,
        })),
        secret,
        solution,
      }),
    );
  });

  /* ------------------------------------------------------------------------ */
  /*                                  Errors                                  */
  /* ------------------------------------------------------------------------ */
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isGameCoreError(err)) {
      return res.status(STATUS_BY_KIND[err.kind]).json(errorBody(err.kind, err.message));
    }
    // express.json() reports malformed bodies as SyntaxError
    if (err instanceof SyntaxError) {
      return res.status(400).json(errorBody('BadRequest', 'Malformed JSON body'));
    }
    log.error({ err }, 'unhandled error');
    res.status(500).json(errorBody('Internal', 'Internal server error'));
  });

  return app;
}
