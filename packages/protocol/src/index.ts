// packages/protocol/src/index.ts
//
// Shared protocol definitions for the Bulls & Cows HTTP API and its clients.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Code:     4 distinct digits as a string ("0123").
//   - Feedback: bulls / cows counts.
//   - Mode:     "play" (server holds the secret) or "solve" (player does).
//   - Request/response shapes for starting a game, guessing, and hints.
//
// Codes travel as strings on the wire; the server converts them with
// parseCode() from @bulls-cows/game-core.

import { z } from 'zod';

/** Exactly four decimal digits, none repeated. */
export const codeSchema = z
  .string()
  .regex(/^[0-9]{4}$/, 'must be 4 digits')
  .refine((s) => new Set(s).size === 4, 'digits must be unique');

/**
 * Feedback schema:
 *  - bulls → correct digit, correct position
 *  - cows  → correct digit, wrong position
 */
export const feedbackSchema = z
  .object({
    bulls: z.number().int().min(0).max(4),
    cows: z.number().int().min(0).max(4),
  })
  .refine((f) => f.bulls + f.cows <= 4, 'bulls + cows must not exceed 4')
  .refine((f) => !(f.bulls === 3 && f.cows === 1), '3 bulls and 1 cow is impossible');
export type FeedbackBody = z.infer<typeof feedbackSchema>;

/**
 * Mode schema:
 *  - "play"  → the server picks the secret and scores guesses
 *  - "solve" → the player holds the secret and reports feedback
 */
export const modeSchema = z.enum(['play', 'solve']);
export type Mode = z.infer<typeof modeSchema>;

/** Which guesses hints may recommend. */
export const hintPoolSchema = z.enum(['candidates', 'universe']);

export const stateSchema = z.enum(['playing', 'solved', 'contradiction']);

/* -------------------------------------------------------------------------- */
/*                              /api/new endpoint                             */
/* -------------------------------------------------------------------------- */

/**
 * Request to start a new game.
 *  - mode:     optional, defaults to "play"
 *  - hintPool: optional, server default when omitted
 *  - seed:     optional string for a deterministic secret (play mode only)
 */
export const newGameReq = z.object({
  mode: modeSchema.default('play'),
  hintPool: hintPoolSchema.optional(),
  seed: z.string().min(1).optional(),
});

export const newGameRes = z.object({
  gameId: z.string(),
  mode: modeSchema,
  hintPool: hintPoolSchema,
  remaining: z.number().int(),
  uncertainty: z.number(),
});

/* -------------------------------------------------------------------------- */
/*                             /api/guess endpoint                            */
/* -------------------------------------------------------------------------- */

/**
 * Request to submit a guess.
 *  - feedback: required in "solve" mode (what the player's secret says),
 *              ignored in "play" mode
 */
export const guessReq = z.object({
  gameId: z.string(),
  guess: codeSchema,
  feedback: feedbackSchema.optional(),
});

/**
 * Response to /api/guess:
 *  - attempt:           1-based turn number
 *  - remaining:         candidates left after this turn
 *  - uncertainty:       bits left; null once the candidates ran out
 *  - informationGained: bits gained by this turn; null on contradiction
 */
export const guessRes = z.object({
  feedback: feedbackSchema,
  attempt: z.number().int().min(1),
  state: stateSchema,
  remaining: z.number().int().min(0),
  uncertainty: z.number().nullable(),
  informationGained: z.number().nullable(),
});

/* -------------------------------------------------------------------------- */
/*                             /api/hint endpoint                             */
/* -------------------------------------------------------------------------- */

export const hintReq = z.object({ gameId: z.string() });

export const hintRes = z.object({
  guess: codeSchema,
  gain: z.number(),
  pool: hintPoolSchema,
});

/* -------------------------------------------------------------------------- */
/*                           /api/game/:id endpoint                           */
/* -------------------------------------------------------------------------- */

export const turnSchema = z.object({
  guess: codeSchema,
  feedback: feedbackSchema,
  remainingAfter: z.number().int().min(0),
  informationGained: z.number().nullable(),
});

/**
 * Game snapshot. `secret` appears only in play mode once the game is over;
 * `solution` in solve mode once a single candidate is left.
 */
export const gameStateRes = z.object({
  gameId: z.string(),
  mode: modeSchema,
  state: stateSchema,
  attempts: z.number().int().min(0),
  remaining: z.number().int().min(0),
  uncertainty: z.number().nullable(),
  history: z.array(turnSchema),
  secret: codeSchema.optional(),
  solution: codeSchema.optional(),
});

/* -------------------------------------------------------------------------- */
/*                                   Errors                                   */
/* -------------------------------------------------------------------------- */

export const errorRes = z.object({
  error: z.object({ kind: z.string(), message: z.string() }),
});
export type ErrorRes = z.infer<typeof errorRes>;
