// apps/server/src/__tests__/app.test.ts
//
// HTTP tests for the Bulls & Cows API. The app listens on an ephemeral port
// inside the test process and is called with fetch.
//
// Covered:
//   • play mode: seeded secret, scoring, solving, secret revealed at the end
//   • solve mode: reported feedback, hints, contradiction handling
//   • request validation and error-kind → status mapping

import type { Server } from 'node:http';
import { pino } from 'pino';

import { evaluate, formatCode, seededCode } from '@bulls-cows/game-core';
import {
  errorRes,
  gameStateRes,
  guessRes,
  hintRes,
  newGameRes,
} from '@bulls-cows/protocol';
import { createApp } from '../app.js';
import { loadConfig } from '../config.js';

let server: Server;
let base: string;

beforeAll(async () => {
  const app = createApp({
    logger: pino({ level: 'silent' }),
    hintPool: 'candidates',
  });
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  const addr = server.address();
  if (addr === null || typeof addr === 'string') throw new Error('no port');
  base = `http://127.0.0.1:${addr.port}`;
});

afterAll(
  () => new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  }),
);

async function post(path: string, body: unknown) {
  const res = await fetch(`${base}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  const json: unknown = await res.json();
  return { status: res.status, body: json };
}

async function get(path: string) {
  const res = await fetch(`${base}${path}`);
  const json: unknown = await res.json();
  return { status: res.status, body: json };
}

async function newGame(body: unknown): Promise<string> {
  const res = await post('/api/new', body);
  expect(res.status).toBe(200);
  return newGameRes.parse(res.body).gameId;
}

function errorKind(body: unknown): string {
  return errorRes.parse(body).error.kind;
}

describe('play mode', () => {
  const seed = 'test-seed';
  const secret = seededCode(seed);

  it('scores guesses against the seeded secret until solved', async () => {
    const created = await post('/api/new', { seed });
    expect(created.status).toBe(200);
    expect(created.body).toMatchObject({ mode: 'play', hintPool: 'candidates', remaining: 5040 });
    const { gameId } = newGameRes.parse(created.body);

    const hint = await post('/api/hint', { gameId });
    expect(hint.status).toBe(200);
    expect(hintRes.parse(hint.body)).toMatchObject({ guess: '0123', pool: 'candidates' });

    const first = await post('/api/guess', { gameId, guess: '0123' });
    expect(first.status).toBe(200);
    const firstTurn = guessRes.parse(first.body);
    expect(firstTurn.feedback).toEqual(evaluate(secret, [0, 1, 2, 3]));
    expect(firstTurn.attempt).toBe(1);

    const before = gameStateRes.parse((await get(`/api/game/${gameId}`)).body);
    expect(before.secret).toBeUndefined();
    expect(before.history).toHaveLength(1);

    const last = guessRes.parse(
      (await post('/api/guess', { gameId, guess: formatCode(secret) })).body,
    );
    expect(last.feedback).toEqual({ bulls: 4, cows: 0 });
    expect(last.state).toBe('solved');
    expect(last.remaining).toBe(1);
    expect(last.uncertainty).toBe(0);

    const after = gameStateRes.parse((await get(`/api/game/${gameId}`)).body);
    expect(after.state).toBe('solved');
    expect(after.attempts).toBe(2);
    expect(after.secret).toBe(formatCode(secret));

    const again = await post('/api/guess', { gameId, guess: '0123' });
    expect(again.status).toBe(409);
    expect(errorKind(again.body)).toBe('GameOver');
  });
});

describe('solve mode', () => {
  it('narrows from reported feedback and hints from the candidates', async () => {
    const gameId = await newGame({ mode: 'solve' });

    const first = await post('/api/guess', {
      gameId,
      guess: '0123',
      feedback: { bulls: 0, cows: 3 },
    });
    expect(first.body).toMatchObject({ remaining: 264, state: 'playing' });

    const hint = hintRes.parse((await post('/api/hint', { gameId })).body);
    expect(hint.guess).toBe('1234');
    expect(hint.gain).toBeCloseTo(2.7266, 4);
  });

  it('uses the universe pool when asked', async () => {
    const gameId = await newGame({ mode: 'solve', hintPool: 'universe' });
    await post('/api/guess', { gameId, guess: '0123', feedback: { bulls: 0, cows: 3 } });
    await post('/api/guess', { gameId, guess: '1045', feedback: { bulls: 1, cows: 1 } });

    const hint = await post('/api/hint', { gameId });
    expect(hint.body).toMatchObject({ guess: '1607', pool: 'universe' });
  });

  it('reports contradictions', async () => {
    const gameId = await newGame({ mode: 'solve' });
    await post('/api/guess', { gameId, guess: '0123', feedback: { bulls: 0, cows: 0 } });
    const turn = await post('/api/guess', {
      gameId,
      guess: '4567',
      feedback: { bulls: 0, cows: 0 },
    });
    expect(turn.body).toMatchObject({
      state: 'contradiction',
      remaining: 0,
      uncertainty: null,
      informationGained: null,
    });

    const hint = await post('/api/hint', { gameId });
    expect(hint.status).toBe(409);
    expect(errorKind(hint.body)).toBe('EmptyCandidateSet');
  });

  it('requires feedback', async () => {
    const gameId = await newGame({ mode: 'solve' });
    const res = await post('/api/guess', { gameId, guess: '0123' });
    expect(res.status).toBe(400);
    expect(errorKind(res.body)).toBe('MissingFeedback');
  });
});

describe('validation', () => {
  it('rejects guesses with repeated digits', async () => {
    const gameId = await newGame({});
    const res = await post('/api/guess', { gameId, guess: '1123' });
    expect(res.status).toBe(400);
  });

  it('rejects impossible feedback', async () => {
    const gameId = await newGame({ mode: 'solve' });
    const res = await post('/api/guess', {
      gameId,
      guess: '0123',
      feedback: { bulls: 3, cows: 1 },
    });
    expect(res.status).toBe(400);
  });

  it('returns 404 for unknown games', async () => {
    const res = await get('/api/game/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { kind: 'NotFound', message: 'Game not found' } });
  });

  it('rejects malformed JSON', async () => {
    const res = await fetch(`${base}/api/new`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { kind: 'BadRequest', message: 'Malformed JSON body' },
    });
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({ PORT: 3001, LOG_LEVEL: 'info', HINT_POOL: 'candidates' });
  });

  it('parses overrides', () => {
    expect(loadConfig({ PORT: '8080', LOG_LEVEL: 'debug', HINT_POOL: 'universe' })).toEqual({
      PORT: 8080,
      LOG_LEVEL: 'debug',
      HINT_POOL: 'universe',
    });
  });

  it('fails on invalid values', () => {
    expect(() => loadConfig({ HINT_POOL: 'everything' })).toThrow(/Invalid configuration/);
  });
});
