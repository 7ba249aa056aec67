// apps/cli/src/main.ts
//
// Console entry point.
//
//   bulls-cows                 play against a random secret
//   bulls-cows --seed <text>   play against a reproducible secret
//   bulls-cows --universe      hints may suggest numbers already ruled out
//   bulls-cows --solve         think of a number and let the computer find it

import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { parseArgs } from 'node:util';

import { GameSession, SolverSession, seededCode } from '@bulls-cows/game-core';
import { playGame, solveGame, type Io } from './game.js';

function createIo(): { io: Io; close: () => void } {
  const rl = readline.createInterface({ input, output });
  const closed = new AbortController();
  rl.on('close', () => closed.abort());

  const io: Io = {
    async ask(prompt) {
      if (closed.signal.aborted) return null;
      try {
        return await rl.question(prompt, { signal: closed.signal });
      } catch (e) {
        if (closed.signal.aborted) return null;
        throw e;
      }
    },
    print: (line) => {
      output.write(`${line}\n`);
    },
  };
  return { io, close: () => rl.close() };
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      solve: { type: 'boolean', default: false },
      universe: { type: 'boolean', default: false },
      seed: { type: 'string' },
    },
  });
  const hintPool = values.universe ? 'universe' : 'candidates';

  const { io, close } = createIo();
  try {
    const outcome = values.solve
      ? await solveGame(io, new SolverSession({ hintPool }))
      : await playGame(
          io,
          new GameSession({
            hintPool,
            secret: values.seed === undefined ? undefined : seededCode(values.seed),
          }),
        );
    return outcome === 'contradiction' ? 2 : 0;
  } finally {
    close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  },
);
