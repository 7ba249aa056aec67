// apps/server/src/index.ts
//
// Boots the Bulls & Cows HTTP API.
//
// All game state lives only in memory: restarting the process loses every
// game in progress.

import 'dotenv/config';
import { pino } from 'pino';

import { createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const log = pino({ level: config.LOG_LEVEL });
const app = createApp({ logger: log, hintPool: config.HINT_POOL });

app.listen(config.PORT, () =>
  log.info({ port: config.PORT, hintPool: config.HINT_POOL }, 'server up'),
);
