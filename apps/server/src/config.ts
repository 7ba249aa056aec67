// apps/server/src/config.ts
//
// Server configuration from the environment (.env is loaded by the entry
// point via dotenv/config before this runs).
//
//   PORT       → HTTP port (default 3001)
//   LOG_LEVEL  → pino level (default "info")
//   HINT_POOL  → "candidates" | "universe" (default "candidates"); games may
//                override it per request

import { z } from 'zod';
import { hintPoolSchema } from '@bulls-cows/protocol';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  HINT_POOL: hintPoolSchema.default('candidates'),
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}
