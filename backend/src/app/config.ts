/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - Tests build an AppConfig directly (see test/helpers/build-test-app.ts).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 * - Boolean flags accept only "true"/"false" (z.coerce.boolean would read "false" as true).
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('whispers-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Session (fixed lifetime from login)
  SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(604800).default(86400),

  // Base of the public inbox URL: {PUBLIC_BASE_URL}/inboxes/{id}
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:3000'),

  // Restrict PUT/DELETE /users/:id to the signed-in user themself
  USERS_REQUIRE_SELF: BooleanFlag,

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: BooleanFlag,
  SEED_USERNAME: z.string().min(1).default('demo'),
  SEED_EMAIL: z.string().email().default('demo@example.com'),
  SEED_PASSWORD: z.string().min(1).default('demo-password'),
  SEED_INBOX_NAME: z.string().min(1).default('general'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  sessionTtlSeconds: number;

  publicBaseUrl: string;

  users: {
    requireSelf: boolean;
  };

  seed: {
    enabled: boolean;
    username: string;
    email: string;
    password: string;
    inboxName: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,

    publicBaseUrl: parsed.PUBLIC_BASE_URL,

    users: {
      requireSelf: parsed.USERS_REQUIRE_SELF,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      username: parsed.SEED_USERNAME,
      email: parsed.SEED_EMAIL.toLowerCase(),
      password: parsed.SEED_PASSWORD,
      inboxName: parsed.SEED_INBOX_NAME,
    },
  };
}
