/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - Builds the explicit token issuer configuration (signing key + TTL) once,
 *   so the key is never read from a global anywhere else.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 * - store is a discriminated union: a Postgres store always has a databaseUrl.
 */

import 'dotenv/config';
import { z } from 'zod';

import type { TokenIssuerConfig } from '../shared/security/token-issuer';
import { SESSION_TOKEN_TTL_SECONDS } from '../modules/auth/auth.constants';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() treats "false" as true; parse the literal strings instead.
const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),

  CREDENTIAL_STORE: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().min(1).optional(),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('user-auth-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Session tokens (HS256)
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: BooleanFlagSchema,
  SEED_USERNAME: z.string().min(1).default('dev-user'),
  SEED_PASSWORD: z.string().min(1).optional(),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type StoreConfig = { driver: 'postgres'; databaseUrl: string } | { driver: 'memory' };

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  store: StoreConfig;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  token: TokenIssuerConfig;

  seed: {
    enabled: boolean;
    username: string;
    password: string | null;
  };
};

function buildStoreConfig(driver: 'postgres' | 'memory', databaseUrl: string | undefined): StoreConfig {
  if (driver === 'memory') return { driver };

  if (!databaseUrl) {
    throw new Error('DATABASE_URL is required when CREDENTIAL_STORE=postgres');
  }
  return { driver, databaseUrl };
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    store: buildStoreConfig(parsed.CREDENTIAL_STORE, parsed.DATABASE_URL),

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    token: {
      signingKey: parsed.JWT_SECRET,
      ttlSeconds: SESSION_TOKEN_TTL_SECONDS,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      username: parsed.SEED_USERNAME,
      password: parsed.SEED_PASSWORD ?? null,
    },
  };
}
