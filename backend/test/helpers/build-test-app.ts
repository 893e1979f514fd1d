import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { SESSION_TOKEN_TTL_SECONDS } from '../../src/modules/auth/auth.constants';

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Seed is OFF by default.
 * - Always the in-memory credential store: no database, no network.
 */
export async function buildTestApp(overrides: Partial<AppConfig> = {}) {
  const baseConfig: AppConfig = {
    nodeEnv: 'test',
    port: 0,

    store: { driver: 'memory' },

    logLevel: process.env.LOG_LEVEL ?? 'error',
    serviceName: process.env.SERVICE_NAME ?? 'user-auth-backend',

    // lowest valid bcrypt cost; tests don't need a real work factor
    bcryptCost: 4,

    token: {
      signingKey: 'test-secret-signing-key',
      ttlSeconds: SESSION_TOKEN_TTL_SECONDS,
    },

    seed: {
      enabled: false, // IMPORTANT: OFF in tests by default
      username: 'dev-user',
      password: null,
    },
  };

  const config: AppConfig = {
    ...baseConfig,
    ...overrides,
    // ensure nested objects merge correctly
    token: {
      ...baseConfig.token,
      ...(overrides.token ?? {}),
    },
    seed: {
      ...baseConfig.seed,
      ...(overrides.seed ?? {}),
    },
  };

  const built = await buildApp(config);

  return {
    app: built.app,
    deps: built.deps,
    config,
    close: built.close,
  };
}
