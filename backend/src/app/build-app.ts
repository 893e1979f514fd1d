/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 * - Runs the dev-only seed bootstrap.
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig) {
  const deps = buildDeps(config);
  const app = buildServer({ deps });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else if (!config.seed.password) {
      logger.warn('seed.skipped_missing_password', { flow, username: config.seed.username });
    } else {
      logger.info('seed.start', { flow, username: config.seed.username });

      const result = await runDevSeed({
        credentialStore: deps.accounts.credentialStore,
        passwordHasher: deps.passwordHasher,
        options: {
          username: config.seed.username,
          password: config.seed.password,
        },
      });

      logger.info('seed.done', { flow, username: config.seed.username, result });
    }
  }

  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
