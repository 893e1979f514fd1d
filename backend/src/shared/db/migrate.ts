/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations in DEV reliably.
 * - TS migrations live in: src/shared/db/migrations
 * - We run this file with `tsx`, so dynamic imports of `.ts` migrations work.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace=@user-auth/backend
 */

import 'dotenv/config';

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { readdir } from 'node:fs/promises';

import { Migrator, type Migration, type MigrationProvider } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';
import { serializeError } from '../logger/serialize-error';

function isMigration(mod: unknown): mod is Migration {
  return (
    typeof mod === 'object' &&
    mod !== null &&
    'up' in mod &&
    typeof mod.up === 'function' &&
    (!('down' in mod) || typeof mod.down === 'function')
  );
}

class SourceMigrationProvider implements MigrationProvider {
  constructor(private readonly migrationsDir: string) {}

  async getMigrations(): Promise<Record<string, Migration>> {
    const files = (await readdir(this.migrationsDir)).filter((f) => f.endsWith('.ts')).sort();

    logger.info('Found migration files', { count: files.length, files });

    const migrations: Record<string, Migration> = {};

    for (const file of files) {
      const url = pathToFileURL(path.join(this.migrationsDir, file)).href;

      // tsx will allow importing TS here
      const mod: unknown = await import(url);
      if (!isMigration(mod)) {
        throw new Error(`Migration ${file} must export an up() function`);
      }

      migrations[file.replace(/\.ts$/, '')] = mod;
    }

    return migrations;
  }
}

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  if (config.store.driver !== 'postgres') {
    throw new Error('Migrations need CREDENTIAL_STORE=postgres and DATABASE_URL');
  }

  const db = createDb(config.store.databaseUrl);

  // IMPORTANT:
  // We point directly to the SOURCE migrations folder.
  // This avoids any dist/path confusion.
  const migrator = new Migrator({
    db,
    provider: new SourceMigrationProvider(path.join(process.cwd(), 'src/shared/db/migrations')),
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('Migration failed', { err: serializeError(error) });
    process.exit(1);
  }

  logger.info('Migrations up to date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('Migration failed', { err: serializeError(err) });
  process.exit(1);
});
