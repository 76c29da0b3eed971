import { readdir, readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { query, with_transaction, close_pool } from './index.js';
import { logger, error_meta } from '../lib/logger.js';

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), 'migrations');

async function load_applied(): Promise<Set<string>> {
  await query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);
  const result = await query<{ filename: string }>('SELECT filename FROM schema_migrations ORDER BY id');
  return new Set(result.rows.map((row) => row.filename));
}

export async function list_pending_migrations(applied: Set<string>): Promise<string[]> {
  const files = await readdir(MIGRATIONS_DIR);
  return files.filter((file) => file.endsWith('.sql') && !applied.has(file)).sort();
}

async function apply_migration(filename: string): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, filename), 'utf-8');

  await with_transaction(async (client) => {
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [filename]);
  });

  logger.info('migration applied', { filename });
}

export async function run_migrations(): Promise<void> {
  const pending = await list_pending_migrations(await load_applied());

  if (pending.length === 0) {
    logger.info('no pending migrations');
    return;
  }

  logger.info('applying migrations', { count: pending.length, files: pending });
  for (const filename of pending) {
    await apply_migration(filename);
  }
  logger.info('migrations complete', { applied: pending.length });
}

const is_main = process.argv[1]?.endsWith('migrate.ts') || process.argv[1]?.endsWith('migrate.js');
if (is_main) {
  run_migrations()
    .then(() => close_pool())
    .catch((err: unknown) => {
      logger.error('migration failed', error_meta(err));
      process.exit(1);
    });
}
