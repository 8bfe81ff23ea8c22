import { existsSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { Pool } from 'pg';
import { logger } from '../core/logger';

export const DEFAULT_MIGRATIONS_DIR = join(__dirname, '..', '..', 'migrations');

export interface MigrationReport {
  applied: string[];
  skipped: string[];
}

/**
 * Apply pending `.sql` files in name order, each in its own transaction,
 * recording them in `schema_migrations`.
 */
export async function runMigrations(pool: Pool, migrationsDir: string = DEFAULT_MIGRATIONS_DIR): Promise<MigrationReport> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `);

  if (!existsSync(migrationsDir)) {
    logger.warn({ migrationsDir }, 'Migrations directory not found');
    return { applied: [], skipped: [] };
  }

  const files = readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  const appliedRows = await pool.query<{ id: string }>('SELECT id FROM schema_migrations');
  const appliedSet = new Set(appliedRows.rows.map((row) => row.id));
  const report: MigrationReport = { applied: [], skipped: [] };

  for (const file of files) {
    if (appliedSet.has(file)) {
      report.skipped.push(file);
      continue;
    }

    const sql = readFileSync(join(migrationsDir, file), 'utf8');
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (id) VALUES ($1)', [file]);
      await client.query('COMMIT');
      report.applied.push(file);
      logger.info({ migration: file }, 'Migration applied');
    } catch (error) {
      logger.error({ error, migration: file }, 'Migration failed');
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  return report;
}
