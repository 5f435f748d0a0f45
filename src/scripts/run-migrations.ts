import 'dotenv/config';
import { Pool } from 'pg';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { logger } from '../utils';

const executedRowSchema = z.object({ filename: z.string() });

async function runMigrations(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    logger.error('Migrations', 'DATABASE_URL not set');
    process.exit(1);
  }

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : undefined,
  });

  try {
    await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id SERIAL PRIMARY KEY,
        filename VARCHAR(255) NOT NULL UNIQUE,
        executed_at TIMESTAMPTZ DEFAULT NOW()
      )
    `);

    const result = await pool.query('SELECT filename FROM schema_migrations');
    const executed = new Set(result.rows.map((row: unknown) => executedRowSchema.parse(row).filename));

    // migrations/ sits at the project root, two levels above src/scripts and dist/src/scripts alike
    const migrationsDir = [join(__dirname, '..', '..', 'migrations'), join(__dirname, '..', '..', '..', 'migrations')].find(
      (dir) => {
        try {
          readdirSync(dir);
          return true;
        } catch {
          return false;
        }
      }
    );
    if (!migrationsDir) {
      throw new Error('migrations directory not found');
    }

    const files = readdirSync(migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();

    logger.info('Migrations', `Found ${files.length} migration files`);

    for (const file of files) {
      if (executed.has(file)) {
        logger.info('Migrations', `Skipping ${file} (already executed)`);
        continue;
      }

      logger.info('Migrations', `Running migration: ${file}`);
      const sql = readFileSync(join(migrationsDir, file), 'utf-8');

      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
        await client.query('COMMIT');
        logger.info('Migrations', `Completed: ${file}`);
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    }

    logger.info('Migrations', 'All migrations completed successfully');
  } finally {
    await pool.end();
  }
}

runMigrations()
  .then(() => {
    process.exit(0);
  })
  .catch((err: unknown) => {
    logger.error('Migrations', 'Migration failed', { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
