#!/usr/bin/env npx tsx
/**
 * Instrument Reference Import
 *
 * Loads a `stock_code,stock_market,ipo_date,delisting_date,is_active` CSV
 * into kr_stock_codes. Existing codes keep their row and have only their
 * active flag and delisting date refreshed.
 *
 * Usage:
 *   npx tsx scripts/import-instruments.ts <file.csv> [--dry-run]
 */

import 'dotenv/config';
import { readFile } from 'fs/promises';
import { Database, parseInstrumentCsv } from '../src/data';
import { logger, ConfigurationError } from '../src/utils';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const dryRun = args.includes('--dry-run');
  const file = args.find((arg) => !arg.startsWith('--'));

  if (!file) {
    throw new ConfigurationError('Usage: import-instruments.ts <file.csv> [--dry-run]', 'file');
  }

  const { instruments, rejected } = parseInstrumentCsv(await readFile(file, 'utf-8'));
  console.log(`Read ${instruments.length} instruments from ${file} (${rejected.length} rows rejected)`);
  for (const row of rejected) {
    console.log(`  line ${row.line}: ${row.reason}`);
  }

  if (dryRun) {
    console.log('Dry run: nothing written');
    return;
  }

  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new ConfigurationError('DATABASE_URL is required', 'DATABASE_URL');
  }

  const database = new Database(databaseUrl);
  await database.connect();
  try {
    await database.upsertInstruments(instruments);
  } finally {
    await database.disconnect();
  }

  console.log(`Upserted ${instruments.length} instruments`);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error('CLI', 'Instrument import failed', { error: message });
  process.exit(1);
});
