#!/usr/bin/env npx tsx
/**
 * Daily Bar Collection CLI
 *
 * Pulls daily price history for a list of KRX instruments from the Kiwoom
 * REST API and writes per-instrument CSVs, a combined CSV and a run summary.
 *
 * Usage:
 *   npx tsx scripts/collect-daily-bars.ts [options]
 *
 * Options:
 *   --codes=005930,000660   Instruments to collect (default: active codes from the database)
 *   --market=KOSPI          Market filter when reading codes from the database
 *   --limit=50              Collect at most this many instruments
 *   --start=2024-01-01      First date of the range (default: 30 days before --end)
 *   --end=2024-01-31        Last date of the range (default: today, UTC)
 *   --help                  Show this help message
 */

import 'dotenv/config';
import { loadConfig } from '../src/config';
import { createPipeline } from '../src/pipeline';
import { Database, DateRange, resolveDateRange } from '../src/data';
import { Instrument, Market, MARKETS, RunSummary } from '../src/types';
import { logger, addDays, parseTradingDate, toTradingDate, ConfigurationError } from '../src/utils';

interface CliArgs {
  codes: string[] | null;
  market: Market | null;
  limit: number | null;
  start: string | null;
  end: string | null;
  help: boolean;
}

function isMarket(value: string): value is Market {
  return MARKETS.some((market) => market === value);
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    codes: null,
    market: null,
    limit: null,
    start: null,
    end: null,
    help: false,
  };

  for (const arg of args) {
    const [flag, value = ''] = arg.split('=');
    if (flag === '--help' || flag === '-h') {
      result.help = true;
    } else if (flag === '--codes') {
      result.codes = value
        .split(',')
        .map((code) => code.trim())
        .filter((code) => code.length > 0);
    } else if (flag === '--market') {
      const market = value.trim().toUpperCase();
      if (!isMarket(market)) {
        throw new ConfigurationError(`Unknown market "${value}" (expected ${MARKETS.join(', ')})`, 'market');
      }
      result.market = market;
    } else if (flag === '--limit') {
      const limit = parseInt(value, 10);
      if (!Number.isInteger(limit) || limit < 1) {
        throw new ConfigurationError(`--limit must be a positive integer, got "${value}"`, 'limit');
      }
      result.limit = limit;
    } else if (flag === '--start') {
      result.start = value;
    } else if (flag === '--end') {
      result.end = value;
    } else {
      throw new ConfigurationError(`Unknown option "${arg}"`, 'argv');
    }
  }

  return result;
}

/** The start date defaults to 30 days before the end date, which defaults to today (UTC). */
function resolveCliRange(args: CliArgs): DateRange {
  const end = args.end ?? toTradingDate(new Date());
  const endDate = parseTradingDate(end);
  if (endDate === null) {
    throw new ConfigurationError(`Invalid end date: "${end}"`, 'endDate');
  }
  return resolveDateRange(args.start ?? addDays(endDate, -30), endDate);
}

function showHelp(): void {
  console.log(`
Daily Bar Collection CLI
========================

Usage:
  npx tsx scripts/collect-daily-bars.ts [options]

Options:
  --codes=005930,000660   Instruments to collect (default: active codes from the database)
  --market=KOSPI          Market filter when reading codes from the database
  --limit=50              Collect at most this many instruments
  --start=2024-01-01      First date of the range (default: 30 days before --end)
  --end=2024-01-31        Last date of the range (default: today, UTC)
  --help                  Show this help message

Environment Variables:
  KIWOOM_APP_KEY          Kiwoom app key (required)
  KIWOOM_SECRET_KEY       Kiwoom secret key (required)
  KIWOOM_USE_TEST_SERVER  true for the mock server (default), false for production
  DATABASE_URL            PostgreSQL connection string (optional; enables upserts)
  OUTPUT_DIR              Where CSV and summary files are written
  `);
}

function printSummary(summary: RunSummary): void {
  console.log('\n=== Collection Summary ===');
  console.log(`Run:          ${summary.runId}`);
  console.log(`Range:        ${summary.startDate} → ${summary.endDate}`);
  console.log(`Instruments:  ${summary.succeeded}/${summary.totalInstruments} succeeded`);
  console.log(`Records:      ${summary.totalRecords}`);
  if (summary.coveredFrom && summary.coveredTo) {
    console.log(`Covered:      ${summary.coveredFrom} → ${summary.coveredTo}`);
  }
  if (summary.partial.length > 0) {
    console.log(`Partial:      ${summary.partial.join(', ')} (history cut short by an unreadable page)`);
  }
  if (summary.failed.length > 0) {
    console.log(`Failed (${summary.failed.length}):`);
    for (const failure of summary.failed) {
      console.log(`  ${failure.stockCode}  ${failure.errorType}: ${failure.message}`);
    }
  }
  if (summary.cancelled) {
    console.log(`Cancelled:    ${summary.notAttempted.length} instruments not attempted`);
  }
  console.log(`Summary file: ${summary.files.summary}`);
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    showHelp();
    return 0;
  }

  const range = resolveCliRange(args);
  const config = loadConfig();
  const database = config.database.url ? new Database(config.database.url) : null;

  try {
    if (database) {
      await database.connect();
    }

    let instruments: Instrument[];
    if (args.codes) {
      instruments = args.codes.map((stockCode) => ({
        stockCode,
        market: args.market ?? 'KOSPI',
        isActive: true,
        listingDate: null,
        delistingDate: null,
      }));
    } else if (database) {
      instruments = await database.listInstruments(args.market ?? undefined, true);
    } else {
      throw new ConfigurationError('Pass --codes or set DATABASE_URL to read instruments', 'codes');
    }

    if (args.limit !== null) {
      instruments = instruments.slice(0, args.limit);
    }

    const { orchestrator, aggregator } = createPipeline(config, { sink: database ?? undefined });

    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('CLI', 'Interrupt received; finishing the current instrument');
      controller.abort();
    });

    const { result, records } = await orchestrator.run(instruments, range.startDate, range.endDate, {
      signal: controller.signal,
    });
    const summary = await aggregator.finalize(result, records);
    printSummary(summary);

    return summary.failed.length > 0 || summary.cancelled ? 2 : 0;
  } finally {
    if (database) {
      await database.disconnect();
    }
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('CLI', 'Collection failed', { error: message });
    process.exit(1);
  });
