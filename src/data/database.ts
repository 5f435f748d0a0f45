import { Pool, PoolConfig } from 'pg';
import { z } from 'zod';
import { BarRecord, BarSink, Instrument, InstrumentSource, Market, MARKETS } from '../types';
import { logger, ConfigurationError, DatabaseError } from '../utils';
import { FIELD_MAPPINGS } from './normalizer';

export const INSTRUMENTS_TABLE = 'kr_stock_codes';

/** The part of `pg.Pool` this module uses. */
export interface PgPoolLike {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

export interface PgClientLike {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(): void;
}

const instrumentRowSchema = z.object({
  stock_code: z.union([z.string(), z.number()]),
  stock_market: z.string(),
  ipo_date: z.string().nullable(),
  delisting_date: z.string().nullable(),
  is_active: z.boolean(),
});

const BAR_COLUMNS = ['stock_code', 'date', ...FIELD_MAPPINGS.map((mapping) => mapping.column)];
const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

function isMarket(value: string): value is Market {
  return MARKETS.some((market) => market === value);
}

function barUpsertSql(table: string): string {
  const placeholders = BAR_COLUMNS.map((_, i) => `$${i + 1}`).join(', ');
  const updates = BAR_COLUMNS.slice(2)
    .map((column) => `${column} = EXCLUDED.${column}`)
    .join(', ');
  return `INSERT INTO ${table} (${BAR_COLUMNS.join(', ')})
       VALUES (${placeholders})
       ON CONFLICT (stock_code, date) DO UPDATE SET ${updates}`;
}

function barValues(record: BarRecord): unknown[] {
  return [record.stockCode, record.date, ...FIELD_MAPPINGS.map((mapping) => record[mapping.field])];
}

function createPool(connectionString: string): Pool {
  const poolConfig: PoolConfig = {
    connectionString,
    ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
    max: parseInt(process.env.DB_POOL_MAX || '5', 10),
    idleTimeoutMillis: parseInt(process.env.DB_IDLE_TIMEOUT || '30000', 10),
    connectionTimeoutMillis: parseInt(process.env.DB_CONNECT_TIMEOUT || '5000', 10),
  };

  const pool = new Pool(poolConfig);
  pool.on('error', (err) => {
    logger.error('Database', 'Unexpected pool error', { error: err.message });
  });
  return pool;
}

export class Database implements BarSink, InstrumentSource {
  private pool: PgPoolLike;

  constructor(source: string | PgPoolLike) {
    this.pool = typeof source === 'string' ? createPool(source) : source;
  }

  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
      logger.info('Database', 'Connected to PostgreSQL');
    } catch (error) {
      logger.error('Database', 'Failed to connect to PostgreSQL', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw new DatabaseError('Failed to connect to database');
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    logger.info('Database', 'Disconnected from PostgreSQL');
  }

  // ===== DAILY BARS =====

  async upsert(tableKey: string, records: BarRecord[]): Promise<void> {
    if (!IDENTIFIER.test(tableKey)) {
      throw new ConfigurationError(`Invalid table name: "${tableKey}"`, 'tableKey');
    }
    if (records.length === 0) return;

    const sql = barUpsertSql(tableKey);
    await this.inTransaction(`upsert ${records.length} rows into ${tableKey}`, async (client) => {
      for (const record of records) {
        await client.query(sql, barValues(record));
      }
    });

    logger.debug('Database', `Upserted ${records.length} rows`, { table: tableKey, stockCode: records[0].stockCode });
  }

  // ===== INSTRUMENTS =====

  async listInstruments(market?: Market, activeOnly: boolean = true): Promise<Instrument[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (market) {
      params.push(market);
      conditions.push(`stock_market = $${params.length}`);
    }
    if (activeOnly) {
      conditions.push('is_active = TRUE');
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.pool.query(
      `SELECT stock_code, stock_market,
              to_char(ipo_date, 'YYYY-MM-DD') AS ipo_date,
              to_char(delisting_date, 'YYYY-MM-DD') AS delisting_date,
              is_active
       FROM ${INSTRUMENTS_TABLE} ${where}
       ORDER BY stock_code`,
      params
    );

    const instruments: Instrument[] = [];
    for (const raw of result.rows) {
      const parsed = instrumentRowSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn('Database', 'Skipping unreadable instrument row', { issues: parsed.error.issues.length });
        continue;
      }
      const row = parsed.data;
      if (!isMarket(row.stock_market)) {
        logger.warn('Database', `Skipping ${row.stock_code}: unknown market "${row.stock_market}"`);
        continue;
      }
      instruments.push({
        // Older tables stored the code as an integer, losing leading zeros
        stockCode: String(row.stock_code).padStart(6, '0'),
        market: row.stock_market,
        isActive: row.is_active,
        listingDate: row.ipo_date,
        delistingDate: row.delisting_date,
      });
    }
    return instruments;
  }

  /**
   * New codes are inserted; existing ones only have their active flag and
   * delisting date refreshed. Nothing is ever deleted.
   */
  async upsertInstruments(instruments: Instrument[]): Promise<void> {
    if (instruments.length === 0) return;

    await this.inTransaction(`upsert ${instruments.length} instruments`, async (client) => {
      for (const instrument of instruments) {
        await client.query(
          `INSERT INTO ${INSTRUMENTS_TABLE} (stock_code, stock_market, ipo_date, delisting_date, is_active, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, CURRENT_DATE, CURRENT_DATE)
           ON CONFLICT (stock_code) DO UPDATE SET
           is_active = EXCLUDED.is_active, delisting_date = EXCLUDED.delisting_date, updated_at = CURRENT_DATE`,
          [
            instrument.stockCode,
            instrument.market,
            instrument.listingDate,
            instrument.delistingDate,
            instrument.isActive,
          ]
        );
      }
    });

    logger.info('Database', `Upserted ${instruments.length} instruments`);
  }

  private async inTransaction(label: string, work: (client: PgClientLike) => Promise<void>): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await work(client);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw new DatabaseError(`Failed to ${label}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      client.release();
    }
  }
}
