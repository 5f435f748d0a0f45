import { BarField, BarRecord, Instrument } from '../types';
import { KiwoomDailyPriceRow, asDailyPriceRow } from '../kiwoom/types';
import { logger, parseTradingDate } from '../utils';

/**
 * `unsigned` fields arrive with a direction marker (`+36600` means "up from
 * the previous close", not a signed price) which is discarded. `signed`
 * fields keep their sign.
 */
type SignPolicy = 'unsigned' | 'signed';

interface FieldMapping {
  field: BarField;
  column: string;
  source: string;
  sign: SignPolicy;
}

export const FIELD_MAPPINGS = [
  { field: 'openPrice', column: 'open_price', source: 'open_pric', sign: 'unsigned' },
  { field: 'highPrice', column: 'high_price', source: 'high_pric', sign: 'unsigned' },
  { field: 'lowPrice', column: 'low_price', source: 'low_pric', sign: 'unsigned' },
  { field: 'closePrice', column: 'close_price', source: 'close_pric', sign: 'unsigned' },
  { field: 'priceChange', column: 'price_change', source: 'pred_rt', sign: 'signed' },
  { field: 'fluctuationRate', column: 'fluctuation_rate', source: 'flu_rt', sign: 'signed' },
  { field: 'volume', column: 'volume', source: 'trde_qty', sign: 'unsigned' },
  { field: 'amount', column: 'amount', source: 'amt_mn', sign: 'unsigned' },
  { field: 'creditRate', column: 'credit_rate', source: 'crd_rt', sign: 'signed' },
  { field: 'foreignRate', column: 'foreign_rate', source: 'for_rt', sign: 'signed' },
  { field: 'foreignPossession', column: 'foreign_possession', source: 'for_poss', sign: 'signed' },
  { field: 'foreignWeight', column: 'foreign_weight', source: 'for_wght', sign: 'signed' },
] as const satisfies readonly FieldMapping[];

const NUMERIC = /^[+-]?\d+(\.\d+)?$/;

/**
 * "+1,234.5" → 1234.5, "-500" → -500, "" → null. Anything that is not a
 * plain decimal after removing separators is null.
 */
export function parseNumeric(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const cleaned = value.trim().replace(/,/g, '');
  if (!NUMERIC.test(cleaned)) return null;
  return Number(cleaned);
}

export interface DroppedRow {
  index: number;
  rawDate: unknown;
  reason: string;
}

export interface NormalizeResult {
  records: BarRecord[];
  dropped: DroppedRow[];
}

export function normalizeRow(row: KiwoomDailyPriceRow, stockCode: string): BarRecord | null {
  const rawDate = row['date'];
  const date = typeof rawDate === 'string' ? parseTradingDate(rawDate) : null;
  if (date === null) return null;

  const record: BarRecord = {
    stockCode,
    date,
    openPrice: null,
    highPrice: null,
    lowPrice: null,
    closePrice: null,
    priceChange: null,
    fluctuationRate: null,
    volume: null,
    amount: null,
    creditRate: null,
    foreignRate: null,
    foreignPossession: null,
    foreignWeight: null,
  };

  for (const mapping of FIELD_MAPPINGS) {
    const parsed = parseNumeric(row[mapping.source]);
    record[mapping.field] = parsed !== null && mapping.sign === 'unsigned' ? Math.abs(parsed) : parsed;
  }

  return record;
}

/**
 * Maps one page of provider rows onto the canonical bar schema. A row that
 * is not an object or has an unreadable date is dropped and reported; the
 * rest of the page is kept.
 */
export function normalizeDailyPrices(
  rows: readonly unknown[],
  instrument: Pick<Instrument, 'stockCode'>
): NormalizeResult {
  const records: BarRecord[] = [];
  const dropped: DroppedRow[] = [];

  rows.forEach((value, index) => {
    const row = asDailyPriceRow(value);
    if (row === null) {
      dropped.push({ index, rawDate: undefined, reason: 'not an object' });
      logger.warn('Normalizer', `Dropping row ${index} for ${instrument.stockCode}: not an object`, {
        received: value === null ? 'null' : typeof value,
      });
      return;
    }

    const record = normalizeRow(row, instrument.stockCode);
    if (record) {
      records.push(record);
      return;
    }

    const rawDate = row['date'];
    dropped.push({ index, rawDate, reason: 'unparseable date' });
    logger.warn('Normalizer', `Dropping row ${index} for ${instrument.stockCode}: unparseable date`, {
      rawDate: typeof rawDate === 'string' ? rawDate : String(rawDate),
    });
  });

  return { records, dropped };
}
