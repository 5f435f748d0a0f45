import Papa from 'papaparse';
import { z } from 'zod';
import { Instrument } from '../types';
import { logger, parseTradingDate, DataError, TradingDate } from '../utils';

export const INSTRUMENT_CSV_COLUMNS = ['stock_code', 'stock_market', 'ipo_date', 'delisting_date', 'is_active'] as const;

const optionalDate = z
  .string()
  .trim()
  .transform((value, ctx): TradingDate | null => {
    if (value === '') return null;
    const date = parseTradingDate(value);
    if (date === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date "${value}"` });
      return z.NEVER;
    }
    return date;
  });

const instrumentCsvRowSchema = z.object({
  stock_code: z
    .string()
    .trim()
    .regex(/^[0-9A-Z]{1,6}$/, 'must be up to 6 digits or capitals')
    .transform((code) => code.padStart(6, '0')),
  stock_market: z.string().trim().toUpperCase().pipe(z.enum(['KOSPI', 'KOSDAQ', 'KONEX'])),
  ipo_date: optionalDate,
  delisting_date: optionalDate,
  is_active: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 't', 'f']))
    .transform((flag) => flag === 'true' || flag === '1' || flag === 't'),
});

export interface RejectedInstrumentRow {
  line: number;
  reason: string;
}

export interface InstrumentImport {
  instruments: Instrument[];
  rejected: RejectedInstrumentRow[];
}

/**
 * Reads a `stock_code,stock_market,ipo_date,delisting_date,is_active` CSV.
 * Columns may appear in any order and extra columns are ignored; unreadable
 * rows are reported by line number (header is line 1) and skipped. A later
 * row for the same code replaces an earlier one.
 */
export function parseInstrumentCsv(text: string): InstrumentImport {
  const parsed = Papa.parse<Record<string, string | undefined>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: true,
    transformHeader: (column) => column.trim().toLowerCase(),
  });

  const fields = parsed.meta.fields ?? [];
  const missing = INSTRUMENT_CSV_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new DataError(`Instrument CSV is missing columns: ${missing.join(', ')}`, { missing });
  }

  const byCode = new Map<string, Instrument>();
  const rejected: RejectedInstrumentRow[] = [];

  parsed.data.forEach((record, index) => {
    const line = index + 2;
    const raw: Record<string, string> = {};
    for (const column of INSTRUMENT_CSV_COLUMNS) {
      raw[column] = record[column] ?? '';
    }

    const result = instrumentCsvRowSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      rejected.push({ line, reason: `${issue.path.join('.')}: ${issue.message}` });
      return;
    }

    const row = result.data;
    byCode.set(row.stock_code, {
      stockCode: row.stock_code,
      market: row.stock_market,
      isActive: row.is_active,
      listingDate: row.ipo_date,
      delistingDate: row.delisting_date,
    });
  });

  if (rejected.length > 0) {
    logger.warn('InstrumentImport', `Skipped ${rejected.length} unreadable rows`, {
      firstLine: rejected[0].line,
      reason: rejected[0].reason,
    });
  }

  return { instruments: [...byCode.values()], rejected };
}
