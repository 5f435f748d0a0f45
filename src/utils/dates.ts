/** Calendar date in `YYYY-MM-DD` form. Lexicographic order is chronological order. */
export type TradingDate = string;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Accepts `YYYYMMDD` (the provider's format) or `YYYY-MM-DD`. Returns null for
 * anything that is not a real calendar date, e.g. `20240230`.
 */
export function parseTradingDate(input: string): TradingDate | null {
  const trimmed = input.trim();
  const match = ISO_DATE.exec(trimmed) ?? COMPACT_DATE.exec(trimmed);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

export function isTradingDate(value: string): value is TradingDate {
  return ISO_DATE.test(value) && parseTradingDate(value) === value;
}

export function toCompactDate(date: TradingDate): string {
  return date.replace(/-/g, '');
}

export function toTradingDate(date: Date): TradingDate {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** Takes either date form. Throws a RangeError for a date {@link parseTradingDate} rejects. */
export function addDays(date: string, days: number): TradingDate {
  const parsed = parseTradingDate(date);
  if (parsed === null) {
    throw new RangeError(`Invalid trading date "${date}"`);
  }
  const [year, month, day] = parsed.split('-').map(Number);
  return toTradingDate(new Date(Date.UTC(year, month - 1, day + days)));
}

/** `YYYYMMDD_HHmmss` in UTC, used to name a run's combined output. */
export function formatRunTimestamp(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}
