import { EventEmitter } from 'events';
import {
  BarRecord,
  BarSink,
  Instrument,
  InstrumentOutcome,
  InstrumentState,
  RunProgress,
  RunResult,
  SessionToken,
} from '../types';
import { DailyPriceSource, SessionProvider, Continuation, DailyPricePage, asDailyPriceRow } from '../kiwoom';
import {
  logger,
  Clock,
  systemClock,
  AuthenticationError,
  CollectorError,
  ConfigurationError,
  DataError,
  ErrorCode,
  handleError,
  parseTradingDate,
  formatRunTimestamp,
  TradingDate,
} from '../utils';
import { normalizeDailyPrices } from './normalizer';

export const DAILY_BARS_TABLE = 'kr_stock_daily_bars';

export interface DateRange {
  startDate: TradingDate;
  endDate: TradingDate;
}

export interface CollectorOptions {
  maxPages?: number;
  sink?: BarSink;
  sinkTable?: string;
  clock?: Clock;
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: string;
}

export interface CollectionRun {
  result: RunResult;
  records: BarRecord[];
}

interface FetchedHistory {
  rows: unknown[];
  pages: number;
  partial: boolean;
}

/** Rejects malformed or inverted ranges before anything touches the network. */
export function resolveDateRange(startDate: string, endDate: string): DateRange {
  const start = parseTradingDate(startDate);
  if (start === null) {
    throw new ConfigurationError(`Invalid start date: "${startDate}"`, 'startDate');
  }
  const end = parseTradingDate(endDate);
  if (end === null) {
    throw new ConfigurationError(`Invalid end date: "${endDate}"`, 'endDate');
  }
  if (start > end) {
    throw new ConfigurationError(`Start date ${start} is after end date ${end}`, 'startDate');
  }
  return { startDate: start, endDate: end };
}

function oldestDate(rows: readonly unknown[]): TradingDate | null {
  let oldest: TradingDate | null = null;
  for (const value of rows) {
    const raw = asDailyPriceRow(value)?.['date'];
    const date = typeof raw === 'string' ? parseTradingDate(raw) : null;
    if (date !== null && (oldest === null || date < oldest)) {
      oldest = date;
    }
  }
  return oldest;
}

/**
 * Walks an instrument list one instrument at a time, pulling each one's
 * daily history for a date range.
 *
 * Events:
 * - `stateChange` `{ stockCode, state }` as an instrument moves through
 *   PENDING → FETCHING → NORMALIZING → DONE, or to FAILED
 * - `progress` {@link RunProgress} after each instrument
 */
export class CollectionOrchestrator extends EventEmitter {
  private source: DailyPriceSource;
  private session: SessionProvider;
  private sink?: BarSink;
  private sinkTable: string;
  private maxPages: number;
  private clock: Clock;
  private token: SessionToken | null = null;
  private isRunning = false;

  constructor(source: DailyPriceSource, session: SessionProvider, options: CollectorOptions = {}) {
    super();
    this.source = source;
    this.session = session;
    this.sink = options.sink;
    this.sinkTable = options.sinkTable ?? DAILY_BARS_TABLE;
    this.maxPages = options.maxPages ?? 20;
    this.clock = options.clock ?? systemClock;
  }

  async run(
    instruments: readonly Instrument[],
    startDate: string,
    endDate: string,
    options: RunOptions = {}
  ): Promise<CollectionRun> {
    const range = resolveDateRange(startDate, endDate);

    if (this.isRunning) {
      throw new CollectorError(ErrorCode.SYSTEM_ERROR, 'A collection run is already in progress');
    }
    this.isRunning = true;

    const startedAtMs = this.clock.now();
    const startedAt = new Date(startedAtMs);
    const runId = options.runId ?? `run-${formatRunTimestamp(startedAt)}`;
    const queue = this.uniqueInstruments(instruments);
    const outcomes: InstrumentOutcome[] = [];
    const records: BarRecord[] = [];
    let notAttempted: string[] = [];
    let cancelled = false;

    logger.setRunId(runId);
    logger.info('Collector', 'Starting collection run', {
      instruments: queue.length,
      startDate: range.startDate,
      endDate: range.endDate,
    });

    try {
      for (let i = 0; i < queue.length; i++) {
        if (options.signal?.aborted) {
          cancelled = true;
          notAttempted = queue.slice(i).map((instrument) => instrument.stockCode);
          logger.warn('Collector', 'Run cancelled; remaining instruments not attempted', {
            remaining: notAttempted.length,
          });
          break;
        }

        const outcome = await this.collectInstrument(queue[i], range, records);
        outcomes.push(outcome);
        this.emitProgress(runId, outcome, i + 1, queue.length, startedAtMs);
      }
    } finally {
      this.isRunning = false;
      logger.clearRunId();
    }

    const result: RunResult = {
      runId,
      startedAt,
      finishedAt: new Date(this.clock.now()),
      startDate: range.startDate,
      endDate: range.endDate,
      totalInstruments: queue.length,
      outcomes,
      notAttempted,
      cancelled,
    };

    const failed = outcomes.filter((outcome) => outcome.status === 'FAILED').length;
    logger.info('Collector', 'Collection run finished', {
      runId,
      succeeded: outcomes.length - failed,
      failed,
      records: records.length,
      cancelled,
    });

    return { result, records };
  }

  private uniqueInstruments(instruments: readonly Instrument[]): Instrument[] {
    const seen = new Set<string>();
    const unique: Instrument[] = [];
    for (const instrument of instruments) {
      if (seen.has(instrument.stockCode)) {
        logger.warn('Collector', `Ignoring duplicate instrument ${instrument.stockCode}`);
        continue;
      }
      seen.add(instrument.stockCode);
      unique.push(instrument);
    }
    return unique;
  }

  private async collectInstrument(
    instrument: Instrument,
    range: DateRange,
    runRecords: BarRecord[]
  ): Promise<InstrumentOutcome> {
    const { stockCode } = instrument;
    this.transition(stockCode, 'PENDING');
    this.transition(stockCode, 'FETCHING');

    let history: FetchedHistory;
    try {
      history = await this.fetchHistory(instrument, range);
    } catch (error) {
      return this.fail(stockCode, error);
    }

    this.transition(stockCode, 'NORMALIZING');
    const { records, dropped } = normalizeDailyPrices(history.rows, instrument);

    const byDate = new Map<TradingDate, BarRecord>();
    for (const record of records) {
      if (record.date < range.startDate || record.date > range.endDate) continue;
      if (!byDate.has(record.date)) {
        byDate.set(record.date, record);
      }
    }
    const kept = [...byDate.values()];

    if (this.sink && kept.length > 0) {
      try {
        await this.sink.upsert(this.sinkTable, kept);
      } catch (error) {
        return this.fail(stockCode, error);
      }
    }

    runRecords.push(...kept);
    this.transition(stockCode, 'DONE');

    if (kept.length === 0) {
      logger.info('Collector', `No bars for ${stockCode} in range`, { ...range });
    }

    return {
      stockCode,
      status: 'DONE',
      recordCount: kept.length,
      droppedRows: dropped.length,
      pages: history.pages,
      partial: history.partial,
    };
  }

  /**
   * Pages backward from the end date until the provider runs out, a page
   * reaches past the start date, or the page limit is hit. An unreadable
   * page after the first ends the walk with the rows already fetched.
   */
  private async fetchHistory(instrument: Instrument, range: DateRange): Promise<FetchedHistory> {
    const rows: unknown[] = [];
    let continuation: Continuation | undefined;
    let pages = 0;
    let refreshed = false;

    while (pages < this.maxPages) {
      const token = await this.ensureToken();
      let page: DailyPricePage;

      try {
        page = await this.source.fetchDailyPrices(instrument.stockCode, range.endDate, token, continuation);
      } catch (error) {
        if (error instanceof DataError && pages > 0) {
          logger.warn('Collector', `Unreadable page ${pages + 1} for ${instrument.stockCode}; keeping ${pages} earlier pages`, {
            error: error.message,
          });
          return { rows, pages, partial: true };
        }
        if (!(error instanceof AuthenticationError) || refreshed) {
          throw error;
        }
        refreshed = true;
        logger.warn('Collector', `Token rejected while fetching ${instrument.stockCode}; reacquiring once`, {
          status: error.status,
        });
        this.token = null;
        this.token = await this.session.acquire();
        continue;
      }

      refreshed = false;
      pages++;
      rows.push(...page.rows);

      const oldest = oldestDate(page.rows);
      if (!page.continuation.hasMore || page.rows.length === 0 || (oldest !== null && oldest <= range.startDate)) {
        return { rows, pages, partial: false };
      }
      continuation = page.continuation;
    }

    logger.warn('Collector', `Page limit reached for ${instrument.stockCode}; older history not fetched`, {
      maxPages: this.maxPages,
    });
    return { rows, pages, partial: false };
  }

  private async ensureToken(): Promise<SessionToken> {
    if (this.token && this.session.isValid(this.token)) {
      return this.token;
    }
    this.token = await this.session.acquire();
    return this.token;
  }

  private fail(stockCode: string, error: unknown): InstrumentOutcome {
    const normalized = error instanceof Error ? error : handleError(error);
    this.transition(stockCode, 'FAILED');
    logger.warn('Collector', `Instrument ${stockCode} failed`, {
      errorType: normalized.name,
      error: normalized.message,
    });
    return {
      stockCode,
      status: 'FAILED',
      reason: { errorType: normalized.name, message: normalized.message },
    };
  }

  private transition(stockCode: string, state: InstrumentState): void {
    logger.debug('Collector', `${stockCode} → ${state}`);
    this.emit('stateChange', { stockCode, state });
  }

  private emitProgress(
    runId: string,
    outcome: InstrumentOutcome,
    processed: number,
    total: number,
    startedAtMs: number
  ): void {
    const elapsedMs = this.clock.now() - startedAtMs;
    const progress: RunProgress = {
      runId,
      stockCode: outcome.stockCode,
      status: outcome.status,
      processed,
      total,
      elapsedMs,
      estimatedRemainingMs: Math.round((elapsedMs / processed) * (total - processed)),
    };

    logger.progress(`${processed}/${total} ${outcome.stockCode} ${outcome.status}`, {
      elapsedMs,
      estimatedRemainingMs: progress.estimatedRemainingMs,
    });
    this.emit('progress', progress);
  }
}
