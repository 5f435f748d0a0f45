import type { TradingDate } from '../utils/dates';

// Reference data

export type Market = 'KOSPI' | 'KOSDAQ' | 'KONEX';

export const MARKETS: readonly Market[] = ['KOSPI', 'KOSDAQ', 'KONEX'];

export interface Instrument {
  stockCode: string;             // 6-character exchange code, e.g. "005930"
  market: Market;
  isActive: boolean;
  listingDate: TradingDate | null;
  delistingDate: TradingDate | null;
}

// Session

export interface SessionToken {
  value: string;
  tokenType: string;
  issuedAt: number;              // epoch ms
  expiresAt: number;             // epoch ms
}

// Price history

export interface BarRecord {
  stockCode: string;
  date: TradingDate;
  openPrice: number | null;
  highPrice: number | null;
  lowPrice: number | null;
  closePrice: number | null;
  priceChange: number | null;
  fluctuationRate: number | null;
  volume: number | null;
  amount: number | null;
  creditRate: number | null;
  foreignRate: number | null;
  foreignPossession: number | null;
  foreignWeight: number | null;
}

export type BarField = Exclude<keyof BarRecord, 'stockCode' | 'date'>;

// Collection run

export type InstrumentState = 'PENDING' | 'FETCHING' | 'NORMALIZING' | 'DONE' | 'FAILED';

export interface FailureReason {
  errorType: string;             // error class name, e.g. "TransientNetworkError"
  message: string;
}

export type InstrumentOutcome =
  | {
      stockCode: string;
      status: 'DONE';
      recordCount: number;
      droppedRows: number;
      pages: number;
      /** History stopped early on an unreadable page; earlier pages were kept. */
      partial: boolean;
    }
  | {
      stockCode: string;
      status: 'FAILED';
      reason: FailureReason;
    };

export interface RunResult {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  startDate: TradingDate;
  endDate: TradingDate;
  totalInstruments: number;
  outcomes: InstrumentOutcome[];
  notAttempted: string[];
  cancelled: boolean;
}

export interface RunProgress {
  runId: string;
  stockCode: string;
  status: 'DONE' | 'FAILED';
  processed: number;
  total: number;
  elapsedMs: number;
  estimatedRemainingMs: number;
}

export interface RunSummary {
  runId: string;
  startDate: TradingDate;
  endDate: TradingDate;
  totalInstruments: number;
  attempted: number;
  succeeded: number;
  failed: Array<{ stockCode: string } & FailureReason>;
  partial: string[];
  notAttempted: string[];
  cancelled: boolean;
  totalRecords: number;
  coveredFrom: TradingDate | null;
  coveredTo: TradingDate | null;
  files: {
    instruments: string[];
    combined: string | null;
    summary: string;
  };
}

// Collaborators

/** Idempotent write of bar records, keyed by (stockCode, date). */
export interface BarSink {
  upsert(tableKey: string, records: BarRecord[]): Promise<void>;
}

export interface InstrumentSource {
  listInstruments(market?: Market, activeOnly?: boolean): Promise<Instrument[]>;
}
