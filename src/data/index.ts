export { Database, INSTRUMENTS_TABLE } from './database';
export type { PgPoolLike, PgClientLike } from './database';
export { CollectionOrchestrator, resolveDateRange, DAILY_BARS_TABLE } from './collector';
export type { CollectorOptions, RunOptions, CollectionRun, DateRange } from './collector';
export { normalizeDailyPrices, normalizeRow, parseNumeric, FIELD_MAPPINGS } from './normalizer';
export type { NormalizeResult, DroppedRow } from './normalizer';
export { OutputAggregator, toCsv, toCsvRow, CSV_COLUMNS } from './aggregator';
export { parseInstrumentCsv, INSTRUMENT_CSV_COLUMNS } from './instrument-import';
export type { InstrumentImport, RejectedInstrumentRow } from './instrument-import';
