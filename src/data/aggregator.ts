import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import Papa from 'papaparse';
import { BarRecord, RunResult, RunSummary } from '../types';
import { logger, formatRunTimestamp } from '../utils';
import { FIELD_MAPPINGS } from './normalizer';

export const CSV_COLUMNS = ['stock_code', 'date', ...FIELD_MAPPINGS.map((mapping) => mapping.column)];

// Spreadsheet tools need the BOM to read the file as UTF-8
const BOM = '\uFEFF';

function csvValues(record: BarRecord): Array<string | number | null> {
  return [record.stockCode, record.date, ...FIELD_MAPPINGS.map((mapping) => record[mapping.field])];
}

export function toCsvRow(record: BarRecord): string {
  return Papa.unparse([csvValues(record)], { newline: '\n' });
}

export function toCsv(records: readonly BarRecord[]): string {
  return BOM + Papa.unparse({ fields: CSV_COLUMNS, data: records.map(csvValues) }, { newline: '\n' }) + '\n';
}

function compareRecords(a: BarRecord, b: BarRecord): number {
  if (a.stockCode !== b.stockCode) return a.stockCode < b.stockCode ? -1 : 1;
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return 0;
}

/**
 * Writes a finished run to disk: one CSV per instrument, one combined CSV
 * named after the run's start time, and a JSON summary. Output depends only
 * on its inputs, so finalizing the same run twice rewrites identical files.
 */
export class OutputAggregator {
  private outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  buildSummary(result: RunResult, records: readonly BarRecord[], files: RunSummary['files']): RunSummary {
    let coveredFrom: string | null = null;
    let coveredTo: string | null = null;
    for (const record of records) {
      if (coveredFrom === null || record.date < coveredFrom) coveredFrom = record.date;
      if (coveredTo === null || record.date > coveredTo) coveredTo = record.date;
    }

    const failed: RunSummary['failed'] = [];
    const partial: string[] = [];
    let succeeded = 0;
    for (const outcome of result.outcomes) {
      if (outcome.status === 'DONE') {
        succeeded++;
        if (outcome.partial) partial.push(outcome.stockCode);
      } else {
        failed.push({ stockCode: outcome.stockCode, ...outcome.reason });
      }
    }

    return {
      runId: result.runId,
      startDate: result.startDate,
      endDate: result.endDate,
      totalInstruments: result.totalInstruments,
      attempted: result.outcomes.length,
      succeeded,
      failed,
      partial,
      notAttempted: [...result.notAttempted],
      cancelled: result.cancelled,
      totalRecords: records.length,
      coveredFrom,
      coveredTo,
      files,
    };
  }

  async finalize(result: RunResult, records: readonly BarRecord[]): Promise<RunSummary> {
    await mkdir(this.outputDir, { recursive: true });

    const timestamp = formatRunTimestamp(result.startedAt);
    const sorted = [...records].sort(compareRecords);

    const byInstrument = new Map<string, BarRecord[]>();
    for (const record of sorted) {
      const bucket = byInstrument.get(record.stockCode);
      if (bucket) {
        bucket.push(record);
      } else {
        byInstrument.set(record.stockCode, [record]);
      }
    }

    const instrumentFiles: string[] = [];
    for (const [stockCode, instrumentRecords] of byInstrument) {
      const file = join(this.outputDir, `${stockCode}_kiwoom_data.csv`);
      await writeFile(file, toCsv(instrumentRecords), 'utf-8');
      instrumentFiles.push(file);
      logger.debug('Aggregator', `Saved ${stockCode}`, { file, records: instrumentRecords.length });
    }

    let combinedFile: string | null = null;
    if (sorted.length > 0) {
      combinedFile = join(this.outputDir, `combined_kiwoom_data_${timestamp}.csv`);
      await writeFile(combinedFile, toCsv(sorted), 'utf-8');
    }

    const summaryFile = join(this.outputDir, `summary_${timestamp}.json`);
    const summary = this.buildSummary(result, sorted, {
      instruments: instrumentFiles,
      combined: combinedFile,
      summary: summaryFile,
    });
    await writeFile(summaryFile, JSON.stringify(summary, null, 2) + '\n', 'utf-8');

    logger.info('Aggregator', 'Run output written', {
      outputDir: this.outputDir,
      instruments: instrumentFiles.length,
      records: summary.totalRecords,
      failed: summary.failed.length,
    });

    return summary;
  }
}
