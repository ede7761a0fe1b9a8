/**
 * In-process stand-ins for the record source and sink, used by the tests.
 */

import { Readable } from 'stream';
import { gzipSync } from 'zlib';
import { ProgressReporter } from '../lib/progress-reporter';
import type { RecordSink } from '../lib/record-sink';
import { NULL_TOKEN, RecordSource } from '../lib/record-source';
import { coerceRow, DatasetName, RecordSchema } from '../lib/schema';

export type RawTable = Record<string, string>[];

/**
 * Serves raw string rows per dataset, applying the same `\N` coercion as the
 * HTTP source. Counts fetches and chunk pulls.
 */
export class MemoryRecordSource implements RecordSource {
  readonly fetched: DatasetName[] = [];
  readonly pulls = new Map<DatasetName, number>();
  chunksPulled = 0;

  constructor(private readonly tables: Partial<Record<DatasetName, RawTable>>) {}

  async fetchRecords<T>(dataset: DatasetName, schema: RecordSchema<T>): Promise<T[]> {
    this.fetched.push(dataset);
    return this.rows(dataset).map(row => schema.decode(coerceRow(row, schema.columns, schema.types, NULL_TOKEN)));
  }

  async *fetchChunked<T>(dataset: DatasetName, schema: RecordSchema<T>, chunkSize: number): AsyncGenerator<T[]> {
    this.fetched.push(dataset);
    const rows = this.rows(dataset);
    for (let start = 0; start < rows.length; start += chunkSize) {
      this.chunksPulled++;
      this.pulls.set(dataset, (this.pulls.get(dataset) ?? 0) + 1);
      yield rows
        .slice(start, start + chunkSize)
        .map(row => schema.decode(coerceRow(row, schema.columns, schema.types, NULL_TOKEN)));
    }
  }

  private rows(dataset: DatasetName): RawTable {
    const table = this.tables[dataset];
    if (!table) {
      throw new Error(`No fixture for ${dataset}`);
    }
    return table;
  }
}

/**
 * Keeps written tables as CSV-like string cells (null → '') keyed by path.
 */
export class MemoryRecordSink implements RecordSink {
  readonly tables = new Map<string, RawTable>();
  writes = 0;

  async exists(filePath: string): Promise<boolean> {
    return this.tables.has(filePath);
  }

  async writeTable<T extends object>(filePath: string, records: readonly T[], columns: readonly (keyof T & string)[]): Promise<void> {
    this.writes++;
    this.tables.set(
      filePath,
      records.map(record => {
        const cells: Record<string, string> = {};
        for (const column of columns) {
          const value = record[column];
          cells[column] = value === null || value === undefined ? '' : String(value);
        }
        return cells;
      })
    );
  }

  async readTable<T>(filePath: string, schema: RecordSchema<T>): Promise<T[]> {
    const table = this.tables.get(filePath);
    if (!table) {
      throw new Error(`ENOENT: ${filePath}`);
    }
    return table.map(row => schema.decode(coerceRow(row, schema.columns, schema.types, '')));
  }
}

/**
 * Reporter whose lines are collected instead of printed.
 */
export function captureReporter(verbose = true): { reporter: ProgressReporter; lines: string[] } {
  const lines: string[] = [];
  return { reporter: new ProgressReporter({ verbose, write: line => lines.push(line) }), lines };
}

/**
 * Gzipped TSV body, as the dataset host would serve it.
 */
export function gzippedTsv(header: string[], rows: string[][]): Readable {
  const text = [header, ...rows].map(fields => fields.join('\t')).join('\n') + '\n';
  return Readable.from([gzipSync(Buffer.from(text, 'utf-8'))]);
}

export function titleBasicsRow(
  tconst: string,
  overrides: Partial<Record<'titleType' | 'primaryTitle' | 'isAdult' | 'startYear' | 'runtimeMinutes' | 'genres', string>> = {}
): Record<string, string> {
  return {
    tconst,
    titleType: overrides.titleType ?? 'movie',
    primaryTitle: overrides.primaryTitle ?? `Title ${tconst}`,
    originalTitle: overrides.primaryTitle ?? `Title ${tconst}`,
    isAdult: overrides.isAdult ?? '0',
    startYear: overrides.startYear ?? '1999',
    endYear: NULL_TOKEN,
    runtimeMinutes: overrides.runtimeMinutes ?? '100',
    genres: overrides.genres ?? 'Drama',
  };
}
