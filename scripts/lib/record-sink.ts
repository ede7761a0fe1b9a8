/**
 * Record Sink: the processed table as a CSV file with a header row.
 * An empty field is read back as null.
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { isCsvError, ParseError } from './error-handler';
import { CellValue, coerceRow, RecordSchema } from './schema';

export interface RecordSink {
  exists(filePath: string): Promise<boolean>;
  writeTable<T extends object>(filePath: string, records: readonly T[], columns: readonly (keyof T & string)[]): Promise<void>;
  readTable<T>(filePath: string, schema: RecordSchema<T>): Promise<T[]>;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return typeof value === 'object' && value !== null && Object.values(value).every(field => typeof field === 'string');
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}

export class CsvRecordSink implements RecordSink {
  async exists(filePath: string): Promise<boolean> {
    return fs.existsSync(filePath);
  }

  /**
   * Full overwrite: written to `<path>.tmp`, then renamed over the target.
   */
  async writeTable<T extends object>(
    filePath: string,
    records: readonly T[],
    columns: readonly (keyof T & string)[]
  ): Promise<void> {
    const rows = records.map(record => {
      const cells: Record<string, CellValue> = {};
      for (const column of columns) {
        cells[column] = toCell(record[column]);
      }
      return cells;
    });
    const content = stringify(rows, { header: true, columns: [...columns] });

    await fsp.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp`;
    await fsp.writeFile(tempPath, content, 'utf-8');
    await fsp.rename(tempPath, filePath);
  }

  async readTable<T>(filePath: string, schema: RecordSchema<T>): Promise<T[]> {
    const content = await fsp.readFile(filePath, 'utf-8');

    let parsed: unknown[];
    try {
      parsed = parse(content, { columns: true, skip_empty_lines: true, bom: true });
    } catch (error) {
      if (isCsvError(error)) {
        throw new ParseError(`${path.basename(filePath)}: ${error.message}`, { cause: error });
      }
      throw error;
    }

    return parsed.map((record, index) => {
      if (!isStringRecord(record)) {
        throw new ParseError(`${path.basename(filePath)}: unexpected row shape`, { line: index + 2 });
      }
      return schema.decode(coerceRow(record, schema.columns, schema.types, ''));
    });
  }
}
