/**
 * Record Source for the raw IMDb extracts
 *
 * Downloads `{baseUrl}{dataset}.tsv.gz`, gunzips it on the fly and parses the
 * tab-separated rows with csv-parse. Rows are coerced once, at parse time,
 * through the dataset's RecordSchema. `\N` is the null token.
 */

import { Readable } from 'stream';
import * as zlib from 'zlib';
import { parse } from 'csv-parse';
import { isCsvError, ParseError, TransportError } from './error-handler';
import { ProgressReporter } from './progress-reporter';
import { coerceRow, DatasetName, RecordSchema } from './schema';

export const NULL_TOKEN = '\\N';

export interface RecordSource {
  fetchRecords<T>(dataset: DatasetName, schema: RecordSchema<T>): Promise<T[]>;
  /**
   * Batches of up to `chunkSize` consecutive records, in source order.
   * Single pass; breaking out of the loop releases the download.
   */
  fetchChunked<T>(dataset: DatasetName, schema: RecordSchema<T>, chunkSize: number): AsyncIterable<T[]>;
}

/** Opens the raw (still gzipped) byte stream for one dataset */
export type Transport = (url: string, dataset: DatasetName) => Promise<Readable>;

export function createHttpTransport(options: { timeoutMs: number; fetchImpl?: typeof fetch }): Transport {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (url, dataset) => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);

    let response: Response;
    try {
      response = await fetchImpl(url, { signal: controller.signal });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Failed to download ${dataset}: ${reason}`, { dataset, cause: error });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      throw new TransportError(`Failed to download ${dataset}: ${response.status} ${response.statusText}`, {
        dataset,
        status: response.status,
      });
    }
    if (!response.body) {
      throw new TransportError(`No response body for ${dataset}`, { dataset });
    }

    return Readable.fromWeb(response.body);
  };
}

function toFieldRecord(value: unknown, dataset: DatasetName, line: number): Record<string, string> {
  if (typeof value !== 'object' || value === null) {
    throw new ParseError(`Unexpected row shape`, { dataset, line });
  }
  const fields: Record<string, string> = {};
  for (const [key, field] of Object.entries(value)) {
    if (typeof field !== 'string') {
      throw new ParseError(`Unexpected value in column "${key}"`, { dataset, line });
    }
    fields[key] = field;
  }
  return fields;
}

export class HttpRecordSource implements RecordSource {
  private readonly baseUrl: string;
  private readonly transport: Transport;
  private readonly reporter: ProgressReporter;
  private readonly idleTimeoutMs?: number;

  /**
   * `idleTimeoutMs` bounds the gap between two body chunks; a download that
   * stalls longer than that fails with a TransportError.
   */
  constructor(options: { baseUrl: string; transport: Transport; reporter: ProgressReporter; idleTimeoutMs?: number }) {
    this.baseUrl = options.baseUrl;
    this.transport = options.transport;
    this.reporter = options.reporter;
    this.idleTimeoutMs = options.idleTimeoutMs;
  }

  async fetchRecords<T>(dataset: DatasetName, schema: RecordSchema<T>): Promise<T[]> {
    const records: T[] = [];
    for await (const record of this.stream(dataset, schema)) {
      records.push(record);
    }
    this.reporter.logDetail(`Loaded ${this.reporter.formatNumber(records.length)} rows from ${dataset}`);
    return records;
  }

  async *fetchChunked<T>(dataset: DatasetName, schema: RecordSchema<T>, chunkSize: number): AsyncGenerator<T[]> {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }

    let batch: T[] = [];
    for await (const record of this.stream(dataset, schema)) {
      batch.push(record);
      if (batch.length >= chunkSize) {
        yield batch;
        batch = [];
      }
    }
    if (batch.length > 0) {
      yield batch;
    }
  }

  private async *stream<T>(dataset: DatasetName, schema: RecordSchema<T>): AsyncGenerator<T> {
    const url = `${this.baseUrl}${dataset}.tsv.gz`;
    this.reporter.logInfo(`Downloading ${dataset} archive from ${url}`);

    const body = await this.transport(url, dataset);
    const gunzip = zlib.createGunzip();
    const parser = parse({
      delimiter: '\t',
      columns: true,
      quote: false,
      skip_empty_lines: true,
    });

    body.on('error', error => {
      parser.destroy(new TransportError(`Download of ${dataset} interrupted: ${error.message}`, { dataset, cause: error }));
    });
    gunzip.on('error', error => {
      parser.destroy(new TransportError(`Failed to decompress ${dataset}: ${error.message}`, { dataset, cause: error }));
    });
    body.pipe(gunzip).pipe(parser);

    const idleTimeoutMs = this.idleTimeoutMs;
    const idleTimer =
      idleTimeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            const cause = new Error(`No data received for ${idleTimeoutMs}ms`);
            cause.name = 'AbortError';
            parser.destroy(new TransportError(`Download of ${dataset} stalled: ${cause.message}`, { dataset, cause }));
          }, idleTimeoutMs);
    idleTimer?.unref();
    body.on('data', () => idleTimer?.refresh());
    body.on('end', () => clearTimeout(idleTimer));

    this.reporter.logDetail(`Parsing ${dataset}`);

    // Header is line 1
    let line = 1;
    try {
      for await (const raw of parser) {
        line++;
        const fields = toFieldRecord(raw, dataset, line);
        yield schema.decode(coerceRow(fields, schema.columns, schema.types, NULL_TOKEN));
      }
    } catch (error) {
      throw this.describeFailure(error, dataset, line);
    } finally {
      clearTimeout(idleTimer);
      gunzip.destroy();
      body.destroy();
    }
  }

  private describeFailure(error: unknown, dataset: DatasetName, line: number): unknown {
    if (error instanceof TransportError) {
      return error;
    }
    if (error instanceof ParseError) {
      return error.dataset
        ? error
        : new ParseError(`${dataset} line ${line}: ${error.message}`, { dataset, line, cause: error });
    }
    if (isCsvError(error)) {
      return new ParseError(`${dataset}: ${error.message}`, { dataset, line: line + 1, cause: error });
    }
    return error;
  }
}
