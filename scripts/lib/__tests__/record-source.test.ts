/**
 * Unit Tests for the gzip TSV record source
 */

import { Readable } from 'stream';
import { gzipSync } from 'zlib';
import { classifyError, ParseError, TransportError } from '../error-handler';
import { createHttpTransport, HttpRecordSource, Transport } from '../record-source';
import { PERSON_SCHEMA, TITLE_BASICS_SCHEMA, TITLE_RATINGS_SCHEMA } from '../schema';
import { captureReporter, gzippedTsv } from '../../test-utils/memory-stores';

const BASE_URL = 'https://example.test/';

const BASICS_HEADER = [
  'tconst',
  'titleType',
  'primaryTitle',
  'originalTitle',
  'isAdult',
  'startYear',
  'endYear',
  'runtimeMinutes',
  'genres',
];

const PERSON_HEADER = ['nconst', 'primaryName', 'birthYear', 'deathYear', 'primaryProfession', 'knownForTitles'];

function personRows(count: number): string[][] {
  return Array.from({ length: count }, (_, i) => [`nm${i + 1}`, `Person ${i + 1}`, '1970', '\\N', 'director', 'tt1']);
}

function sourceFor(body: () => Readable) {
  const calls: string[] = [];
  const transport: Transport = async url => {
    calls.push(url);
    return body();
  };
  const { reporter, lines } = captureReporter(true);
  const source = new HttpRecordSource({ baseUrl: BASE_URL, transport, reporter });
  return { source, calls, lines };
}

describe('HttpRecordSource.fetchRecords', () => {
  test('decodes typed records and maps \\N to null', async () => {
    const { source, calls } = sourceFor(() =>
      gzippedTsv(BASICS_HEADER, [
        ['tt1', 'movie', 'Alpha', 'Alfa', '0', '1994', '\\N', '142', 'Drama'],
        ['tt2', 'short', 'Beta', 'Beta', '1', '\\N', '\\N', '\\N', '\\N'],
      ])
    );

    const records = await source.fetchRecords('title.basics', TITLE_BASICS_SCHEMA);

    expect(calls).toEqual(['https://example.test/title.basics.tsv.gz']);
    expect(records).toEqual([
      {
        tconst: 'tt1',
        titleType: 'movie',
        primaryTitle: 'Alpha',
        originalTitle: 'Alfa',
        isAdult: false,
        startYear: 1994,
        endYear: null,
        runtimeMinutes: 142,
        genres: 'Drama',
      },
      {
        tconst: 'tt2',
        titleType: 'short',
        primaryTitle: 'Beta',
        originalTitle: 'Beta',
        isAdult: true,
        startYear: null,
        endYear: null,
        runtimeMinutes: null,
        genres: null,
      },
    ]);
  });

  test('reads only the schema columns', async () => {
    const { source } = sourceFor(() => gzippedTsv(PERSON_HEADER, personRows(1)));

    const [person] = await source.fetchRecords('name.basics', PERSON_SCHEMA);

    expect(person).toEqual({ nconst: 'nm1', primaryName: 'Person 1' });
  });

  test('treats double quotes as ordinary characters', async () => {
    const { source } = sourceFor(() =>
      gzippedTsv(BASICS_HEADER, [['tt3', 'movie', '"Quoted" Title', 'x "y', '0', '2001', '\\N', '90', 'Comedy']])
    );

    const [record] = await source.fetchRecords('title.basics', TITLE_BASICS_SCHEMA);

    expect(record.primaryTitle).toBe('"Quoted" Title');
    expect(record.originalTitle).toBe('x "y');
  });

  test('parses float ratings', async () => {
    const { source } = sourceFor(() => gzippedTsv(['tconst', 'averageRating', 'numVotes'], [['tt1', '5.7', '2107']]));

    const records = await source.fetchRecords('title.ratings', TITLE_RATINGS_SCHEMA);

    expect(records).toEqual([{ tconst: 'tt1', averageRating: 5.7, numVotes: 2107 }]);
  });

  test('logs the download in every mode and the row count in verbose mode', async () => {
    const { source, lines } = sourceFor(() => gzippedTsv(PERSON_HEADER, personRows(3)));

    await source.fetchRecords('name.basics', PERSON_SCHEMA);

    expect(lines[0]).toBe('[build-movies] Downloading name.basics archive from https://example.test/name.basics.tsv.gz');
    expect(lines).toContain('[build-movies] Loaded 3 rows from name.basics');
  });

  test('raises ParseError for a value that does not fit its column type', async () => {
    const { source } = sourceFor(() =>
      gzippedTsv(BASICS_HEADER, [['tt1', 'movie', 'A', 'A', '0', '1994', '\\N', 'abc', 'Drama']])
    );

    const failure = source.fetchRecords('title.basics', TITLE_BASICS_SCHEMA);

    await expect(failure).rejects.toBeInstanceOf(ParseError);
    await expect(failure).rejects.toMatchObject({
      dataset: 'title.basics',
      line: 2,
      message: 'title.basics line 2: Column "runtimeMinutes": expected an integer, got "abc"',
    });
  });

  test('raises ParseError for a row with the wrong number of fields', async () => {
    const { source } = sourceFor(() => gzippedTsv(['tconst', 'averageRating', 'numVotes'], [['tt1', '5.7']]));

    await expect(source.fetchRecords('title.ratings', TITLE_RATINGS_SCHEMA)).rejects.toBeInstanceOf(ParseError);
  });

  test('raises TransportError when the body is not valid gzip', async () => {
    const { source } = sourceFor(() => Readable.from([Buffer.from('definitely not gzip')]));

    const failure = source.fetchRecords('title.crew', TITLE_RATINGS_SCHEMA);

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({ dataset: 'title.crew' });
  });
});

describe('HttpRecordSource idle timeout', () => {
  test('fails a download that stops sending data', async () => {
    const partial = gzipSync(Buffer.from('tconst\taverageRating\tnumVotes\ntt1\t9.1\t3000\n', 'utf-8')).subarray(0, 10);
    const transport: Transport = async () => {
      const stalled = new Readable({ read() {} });
      stalled.push(partial);
      return stalled;
    };
    const { reporter } = captureReporter(false);
    const source = new HttpRecordSource({ baseUrl: BASE_URL, transport, reporter, idleTimeoutMs: 50 });

    const failure = source.fetchRecords('title.ratings', TITLE_RATINGS_SCHEMA);

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({
      dataset: 'title.ratings',
      message: 'Download of title.ratings stalled: No data received for 50ms',
    });
    const error: unknown = await failure.catch(reason => reason);
    expect(classifyError(error).category).toBe('timeout');
  });

  test('leaves a download that keeps flowing alone', async () => {
    const { reporter } = captureReporter(false);
    const timed = new HttpRecordSource({
      baseUrl: BASE_URL,
      transport: async () => gzippedTsv(PERSON_HEADER, personRows(3)),
      reporter,
      idleTimeoutMs: 1000,
    });

    const records = await timed.fetchRecords('name.basics', PERSON_SCHEMA);

    expect(records).toHaveLength(3);
  });
});

describe('HttpRecordSource.fetchChunked', () => {
  test('yields consecutive batches of at most chunkSize records', async () => {
    const { source } = sourceFor(() => gzippedTsv(PERSON_HEADER, personRows(5)));

    const batches: string[][] = [];
    for await (const batch of source.fetchChunked('name.basics', PERSON_SCHEMA, 2)) {
      batches.push(batch.map(person => person.nconst ?? ''));
    }

    expect(batches).toEqual([['nm1', 'nm2'], ['nm3', 'nm4'], ['nm5']]);
  });

  test('can be abandoned after the first batch', async () => {
    const { source, calls } = sourceFor(() => gzippedTsv(PERSON_HEADER, personRows(50)));

    let seen = 0;
    for await (const batch of source.fetchChunked('name.basics', PERSON_SCHEMA, 10)) {
      seen += batch.length;
      break;
    }

    expect(seen).toBe(10);
    expect(calls).toHaveLength(1);
  });

  test('rejects a non-positive chunk size', async () => {
    const { source } = sourceFor(() => gzippedTsv(PERSON_HEADER, personRows(1)));

    const iterator = source.fetchChunked('name.basics', PERSON_SCHEMA, 0)[Symbol.asyncIterator]();

    await expect(iterator.next()).rejects.toBeInstanceOf(RangeError);
  });
});

describe('createHttpTransport', () => {
  test('streams the response body', async () => {
    const payload = gzipSync(Buffer.from('tconst\taverageRating\tnumVotes\ntt1\t9.1\t3000\n', 'utf-8'));
    const fetchImpl: typeof fetch = async () => new Response(payload);
    const { reporter } = captureReporter(false);
    const source = new HttpRecordSource({
      baseUrl: BASE_URL,
      transport: createHttpTransport({ timeoutMs: 1000, fetchImpl }),
      reporter,
    });

    const records = await source.fetchRecords('title.ratings', TITLE_RATINGS_SCHEMA);

    expect(records).toEqual([{ tconst: 'tt1', averageRating: 9.1, numVotes: 3000 }]);
  });

  test('turns an HTTP error status into a TransportError', async () => {
    const fetchImpl: typeof fetch = async () => new Response(null, { status: 503, statusText: 'Service Unavailable' });
    const transport = createHttpTransport({ timeoutMs: 1000, fetchImpl });

    const failure = transport('https://example.test/title.crew.tsv.gz', 'title.crew');

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({
      status: 503,
      message: 'Failed to download title.crew: 503 Service Unavailable',
    });
  });

  test('turns a network failure into a TransportError', async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const transport = createHttpTransport({ timeoutMs: 1000, fetchImpl });

    await expect(transport('https://example.test/name.basics.tsv.gz', 'name.basics')).rejects.toMatchObject({
      name: 'TransportError',
      message: 'Failed to download name.basics: fetch failed',
    });
  });
});
