#!/usr/bin/env node
/**
 * Movie Dataset Builder
 * =====================
 * Downloads the raw IMDb extracts, joins and filters the titles, resolves
 * director/writer IDs to names and caches the result as a single CSV.
 *
 * Usage:
 *   npx tsx scripts/build-movie-dataset.ts [options]
 *
 * Options:
 *   --force     Rebuild the processed CSV even if a cached copy exists
 *   --verbose   Print detailed progress information
 *
 * Settings (env or appsettings.json): IMDB_BASE_URL, IMDB_REQUEST_TIMEOUT_MS,
 * MOVIE_DATASET_CSV, PEOPLE_CHUNK_SIZE, PEOPLE_PROGRESS_EVERY, MIN_START_YEAR,
 * MIN_VOTES, VERBOSE
 */

import * as dotenv from 'dotenv';
import { loadConfig, printConfig, validateConfig } from './lib/config-loader';
import { getMovieData } from './lib/dataset-cache';
import { formatError } from './lib/error-handler';
import { ProgressReporter } from './lib/progress-reporter';
import { CsvRecordSink } from './lib/record-sink';
import { createHttpTransport, HttpRecordSource } from './lib/record-source';
import { MOVIE_COLUMNS } from './lib/schema';

dotenv.config();

const KNOWN_FLAGS = new Set(['--force', '--verbose']);

function printUsage(): void {
  console.error('Usage: npx tsx scripts/build-movie-dataset.ts [--force] [--verbose]');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const unknown = args.filter(arg => !KNOWN_FLAGS.has(arg));
  if (unknown.length > 0) {
    console.error(`❌ Unknown option: ${unknown.join(' ')}`);
    printUsage();
    process.exit(2);
  }

  const force = args.includes('--force');
  const config = loadConfig(args.includes('--verbose') ? { logging: { verbose: true } } : undefined);

  const validation = validateConfig(config);
  if (!validation.valid) {
    console.error('❌ Invalid configuration:');
    validation.errors.forEach(error => console.error(`   - ${error}`));
    process.exit(1);
  }

  const reporter = new ProgressReporter({ verbose: config.logging.verbose });
  if (reporter.verbose) {
    printConfig(config);
  }

  const source = new HttpRecordSource({
    baseUrl: config.source.baseUrl,
    transport: createHttpTransport({ timeoutMs: config.source.requestTimeoutMs }),
    reporter,
    idleTimeoutMs: config.source.requestTimeoutMs,
  });

  const movies = await getMovieData({ config, source, sink: new CsvRecordSink(), reporter }, { force });

  reporter.logInfo(
    `Finished. Rows: ${reporter.formatNumber(movies.length)}; columns: ${MOVIE_COLUMNS.length}`
  );
}

main().catch(err => {
  console.error(formatError(err));
  process.exit(1);
});
