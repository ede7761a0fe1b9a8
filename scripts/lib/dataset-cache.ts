/**
 * Dataset Cache
 *
 * The processed CSV is the only persisted state. If it exists and the build is
 * not forced, it is reused as is; otherwise the whole table is rebuilt from
 * the raw extracts and written over it.
 */

import type { MovieDatasetConfig } from './config-loader';
import type { ProgressReporter } from './progress-reporter';
import type { RecordSink } from './record-sink';
import type { RecordSource } from './record-source';
import { MOVIE_COLUMNS, MOVIE_SCHEMA, MovieRecord } from './schema';
import { buildMovieTable } from '../transforms/build-movie-table';

export type CacheState = 'MISSING' | 'PRESENT';

export interface DatasetDependencies {
  config: MovieDatasetConfig;
  source: RecordSource;
  sink: RecordSink;
  reporter: ProgressReporter;
}

export interface BuildOptions {
  force?: boolean;
}

export async function getCacheState(sink: RecordSink, csvPath: string): Promise<CacheState> {
  return (await sink.exists(csvPath)) ? 'PRESENT' : 'MISSING';
}

/**
 * Build the processed CSV unless a cached copy can be reused.
 * Returns the artifact path.
 */
export async function buildMovieDataset(deps: DatasetDependencies, options: BuildOptions = {}): Promise<string> {
  const { config, source, sink, reporter } = deps;
  const csvPath = config.output.csvPath;

  const state = await getCacheState(sink, csvPath);
  if (state === 'PRESENT' && !options.force) {
    reporter.logInfo(`Using cached CSV at ${csvPath}`);
    return csvPath;
  }

  reporter.logRunStart('Building IMDb dataset, this will take a couple of minutes :)');
  const { rows } = await buildMovieTable(source, config, reporter);

  reporter.logInfo(`Writing processed CSV to ${csvPath}`);
  await sink.writeTable(csvPath, rows, MOVIE_COLUMNS);
  reporter.logRunComplete(`Wrote ${reporter.formatNumber(rows.length)} movies`);

  return csvPath;
}

/**
 * Build (or reuse) the processed CSV and load it back.
 */
export async function getMovieData(deps: DatasetDependencies, options: BuildOptions = {}): Promise<MovieRecord[]> {
  const csvPath = await buildMovieDataset(deps, options);
  return deps.sink.readTable(csvPath, MOVIE_SCHEMA);
}
