/**
 * Movie Table Builder
 *
 * Runs the merge → filter → resolve stages against a RecordSource and returns
 * the finished rows. Nothing is written here; persisting is the cache's job.
 */

import type { MovieDatasetConfig } from '../lib/config-loader';
import type { PipelineWarning } from '../lib/error-handler';
import type { ProgressReporter } from '../lib/progress-reporter';
import type { RecordSource } from '../lib/record-source';
import {
  DatasetName,
  MovieRecord,
  RecordSchema,
  TitleBasics,
  TitleCrew,
  TitleRatings,
  TITLE_BASICS_SCHEMA,
  TITLE_CREW_SCHEMA,
  TITLE_RATINGS_SCHEMA,
} from '../lib/schema';
import { buildNameLookup, disambiguateNames } from './disambiguate-names';
import { filterTitles, joinTitles, JoinedTitle, passesBasicsFilters } from './join-titles';
import { loadRelevantPeople } from './load-relevant-people';
import { collectPersonIds, idsToNames } from './person-ids';

export interface MovieTableResult {
  rows: MovieRecord[];
  warnings: PipelineWarning[];
}

export interface TitleTables {
  basics: TitleBasics[];
  ratings: TitleRatings[];
  crew: TitleCrew[];
}

async function collectMatching<T>(
  source: RecordSource,
  dataset: DatasetName,
  schema: RecordSchema<T>,
  chunkSize: number,
  keep: (record: T) => boolean,
  reporter: ProgressReporter
): Promise<T[]> {
  const kept: T[] = [];
  let seen = 0;
  for await (const chunk of source.fetchChunked(dataset, schema, chunkSize)) {
    seen += chunk.length;
    for (const record of chunk) {
      if (keep(record)) kept.push(record);
    }
  }
  reporter.logDetail(`Kept ${reporter.formatNumber(kept.length)} of ${reporter.formatNumber(seen)} ${dataset} rows`);
  return kept;
}

/**
 * Stream the three title tables, keeping only basics rows that pass the
 * basics-side filters and the ratings/crew rows of those titles.
 */
export async function loadTitleTables(
  source: RecordSource,
  config: Pick<MovieDatasetConfig, 'filters' | 'resolver'>,
  reporter: ProgressReporter
): Promise<TitleTables> {
  const { chunkSize } = config.resolver;

  const basics = await collectMatching(
    source,
    'title.basics',
    TITLE_BASICS_SCHEMA,
    chunkSize,
    title => passesBasicsFilters(title, config.filters),
    reporter
  );
  const candidates = new Set(basics.map(title => title.tconst));
  const ratings = await collectMatching(
    source,
    'title.ratings',
    TITLE_RATINGS_SCHEMA,
    chunkSize,
    rating => candidates.has(rating.tconst),
    reporter
  );
  const crew = await collectMatching(
    source,
    'title.crew',
    TITLE_CREW_SCHEMA,
    chunkSize,
    credits => candidates.has(credits.tconst),
    reporter
  );

  return { basics, ratings, crew };
}

export function toMovieRecord(title: JoinedTitle, lookup: ReadonlyMap<string, string>): MovieRecord {
  return {
    primaryTitle: title.primaryTitle,
    originalTitle: title.originalTitle,
    startYear: title.startYear,
    runtimeMinutes: title.runtimeMinutes,
    genres: title.genres,
    averageRating: title.averageRating,
    numVotes: title.numVotes,
    directors: idsToNames(title.directors, lookup),
    writers: idsToNames(title.writers, lookup),
  };
}

export async function buildMovieTable(
  source: RecordSource,
  config: Pick<MovieDatasetConfig, 'filters' | 'resolver'>,
  reporter: ProgressReporter
): Promise<MovieTableResult> {
  const { basics, ratings, crew } = await loadTitleTables(source, config, reporter);

  reporter.logStep('Merging title tables');
  const joined = joinTitles(basics, ratings, crew);
  reporter.logStepComplete(joined.length);

  reporter.logStep('Applying title filters');
  const titles = filterTitles(joined, config.filters);
  reporter.logStepComplete(titles.length);

  reporter.logStep('Collecting director and writer IDs');
  const wantedIds = collectPersonIds(titles);
  reporter.logDetail(`Unique people IDs collected: ${reporter.formatNumber(wantedIds.size)}`);

  const relevant = await loadRelevantPeople(source, wantedIds, {
    chunkSize: config.resolver.chunkSize,
    progressEveryChunks: config.resolver.progressEveryChunks,
    reporter,
  });

  let people = relevant.people;
  if (people.length > 0) {
    reporter.logDetail('Disambiguating duplicate names');
    people = disambiguateNames(people);
  } else {
    reporter.logDetail('No relevant people found; skipping name disambiguation');
  }

  reporter.logDetail('Building ID → name lookup');
  const lookup = buildNameLookup(people);
  const rows = titles.map(title => toMovieRecord(title, lookup));

  return { rows, warnings: relevant.warnings };
}
