/**
 * Title Join & Filter
 *
 * basics ⋈ ratings (inner) ⋈ crew (left) on tconst, then the row filter that
 * narrows the catalogue down to feature films with enough votes.
 */

import type { TitleFilters } from '../lib/config-loader';
import type { TitleBasics, TitleCrew, TitleRatings } from '../lib/schema';

export interface JoinedTitle extends TitleBasics {
  averageRating: number | null;
  numVotes: number | null;
  directors: string | null;
  writers: string | null;
}

function indexByTitle<T extends { tconst: string }>(rows: readonly T[]): Map<string, T> {
  const index = new Map<string, T>();
  for (const row of rows) {
    // First row per title wins
    if (!index.has(row.tconst)) {
      index.set(row.tconst, row);
    }
  }
  return index;
}

/**
 * Join the three title tables. Output follows basics order, one row per
 * basics row that has a rating.
 */
export function joinTitles(
  basics: readonly TitleBasics[],
  ratings: readonly TitleRatings[],
  crew: readonly TitleCrew[]
): JoinedTitle[] {
  const ratingsByTitle = indexByTitle(ratings);
  const crewByTitle = indexByTitle(crew);

  const joined: JoinedTitle[] = [];
  for (const title of basics) {
    const rating = ratingsByTitle.get(title.tconst);
    if (!rating) continue;

    const credits = crewByTitle.get(title.tconst);
    joined.push({
      ...title,
      averageRating: rating.averageRating,
      numVotes: rating.numVotes,
      directors: credits?.directors ?? null,
      writers: credits?.writers ?? null,
    });
  }
  return joined;
}

/** The part of the title filter that only looks at title.basics columns */
export function passesBasicsFilters(title: TitleBasics, filters: TitleFilters): boolean {
  return (
    title.isAdult === false &&
    title.titleType === filters.titleType &&
    title.runtimeMinutes !== null &&
    title.startYear !== null &&
    title.startYear >= filters.minStartYear
  );
}

export function passesTitleFilters(row: JoinedTitle, filters: TitleFilters): boolean {
  return passesBasicsFilters(row, filters) && row.numVotes !== null && row.numVotes >= filters.minVotes;
}

export function filterTitles(rows: readonly JoinedTitle[], filters: TitleFilters): JoinedTitle[] {
  return rows.filter(row => passesTitleFilters(row, filters));
}
