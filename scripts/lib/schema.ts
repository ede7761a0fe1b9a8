/**
 * Typed record schemas for the raw IMDb extracts and the processed movie table.
 *
 * A schema names the columns to read, the type each column is coerced to at
 * parse time, and how a coerced row becomes a typed record.
 */

import { ParseError } from './error-handler';

export type DatasetName = 'title.basics' | 'title.ratings' | 'title.crew' | 'name.basics';

export type ColumnType = 'string' | 'int' | 'float' | 'boolean';

export type CellValue = string | number | boolean | null;

export type Row = Record<string, CellValue>;

export type TypeHints = Record<string, ColumnType>;

export interface RecordSchema<T> {
  columns: readonly string[];
  types: TypeHints;
  decode(row: Row): T;
}

export interface TitleBasics {
  tconst: string;
  titleType: string;
  primaryTitle: string | null;
  originalTitle: string | null;
  isAdult: boolean;
  startYear: number | null;
  endYear: number | null;
  runtimeMinutes: number | null;
  genres: string | null;
}

export interface TitleRatings {
  tconst: string;
  averageRating: number | null;
  numVotes: number | null;
}

export interface TitleCrew {
  tconst: string;
  directors: string | null;
  writers: string | null;
}

export interface PersonRecord {
  nconst: string | null;
  primaryName: string | null;
}

export interface MovieRecord {
  primaryTitle: string | null;
  originalTitle: string | null;
  startYear: number | null;
  runtimeMinutes: number | null;
  genres: string | null;
  averageRating: number | null;
  numVotes: number | null;
  directors: string | null;
  writers: string | null;
}

export const MOVIE_COLUMNS: readonly (keyof MovieRecord)[] = [
  'primaryTitle',
  'originalTitle',
  'startYear',
  'runtimeMinutes',
  'genres',
  'averageRating',
  'numVotes',
  'directors',
  'writers',
];

// ---------------------------------------------------------------------------
// Coercion
// ---------------------------------------------------------------------------

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Coerce one raw cell to its hinted type. `nullToken` is `\N` for the raw
 * extracts and the empty string for the processed CSV.
 */
export function coerceCell(raw: string | undefined, type: ColumnType, column: string, nullToken: string): CellValue {
  if (raw === undefined || raw === nullToken) {
    return null;
  }

  switch (type) {
    case 'string':
      return raw;
    case 'int': {
      const trimmed = raw.trim();
      if (!INTEGER_PATTERN.test(trimmed)) {
        throw new ParseError(`Column "${column}": expected an integer, got "${raw}"`);
      }
      return parseInt(trimmed, 10);
    }
    case 'float': {
      const value = Number(raw.trim());
      if (raw.trim() === '' || Number.isNaN(value)) {
        throw new ParseError(`Column "${column}": expected a number, got "${raw}"`);
      }
      return value;
    }
    case 'boolean': {
      const lowered = raw.trim().toLowerCase();
      if (lowered === '1' || lowered === 'true') return true;
      if (lowered === '0' || lowered === 'false') return false;
      throw new ParseError(`Column "${column}": expected a boolean flag, got "${raw}"`);
    }
  }
}

/**
 * Project a parsed record onto the schema's columns, coercing each value.
 */
export function coerceRow(
  record: Record<string, string>,
  columns: readonly string[],
  types: TypeHints,
  nullToken: string
): Row {
  const row: Row = {};
  for (const column of columns) {
    if (!(column in record)) {
      throw new ParseError(`Missing column "${column}"`);
    }
    row[column] = coerceCell(record[column], types[column] ?? 'string', column, nullToken);
  }
  return row;
}

// ---------------------------------------------------------------------------
// Field readers used by the decoders
// ---------------------------------------------------------------------------

function text(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string') {
    throw new ParseError(`Column "${column}": expected text`);
  }
  return value;
}

function requiredText(row: Row, column: string): string {
  const value = text(row, column);
  if (value === null) {
    throw new ParseError(`Column "${column}" must not be null`);
  }
  return value;
}

function numeric(row: Row, column: string): number | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'number') {
    throw new ParseError(`Column "${column}": expected a number`);
  }
  return value;
}

function flag(row: Row, column: string): boolean {
  const value = row[column];
  if (typeof value !== 'boolean') {
    throw new ParseError(`Column "${column}": expected a boolean flag`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Dataset schemas
// ---------------------------------------------------------------------------

export const TITLE_BASICS_SCHEMA: RecordSchema<TitleBasics> = {
  columns: [
    'tconst',
    'titleType',
    'primaryTitle',
    'originalTitle',
    'isAdult',
    'startYear',
    'endYear',
    'runtimeMinutes',
    'genres',
  ],
  types: {
    tconst: 'string',
    titleType: 'string',
    primaryTitle: 'string',
    originalTitle: 'string',
    isAdult: 'boolean',
    startYear: 'int',
    endYear: 'int',
    runtimeMinutes: 'int',
    genres: 'string',
  },
  decode: row => ({
    tconst: requiredText(row, 'tconst'),
    titleType: requiredText(row, 'titleType'),
    primaryTitle: text(row, 'primaryTitle'),
    originalTitle: text(row, 'originalTitle'),
    isAdult: flag(row, 'isAdult'),
    startYear: numeric(row, 'startYear'),
    endYear: numeric(row, 'endYear'),
    runtimeMinutes: numeric(row, 'runtimeMinutes'),
    genres: text(row, 'genres'),
  }),
};

export const TITLE_RATINGS_SCHEMA: RecordSchema<TitleRatings> = {
  columns: ['tconst', 'averageRating', 'numVotes'],
  types: { tconst: 'string', averageRating: 'float', numVotes: 'int' },
  decode: row => ({
    tconst: requiredText(row, 'tconst'),
    averageRating: numeric(row, 'averageRating'),
    numVotes: numeric(row, 'numVotes'),
  }),
};

export const TITLE_CREW_SCHEMA: RecordSchema<TitleCrew> = {
  columns: ['tconst', 'directors', 'writers'],
  types: { tconst: 'string', directors: 'string', writers: 'string' },
  decode: row => ({
    tconst: requiredText(row, 'tconst'),
    directors: text(row, 'directors'),
    writers: text(row, 'writers'),
  }),
};

// Only the two columns the resolver needs; the rest of name.basics is never read.
export const PERSON_SCHEMA: RecordSchema<PersonRecord> = {
  columns: ['nconst', 'primaryName'],
  types: { nconst: 'string', primaryName: 'string' },
  decode: row => ({
    nconst: text(row, 'nconst'),
    primaryName: text(row, 'primaryName'),
  }),
};

export const MOVIE_SCHEMA: RecordSchema<MovieRecord> = {
  columns: MOVIE_COLUMNS,
  types: {
    primaryTitle: 'string',
    originalTitle: 'string',
    startYear: 'int',
    runtimeMinutes: 'int',
    genres: 'string',
    averageRating: 'float',
    numVotes: 'int',
    directors: 'string',
    writers: 'string',
  },
  decode: row => ({
    primaryTitle: text(row, 'primaryTitle'),
    originalTitle: text(row, 'originalTitle'),
    startYear: numeric(row, 'startYear'),
    runtimeMinutes: numeric(row, 'runtimeMinutes'),
    genres: text(row, 'genres'),
    averageRating: numeric(row, 'averageRating'),
    numVotes: numeric(row, 'numVotes'),
    directors: text(row, 'directors'),
    writers: text(row, 'writers'),
  }),
};
