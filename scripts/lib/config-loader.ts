import * as fs from 'fs';
import * as path from 'path';

export interface MovieDatasetConfig {
  source: {
    baseUrl: string;
    requestTimeoutMs: number;
  };
  output: {
    csvPath: string;
  };
  resolver: {
    chunkSize: number;          // name.basics rows per chunk
    progressEveryChunks: number;
  };
  filters: TitleFilters;
  logging: {
    verbose: boolean;
  };
}

export interface TitleFilters {
  titleType: string;
  minStartYear: number;
  minVotes: number;
}

export type ConfigOverrides = {
  [K in keyof MovieDatasetConfig]?: Partial<MovieDatasetConfig[K]>;
};

export const DEFAULT_BASE_URL = 'https://datasets.imdbws.com/';

/**
 * Nearest directory at or above `start` holding a package.json. Source and
 * compiled builds both resolve to the same project root.
 */
export function findProjectRoot(start: string = __dirname): string {
  let dir = path.resolve(start);
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) return process.cwd();
    dir = parent;
  }
  return dir;
}

export const DEFAULT_CSV_PATH = path.join(findProjectRoot(), 'data', 'imdb_movies.csv');
export const DEFAULT_CHUNK_SIZE = 250_000;

export const DEFAULT_FILTERS: TitleFilters = {
  titleType: 'movie',
  minStartYear: 1930,
  minVotes: 1000,
};

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

function envFlag(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return raw === 'true' || raw === '1';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(section: unknown, key: string): string | undefined {
  if (!isRecord(section)) return undefined;
  const value = section[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function pickNumber(section: unknown, key: string): number | undefined {
  if (!isRecord(section)) return undefined;
  const value = section[key];
  return typeof value === 'number' ? value : undefined;
}

function pickBoolean(section: unknown, key: string): boolean | undefined {
  if (!isRecord(section)) return undefined;
  const value = section[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Read appsettings.json from the working directory, if present
 */
function readFileConfig(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    console.warn(`⚠️  Warning: Failed to parse ${path.basename(configPath)}: ${error}`);
    return {};
  }
}

/**
 * Load build configuration from appsettings.json and environment variables
 *
 * Priority:
 * 1. Overrides (passed as parameter, e.g. CLI flags)
 * 2. Environment variables
 * 3. appsettings.json
 * 4. Default values
 */
export function loadConfig(overrides?: ConfigOverrides, configPath = path.join(process.cwd(), 'appsettings.json')): MovieDatasetConfig {
  const file = readFileConfig(configPath);

  const config: MovieDatasetConfig = {
    source: {
      baseUrl: process.env.IMDB_BASE_URL || pickString(file.source, 'baseUrl') || DEFAULT_BASE_URL,
      requestTimeoutMs: envInt('IMDB_REQUEST_TIMEOUT_MS') ?? pickNumber(file.source, 'requestTimeoutMs') ?? 30000,
    },
    output: {
      csvPath: process.env.MOVIE_DATASET_CSV || pickString(file.output, 'csvPath') || DEFAULT_CSV_PATH,
    },
    resolver: {
      chunkSize: envInt('PEOPLE_CHUNK_SIZE') ?? pickNumber(file.resolver, 'chunkSize') ?? DEFAULT_CHUNK_SIZE,
      progressEveryChunks: envInt('PEOPLE_PROGRESS_EVERY') ?? pickNumber(file.resolver, 'progressEveryChunks') ?? 10,
    },
    filters: {
      titleType: pickString(file.filters, 'titleType') || DEFAULT_FILTERS.titleType,
      minStartYear: envInt('MIN_START_YEAR') ?? pickNumber(file.filters, 'minStartYear') ?? DEFAULT_FILTERS.minStartYear,
      minVotes: envInt('MIN_VOTES') ?? pickNumber(file.filters, 'minVotes') ?? DEFAULT_FILTERS.minVotes,
    },
    logging: {
      verbose: envFlag('VERBOSE') ?? pickBoolean(file.logging, 'verbose') ?? false,
    },
  };

  if (overrides) {
    Object.assign(config.source, overrides.source);
    Object.assign(config.output, overrides.output);
    Object.assign(config.resolver, overrides.resolver);
    Object.assign(config.filters, overrides.filters);
    Object.assign(config.logging, overrides.logging);
  }

  if (!config.source.baseUrl.endsWith('/')) {
    config.source.baseUrl += '/';
  }

  return config;
}

/**
 * Validate configuration
 */
export function validateConfig(config: MovieDatasetConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  try {
    new URL(config.source.baseUrl);
  } catch {
    errors.push(`Invalid source base URL: ${config.source.baseUrl}`);
  }
  if (config.source.requestTimeoutMs <= 0) errors.push('Request timeout must be positive');
  if (!config.output.csvPath) errors.push('Output CSV path is required');
  if (!Number.isInteger(config.resolver.chunkSize) || config.resolver.chunkSize <= 0) {
    errors.push('Resolver chunk size must be a positive integer');
  }
  if (!Number.isInteger(config.resolver.progressEveryChunks) || config.resolver.progressEveryChunks <= 0) {
    errors.push('Progress interval must be a positive integer');
  }
  if (!config.filters.titleType) errors.push('Title type filter is required');

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Print configuration (for debugging)
 */
export function printConfig(config: MovieDatasetConfig, write: (line: string) => void = line => console.log(line)): void {
  write('\n📋 Build Configuration:');
  write('════════════════════════════════════════════════════════════════');
  write(JSON.stringify(config, null, 2));
  write('════════════════════════════════════════════════════════════════\n');
}
