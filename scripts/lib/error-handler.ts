/**
 * Error Handler for the Movie Dataset Pipeline
 * Defines the fatal error types, the non-fatal warnings, and how both are classified and printed
 */

/**
 * Network, HTTP or decompression failure while fetching a raw dataset.
 * Fatal: the whole build is aborted and nothing is retried.
 */
export class TransportError extends Error {
  readonly dataset?: string;
  readonly status?: number;

  constructor(message: string, options: { dataset?: string; status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.dataset = options.dataset;
    this.status = options.status;
  }
}

/**
 * Malformed tabular content: wrong column count, missing column, or a value
 * that cannot be coerced to its declared type.
 */
export class ParseError extends Error {
  readonly dataset?: string;
  readonly line?: number;

  constructor(message: string, options: { dataset?: string; line?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ParseError';
    this.dataset = options.dataset;
    this.line = options.line;
  }
}

export interface UnresolvedReferenceWarning {
  kind: 'unresolved-reference';
  ids: string[];
}

export interface EmptyRelevantSetWarning {
  kind: 'empty-relevant-set';
}

export type PipelineWarning = UnresolvedReferenceWarning | EmptyRelevantSetWarning;

export function describeWarning(warning: PipelineWarning): string {
  switch (warning.kind) {
    case 'unresolved-reference': {
      const preview = warning.ids.slice(0, 5).join(', ');
      const more = warning.ids.length > 5 ? `, +${warning.ids.length - 5} more` : '';
      return `${warning.ids.length.toLocaleString('en-US')} IDs not found in name.basics (${preview}${more})`;
    }
    case 'empty-relevant-set':
      return 'No relevant IDs found; skipping name loading';
  }
}

export interface ErrorClassification {
  category: 'transport' | 'timeout' | 'parse' | 'filesystem' | 'unknown';
  fatal: boolean;
  message: string;
  suggestion: string;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * csv-parse errors carry a CSV_* code (CSV_RECORD_INCONSISTENT_COLUMNS, ...)
 */
export function isCsvError(error: unknown): error is Error {
  const code = errorCode(error);
  return code !== undefined && code.startsWith('CSV_');
}

/**
 * Classify an error for reporting
 */
export function classifyError(error: unknown): ErrorClassification {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof TransportError) {
    const timedOut = error.cause instanceof Error && error.cause.name === 'AbortError';
    return {
      category: timedOut ? 'timeout' : 'transport',
      fatal: true,
      message,
      suggestion: timedOut
        ? 'Increase IMDB_REQUEST_TIMEOUT_MS or check connectivity, then re-run'
        : 'Check network access to the dataset host, then re-run the build',
    };
  }

  if (error instanceof ParseError) {
    return {
      category: 'parse',
      fatal: true,
      message,
      suggestion: 'The upstream extract is malformed; re-run once the source is fixed',
    };
  }

  const code = errorCode(error);
  if (code === 'ENOENT' || code === 'EACCES' || code === 'ENOSPC' || code === 'EISDIR') {
    return {
      category: 'filesystem',
      fatal: true,
      message,
      suggestion: 'Check that the output directory exists and is writable',
    };
  }

  return {
    category: 'unknown',
    fatal: true,
    message,
    suggestion: 'Review error details and logs',
  };
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  const classification = classifyError(error);

  let formatted = `\n╔════════════════════════════════════════════════════════════════╗\n`;
  formatted += `║  BUILD FAILED                                                  ║\n`;
  formatted += `╚════════════════════════════════════════════════════════════════╝\n`;
  formatted += `  Category:    ${classification.category}\n`;
  formatted += `  Message:     ${classification.message}\n`;
  formatted += `  Suggestion:  ${classification.suggestion}\n`;

  if (error instanceof TransportError || error instanceof ParseError) {
    if (error.dataset) {
      formatted += `  Dataset:     ${error.dataset}\n`;
    }
  }
  if (error instanceof TransportError && error.status !== undefined) {
    formatted += `  HTTP Status: ${error.status}\n`;
  }
  if (error instanceof ParseError && error.line !== undefined) {
    formatted += `  Line:        ${error.line}\n`;
  }
  if (error instanceof Error && error.cause instanceof Error) {
    formatted += `  Cause:       ${error.cause.message}\n`;
  }

  if (error instanceof Error && error.stack) {
    formatted += `\n  Stack Trace:\n`;
    formatted += `  ${error.stack.split('\n').join('\n  ')}\n`;
  }

  return formatted;
}
