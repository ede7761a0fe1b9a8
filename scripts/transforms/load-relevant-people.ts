/**
 * Relevant People Loader
 *
 * Scans name.basics chunk by chunk and keeps only the people the filtered
 * titles reference. The scan stops as soon as every wanted ID has been seen,
 * so the full person table is never held in memory.
 */

import type { PipelineWarning } from '../lib/error-handler';
import type { ProgressReporter } from '../lib/progress-reporter';
import type { RecordSource } from '../lib/record-source';
import { PERSON_SCHEMA, PersonRecord } from '../lib/schema';

export interface LoadPeopleOptions {
  chunkSize: number;
  progressEveryChunks: number;
  reporter: ProgressReporter;
}

export interface RelevantPeople {
  /** One entry per matched ID, in the order the scan found them */
  people: PersonRecord[];
  unresolvedIds: string[];
  chunksRead: number;
  warnings: PipelineWarning[];
}

export async function loadRelevantPeople(
  source: RecordSource,
  wantedIds: ReadonlySet<string>,
  options: LoadPeopleOptions
): Promise<RelevantPeople> {
  const { chunkSize, progressEveryChunks, reporter } = options;

  if (wantedIds.size === 0) {
    const warning: PipelineWarning = { kind: 'empty-relevant-set' };
    reporter.logWarning(warning);
    return { people: [], unresolvedIds: [], chunksRead: 0, warnings: [warning] };
  }

  const remaining = new Set(wantedIds);
  const people: PersonRecord[] = [];
  let chunksRead = 0;
  let rowsRead = 0;

  reporter.logDetail('Scanning name.basics in chunks');

  for await (const chunk of source.fetchChunked('name.basics', PERSON_SCHEMA, chunkSize)) {
    chunksRead++;
    rowsRead += chunk.length;

    for (const person of chunk) {
      if (person.nconst === null || person.primaryName === null) continue;
      if (remaining.delete(person.nconst)) {
        people.push(person);
      }
    }

    if (chunksRead % progressEveryChunks === 0) {
      reporter.logDetail(
        `Processed ${reporter.formatNumber(rowsRead)} rows; ` +
          `${reporter.formatNumber(remaining.size)} IDs still missing`
      );
    }

    if (remaining.size === 0) {
      reporter.logDetail('Found all relevant names; stopping early');
      break;
    }
  }

  const warnings: PipelineWarning[] = [];
  const unresolvedIds = [...remaining];
  if (unresolvedIds.length > 0) {
    const warning: PipelineWarning = { kind: 'unresolved-reference', ids: unresolvedIds };
    reporter.logWarning(warning);
    warnings.push(warning);
  }

  reporter.logDetail(`Matched ${reporter.formatNumber(people.length)} people rows`);
  return { people, unresolvedIds, chunksRead, warnings };
}
