/**
 * Unit Tests for the chunked name.basics scan
 */

import { captureReporter, MemoryRecordSource, RawTable } from '../../test-utils/memory-stores';
import { loadRelevantPeople } from '../load-relevant-people';

const NULL = '\\N';

function people(...entries: Array<[string, string]>): RawTable {
  return entries.map(([nconst, primaryName]) => ({ nconst, primaryName, birthYear: NULL }));
}

// Six people, three chunks of two
const NAME_BASICS = people(
  ['nm1', 'Ann'],
  ['nm2', 'Bob'],
  ['nm3', 'Cy'],
  ['nm4', 'Di'],
  ['nm5', 'Ed'],
  ['nm6', 'Flo']
);

describe('loadRelevantPeople', () => {
  test('stops after the first chunk when every wanted ID is in it', async () => {
    const source = new MemoryRecordSource({ 'name.basics': NAME_BASICS });
    const { reporter } = captureReporter();

    const result = await loadRelevantPeople(source, new Set(['nm2', 'nm1']), {
      chunkSize: 2,
      progressEveryChunks: 10,
      reporter,
    });

    expect(source.chunksPulled).toBe(1);
    expect(result.chunksRead).toBe(1);
    expect(result.people).toEqual([
      { nconst: 'nm1', primaryName: 'Ann' },
      { nconst: 'nm2', primaryName: 'Bob' },
    ]);
    expect(result.unresolvedIds).toEqual([]);
  });

  test('does not pull past the chunk holding the last match', async () => {
    const source = new MemoryRecordSource({ 'name.basics': NAME_BASICS });
    const { reporter, lines } = captureReporter();

    await loadRelevantPeople(source, new Set(['nm1', 'nm3']), { chunkSize: 2, progressEveryChunks: 10, reporter });

    expect(source.chunksPulled).toBe(2);
    expect(lines).toContain('[build-movies] Found all relevant names; stopping early');
  });

  test('returns only found IDs and reports the rest as unresolved', async () => {
    const source = new MemoryRecordSource({ 'name.basics': people(['A', 'Ann'], ['X', 'Xan'], ['C', 'Cy']) });
    const { reporter, lines } = captureReporter(false);

    const result = await loadRelevantPeople(source, new Set(['A', 'B', 'C']), {
      chunkSize: 2,
      progressEveryChunks: 10,
      reporter,
    });

    expect(result.people.map(p => p.nconst)).toEqual(['A', 'C']);
    expect(result.unresolvedIds).toEqual(['B']);
    expect(result.chunksRead).toBe(2);
    expect(result.warnings).toEqual([{ kind: 'unresolved-reference', ids: ['B'] }]);
    expect(lines).toEqual(['[build-movies] Warning: 1 IDs not found in name.basics (B)']);
  });

  test('skips the scan entirely for an empty wanted set', async () => {
    const source = new MemoryRecordSource({ 'name.basics': NAME_BASICS });
    const { reporter, lines } = captureReporter(false);

    const result = await loadRelevantPeople(source, new Set<string>(), { chunkSize: 2, progressEveryChunks: 10, reporter });

    expect(source.fetched).toEqual([]);
    expect(result.people).toEqual([]);
    expect(result.warnings).toEqual([{ kind: 'empty-relevant-set' }]);
    expect(lines).toEqual(['[build-movies] Warning: No relevant IDs found; skipping name loading']);
  });

  test('ignores rows with a null ID or name', async () => {
    const source = new MemoryRecordSource({
      'name.basics': people([NULL, 'Ghost'], ['nm1', NULL], ['nm1', 'Ann']),
    });
    const { reporter } = captureReporter();

    const result = await loadRelevantPeople(source, new Set(['nm1']), { chunkSize: 10, progressEveryChunks: 10, reporter });

    expect(result.people).toEqual([{ nconst: 'nm1', primaryName: 'Ann' }]);
  });

  test('keeps one entry per ID when the reference repeats it', async () => {
    const source = new MemoryRecordSource({
      'name.basics': people(['nm1', 'Ann'], ['nm1', 'Ann Again'], ['nm2', 'Bob']),
    });
    const { reporter } = captureReporter();

    const result = await loadRelevantPeople(source, new Set(['nm1', 'nm2', 'nm7']), {
      chunkSize: 10,
      progressEveryChunks: 10,
      reporter,
    });

    expect(result.people).toEqual([
      { nconst: 'nm1', primaryName: 'Ann' },
      { nconst: 'nm2', primaryName: 'Bob' },
    ]);
  });

  test('logs scan progress every N chunks in verbose mode', async () => {
    const source = new MemoryRecordSource({ 'name.basics': NAME_BASICS });
    const { reporter, lines } = captureReporter(true);

    await loadRelevantPeople(source, new Set(['nm6']), { chunkSize: 2, progressEveryChunks: 2, reporter });

    expect(lines).toContain('[build-movies] Processed 4 rows; 1 IDs still missing');
  });

  test('counts the rows of a short final chunk as read', async () => {
    const source = new MemoryRecordSource({ 'name.basics': people(['nm1', 'Ann'], ['nm2', 'Bob'], ['nm3', 'Cy']) });
    const { reporter, lines } = captureReporter(true);

    await loadRelevantPeople(source, new Set(['nm9']), { chunkSize: 2, progressEveryChunks: 1, reporter });

    expect(lines).toContain('[build-movies] Processed 2 rows; 1 IDs still missing');
    expect(lines).toContain('[build-movies] Processed 3 rows; 1 IDs still missing');
    expect(lines).not.toContain('[build-movies] Processed 4 rows; 1 IDs still missing');
  });
});
