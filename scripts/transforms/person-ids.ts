/**
 * Person ID list helpers: collecting the IDs the filtered titles reference,
 * and rewriting ID lists into resolved display names.
 */

import type { JoinedTitle } from './join-titles';

export type CreditColumn = 'directors' | 'writers';

export const CREDIT_COLUMNS: readonly CreditColumn[] = ['directors', 'writers'];

export function splitIdList(cell: string): string[] {
  return cell
    .split(',')
    .map(token => token.trim())
    .filter(token => token !== '');
}

/**
 * Union of every director and writer ID, in first-seen order
 * (all director cells first, then writer cells).
 */
export function collectPersonIds(rows: readonly JoinedTitle[]): Set<string> {
  const ids = new Set<string>();
  for (const column of CREDIT_COLUMNS) {
    for (const row of rows) {
      const cell = row[column];
      if (cell === null) continue;
      for (const id of splitIdList(cell)) {
        ids.add(id);
      }
    }
  }
  return ids;
}

/**
 * "n1,n2,n3" → "Ann (1),Ann (2)" when n2 has no entry. Null when nothing resolves.
 */
export function idsToNames(cell: string | null, lookup: ReadonlyMap<string, string>): string | null {
  if (cell === null) return null;

  const names: string[] = [];
  for (const id of splitIdList(cell)) {
    const name = lookup.get(id);
    if (name !== undefined) {
      names.push(name);
    }
  }
  return names.length > 0 ? names.join(',') : null;
}

export function rewriteIdColumn(cells: readonly (string | null)[], lookup: ReadonlyMap<string, string>): (string | null)[] {
  return cells.map(cell => idsToNames(cell, lookup));
}
