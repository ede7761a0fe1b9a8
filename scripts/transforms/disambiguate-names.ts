import { countBy } from 'lodash';
import type { PersonRecord } from '../lib/schema';

/**
 * Append " (n)" to every name that occurs more than once, numbering the
 * occurrences in the order the records are given. Names that occur once, and
 * null names, are left alone.
 *
 * The numbering follows input order only. For relevant people that is the
 * order the name.basics scan found them in.
 */
export function disambiguateNames(people: readonly PersonRecord[]): PersonRecord[] {
  const counts = countBy(
    people.flatMap(person => (person.primaryName === null ? [] : [person.primaryName]))
  );
  const seen = new Map<string, number>();

  return people.map(person => {
    const name = person.primaryName;
    if (name === null || (counts[name] ?? 0) < 2) {
      return person;
    }
    const occurrence = (seen.get(name) ?? 0) + 1;
    seen.set(name, occurrence);
    return { ...person, primaryName: `${name} (${occurrence})` };
  });
}

/**
 * nconst → display name. Rows missing either side are skipped.
 */
export function buildNameLookup(people: readonly PersonRecord[]): ReadonlyMap<string, string> {
  const lookup = new Map<string, string>();
  for (const { nconst, primaryName } of people) {
    if (nconst !== null && primaryName !== null) {
      lookup.set(nconst, primaryName);
    }
  }
  return lookup;
}
