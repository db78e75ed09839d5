/**
 * Keyed-collection diff
 *
 * The generic added/deleted/modified algorithm shared by endpoints, parameters,
 * responses, headers, content types, callbacks, properties and ref-named schemas.
 */

import { KeyedDiff } from './types';

/**
 * Diff two maps that share a key space.
 *
 * - `added`: keys only in `map2`, sorted
 * - `deleted`: keys only in `map1`, sorted
 * - `modified`: keys in both whose value diff is not empty, inserted in sorted key order
 *
 * @param diffEntry - Value diff for a key present on both sides
 * @param isEmpty   - Emptiness predicate for the value diff
 */
export function diffKeyed<V, D>(
  map1: Readonly<Record<string, V>> | undefined,
  map2: Readonly<Record<string, V>> | undefined,
  diffEntry: (value1: V, value2: V, key: string) => D,
  isEmpty: (diff: D) => boolean
): KeyedDiff<D> {
  const entries1 = map1 ?? {};
  const entries2 = map2 ?? {};
  const keys1 = Object.keys(entries1).sort();
  const keys2 = Object.keys(entries2).sort();

  const added = keys2.filter((key) => !hasKey(entries1, key));
  const deleted: string[] = [];
  const modified: Array<[string, D]> = [];

  for (const key of keys1) {
    if (!hasKey(entries2, key)) {
      deleted.push(key);
      continue;
    }
    const diff = diffEntry(entries1[key], entries2[key], key);
    if (!isEmpty(diff)) {
      modified.push([key, diff]);
    }
  }

  const result: KeyedDiff<D> = {};
  if (added.length > 0) result.added = added;
  if (deleted.length > 0) result.deleted = deleted;
  // fromEntries defines own properties, so a '__proto__' key stays an entry
  if (modified.length > 0) result.modified = Object.fromEntries(modified);
  return result;
}

export function isKeyedDiffEmpty<D>(diff: KeyedDiff<D> | undefined): boolean {
  if (!diff) return true;
  return (
    (diff.added?.length ?? 0) === 0 &&
    (diff.deleted?.length ?? 0) === 0 &&
    Object.keys(diff.modified ?? {}).length === 0
  );
}

function hasKey(record: Readonly<Record<string, unknown>>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}
