/**
 * Leaf diff primitives.
 *
 * Each returns `undefined` when the two inputs do not differ.
 */

import { isDeepStrictEqual } from 'util';
import { SequenceDiff, StringsDiff, ValueDiff } from './types';

// ─── Scalars ────────────────────────────────────────────────────────────────

/**
 * Diff two values. Objects and arrays (defaults, examples) compare structurally.
 */
export function diffValue<T>(from: T | undefined, to: T | undefined): ValueDiff<T> | undefined {
  if (isDeepStrictEqual(from, to)) return undefined;
  return { from, to };
}

// ─── String Sets ────────────────────────────────────────────────────────────

/**
 * Order-insensitive diff. Duplicates are ignored; output lists are sorted.
 */
export function diffStringSets(
  list1: readonly string[] = [],
  list2: readonly string[] = []
): StringsDiff | undefined {
  const set1 = new Set(list1);
  const set2 = new Set(list2);

  const added = [...set2].filter((s) => !set1.has(s)).sort();
  const deleted = [...set1].filter((s) => !set2.has(s)).sort();

  if (added.length === 0 && deleted.length === 0) return undefined;

  const diff: StringsDiff = {};
  if (added.length > 0) diff.added = added;
  if (deleted.length > 0) diff.deleted = deleted;
  return diff;
}

// ─── String Sequences ───────────────────────────────────────────────────────

/**
 * Order-sensitive diff. Added/deleted keep the order of their own sequence;
 * `reordered` is set when the elements present in both appear in a different order.
 */
export function diffSequences(
  seq1: readonly string[] = [],
  seq2: readonly string[] = []
): SequenceDiff | undefined {
  const set1 = new Set(seq1);
  const set2 = new Set(seq2);

  const added = unique(seq2.filter((s) => !set1.has(s)));
  const deleted = unique(seq1.filter((s) => !set2.has(s)));
  const common1 = seq1.filter((s) => set2.has(s));
  const common2 = seq2.filter((s) => set1.has(s));
  const reordered = !isDeepStrictEqual(common1, common2);

  if (added.length === 0 && deleted.length === 0 && !reordered) return undefined;

  const diff: SequenceDiff = {};
  if (added.length > 0) diff.added = added;
  if (deleted.length > 0) diff.deleted = deleted;
  if (reordered) diff.reordered = true;
  return diff;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
