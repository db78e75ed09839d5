/**
 * Schema List Diff
 *
 * Diffs unordered lists of schemas (allOf/oneOf/anyOf). The result combines two parts:
 *
 * 1. Named references, keyed by reference name: counts of added/deleted references,
 *    `modified` holds the diff of references present on both sides.
 * 2. Inline schemas, paired by exact structural equality. Leftovers are counted as
 *    added/deleted, except when exactly one is left on each side: that pair is
 *    reported as one modification under the key '#<index in the first list>'.
 */

import { isDeepStrictEqual } from 'util';
import { diffKeyed } from './keyed-diff';
import { matchExact } from './matching';
import { diffSchemas, isSchemaDiffEmpty } from './schema-diff';
import { DiffState } from './state';
import { DiffConfig, SchemaDiff, SchemaListDiff, SchemaRef } from './types';

interface IndexedSchema {
  index: number;
  schemaRef: SchemaRef;
}

// ─── Main Diff ──────────────────────────────────────────────────────────────

export function diffSchemaLists(
  config: Readonly<DiffConfig>,
  state: DiffState,
  list1: readonly SchemaRef[] = [],
  list2: readonly SchemaRef[] = []
): SchemaListDiff {
  const refsDiff = diffReferencedSchemas(config, state, list1, list2);
  const inlineDiff = diffInlineSchemas(config, state, indexInline(list1), indexInline(list2));
  return combineSchemaListDiffs(refsDiff, inlineDiff);
}

/**
 * Merge two partial results over disjoint key spaces.
 * Counters add up; `modified` is a union.
 */
export function combineSchemaListDiffs(a: SchemaListDiff, b: SchemaListDiff): SchemaListDiff {
  return buildListDiff(
    (a.added ?? 0) + (b.added ?? 0),
    (a.deleted ?? 0) + (b.deleted ?? 0),
    { ...a.modified, ...b.modified }
  );
}

export function isSchemaListDiffEmpty(diff: SchemaListDiff | undefined): boolean {
  if (!diff) return true;
  return (
    (diff.added ?? 0) === 0 &&
    (diff.deleted ?? 0) === 0 &&
    Object.keys(diff.modified ?? {}).length === 0
  );
}

// ─── Referenced Schemas ─────────────────────────────────────────────────────

function diffReferencedSchemas(
  config: Readonly<DiffConfig>,
  state: DiffState,
  list1: readonly SchemaRef[],
  list2: readonly SchemaRef[]
): SchemaListDiff {
  const diff = diffKeyed(
    toRefMap(list1),
    toRefMap(list2),
    (schemaRef1, schemaRef2) => diffSchemas(config, state, schemaRef1, schemaRef2),
    isSchemaDiffEmpty
  );

  return buildListDiff(diff.added?.length ?? 0, diff.deleted?.length ?? 0, diff.modified ?? {});
}

function toRefMap(list: readonly SchemaRef[]): Record<string, SchemaRef> {
  const entries: Array<[string, SchemaRef]> = [];
  for (const schemaRef of list) {
    if (schemaRef.ref !== undefined) {
      entries.push([schemaRef.ref, schemaRef]);
    }
  }
  return Object.fromEntries(entries);
}

// ─── Inline Schemas ─────────────────────────────────────────────────────────

function indexInline(list: readonly SchemaRef[]): IndexedSchema[] {
  const inline: IndexedSchema[] = [];
  list.forEach((schemaRef, index) => {
    if (schemaRef.ref === undefined) inline.push({ index, schemaRef });
  });
  return inline;
}

function diffInlineSchemas(
  config: Readonly<DiffConfig>,
  state: DiffState,
  inline1: IndexedSchema[],
  inline2: IndexedSchema[]
): SchemaListDiff {
  // Exact structural equality, stricter than an empty diff (it sees every field)
  const { unmatchedLeft, unmatchedRight } = matchExact(inline1, inline2, (a, b) =>
    isDeepStrictEqual(a.schemaRef.value, b.schemaRef.value)
  );

  if (unmatchedLeft.length === 1 && unmatchedRight.length === 1) {
    const deleted = inline1[unmatchedLeft[0]];
    const added = inline2[unmatchedRight[0]];

    // Reported even when empty: the two schemas are known to differ
    const modified: Record<string, SchemaDiff> = {
      [`#${deleted.index}`]: diffSchemas(config, state, deleted.schemaRef, added.schemaRef),
    };
    return buildListDiff(0, 0, modified);
  }

  return buildListDiff(unmatchedRight.length, unmatchedLeft.length, {});
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function buildListDiff(
  added: number,
  deleted: number,
  modified: Record<string, SchemaDiff>
): SchemaListDiff {
  const diff: SchemaListDiff = {};
  if (added > 0) diff.added = added;
  if (deleted > 0) diff.deleted = deleted;
  if (Object.keys(modified).length > 0) diff.modified = modified;
  return diff;
}
