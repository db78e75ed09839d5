/**
 * Recursive Schema Diff
 *
 * Compares two schema definitions field by field and recurses into
 * properties, items, not, additionalProperties and the composition lists.
 */

import { diffKeyed, isKeyedDiffEmpty } from './keyed-diff';
import { diffSequences, diffStringSets, diffValue } from './primitives';
import { diffSchemaLists, isSchemaListDiffEmpty } from './schema-list-diff';
import { DiffState } from './state';
import { DiffConfig, Schema, SchemaDiff, SchemaRef } from './types';

// ─── Entry ──────────────────────────────────────────────────────────────────

/**
 * Diff two schema slots.
 *
 * A slot that exists on one side only is reported as `schemaAdded`/`schemaDeleted`.
 * When either side is a named reference the pair goes through the cycle guard:
 * a pair already open higher on the stack yields an empty diff.
 */
export function diffSchemas(
  config: Readonly<DiffConfig>,
  state: DiffState,
  schemaRef1: SchemaRef | undefined,
  schemaRef2: SchemaRef | undefined
): SchemaDiff {
  if (!schemaRef1 && !schemaRef2) return {};
  if (!schemaRef1) return { schemaAdded: true };
  if (!schemaRef2) return { schemaDeleted: true };

  const schema1 = schemaRef1.value;
  const schema2 = schemaRef2.value;

  if (schemaRef1.ref === undefined && schemaRef2.ref === undefined) {
    return diffSchemaValues(config, state, schema1, schema2);
  }

  if (state.isActive(schema1, schema2)) return {};

  state.push(schema1, schema2);
  try {
    return diffSchemaValues(config, state, schema1, schema2);
  } finally {
    state.pop(schema1, schema2);
  }
}

// ─── Field-by-field ─────────────────────────────────────────────────────────

function diffSchemaValues(
  config: Readonly<DiffConfig>,
  state: DiffState,
  schema1: Schema,
  schema2: Schema
): SchemaDiff {
  const result: SchemaDiff = {};

  result.typeDiff = diffValue(schema1.type, schema2.type);
  result.formatDiff = diffValue(schema1.format, schema2.format);
  result.titleDiff = diffValue(schema1.title, schema2.title);
  if (!config.excludeDescription) {
    result.descriptionDiff = diffValue(schema1.description, schema2.description);
  }
  result.nullableDiff = diffValue(schema1.nullable, schema2.nullable);
  result.readOnlyDiff = diffValue(schema1.readOnly, schema2.readOnly);
  result.writeOnlyDiff = diffValue(schema1.writeOnly, schema2.writeOnly);
  result.deprecatedDiff = diffValue(schema1.deprecated, schema2.deprecated);
  result.defaultDiff = diffValue(schema1.default, schema2.default);
  if (!config.excludeExamples) {
    result.exampleDiff = diffValue(schema1.example, schema2.example);
  }

  result.enumDiff = diffSequences(encodeEnum(schema1.enum), encodeEnum(schema2.enum));
  result.requiredDiff = diffStringSets(schema1.required, schema2.required);

  const propertiesDiff = diffKeyed(
    schema1.properties,
    schema2.properties,
    (property1, property2) => diffSchemas(config, state, property1, property2),
    isSchemaDiffEmpty
  );
  if (!isKeyedDiffEmpty(propertiesDiff)) result.propertiesDiff = propertiesDiff;

  result.itemsDiff = nonEmpty(diffSchemas(config, state, schema1.items, schema2.items));
  result.notDiff = nonEmpty(diffSchemas(config, state, schema1.not, schema2.not));

  result.additionalPropertiesAllowedDiff = diffValue(
    schema1.additionalProperties !== false,
    schema2.additionalProperties !== false
  );
  result.additionalPropertiesDiff = nonEmpty(
    diffSchemas(
      config,
      state,
      additionalPropertiesSchema(schema1),
      additionalPropertiesSchema(schema2)
    )
  );

  const allOfDiff = diffSchemaLists(config, state, schema1.allOf, schema2.allOf);
  if (!isSchemaListDiffEmpty(allOfDiff)) result.allOfDiff = allOfDiff;
  const oneOfDiff = diffSchemaLists(config, state, schema1.oneOf, schema2.oneOf);
  if (!isSchemaListDiffEmpty(oneOfDiff)) result.oneOfDiff = oneOfDiff;
  const anyOfDiff = diffSchemaLists(config, state, schema1.anyOf, schema2.anyOf);
  if (!isSchemaListDiffEmpty(anyOfDiff)) result.anyOfDiff = anyOfDiff;

  // Constraints
  result.multipleOfDiff = diffValue(schema1.multipleOf, schema2.multipleOf);
  result.minimumDiff = diffValue(schema1.minimum, schema2.minimum);
  result.maximumDiff = diffValue(schema1.maximum, schema2.maximum);
  result.exclusiveMinimumDiff = diffValue(schema1.exclusiveMinimum, schema2.exclusiveMinimum);
  result.exclusiveMaximumDiff = diffValue(schema1.exclusiveMaximum, schema2.exclusiveMaximum);
  result.minLengthDiff = diffValue(schema1.minLength, schema2.minLength);
  result.maxLengthDiff = diffValue(schema1.maxLength, schema2.maxLength);
  result.patternDiff = diffValue(schema1.pattern, schema2.pattern);
  result.minItemsDiff = diffValue(schema1.minItems, schema2.minItems);
  result.maxItemsDiff = diffValue(schema1.maxItems, schema2.maxItems);
  result.uniqueItemsDiff = diffValue(schema1.uniqueItems, schema2.uniqueItems);
  result.minPropertiesDiff = diffValue(schema1.minProperties, schema2.minProperties);
  result.maxPropertiesDiff = diffValue(schema1.maxProperties, schema2.maxProperties);

  return compact(result);
}

// ─── Emptiness ──────────────────────────────────────────────────────────────

const LEAF_FIELDS = [
  'typeDiff',
  'formatDiff',
  'titleDiff',
  'descriptionDiff',
  'nullableDiff',
  'readOnlyDiff',
  'writeOnlyDiff',
  'deprecatedDiff',
  'defaultDiff',
  'exampleDiff',
  'enumDiff',
  'requiredDiff',
  'additionalPropertiesAllowedDiff',
  'multipleOfDiff',
  'minimumDiff',
  'maximumDiff',
  'exclusiveMinimumDiff',
  'exclusiveMaximumDiff',
  'minLengthDiff',
  'maxLengthDiff',
  'patternDiff',
  'minItemsDiff',
  'maxItemsDiff',
  'uniqueItemsDiff',
  'minPropertiesDiff',
  'maxPropertiesDiff',
] as const satisfies readonly (keyof SchemaDiff)[];

export function isSchemaDiffEmpty(diff: SchemaDiff | undefined): boolean {
  if (!diff) return true;
  return (
    diff.schemaAdded === undefined &&
    diff.schemaDeleted === undefined &&
    LEAF_FIELDS.every((field) => diff[field] === undefined) &&
    isKeyedDiffEmpty(diff.propertiesDiff) &&
    isSchemaDiffEmpty(diff.itemsDiff) &&
    isSchemaDiffEmpty(diff.notDiff) &&
    isSchemaDiffEmpty(diff.additionalPropertiesDiff) &&
    isSchemaListDiffEmpty(diff.allOfDiff) &&
    isSchemaListDiffEmpty(diff.oneOfDiff) &&
    isSchemaListDiffEmpty(diff.anyOfDiff)
  );
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function nonEmpty(diff: SchemaDiff): SchemaDiff | undefined {
  return isSchemaDiffEmpty(diff) ? undefined : diff;
}

/** `true` and an absent value both allow any property; only a schema is diffed */
function additionalPropertiesSchema(schema: Schema): SchemaRef | undefined {
  const value = schema.additionalProperties;
  return typeof value === 'object' ? value : undefined;
}

/** Enum members may be any JSON value; compare their encodings in order */
function encodeEnum(values: unknown[] | undefined): string[] | undefined {
  return values?.map((value) => String(JSON.stringify(value)));
}

/** Drop fields left undefined so the diff serializes with only what changed */
function compact(diff: SchemaDiff): SchemaDiff {
  const result: SchemaDiff = {};
  for (const [field, value] of Object.entries(diff)) {
    if (value !== undefined) {
      Object.assign(result, { [field]: value });
    }
  }
  return result;
}
