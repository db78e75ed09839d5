/**
 * openapi-structural-diff
 *
 * Structural diff of two OpenAPI 3 documents, down to fields, parameters,
 * responses and schemas.
 *
 * @example
 * ```typescript
 * import { SpecComparator } from 'openapi-structural-diff';
 *
 * const comparator = new SpecComparator({ excludeExamples: true });
 * const result = comparator.compareFiles('./openapi-v1.yaml', './openapi-v2.yaml');
 *
 * console.log(comparator.summarize(result).endpoints);
 * console.log(comparator.format(result, 'markdown'));
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { SpecComparator } from './comparator';

// ─── Core Types ─────────────────────────────────────────────────────────────
export {
  ApiDocument,
  PathItem,
  Operation,
  Parameter,
  ParameterLocation,
  RequestBody,
  Response,
  Header,
  MediaType,
  Content,
  Callback,
  Server,
  Schema,
  SchemaRef,
  HttpMethod,
  HTTP_METHODS,
  ValueDiff,
  StringsDiff,
  SequenceDiff,
  KeyedDiff,
  SchemaListDiff,
  SchemaDiff,
  MediaTypeDiff,
  ContentDiff,
  ParameterDiff,
  ParametersDiff,
  RequestBodyDiff,
  HeaderDiff,
  ResponseDiff,
  ResponsesDiff,
  CallbackDiff,
  CallbacksDiff,
  OperationDiff,
  DiffResult,
  DiffSummary,
  SummaryDetails,
  DiffConfig,
  ComparatorOptions,
  ReportFormat,
} from './core/types';

// ─── Core Engine (for advanced usage) ───────────────────────────────────────
export { diffDocuments, isDiffResultEmpty } from './core/diff-result';
export { diffOperations, isOperationDiffEmpty, toEndpointMap } from './core/operation-diff';
export { diffSchemas, isSchemaDiffEmpty } from './core/schema-diff';
export { diffSchemaLists, combineSchemaListDiffs, isSchemaListDiffEmpty } from './core/schema-list-diff';
export { diffKeyed, isKeyedDiffEmpty } from './core/keyed-diff';
export { diffValue, diffStringSets, diffSequences } from './core/primitives';
export { matchExact, Matching } from './core/matching';
export { DiffState } from './core/state';
export { filterByRegex, FilterOutcome } from './core/filter';
export { getSummary } from './core/summary';
export { formatReport, describeOperationDiff } from './core/reporter';
export { resolveConfig, DEFAULT_CONFIG } from './core/config';
export { ConfigError } from './core/errors';

// ─── Loading ────────────────────────────────────────────────────────────────
export { loadDocument, loadDocumentFile, isOpenApiDocument } from './loader/openapi-loader';
export { parseDocumentText, parseYaml } from './formats';
