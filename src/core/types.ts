/**
 * Canonical type definitions for openapi-structural-diff.
 *
 * Two families live here: the in-memory API document model the engine walks,
 * and the diff structures it produces. Diff structures follow an omit-if-empty
 * convention: a field is present only when it carries a difference.
 */

// ─── Document Model ─────────────────────────────────────────────────────────

export type HttpMethod = 'get' | 'put' | 'post' | 'delete' | 'options' | 'head' | 'patch' | 'trace';

export const HTTP_METHODS: readonly HttpMethod[] = [
  'get',
  'put',
  'post',
  'delete',
  'options',
  'head',
  'patch',
  'trace',
];

/**
 * A schema slot. Named references share their `value` object with every other
 * reference to the same component, so recursive schemas form object cycles.
 */
export interface SchemaRef {
  /** JSON pointer of the referenced component, e.g. '#/components/schemas/Pet' */
  ref?: string;
  value: Schema;
}

export interface Schema {
  type?: string;
  format?: string;
  title?: string;
  description?: string;
  nullable?: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
  deprecated?: boolean;
  default?: unknown;
  example?: unknown;
  enum?: unknown[];
  required?: string[];
  properties?: Record<string, SchemaRef>;
  items?: SchemaRef;
  not?: SchemaRef;
  additionalProperties?: boolean | SchemaRef;
  allOf?: SchemaRef[];
  oneOf?: SchemaRef[];
  anyOf?: SchemaRef[];
  multipleOf?: number;
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: boolean;
  exclusiveMaximum?: boolean;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;
  minProperties?: number;
  maxProperties?: number;
}

export interface MediaType {
  schema?: SchemaRef;
  example?: unknown;
}

export type Content = Record<string, MediaType>;

export type ParameterLocation = 'path' | 'query' | 'header' | 'cookie';

export interface Parameter {
  name: string;
  in: ParameterLocation;
  description?: string;
  required?: boolean;
  deprecated?: boolean;
  allowEmptyValue?: boolean;
  style?: string;
  explode?: boolean;
  example?: unknown;
  schema?: SchemaRef;
  content?: Content;
}

export interface Header {
  description?: string;
  required?: boolean;
  deprecated?: boolean;
  schema?: SchemaRef;
  content?: Content;
}

export interface RequestBody {
  description?: string;
  required?: boolean;
  content?: Content;
}

export interface Response {
  description?: string;
  headers?: Record<string, Header>;
  content?: Content;
}

export interface Server {
  url: string;
  description?: string;
}

/** Operations of one path (or callback expression), keyed by method */
export type PathItem = Partial<Record<HttpMethod, Operation>>;

/** A callback: runtime expression → path item */
export type Callback = Record<string, PathItem>;

export interface Operation {
  tags?: string[];
  summary?: string;
  description?: string;
  operationId?: string;
  deprecated?: boolean;
  parameters?: Parameter[];
  requestBody?: RequestBody;
  responses?: Record<string, Response>;
  callbacks?: Record<string, Callback>;
  servers?: Server[];
}

export interface ApiDocument {
  paths: Record<string, PathItem>;
}

// ─── Leaf Diffs ─────────────────────────────────────────────────────────────

export interface ValueDiff<T = unknown> {
  from: T | undefined;
  to: T | undefined;
}

/** Order-insensitive diff of two string sets */
export interface StringsDiff {
  added?: string[];
  deleted?: string[];
}

/** Order-sensitive diff of two string sequences */
export interface SequenceDiff {
  added?: string[];
  deleted?: string[];
  /** The elements common to both sequences appear in a different order */
  reordered?: boolean;
}

// ─── Collection Diffs ───────────────────────────────────────────────────────

export interface KeyedDiff<D> {
  added?: string[];
  deleted?: string[];
  modified?: Record<string, D>;
}

/**
 * Diff of two unordered schema lists (allOf/oneOf/anyOf).
 * Modified keys are reference names, or '#<index>' for the single inline pair.
 */
export interface SchemaListDiff {
  added?: number;
  deleted?: number;
  modified?: Record<string, SchemaDiff>;
}

// ─── Schema Diff ────────────────────────────────────────────────────────────

export interface SchemaDiff {
  schemaAdded?: true;
  schemaDeleted?: true;
  typeDiff?: ValueDiff;
  formatDiff?: ValueDiff;
  titleDiff?: ValueDiff;
  descriptionDiff?: ValueDiff;
  nullableDiff?: ValueDiff;
  readOnlyDiff?: ValueDiff;
  writeOnlyDiff?: ValueDiff;
  deprecatedDiff?: ValueDiff;
  defaultDiff?: ValueDiff;
  exampleDiff?: ValueDiff;
  enumDiff?: SequenceDiff;
  requiredDiff?: StringsDiff;
  propertiesDiff?: KeyedDiff<SchemaDiff>;
  itemsDiff?: SchemaDiff;
  notDiff?: SchemaDiff;
  additionalPropertiesAllowedDiff?: ValueDiff;
  additionalPropertiesDiff?: SchemaDiff;
  allOfDiff?: SchemaListDiff;
  oneOfDiff?: SchemaListDiff;
  anyOfDiff?: SchemaListDiff;
  multipleOfDiff?: ValueDiff;
  minimumDiff?: ValueDiff;
  maximumDiff?: ValueDiff;
  exclusiveMinimumDiff?: ValueDiff;
  exclusiveMaximumDiff?: ValueDiff;
  minLengthDiff?: ValueDiff;
  maxLengthDiff?: ValueDiff;
  patternDiff?: ValueDiff;
  minItemsDiff?: ValueDiff;
  maxItemsDiff?: ValueDiff;
  uniqueItemsDiff?: ValueDiff;
  minPropertiesDiff?: ValueDiff;
  maxPropertiesDiff?: ValueDiff;
}

// ─── Operation Diffs ────────────────────────────────────────────────────────

export interface MediaTypeDiff {
  schemaDiff?: SchemaDiff;
  exampleDiff?: ValueDiff;
}

export type ContentDiff = KeyedDiff<MediaTypeDiff>;

export interface ParameterDiff {
  descriptionDiff?: ValueDiff;
  requiredDiff?: ValueDiff;
  deprecatedDiff?: ValueDiff;
  allowEmptyValueDiff?: ValueDiff;
  styleDiff?: ValueDiff;
  explodeDiff?: ValueDiff;
  exampleDiff?: ValueDiff;
  schemaDiff?: SchemaDiff;
  contentDiff?: ContentDiff;
}

/** Keyed by '<in>:<name>', e.g. 'query:limit' */
export type ParametersDiff = KeyedDiff<ParameterDiff>;

export interface RequestBodyDiff {
  added?: true;
  deleted?: true;
  descriptionDiff?: ValueDiff;
  requiredDiff?: ValueDiff;
  contentDiff?: ContentDiff;
}

export interface HeaderDiff {
  descriptionDiff?: ValueDiff;
  requiredDiff?: ValueDiff;
  deprecatedDiff?: ValueDiff;
  schemaDiff?: SchemaDiff;
  contentDiff?: ContentDiff;
}

export interface ResponseDiff {
  descriptionDiff?: ValueDiff;
  contentDiff?: ContentDiff;
  headersDiff?: KeyedDiff<HeaderDiff>;
}

/** Keyed by status code */
export type ResponsesDiff = KeyedDiff<ResponseDiff>;

/** Endpoints of one callback, keyed by 'METHOD EXPRESSION' */
export type CallbackDiff = KeyedDiff<OperationDiff>;

export type CallbacksDiff = KeyedDiff<CallbackDiff>;

export interface OperationDiff {
  tagsDiff?: StringsDiff;
  summaryDiff?: ValueDiff;
  descriptionDiff?: ValueDiff;
  operationIdDiff?: ValueDiff;
  deprecatedDiff?: ValueDiff;
  parametersDiff?: ParametersDiff;
  requestBodyDiff?: RequestBodyDiff;
  responsesDiff?: ResponsesDiff;
  callbacksDiff?: CallbacksDiff;
  serversDiff?: SequenceDiff;
}

// ─── Result ─────────────────────────────────────────────────────────────────

export interface DiffResult {
  /** 'METHOD PATH' keys, sorted */
  addedEndpoints: string[];
  deletedEndpoints: string[];
  modifiedEndpoints: Record<string, OperationDiff>;
}

export interface SummaryDetails {
  added: number;
  deleted: number;
  modified: number;
}

export interface DiffSummary {
  diff: boolean;
  endpoints: SummaryDetails;
  /** Totals across all modified endpoints */
  parameters: SummaryDetails;
  responses: SummaryDetails;
  callbacks: SummaryDetails;
}

// ─── Configuration ──────────────────────────────────────────────────────────

export interface DiffConfig {
  /** Skip description fields everywhere */
  excludeDescription: boolean;

  /** Skip example fields everywhere */
  excludeExamples: boolean;

  /** Keep only endpoints whose 'METHOD PATH' matches this regex */
  pathFilter?: string;
}

export type ReportFormat = 'console' | 'json' | 'markdown' | 'html';

export interface ComparatorOptions extends Partial<DiffConfig> {
  /** Default format used by `format()` (default: 'console') */
  defaultFormat?: ReportFormat;
}
