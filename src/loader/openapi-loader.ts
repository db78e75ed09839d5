/**
 * OpenAPI Document Loader
 *
 * Turns a parsed OpenAPI 3.0 document into the in-memory model the diff engine
 * walks. Every `#/components/...` reference is resolved here:
 *
 * - schema references keep their name and share one `Schema` object per component,
 *   so recursive components become cycles in the object graph;
 * - parameters, request bodies, responses, headers and callbacks are inlined.
 *
 * Path-level parameters are merged into each operation; an operation-level
 * parameter with the same location and name wins.
 */

import * as fs from 'fs';
import * as path from 'path';
import { OpenAPIV3 } from 'openapi-types';
import { parameterKey } from '../core/parameters-diff';
import { parseDocumentText } from '../formats';
import { logger } from '../logger';
import {
  ApiDocument,
  Callback,
  Content,
  Header,
  HttpMethod,
  MediaType,
  Operation,
  Parameter,
  ParameterLocation,
  PathItem,
  RequestBody,
  Response,
  Schema,
  SchemaRef,
} from '../core/types';

type Referable<T> = T | OpenAPIV3.ReferenceObject;
type ComponentTable<T> = Record<string, Referable<T>> | undefined;

const PARAMETER_LOCATIONS: readonly ParameterLocation[] = ['path', 'query', 'header', 'cookie'];

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Shallow shape check: an object with an `openapi: '3.x'` version and a `paths` object.
 */
export function isOpenApiDocument(value: unknown): value is OpenAPIV3.Document {
  if (typeof value !== 'object' || value === null) return false;
  const version: unknown = Reflect.get(value, 'openapi');
  const paths: unknown = Reflect.get(value, 'paths');
  return (
    typeof version === 'string' &&
    version.startsWith('3.') &&
    typeof paths === 'object' &&
    paths !== null
  );
}

/**
 * Convert a parsed OpenAPI 3.0 document. Throws on an unresolved reference.
 */
export function loadDocument(document: OpenAPIV3.Document): ApiDocument {
  return new DocumentLoader(document).load();
}

/**
 * Read, parse and convert an OpenAPI document file (JSON or YAML).
 */
export function loadDocumentFile(filePath: string): ApiDocument {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`File not found: ${filePath}`);
  }

  const parsed = parseDocumentText(fs.readFileSync(resolved, 'utf-8'), resolved);
  if (!isOpenApiDocument(parsed)) {
    throw new Error(`Not an OpenAPI 3 document: ${filePath}`);
  }

  logger.debug(`Loaded ${filePath}`);
  return loadDocument(parsed);
}

// ─── Loader ─────────────────────────────────────────────────────────────────

class DocumentLoader {
  private readonly schemas = new Map<string, Schema>();

  constructor(private readonly document: OpenAPIV3.Document) {}

  load(): ApiDocument {
    const paths: Array<[string, PathItem]> = [];
    for (const [pathKey, pathItem] of Object.entries(this.document.paths)) {
      if (pathItem) {
        paths.push([pathKey, this.convertPathItem(pathItem)]);
      }
    }
    return { paths: Object.fromEntries(paths) };
  }

  // ─── References ───────────────────────────────────────────────────────────

  /**
   * Follow a chain of references inside one components table.
   */
  private resolve<T extends object>(
    value: Referable<T>,
    table: ComponentTable<T>,
    section: string,
    seen: Set<string> = new Set()
  ): T {
    if (!isReference(value)) return value;

    const ref = value.$ref;
    if (seen.has(ref)) {
      throw new Error(`Circular reference: ${ref}`);
    }
    seen.add(ref);

    const target = table?.[componentName(ref, section)];
    if (target === undefined) {
      throw new Error(`Unresolved reference: ${ref}`);
    }
    return this.resolve(target, table, section, seen);
  }

  // ─── Schemas ──────────────────────────────────────────────────────────────

  private convertSchemaRef(value: Referable<OpenAPIV3.SchemaObject>): SchemaRef {
    if (!isReference(value)) {
      return { value: this.convertSchema(value) };
    }
    return { ref: value.$ref, value: this.namedSchema(value.$ref) };
  }

  /**
   * One shared object per component. The placeholder is cached before it is filled,
   * so a component that reaches itself gets the same object back.
   * An alias component ($ref to another component) shares its target's object.
   */
  private namedSchema(ref: string, aliases: Set<string> = new Set()): Schema {
    const cached = this.schemas.get(ref);
    if (cached) return cached;

    const target = this.document.components?.schemas?.[componentName(ref, 'schemas')];
    if (target === undefined) {
      throw new Error(`Unresolved reference: ${ref}`);
    }

    if (isReference(target)) {
      if (aliases.has(ref)) {
        throw new Error(`Circular reference: ${ref}`);
      }
      aliases.add(ref);
      const shared = this.namedSchema(target.$ref, aliases);
      this.schemas.set(ref, shared);
      return shared;
    }

    const placeholder: Schema = {};
    this.schemas.set(ref, placeholder);
    Object.assign(placeholder, this.convertSchema(target));
    return placeholder;
  }

  private convertSchema(schema: OpenAPIV3.SchemaObject): Schema {
    const result: Schema = {};

    if (schema.type !== undefined) result.type = schema.type;
    if (schema.format !== undefined) result.format = schema.format;
    if (schema.title !== undefined) result.title = schema.title;
    if (schema.description !== undefined) result.description = schema.description;
    if (schema.nullable !== undefined) result.nullable = schema.nullable;
    if (schema.readOnly !== undefined) result.readOnly = schema.readOnly;
    if (schema.writeOnly !== undefined) result.writeOnly = schema.writeOnly;
    if (schema.deprecated !== undefined) result.deprecated = schema.deprecated;
    if (schema.default !== undefined) result.default = schema.default;
    if (schema.example !== undefined) result.example = schema.example;
    if (schema.enum !== undefined) result.enum = [...schema.enum];
    if (schema.required !== undefined) result.required = [...schema.required];

    if (schema.properties !== undefined) {
      result.properties = mapValues(schema.properties, (property) => this.convertSchemaRef(property));
    }

    if ('items' in schema && schema.items !== undefined) {
      result.items = this.convertSchemaRef(schema.items);
    }
    if (schema.not !== undefined) result.not = this.convertSchemaRef(schema.not);

    const additional = schema.additionalProperties;
    if (typeof additional === 'boolean') {
      result.additionalProperties = additional;
    } else if (additional !== undefined) {
      result.additionalProperties = this.convertSchemaRef(additional);
    }

    if (schema.allOf !== undefined) result.allOf = schema.allOf.map((s) => this.convertSchemaRef(s));
    if (schema.oneOf !== undefined) result.oneOf = schema.oneOf.map((s) => this.convertSchemaRef(s));
    if (schema.anyOf !== undefined) result.anyOf = schema.anyOf.map((s) => this.convertSchemaRef(s));

    if (schema.multipleOf !== undefined) result.multipleOf = schema.multipleOf;
    if (schema.minimum !== undefined) result.minimum = schema.minimum;
    if (schema.maximum !== undefined) result.maximum = schema.maximum;
    if (schema.exclusiveMinimum !== undefined) result.exclusiveMinimum = schema.exclusiveMinimum;
    if (schema.exclusiveMaximum !== undefined) result.exclusiveMaximum = schema.exclusiveMaximum;
    if (schema.minLength !== undefined) result.minLength = schema.minLength;
    if (schema.maxLength !== undefined) result.maxLength = schema.maxLength;
    if (schema.pattern !== undefined) result.pattern = schema.pattern;
    if (schema.minItems !== undefined) result.minItems = schema.minItems;
    if (schema.maxItems !== undefined) result.maxItems = schema.maxItems;
    if (schema.uniqueItems !== undefined) result.uniqueItems = schema.uniqueItems;
    if (schema.minProperties !== undefined) result.minProperties = schema.minProperties;
    if (schema.maxProperties !== undefined) result.maxProperties = schema.maxProperties;

    return result;
  }

  // ─── Content & Bodies ─────────────────────────────────────────────────────

  private convertContent(content: Record<string, OpenAPIV3.MediaTypeObject>): Content {
    return mapValues(content, (media) => {
      const result: MediaType = {};
      if (media.schema !== undefined) result.schema = this.convertSchemaRef(media.schema);
      if (media.example !== undefined) result.example = media.example;
      return result;
    });
  }

  private convertRequestBody(value: Referable<OpenAPIV3.RequestBodyObject>): RequestBody {
    const body = this.resolve(value, this.document.components?.requestBodies, 'requestBodies');
    const result: RequestBody = { content: this.convertContent(body.content) };
    if (body.description !== undefined) result.description = body.description;
    if (body.required !== undefined) result.required = body.required;
    return result;
  }

  private convertResponse(value: Referable<OpenAPIV3.ResponseObject>): Response {
    const response = this.resolve(value, this.document.components?.responses, 'responses');
    const result: Response = { description: response.description };

    if (response.content !== undefined) result.content = this.convertContent(response.content);
    if (response.headers !== undefined) {
      result.headers = mapValues(response.headers, (header) => this.convertHeader(header));
    }
    return result;
  }

  private convertHeader(value: Referable<OpenAPIV3.HeaderObject>): Header {
    const header = this.resolve(value, this.document.components?.headers, 'headers');
    const result: Header = {};
    if (header.description !== undefined) result.description = header.description;
    if (header.required !== undefined) result.required = header.required;
    if (header.deprecated !== undefined) result.deprecated = header.deprecated;
    if (header.schema !== undefined) result.schema = this.convertSchemaRef(header.schema);
    if (header.content !== undefined) result.content = this.convertContent(header.content);
    return result;
  }

  // ─── Parameters ───────────────────────────────────────────────────────────

  private convertParameter(value: Referable<OpenAPIV3.ParameterObject>): Parameter {
    const parameter = this.resolve(value, this.document.components?.parameters, 'parameters');
    const location = PARAMETER_LOCATIONS.find((l) => l === parameter.in);
    if (location === undefined) {
      throw new Error(`Unknown location "${parameter.in}" for parameter "${parameter.name}"`);
    }

    const result: Parameter = { name: parameter.name, in: location };
    if (parameter.description !== undefined) result.description = parameter.description;
    if (parameter.required !== undefined) result.required = parameter.required;
    if (parameter.deprecated !== undefined) result.deprecated = parameter.deprecated;
    if (parameter.allowEmptyValue !== undefined) result.allowEmptyValue = parameter.allowEmptyValue;
    if (parameter.style !== undefined) result.style = parameter.style;
    if (parameter.explode !== undefined) result.explode = parameter.explode;
    if (parameter.example !== undefined) result.example = parameter.example;
    if (parameter.schema !== undefined) result.schema = this.convertSchemaRef(parameter.schema);
    if (parameter.content !== undefined) result.content = this.convertContent(parameter.content);
    return result;
  }

  private mergeParameters(
    pathLevel: Referable<OpenAPIV3.ParameterObject>[] = [],
    operationLevel: Referable<OpenAPIV3.ParameterObject>[] = []
  ): Parameter[] {
    const merged = new Map<string, Parameter>();
    for (const value of [...pathLevel, ...operationLevel]) {
      const parameter = this.convertParameter(value);
      merged.set(parameterKey(parameter), parameter);
    }
    return [...merged.values()];
  }

  // ─── Operations ───────────────────────────────────────────────────────────

  private convertPathItem(pathItem: OpenAPIV3.PathItemObject): PathItem {
    const result: PathItem = {};
    for (const method of Object.values(OpenAPIV3.HttpMethods)) {
      const operation = pathItem[method];
      if (operation) {
        result[toHttpMethod(method)] = this.convertOperation(operation, pathItem);
      }
    }
    return result;
  }

  private convertOperation(
    operation: OpenAPIV3.OperationObject,
    pathItem: OpenAPIV3.PathItemObject
  ): Operation {
    const result: Operation = {
      tags: operation.tags ?? [],
      parameters: this.mergeParameters(pathItem.parameters, operation.parameters),
      responses: {},
      callbacks: {},
      servers: (operation.servers ?? []).map((server) => ({
        url: server.url,
        description: server.description,
      })),
    };

    if (operation.summary !== undefined) result.summary = operation.summary;
    if (operation.description !== undefined) result.description = operation.description;
    if (operation.operationId !== undefined) result.operationId = operation.operationId;
    if (operation.deprecated !== undefined) result.deprecated = operation.deprecated;
    if (operation.requestBody !== undefined) {
      result.requestBody = this.convertRequestBody(operation.requestBody);
    }

    if (operation.responses !== undefined) {
      result.responses = mapValues(operation.responses, (response) => this.convertResponse(response));
    }
    if (operation.callbacks !== undefined) {
      result.callbacks = mapValues(operation.callbacks, (callback) => this.convertCallback(callback));
    }

    return result;
  }

  private convertCallback(value: Referable<OpenAPIV3.CallbackObject>): Callback {
    const callback = this.resolve(value, this.document.components?.callbacks, 'callbacks');
    return mapValues(callback, (pathItem) => this.convertPathItem(pathItem));
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function isReference(value: object): value is OpenAPIV3.ReferenceObject {
  return '$ref' in value;
}

/** Keys are copied as own properties, '__proto__' included */
function mapValues<T, U>(
  record: Readonly<Record<string, T>>,
  convert: (value: T) => U
): Record<string, U> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]): [string, U] => [key, convert(value)])
  );
}

/**
 * '#/components/schemas/Pet' → 'Pet'. Only local component references are supported.
 */
function componentName(ref: string, section: string): string {
  const prefix = `#/components/${section}/`;
  if (!ref.startsWith(prefix)) {
    throw new Error(`Unsupported reference "${ref}" (expected ${prefix}<name>)`);
  }
  return decodePointerSegment(ref.slice(prefix.length));
}

function decodePointerSegment(segment: string): string {
  return decodeURIComponent(segment).replace(/~1/g, '/').replace(/~0/g, '~');
}

function toHttpMethod(method: OpenAPIV3.HttpMethods): HttpMethod {
  switch (method) {
    case OpenAPIV3.HttpMethods.GET:
      return 'get';
    case OpenAPIV3.HttpMethods.PUT:
      return 'put';
    case OpenAPIV3.HttpMethods.POST:
      return 'post';
    case OpenAPIV3.HttpMethods.DELETE:
      return 'delete';
    case OpenAPIV3.HttpMethods.OPTIONS:
      return 'options';
    case OpenAPIV3.HttpMethods.HEAD:
      return 'head';
    case OpenAPIV3.HttpMethods.PATCH:
      return 'patch';
    case OpenAPIV3.HttpMethods.TRACE:
      return 'trace';
  }
}
