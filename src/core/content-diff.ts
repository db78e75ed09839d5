/**
 * Content, request body, response and header diffs.
 */

import { diffKeyed, isKeyedDiffEmpty } from './keyed-diff';
import { diffValue } from './primitives';
import { diffSchemas, isSchemaDiffEmpty } from './schema-diff';
import { DiffState } from './state';
import {
  Content,
  ContentDiff,
  DiffConfig,
  Header,
  HeaderDiff,
  KeyedDiff,
  MediaType,
  MediaTypeDiff,
  RequestBody,
  RequestBodyDiff,
  Response,
  ResponseDiff,
  ResponsesDiff,
} from './types';

// ─── Content ────────────────────────────────────────────────────────────────

/**
 * Diff two content maps, keyed by media type (e.g. 'application/json').
 */
export function diffContent(
  config: Readonly<DiffConfig>,
  state: DiffState,
  content1: Content | undefined,
  content2: Content | undefined
): ContentDiff {
  return diffKeyed(
    content1,
    content2,
    (mediaType1, mediaType2) => diffMediaTypes(config, state, mediaType1, mediaType2),
    isMediaTypeDiffEmpty
  );
}

function diffMediaTypes(
  config: Readonly<DiffConfig>,
  state: DiffState,
  mediaType1: MediaType,
  mediaType2: MediaType
): MediaTypeDiff {
  const result: MediaTypeDiff = {};

  const schemaDiff = diffSchemas(config, state, mediaType1.schema, mediaType2.schema);
  if (!isSchemaDiffEmpty(schemaDiff)) result.schemaDiff = schemaDiff;

  if (!config.excludeExamples) {
    const exampleDiff = diffValue(mediaType1.example, mediaType2.example);
    if (exampleDiff) result.exampleDiff = exampleDiff;
  }

  return result;
}

export function isMediaTypeDiffEmpty(diff: MediaTypeDiff): boolean {
  return isSchemaDiffEmpty(diff.schemaDiff) && diff.exampleDiff === undefined;
}

// ─── Request Body ───────────────────────────────────────────────────────────

export function diffRequestBodies(
  config: Readonly<DiffConfig>,
  state: DiffState,
  body1: RequestBody | undefined,
  body2: RequestBody | undefined
): RequestBodyDiff {
  if (!body1 && !body2) return {};
  if (!body1) return { added: true };
  if (!body2) return { deleted: true };

  const result: RequestBodyDiff = {};

  if (!config.excludeDescription) {
    const descriptionDiff = diffValue(body1.description, body2.description);
    if (descriptionDiff) result.descriptionDiff = descriptionDiff;
  }

  const requiredDiff = diffValue(body1.required ?? false, body2.required ?? false);
  if (requiredDiff) result.requiredDiff = requiredDiff;

  const contentDiff = diffContent(config, state, body1.content, body2.content);
  if (!isKeyedDiffEmpty(contentDiff)) result.contentDiff = contentDiff;

  return result;
}

export function isRequestBodyDiffEmpty(diff: RequestBodyDiff | undefined): boolean {
  if (!diff) return true;
  return (
    diff.added === undefined &&
    diff.deleted === undefined &&
    diff.descriptionDiff === undefined &&
    diff.requiredDiff === undefined &&
    isKeyedDiffEmpty(diff.contentDiff)
  );
}

// ─── Responses ──────────────────────────────────────────────────────────────

/**
 * Diff two response maps, keyed by status code ('200', '4XX', 'default').
 */
export function diffResponses(
  config: Readonly<DiffConfig>,
  state: DiffState,
  responses1: Record<string, Response> | undefined,
  responses2: Record<string, Response> | undefined
): ResponsesDiff {
  return diffKeyed(
    responses1,
    responses2,
    (response1, response2) => diffResponse(config, state, response1, response2),
    isResponseDiffEmpty
  );
}

function diffResponse(
  config: Readonly<DiffConfig>,
  state: DiffState,
  response1: Response,
  response2: Response
): ResponseDiff {
  const result: ResponseDiff = {};

  if (!config.excludeDescription) {
    const descriptionDiff = diffValue(response1.description, response2.description);
    if (descriptionDiff) result.descriptionDiff = descriptionDiff;
  }

  const contentDiff = diffContent(config, state, response1.content, response2.content);
  if (!isKeyedDiffEmpty(contentDiff)) result.contentDiff = contentDiff;

  const headersDiff = diffHeaders(config, state, response1.headers, response2.headers);
  if (!isKeyedDiffEmpty(headersDiff)) result.headersDiff = headersDiff;

  return result;
}

export function isResponseDiffEmpty(diff: ResponseDiff): boolean {
  return (
    diff.descriptionDiff === undefined &&
    isKeyedDiffEmpty(diff.contentDiff) &&
    isKeyedDiffEmpty(diff.headersDiff)
  );
}

// ─── Headers ────────────────────────────────────────────────────────────────

export function diffHeaders(
  config: Readonly<DiffConfig>,
  state: DiffState,
  headers1: Record<string, Header> | undefined,
  headers2: Record<string, Header> | undefined
): KeyedDiff<HeaderDiff> {
  return diffKeyed(
    headers1,
    headers2,
    (header1, header2) => diffHeader(config, state, header1, header2),
    isHeaderDiffEmpty
  );
}

function diffHeader(
  config: Readonly<DiffConfig>,
  state: DiffState,
  header1: Header,
  header2: Header
): HeaderDiff {
  const result: HeaderDiff = {};

  if (!config.excludeDescription) {
    const descriptionDiff = diffValue(header1.description, header2.description);
    if (descriptionDiff) result.descriptionDiff = descriptionDiff;
  }

  const requiredDiff = diffValue(header1.required ?? false, header2.required ?? false);
  if (requiredDiff) result.requiredDiff = requiredDiff;

  const deprecatedDiff = diffValue(header1.deprecated ?? false, header2.deprecated ?? false);
  if (deprecatedDiff) result.deprecatedDiff = deprecatedDiff;

  const schemaDiff = diffSchemas(config, state, header1.schema, header2.schema);
  if (!isSchemaDiffEmpty(schemaDiff)) result.schemaDiff = schemaDiff;

  const contentDiff = diffContent(config, state, header1.content, header2.content);
  if (!isKeyedDiffEmpty(contentDiff)) result.contentDiff = contentDiff;

  return result;
}

export function isHeaderDiffEmpty(diff: HeaderDiff): boolean {
  return (
    diff.descriptionDiff === undefined &&
    diff.requiredDiff === undefined &&
    diff.deprecatedDiff === undefined &&
    isSchemaDiffEmpty(diff.schemaDiff) &&
    isKeyedDiffEmpty(diff.contentDiff)
  );
}
