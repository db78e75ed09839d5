/**
 * Operation Diff
 *
 * Composes the leaf, collection and schema diffs into the diff of one HTTP
 * operation, and diffs maps of endpoints (top-level paths and callbacks alike).
 */

import { diffRequestBodies, diffResponses, isRequestBodyDiffEmpty } from './content-diff';
import { diffKeyed, isKeyedDiffEmpty } from './keyed-diff';
import { diffParameters } from './parameters-diff';
import { diffSequences, diffStringSets, diffValue } from './primitives';
import { DiffState } from './state';
import {
  Callback,
  CallbackDiff,
  CallbacksDiff,
  DiffConfig,
  HTTP_METHODS,
  KeyedDiff,
  Operation,
  OperationDiff,
  PathItem,
} from './types';

// ─── Endpoints ──────────────────────────────────────────────────────────────

/**
 * Flatten path items into 'METHOD PATH' → operation.
 */
export function toEndpointMap(paths: Readonly<Record<string, PathItem>>): Record<string, Operation> {
  const endpoints: Record<string, Operation> = {};
  for (const [path, pathItem] of Object.entries(paths)) {
    for (const method of HTTP_METHODS) {
      const operation = pathItem[method];
      if (operation) {
        endpoints[`${method.toUpperCase()} ${path}`] = operation;
      }
    }
  }
  return endpoints;
}

/**
 * Keyed diff of two endpoint maps, with the operation diff as value diff.
 */
export function diffPathItems(
  config: Readonly<DiffConfig>,
  state: DiffState,
  paths1: Readonly<Record<string, PathItem>> | undefined,
  paths2: Readonly<Record<string, PathItem>> | undefined
): KeyedDiff<OperationDiff> {
  return diffKeyed(
    toEndpointMap(paths1 ?? {}),
    toEndpointMap(paths2 ?? {}),
    (operation1, operation2) => diffOperations(config, state, operation1, operation2),
    isOperationDiffEmpty
  );
}

// ─── Operation ──────────────────────────────────────────────────────────────

export function diffOperations(
  config: Readonly<DiffConfig>,
  state: DiffState,
  operation1: Operation,
  operation2: Operation
): OperationDiff {
  const result: OperationDiff = {};

  const tagsDiff = diffStringSets(operation1.tags, operation2.tags);
  if (tagsDiff) result.tagsDiff = tagsDiff;

  const summaryDiff = diffValue(operation1.summary, operation2.summary);
  if (summaryDiff) result.summaryDiff = summaryDiff;

  if (!config.excludeDescription) {
    const descriptionDiff = diffValue(operation1.description, operation2.description);
    if (descriptionDiff) result.descriptionDiff = descriptionDiff;
  }

  const operationIdDiff = diffValue(operation1.operationId, operation2.operationId);
  if (operationIdDiff) result.operationIdDiff = operationIdDiff;

  const deprecatedDiff = diffValue(operation1.deprecated ?? false, operation2.deprecated ?? false);
  if (deprecatedDiff) result.deprecatedDiff = deprecatedDiff;

  const parametersDiff = diffParameters(config, state, operation1.parameters, operation2.parameters);
  if (!isKeyedDiffEmpty(parametersDiff)) result.parametersDiff = parametersDiff;

  const requestBodyDiff = diffRequestBodies(
    config,
    state,
    operation1.requestBody,
    operation2.requestBody
  );
  if (!isRequestBodyDiffEmpty(requestBodyDiff)) result.requestBodyDiff = requestBodyDiff;

  const responsesDiff = diffResponses(config, state, operation1.responses, operation2.responses);
  if (!isKeyedDiffEmpty(responsesDiff)) result.responsesDiff = responsesDiff;

  const callbacksDiff = diffCallbacks(config, state, operation1.callbacks, operation2.callbacks);
  if (!isKeyedDiffEmpty(callbacksDiff)) result.callbacksDiff = callbacksDiff;

  const serversDiff = diffSequences(
    (operation1.servers ?? []).map((server) => server.url),
    (operation2.servers ?? []).map((server) => server.url)
  );
  if (serversDiff) result.serversDiff = serversDiff;

  return result;
}

/**
 * Conjunction of every sub-diff's own emptiness check.
 */
export function isOperationDiffEmpty(diff: OperationDiff | undefined): boolean {
  if (!diff) return true;
  return (
    diff.tagsDiff === undefined &&
    diff.summaryDiff === undefined &&
    diff.descriptionDiff === undefined &&
    diff.operationIdDiff === undefined &&
    diff.deprecatedDiff === undefined &&
    isKeyedDiffEmpty(diff.parametersDiff) &&
    isRequestBodyDiffEmpty(diff.requestBodyDiff) &&
    isKeyedDiffEmpty(diff.responsesDiff) &&
    isKeyedDiffEmpty(diff.callbacksDiff) &&
    diff.serversDiff === undefined
  );
}

// ─── Callbacks ──────────────────────────────────────────────────────────────

function diffCallbacks(
  config: Readonly<DiffConfig>,
  state: DiffState,
  callbacks1: Record<string, Callback> | undefined,
  callbacks2: Record<string, Callback> | undefined
): CallbacksDiff {
  return diffKeyed(
    callbacks1,
    callbacks2,
    (callback1, callback2): CallbackDiff => diffPathItems(config, state, callback1, callback2),
    isKeyedDiffEmpty
  );
}
