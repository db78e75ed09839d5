/**
 * Endpoint-set diff: the top-level entry of the engine.
 */

import { resolveConfig } from './config';
import { diffPathItems } from './operation-diff';
import { DiffState } from './state';
import { ApiDocument, DiffConfig, DiffResult } from './types';

/**
 * Diff two documents' endpoints.
 *
 * Endpoint keys are 'METHOD PATH'. A fresh cycle guard is allocated for every
 * call, so independent invocations never share state.
 */
export function diffDocuments(
  base: ApiDocument,
  revision: ApiDocument,
  options: Partial<DiffConfig> = {}
): DiffResult {
  const config = resolveConfig(options);
  const state = new DiffState();
  const endpoints = diffPathItems(config, state, base.paths, revision.paths);

  return {
    addedEndpoints: endpoints.added ?? [],
    deletedEndpoints: endpoints.deleted ?? [],
    modifiedEndpoints: endpoints.modified ?? {},
  };
}

export function isDiffResultEmpty(result: DiffResult): boolean {
  return (
    result.addedEndpoints.length === 0 &&
    result.deletedEndpoints.length === 0 &&
    Object.keys(result.modifiedEndpoints).length === 0
  );
}
