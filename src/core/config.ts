/**
 * Diff configuration: defaults and resolution.
 */

import { DiffConfig } from './types';

export const DEFAULT_CONFIG: Readonly<DiffConfig> = Object.freeze({
  excludeDescription: false,
  excludeExamples: false,
});

/**
 * Fill in defaults. The returned object is frozen: one config is shared,
 * read-only, by every call of a diff invocation.
 */
export function resolveConfig(options: Partial<DiffConfig> = {}): Readonly<DiffConfig> {
  const config: DiffConfig = {
    excludeDescription: options.excludeDescription ?? DEFAULT_CONFIG.excludeDescription,
    excludeExamples: options.excludeExamples ?? DEFAULT_CONFIG.excludeExamples,
  };
  if (options.pathFilter !== undefined) {
    config.pathFilter = options.pathFilter;
  }
  return Object.freeze(config);
}
