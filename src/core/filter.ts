/**
 * Regex filter over a diff result.
 *
 * Returns a new result and leaves the input untouched. A pattern that does not
 * compile fails open: the returned result is an unfiltered copy and the
 * ConfigError travels alongside it.
 */

import { logger } from '../logger';
import { ConfigError } from './errors';
import { DiffResult } from './types';

export interface FilterOutcome {
  result: DiffResult;
  error?: ConfigError;
}

export function filterByRegex(result: DiffResult, pattern: string): FilterOutcome {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    const error = new ConfigError(`Failed to compile filter regex "${pattern}": ${reason}`, pattern);
    logger.warn(error.message);
    return { result: copyResult(result, () => true), error };
  }

  return { result: copyResult(result, (endpoint) => regex.test(endpoint)) };
}

function copyResult(result: DiffResult, keep: (endpoint: string) => boolean): DiffResult {
  return {
    addedEndpoints: result.addedEndpoints.filter(keep),
    deletedEndpoints: result.deletedEndpoints.filter(keep),
    modifiedEndpoints: Object.fromEntries(
      Object.entries(result.modifiedEndpoints).filter(([endpoint]) => keep(endpoint))
    ),
  };
}
