/**
 * Summary projection of a diff result. Read-only.
 */

import { DiffResult, DiffSummary, KeyedDiff, SummaryDetails } from './types';

export function getSummary(result: DiffResult): DiffSummary {
  const endpoints: SummaryDetails = {
    added: result.addedEndpoints.length,
    deleted: result.deletedEndpoints.length,
    modified: Object.keys(result.modifiedEndpoints).length,
  };

  const parameters = emptyDetails();
  const responses = emptyDetails();
  const callbacks = emptyDetails();

  for (const operationDiff of Object.values(result.modifiedEndpoints)) {
    accumulate(parameters, operationDiff.parametersDiff);
    accumulate(responses, operationDiff.responsesDiff);
    accumulate(callbacks, operationDiff.callbacksDiff);
  }

  return {
    diff: endpoints.added + endpoints.deleted + endpoints.modified > 0,
    endpoints,
    parameters,
    responses,
    callbacks,
  };
}

function emptyDetails(): SummaryDetails {
  return { added: 0, deleted: 0, modified: 0 };
}

function accumulate<D>(details: SummaryDetails, diff: KeyedDiff<D> | undefined): void {
  if (!diff) return;
  details.added += diff.added?.length ?? 0;
  details.deleted += diff.deleted?.length ?? 0;
  details.modified += Object.keys(diff.modified ?? {}).length;
}
