/**
 * Parameter diff. Parameters are keyed by location and name: 'query:limit'.
 */

import { diffContent } from './content-diff';
import { diffKeyed, isKeyedDiffEmpty } from './keyed-diff';
import { diffValue } from './primitives';
import { diffSchemas, isSchemaDiffEmpty } from './schema-diff';
import { DiffState } from './state';
import { DiffConfig, Parameter, ParameterDiff, ParametersDiff } from './types';

export function parameterKey(parameter: Parameter): string {
  return `${parameter.in}:${parameter.name}`;
}

export function diffParameters(
  config: Readonly<DiffConfig>,
  state: DiffState,
  parameters1: readonly Parameter[] = [],
  parameters2: readonly Parameter[] = []
): ParametersDiff {
  return diffKeyed(
    toParameterMap(parameters1),
    toParameterMap(parameters2),
    (parameter1, parameter2) => diffParameter(config, state, parameter1, parameter2),
    isParameterDiffEmpty
  );
}

function diffParameter(
  config: Readonly<DiffConfig>,
  state: DiffState,
  parameter1: Parameter,
  parameter2: Parameter
): ParameterDiff {
  const result: ParameterDiff = {};

  if (!config.excludeDescription) {
    const descriptionDiff = diffValue(parameter1.description, parameter2.description);
    if (descriptionDiff) result.descriptionDiff = descriptionDiff;
  }

  const requiredDiff = diffValue(parameter1.required ?? false, parameter2.required ?? false);
  if (requiredDiff) result.requiredDiff = requiredDiff;

  const deprecatedDiff = diffValue(parameter1.deprecated ?? false, parameter2.deprecated ?? false);
  if (deprecatedDiff) result.deprecatedDiff = deprecatedDiff;

  const allowEmptyValueDiff = diffValue(
    parameter1.allowEmptyValue ?? false,
    parameter2.allowEmptyValue ?? false
  );
  if (allowEmptyValueDiff) result.allowEmptyValueDiff = allowEmptyValueDiff;

  const styleDiff = diffValue(parameter1.style, parameter2.style);
  if (styleDiff) result.styleDiff = styleDiff;

  const explodeDiff = diffValue(parameter1.explode, parameter2.explode);
  if (explodeDiff) result.explodeDiff = explodeDiff;

  if (!config.excludeExamples) {
    const exampleDiff = diffValue(parameter1.example, parameter2.example);
    if (exampleDiff) result.exampleDiff = exampleDiff;
  }

  const schemaDiff = diffSchemas(config, state, parameter1.schema, parameter2.schema);
  if (!isSchemaDiffEmpty(schemaDiff)) result.schemaDiff = schemaDiff;

  const contentDiff = diffContent(config, state, parameter1.content, parameter2.content);
  if (!isKeyedDiffEmpty(contentDiff)) result.contentDiff = contentDiff;

  return result;
}

export function isParameterDiffEmpty(diff: ParameterDiff): boolean {
  return (
    diff.descriptionDiff === undefined &&
    diff.requiredDiff === undefined &&
    diff.deprecatedDiff === undefined &&
    diff.allowEmptyValueDiff === undefined &&
    diff.styleDiff === undefined &&
    diff.explodeDiff === undefined &&
    diff.exampleDiff === undefined &&
    isSchemaDiffEmpty(diff.schemaDiff) &&
    isKeyedDiffEmpty(diff.contentDiff)
  );
}

function toParameterMap(parameters: readonly Parameter[]): Record<string, Parameter> {
  return Object.fromEntries(
    parameters.map((parameter): [string, Parameter] => [parameterKey(parameter), parameter])
  );
}
