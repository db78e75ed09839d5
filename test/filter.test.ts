/**
 * Tests for the regex filter
 */

import { ConfigError } from '../src/core/errors';
import { filterByRegex } from '../src/core/filter';
import { DiffResult } from '../src/core/types';
import { logger } from '../src/logger';

function sampleResult(): DiffResult {
  return {
    addedEndpoints: ['POST /pets', 'POST /stores'],
    deletedEndpoints: ['DELETE /pets/{id}'],
    modifiedEndpoints: {
      'GET /pets': { summaryDiff: { from: 'a', to: 'b' } },
      'GET /stores': { deprecatedDiff: { from: false, to: true } },
    },
  };
}

describe('filterByRegex', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('keeps only endpoints matching the pattern', () => {
    const { result, error } = filterByRegex(sampleResult(), '/pets');

    expect(error).toBeUndefined();
    expect(result).toEqual({
      addedEndpoints: ['POST /pets'],
      deletedEndpoints: ['DELETE /pets/{id}'],
      modifiedEndpoints: { 'GET /pets': { summaryDiff: { from: 'a', to: 'b' } } },
    });
  });

  test('matches against the method as well as the path', () => {
    const { result } = filterByRegex(sampleResult(), '^GET ');

    expect(result.addedEndpoints).toEqual([]);
    expect(result.deletedEndpoints).toEqual([]);
    expect(Object.keys(result.modifiedEndpoints)).toEqual(['GET /pets', 'GET /stores']);
  });

  test('a pattern matching everything keeps everything', () => {
    expect(filterByRegex(sampleResult(), '.*').result).toEqual(sampleResult());
  });

  test('a pattern matching nothing leaves an empty result', () => {
    expect(filterByRegex(sampleResult(), 'orders').result).toEqual({
      addedEndpoints: [],
      deletedEndpoints: [],
      modifiedEndpoints: {},
    });
  });

  test('does not mutate its input', () => {
    const input = sampleResult();
    filterByRegex(input, 'stores');

    expect(input).toEqual(sampleResult());
  });

  test('an invalid pattern fails open with a warning', () => {
    const warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);

    const { result, error } = filterByRegex(sampleResult(), '(');

    expect(result).toEqual(sampleResult());
    expect(error).toBeInstanceOf(ConfigError);
    expect(error?.pattern).toBe('(');
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
