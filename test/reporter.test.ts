/**
 * Tests for the Report Generator
 */

import { describeOperationDiff, formatReport } from '../src/core/reporter';
import { DiffResult } from '../src/core/types';

function createResult(overrides: Partial<DiffResult> = {}): DiffResult {
  return { addedEndpoints: [], deletedEndpoints: [], modifiedEndpoints: {}, ...overrides };
}

const changed = createResult({
  addedEndpoints: ['POST /pets'],
  modifiedEndpoints: {
    'GET /pets': {
      parametersDiff: {
        modified: { 'query:limit': { schemaDiff: { maximumDiff: { from: 100, to: 200 } } } },
      },
    },
  },
});

describe('Report Generator', () => {
  // ─── Change Notes ─────────────────────────────────────────────────────

  describe('describeOperationDiff', () => {
    test('describes every changed section in order', () => {
      const notes = describeOperationDiff({
        summaryDiff: { from: 'List', to: 'List pets' },
        deprecatedDiff: { from: false, to: true },
        tagsDiff: { added: ['animals'] },
        parametersDiff: { added: ['header:X-Trace'], deleted: ['query:page'] },
        requestBodyDiff: { added: true },
        responsesDiff: { deleted: ['404'], modified: { '200': { descriptionDiff: { from: 'a', to: 'b' } } } },
        serversDiff: { reordered: true },
      });

      expect(notes).toEqual([
        'Summary changed: "List" → "List pets"',
        'Operation deprecated',
        'Tags added: animals',
        'New header param: X-Trace',
        'Deleted query param: page',
        'Request body added',
        'Deleted response: 404',
        'Modified response: 200',
        'Servers changed',
      ]);
    });

    test('shows an absent value as none', () => {
      expect(describeOperationDiff({ operationIdDiff: { from: undefined, to: 'getPet' } })).toEqual([
        'Operation ID changed: none → "getPet"',
      ]);
    });

    test('an empty diff has no notes', () => {
      expect(describeOperationDiff({})).toEqual([]);
    });
  });

  // ─── Console Format ───────────────────────────────────────────────────

  describe('Console format', () => {
    test('shows clean report when nothing changed', () => {
      const output = formatReport(createResult(), 'console');
      expect(output).toContain('No changes');
      expect(output).toContain('0 added | 0 deleted | 0 modified');
    });

    test('lists endpoints with their change notes', () => {
      const output = formatReport(changed, 'console');
      expect(output).toContain('POST /pets');
      expect(output).toContain('Modified query param: limit');
      expect(output).toContain('1 added | 0 deleted | 1 modified');
    });
  });

  // ─── JSON Format ──────────────────────────────────────────────────────

  describe('JSON format', () => {
    test('omits empty top-level containers', () => {
      expect(JSON.parse(formatReport(changed, 'json'))).toEqual({
        addedEndpoints: ['POST /pets'],
        modifiedEndpoints: changed.modifiedEndpoints,
      });
    });

    test('an empty result is an empty object', () => {
      expect(formatReport(createResult(), 'json')).toBe('{}');
    });

    test('keeps an empty inline pair diff', () => {
      const result = createResult({
        modifiedEndpoints: {
          'GET /a': {
            responsesDiff: {
              modified: {
                '200': {
                  contentDiff: {
                    modified: { 'application/json': { schemaDiff: { oneOfDiff: { modified: { '#0': {} } } } } },
                  },
                },
              },
            },
          },
        },
      });

      expect(JSON.parse(formatReport(result, 'json'))).toEqual({
        modifiedEndpoints: result.modifiedEndpoints,
      });
    });
  });

  // ─── Markdown Format ──────────────────────────────────────────────────

  describe('Markdown format', () => {
    test('renders sections for each kind of change', () => {
      expect(formatReport(changed, 'markdown')).toBe(
        [
          '# 🔍 API Diff Report',
          '',
          '**Summary:** 1 added | 0 deleted | 1 modified',
          '',
          '## 🟢 New Endpoints',
          '',
          '- `POST /pets`',
          '',
          '## 🟡 Modified Endpoints',
          '',
          '### `GET /pets`',
          '',
          '- Modified query param: limit',
          '',
        ].join('\n')
      );
    });

    test('shows clean message when nothing changed', () => {
      expect(formatReport(createResult(), 'markdown')).toBe(
        ['# 🔍 API Diff Report', '', '**Summary:** 0 added | 0 deleted | 0 modified', '', '✅ **No changes**'].join(
          '\n'
        )
      );
    });
  });

  // ─── HTML Format ──────────────────────────────────────────────────────

  describe('HTML format', () => {
    test('produces an HTML document with a row per endpoint', () => {
      const output = formatReport(changed, 'html');
      expect(output).toContain('<!DOCTYPE html>');
      expect(output).toContain('<table>');
      expect(output).toContain('<code>POST /pets</code>');
      expect(output).toContain('<li>Modified query param: limit</li>');
    });

    test('shows no-changes message for an empty result', () => {
      const output = formatReport(createResult(), 'html');
      expect(output).toContain('<div class="no-changes">✅ No changes</div>');
      expect(output).not.toContain('<table>');
    });

    test('escapes HTML entities', () => {
      const output = formatReport(
        createResult({ modifiedEndpoints: { 'GET /a': { summaryDiff: { from: '<b>', to: '<i>' } } } }),
        'html'
      );
      expect(output).toContain('<li>Summary changed: &quot;&lt;b&gt;&quot; → &quot;&lt;i&gt;&quot;</li>');
    });
  });
});
