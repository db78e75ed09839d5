/**
 * Report Generator
 *
 * Renders a diff result in multiple formats:
 * Console (colored), JSON, Markdown, HTML.
 *
 * Reads the diff tree only; never mutates it.
 */

import chalk from 'chalk';
import { isDiffResultEmpty } from './diff-result';
import { getSummary } from './summary';
import { DiffResult, DiffSummary, OperationDiff, ReportFormat, ValueDiff } from './types';

// ─── Format Report ──────────────────────────────────────────────────────────

/**
 * Format a diff result in the specified format.
 */
export function formatReport(result: DiffResult, format: ReportFormat): string {
  switch (format) {
    case 'console':
      return formatConsole(result);
    case 'json':
      return formatJson(result);
    case 'markdown':
      return formatMarkdown(result);
    case 'html':
      return formatHtml(result);
    default:
      return formatConsole(result);
  }
}

// ─── Change Notes ───────────────────────────────────────────────────────────

/**
 * One human-readable line per changed section of an operation.
 */
export function describeOperationDiff(diff: OperationDiff): string[] {
  const notes: string[] = [];

  if (diff.summaryDiff) notes.push(`Summary changed: ${describeValueChange(diff.summaryDiff)}`);
  if (diff.descriptionDiff) notes.push('Description changed');
  if (diff.operationIdDiff) {
    notes.push(`Operation ID changed: ${describeValueChange(diff.operationIdDiff)}`);
  }
  if (diff.deprecatedDiff) {
    notes.push(diff.deprecatedDiff.to === true ? 'Operation deprecated' : 'Operation no longer deprecated');
  }
  if (diff.tagsDiff?.added) notes.push(`Tags added: ${diff.tagsDiff.added.join(', ')}`);
  if (diff.tagsDiff?.deleted) notes.push(`Tags deleted: ${diff.tagsDiff.deleted.join(', ')}`);

  const parameters = diff.parametersDiff;
  for (const key of parameters?.added ?? []) notes.push(`New ${describeParameter(key)}`);
  for (const key of parameters?.deleted ?? []) notes.push(`Deleted ${describeParameter(key)}`);
  for (const key of Object.keys(parameters?.modified ?? {})) {
    notes.push(`Modified ${describeParameter(key)}`);
  }

  const body = diff.requestBodyDiff;
  if (body?.added) notes.push('Request body added');
  else if (body?.deleted) notes.push('Request body deleted');
  else if (body) notes.push('Request body changed');

  const responses = diff.responsesDiff;
  for (const status of responses?.added ?? []) notes.push(`New response: ${status}`);
  for (const status of responses?.deleted ?? []) notes.push(`Deleted response: ${status}`);
  for (const status of Object.keys(responses?.modified ?? {})) {
    notes.push(`Modified response: ${status}`);
  }

  if (diff.callbacksDiff) notes.push('Callbacks changed');
  if (diff.serversDiff) notes.push('Servers changed');

  return notes;
}

/** 'query:limit' → 'query param: limit' */
function describeParameter(key: string): string {
  const separator = key.indexOf(':');
  return `${key.slice(0, separator)} param: ${key.slice(separator + 1)}`;
}

function describeValueChange(diff: ValueDiff): string {
  return `${describeValue(diff.from)} → ${describeValue(diff.to)}`;
}

function describeValue(value: unknown): string {
  return value === undefined ? 'none' : JSON.stringify(value);
}

// ─── Console Format ─────────────────────────────────────────────────────────

function formatConsole(result: DiffResult): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);

  lines.push('');
  lines.push(chalk.bold('🔍 API Diff Report'));
  lines.push(chalk.gray(bar));

  if (isDiffResultEmpty(result)) {
    lines.push(chalk.green('  ✅ No changes'));
  } else {
    if (result.addedEndpoints.length > 0) {
      lines.push(chalk.bold('New Endpoints'));
      for (const endpoint of result.addedEndpoints) {
        lines.push(`  ${chalk.green('+')} ${endpoint}`);
      }
    }

    if (result.deletedEndpoints.length > 0) {
      lines.push(chalk.bold('Deleted Endpoints'));
      for (const endpoint of result.deletedEndpoints) {
        lines.push(`  ${chalk.red('-')} ${endpoint}`);
      }
    }

    const modified = Object.entries(result.modifiedEndpoints);
    if (modified.length > 0) {
      lines.push(chalk.bold('Modified Endpoints'));
      for (const [endpoint, diff] of modified) {
        lines.push(`  ${chalk.yellow('~')} ${endpoint}`);
        for (const note of describeOperationDiff(diff)) {
          lines.push(chalk.gray(`      ${note}`));
        }
      }
    }
  }

  lines.push(chalk.gray(bar));
  lines.push(`Summary: ${summaryLine(getSummary(result))}`);
  lines.push('');

  return lines.join('\n');
}

// ─── JSON Format ────────────────────────────────────────────────────────────

/**
 * Top-level containers are omitted when empty; nested diffs already omit empty fields.
 */
function formatJson(result: DiffResult): string {
  const document: Partial<DiffResult> = {};
  if (result.addedEndpoints.length > 0) document.addedEndpoints = result.addedEndpoints;
  if (result.deletedEndpoints.length > 0) document.deletedEndpoints = result.deletedEndpoints;
  if (Object.keys(result.modifiedEndpoints).length > 0) {
    document.modifiedEndpoints = result.modifiedEndpoints;
  }
  return JSON.stringify(document, null, 2);
}

// ─── Markdown Format ────────────────────────────────────────────────────────

function formatMarkdown(result: DiffResult): string {
  const lines: string[] = [];

  lines.push('# 🔍 API Diff Report');
  lines.push('');
  lines.push(`**Summary:** ${summaryLine(getSummary(result))}`);
  lines.push('');

  if (isDiffResultEmpty(result)) {
    lines.push('✅ **No changes**');
    return lines.join('\n');
  }

  if (result.addedEndpoints.length > 0) {
    lines.push('## 🟢 New Endpoints');
    lines.push('');
    for (const endpoint of result.addedEndpoints) {
      lines.push(`- \`${endpoint}\``);
    }
    lines.push('');
  }

  if (result.deletedEndpoints.length > 0) {
    lines.push('## 🔴 Deleted Endpoints');
    lines.push('');
    for (const endpoint of result.deletedEndpoints) {
      lines.push(`- \`${endpoint}\``);
    }
    lines.push('');
  }

  const modified = Object.entries(result.modifiedEndpoints);
  if (modified.length > 0) {
    lines.push('## 🟡 Modified Endpoints');
    lines.push('');
    for (const [endpoint, diff] of modified) {
      lines.push(`### \`${endpoint}\``);
      lines.push('');
      for (const note of describeOperationDiff(diff)) {
        lines.push(`- ${note}`);
      }
      lines.push('');
    }
  }

  return lines.join('\n');
}

// ─── HTML Format ────────────────────────────────────────────────────────────

function formatHtml(result: DiffResult): string {
  const summary = getSummary(result);

  const rows = [
    ...result.addedEndpoints.map((endpoint) => endpointRow('added', endpoint, [])),
    ...result.deletedEndpoints.map((endpoint) => endpointRow('deleted', endpoint, [])),
    ...Object.entries(result.modifiedEndpoints).map(([endpoint, diff]) =>
      endpointRow('modified', endpoint, describeOperationDiff(diff))
    ),
  ].join('\n');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>API Diff Report</title>
  <style>
    :root { --red: #ef4444; --yellow: #f59e0b; --green: #22c55e; --bg: #0f172a; --surface: #1e293b; --text: #e2e8f0; --muted: #94a3b8; }
    body { font-family: system-ui, sans-serif; background: var(--bg); color: var(--text); padding: 2rem; }
    .container { max-width: 960px; margin: 0 auto; }
    .summary { display: flex; gap: 1rem; margin: 1.5rem 0; }
    .summary-card { background: var(--surface); border-radius: 8px; padding: 1rem; flex: 1; text-align: center; }
    .summary-card .count { font-size: 2rem; font-weight: 700; }
    .summary-card .label { color: var(--muted); font-size: 0.75rem; text-transform: uppercase; }
    table { width: 100%; border-collapse: collapse; background: var(--surface); }
    th, td { padding: 0.75rem 1rem; text-align: left; border-top: 1px solid #334155; vertical-align: top; }
    .badge-added { color: var(--green); }
    .badge-deleted { color: var(--red); }
    .badge-modified { color: var(--yellow); }
    .no-changes { text-align: center; padding: 3rem; color: var(--green); }
  </style>
</head>
<body>
  <div class="container">
    <h1>🔍 API Diff Report</h1>
    <div class="summary">
      <div class="summary-card"><div class="count">${summary.endpoints.added}</div><div class="label">Added</div></div>
      <div class="summary-card"><div class="count">${summary.endpoints.deleted}</div><div class="label">Deleted</div></div>
      <div class="summary-card"><div class="count">${summary.endpoints.modified}</div><div class="label">Modified</div></div>
    </div>
    ${
      isDiffResultEmpty(result)
        ? '<div class="no-changes">✅ No changes</div>'
        : `<table>
      <thead>
        <tr><th>Status</th><th>Endpoint</th><th>Changes</th></tr>
      </thead>
      <tbody>
${rows}
      </tbody>
    </table>`
    }
  </div>
</body>
</html>`;
}

function endpointRow(status: 'added' | 'deleted' | 'modified', endpoint: string, notes: string[]): string {
  const changes = notes.length > 0 ? `<ul>${notes.map((n) => `<li>${escapeHtml(n)}</li>`).join('')}</ul>` : '—';
  return `        <tr><td><span class="badge-${status}">${status.toUpperCase()}</span></td><td><code>${escapeHtml(endpoint)}</code></td><td>${changes}</td></tr>`;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function summaryLine(summary: DiffSummary): string {
  const { added, deleted, modified } = summary.endpoints;
  return `${added} added | ${deleted} deleted | ${modified} modified`;
}

function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
