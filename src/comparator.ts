/**
 * SpecComparator: main API
 *
 * The primary entry point. Provides a simple API for:
 * - Comparing two API documents (in memory or on disk)
 * - Filtering the result by endpoint
 * - Summarising the result
 * - Formatting reports
 */

import { resolveConfig } from './core/config';
import { diffDocuments } from './core/diff-result';
import { filterByRegex } from './core/filter';
import { formatReport } from './core/reporter';
import { getSummary } from './core/summary';
import {
  ApiDocument,
  ComparatorOptions,
  DiffConfig,
  DiffResult,
  DiffSummary,
  ReportFormat,
} from './core/types';
import { loadDocumentFile } from './loader/openapi-loader';
import { logger } from './logger';

// ─── SpecComparator Class ───────────────────────────────────────────────────

export class SpecComparator {
  private readonly config: Readonly<DiffConfig>;
  private readonly defaultFormat: ReportFormat;

  constructor(options: ComparatorOptions = {}) {
    this.config = resolveConfig(options);
    this.defaultFormat = options.defaultFormat ?? 'console';
  }

  /**
   * Diff two in-memory documents. When a path filter is configured it is applied
   * to the result; a filter that fails to compile is logged and skipped.
   */
  compare(base: ApiDocument, revision: ApiDocument): DiffResult {
    const result = diffDocuments(base, revision, this.config);
    logger.debug(
      `Diff: ${result.addedEndpoints.length} added, ${result.deletedEndpoints.length} deleted, ` +
        `${Object.keys(result.modifiedEndpoints).length} modified`
    );

    if (this.config.pathFilter === undefined) {
      return result;
    }
    return filterByRegex(result, this.config.pathFilter).result;
  }

  /**
   * Load two document files (JSON or YAML) and diff them.
   */
  compareFiles(basePath: string, revisionPath: string): DiffResult {
    const base = loadDocumentFile(basePath);
    const revision = loadDocumentFile(revisionPath);
    return this.compare(base, revision);
  }

  /**
   * Counts of added, deleted and modified entities.
   */
  summarize(result: DiffResult): DiffSummary {
    return getSummary(result);
  }

  /**
   * Format a diff result.
   */
  format(result: DiffResult, format: ReportFormat = this.defaultFormat): string {
    return formatReport(result, format);
  }

  /**
   * The resolved configuration (read-only).
   */
  getConfig(): Readonly<DiffConfig> {
    return this.config;
  }
}
