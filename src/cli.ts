#!/usr/bin/env node

/**
 * openapi-structural-diff CLI
 *
 * Commands:
 *   diff     - Compare two OpenAPI documents and print a report
 *   summary  - Compare two OpenAPI documents and print counts as JSON
 */

import { Command } from 'commander';
import * as fs from 'fs';
import { SpecComparator } from './comparator';
import { isDiffResultEmpty } from './core/diff-result';
import { ReportFormat } from './core/types';
import { logger } from './logger';

const REPORT_FORMATS: readonly ReportFormat[] = ['console', 'json', 'markdown', 'html'];

interface CompareOptions {
  base: string;
  revision: string;
  filter?: string;
  excludeDescription?: boolean;
  excludeExamples?: boolean;
}

interface DiffCommandOptions extends CompareOptions {
  format: string;
  output?: string;
  failOnDiff?: boolean;
}

const program = new Command();

program
  .name('openapi-structural-diff')
  .description('Structural diff of two OpenAPI 3 documents.')
  .version('1.0.0');

// ─── Common Options ─────────────────────────────────────────────────────────

function getComparator(opts: CompareOptions, defaultFormat?: ReportFormat): SpecComparator {
  return new SpecComparator({
    excludeDescription: opts.excludeDescription ?? false,
    excludeExamples: opts.excludeExamples ?? false,
    pathFilter: opts.filter,
    defaultFormat,
  });
}

function parseFormat(value: string): ReportFormat {
  const format = REPORT_FORMATS.find((f) => f === value);
  if (format === undefined) {
    throw new Error(`Unknown format "${value}". Supported: ${REPORT_FORMATS.join(', ')}`);
  }
  return format;
}

function fail(error: unknown): never {
  console.error(`❌ Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

// ─── diff Command ───────────────────────────────────────────────────────────

program
  .command('diff')
  .description('Compare two OpenAPI documents (JSON or YAML)')
  .requiredOption('-b, --base <file>', 'Base document')
  .requiredOption('-r, --revision <file>', 'Revised document')
  .option('-f, --format <format>', 'Report format: console, json, markdown, html', 'console')
  .option('--filter <regex>', 'Only report endpoints whose "METHOD PATH" matches')
  .option('--exclude-description', 'Ignore description changes')
  .option('--exclude-examples', 'Ignore example changes')
  .option('--fail-on-diff', 'Exit with code 1 when any difference is found')
  .option('-o, --output <file>', 'Write report to file instead of stdout')
  .action((opts: DiffCommandOptions) => {
    try {
      const format = parseFormat(opts.format);
      const comparator = getComparator(opts, format);
      const result = comparator.compareFiles(opts.base, opts.revision);
      const formatted = comparator.format(result);

      if (opts.output) {
        fs.writeFileSync(opts.output, formatted, 'utf-8');
        logger.info(`Report written to ${opts.output}`);
      } else {
        console.log(formatted);
      }

      if (opts.failOnDiff && !isDiffResultEmpty(result)) {
        process.exit(1);
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── summary Command ────────────────────────────────────────────────────────

program
  .command('summary')
  .description('Print counts of added, deleted and modified entities as JSON')
  .requiredOption('-b, --base <file>', 'Base document')
  .requiredOption('-r, --revision <file>', 'Revised document')
  .option('--filter <regex>', 'Only count endpoints whose "METHOD PATH" matches')
  .option('--exclude-description', 'Ignore description changes')
  .option('--exclude-examples', 'Ignore example changes')
  .action((opts: CompareOptions) => {
    try {
      const comparator = getComparator(opts);
      const result = comparator.compareFiles(opts.base, opts.revision);
      console.log(JSON.stringify(comparator.summarize(result), null, 2));
    } catch (error) {
      fail(error);
    }
  });

// ─── Run ────────────────────────────────────────────────────────────────────

program.parse();
