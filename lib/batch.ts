/**
 * Workbook conversion, single and batch.
 *
 * A file-level error (unreadable file, missing sheet or required column) fails
 * that file only; batch conversion moves on to the next workbook and reports
 * every outcome in the summary.
 */

import path from 'path';
import { convertWorkbook } from './convert';
import type { ConvertOptions } from './convert';
import { formatRowError, isFileError } from './goals/errors';
import type { FileError, RowError } from './goals/errors';
import type { TemplateGroup } from './goals/schema';
import { outputPathFor } from './storage';
import type { TemplateStore } from './storage';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export type FileOutcome =
  | {
      status: 'converted';
      input: string;
      output: string;
      groupCount: number;
      itemCount: number;
      skippedRows: number;
      rowErrors: RowError[];
    }
  | {
      status: 'failed';
      input: string;
      error: FileError;
    };

export interface BatchSummary {
  outcomes: FileOutcome[];
  converted: number;
  failed: number;
  rowErrorCount: number;
}

export interface FileConvertOptions extends Omit<ConvertOptions, 'sourceName'> {
  logger?: Logger;
}

function countItems(groups: TemplateGroup[]): number {
  return groups.reduce(
    (sum, group) => sum + group.goals.reduce((n, goal) => n + goal.aliases.length, 0),
    0
  );
}

/**
 * Convert one workbook and write its XML. Only file-level errors are turned
 * into a failed outcome; anything else is a bug and propagates.
 */
export async function convertFile(
  store: TemplateStore,
  input: string,
  output: string,
  options: FileConvertOptions = {}
): Promise<FileOutcome> {
  const { logger = console, ...convertOptions } = options;

  try {
    const bytes = await store.read(input);
    const result = convertWorkbook(bytes, { ...convertOptions, sourceName: path.basename(input) });

    for (const err of result.rowErrors) {
      logger.warn(`${path.basename(input)}: ${formatRowError(err)}`);
    }
    for (const warning of result.warnings) {
      logger.warn(`${path.basename(input)}: Row ${warning.rowNumber}: ${warning.message}`);
    }

    await store.write(output, Buffer.from(result.xml, 'utf-8'));
    logger.log(`Written: ${output}`);

    return {
      status: 'converted',
      input,
      output,
      groupCount: result.groups.length,
      itemCount: countItems(result.groups),
      skippedRows: result.skipped.length,
      rowErrors: result.rowErrors,
    };
  } catch (error) {
    if (!isFileError(error)) throw error;
    logger.error(`Failed to convert ${input}: ${error.message}`);
    return { status: 'failed', input, error };
  }
}

export function summarize(outcomes: FileOutcome[]): BatchSummary {
  let converted = 0;
  let failed = 0;
  let rowErrorCount = 0;
  for (const outcome of outcomes) {
    if (outcome.status === 'converted') {
      converted++;
      rowErrorCount += outcome.rowErrors.length;
    } else {
      failed++;
    }
  }
  return { outcomes, converted, failed, rowErrorCount };
}

/**
 * Convert every workbook the store lists, writing each XML beside its source.
 * Preview ids default to each workbook's file stem.
 */
export async function convertAll(
  store: TemplateStore,
  options: Omit<FileConvertOptions, 'previewId'> = {}
): Promise<BatchSummary> {
  const outcomes: FileOutcome[] = [];
  for (const input of await store.list()) {
    outcomes.push(await convertFile(store, input, outputPathFor(input), options));
  }
  return summarize(outcomes);
}

export function formatSummary(summary: BatchSummary): string[] {
  const lines = summary.outcomes.map((outcome) =>
    outcome.status === 'converted'
      ? `  OK      ${outcome.input} → ${outcome.output} ` +
        `(${outcome.groupCount} groups, ${outcome.itemCount} items, ${outcome.rowErrors.length} row errors)`
      : `  FAILED  ${outcome.input}: ${outcome.error.message}`
  );
  lines.push(
    `${summary.converted} converted, ${summary.failed} failed, ${summary.rowErrorCount} row errors`
  );
  return lines;
}
