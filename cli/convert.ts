#!/usr/bin/env node
/**
 * clinical-goals-convert
 *
 *   clinical-goals-convert <input.xlsx> <output.xml> [PreviewID]
 *   clinical-goals-convert                 converts every .xlsx in the templates directory
 *
 * Exits non-zero only when a file could not be converted at all. Row errors are
 * printed and the remaining rows are still exported.
 */

import path from 'path';
import { parseArgs } from 'util';
import { convertAll, convertFile, formatSummary } from '../lib/batch';
import type { BatchSummary, Logger } from '../lib/batch';
import { loadConfig } from '../lib/config';
import type { ConverterConfig } from '../lib/config';
import { IOError } from '../lib/goals/errors';
import { validateFilename, validatePreviewId } from '../lib/sanitize';
import { DirectoryTemplateStore, WORKBOOK_EXTENSION } from '../lib/storage';

export const USAGE = [
  'Usage: clinical-goals-convert <input.xlsx> <output.xml> [PreviewID]',
  'Or run without arguments to convert every .xlsx file in the templates directory',
  '(CLINICAL_GOALS_TEMPLATES_DIR, default ./templates).',
].join('\n');

export interface CliContext {
  logger: Logger;
  env: NodeJS.ProcessEnv;
  cwd: string;
  now?: Date;
}

const defaultContext = (): CliContext => ({
  logger: console,
  env: process.env,
  cwd: process.cwd(),
});

export async function main(argv: string[], ctx: CliContext = defaultContext()): Promise<number> {
  const { logger } = ctx;

  let positionals: string[];
  let help: boolean | undefined;
  try {
    const parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: { help: { type: 'boolean', short: 'h' } },
    });
    positionals = parsed.positionals;
    help = parsed.values.help;
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    logger.error(USAGE);
    return 1;
  }

  if (help) {
    logger.log(USAGE);
    return 0;
  }
  if (positionals.length === 1 || positionals.length > 3) {
    logger.error(USAGE);
    return 1;
  }

  let config: ConverterConfig;
  try {
    config = loadConfig(ctx.env, ctx.cwd);
  } catch (err) {
    logger.error(`Invalid configuration: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  const documentConfig = {
    assignedUsers: config.assignedUsers,
    defaultTemplateId: config.defaultTemplateId,
    codeScheme: config.codeScheme,
    codeSchemeVersion: config.codeSchemeVersion,
  };

  if (positionals.length === 0) {
    const store = new DirectoryTemplateStore(config.templatesDir);
    let summary: BatchSummary;
    try {
      summary = await convertAll(store, { logger, now: ctx.now, config: documentConfig });
    } catch (err) {
      if (!(err instanceof IOError)) throw err;
      logger.error(err.message);
      logger.error(USAGE);
      return 1;
    }
    if (!summary.outcomes.length) {
      logger.log(`No ${WORKBOOK_EXTENSION} files found in ${config.templatesDir}`);
      return 0;
    }
    for (const line of formatSummary(summary)) logger.log(line);
    return summary.failed ? 1 : 0;
  }

  const input = path.resolve(ctx.cwd, positionals[0]);
  const output = path.resolve(ctx.cwd, positionals[1]);

  const inputCheck = validateFilename(path.basename(input), { allowedExtensions: [WORKBOOK_EXTENSION] });
  if (!inputCheck.valid) {
    logger.error(`Invalid input file: ${inputCheck.error}`);
    return 1;
  }

  let previewId: string | undefined;
  if (positionals[2] !== undefined) {
    const idCheck = validatePreviewId(positionals[2]);
    if (!idCheck.valid) {
      logger.error(`Invalid preview ID: ${idCheck.error}`);
      return 1;
    }
    previewId = idCheck.sanitized;
  }

  const outcome = await convertFile(new DirectoryTemplateStore(path.dirname(input)), input, output, {
    logger,
    previewId,
    now: ctx.now,
    config: documentConfig,
  });
  return outcome.status === 'converted' ? 0 : 1;
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error('Unexpected error:', err);
      process.exitCode = 1;
    }
  );
}
