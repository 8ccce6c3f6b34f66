/**
 * Conversion Error Taxonomy
 *
 * File-level errors (missing sheet, missing required column, damaged workbook,
 * unreadable or unwritable file) abort the conversion of that file only. Row-level errors are
 * collected on the conversion result and never stop the remaining rows.
 */

export type ErrorLevel = 'file' | 'row' | 'skip';

export abstract class ConversionError extends Error {
  abstract readonly level: ErrorLevel;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// ── File level ──────────────────────────────────────────────────────

export class MissingSheetError extends ConversionError {
  readonly level = 'file';

  constructor(readonly sheetName: string, available: string[]) {
    super(
      `Worksheet "${sheetName}" not found` +
        (available.length ? ` (available: ${available.join(', ')})` : ' (workbook has no sheets)')
    );
  }
}

export class MissingColumnError extends ConversionError {
  readonly level = 'file';

  constructor(readonly column: string) {
    super(`Required column "${column}" is missing from the header row`);
  }
}

export class IOError extends ConversionError {
  readonly level = 'file';

  constructor(readonly path: string, readonly reason: unknown) {
    super(`Cannot access ${path}: ${reason instanceof Error ? reason.message : String(reason)}`);
  }
}

export class UnreadableWorkbookError extends ConversionError {
  readonly level = 'file';

  constructor(readonly reason: unknown) {
    super(`Workbook cannot be read: ${reason instanceof Error ? reason.message : String(reason)}`);
  }
}

export type FileError = MissingSheetError | MissingColumnError | IOError | UnreadableWorkbookError;

// ── Row level ───────────────────────────────────────────────────────

export abstract class RowError extends ConversionError {
  readonly level = 'row';

  constructor(
    readonly rowNumber: number,
    readonly column: string,
    readonly rawValue: string,
    message: string
  ) {
    super(message);
  }
}

export class InvalidPriorityError extends RowError {
  constructor(rowNumber: number, rawValue: string) {
    super(
      rowNumber,
      'Priority',
      rawValue,
      rawValue ? 'Priority must be an integer' : 'Priority is required'
    );
  }
}

export class InvalidEvaluationPointError extends RowError {
  constructor(rowNumber: number, column: string, rawValue: string, reason: string) {
    super(rowNumber, column, rawValue, reason);
  }
}

export class InvalidObjectiveError extends RowError {
  constructor(rowNumber: number, rawValue: string) {
    super(
      rowNumber,
      'DVH Objective',
      rawValue,
      rawValue ? 'Unrecognised DVH objective' : 'DVH Objective is required'
    );
  }
}

/**
 * Not a failure: marks a spacer row whose "Structure IDs" cell is blank.
 */
export class EmptyStructureError extends ConversionError {
  readonly level = 'skip';

  constructor(readonly rowNumber: number) {
    super(`Row ${rowNumber} has no structure and was skipped`);
  }
}

export function isFileError(err: unknown): err is FileError {
  return err instanceof ConversionError && err.level === 'file';
}

/**
 * Render a row error the way the CLI reports it.
 */
export function formatRowError(err: RowError): string {
  return `Row ${err.rowNumber} [${err.column}]: ${err.message} (value: "${err.rawValue}")`;
}
