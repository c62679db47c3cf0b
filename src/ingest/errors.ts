import type { CellValue, TableName } from '../types';

export type InputErrorCode = 'MISSING_COLUMNS' | 'INVALID_MONTH' | 'INVALID_DATE';

export abstract class InputError extends Error {
  abstract readonly code: InputErrorCode;

  constructor(
    readonly table: TableName,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  abstract toJSON(): InputErrorPayload;
}

export class MissingColumnsError extends InputError {
  readonly code = 'MISSING_COLUMNS';

  constructor(
    table: TableName,
    readonly missing: string[],
  ) {
    super(table, `The ${table} table is missing columns: ${missing.join(', ')}`);
  }

  toJSON(): InputErrorPayload {
    return { code: this.code, table: this.table, message: this.message, missing: this.missing };
  }
}

export class InvalidMonthError extends InputError {
  readonly code = 'INVALID_MONTH';

  constructor(
    table: TableName,
    readonly invalidValues: string[],
  ) {
    super(
      table,
      `The following month values in the ${table} table are invalid: ${invalidValues
        .map((value) => JSON.stringify(value))
        .join(', ')}`,
    );
  }

  toJSON(): InputErrorPayload {
    return {
      code: this.code,
      table: this.table,
      message: this.message,
      invalidValues: this.invalidValues,
    };
  }
}

export interface InvalidDateRow {
  /** Zero-based position of the row in its table. */
  index: number;
  month: string;
  year: CellValue;
}

export class InvalidDateError extends InputError {
  readonly code = 'INVALID_DATE';

  constructor(
    table: TableName,
    readonly rows: InvalidDateRow[],
  ) {
    super(
      table,
      `${rows.length} row(s) in the ${table} table have invalid month/year combinations (rows ${rows
        .map((row) => row.index + 1)
        .join(', ')})`,
    );
  }

  toJSON(): InputErrorPayload {
    return { code: this.code, table: this.table, message: this.message, rows: this.rows };
  }
}

export interface InputErrorPayload {
  code: InputErrorCode;
  table: TableName;
  message: string;
  missing?: string[];
  invalidValues?: string[];
  rows?: InvalidDateRow[];
}

export class InputValidationFailure extends Error {
  readonly code = 'INPUT_VALIDATION_FAILED';

  constructor(readonly errors: InputError[]) {
    super(errors.map((error) => error.message).join('\n'));
    this.name = 'InputValidationFailure';
  }
}
