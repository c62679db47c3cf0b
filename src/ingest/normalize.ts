import { toCanonicalMonth } from '../calendar/fiscal';
import type {
  CellValue,
  MonthStampedRow,
  MonthStampedTable,
  Outcome,
  Table,
  TableName,
  TableRow,
} from '../types';
import { InvalidDateError, InvalidMonthError, MissingColumnsError, type InvalidDateRow } from './errors';
import { findInvalidMonths, monthNumber, titleCase } from './months';

export const EXPENSE_COLUMNS = ['category', 'month', 'year', 'actual', 'target'] as const;

export const INFLOW_COLUMNS = ['project', 'month', 'year', 'dm inflow actual', 'dm inflow target'] as const;

export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Trims, lowercases and collapses whitespace in every column name. Later duplicates win. */
export function normalizeColumns(table: Table): Table {
  const renames = table.columns.map((column) => [column, normalizeColumnName(column)] as const);
  const columns = [...new Set(renames.map(([, normalized]) => normalized))];
  const rows = table.rows.map((row) => {
    const next: TableRow = {};
    for (const [original, normalized] of renames) {
      if (Object.prototype.hasOwnProperty.call(row, original)) {
        next[normalized] = row[original];
      }
    }
    return next;
  });
  return { columns, rows };
}

export function validateRequiredColumns(
  table: Table,
  required: Iterable<string>,
  tableName: TableName,
): Outcome<void, MissingColumnsError> {
  const present = new Set(table.columns);
  const missing = [...new Set(required)].filter((column) => !present.has(column));
  if (missing.length) {
    return { success: false, error: new MissingColumnsError(tableName, missing) };
  }
  return { success: true, data: undefined };
}

function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value).trim();
}

function parseYear(value: CellValue | undefined): number | null {
  const text = cellText(value);
  if (!text) {
    return null;
  }
  const year = Number(text);
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    return null;
  }
  return year;
}

/**
 * Title-cases the `month` column, rejects unknown month names and stamps every
 * row with a `monthstart` canonical month built from `month` and `year`.
 */
export function normalizeMonthYear(
  table: Table,
  tableName: TableName,
): Outcome<MonthStampedTable, InvalidMonthError | InvalidDateError> {
  const titled = table.rows.map((row) => titleCase(cellText(row.month)));

  const invalidMonths = findInvalidMonths(titled);
  if (invalidMonths.length) {
    return { success: false, error: new InvalidMonthError(tableName, invalidMonths) };
  }

  const rows: MonthStampedRow[] = [];
  const invalidRows: InvalidDateRow[] = [];
  table.rows.forEach((row, index) => {
    const month = titled[index];
    const monthIndex = monthNumber(month);
    const year = parseYear(row.year);
    if (monthIndex === null || year === null) {
      invalidRows.push({ index, month, year: row.year ?? null });
      return;
    }
    rows.push({ ...row, month, monthstart: toCanonicalMonth(year, monthIndex) });
  });

  if (invalidRows.length) {
    return { success: false, error: new InvalidDateError(tableName, invalidRows) };
  }

  const columns = table.columns.includes('monthstart') ? table.columns : [...table.columns, 'monthstart'];
  return { success: true, data: { columns, rows } };
}
