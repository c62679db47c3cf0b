import { monthParts } from '../calendar/fiscal';
import type { CellValue, ExpenseRecord, InflowRecord, MonthStampedRow, MonthStampedTable } from '../types';

/**
 * Coerces a spreadsheet cell to a number. Thousands separators are accepted;
 * anything else that does not parse yields null.
 */
export function parseAmount(value: CellValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const text = value.trim().replace(/,/g, '');
  if (!text) {
    return null;
  }
  const amount = Number(text);
  return Number.isFinite(amount) ? amount : null;
}

function text(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = String(value).trim();
  return trimmed.length ? trimmed : null;
}

function stampedYear(row: MonthStampedRow): number {
  return monthParts(row.monthstart).year;
}

export function toExpenseRecords(table: MonthStampedTable): ExpenseRecord[] {
  return table.rows.map((row) => ({
    category: text(row.category) ?? '',
    month: String(row.month),
    year: stampedYear(row),
    monthStart: row.monthstart,
    actual: parseAmount(row.actual),
    target: parseAmount(row.target),
  }));
}

export function toInflowRecords(table: MonthStampedTable): InflowRecord[] {
  return table.rows.map((row) => ({
    project: text(row.project),
    month: String(row.month),
    year: stampedYear(row),
    monthStart: row.monthstart,
    dmInflowActual: parseAmount(row['dm inflow actual']),
    dmInflowTarget: parseAmount(row['dm inflow target']),
  }));
}
