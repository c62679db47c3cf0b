import { monthParts } from '../calendar/fiscal';
import { DEFAULT_CATEGORY_CATALOG, categoryKey, resolveCategory } from '../config/categories';
import type { CanonicalMonth, CategoryCatalog, ExpenseRecord, WideExpenseRow } from '../types';

export type ExpenseMeasure = 'actual' | 'target';

export interface CategorySplit {
  /** Canonical catalog names matched by the data, sorted. */
  tracked: string[];
  /** Category keys present in the data but not on the catalog, sorted. */
  untracked: string[];
}

export function expenseColumn(category: string, measure: ExpenseMeasure): string {
  return `${categoryKey(category)}_${measure}`;
}

interface MeanAccumulator {
  total: number;
  count: number;
}

function distinctKeys(records: readonly ExpenseRecord[]): string[] {
  const keys = new Set<string>();
  for (const record of records) {
    const key = categoryKey(record.category);
    if (key) {
      keys.add(key);
    }
  }
  return [...keys].sort();
}

export function splitCategories(
  records: readonly ExpenseRecord[],
  catalog: CategoryCatalog = DEFAULT_CATEGORY_CATALOG,
): CategorySplit {
  const tracked: string[] = [];
  const untracked: string[] = [];
  for (const key of distinctKeys(records)) {
    const name = resolveCategory(catalog, key);
    if (name === null) {
      untracked.push(key);
    } else if (!tracked.includes(name)) {
      tracked.push(name);
    }
  }
  return { tracked: tracked.sort(), untracked };
}

/**
 * Pivots long (category, month, actual, target) records into one row per month
 * with a `{category}_actual` and `{category}_target` column per category.
 * Categories on the catalog are folded into their canonical name, so every
 * spelling a rule matches lands in one column pair. Repeated entries for the
 * same category and month are averaged; a category missing from a month leaves
 * its columns absent.
 */
export function reshapeExpenses(
  records: readonly ExpenseRecord[],
  catalog: CategoryCatalog = DEFAULT_CATEGORY_CATALOG,
): WideExpenseRow[] {
  const months = new Map<CanonicalMonth, Map<string, MeanAccumulator>>();
  const trackedColumns = new Set<string>();

  for (const record of records) {
    const raw = categoryKey(record.category);
    if (!raw) {
      continue;
    }
    const name = resolveCategory(catalog, raw);
    const key = name ?? raw;
    if (name !== null) {
      trackedColumns.add(expenseColumn(name, 'actual'));
    }
    let cells = months.get(record.monthStart);
    if (!cells) {
      cells = new Map();
      months.set(record.monthStart, cells);
    }
    const measures: Array<[ExpenseMeasure, number | null]> = [
      ['actual', record.actual],
      ['target', record.target],
    ];
    for (const [measure, value] of measures) {
      if (value === null) {
        continue;
      }
      const column = expenseColumn(key, measure);
      const accumulator = cells.get(column) ?? { total: 0, count: 0 };
      accumulator.total += value;
      accumulator.count += 1;
      cells.set(column, accumulator);
    }
  }

  return [...months.entries()]
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
    .map(([monthStart, cells]) => {
      const values: Record<string, number> = {};
      for (const [column, { total, count }] of cells) {
        values[column] = total / count;
      }
      const { year, month } = monthParts(monthStart);
      return {
        monthStart,
        year,
        month,
        values,
        totalActualExpense: totalActualExpense(values, trackedColumns),
      };
    });
}

export function totalActualExpense(values: Record<string, number>, trackedColumns: ReadonlySet<string>): number {
  return Object.entries(values).reduce(
    (total, [column, value]) => (trackedColumns.has(column) ? total + value : total),
    0,
  );
}
