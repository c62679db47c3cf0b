import { describe, expect, it } from 'vitest';
import { WINDOW_KINDS, fiscalWindows } from '../calendar/fiscal';
import { reshapeExpenses } from '../reshape/expenses';
import { createReconciliationEngine, sumFigures } from './engine';
import type { ExpenseRecord, FiscalWindow, InflowRecord } from '../types';

function expense(category: string, monthStart: string, actual: number, target: number): ExpenseRecord {
  return { category, month: monthStart.slice(5, 7), year: 2025, monthStart, actual, target };
}

function inflow(monthStart: string, actual: number, target: number): InflowRecord {
  return {
    project: 'Tower A',
    month: monthStart.slice(5, 7),
    year: 2025,
    monthStart,
    dmInflowActual: actual,
    dmInflowTarget: target,
  };
}

// Last completed month is July 2025.
const windows = fiscalWindows(new Date(2025, 7, 5));

const engine = createReconciliationEngine({
  inflows: [inflow('2025-06-01', 3000, 3500), inflow('2025-07-01', 5000, 4000)],
  expenses: reshapeExpenses([
    expense('Rent', '2025-06-01', 100, 150),
    expense('Rent', '2025-07-01', 200, 150),
    expense('Salary', '2025-06-01', 1000, 900),
    expense('Salary', '2025-07-01', 1100, 1200),
  ]),
  categories: ['salary', 'rent'],
  windows,
});

describe('createReconciliationEngine', () => {
  it('computes category figures for the last completed month', () => {
    expect(engine.expenseFigure('rent', windows.mtd)).toEqual({ target: 150, achieved: 200, delta: 50 });
    expect(engine.expenseFigure('rent', windows.ytd)).toEqual({ target: 300, achieved: 300, delta: 0 });
  });

  it('computes inflow figures from the target and actual columns', () => {
    expect(engine.inflowFigure(windows.mtd)).toEqual({ target: 4000, achieved: 5000, delta: 1000 });
    expect(engine.inflowFigure(windows.ytd)).toEqual({ target: 7500, achieved: 8000, delta: 500 });
  });

  it('keeps outflow totals equal to the sum of category figures', () => {
    for (const kind of WINDOW_KINDS) {
      const window = windows[kind];
      const categories = ['rent', 'salary'].map((category) => engine.expenseFigure(category, window));
      expect(engine.outflowTotals(window)).toEqual(sumFigures(categories));
    }
    expect(engine.outflowTotals(windows.mtd)).toEqual({ target: 1350, achieved: 1300, delta: -50 });
  });

  it('derives net cash flow as inflow minus outflow', () => {
    for (const kind of WINDOW_KINDS) {
      const window = windows[kind];
      expect(engine.netCashFlow(window).delta).toBe(
        engine.inflowFigure(window).delta - engine.outflowTotals(window).delta,
      );
    }
    expect(engine.netCashFlow(windows.mtd)).toEqual({ target: 2650, achieved: 3700, delta: 1050 });
    expect(engine.netCashFlow(windows.ytd)).toEqual({ target: 5100, achieved: 5600, delta: 500 });
  });

  it('returns zeros for a window with no rows', () => {
    const empty: FiscalWindow = { kind: 'mtd', start: '2030-01-01', end: '2030-01-01', endsOn: '2030-01-31' };
    expect(engine.inflowFigure(empty)).toEqual({ target: 0, achieved: 0, delta: 0 });
    expect(engine.outflowTotals(empty)).toEqual({ target: 0, achieved: 0, delta: 0 });
    expect(engine.netCashFlow(empty)).toEqual({ target: 0, achieved: 0, delta: 0 });
  });

  it('lays out the table with categories sorted by label', () => {
    const table = engine.table();
    expect(table.map((row) => [row.kind, row.label])).toEqual([
      ['inflow', 'Total Inflow'],
      ['category', 'Rent'],
      ['category', 'Salary'],
      ['outflow', 'Total Outflow'],
      ['net', 'Net Cash Flow'],
    ]);
    expect(table[2]).toEqual({
      kind: 'category',
      label: 'Salary',
      category: 'salary',
      mtd: { target: 1200, achieved: 1100, delta: -100 },
      qtd: { target: 1200, achieved: 1100, delta: -100 },
      ytd: { target: 2100, achieved: 2100, delta: 0 },
    });
  });
});
