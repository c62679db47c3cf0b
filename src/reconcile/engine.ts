import { WINDOW_KINDS } from '../calendar/fiscal';
import { titleCase } from '../ingest/months';
import { sumInWindow } from '../aggregate/period';
import { expenseColumn } from '../reshape/expenses';
import type {
  FiscalWindow,
  FiscalWindows,
  InflowRecord,
  PeriodFigure,
  ReconciliationRow,
  WideExpenseRow,
  WindowFigures,
  WindowKind,
} from '../types';

export interface ReconciliationInput {
  inflows: readonly InflowRecord[];
  expenses: readonly WideExpenseRow[];
  /** Tracked category keys; one reconciliation row each. */
  categories: readonly string[];
  windows: FiscalWindows;
}

export interface ReconciliationEngine {
  inflowFigure(window: FiscalWindow): PeriodFigure;
  expenseFigure(category: string, window: FiscalWindow): PeriodFigure;
  outflowTotals(window: FiscalWindow): PeriodFigure;
  netCashFlow(window: FiscalWindow): PeriodFigure;
  /** Total Inflow, categories by label, Total Outflow, Net Cash Flow. */
  table(): ReconciliationRow[];
}

export const ZERO_FIGURE: PeriodFigure = { target: 0, achieved: 0, delta: 0 };

export function periodFigure(target: number, achieved: number): PeriodFigure {
  return { target, achieved, delta: achieved - target };
}

export function sumFigures(figures: readonly PeriodFigure[]): PeriodFigure {
  return figures.reduce(
    (total, figure) => ({
      target: total.target + figure.target,
      achieved: total.achieved + figure.achieved,
      delta: total.delta + figure.delta,
    }),
    ZERO_FIGURE,
  );
}

export function categoryLabel(category: string): string {
  return titleCase(category);
}

function compareLabels(left: string, right: string): number {
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Figures keyed by window kind, then by category key. */
type CategoryLedger = Record<WindowKind, Map<string, PeriodFigure>>;

export function createReconciliationEngine(input: ReconciliationInput): ReconciliationEngine {
  const { inflows, expenses, windows } = input;
  const categories = [...new Set(input.categories)].sort((left, right) =>
    compareLabels(categoryLabel(left), categoryLabel(right)),
  );

  const computeExpense = (category: string, window: FiscalWindow): PeriodFigure => {
    const actualColumn = expenseColumn(category, 'actual');
    const targetColumn = expenseColumn(category, 'target');
    const target = sumInWindow(expenses, (row) => row.monthStart, (row) => row.values[targetColumn], window);
    const achieved = sumInWindow(expenses, (row) => row.monthStart, (row) => row.values[actualColumn], window);
    return periodFigure(target, achieved);
  };

  const ledger = WINDOW_KINDS.reduce<CategoryLedger>(
    (accumulator, kind) => {
      for (const category of categories) {
        accumulator[kind].set(category, computeExpense(category, windows[kind]));
      }
      return accumulator;
    },
    { mtd: new Map(), qtd: new Map(), ytd: new Map() },
  );

  const isLedgerWindow = (window: FiscalWindow): boolean => {
    const known = windows[window.kind];
    return known.start === window.start && known.end === window.end;
  };

  const inflowFigure = (window: FiscalWindow): PeriodFigure =>
    periodFigure(
      sumInWindow(inflows, (row) => row.monthStart, (row) => row.dmInflowTarget, window),
      sumInWindow(inflows, (row) => row.monthStart, (row) => row.dmInflowActual, window),
    );

  const expenseFigure = (category: string, window: FiscalWindow): PeriodFigure => {
    if (isLedgerWindow(window)) {
      const figure = ledger[window.kind].get(category);
      if (figure) {
        return figure;
      }
    }
    return computeExpense(category, window);
  };

  const outflowTotals = (window: FiscalWindow): PeriodFigure =>
    sumFigures(categories.map((category) => expenseFigure(category, window)));

  const netCashFlow = (window: FiscalWindow): PeriodFigure => {
    const inflow = inflowFigure(window);
    const outflow = outflowTotals(window);
    return periodFigure(inflow.target - outflow.target, inflow.achieved - outflow.achieved);
  };

  const perWindow = (compute: (window: FiscalWindow) => PeriodFigure): WindowFigures => ({
    mtd: compute(windows.mtd),
    qtd: compute(windows.qtd),
    ytd: compute(windows.ytd),
  });

  const table = (): ReconciliationRow[] => [
    { kind: 'inflow', label: 'Total Inflow', ...perWindow(inflowFigure) },
    ...categories.map<ReconciliationRow>((category) => ({
      kind: 'category',
      label: categoryLabel(category),
      category,
      ...perWindow((window) => expenseFigure(category, window)),
    })),
    { kind: 'outflow', label: 'Total Outflow', ...perWindow(outflowTotals) },
    { kind: 'net', label: 'Net Cash Flow', ...perWindow(netCashFlow) },
  ];

  return { inflowFigure, expenseFigure, outflowTotals, netCashFlow, table };
}
