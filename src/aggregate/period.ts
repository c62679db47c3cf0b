import { WINDOW_KINDS, isWithinWindow } from '../calendar/fiscal';
import type {
  CanonicalMonth,
  FiscalWindow,
  FiscalWindows,
  GroupedInflowRow,
  InflowChartPoint,
  InflowDistribution,
  InflowPeriodLabel,
  InflowRecord,
  WindowKind,
} from '../types';

export const ALL_PROJECTS = 'All Projects';

export type DateAccessor<T> = (row: T) => CanonicalMonth;
export type ValueAccessor<T> = (row: T) => number | null | undefined;
export type GroupAccessor<T> = (row: T) => string | null | undefined;

const PERIOD_LABELS: Record<WindowKind, InflowPeriodLabel> = {
  mtd: 'MTD Inflow',
  qtd: 'QTD Inflow',
  ytd: 'YTD Inflow',
};

/** Sums `valueOf` over rows whose month falls inside the window, both ends inclusive. */
export function sumInWindow<T>(
  rows: readonly T[],
  dateOf: DateAccessor<T>,
  valueOf: ValueAccessor<T>,
  window: FiscalWindow,
): number {
  return rows.reduce((total, row) => {
    if (!isWithinWindow(dateOf(row), window)) {
      return total;
    }
    return total + (valueOf(row) ?? 0);
  }, 0);
}

/**
 * Grouped variant of {@link sumInWindow}. Every group seen in `rows` gets a key,
 * with 0 when none of its rows fall inside the window. Rows without a group are skipped.
 */
export function sumByGroupInWindow<T>(
  rows: readonly T[],
  groupOf: GroupAccessor<T>,
  dateOf: DateAccessor<T>,
  valueOf: ValueAccessor<T>,
  window: FiscalWindow,
): Map<string, number> {
  const totals = new Map<string, number>();
  for (const row of rows) {
    const group = groupOf(row);
    if (group === null || group === undefined) {
      continue;
    }
    const current = totals.get(group) ?? 0;
    const value = isWithinWindow(dateOf(row), window) ? valueOf(row) ?? 0 : 0;
    totals.set(group, current + value);
  }
  return totals;
}

/** One row per (project, month) with the summed actual inflow. Blank projects are dropped. */
export function groupInflows(records: readonly InflowRecord[]): GroupedInflowRow[] {
  const grouped = new Map<string, GroupedInflowRow>();
  for (const record of records) {
    if (!record.project) {
      continue;
    }
    const key = `${record.project}\u0000${record.monthStart}`;
    const existing = grouped.get(key);
    if (existing) {
      existing.inflow += record.dmInflowActual ?? 0;
    } else {
      grouped.set(key, {
        project: record.project,
        monthStart: record.monthStart,
        inflow: record.dmInflowActual ?? 0,
      });
    }
  }
  return [...grouped.values()].sort((left, right) => {
    if (left.project !== right.project) {
      return left.project < right.project ? -1 : 1;
    }
    return left.monthStart < right.monthStart ? -1 : left.monthStart > right.monthStart ? 1 : 0;
  });
}

export function listProjects(rows: readonly GroupedInflowRow[]): string[] {
  const projects = [...new Set(rows.map((row) => row.project))].sort();
  return [ALL_PROJECTS, ...projects];
}

export function filterByProject(rows: readonly GroupedInflowRow[], project?: string): GroupedInflowRow[] {
  if (!project || project === ALL_PROJECTS) {
    return [...rows];
  }
  return rows.filter((row) => row.project === project);
}

/** Projects with at least one row in the fiscal year to date; MTD and QTD may still be 0. */
export function inflowByProject(rows: readonly GroupedInflowRow[], windows: FiscalWindows): InflowDistribution {
  const sumFor = (kind: WindowKind) =>
    sumByGroupInWindow(
      rows,
      (row) => row.project,
      (row) => row.monthStart,
      (row) => row.inflow,
      windows[kind],
    );
  const mtd = sumFor('mtd');
  const qtd = sumFor('qtd');
  const ytd = sumFor('ytd');

  const active = new Set(rows.filter((row) => isWithinWindow(row.monthStart, windows.ytd)).map((row) => row.project));

  const distribution = [...ytd.keys()]
    .filter((project) => active.has(project))
    .sort()
    .map((project) => ({
      project,
      mtd: mtd.get(project) ?? 0,
      qtd: qtd.get(project) ?? 0,
      ytd: ytd.get(project) ?? 0,
    }));

  const total = distribution.reduce(
    (accumulator, row) => ({
      mtd: accumulator.mtd + row.mtd,
      qtd: accumulator.qtd + row.qtd,
      ytd: accumulator.ytd + row.ytd,
    }),
    { mtd: 0, qtd: 0, ytd: 0 },
  );

  return { rows: distribution, total };
}

/** Long-format points for a grouped bar chart of inflow per project and period. */
export function inflowChartSeries(distribution: InflowDistribution): InflowChartPoint[] {
  return WINDOW_KINDS.flatMap((kind) =>
    distribution.rows.map((row) => ({
      project: row.project,
      period: PERIOD_LABELS[kind],
      inflow: row[kind],
    })),
  );
}
