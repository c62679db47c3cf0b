export type CellValue = string | number | boolean | null;

export type TableRow = Record<string, CellValue>;

export interface Table {
  columns: string[];
  rows: TableRow[];
}

export type TableName = 'expenses' | 'inflows';

/** First day of a calendar month, formatted `YYYY-MM-01`. */
export type CanonicalMonth = string;

export interface MonthStampedRow extends TableRow {
  monthstart: CanonicalMonth;
}

export interface MonthStampedTable {
  columns: string[];
  rows: MonthStampedRow[];
}

export interface ExpenseRecord {
  category: string;
  month: string;
  year: number;
  monthStart: CanonicalMonth;
  actual: number | null;
  target: number | null;
}

export interface InflowRecord {
  project: string | null;
  month: string;
  year: number;
  monthStart: CanonicalMonth;
  dmInflowActual: number | null;
  dmInflowTarget: number | null;
}

export interface WideExpenseRow {
  monthStart: CanonicalMonth;
  year: number;
  month: number;
  /** Keyed by `{category}_actual` / `{category}_target`. */
  values: Record<string, number>;
  totalActualExpense: number;
}

export interface GroupedInflowRow {
  project: string;
  monthStart: CanonicalMonth;
  inflow: number;
}

export type WindowKind = 'mtd' | 'qtd' | 'ytd';

export interface FiscalWindow {
  kind: WindowKind;
  start: CanonicalMonth;
  end: CanonicalMonth;
  /** Last calendar day covered by `end`, `YYYY-MM-DD`. */
  endsOn: string;
}

export type FiscalWindows = Record<WindowKind, FiscalWindow>;

export interface PeriodFigure {
  target: number;
  achieved: number;
  delta: number;
}

export type WindowFigures = Record<WindowKind, PeriodFigure>;

export type ReconciliationRowKind = 'inflow' | 'category' | 'outflow' | 'net';

export interface ReconciliationRow extends WindowFigures {
  kind: ReconciliationRowKind;
  label: string;
  category?: string;
}

export interface InflowDistributionRow {
  project: string;
  mtd: number;
  qtd: number;
  ytd: number;
}

export interface InflowDistribution {
  rows: InflowDistributionRow[];
  total: Record<WindowKind, number>;
}

export type InflowPeriodLabel = 'MTD Inflow' | 'QTD Inflow' | 'YTD Inflow';

export interface InflowChartPoint {
  project: string;
  period: InflowPeriodLabel;
  inflow: number;
}

export type CategoryMatchRule =
  | { kind: 'exact'; value: string }
  | { kind: 'contains'; value: string }
  | { kind: 'pattern'; value: string };

export interface CategoryDefinition {
  name: string;
  match: CategoryMatchRule;
}

export interface CategoryCatalog {
  version: number;
  categories: CategoryDefinition[];
}

export type Outcome<T, E> = { success: true; data: T } | { success: false; error: E };
