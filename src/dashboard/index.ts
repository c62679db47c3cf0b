import { WINDOW_CAPTION, fiscalWindows } from '../calendar/fiscal';
import { DEFAULT_CATEGORY_CATALOG } from '../config/categories';
import {
  ALL_PROJECTS,
  filterByProject,
  groupInflows,
  inflowByProject,
  inflowChartSeries,
  listProjects,
} from '../aggregate/period';
import { InputValidationFailure, type InputError } from '../ingest/errors';
import {
  EXPENSE_COLUMNS,
  INFLOW_COLUMNS,
  normalizeColumns,
  normalizeMonthYear,
  validateRequiredColumns,
} from '../ingest/normalize';
import { toExpenseRecords, toInflowRecords } from '../ingest/records';
import { createReconciliationEngine } from '../reconcile/engine';
import { reshapeExpenses, splitCategories } from '../reshape/expenses';
import type {
  CategoryCatalog,
  FiscalWindows,
  InflowChartPoint,
  InflowDistribution,
  MonthStampedTable,
  Outcome,
  ReconciliationRow,
  Table,
  TableName,
} from '../types';

export interface DashboardInput {
  expenses: Table;
  inflows: Table;
  today: Date;
  /** Narrows the inflow distribution; `All Projects` or empty applies no filter. */
  project?: string;
  catalog?: CategoryCatalog;
}

export interface CashFlowDashboard {
  windows: FiscalWindows;
  caption: string;
  projects: string[];
  selectedProject: string;
  inflowDistribution: InflowDistribution;
  inflowChart: InflowChartPoint[];
  reconciliation: ReconciliationRow[];
  /** Categories in the expense table that the catalog does not track; excluded from every total. */
  untrackedCategories: string[];
  catalogVersion: number;
}

function prepareTable(
  table: Table,
  required: readonly string[],
  tableName: TableName,
  errors: InputError[],
): MonthStampedTable | null {
  const normalized = normalizeColumns(table);
  const columns = validateRequiredColumns(normalized, required, tableName);
  if (!columns.success) {
    errors.push(columns.error);
    return null;
  }
  const stamped = normalizeMonthYear(normalized, tableName);
  if (!stamped.success) {
    errors.push(stamped.error);
    return null;
  }
  return stamped.data;
}

/**
 * Runs one render pass: validates both tables in full, then buckets them into
 * the MTD/QTD/YTD windows that end at the month before `today`.
 */
export function buildCashFlowDashboard(input: DashboardInput): Outcome<CashFlowDashboard, InputValidationFailure> {
  const catalog = input.catalog ?? DEFAULT_CATEGORY_CATALOG;
  const errors: InputError[] = [];
  const inflowTable = prepareTable(input.inflows, INFLOW_COLUMNS, 'inflows', errors);
  const expenseTable = prepareTable(input.expenses, EXPENSE_COLUMNS, 'expenses', errors);
  if (!inflowTable || !expenseTable) {
    return { success: false, error: new InputValidationFailure(errors) };
  }

  const windows = fiscalWindows(input.today);

  const inflows = toInflowRecords(inflowTable);
  const grouped = groupInflows(inflows);
  const projects = listProjects(grouped);
  const selectedProject = input.project && projects.includes(input.project) ? input.project : ALL_PROJECTS;
  const inflowDistribution = inflowByProject(filterByProject(grouped, selectedProject), windows);

  const expenseRecords = toExpenseRecords(expenseTable);
  const { tracked, untracked } = splitCategories(expenseRecords, catalog);
  const engine = createReconciliationEngine({
    inflows,
    expenses: reshapeExpenses(expenseRecords, catalog),
    categories: tracked,
    windows,
  });

  return {
    success: true,
    data: {
      windows,
      caption: WINDOW_CAPTION,
      projects,
      selectedProject,
      inflowDistribution,
      inflowChart: inflowChartSeries(inflowDistribution),
      reconciliation: engine.table(),
      untrackedCategories: untracked,
      catalogVersion: catalog.version,
    },
  };
}
