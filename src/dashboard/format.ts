import { WINDOW_KINDS, WINDOW_LABELS } from '../calendar/fiscal';
import type { InflowDistribution, ReconciliationRow } from '../types';

const amountFormatter = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 0,
});

export interface DeltaDisplay {
  text: string;
  direction: 'up' | 'down';
  tone: 'positive' | 'negative';
}

export function formatAmount(value: number): string {
  // Avoid rendering "-0" for small negatives that round away.
  return amountFormatter.format(Math.round(value) || 0);
}

export function describeDelta(delta: number): DeltaDisplay {
  const up = delta >= 0;
  return {
    text: `${up ? '↑' : '↓'} ${formatAmount(delta)}`,
    direction: up ? 'up' : 'down',
    tone: up ? 'positive' : 'negative',
  };
}

export interface ReconciliationColumns {
  label: string;
  'MTD Target': number;
  'MTD Achieved': number;
  'MTD Delta': number;
  'QTD Target': number;
  'QTD Achieved': number;
  'QTD Delta': number;
  'YTD Target': number;
  'YTD Achieved': number;
  'YTD Delta': number;
}

export function flattenReconciliationRow({ label, mtd, qtd, ytd }: ReconciliationRow): ReconciliationColumns {
  return {
    label,
    'MTD Target': mtd.target,
    'MTD Achieved': mtd.achieved,
    'MTD Delta': mtd.delta,
    'QTD Target': qtd.target,
    'QTD Achieved': qtd.achieved,
    'QTD Delta': qtd.delta,
    'YTD Target': ytd.target,
    'YTD Achieved': ytd.achieved,
    'YTD Delta': ytd.delta,
  };
}

export function formatReconciliationRow(row: ReconciliationRow): Record<string, string> {
  const formatted: Record<string, string> = { Category: row.label };
  for (const kind of WINDOW_KINDS) {
    const prefix = WINDOW_LABELS[kind];
    formatted[`${prefix} Target`] = formatAmount(row[kind].target);
    formatted[`${prefix} Achieved`] = formatAmount(row[kind].achieved);
    formatted[`${prefix} Delta`] = describeDelta(row[kind].delta).text;
  }
  return formatted;
}

export function formatInflowDistribution(distribution: InflowDistribution): Array<Record<string, string>> {
  const rows = distribution.rows.map((row) => ({
    Project: row.project,
    'MTD Inflow': formatAmount(row.mtd),
    'QTD Inflow': formatAmount(row.qtd),
    'YTD Inflow': formatAmount(row.ytd),
  }));
  rows.push({
    Project: 'Total',
    'MTD Inflow': formatAmount(distribution.total.mtd),
    'QTD Inflow': formatAmount(distribution.total.qtd),
    'YTD Inflow': formatAmount(distribution.total.ytd),
  });
  return rows;
}
