import type { CanonicalMonth, FiscalWindow, FiscalWindows, WindowKind } from '../types';

/** The fiscal year runs April to March. */
export const FISCAL_YEAR_START_MONTH = 4;

export const WINDOW_KINDS: readonly WindowKind[] = ['mtd', 'qtd', 'ytd'];

export const WINDOW_LABELS: Record<WindowKind, string> = {
  mtd: 'MTD',
  qtd: 'QTD',
  ytd: 'YTD',
};

export const WINDOW_CAPTION =
  'MTD = Last completed month | QTD = Current quarter till last completed month | YTD = Financial year till last completed month';

const CANONICAL_MONTH_PATTERN = /^(\d{4})-(\d{2})-01$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface MonthParts {
  year: number;
  month: number;
}

export type MonthLike = Date | CanonicalMonth;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function toCanonicalMonth(year: number, month: number): CanonicalMonth {
  return `${pad(year, 4)}-${pad(month, 2)}-01`;
}

export function monthParts(value: MonthLike): MonthParts {
  if (value instanceof Date) {
    return { year: value.getFullYear(), month: value.getMonth() + 1 };
  }
  const match = CANONICAL_MONTH_PATTERN.exec(value);
  if (!match) {
    throw new RangeError(`Not a canonical month: ${value}`);
  }
  return { year: Number(match[1]), month: Number(match[2]) };
}

function lastDayOfMonth({ year, month }: MonthParts): string {
  // Day 0 of the following month is the last day of this one. setUTCFullYear
  // keeps years 0-99 literal where Date.UTC would map them to 1900-1999.
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  const day = date.getUTCDate();
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * Reads a `YYYY-MM-DD` string as local midnight on that calendar day.
 * Returns null for any other shape or for a day the calendar lacks (`2025-02-30`).
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  date.setHours(0, 0, 0, 0);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/** If today is any day of month M, the result is the first day of M-1. */
export function lastCompletedMonth(today: Date): CanonicalMonth {
  const { year, month } = monthParts(today);
  if (month === 1) {
    return toCanonicalMonth(year - 1, 12);
  }
  return toCanonicalMonth(year, month - 1);
}

export function fiscalYearStart(date: MonthLike): CanonicalMonth {
  const { year, month } = monthParts(date);
  const startYear = month < FISCAL_YEAR_START_MONTH ? year - 1 : year;
  return toCanonicalMonth(startYear, FISCAL_YEAR_START_MONTH);
}

/** First month of the fiscal quarter (Apr, Jul, Oct or Jan) holding `date`. */
export function quarterStart(date: MonthLike): CanonicalMonth {
  const { year, month } = monthParts(date);
  const offset = (month - FISCAL_YEAR_START_MONTH + 12) % 12;
  const quarterMonth = month - (offset % 3);
  return toCanonicalMonth(year, quarterMonth);
}

export function fiscalWindows(today: Date): FiscalWindows {
  const end = lastCompletedMonth(today);
  const endsOn = lastDayOfMonth(monthParts(end));
  const build = (kind: WindowKind, start: CanonicalMonth): FiscalWindow => ({ kind, start, end, endsOn });
  return {
    mtd: build('mtd', end),
    qtd: build('qtd', quarterStart(end)),
    ytd: build('ytd', fiscalYearStart(end)),
  };
}

export function isWithinWindow(month: CanonicalMonth, window: FiscalWindow): boolean {
  return window.start <= month && month <= window.end;
}
