export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

const MONTH_NUMBERS = new Map<string, number>();

MONTH_NAMES.forEach((name, index) => {
  MONTH_NUMBERS.set(name, index + 1);
  MONTH_NUMBERS.set(name.slice(0, 3), index + 1);
});
MONTH_NUMBERS.set('Sept', 9);

/** Capitalises the first letter of every word and lowercases the rest. */
export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

export function monthNumber(title: string): number | null {
  return MONTH_NUMBERS.get(title) ?? null;
}

export function findInvalidMonths(values: readonly string[]): string[] {
  const invalid: string[] = [];
  for (const value of values) {
    if (monthNumber(value) === null && !invalid.includes(value)) {
      invalid.push(value);
    }
  }
  return invalid;
}
