import { describe, expect, it } from 'vitest';
import {
  DEFAULT_CATEGORY_CATALOG,
  categoryKey,
  isTrackedCategory,
  loadCategoryCatalog,
  parseCategoryCatalog,
} from './categories';

describe('category catalog', () => {
  it('tracks the eight default categories by exact key', () => {
    expect(DEFAULT_CATEGORY_CATALOG.categories.map((category) => category.name)).toEqual([
      'salary',
      'legal and professional',
      'rent',
      'hotel & travel expenses',
      'marketing exp.',
      'misc expenses',
      'investments',
      'capex',
    ]);
    expect(isTrackedCategory(DEFAULT_CATEGORY_CATALOG, categoryKey('Legal  and Professional'))).toBe(true);
    expect(isTrackedCategory(DEFAULT_CATEGORY_CATALOG, 'current rent deposit')).toBe(false);
  });

  it('validates catalogs loaded from configuration', () => {
    const catalog = parseCategoryCatalog({
      version: 4,
      categories: [{ name: 'travel', match: { kind: 'contains', value: 'Travel' } }],
    });
    expect(isTrackedCategory(catalog, 'hotel & travel expenses')).toBe(true);
    expect(() => parseCategoryCatalog({ version: 1, categories: [] })).toThrow();
    expect(() =>
      parseCategoryCatalog({ version: 1, categories: [{ name: 'bad', match: { kind: 'pattern', value: '(' } }] }),
    ).toThrow();
  });

  it('uses the default catalog when no path is configured', async () => {
    await expect(loadCategoryCatalog()).resolves.toBe(DEFAULT_CATEGORY_CATALOG);
  });
});
