import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { CategoryCatalog, CategoryDefinition } from '../types';

export const CategoryMatchRuleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('exact'), value: z.string().min(1) }),
  z.object({ kind: z.literal('contains'), value: z.string().min(1) }),
  z.object({
    kind: z.literal('pattern'),
    value: z.string().min(1).refine(isValidPattern, { message: 'Invalid regular expression' }),
  }),
]);

export const CategoryCatalogSchema = z.object({
  version: z.number().int().positive(),
  categories: z
    .array(
      z.object({
        name: z.string().min(1),
        match: CategoryMatchRuleSchema,
      }),
    )
    .min(1),
});

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}

function exact(name: string): CategoryDefinition {
  return { name, match: { kind: 'exact', value: name } };
}

export const DEFAULT_CATEGORY_CATALOG: CategoryCatalog = {
  version: 1,
  categories: [
    exact('salary'),
    exact('legal and professional'),
    exact('rent'),
    exact('hotel & travel expenses'),
    exact('marketing exp.'),
    exact('misc expenses'),
    exact('investments'),
    exact('capex'),
  ],
};

/** Lowercases and collapses whitespace so a category can be used as a column prefix. */
export function categoryKey(category: string): string {
  return category.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function matchesCategory(definition: CategoryDefinition, key: string): boolean {
  const { match } = definition;
  switch (match.kind) {
    case 'exact':
      return key === categoryKey(match.value);
    case 'contains':
      return key.includes(categoryKey(match.value));
    case 'pattern':
      return new RegExp(match.value, 'i').test(key);
    default:
      return false;
  }
}

export function isTrackedCategory(catalog: CategoryCatalog, key: string): boolean {
  return resolveCategory(catalog, key) !== null;
}

/** Canonical key of the first definition whose rule matches `key`, or null when none does. */
export function resolveCategory(catalog: CategoryCatalog, key: string): string | null {
  const definition = catalog.categories.find((candidate) => matchesCategory(candidate, key));
  return definition ? categoryKey(definition.name) : null;
}

export function parseCategoryCatalog(payload: unknown): CategoryCatalog {
  return CategoryCatalogSchema.parse(payload);
}

export async function loadCategoryCatalog(path?: string): Promise<CategoryCatalog> {
  if (!path) {
    return DEFAULT_CATEGORY_CATALOG;
  }
  const raw = await readFile(path, 'utf8');
  return parseCategoryCatalog(JSON.parse(raw));
}
