export type Category = 'create' | 'destroy' | 'replace' | 'update' | 'other';

/**
 * Colour identity of a category. Both presentation surfaces derive their palette from it.
 */
export type CategoryTone = 'green' | 'red' | 'yellow' | 'magenta' | 'blue';

export interface CategoryDescriptor {
  readonly category: Category;
  readonly ordinal: number;
  readonly label: string;
  readonly symbol: string;
  readonly tone: CategoryTone;
}

export const CATEGORY_ORDER = Object.freeze([
  'create',
  'destroy',
  'replace',
  'update',
  'other',
] as const satisfies readonly Category[]);

const DESCRIPTORS: Readonly<Record<Category, CategoryDescriptor>> = Object.freeze({
  create: { category: 'create', ordinal: 0, label: 'CREATE', symbol: '+', tone: 'green' },
  destroy: { category: 'destroy', ordinal: 1, label: 'DESTROY', symbol: '-', tone: 'red' },
  replace: { category: 'replace', ordinal: 2, label: 'REPLACE', symbol: '-/+', tone: 'yellow' },
  update: { category: 'update', ordinal: 3, label: 'UPDATE', symbol: '~', tone: 'magenta' },
  other: { category: 'other', ordinal: 4, label: 'IMPORT', symbol: '', tone: 'blue' },
});

export function describeCategory(category: Category): CategoryDescriptor {
  return DESCRIPTORS[category];
}

/**
 * Resolves a category from its position in {@link CATEGORY_ORDER}, wrapping in both directions.
 *
 * @param ordinal - Any integer; values outside 0..4 wrap around.
 * @returns The category at the wrapped position.
 */
export function categoryAt(ordinal: number): Category {
  const count = CATEGORY_ORDER.length;
  const index = ((ordinal % count) + count) % count;
  return CATEGORY_ORDER[index] ?? 'create';
}

/**
 * Formats the tab caption shared by the terminal explorer and the static report,
 * e.g. `CREATE (+ 2)` or `IMPORT (1)`.
 *
 * @param category - Category being captioned.
 * @param count - Number of resources in the category.
 * @returns Caption text without styling.
 */
export function formatCategoryCaption(category: Category, count: number): string {
  const { label, symbol } = describeCategory(category);
  return symbol === '' ? `${label} (${count})` : `${label} (${symbol} ${count})`;
}
