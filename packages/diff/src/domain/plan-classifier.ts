import { CATEGORY_ORDER, type Category } from './categories.js';
import type { ResourceChange } from './plan-types.js';

/**
 * Resource changes grouped by category, each list in plan order.
 */
export type PlanBuckets = Readonly<Record<Category, readonly ResourceChange[]>>;

export interface ClassifyOptions {
  /** Drops resources whose first action is `no-op` before grouping. */
  readonly hideNoOp?: boolean;
}

/**
 * Maps an action sequence to its category. A sequence starting with `delete, create`
 * is a replacement; otherwise the first action decides, and anything unrecognised
 * (`no-op`, `read`, `import`, ...) falls into `other`.
 *
 * @param actions - Planned actions of a resource.
 * @returns The category, or `undefined` for an empty sequence.
 */
export function categorizeActions(actions: readonly string[]): Category | undefined {
  const [first, second] = actions;
  if (first === undefined) {
    return undefined;
  }

  if (first === 'delete' && second === 'create') {
    return 'replace';
  }

  switch (first) {
    case 'create': {
      return 'create';
    }
    case 'delete': {
      return 'destroy';
    }
    case 'update': {
      return 'update';
    }
    default: {
      return 'other';
    }
  }
}

/**
 * Partitions resource changes into the five fixed categories. Entries without any
 * action are skipped.
 *
 * @param changes - Resource changes in plan order.
 * @param options - Classification options.
 * @returns Frozen buckets keyed by category.
 */
export function classifyResourceChanges(
  changes: Iterable<ResourceChange>,
  options: ClassifyOptions = {},
): PlanBuckets {
  const buckets: Record<Category, ResourceChange[]> = {
    create: [],
    destroy: [],
    replace: [],
    update: [],
    other: [],
  };

  for (const change of changes) {
    if (options.hideNoOp === true && change.actions[0] === 'no-op') {
      continue;
    }

    const category = categorizeActions(change.actions);
    if (category === undefined) {
      continue;
    }
    buckets[category].push(change);
  }

  return Object.freeze({
    create: Object.freeze(buckets.create),
    destroy: Object.freeze(buckets.destroy),
    replace: Object.freeze(buckets.replace),
    update: Object.freeze(buckets.update),
    other: Object.freeze(buckets.other),
  });
}

/**
 * Counts the resources in every bucket.
 *
 * @param buckets - Classified resources.
 * @returns Per-category counts plus the overall total.
 */
export function summarizeBuckets(
  buckets: PlanBuckets,
): Readonly<Record<Category, number>> & { readonly total: number } {
  let total = 0;
  const counts: Record<Category, number> = { create: 0, destroy: 0, replace: 0, update: 0, other: 0 };
  for (const category of CATEGORY_ORDER) {
    counts[category] = buckets[category].length;
    total += counts[category];
  }
  return { ...counts, total };
}
