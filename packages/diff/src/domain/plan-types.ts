import type { AttributeMap, PlanValue } from './plan-value.js';
import { sortedKeys } from './plan-value.js';

/**
 * Before/after state of one attribute. `knownAfterApply` is only meaningful when
 * `after` is absent.
 */
export interface AttributeChange {
  readonly before?: PlanValue;
  readonly after?: PlanValue;
  readonly knownAfterApply: boolean;
}

export interface ResourceChange {
  readonly address: string;
  readonly type: string;
  readonly name: string;
  readonly actions: readonly string[];
  readonly before: AttributeMap;
  readonly after: AttributeMap;
  readonly afterUnknown: AttributeMap;
}

export interface PlanDocument {
  readonly formatVersion?: string;
  readonly terraformVersion?: string;
  readonly resourceChanges: readonly ResourceChange[];
}

/**
 * Reports whether the plan marks an attribute as unknown until apply. Nested
 * unknown markers (objects or lists of booleans) do not count.
 *
 * @param afterUnknown - The resource's `after_unknown` map.
 * @param key - Attribute name.
 * @returns True only for a literal `true` marker.
 */
export function isKnownAfterApply(afterUnknown: AttributeMap, key: string): boolean {
  const marker = afterUnknown.get(key);
  return marker?.kind === 'bool' && marker.value;
}

/**
 * Builds the attribute change for a single key of a resource.
 *
 * @param change - Resource whose maps are read.
 * @param key - Attribute name.
 * @returns The combined before/after view of the attribute.
 */
export function attributeChangeOf(change: ResourceChange, key: string): AttributeChange {
  const before = change.before.get(key);
  const after = change.after.get(key);

  return {
    ...(before === undefined ? {} : { before }),
    ...(after === undefined ? {} : { after }),
    knownAfterApply: isKnownAfterApply(change.afterUnknown, key),
  };
}

/**
 * Derives the per-attribute changes of a resource, keyed and ordered by attribute name.
 * The `id` attribute is omitted.
 *
 * @param change - Resource to inspect.
 * @returns Ordered map of attribute name to change.
 */
export function attributeChanges(change: ResourceChange): ReadonlyMap<string, AttributeChange> {
  const changes = new Map<string, AttributeChange>();
  for (const key of sortedKeys(change.before, change.after, change.afterUnknown)) {
    if (key === 'id') {
      continue;
    }
    changes.set(key, attributeChangeOf(change, key));
  }
  return changes;
}
