import {
  classifyResourceChanges,
  toAttributeMap,
  type PlanBuckets,
  type ResourceChange,
} from '@planview/diff';

export function createResource(
  name: string,
  actions: readonly string[] = ['create'],
  after: Record<string, unknown> = {},
): ResourceChange {
  return {
    address: `t.${name}`,
    type: 't',
    name,
    actions,
    before: toAttributeMap(undefined),
    after: toAttributeMap(after),
    afterUnknown: toAttributeMap(undefined),
  };
}

export function createBuckets(...names: readonly string[]): PlanBuckets {
  return classifyResourceChanges(names.map((name) => createResource(name)));
}
