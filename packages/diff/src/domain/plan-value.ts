/**
 * Attribute values as they appear in a change plan. Numbers keep their source text so
 * that rendering never alters what the planner reported.
 */
export type PlanValue =
  | PlanNull
  | PlanString
  | PlanNumber
  | PlanBool
  | PlanSequence
  | PlanMapping;

export interface PlanNull {
  readonly kind: 'null';
}

export interface PlanString {
  readonly kind: 'string';
  readonly value: string;
}

export interface PlanNumber {
  readonly kind: 'number';
  readonly text: string;
}

export interface PlanBool {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface PlanSequence {
  readonly kind: 'sequence';
  readonly items: readonly PlanValue[];
}

export interface PlanMapping {
  readonly kind: 'mapping';
  readonly entries: ReadonlyMap<string, PlanValue>;
}

export type AttributeMap = ReadonlyMap<string, PlanValue>;

const NULL_VALUE: PlanNull = Object.freeze({ kind: 'null' });

export const planNull = (): PlanNull => NULL_VALUE;

export const planString = (value: string): PlanString => ({ kind: 'string', value });

export const planNumber = (text: string): PlanNumber => ({ kind: 'number', text });

export const planBool = (value: boolean): PlanBool => ({ kind: 'bool', value });

export const planSequence = (items: readonly PlanValue[]): PlanSequence => ({
  kind: 'sequence',
  items,
});

export const planMapping = (entries: Readonly<Record<string, PlanValue>>): PlanMapping => ({
  kind: 'mapping',
  entries: new Map(Object.entries(entries)),
});

/**
 * Recognises a number representation produced by a JSON parser and returns its text.
 */
export type NumberTextReader = (raw: unknown) => string | undefined;

const readNativeNumber: NumberTextReader = (raw) =>
  typeof raw === 'number' ? String(raw) : undefined;

/**
 * Converts a decoded JSON value into a {@link PlanValue}.
 *
 * @param raw - Value produced by a JSON parser.
 * @param readNumber - Hook recognising the parser's number representation.
 * @returns The equivalent plan value.
 * @throws {TypeError} When the input holds something JSON cannot express.
 */
export function toPlanValue(raw: unknown, readNumber: NumberTextReader = readNativeNumber): PlanValue {
  const numberText = readNumber(raw);
  if (numberText !== undefined) {
    return planNumber(numberText);
  }

  if (raw === null) {
    return planNull();
  }

  if (typeof raw === 'string') {
    return planString(raw);
  }

  if (typeof raw === 'boolean') {
    return planBool(raw);
  }

  if (Array.isArray(raw)) {
    return planSequence(raw.map((item: unknown) => toPlanValue(item, readNumber)));
  }

  if (typeof raw === 'object') {
    return { kind: 'mapping', entries: toAttributeMap(raw, readNumber) };
  }

  throw new TypeError(`Unsupported plan value of type ${typeof raw}.`);
}

/**
 * Converts a decoded JSON object into an attribute map. Absent objects become empty maps.
 *
 * @param raw - Decoded object, or `null`/`undefined` when the plan omitted it.
 * @param readNumber - Hook recognising the parser's number representation.
 * @returns Map from attribute name to value.
 */
export function toAttributeMap(
  raw: object | null | undefined,
  readNumber: NumberTextReader = readNativeNumber,
): AttributeMap {
  const entries = new Map<string, PlanValue>();
  if (raw === null || raw === undefined) {
    return entries;
  }

  for (const [key, value] of Object.entries(raw)) {
    entries.set(key, toPlanValue(value, readNumber));
  }

  return entries;
}

/**
 * Returns the attribute names of a map in lexicographic order.
 */
export function sortedKeys(...maps: readonly AttributeMap[]): string[] {
  const keys = new Set<string>();
  for (const map of maps) {
    for (const key of map.keys()) {
      keys.add(key);
    }
  }
  return [...keys].sort(compareKeys);
}

/**
 * Orders keys by UTF-16 code unit, matching a plain byte-wise sort for ASCII names.
 */
export function compareKeys(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}
