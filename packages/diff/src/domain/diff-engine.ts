import type { Category } from './categories.js';
import type { AttributeChange } from './plan-types.js';
import type { PlanMapping, PlanValue } from './plan-value.js';
import { sortedKeys } from './plan-value.js';
import { INDENT_STEP, KNOWN_AFTER_APPLY, formatPlanValue, padding } from './value-formatter.js';

/**
 * Styling applied to a rendered line: a category colour, the bold resource header,
 * or no styling at all.
 */
export type LineTone = Category | 'header' | 'plain';

/**
 * One logical diff line. Multi-line values stay inside a single entry so that a
 * renderer styles them as one unit.
 */
export interface DiffLine {
  readonly text: string;
  readonly tone: LineTone;
}

/**
 * Compares the before and after state of one attribute.
 *
 * Lines are classified in a fixed order: an addition (nothing before) is always
 * styled as `create`, a removal as `destroy`; two mappings are compared key by key
 * one level deeper; anything else becomes a `before -> after` line in the caller's
 * style, or nothing when both sides format identically. JSON `null` counts as absent.
 *
 * @param key - Attribute name.
 * @param change - Before/after state of the attribute.
 * @param indent - Column the line's marker starts at.
 * @param style - Category of the enclosing resource, used for modification lines.
 * @returns Zero or more diff lines.
 */
export function diffAttribute(
  key: string,
  change: AttributeChange,
  indent: number,
  style: Category,
): DiffLine[] {
  const before = presentValue(change.before);
  const after = presentValue(change.after);
  const unknown = change.knownAfterApply;
  const pad = padding(indent);

  if (before === undefined && (after !== undefined || unknown)) {
    const text = after === undefined ? KNOWN_AFTER_APPLY : formatPlanValue(after, indent);
    return [{ text: `${pad}+ ${key} = ${text}`, tone: 'create' }];
  }

  if (before !== undefined && after === undefined && !unknown) {
    return [{ text: `${pad}- ${key} = ${formatPlanValue(before, indent)}`, tone: 'destroy' }];
  }

  if (before?.kind === 'mapping' && after?.kind === 'mapping') {
    return diffMapping(key, before, after, indent, style);
  }

  const beforeText = before === undefined ? 'null' : formatPlanValue(before, indent);
  let afterText = 'null';
  if (unknown) {
    afterText = KNOWN_AFTER_APPLY;
  } else if (after !== undefined) {
    afterText = formatPlanValue(after, indent);
  }
  if (beforeText === afterText) {
    return [];
  }

  return [{ text: `${pad}~ ${key} = ${beforeText} -> ${afterText}`, tone: style }];
}

function diffMapping(
  key: string,
  before: PlanMapping,
  after: PlanMapping,
  indent: number,
  style: Category,
): DiffLine[] {
  const pad = padding(indent);
  const lines: DiffLine[] = [{ text: `${pad}~ ${key} = {`, tone: style }];

  for (const child of sortedKeys(before.entries, after.entries)) {
    const childBefore = before.entries.get(child);
    const childAfter = after.entries.get(child);
    lines.push(
      ...diffAttribute(
        child,
        {
          ...(childBefore === undefined ? {} : { before: childBefore }),
          ...(childAfter === undefined ? {} : { after: childAfter }),
          knownAfterApply: false,
        },
        indent + INDENT_STEP,
        style,
      ),
    );
  }

  lines.push({ text: `${pad}}`, tone: style });
  return lines;
}

function presentValue(value: PlanValue | undefined): PlanValue | undefined {
  return value?.kind === 'null' ? undefined : value;
}
