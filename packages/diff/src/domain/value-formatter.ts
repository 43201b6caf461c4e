import type { PlanValue } from './plan-value.js';
import { compareKeys } from './plan-value.js';

/**
 * Number of spaces each nesting level adds, shared by every renderer.
 */
export const INDENT_STEP = 4;

export const KNOWN_AFTER_APPLY = '(known after apply)';

export const padding = (width: number): string => ' '.repeat(Math.max(0, width));

/**
 * Formats a plan value in the canonical indented text form used by diff lines.
 * Strings are JSON-quoted, numbers keep their source text, sequences and mappings
 * span several lines with children one step deeper than `indent`. Mapping keys are
 * emitted in lexicographic order.
 *
 * @param value - Value to format.
 * @param indent - Column of the line the value starts on; closing brackets align to it.
 * @returns The formatted text, possibly spanning several lines.
 */
export function formatPlanValue(value: PlanValue, indent: number): string {
  switch (value.kind) {
    case 'null': {
      return 'null';
    }
    case 'string': {
      return JSON.stringify(value.value);
    }
    case 'number': {
      return value.text;
    }
    case 'bool': {
      return value.value ? 'true' : 'false';
    }
    case 'sequence': {
      if (value.items.length === 0) {
        return '[]';
      }
      const inner = padding(indent + INDENT_STEP);
      const lines = value.items.map(
        (item) => `${inner}${formatPlanValue(item, indent + INDENT_STEP)},`,
      );
      return ['[', ...lines, `${padding(indent)}]`].join('\n');
    }
    case 'mapping': {
      const inner = padding(indent + INDENT_STEP);
      const lines = [...value.entries.keys()]
        .sort(compareKeys)
        .map((key) => {
          const entry = value.entries.get(key);
          const text = entry === undefined ? 'null' : formatPlanValue(entry, indent + INDENT_STEP);
          return `${inner}${key} = ${text}`;
        });
      return ['{', ...lines, `${padding(indent)}}`].join('\n');
    }
  }
}
