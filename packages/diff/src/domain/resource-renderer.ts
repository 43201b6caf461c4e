import { describeCategory, type Category } from './categories.js';
import { diffAttribute, type DiffLine } from './diff-engine.js';
import { categorizeActions } from './plan-classifier.js';
import { attributeChanges, type ResourceChange } from './plan-types.js';

/**
 * Column at which attribute lines start inside a resource block.
 */
export const ATTRIBUTE_INDENT = 6;

export interface RenderedResource {
  readonly address: string;
  readonly category: Category;
  readonly action: string;
  readonly lines: readonly DiffLine[];
}

/**
 * Resolves the action a resource block describes: `replace` for `delete, create`,
 * otherwise the first planned action.
 *
 * @param actions - Planned actions of a resource.
 * @returns The action name.
 */
export function resolveAction(actions: readonly string[]): string {
  const [first, second] = actions;
  if (first === 'delete' && second === 'create') {
    return 'replace';
  }
  return first ?? 'no-op';
}

/**
 * Describes what happens to a resource, e.g. `will be created` or `must be replaced`.
 *
 * @param action - Action returned by {@link resolveAction}.
 * @returns The outcome phrase used in block headers.
 */
export function describeOutcome(action: string): string {
  switch (action) {
    case 'replace': {
      return 'must be replaced';
    }
    case 'update': {
      return 'will be updated in-place';
    }
    case 'delete': {
      return 'will be destroyed';
    }
    case 'read': {
      return 'will be read';
    }
    case 'no-op': {
      return 'will be left unchanged';
    }
    default: {
      return `will be ${action}${action.endsWith('e') ? 'd' : 'ed'}`;
    }
  }
}

/**
 * Renders the full diff block of one resource: a header, the opening `resource`
 * line, one fragment per attribute (sorted, without `id`), and the closing brace.
 *
 * @param change - Resource to render.
 * @returns The block's category and its styled lines.
 */
export function renderResourceChange(change: ResourceChange): RenderedResource {
  const action = resolveAction(change.actions);
  const category = categorizeActions(change.actions) ?? 'other';
  const { symbol } = describeCategory(category);

  const lines: DiffLine[] = [
    { text: `# ${change.type}.${change.name} ${describeOutcome(action)}`, tone: 'header' },
    {
      text: `  ${symbol} resource ${JSON.stringify(change.type)} ${JSON.stringify(change.name)} {`,
      tone: category,
    },
  ];

  for (const [key, attribute] of attributeChanges(change)) {
    lines.push(...diffAttribute(key, attribute, ATTRIBUTE_INDENT, category));
  }

  lines.push({ text: '    }', tone: 'plain' });

  return { address: change.address, category, action, lines };
}

/**
 * Renders a resource block as plain text, one physical line per entry.
 *
 * @param change - Resource to render.
 * @returns Unstyled lines of the block.
 */
export function renderResourceText(change: ResourceChange): string[] {
  return renderResourceChange(change).lines.flatMap((line) => line.text.split('\n'));
}
