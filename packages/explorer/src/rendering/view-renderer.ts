import cliTruncate from 'cli-truncate';

import {
  BACKGROUNDS,
  CATEGORY_ORDER,
  COLORS,
  RESET,
  colorize,
  describeCategory,
  formatCategoryCaption,
  type Category,
} from '@planview/diff';

import { activeBucket, bodyHeight, type NavigationState } from '../domain/navigation.js';

export interface ViewRenderOptions {
  readonly color?: boolean;
  readonly unicode?: boolean;
}

export const EMPTY_CATEGORY_MESSAGE = '  No changes in this category.';
export const LIST_HINT = '[Arrows]: Navigate  [Enter]: Details  [Tab]: Next Category  [q]: Quit';
export const DETAIL_HINT = '(Press Esc to go back)';

/**
 * Renders a full frame for the current state: the category tabs, a separator, then
 * the active bucket's rows or the opened resource's diff, followed by a key hint.
 * The frame never has more lines than the viewport is tall; a viewport too short
 * for the header, one body row and the hint loses its trailing lines.
 *
 * @param state - Navigation state to draw.
 * @param options - Colour and glyph options.
 * @returns Frame text, lines separated by `\n`.
 */
export function renderView(state: NavigationState, options: ViewRenderOptions = {}): string {
  const useColor = options.color ?? true;
  const useUnicode = options.unicode ?? true;
  const { width } = state.viewport;

  const lines = [
    truncate(renderTabs(state, useColor), width),
    colorize((useUnicode ? '─' : '-').repeat(width), 'gray', useColor),
    '',
  ];

  if (state.mode === 'detail' && state.detail) {
    const visible = state.detail.wrapped.slice(
      state.scrollOffset,
      state.scrollOffset + bodyHeight(state.viewport),
    );
    lines.push(...visible, '', colorize(DETAIL_HINT, 'dim', useColor));
  } else {
    lines.push(...renderListRows(state, useColor), '', colorize(LIST_HINT, 'dim', useColor));
  }

  return lines.slice(0, Math.max(1, state.viewport.height)).join('\n');
}

/**
 * Index of the first list row shown so that the cursor stays inside the body.
 */
export function listWindowStart(state: NavigationState): number {
  return Math.max(0, state.cursor - bodyHeight(state.viewport) + 1);
}

function renderTabs(state: NavigationState, useColor: boolean): string {
  return CATEGORY_ORDER.map((category) =>
    renderTab(category, state.buckets[category].length, category === state.activeCategory, useColor),
  ).join(' ');
}

function renderTab(category: Category, count: number, active: boolean, useColor: boolean): string {
  const caption = formatCategoryCaption(category, count);
  const { tone } = describeCategory(category);

  if (!useColor) {
    return active ? `[${caption}]` : ` ${caption} `;
  }

  if (active) {
    return `${COLORS.bold}${COLORS.white}${BACKGROUNDS[tone]} ${caption} ${RESET}`;
  }
  return colorize(` ${caption} `, tone, true);
}

function renderListRows(state: NavigationState, useColor: boolean): string[] {
  const bucket = activeBucket(state);
  if (bucket.length === 0) {
    return [EMPTY_CATEGORY_MESSAGE];
  }

  const { tone } = describeCategory(state.activeCategory);
  const start = listWindowStart(state);
  const visible = bucket.slice(start, start + bodyHeight(state.viewport));

  return visible.map((change, offset) => {
    const selected = start + offset === state.cursor;
    const row = truncate(`${selected ? '> ' : '  '}${change.address}`, state.viewport.width);
    return selected ? colorize(row, tone, useColor) : row;
  });
}

function truncate(text: string, width: number): string {
  return cliTruncate(text, Math.max(1, width), { position: 'end' });
}
