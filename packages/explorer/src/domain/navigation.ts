import type { Category, PlanBuckets, ResourceChange } from '@planview/diff';
import { categoryAt, describeCategory } from '@planview/diff';

export type ViewMode = 'list' | 'detail';

export interface Viewport {
  readonly width: number;
  readonly height: number;
}

/**
 * Rendered diff block of the resource opened in detail mode. `lines` holds one
 * styled physical line per entry; `wrapped` is the same text wrapped to the viewport.
 */
export interface DetailView {
  readonly address: string;
  readonly lines: readonly string[];
  readonly wrapped: readonly string[];
}

export interface NavigationState {
  readonly buckets: PlanBuckets;
  readonly activeCategory: Category;
  readonly cursor: number;
  readonly mode: ViewMode;
  readonly scrollOffset: number;
  readonly viewport: Viewport;
  readonly detail?: DetailView;
  readonly running: boolean;
}

export type NavigationEvent =
  | { readonly type: 'next-category' }
  | { readonly type: 'previous-category' }
  | { readonly type: 'move-up' }
  | { readonly type: 'move-down' }
  | { readonly type: 'page-up' }
  | { readonly type: 'page-down' }
  | { readonly type: 'open-detail' }
  | { readonly type: 'close-detail' }
  | { readonly type: 'resize'; readonly width: number; readonly height: number }
  | { readonly type: 'quit' };

export interface NavigationDependencies {
  /** Produces the styled physical lines shown when a resource is opened. */
  renderDetail(change: ResourceChange): readonly string[];
  /** Wraps styled lines to the given column count. */
  wrap(lines: readonly string[], width: number): readonly string[];
}

export const DEFAULT_VIEWPORT: Viewport = Object.freeze({ width: 80, height: 24 });

/** Rows taken by the tab bar, the separator and the blank line under it. */
export const HEADER_ROWS = 3;
/** Rows taken by the blank line and key hint under the body. */
export const FOOTER_ROWS = 2;

/**
 * Rows left for list entries or detail text in a viewport.
 */
export function bodyHeight(viewport: Viewport): number {
  return Math.max(1, viewport.height - HEADER_ROWS - FOOTER_ROWS);
}

export function activeBucket(state: NavigationState): readonly ResourceChange[] {
  return state.buckets[state.activeCategory];
}

/**
 * Largest scroll offset that still fills the body with detail text.
 */
export function maxScrollOffset(state: NavigationState): number {
  const contentLength = state.detail?.wrapped.length ?? 0;
  return Math.max(0, contentLength - bodyHeight(state.viewport));
}

/**
 * Creates the initial state: first category, first row, list mode.
 *
 * @param buckets - Classified resources to browse.
 * @param viewport - Terminal size; defaults to 80x24.
 * @returns A running navigation state.
 */
export function createNavigationState(
  buckets: PlanBuckets,
  viewport: Viewport = DEFAULT_VIEWPORT,
): NavigationState {
  return {
    buckets,
    activeCategory: 'create',
    cursor: 0,
    mode: 'list',
    scrollOffset: 0,
    viewport: normalizeViewport(viewport, DEFAULT_VIEWPORT),
    running: true,
  };
}

/**
 * Applies one input event. Events that do not apply to the current mode return the
 * state unchanged; positions past either end are clamped.
 *
 * @param state - Current state.
 * @param event - Input event.
 * @param dependencies - Detail rendering and wrapping used by `open-detail` and `resize`.
 * @returns The next state.
 */
export function transition(
  state: NavigationState,
  event: NavigationEvent,
  dependencies: NavigationDependencies,
): NavigationState {
  switch (event.type) {
    case 'next-category': {
      return switchCategory(state, 1);
    }
    case 'previous-category': {
      return switchCategory(state, -1);
    }
    case 'move-up': {
      return moveBy(state, -1);
    }
    case 'move-down': {
      return moveBy(state, 1);
    }
    case 'page-up': {
      return moveBy(state, -bodyHeight(state.viewport));
    }
    case 'page-down': {
      return moveBy(state, bodyHeight(state.viewport));
    }
    case 'open-detail': {
      return openDetail(state, dependencies);
    }
    case 'close-detail': {
      return closeDetail(state);
    }
    case 'resize': {
      return resize(state, event, dependencies);
    }
    case 'quit': {
      return state.running ? { ...state, running: false } : state;
    }
  }
}

function switchCategory(state: NavigationState, step: number): NavigationState {
  if (state.mode !== 'list') {
    return state;
  }

  const { ordinal } = describeCategory(state.activeCategory);
  return {
    ...state,
    activeCategory: categoryAt(ordinal + step),
    cursor: 0,
    scrollOffset: 0,
  };
}

function moveBy(state: NavigationState, delta: number): NavigationState {
  if (state.mode === 'detail') {
    const scrollOffset = clamp(state.scrollOffset + delta, 0, maxScrollOffset(state));
    return scrollOffset === state.scrollOffset ? state : { ...state, scrollOffset };
  }

  const length = activeBucket(state).length;
  if (length === 0) {
    return state;
  }

  const cursor = clamp(state.cursor + delta, 0, length - 1);
  return cursor === state.cursor ? state : { ...state, cursor };
}

function openDetail(state: NavigationState, dependencies: NavigationDependencies): NavigationState {
  if (state.mode !== 'list') {
    return state;
  }

  const change = activeBucket(state)[state.cursor];
  if (change === undefined) {
    return state;
  }

  const lines = dependencies.renderDetail(change);
  return {
    ...state,
    mode: 'detail',
    scrollOffset: 0,
    detail: {
      address: change.address,
      lines,
      wrapped: dependencies.wrap(lines, state.viewport.width),
    },
  };
}

function closeDetail(state: NavigationState): NavigationState {
  if (state.mode !== 'detail') {
    return state;
  }

  const { detail: _detail, ...rest } = state;
  return { ...rest, mode: 'list', scrollOffset: 0 };
}

function resize(
  state: NavigationState,
  size: Viewport,
  dependencies: NavigationDependencies,
): NavigationState {
  const viewport = normalizeViewport(size, state.viewport);
  const detail =
    state.detail === undefined
      ? undefined
      : { ...state.detail, wrapped: dependencies.wrap(state.detail.lines, viewport.width) };
  const resized: NavigationState = {
    ...state,
    viewport,
    ...(detail === undefined ? {} : { detail }),
  };

  return {
    ...resized,
    scrollOffset: clamp(resized.scrollOffset, 0, maxScrollOffset(resized)),
  };
}

function normalizeViewport(size: Viewport, fallback: Viewport): Viewport {
  return {
    width: normalizeDimension(size.width, fallback.width),
    height: normalizeDimension(size.height, fallback.height),
  };
}

function normalizeDimension(value: number, fallback: number): number {
  if (!Number.isFinite(value) || value < 1) {
    return fallback;
  }
  return Math.floor(value);
}

function clamp(value: number, minimum: number, maximum: number): number {
  return Math.min(maximum, Math.max(minimum, value));
}
