export {
  DEFAULT_VIEWPORT,
  FOOTER_ROWS,
  HEADER_ROWS,
  activeBucket,
  bodyHeight,
  createNavigationState,
  maxScrollOffset,
  transition,
  type DetailView,
  type NavigationDependencies,
  type NavigationEvent,
  type NavigationState,
  type ViewMode,
  type Viewport,
} from './domain/navigation.js';
export { createNavigationDependencies, type DetailRenderingOptions } from './rendering/detail-lines.js';
export {
  DETAIL_HINT,
  EMPTY_CATEGORY_MESSAGE,
  LIST_HINT,
  listWindowStart,
  renderView,
  type ViewRenderOptions,
} from './rendering/view-renderer.js';
export { resolveKeyEvent } from './terminal/key-bindings.js';
export {
  ESCAPES,
  TerminalUnavailableError,
  runTerminalSession,
  type TerminalInput,
  type TerminalOutput,
  type TerminalSessionOptions,
} from './terminal/terminal-session.js';
