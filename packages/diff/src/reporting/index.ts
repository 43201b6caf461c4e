export {
  renderPlanReport,
  type RenderReportOptions,
  type ReportRenderFormat,
  type ReportRendererContext,
} from './registry.js';
export {
  BACKGROUNDS,
  COLORS,
  RESET,
  colorize,
  paintDiffLine,
  toneColor,
  type Color,
} from './ansi.js';
export { formatPlanAsCli, formatPlanSummary, type CliFormatterOptions } from './renderers/cli.js';
export { formatPlanAsHtml, type HtmlFormatterOptions } from './renderers/html.js';
