import type { CliFormatterOptions } from './renderers/cli.js';
import type { HtmlFormatterOptions } from './renderers/html.js';

export type ReportRenderFormat = 'cli' | 'html';

export type RenderReportOptions =
  | ({ format: 'cli' } & CliFormatterOptions)
  | ({ format: 'html' } & HtmlFormatterOptions);
