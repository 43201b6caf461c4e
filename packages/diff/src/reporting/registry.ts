import { formatDurationMs, serialiseError } from '@planview/core/reporting';
import type { StructuredLogger } from '@planview/core/logging';

import type { PlanBuckets } from '../domain/plan-classifier.js';
import { formatPlanAsCli } from './renderers/cli.js';
import { formatPlanAsHtml } from './renderers/html.js';
import type { RenderReportOptions } from './options.js';

export interface ReportRendererContext {
  readonly logger?: StructuredLogger;
}

const LOGGER_NAME = 'planview.reporting';

function renderWithFormat(buckets: PlanBuckets, options: RenderReportOptions): string {
  if (options.format === 'cli') {
    const { format: _format, ...rest } = options;
    return formatPlanAsCli(buckets, rest);
  }

  const { format: _format, ...rest } = options;
  return formatPlanAsHtml(buckets, rest);
}

/**
 * Renders classified resources in the requested format, logging the outcome.
 *
 * @param buckets - Classified resource changes.
 * @param options - Rendering options selecting format and parameters.
 * @param context - Optional renderer context carrying a logger.
 * @returns The rendered report output.
 */
export async function renderPlanReport(
  buckets: PlanBuckets,
  options: RenderReportOptions,
  context?: ReportRendererContext,
): Promise<string> {
  const startedAt = performance.now();

  try {
    const result = renderWithFormat(buckets, options);
    const elapsedMs = performance.now() - startedAt;

    context?.logger?.log({
      level: 'info',
      name: LOGGER_NAME,
      event: 'report.render.complete',
      elapsedMs,
      data: { format: options.format, duration: formatDurationMs(elapsedMs) },
    });

    return result;
  } catch (error) {
    context?.logger?.log({
      level: 'error',
      name: LOGGER_NAME,
      event: 'report.render.failed',
      data: { format: options.format, error: serialiseError(error) },
    });
    throw error;
  }
}

export type { RenderReportOptions, ReportRenderFormat } from './options.js';
