import { stdout } from 'node:process';

import isUnicodeSupported from 'is-unicode-supported';

import { CATEGORY_ORDER, describeCategory, formatCategoryCaption } from '../../domain/categories.js';
import { summarizeBuckets, type PlanBuckets } from '../../domain/plan-classifier.js';
import { renderResourceChange } from '../../domain/resource-renderer.js';
import { colorize, paintDiffLine } from '../ansi.js';

export interface CliFormatterOptions {
  readonly color?: boolean;
  readonly width?: number;
  readonly unicode?: boolean;
}

const DEFAULT_REPORT_WIDTH = 80;
const MINIMUM_REPORT_WIDTH = 20;
const MAXIMUM_REPORT_WIDTH = 200;
const NO_CHANGES_MESSAGE = 'No changes. Your infrastructure matches the configuration.';

/**
 * Renders every classified resource as a plain or ANSI-coloured text report:
 * a summary line, then one section per non-empty category holding the resources'
 * diff blocks.
 *
 * @param buckets - Classified resource changes.
 * @param options - Colour, width and glyph options.
 * @returns The report text, terminated by a newline.
 */
export function formatPlanAsCli(buckets: PlanBuckets, options: CliFormatterOptions = {}): string {
  const useColor = options.color ?? false;
  const useUnicode = options.unicode ?? isUnicodeSupported();
  const width = resolveReportWidth(options.width);
  const summary = summarizeBuckets(buckets);

  if (summary.total === 0) {
    return `${NO_CHANGES_MESSAGE}\n`;
  }

  const lines: string[] = [
    colorize(formatPlanSummary(summary), 'bold', useColor),
  ];

  for (const category of CATEGORY_ORDER) {
    const resources = buckets[category];
    if (resources.length === 0) {
      continue;
    }

    const { tone } = describeCategory(category);
    lines.push(
      '',
      colorize(formatCategoryCaption(category, resources.length), tone, useColor),
      colorize((useUnicode ? '─' : '-').repeat(width), 'gray', useColor),
    );

    for (const [index, resource] of resources.entries()) {
      if (index > 0) {
        lines.push('');
      }
      for (const line of renderResourceChange(resource).lines) {
        lines.push(...paintDiffLine(line, useColor));
      }
    }
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Summarises bucket sizes, e.g. `Plan: 1 to create, 0 to destroy, 2 to replace, 0 to update, 1 other.`
 */
export function formatPlanSummary(summary: ReturnType<typeof summarizeBuckets>): string {
  return (
    `Plan: ${summary.create} to create, ${summary.destroy} to destroy, ` +
    `${summary.replace} to replace, ${summary.update} to update, ${summary.other} other.`
  );
}

function resolveReportWidth(requested: number | undefined): number {
  if (requested !== undefined && Number.isFinite(requested)) {
    return clampReportWidth(requested);
  }

  const detectedWidth =
    typeof stdout.columns === 'number' && stdout.columns > 0 ? stdout.columns : undefined;

  return detectedWidth === undefined ? DEFAULT_REPORT_WIDTH : clampReportWidth(detectedWidth);
}

function clampReportWidth(value: number): number {
  return Math.min(MAXIMUM_REPORT_WIDTH, Math.max(MINIMUM_REPORT_WIDTH, Math.floor(value)));
}
