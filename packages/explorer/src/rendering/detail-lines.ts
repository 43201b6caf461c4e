import wrapAnsi from 'wrap-ansi';

import { paintDiffLine, renderResourceChange } from '@planview/diff';

import type { NavigationDependencies } from '../domain/navigation.js';

export interface DetailRenderingOptions {
  readonly color?: boolean;
}

/**
 * Builds the detail renderer used by the explorer: resource diff blocks styled per
 * line and wrapped to the terminal width with their colours preserved.
 *
 * @param options - Whether to emit ANSI colour sequences.
 * @returns Dependencies for {@link transition}.
 */
export function createNavigationDependencies(
  options: DetailRenderingOptions = {},
): NavigationDependencies {
  const useColor = options.color ?? true;

  return {
    renderDetail(change) {
      return renderResourceChange(change).lines.flatMap((line) => paintDiffLine(line, useColor));
    },
    wrap(lines, width) {
      const columns = Math.max(1, width);
      return lines.flatMap((line) =>
        wrapAnsi(line, columns, { hard: true, trim: false }).split('\n'),
      );
    },
  };
}
