import { renderPlanReport, summarizeBuckets } from '@planview/diff';

import type { CliKernelContext } from '../../kernel/types.js';
import { isInteractiveStream, readTerminalWidth } from '../../utils/streams.js';
import {
  prepareCommandEnvironment,
  type PlanCommandDependencies,
} from '../shared/command-environment.js';
import { loadPlan } from '../shared/load-plan.js';

/** Exit code of `show --detailed-exitcode` when the plan has changes. */
export const CHANGES_PRESENT_EXIT_CODE = 2;

export interface ShowCommandOptions {
  readonly color?: boolean;
  readonly unicode?: boolean;
  readonly width?: number;
  readonly hideNoOp?: boolean;
  readonly detailedExitcode?: boolean;
}

export interface ExecuteShowCommandInput {
  readonly plan: string;
  readonly options: ShowCommandOptions;
  readonly context: CliKernelContext;
  readonly dependencies?: PlanCommandDependencies;
}

/**
 * Prints every classified resource change as a text report.
 */
export async function executeShowCommand(input: ExecuteShowCommandInput): Promise<void> {
  const { io } = input.context;
  const dependencies = input.dependencies ?? {};
  const environment = await prepareCommandEnvironment(input.context, dependencies);
  const { config, logger } = environment;
  const hideNoOp = input.options.hideNoOp ?? config.hideNoOp;
  const unicode = input.options.unicode ?? config.unicode;
  const width = input.options.width ?? readTerminalWidth(io.stdout);
  const terraformBinary = config.terraform?.binary;

  const { buckets } = await loadPlan({
    path: input.plan,
    cwd: environment.cwd,
    logger,
    ...(hideNoOp === undefined ? {} : { hideNoOp }),
    ...(terraformBinary === undefined ? {} : { terraformBinary }),
    ...(dependencies.runCommand === undefined ? {} : { runCommand: dependencies.runCommand }),
  });

  const report = await renderPlanReport(
    buckets,
    {
      format: 'cli',
      color: input.options.color ?? isInteractiveStream(io.stdout),
      ...(unicode === undefined ? {} : { unicode }),
      ...(width === undefined ? {} : { width }),
    },
    { logger },
  );
  io.writeOut(report);

  if (input.options.detailedExitcode === true && summarizeBuckets(buckets).total > 0) {
    input.context.setExitCode(CHANGES_PRESENT_EXIT_CODE);
  }
}
