import {
  TerminalUnavailableError,
  runTerminalSession,
  type NavigationState,
  type TerminalOutput,
  type TerminalSessionOptions,
} from '@planview/explorer';

import type { CliIo } from '../../io/cli-io.js';
import type { CliKernelContext } from '../../kernel/types.js';
import { isInteractiveStream } from '../../utils/streams.js';
import {
  prepareCommandEnvironment,
  type PlanCommandDependencies,
} from '../shared/command-environment.js';
import { loadPlan } from '../shared/load-plan.js';

export interface ExploreCommandOptions {
  readonly hideNoOp?: boolean;
  readonly unicode?: boolean;
}

export interface ExploreCommandDependencies extends PlanCommandDependencies {
  readonly runSession?: (options: TerminalSessionOptions) => Promise<NavigationState>;
}

export interface ExecuteExploreCommandInput {
  readonly plan: string;
  readonly options: ExploreCommandOptions;
  readonly context: CliKernelContext;
  readonly dependencies?: ExploreCommandDependencies;
}

/**
 * Loads a plan and browses it in the interactive terminal explorer.
 *
 * @throws {TerminalUnavailableError} When stdin or stdout is not a terminal.
 */
export async function executeExploreCommand(input: ExecuteExploreCommandInput): Promise<void> {
  const { io } = input.context;
  const dependencies = input.dependencies ?? {};

  if (!isInteractiveStream(io.stdin) || !isInteractiveStream(io.stdout)) {
    throw new TerminalUnavailableError();
  }

  const environment = await prepareCommandEnvironment(input.context, dependencies);
  const { config } = environment;
  const hideNoOp = input.options.hideNoOp ?? config.hideNoOp;
  const unicode = input.options.unicode ?? config.unicode;
  const terraformBinary = config.terraform?.binary;

  const { buckets } = await loadPlan({
    path: input.plan,
    cwd: environment.cwd,
    logger: environment.logger,
    ...(hideNoOp === undefined ? {} : { hideNoOp }),
    ...(terraformBinary === undefined ? {} : { terraformBinary }),
    ...(dependencies.runCommand === undefined ? {} : { runCommand: dependencies.runCommand }),
  });

  const runSession = dependencies.runSession ?? runTerminalSession;
  await runSession({
    buckets,
    input: io.stdin,
    output: createTerminalOutput(io),
    color: true,
    logger: environment.logger,
    ...(unicode === undefined ? {} : { unicode }),
  });
}

const createTerminalOutput = (io: CliIo): TerminalOutput => ({
  get columns() {
    return io.stdout.columns;
  },
  get rows() {
    return io.stdout.rows;
  },
  write: (chunk) => {
    io.writeOut(chunk);
  },
  on: (event, listener) => io.stdout.on(event, listener),
  off: (event, listener) => io.stdout.off(event, listener),
});
