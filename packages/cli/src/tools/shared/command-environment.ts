import { createLogScope, type StructuredLogger } from '@planview/core/logging';

import type { CliKernelContext } from '../../kernel/types.js';
import { loadPlanviewConfig, type PlanviewConfig } from './configuration.js';
import { createCliLogger } from './logger.js';
import type { CommandRunner } from './plan-input.js';

/**
 * Overrides shared by every plan command, used by tests to stay in-process.
 */
export interface PlanCommandDependencies {
  readonly cwd?: string;
  readonly runCommand?: CommandRunner;
}

export interface CommandEnvironment {
  readonly logger: StructuredLogger;
  readonly config: PlanviewConfig;
  readonly cwd: string;
}

/**
 * Resolves the logger and configuration a plan command runs with.
 */
export async function prepareCommandEnvironment(
  context: CliKernelContext,
  dependencies: PlanCommandDependencies = {},
): Promise<CommandEnvironment> {
  const globalOptions = context.getGlobalOptions();
  const logger = createCliLogger(globalOptions, context.io);
  const cwd = dependencies.cwd ?? process.cwd();
  const loaded = await loadPlanviewConfig({
    cwd,
    ...(globalOptions.configPath === undefined ? {} : { configPath: globalOptions.configPath }),
  });

  if (loaded.path !== undefined) {
    createLogScope(logger, 'planview.config').debug('config.loaded', { path: loaded.path });
  }

  return { logger, config: loaded.config, cwd };
}
