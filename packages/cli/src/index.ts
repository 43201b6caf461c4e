export { createCliKernel } from './kernel/cli-kernel.js';
export type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
  CliLogFormat,
} from './kernel/types.js';
export { createProcessCliIo, type CliProcess } from './io/process-cli-io.js';
export type { CliInput, CliIo, CliOutput } from './io/cli-io.js';
export { formatCliError } from './utils/format-cli-error.js';
export { ConfigurationError, PlanInputError } from './tools/shared/errors.js';
export {
  loadPlanviewConfig,
  type LoadedPlanviewConfig,
  type PlanviewConfig,
} from './tools/shared/configuration.js';
export {
  readPlanInput,
  runCommand,
  type CommandRunner,
  type PlanInput,
  type PlanInputSource,
} from './tools/shared/plan-input.js';
export { loadPlan, type LoadedPlan } from './tools/shared/load-plan.js';
export {
  createExploreCommandModule,
  exploreCommandModule,
} from './tools/explore/explore-command-module.js';
export { createWebCommandModule, webCommandModule } from './tools/web/web-command-module.js';
export { createShowCommandModule, showCommandModule } from './tools/show/show-command-module.js';
