import type { CliCommandModule } from '../../kernel/types.js';
import {
  DEFAULT_REPORT_OUTPUT,
  executeWebCommand,
  type WebCommandDependencies,
  type WebCommandOptions,
} from './web-command-runner.js';

/**
 * Registers `web <plan>`, which writes the plan as a static HTML document.
 */
export const createWebCommandModule = (
  dependencies: WebCommandDependencies = {},
): CliCommandModule => ({
  id: 'plan.web',
  register(program, context) {
    program
      .command('web')
      .summary('Generate a static HTML report for a plan.')
      .description('Render every classified resource change into a self-contained HTML document.')
      .argument('<plan>', 'Path to a plan file or its JSON rendering.')
      .option('--output <file>', `File to write the report to (default: ${DEFAULT_REPORT_OUTPUT}).`)
      .option('--title <text>', 'Document title.')
      .option('--hide-no-op', 'Leave out resources without changes (default).')
      .option('--no-hide-no-op', 'Include resources without changes.')
      .option('--stdout', 'Write the report to stdout instead of a file.')
      .action(async (plan: string, options: WebCommandOptions) => {
        await executeWebCommand({ plan, options, context, dependencies });
      });
  },
});

export const webCommandModule = createWebCommandModule();
