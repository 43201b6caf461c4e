import { InvalidArgumentError } from 'commander';

import type { CliCommandModule } from '../../kernel/types.js';
import type { PlanCommandDependencies } from '../shared/command-environment.js';
import { executeShowCommand, type ShowCommandOptions } from './show-command-runner.js';

const parseWidth = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || parsed <= 0) {
    throw new InvalidArgumentError('Width must be a positive integer.');
  }
  return parsed;
};

/**
 * Registers `show <plan>`, which prints the plan as a text report.
 */
export const createShowCommandModule = (
  dependencies: PlanCommandDependencies = {},
): CliCommandModule => ({
  id: 'plan.show',
  register(program, context) {
    program
      .command('show')
      .summary('Print a plan as a text report.')
      .description('Print every classified resource change grouped by category.')
      .argument('<plan>', 'Path to a plan file or its JSON rendering.')
      .option('--color', 'Force colored output even when stdout is not a terminal.')
      .option('--no-color', 'Disable colored output.')
      .option('--unicode', 'Force Unicode glyphs.')
      .option('--no-unicode', 'Use ASCII-safe glyphs.')
      .option('--width <columns>', 'Width of the category separators.', parseWidth)
      .option('--hide-no-op', 'Leave out resources without changes.')
      .option('--detailed-exitcode', 'Exit with code 2 when the plan contains changes.')
      .action(async (plan: string, options: ShowCommandOptions) => {
        await executeShowCommand({ plan, options, context, dependencies });
      });
  },
});

export const showCommandModule = createShowCommandModule();
