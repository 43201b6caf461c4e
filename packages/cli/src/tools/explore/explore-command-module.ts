import type { CliCommandModule } from '../../kernel/types.js';
import {
  executeExploreCommand,
  type ExploreCommandDependencies,
  type ExploreCommandOptions,
} from './explore-command-runner.js';

/**
 * Registers `tui <plan>`, the interactive explorer.
 */
export const createExploreCommandModule = (
  dependencies: ExploreCommandDependencies = {},
): CliCommandModule => ({
  id: 'plan.explore',
  register(program, context) {
    program
      .command('tui')
      .summary('Browse a plan in the interactive terminal explorer.')
      .description(
        'Classify the resource changes of a plan and browse them by category. ' +
          'Accepts a binary plan (converted with `terraform show -json`) or plan JSON.',
      )
      .argument('<plan>', 'Path to a plan file or its JSON rendering.')
      .option('--hide-no-op', 'Leave out resources without changes.')
      .option('--unicode', 'Force Unicode glyphs.')
      .option('--no-unicode', 'Use ASCII-safe glyphs.')
      .action(async (plan: string, options: ExploreCommandOptions) => {
        await executeExploreCommand({ plan, options, context, dependencies });
      });
  },
});

export const exploreCommandModule = createExploreCommandModule();
