import process from 'node:process';

import { CommanderError } from 'commander';

import { createCommanderProgram } from '../framework/commander/program.js';
import {
  createDefaultGlobalOptions,
  readGlobalOptions,
} from '../framework/commander/global-options.js';
import { createProcessCliIo } from '../io/process-cli-io.js';
import { formatCliError } from '../utils/format-cli-error.js';
import type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
} from './types.js';

const readCommanderExitCode = (error: CommanderError): number | undefined => {
  const { exitCode } = error;
  if (typeof exitCode === 'number') {
    return exitCode;
  }

  if (typeof exitCode === 'string') {
    const parsedExitCode = Number.parseInt(exitCode, 10);
    return Number.isNaN(parsedExitCode) ? undefined : parsedExitCode;
  }

  return undefined;
};

export const createCliKernel = (options: CliKernelOptions): CliKernel => {
  const io = options.io ?? createProcessCliIo();
  const program = createCommanderProgram({
    name: options.programName,
    version: options.version,
    description: options.description,
    io,
  });

  const state: { globalOptions: CliGlobalOptions; exitCode: number } = {
    globalOptions: createDefaultGlobalOptions(),
    exitCode: 0,
  };

  const context: CliKernelContext = {
    io,
    getGlobalOptions: () => state.globalOptions,
    setExitCode: (code) => {
      state.exitCode = code;
    },
  };

  program.hook('preAction', () => {
    state.globalOptions = readGlobalOptions(program);
  });

  return {
    register(module: CliCommandModule): CliKernel {
      module.register(program, context);
      return this;
    },
    async run(argv: readonly string[] = process.argv): Promise<number> {
      if (argv.length === 0) {
        throw new Error('Argument vector must include at least the node executable.');
      }

      state.exitCode = 0;

      try {
        await program.parseAsync([...argv], { from: 'node' });
        return state.exitCode;
      } catch (error) {
        if (error instanceof CommanderError) {
          return readCommanderExitCode(error) ?? 1;
        }

        const message = formatCliError(error);
        const needsNewline = message.endsWith('\n') ? '' : '\n';
        io.writeErr(`${message}${needsNewline}`);
        return state.exitCode === 0 ? 1 : state.exitCode;
      }
    },
  };
};
