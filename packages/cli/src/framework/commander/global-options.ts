import type { Command } from 'commander';

import type { CliGlobalOptions } from '../../kernel/types.js';

const JSON_LOGS_HELP = 'Emit machine-readable JSON logs on stderr.';
const CONFIG_HELP = 'Path to a planview configuration file.';

type GlobalOptionValues = {
  readonly jsonLogs?: boolean;
  readonly config?: string;
};

export const defaultGlobalOptions: CliGlobalOptions = Object.freeze({
  logFormat: 'pretty',
} as const);

export const createDefaultGlobalOptions = (): CliGlobalOptions => ({
  logFormat: defaultGlobalOptions.logFormat,
});

export const registerGlobalOptions = (program: Command): void => {
  program.option('--json-logs', JSON_LOGS_HELP, false).option('--config <path>', CONFIG_HELP);
};

export const readGlobalOptions = (program: Command): CliGlobalOptions => {
  const options = program.opts<GlobalOptionValues>();
  const configPath = options.config?.trim();

  return {
    logFormat: options.jsonLogs === true ? 'json' : 'pretty',
    ...(configPath ? { configPath } : {}),
  };
};
