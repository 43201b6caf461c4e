import process from 'node:process';

import type { CliInput, CliIo, CliOutput } from './cli-io.js';

/**
 * The subset of `process` the CLI reads and writes through.
 */
export interface CliProcess {
  readonly stdin: CliInput;
  readonly stdout: CliOutput;
  readonly stderr: CliOutput;
  readonly exitCode?: number | string | null | undefined;
  exit(code?: number): never;
}

export interface ProcessCliIoOptions {
  readonly process?: CliProcess;
}

const readNonZeroExitCode = (target: CliProcess): number | undefined => {
  const { exitCode } = target;
  const numeric = typeof exitCode === 'string' ? Number.parseInt(exitCode, 10) : exitCode;
  return typeof numeric === 'number' && !Number.isNaN(numeric) && numeric !== 0
    ? numeric
    : undefined;
};

export const createProcessCliIo = (options: ProcessCliIoOptions = {}): CliIo => {
  const target = options.process ?? process;

  return {
    stdin: target.stdin,
    stdout: target.stdout,
    stderr: target.stderr,
    writeOut: (chunk: string) => {
      target.stdout.write(chunk);
    },
    writeErr: (chunk: string) => {
      target.stderr.write(chunk);
    },
    exit: (code: number): never => {
      const pending = readNonZeroExitCode(target);
      return target.exit(code === 0 && pending !== undefined ? pending : code);
    },
  };
};
