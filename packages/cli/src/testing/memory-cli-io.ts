import { PassThrough } from 'node:stream';

import type { CliInput, CliIo } from '../io/cli-io.js';

export interface MemoryCliIoOptions {
  /** Replaces the default non-interactive stdin, e.g. with a fake raw-mode terminal. */
  readonly stdin?: CliInput;
  /** Marks stdout and stderr as terminals of the given size. */
  readonly terminal?: { readonly columns: number; readonly rows: number };
}

export interface MemoryCliIo extends CliIo {
  readonly stdoutBuffer: string;
  readonly stderrBuffer: string;
  readonly exitCodes: readonly number[];
}

class MemoryOutput extends PassThrough {
  constructor(
    readonly isTTY: boolean,
    readonly columns: number | undefined,
    readonly rows: number | undefined,
  ) {
    super();
  }
}

export const createMemoryCliIo = (options: MemoryCliIoOptions = {}): MemoryCliIo => {
  const { terminal } = options;
  const stdout = new MemoryOutput(terminal !== undefined, terminal?.columns, terminal?.rows);
  const stderr = new MemoryOutput(terminal !== undefined, terminal?.columns, terminal?.rows);
  const stdin = options.stdin ?? new PassThrough();
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];
  const recordedExitCodes: number[] = [];

  return {
    stdin,
    stdout,
    stderr,
    writeOut: (chunk: string) => {
      stdoutChunks.push(chunk);
    },
    writeErr: (chunk: string) => {
      stderrChunks.push(chunk);
    },
    exit: (code: number): never => {
      recordedExitCodes.push(code);
      throw new Error(`process exit called with code ${code}`);
    },
    get stdoutBuffer(): string {
      return stdoutChunks.join('');
    },
    get stderrBuffer(): string {
      return stderrChunks.join('');
    },
    get exitCodes(): readonly number[] {
      return recordedExitCodes;
    },
  };
};
