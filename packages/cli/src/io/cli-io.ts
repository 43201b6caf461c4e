/**
 * Readable side of the CLI. Terminal properties are present when stdin is a TTY.
 */
export interface CliInput extends NodeJS.ReadableStream {
  readonly isTTY?: boolean | undefined;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Writable side of the CLI. Terminal properties are present when the stream is a TTY.
 */
export interface CliOutput extends NodeJS.WritableStream {
  readonly isTTY?: boolean | undefined;
  readonly columns?: number | undefined;
  readonly rows?: number | undefined;
}

export interface CliIo {
  readonly stdin: CliInput;
  readonly stdout: CliOutput;
  readonly stderr: CliOutput;

  writeOut(chunk: string): void;
  writeErr(chunk: string): void;
  exit(code: number): never;
}
