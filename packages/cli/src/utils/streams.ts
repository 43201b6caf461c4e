import type { CliInput, CliOutput } from '../io/cli-io.js';

export const isInteractiveStream = (stream: CliInput | CliOutput): boolean =>
  stream.isTTY === true;

export const readTerminalWidth = (stream: CliOutput): number | undefined =>
  isInteractiveStream(stream) && typeof stream.columns === 'number' && stream.columns > 0
    ? stream.columns
    : undefined;
