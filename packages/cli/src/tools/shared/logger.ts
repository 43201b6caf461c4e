import {
  JsonLineLogger,
  TextLineLogger,
  noopLogger,
  type StructuredLogger,
} from '@planview/core/logging';

import type { CliIo } from '../../io/cli-io.js';
import type { CliGlobalOptions } from '../../kernel/types.js';
import { isInteractiveStream } from '../../utils/streams.js';

/**
 * Picks the diagnostics logger for a command run: JSON lines when requested,
 * readable lines when stderr is a terminal, otherwise nothing.
 */
export const createCliLogger = (options: CliGlobalOptions, io: CliIo): StructuredLogger => {
  const target = { write: (line: string) => io.writeErr(line) };

  if (options.logFormat === 'json') {
    return new JsonLineLogger(target);
  }

  if (isInteractiveStream(io.stderr)) {
    return new TextLineLogger(target);
  }

  return noopLogger;
};
