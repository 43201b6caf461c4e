import { inspect } from 'node:util';

import { PlanParseError } from '@planview/diff';
import { TerminalUnavailableError } from '@planview/explorer';

import { ConfigurationError, PlanInputError } from '../tools/shared/errors.js';

const USER_FACING_ERRORS = [
  PlanInputError,
  PlanParseError,
  ConfigurationError,
  TerminalUnavailableError,
] as const;

const isUserFacingError = (error: Error): boolean =>
  USER_FACING_ERRORS.some((type) => error instanceof type);

/**
 * Formats an error for stderr. Input, parse, configuration and terminal errors
 * print their message alone; anything else keeps its stack trace.
 */
export const formatCliError = (error: unknown): string => {
  if (error instanceof Error) {
    return isUserFacingError(error) ? error.message : (error.stack ?? error.message);
  }

  if (typeof error === 'string') {
    return error;
  }

  return inspect(error, { depth: 4, maxArrayLength: 10 });
};
