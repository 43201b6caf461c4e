/**
 * Minimal interface describing a writable target suitable for reporter output streams.
 */
export interface WritableTarget {
  write(line: string): void;
}

/**
 * Formats a millisecond duration with a single decimal place suffix.
 *
 * @param value - Duration in milliseconds to format.
 * @returns String representation with a millisecond suffix.
 */
export function formatDurationMs(value: number): string {
  return `${value.toFixed(1)}ms`;
}

/**
 * Serialises an unknown error into a structured payload for logging.
 *
 * @param error - Error-like value to serialise.
 * @returns Structured error payload describing the value.
 */
export function serialiseError(error: unknown): {
  readonly name: string;
  readonly message: string;
  readonly stack?: string;
} {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.stack ? { stack: error.stack } : {}),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}
