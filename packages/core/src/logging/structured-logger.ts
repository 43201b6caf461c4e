import { formatDurationMs, type WritableTarget } from '../reporting/formatting.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StructuredLogEvent {
  readonly level: LogLevel;
  readonly name: string;
  readonly event: string;
  readonly elapsedMs?: number;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

export class JsonLineLogger implements StructuredLogger {
  constructor(private readonly output: WritableTarget) {}

  log(entry: StructuredLogEvent): void {
    const payload = JSON.stringify({
      ...entry,
      timestamp: new Date().toISOString(),
    });
    this.output.write(`${payload}\n`);
  }
}

/**
 * Human readable logger used when diagnostics go to an interactive terminal.
 * Each entry becomes `[level] event (elapsed) {data}`.
 */
export class TextLineLogger implements StructuredLogger {
  constructor(private readonly output: WritableTarget) {}

  log(entry: StructuredLogEvent): void {
    const elapsed =
      entry.elapsedMs === undefined ? '' : ` (${formatDurationMs(entry.elapsedMs)})`;
    const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
    this.output.write(`[${entry.level}] ${entry.event}${elapsed}${data}\n`);
  }
}

export const noopLogger: StructuredLogger = {
  log() {
    // noop
  },
};

export interface LogScope {
  readonly name: string;
  debug(event: string, data?: Readonly<Record<string, unknown>>): void;
  info(event: string, data?: Readonly<Record<string, unknown>>): void;
  warn(event: string, data?: Readonly<Record<string, unknown>>): void;
  error(event: string, data?: Readonly<Record<string, unknown>>): void;
}

/**
 * Binds a logger to a component name and stamps each entry with the time elapsed
 * since the scope was opened.
 *
 * @param logger - Destination for the scoped entries.
 * @param name - Component name recorded on every entry.
 * @param now - Clock used to measure elapsed time.
 * @returns A scope exposing one method per log level.
 */
export function createLogScope(
  logger: StructuredLogger,
  name: string,
  now: () => number = () => performance.now(),
): LogScope {
  const startedAt = now();
  const emit =
    (level: LogLevel) =>
    (event: string, data?: Readonly<Record<string, unknown>>): void => {
      logger.log({
        level,
        name,
        event,
        elapsedMs: now() - startedAt,
        ...(data === undefined ? {} : { data }),
      });
    };

  return {
    name,
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
