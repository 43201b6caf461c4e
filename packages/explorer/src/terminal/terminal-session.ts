import { emitKeypressEvents, type Key } from 'node:readline';

import { noopLogger, type StructuredLogger } from '@planview/core/logging';
import { summarizeBuckets, type PlanBuckets } from '@planview/diff';

import {
  createNavigationState,
  transition,
  type NavigationDependencies,
  type NavigationEvent,
  type NavigationState,
  type Viewport,
} from '../domain/navigation.js';
import { createNavigationDependencies } from '../rendering/detail-lines.js';
import { renderView } from '../rendering/view-renderer.js';
import { resolveKeyEvent } from './key-bindings.js';

export interface TerminalInput extends NodeJS.ReadableStream {
  readonly isTTY?: boolean | undefined;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutput {
  readonly columns?: number | undefined;
  readonly rows?: number | undefined;
  write(chunk: string): unknown;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

export interface TerminalSessionOptions {
  readonly buckets: PlanBuckets;
  readonly input: TerminalInput;
  readonly output: TerminalOutput;
  readonly color?: boolean;
  readonly unicode?: boolean;
  readonly logger?: StructuredLogger;
  readonly dependencies?: NavigationDependencies;
}

export class TerminalUnavailableError extends Error {
  override readonly name = 'TerminalUnavailableError';

  constructor(message = 'The interactive explorer requires a TTY.') {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const ESCAPES = {
  altScreenOn: '\u001B[?1049h',
  altScreenOff: '\u001B[?1049l',
  hideCursor: '\u001B[?25l',
  showCursor: '\u001B[?25h',
  clearScreen: '\u001B[2J',
  cursorHome: '\u001B[H',
} as const;

const LOGGER_NAME = 'planview.explorer';

/**
 * Runs the interactive explorer on a raw-mode terminal until the user quits. Each
 * keypress or resize is applied to the navigation state and the frame is redrawn
 * before the next event is handled.
 *
 * @param options - Buckets to browse, the terminal streams and rendering options.
 * @returns The final navigation state.
 * @throws {TerminalUnavailableError} When the input is not an interactive terminal.
 */
export function runTerminalSession(options: TerminalSessionOptions): Promise<NavigationState> {
  const { input, output } = options;
  const logger = options.logger ?? noopLogger;
  const useColor = options.color ?? true;
  const useUnicode = options.unicode ?? true;

  if (input.isTTY !== true || typeof input.setRawMode !== 'function') {
    return Promise.reject(new TerminalUnavailableError());
  }

  const dependencies = options.dependencies ?? createNavigationDependencies({ color: useColor });
  const startedAt = performance.now();

  return new Promise<NavigationState>((resolve, reject) => {
    let state = createNavigationState(options.buckets, readViewport(output));

    const draw = (): void => {
      output.write(
        `${ESCAPES.clearScreen}${ESCAPES.cursorHome}${renderView(state, {
          color: useColor,
          unicode: useUnicode,
        })}`,
      );
    };

    let settled = false;

    const restore = (): void => {
      input.off('keypress', onKeypress);
      input.off('end', onEnd);
      input.off('error', onError);
      output.off('resize', onResize);
      input.setRawMode?.(false);
      input.pause();
      output.write(`${ESCAPES.showCursor}${ESCAPES.altScreenOff}`);
    };

    const finish = (outcome: { readonly error: unknown } | { readonly reason: string }): void => {
      if (settled) {
        return;
      }
      settled = true;
      restore();
      if ('error' in outcome) {
        reject(outcome.error);
        return;
      }
      logger.log({
        level: 'info',
        name: LOGGER_NAME,
        event: 'explorer.session.end',
        elapsedMs: performance.now() - startedAt,
        data: { reason: outcome.reason },
      });
      resolve(state);
    };

    const dispatch = (event: NavigationEvent): void => {
      try {
        state = transition(state, event, dependencies);
        if (!state.running) {
          finish({ reason: 'quit' });
          return;
        }
        draw();
      } catch (error) {
        finish({ error });
      }
    };

    function onKeypress(_sequence: string | undefined, key: Key | undefined): void {
      const event = resolveKeyEvent(key);
      if (event !== undefined) {
        dispatch(event);
      }
    }

    function onResize(): void {
      dispatch({ type: 'resize', ...readViewport(output) });
    }

    // Closed stdin (for example a terminal hangup) ends the session like a quit.
    function onEnd(): void {
      state = { ...state, running: false };
      finish({ reason: 'input-closed' });
    }

    function onError(error: Error): void {
      finish({ error });
    }

    emitKeypressEvents(input);
    input.setRawMode?.(true);
    input.resume();
    input.on('keypress', onKeypress);
    input.on('end', onEnd);
    input.on('error', onError);
    output.on('resize', onResize);
    output.write(`${ESCAPES.altScreenOn}${ESCAPES.hideCursor}`);

    logger.log({
      level: 'info',
      name: LOGGER_NAME,
      event: 'explorer.session.start',
      data: { resources: summarizeBuckets(options.buckets).total, viewport: state.viewport },
    });
    draw();
  });
}

function readViewport(output: TerminalOutput): Viewport {
  return {
    width: output.columns ?? 80,
    height: output.rows ?? 24,
  };
}
