import { describeCategory } from '../domain/categories.js';
import type { DiffLine, LineTone } from '../domain/diff-engine.js';

export const RESET = '\u001B[0m';

export const COLORS = {
  green: '\u001B[32m',
  red: '\u001B[31m',
  yellow: '\u001B[33m',
  magenta: '\u001B[35m',
  blue: '\u001B[34m',
  gray: '\u001B[90m',
  white: '\u001B[97m',
  bold: '\u001B[1m',
  dim: '\u001B[2m',
} as const;

export const BACKGROUNDS = {
  green: '\u001B[42m',
  red: '\u001B[41m',
  yellow: '\u001B[43m',
  magenta: '\u001B[45m',
  blue: '\u001B[44m',
} as const;

export type Color = keyof typeof COLORS;

/**
 * Wraps text in an ANSI colour sequence when colour output is enabled.
 */
export function colorize(text: string, color: Color, useColor: boolean): string {
  if (!useColor || text.length === 0) {
    return text;
  }

  return `${COLORS[color]}${text}${RESET}`;
}

export function toneColor(tone: LineTone): Color | undefined {
  switch (tone) {
    case 'header': {
      return 'bold';
    }
    case 'plain': {
      return undefined;
    }
    default: {
      return describeCategory(tone).tone;
    }
  }
}

/**
 * Splits a diff line into physical lines and styles each with the line's tone, so
 * that a slice of the output never carries an unterminated colour sequence.
 *
 * @param line - Diff line produced by the resource renderer.
 * @param useColor - Whether ANSI sequences should be emitted.
 * @returns One entry per physical line.
 */
export function paintDiffLine(line: DiffLine, useColor: boolean): string[] {
  const color = toneColor(line.tone);
  return line.text
    .split('\n')
    .map((text) => (color === undefined ? text : colorize(text, color, useColor)));
}
