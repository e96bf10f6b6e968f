/**
 * Default configuration values.
 *
 * @packageDocumentation
 */

import type { LineEnding, RenderOptions } from './types.js';

/** Accepted line ending names. */
export const LINE_ENDINGS: readonly LineEnding[] = ['crlf', 'lf'];

/**
 * Line terminator bytes for each line ending.
 */
export const LINE_TERMINATORS: Readonly<Record<LineEnding, string>> = {
  crlf: '\r\n',
  lf: '\n',
};

/**
 * Default render options: CRLF lines, one space of indentation per level,
 * keys aligned only as far as the longest key, and a final line ending.
 */
export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = {
  lineEnding: 'crlf',
  indentWidth: 1,
  minKeyWidth: 0,
  finalNewline: true,
};

/**
 * Narrows a string to a known {@link LineEnding}.
 */
export function isLineEnding(value: string): value is LineEnding {
  return LINE_ENDINGS.some((ending) => ending === value);
}
