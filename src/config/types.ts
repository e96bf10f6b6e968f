/**
 * Configuration types for label rendering.
 *
 * @packageDocumentation
 */

/**
 * Line terminator written after every rendered line.
 */
export type LineEnding = 'crlf' | 'lf';

/**
 * Controls how {@link render} lays out a label.
 */
export interface RenderOptions {
  /** Line terminator; label files conventionally use CRLF. */
  lineEnding: LineEnding;
  /** Spaces added per nesting level. */
  indentWidth: number;
  /** Minimum width of the key column in every container. */
  minKeyWidth: number;
  /** Whether the END line is followed by a line terminator. */
  finalNewline: boolean;
}

/**
 * Complete configuration, as read from a `[render]` TOML table.
 */
export interface Config {
  render: RenderOptions;
}

