/**
 * TOML configuration parser for render settings.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_RENDER_OPTIONS, LINE_ENDINGS, isLineEnding } from './defaults.js';
import type { Config, LineEnding, RenderOptions } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function typeName(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Validates that a value is a known line ending name.
 *
 * @throws ConfigParseError if value is not one of the line ending names.
 */
function validateLineEnding(value: unknown, fieldPath: string): LineEnding {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeName(value)}`
    );
  }
  const normalized = value.toLowerCase();
  if (!isLineEnding(normalized)) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${LINE_ENDINGS.join(', ')}, got '${value}'`
    );
  }
  return normalized;
}

/**
 * Validates that a value is a number.
 *
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeName(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeName(value)}`
    );
  }
  return value;
}

/**
 * Parses the render table from raw TOML data. Unknown keys are ignored.
 *
 * @param raw - Raw TOML value for the render section.
 * @returns Render options merged with defaults.
 */
function parseRenderOptions(raw: unknown): RenderOptions {
  const result: RenderOptions = { ...DEFAULT_RENDER_OPTIONS };
  if (raw === undefined) {
    return result;
  }
  if (!isTable(raw)) {
    throw new ConfigParseError(`Invalid type for 'render': expected table, got ${typeName(raw)}`);
  }

  if ('line_ending' in raw) {
    result.lineEnding = validateLineEnding(raw.line_ending, 'render.line_ending');
  }
  if ('indent_width' in raw) {
    result.indentWidth = validateNumber(raw.indent_width, 'render.indent_width');
  }
  if ('min_key_width' in raw) {
    result.minKeyWidth = validateNumber(raw.min_key_width, 'render.min_key_width');
  }
  if ('final_newline' in raw) {
    result.finalNewline = validateBoolean(raw.final_newline, 'render.final_newline');
  }

  return result;
}

/**
 * Parses a TOML string into a Config object.
 *
 * Values are type-checked here; ranges are checked by
 * {@link validateRenderOptions}.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or wrongly typed fields.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [render]
 * line_ending = "lf"
 * indent_width = 2
 * `);
 * config.render.lineEnding; // 'lf'
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: TOML.JsonMap;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigParseError(`Invalid TOML syntax: ${cause?.message ?? String(error)}`, cause);
  }

  return {
    render: parseRenderOptions(parsed.render),
  };
}

/**
 * Returns the default configuration.
 */
export function getDefaultConfig(): Config {
  return { render: { ...DEFAULT_RENDER_OPTIONS } };
}
