/**
 * Semantic validation for render options.
 *
 * Type checks happen while parsing; this module checks that the values make
 * sense together: widths are non-negative integers and the line ending is
 * one the serializer knows.
 *
 * @packageDocumentation
 */

import { LINE_ENDINGS, isLineEnding } from './defaults.js';
import type { RenderOptions } from './types.js';

/**
 * Individual validation failure.
 */
export interface ConfigIssue {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Validation failures (empty if valid). */
  errors: ConfigIssue[];
}

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ConfigIssue[];

  constructor(message: string, errors: ConfigIssue[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

function validateWidth(value: number, fieldPath: string, errors: ConfigIssue[]): void {
  if (!Number.isInteger(value) || value < 0) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a non-negative integer, got ${String(value)}`,
    });
  }
}

/**
 * Validates render options.
 *
 * @param options - Render options to check.
 * @returns Validation result with every failure found.
 *
 * @example
 * ```typescript
 * const result = validateRenderOptions({ ...DEFAULT_RENDER_OPTIONS, indentWidth: -1 });
 * result.valid; // false
 * result.errors[0]?.field; // 'render.indent_width'
 * ```
 */
export function validateRenderOptions(options: RenderOptions): ValidationResult {
  const errors: ConfigIssue[] = [];

  // Callers outside the type system can still hand over any string.
  const lineEnding: string = options.lineEnding;
  if (!isLineEnding(lineEnding)) {
    errors.push({
      field: 'render.line_ending',
      value: lineEnding,
      message: `Unknown line ending '${lineEnding}'. Expected one of: ${LINE_ENDINGS.join(', ')}`,
    });
  }
  validateWidth(options.indentWidth, 'render.indent_width', errors);
  validateWidth(options.minKeyWidth, 'render.min_key_width', errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates render options and throws if invalid.
 *
 * @throws ConfigValidationError listing every failure.
 */
export function assertRenderOptionsValid(options: RenderOptions): void {
  const result = validateRenderOptions(options);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
