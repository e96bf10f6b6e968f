/**
 * Environment variable overrides for render configuration.
 *
 * PDS_LABEL_* environment variables override configuration values at
 * runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { LINE_ENDINGS, isLineEnding } from './defaults.js';
import type { Config, LineEnding, RenderOptions } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off', in any case.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceToLineEnding(value: string, envVar: string): LineEnding {
  const trimmed = value.trim().toLowerCase();
  if (!isLineEnding(trimmed)) {
    throw new EnvCoercionError(
      envVar,
      value,
      'line ending',
      `Cannot coerce '${envVar}' value '${value}' to a line ending. Expected one of: ${LINE_ENDINGS.join(', ')}`
    );
  }
  return trimmed;
}

interface EnvMapping {
  readonly type: string;
  readonly description: string;
  readonly apply: (overrides: Partial<RenderOptions>, value: string, envVar: string) => void;
}

/**
 * Environment variables and the render option each one sets.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  PDS_LABEL_LINE_ENDING: {
    type: 'line ending',
    description: `Line terminator for rendered labels (${LINE_ENDINGS.join(', ')})`,
    apply: (overrides, value, envVar) => {
      overrides.lineEnding = coerceToLineEnding(value, envVar);
    },
  },
  PDS_LABEL_INDENT_WIDTH: {
    type: 'number',
    description: 'Spaces added per nesting level',
    apply: (overrides, value, envVar) => {
      overrides.indentWidth = coerceToNumber(value, envVar);
    },
  },
  PDS_LABEL_MIN_KEY_WIDTH: {
    type: 'number',
    description: 'Minimum width of the key column',
    apply: (overrides, value, envVar) => {
      overrides.minKeyWidth = coerceToNumber(value, envVar);
    },
  },
  PDS_LABEL_FINAL_NEWLINE: {
    type: 'boolean',
    description: 'Whether END is followed by a line terminator (true/false)',
    apply: (overrides, value, envVar) => {
      overrides.finalNewline = coerceToBoolean(value, envVar);
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Render options set by environment variables. */
  overrides: Partial<RenderOptions>;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** Coercion errors, when collected instead of thrown. */
  errors: EnvCoercionError[];
}

/**
 * Reads PDS_LABEL_* environment variables into render option overrides.
 * Unset and empty variables are skipped.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of
 * throwing the first one.
 * @returns Result containing overrides and any errors.
 * @throws EnvCoercionError if a variable cannot be coerced and errors are not collected.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ PDS_LABEL_LINE_ENDING: 'lf' });
 * result.overrides; // { lineEnding: 'lf' }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: Partial<RenderOptions> = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (collectErrors && error instanceof EnvCoercionError) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration, environment
 * values taking precedence.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns A new configuration with the overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return {
    render: {
      ...config.render,
      ...overrides,
    },
  };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
