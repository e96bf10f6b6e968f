/**
 * Render configuration: TOML parsing, environment overrides and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type { Config, LineEnding, RenderOptions } from './types.js';
export {
  DEFAULT_RENDER_OPTIONS,
  LINE_ENDINGS,
  LINE_TERMINATORS,
  isLineEnding,
} from './defaults.js';
export {
  ConfigValidationError,
  assertRenderOptionsValid,
  validateRenderOptions,
} from './validator.js';
export type { ConfigIssue, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadRenderOptions } from './load.js';
