/**
 * Resolves render options from defaults, a TOML document and the
 * environment.
 *
 * @packageDocumentation
 */

import { applyEnvOverrides } from './env.js';
import type { EnvRecord } from './env.js';
import { getDefaultConfig, parseConfig } from './parser.js';
import type { RenderOptions } from './types.js';
import { assertRenderOptionsValid } from './validator.js';

/**
 * Loads render options with precedence env > file > defaults and validates
 * the result.
 *
 * @param tomlContent - Contents of a configuration file, if there is one.
 * @param env - Environment to read overrides from (defaults to process.env).
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export function loadRenderOptions(tomlContent?: string, env: EnvRecord = process.env): RenderOptions {
  const base = tomlContent === undefined ? getDefaultConfig() : parseConfig(tomlContent);
  const { render } = applyEnvOverrides(base, env);
  assertRenderOptionsValid(render);
  return render;
}
