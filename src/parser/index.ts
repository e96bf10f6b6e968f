/**
 * Label text parsing.
 *
 * @packageDocumentation
 */

export { parse, safeParse } from './parser.js';
export type { ParseOptions, ParseResult } from './parser.js';
