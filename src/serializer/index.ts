/**
 * Label rendering.
 *
 * @packageDocumentation
 */

export { render, renderToString } from './serializer.js';
export type { RenderCallOptions } from './serializer.js';
