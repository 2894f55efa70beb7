/**
 * String rendering
 *
 * Renders component trees to static HTML strings. Rendering is synchronous:
 * a component returning a Promise is rejected with `SSRInvariantError`.
 */

export { renderToString, renderNodeToSink } from './render';
export { renderAttrs } from './attrs';
export { escapeText, escapeAttr, VOID_ELEMENTS } from './escape';
export { SSRInvariantError } from './errors';
export { StringSink } from './sink';
export type { RenderSink } from './sink';
