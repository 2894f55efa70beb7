/**
 * Synchronous string renderer
 *
 * Walks a JSX tree and writes HTML into a sink. Rendering is strictly
 * synchronous and deterministic: the same tree always yields the same string.
 */

import type { ComponentFunction } from '../common/component';
import type { Props } from '../common/props';
import { Fragment, type JSXElement } from '../jsx/types';
import { logger } from '../dev/logger';
import { isDebugEnabled } from '../dev/config';
import { renderAttrs } from './attrs';
import { VOID_ELEMENTS, escapeText } from './escape';
import { SSRInvariantError } from './errors';
import { StringSink, type RenderSink } from './sink';

function isVNodeLike(x: unknown): x is JSXElement {
  return typeof x === 'object' && x !== null && 'type' in x && 'props' in x;
}

function isThenable(x: unknown): boolean {
  return (
    typeof x === 'object' &&
    x !== null &&
    'then' in x &&
    typeof x.then === 'function'
  );
}

function isComponent(x: unknown): x is ComponentFunction {
  return typeof x === 'function';
}

function executeComponent(type: ComponentFunction, props: Props): unknown {
  const out: unknown = type(props);
  if (isThenable(out)) {
    throw new SSRInvariantError(
      `Component "${type.name || 'anonymous'}" returned a Promise. ` +
        'Rendering is synchronous; resolve data before rendering.'
    );
  }
  return out;
}

/**
 * Write a single child (string, number, element, or nested list) to the sink.
 */
export function renderNodeToSink(node: unknown, sink: RenderSink): void {
  if (node === null || node === undefined || typeof node === 'boolean') return;

  if (typeof node === 'string') {
    sink.write(escapeText(node));
    return;
  }
  if (typeof node === 'number') {
    sink.write(escapeText(String(node)));
    return;
  }
  if (Array.isArray(node)) {
    for (const child of node) renderNodeToSink(child, sink);
    return;
  }
  if (!isVNodeLike(node)) {
    throw new SSRInvariantError(
      `Cannot render value of type ${typeof node} as a child.`
    );
  }

  const { type, props } = node;

  if (isComponent(type)) {
    renderNodeToSink(executeComponent(type, props), sink);
    return;
  }

  if (type === Fragment) {
    renderNodeToSink(props.children, sink);
    return;
  }

  if (typeof type !== 'string') {
    throw new SSRInvariantError(
      `Unsupported element type: ${String(type)}`
    );
  }

  if (isDebugEnabled()) logger.debug('[widgetry] render <%s>', type);

  const attrs = renderAttrs(props);
  if (VOID_ELEMENTS.has(type)) {
    sink.write(`<${type}${attrs} />`);
    return;
  }

  sink.write(`<${type}${attrs}>`);
  renderNodeToSink(props.children, sink);
  sink.write(`</${type}>`);
}

/**
 * Render a component (or an already built element) to an HTML string.
 * A `null` root, as a template may return, renders as the empty string.
 */
export function renderToString(
  root: ComponentFunction | JSXElement | null,
  props: Props = {}
): string {
  const sink = new StringSink();
  if (isComponent(root)) {
    renderNodeToSink(executeComponent(root, props), sink);
  } else {
    renderNodeToSink(root, sink);
  }
  sink.end();
  return sink.toString();
}
