/**
 * Common call contracts: Component signatures
 */

import type { Props } from './props';
import type { JSXElement } from './jsx';

/**
 * What a component function may return. Components are synchronous: the
 * renderer rejects anything thenable.
 */
export type ComponentResult = JSXElement | string | number | boolean | null;

export type ComponentFunction<P extends Props = Props> = (
  props: P
) => ComponentResult;
