/**
 * Common call contracts: JSX element shape
 */

import type { Props } from './props';

export const ELEMENT_TYPE = Symbol.for('widgetry.element');
export const Fragment = Symbol.for('widgetry.fragment');

export interface JSXElement {
  /** Internal element marker (optional for plain vnode objects) */
  $$typeof?: symbol;

  /** Element type: tag name, component function or Fragment */
  type: unknown;

  /** Props bag */
  props: Props;

  /** Optional key, kept for list rendering */
  key?: string | number | null;
}
