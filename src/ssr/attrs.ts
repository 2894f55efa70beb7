/**
 * HTML attribute rendering
 */

import type { Props } from '../common/props';
import { classNames, type ClassValue } from '../spec/modifiers';
import { escapeAttr, styleObjToCss } from './escape';

function isEventHandlerKey(key: string): boolean {
  // onClick, onChange, ... (3rd char uppercase)
  return (
    key.length >= 3 &&
    key[0] === 'o' &&
    key[1] === 'n' &&
    key[2] >= 'A' &&
    key[2] <= 'Z'
  );
}

function isClassValue(value: unknown): value is ClassValue {
  if (Array.isArray(value)) return value.every(isClassValue);
  return (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'boolean'
  );
}

/**
 * Render props to an HTML attribute string, in prop order.
 *
 * - `true` renders a bare attribute, `false`/`null`/`undefined` omit it
 * - `class` accepts a string or a (nested) list of class parts
 * - `style` accepts a string or an object
 * - children, key, ref, `_`-prefixed and `on*` handler props are skipped
 */
export function renderAttrs(props?: Props): string {
  if (!props) return '';

  let result = '';
  for (const [key, value] of Object.entries(props)) {
    if (key === 'children' || key === 'key' || key === 'ref') continue;
    if (key.startsWith('_') || isEventHandlerKey(key)) continue;

    const attrName = key === 'className' ? 'class' : key;

    if (attrName === 'class' && Array.isArray(value) && isClassValue(value)) {
      result += ` class="${escapeAttr(classNames(value))}"`;
      continue;
    }

    if (attrName === 'style' && typeof value !== 'string') {
      const css = styleObjToCss(value);
      if (css) result += ` style="${escapeAttr(css)}"`;
      continue;
    }

    if (value === true) {
      result += ` ${attrName}`;
    } else if (value === false || value === null || value === undefined) {
      continue;
    } else {
      result += ` ${attrName}="${escapeAttr(String(value))}"`;
    }
  }

  return result;
}
