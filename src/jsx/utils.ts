import { ELEMENT_TYPE, type JSXElement } from './types';

export function isElement(value: unknown): value is JSXElement {
  return (
    typeof value === 'object' &&
    value !== null &&
    '$$typeof' in value &&
    value.$$typeof === ELEMENT_TYPE
  );
}
