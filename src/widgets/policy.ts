/**
 * Widget state policies
 *
 * Small pure functions with component-specific rules, called from templates.
 */

import { EmptyCollectionError, MissingLabelError } from '../common/errors';
import { readString } from '../spec/assigns';

export type AccordionExpandMode = 'all' | 'none' | 'first';

export const ACCORDION_EXPAND_MODES: readonly AccordionExpandMode[] = [
  'all',
  'none',
  'first',
];

/**
 * Initial (server-rendered) expansion of the section at the 1-based `index`.
 * Later changes happen client-side only.
 */
export function accordionSectionExpanded(
  index: number,
  mode: AccordionExpandMode
): boolean {
  switch (mode) {
    case 'all':
      return true;
    case 'none':
      return false;
    case 'first':
      return index === 1;
  }
}

export function isAccordionExpandMode(
  value: unknown
): value is AccordionExpandMode {
  return ACCORDION_EXPAND_MODES.some((mode) => mode === value);
}

export interface MarkedItem<T> {
  readonly item: T;
  readonly current: boolean;
}

/**
 * Tag the last item of a navigation trail as the current page.
 * Order is preserved; exactly one item is current.
 */
export function markCurrentItem<T>(items: readonly T[]): MarkedItem<T>[] {
  if (items.length === 0) {
    throw new EmptyCollectionError('breadcrumb', 'item');
  }
  const [last, ...rest] = [...items].reverse();
  const tagged: MarkedItem<T>[] = [
    { item: last, current: true },
    ...rest.map((item) => ({ item, current: false })),
  ];
  return tagged.reverse();
}

/**
 * Require an accessible name on landmark-like widgets (toolbar, tree).
 */
export function ensureLabel(
  assigns: Readonly<Record<string, unknown>>,
  component: string,
  example: string
): void {
  if (readString(assigns, 'label') || readString(assigns, 'labelledby')) return;
  throw new MissingLabelError(component, example);
}
