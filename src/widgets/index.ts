import type { ClassNameFn } from '../spec/modifiers';
import type { ComponentSpecification } from '../spec/types';
import { accordion } from './accordion';
import { actionBar } from './action-bar';
import { badge } from './badge';
import { box } from './box';
import { breadcrumb } from './breadcrumb';
import {
  button,
  buttonLink,
  disclosureButton,
  fab,
  toggleButton,
} from './buttons';
import { cluster, stack } from './layout';
import { skeleton } from './skeleton';
import { tag } from './tag';
import { toolbar } from './toolbar';
import { tooltip } from './tooltip';
import { tree, treeItem } from './tree';

export {
  accordion,
  accordionSectionId,
  accordionTriggerId,
  toggleAccordionSection,
} from './accordion';
export type { AccordionOptions } from './accordion';
export { actionBar } from './action-bar';
export { badge } from './badge';
export { box } from './box';
export { breadcrumb } from './breadcrumb';
export {
  button,
  buttonLink,
  disclosureButton,
  fab,
  toggleButton,
  toggleDisclosure,
  togglePressed,
} from './buttons';
export type { ButtonLinkOptions } from './buttons';
export { cluster, stack } from './layout';
export type { StackOptions } from './layout';
export { skeleton, SKELETON_TYPES } from './skeleton';
export { tag } from './tag';
export { toolbar } from './toolbar';
export { tooltip } from './tooltip';
export { tree, treeItem } from './tree';
export {
  ACCORDION_EXPAND_MODES,
  accordionSectionExpanded,
  ensureLabel,
  isAccordionExpandMode,
  markCurrentItem,
} from './policy';
export type { AccordionExpandMode, MarkedItem } from './policy';
export {
  BUTTON_MODIFIERS,
  FILL,
  OPTIONAL_VARIANT,
  SHAPE,
  SIZE,
  VARIANT,
} from './shared';
export type { WidgetOptions } from './shared';

export interface BuiltinWidgetsOptions {
  /** Applied to every widget. */
  classNameFn?: ClassNameFn;
}

/**
 * Default specifications of the whole catalog, ready for
 * `defineComponents`.
 */
export function builtinWidgets(
  options: BuiltinWidgetsOptions = {}
): ComponentSpecification[] {
  const shared = { classNameFn: options.classNameFn };
  return [
    accordion(shared),
    actionBar(shared),
    badge(shared),
    box(shared),
    breadcrumb(shared),
    button(shared),
    buttonLink(shared),
    cluster(shared),
    disclosureButton(shared),
    fab(shared),
    skeleton(shared),
    stack(shared),
    tag(shared),
    toggleButton(shared),
    toolbar(shared),
    tooltip(shared),
    tree(shared),
    treeItem(shared),
  ];
}
