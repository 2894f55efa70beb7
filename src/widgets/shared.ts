/**
 * Pieces shared by the widget catalog: common modifier sets, the factory
 * options every widget accepts, and template helpers.
 */

import { CommandSequence } from '../commands';
import { ELEMENT_TYPE, type JSXElement } from '../jsx/types';
import type { Props } from '../common/props';
import type { SlotEntry } from '../spec/declarations';
import type { ClassNameFn } from '../spec/modifiers';
import type { ModifierDefinition } from '../spec/schema';
import type { ComponentSpecification } from '../spec/types';
import { invariant } from '../dev/invariant';

export const SIZE: ModifierDefinition = {
  name: 'size',
  values: ['small', 'normal', 'medium', 'large'],
  default: 'normal',
};

export const VARIANT: ModifierDefinition = {
  name: 'variant',
  values: ['primary', 'secondary', 'info', 'success', 'warning', 'danger'],
  default: 'primary',
};

/** Like `VARIANT`, but unset by default. */
export const OPTIONAL_VARIANT: ModifierDefinition = {
  name: 'variant',
  values: [null, 'primary', 'secondary', 'info', 'success', 'warning', 'danger'],
  default: null,
};

export const FILL: ModifierDefinition = {
  name: 'fill',
  values: ['solid', 'outline', 'text'],
  default: 'solid',
};

export const SHAPE: ModifierDefinition = {
  name: 'shape',
  values: [null, 'circle', 'pill'],
  default: null,
};

export const BUTTON_MODIFIERS: readonly ModifierDefinition[] = [
  VARIANT,
  SIZE,
  FILL,
  SHAPE,
];

/**
 * Options accepted by every widget factory. Anything left out keeps the
 * widget's default.
 */
export interface WidgetOptions {
  /** Registered component name. */
  name?: string;
  baseClass?: string;
  modifiers?: readonly ModifierDefinition[];
  classNameFn?: ClassNameFn;
}

/** Apply caller options over a widget's default specification. */
export function withOptions(
  defaults: ComponentSpecification,
  options: WidgetOptions
): ComponentSpecification {
  return {
    ...defaults,
    name: options.name ?? defaults.name,
    baseClass: options.baseClass ?? defaults.baseClass,
    modifiers: options.modifiers ?? defaults.modifiers,
    classNameFn: options.classNameFn ?? defaults.classNameFn,
  };
}

/** Render-ready content of a slot: every entry's `children`, in order. */
export function slotContent(entries: readonly SlotEntry[]): unknown[] {
  return entries.map((entry) => entry.children);
}

export function readCommands(
  source: Readonly<Record<string, unknown>>,
  name: string
): CommandSequence | undefined {
  const value = source[name];
  return value instanceof CommandSequence ? value : undefined;
}

/**
 * Link attributes for `navigate` / `patch` / `href`. `navigate` and `patch`
 * mark the link for the client router (`data-link`); plain `href` does not.
 */
export function splitLinkAttrs(source: Readonly<Record<string, unknown>>): {
  link: Record<string, string | undefined>;
  others: Record<string, unknown>;
} {
  const { navigate, patch, href, ...others } = source;
  if (typeof navigate === 'string') {
    return { link: { href: navigate, 'data-link': 'redirect' }, others };
  }
  if (typeof patch === 'string') {
    return { link: { href: patch, 'data-link': 'patch' }, others };
  }
  return {
    link: { href: typeof href === 'string' ? href : undefined },
    others,
  };
}

/**
 * Render an element whose tag name is only known at render time
 * (e.g. a configurable heading level).
 */
export function DynamicTag(props: Props): JSXElement {
  const { name, ...rest } = props;
  invariant(
    typeof name === 'string' && /^[a-z][a-z0-9-]*$/.test(name),
    'DynamicTag requires a lower-case tag name',
    { name: String(name) }
  );
  return { $$typeof: ELEMENT_TYPE, type: name, props: rest, key: null };
}
