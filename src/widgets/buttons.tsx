import {
  CommandSequence,
  serialize,
  toggleAttribute,
} from '../commands';
import { readBoolean, readString, rootClass } from '../spec/assigns';
import { classNames } from '../spec/modifiers';
import { attr, slot } from '../spec/schema';
import type { Assigns, ComponentSpecification } from '../spec/types';
import {
  BUTTON_MODIFIERS,
  SHAPE,
  SIZE,
  VARIANT,
  readCommands,
  splitLinkAttrs,
  withOptions,
  type WidgetOptions,
} from './shared';

/**
 * Renders a button.
 *
 * Use it for actions that stay on the page (submitting a form, confirming,
 * deleting). To style a link like a button, use `buttonLink`.
 */
export function button(options: WidgetOptions = {}): ComponentSpecification {
  return withOptions(
    {
      name: 'button',
      kind: 'button',
      since: '0.1.0',
      modifiers: BUTTON_MODIFIERS,
      attrs: [
        attr('type', 'string', {
          values: ['button', 'reset', 'submit'],
          default: 'button',
        }),
        attr('disabled', 'boolean', { default: null }),
        attr('rest', 'global', {
          include: ['autofocus', 'form', 'name', 'value'],
        }),
        slot('children', { required: true }),
      ],
      template: (a: Assigns) => (
        <button
          type={readString(a, 'type')}
          class={rootClass(a)}
          disabled={a.disabled}
          {...a.rest}
        >
          {a.children}
        </button>
      ),
    },
    options
  );
}

export interface ButtonLinkOptions extends WidgetOptions {
  /** Class added when `disabled` is set. Defaults to `is-disabled`. */
  disabledClass?: string;
}

/**
 * Renders a link (`<a>`) with the role and style of a button.
 *
 * `<a>` has no `disabled` attribute, so `disabled` toggles a class instead.
 */
export function buttonLink(
  options: ButtonLinkOptions = {}
): ComponentSpecification {
  const disabledClass = options.disabledClass ?? 'is-disabled';

  const template = (a: Assigns) => {
    const { link, others } = splitLinkAttrs(a.rest);
    return (
      <a
        {...link}
        class={classNames(rootClass(a), readBoolean(a, 'disabled') && disabledClass)}
        {...others}
      >
        {a.children}
      </a>
    );
  };

  return withOptions(
    {
      name: 'buttonLink',
      baseClass: 'button',
      kind: 'button',
      since: '0.1.0',
      modifiers: BUTTON_MODIFIERS,
      attrs: [
        attr('disabled', 'boolean', { default: false }),
        attr('rest', 'global', {
          include: [
            'download',
            'hreflang',
            'referrerpolicy',
            'rel',
            'target',
            'type',
            'navigate',
            'patch',
            'href',
          ],
        }),
        slot('children', { required: true }),
      ],
      template,
    },
    options
  );
}

/**
 * Click command of a disclosure button: the caller's own commands (if any),
 * then the button's `aria-expanded` flip.
 */
export function toggleDisclosure(onClick?: CommandSequence): CommandSequence {
  return (onClick ?? CommandSequence.empty).append(
    toggleAttribute(null, 'aria-expanded', 'true', 'false')
  );
}

/**
 * Renders a button that toggles the visibility of another element.
 *
 * The button only flips its own `aria-expanded`. Keeping the controlled
 * element's visibility in step is the caller's job: render it with `hidden`
 * (the initial state is collapsed) and pass the commands that reveal it as
 * `onClick`.
 */
export function disclosureButton(
  options: WidgetOptions = {}
): ComponentSpecification {
  return withOptions(
    {
      name: 'disclosureButton',
      baseClass: 'button',
      kind: 'button',
      since: '0.1.0',
      modifiers: BUTTON_MODIFIERS,
      attrs: [
        attr('controls', 'string', {
          required: true,
          doc: 'DOM id of the element this button controls.',
        }),
        attr('onClick', 'commands'),
        attr('rest', 'global'),
        slot('children', { required: true }),
      ],
      template: (a: Assigns) => (
        <button
          type="button"
          aria-expanded="false"
          aria-controls={readString(a, 'controls')}
          data-on-click={serialize(toggleDisclosure(readCommands(a, 'onClick')))}
          class={rootClass(a)}
          {...a.rest}
        >
          {a.children}
        </button>
      ),
    },
    options
  );
}

/** Renders a floating action button. */
export function fab(options: WidgetOptions = {}): ComponentSpecification {
  return withOptions(
    {
      name: 'fab',
      kind: 'button',
      since: '0.1.0',
      modifiers: [VARIANT, SIZE, { ...SHAPE, default: 'circle' }],
      attrs: [
        attr('label', 'string', { required: true }),
        attr('disabled', 'boolean', { default: false }),
        attr('rest', 'global'),
        slot('children', { required: true }),
      ],
      template: (a: Assigns) => (
        <button
          type="button"
          aria-label={readString(a, 'label')}
          class={rootClass(a)}
          disabled={a.disabled}
          {...a.rest}
        >
          {a.children}
        </button>
      ),
    },
    options
  );
}

/**
 * Click command of a toggle button: the caller's commands, then the button's
 * own `aria-pressed` flip.
 */
export function togglePressed(onClick: CommandSequence): CommandSequence {
  return onClick.append(toggleAttribute(null, 'aria-pressed', 'true', 'false'));
}

/**
 * Renders a button that toggles a state (dark mode, mute).
 *
 * The state is conveyed by `aria-pressed`; select pressed buttons with
 * `button[aria-pressed="true"]`. Keep the label the same in both states.
 */
export function toggleButton(
  options: WidgetOptions = {}
): ComponentSpecification {
  return withOptions(
    {
      name: 'toggleButton',
      baseClass: 'button',
      kind: 'button',
      since: '0.1.0',
      modifiers: BUTTON_MODIFIERS,
      attrs: [
        attr('pressed', 'boolean', { default: false }),
        attr('onClick', 'commands', {
          required: true,
          doc: 'Commands to run on click, before the pressed state flips.',
        }),
        attr('disabled', 'boolean', { default: null }),
        attr('rest', 'global'),
        slot('children', { required: true }),
      ],
      template: (a: Assigns) => (
        <button
          type="button"
          data-on-click={serialize(
            togglePressed(readCommands(a, 'onClick') ?? CommandSequence.empty)
          )}
          aria-pressed={String(readBoolean(a, 'pressed'))}
          class={rootClass(a)}
          disabled={a.disabled}
          {...a.rest}
        >
          {a.children}
        </button>
      ),
    },
    options
  );
}
