import { readBoolean, readSlot, readString, rootClass } from '../spec/assigns';
import { attr, slot } from '../spec/schema';
import type { Assigns, ComponentSpecification } from '../spec/types';
import { slotContent, withOptions, type WidgetOptions } from './shared';

/**
 * Renders content with a tooltip. The tooltip is shown on hover or focus;
 * when the content is not itself focusable, the wrapper gets `tabindex="0"`.
 */
export function tooltip(options: WidgetOptions = {}): ComponentSpecification {
  const template = (a: Assigns) => {
    const tooltipId = `${readString(a, 'id') ?? ''}-tooltip`;
    return (
      <span
        class={rootClass(a)}
        aria-describedby={tooltipId}
        data-aria-tooltip
        {...a.rest}
      >
        <span tabindex={readBoolean(a, 'containsLink') ? undefined : '0'}>
          {a.children}
        </span>
        <div role="tooltip" id={tooltipId}>
          {slotContent(readSlot(a, 'tooltip'))}
        </div>
      </span>
    );
  };

  return withOptions(
    {
      name: 'tooltip',
      baseClass: 'tooltip-container',
      kind: 'component',
      since: '0.1.0',
      modifiers: [],
      attrs: [
        attr('id', 'string', { required: true }),
        attr('containsLink', 'boolean', {
          default: false,
          doc: 'Set when the content already holds a focusable element.',
        }),
        attr('rest', 'global'),
        slot('children', { required: true }),
        slot('tooltip', { required: true }),
      ],
      template,
    },
    options
  );
}
