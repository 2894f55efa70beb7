import { rootClass } from '../spec/assigns';
import { attr, slot } from '../spec/schema';
import type { Assigns, ComponentSpecification } from '../spec/types';
import { OPTIONAL_VARIANT, SIZE, withOptions, type WidgetOptions } from './shared';

/** Renders a badge (counts, short status text). */
export function badge(options: WidgetOptions = {}): ComponentSpecification {
  return withOptions(
    {
      name: 'badge',
      kind: 'component',
      since: '0.1.0',
      modifiers: [SIZE, OPTIONAL_VARIANT],
      attrs: [attr('rest', 'global'), slot('children', { required: true })],
      template: (a: Assigns) => (
        <span class={rootClass(a)} {...a.rest}>
          {a.children}
        </span>
      ),
    },
    options
  );
}
