import { rootClass } from '../spec/assigns';
import { attr } from '../spec/schema';
import type { Assigns, ComponentSpecification } from '../spec/types';
import { withOptions, type WidgetOptions } from './shared';

export const SKELETON_TYPES = [
  'text-line',
  'text-block',
  'image',
  'circle',
  'rectangle',
  'square',
] as const;

/**
 * Renders a loading placeholder shaped like the content it stands in for.
 * Hidden from assistive technology.
 */
export function skeleton(options: WidgetOptions = {}): ComponentSpecification {
  return withOptions(
    {
      name: 'skeleton',
      kind: 'component',
      since: '0.1.0',
      modifiers: [{ name: 'type', values: SKELETON_TYPES, required: true }],
      attrs: [attr('rest', 'global')],
      template: (a: Assigns) => (
        <div class={rootClass(a)} aria-hidden="true" {...a.rest} />
      ),
    },
    options
  );
}
