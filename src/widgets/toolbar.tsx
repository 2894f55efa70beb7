import { readString, rootClass } from '../spec/assigns';
import { attr, slot } from '../spec/schema';
import type { Assigns, ComponentSpecification } from '../spec/types';
import { ensureLabel } from './policy';
import { withOptions, type WidgetOptions } from './shared';

/**
 * Renders a container for buttons, toggle buttons and disclosure buttons.
 * Either `label` or `labelledby` is required.
 */
export function toolbar(options: WidgetOptions = {}): ComponentSpecification {
  return withOptions(
    {
      name: 'toolbar',
      kind: 'component',
      since: '0.1.0',
      modifiers: [],
      attrs: [
        attr('label', 'string', { default: null }),
        attr('labelledby', 'string', { default: null }),
        attr('controls', 'string', {
          default: null,
          doc: 'DOM id of the element controlled by this toolbar.',
        }),
        attr('rest', 'global'),
        slot('children', { required: true }),
      ],
      template: (a: Assigns) => {
        ensureLabel(a, 'toolbar', 'Dog profile actions');
        return (
          <div
            class={rootClass(a)}
            role="toolbar"
            aria-label={readString(a, 'label')}
            aria-labelledby={readString(a, 'labelledby')}
            aria-controls={readString(a, 'controls')}
            {...a.rest}
          >
            {a.children}
          </div>
        );
      },
    },
    options
  );
}
