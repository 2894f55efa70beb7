import { hasSlot, readSlot, rootClass } from '../spec/assigns';
import { attr, slot } from '../spec/schema';
import type { Assigns, ComponentSpecification } from '../spec/types';
import { slotContent, withOptions, type WidgetOptions } from './shared';

/**
 * Renders a box for a section on the page: an optional header (title,
 * action buttons, banner), the body, and an optional footer.
 */
export function box(options: WidgetOptions = {}): ComponentSpecification {
  const template = (a: Assigns) => {
    const title = readSlot(a, 'title');
    const action = readSlot(a, 'action');
    const banner = readSlot(a, 'banner');
    const footer = readSlot(a, 'footer');
    const withHeader = hasSlot(a, 'title') || hasSlot(a, 'banner') || hasSlot(a, 'action');

    return (
      <section class={rootClass(a)} {...a.rest}>
        {withHeader && (
          <header>
            {title.length > 0 && <h2>{slotContent(title)}</h2>}
            {action.length > 0 && (
              <div class="box-actions">{slotContent(action)}</div>
            )}
            {banner.length > 0 && (
              <div class="box-banner">{slotContent(banner)}</div>
            )}
          </header>
        )}
        {a.children}
        {footer.length > 0 && <footer>{slotContent(footer)}</footer>}
      </section>
    );
  };

  return withOptions(
    {
      name: 'box',
      kind: 'component',
      since: '0.1.0',
      modifiers: [],
      attrs: [
        slot('title', { doc: 'The title for the box.' }),
        slot('children', { required: true }),
        slot('action', { doc: 'Action buttons related to the box.' }),
        slot('banner', { doc: 'A banner image rendered in the header.' }),
        slot('footer'),
        attr('rest', 'global'),
      ],
      template,
    },
    options
  );
}
