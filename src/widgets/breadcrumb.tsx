import { readSlot, readString, rootClass } from '../spec/assigns';
import { attr, slot } from '../spec/schema';
import type { Assigns, ComponentSpecification } from '../spec/types';
import { markCurrentItem } from './policy';
import { splitLinkAttrs, withOptions, type WidgetOptions } from './shared';

/**
 * Renders a breadcrumb navigation. The last item links the current page and
 * is marked with `aria-current="page"`.
 *
 * ```tsx
 * <Breadcrumb item={[
 *   { navigate: '/categories', children: 'Categories' },
 *   { navigate: '/categories/1', children: 'Reviews' },
 * ]} />
 * ```
 */
export function breadcrumb(options: WidgetOptions = {}): ComponentSpecification {
  return withOptions(
    {
      name: 'breadcrumb',
      kind: 'navigation',
      since: '0.1.0',
      modifiers: [],
      attrs: [
        attr('label', 'string', {
          default: 'Breadcrumb',
          doc: 'The aria label of the `<nav>` element.',
        }),
        attr('rest', 'global'),
        slot('item', {
          required: true,
          attrs: [
            attr('navigate', 'string'),
            attr('patch', 'string'),
            attr('href', 'string'),
          ],
        }),
      ],
      template: (a: Assigns) => (
        <nav aria-label={readString(a, 'label')} class={rootClass(a)} {...a.rest}>
          <ol>
            {markCurrentItem(readSlot(a, 'item')).map(({ item, current }) => (
              <li>
                <a
                  {...splitLinkAttrs(item).link}
                  aria-current={current ? 'page' : undefined}
                >
                  {item.children}
                </a>
              </li>
            ))}
          </ol>
        </nav>
      ),
    },
    options
  );
}
