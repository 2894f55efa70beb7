import { readSlot, readString, rootClass } from '../spec/assigns';
import { attr, slot } from '../spec/schema';
import type { Assigns, ComponentSpecification } from '../spec/types';
import { ensureLabel } from './policy';
import { slotContent, withOptions, type WidgetOptions } from './shared';

/**
 * Renders a hierarchical list of items. Use `treeItem` units as children.
 * Either `label` or `labelledby` is required.
 */
export function tree(options: WidgetOptions = {}): ComponentSpecification {
  return withOptions(
    {
      name: 'tree',
      kind: 'component',
      since: '0.1.0',
      modifiers: [],
      attrs: [
        attr('label', 'string', { default: null }),
        attr('labelledby', 'string', { default: null }),
        attr('rest', 'global'),
        slot('children', { required: true }),
      ],
      template: (a: Assigns) => {
        ensureLabel(a, 'tree', 'Dog Breeds');
        return (
          <ul
            class={rootClass(a)}
            role="tree"
            aria-label={readString(a, 'label')}
            aria-labelledby={readString(a, 'labelledby')}
            {...a.rest}
          >
            {a.children}
          </ul>
        );
      },
    },
    options
  );
}

/**
 * Renders one node of a `tree`. Child nodes go in the `items` slot; a node
 * with children starts collapsed.
 */
export function treeItem(options: WidgetOptions = {}): ComponentSpecification {
  return withOptions(
    {
      name: 'treeItem',
      kind: 'component',
      since: '0.1.0',
      modifiers: [],
      attrs: [
        attr('rest', 'global'),
        slot('items'),
        slot('children', { required: true }),
      ],
      template: (a: Assigns) => {
        const items = readSlot(a, 'items');
        return (
          <li
            class={rootClass(a)}
            role="treeitem"
            aria-selected="false"
            aria-expanded={items.length > 0 ? 'false' : undefined}
            {...a.rest}
          >
            <span>{a.children}</span>
            {items.length > 0 && <ul role="group">{slotContent(items)}</ul>}
          </li>
        );
      },
    },
    options
  );
}
