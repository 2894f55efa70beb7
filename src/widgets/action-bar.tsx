import { serialize } from '../commands';
import { readSlot, readString, rootClass } from '../spec/assigns';
import { attr, slot } from '../spec/schema';
import type { Assigns, ComponentSpecification } from '../spec/types';
import { readCommands, withOptions, type WidgetOptions } from './shared';

/**
 * Renders a toolbar of icon buttons. Each `item` is one button; its
 * `label` becomes the button's tooltip.
 */
export function actionBar(options: WidgetOptions = {}): ComponentSpecification {
  return withOptions(
    {
      name: 'actionBar',
      kind: 'component',
      since: '0.1.0',
      modifiers: [],
      attrs: [
        attr('rest', 'global'),
        slot('item', {
          required: true,
          attrs: [
            attr('label', 'string', { required: true }),
            attr('onClick', 'commands', { required: true }),
          ],
        }),
      ],
      template: (a: Assigns) => (
        <div class={rootClass(a)} role="toolbar" {...a.rest}>
          {readSlot(a, 'item').map((item) => {
            const onClick = readCommands(item, 'onClick');
            return (
              <button
                type="button"
                title={readString(item, 'label')}
                data-on-click={onClick ? serialize(onClick) : undefined}
              >
                {item.children}
              </button>
            );
          })}
        </div>
      ),
    },
    options
  );
}
