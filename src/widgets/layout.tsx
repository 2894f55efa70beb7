import { readBoolean, rootClass } from '../spec/assigns';
import { classNames } from '../spec/modifiers';
import { attr, slot } from '../spec/schema';
import type { Assigns, ComponentSpecification } from '../spec/types';
import { withOptions, type WidgetOptions } from './shared';

/**
 * Places its children next to each other, wrapping onto new lines as
 * needed. Spacing is left to CSS.
 */
export function cluster(options: WidgetOptions = {}): ComponentSpecification {
  return withOptions(
    {
      name: 'cluster',
      kind: 'component',
      since: '0.1.0',
      modifiers: [],
      attrs: [attr('rest', 'global'), slot('children', { required: true })],
      template: (a: Assigns) => (
        <div class={rootClass(a)} {...a.rest}>
          {a.children}
        </div>
      ),
    },
    options
  );
}

export interface StackOptions extends WidgetOptions {
  /** Class added when `recursive` is set. Defaults to `is-recursive`. */
  recursiveClass?: string;
}

/** Applies vertical margins between its children. */
export function stack(options: StackOptions = {}): ComponentSpecification {
  const recursiveClass = options.recursiveClass ?? 'is-recursive';

  return withOptions(
    {
      name: 'stack',
      kind: 'component',
      since: '0.1.0',
      modifiers: [],
      attrs: [
        attr('recursive', 'boolean', {
          default: false,
          doc: 'Apply the margins to nested elements as well.',
        }),
        attr('rest', 'global'),
        slot('children', { required: true }),
      ],
      template: (a: Assigns) => (
        <div
          class={classNames(rootClass(a), readBoolean(a, 'recursive') && recursiveClass)}
          {...a.rest}
        >
          {a.children}
        </div>
      ),
    },
    options
  );
}
