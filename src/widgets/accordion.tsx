import {
  commands,
  serialize,
  toggleAttribute,
  toggleClass,
  type CommandSequence,
} from '../commands';
import { readSlot, readString, rootClass } from '../spec/assigns';
import { attr, slot } from '../spec/schema';
import type { Assigns, ComponentSpecification } from '../spec/types';
import {
  ACCORDION_EXPAND_MODES,
  accordionSectionExpanded,
  isAccordionExpandMode,
} from './policy';
import { DynamicTag, withOptions, type WidgetOptions } from './shared';

export interface AccordionOptions extends WidgetOptions {
  /** Class marking a collapsed section. Defaults to `is-hidden`. */
  hiddenClass?: string;
}

export function accordionTriggerId(id: string, index: number): string {
  return `${id}-trigger-${index}`;
}

export function accordionSectionId(id: string, index: number): string {
  return `${id}-section-${index}`;
}

/**
 * Click command for the trigger of section `index` (1-based): flips the
 * trigger's `aria-expanded` and the section's hidden class.
 */
export function toggleAccordionSection(
  id: string,
  index: number,
  hiddenClass = 'is-hidden'
): CommandSequence {
  return commands(
    toggleAttribute(accordionTriggerId(id, index), 'aria-expanded', 'true', 'false'),
    toggleClass(accordionSectionId(id, index), hiddenClass)
  );
}

/**
 * Renders a set of headings that control the visibility of their content
 * sections.
 *
 * ```tsx
 * <Accordion id="dog-breeds" expanded="first" section={[
 *   { title: 'Golden Retriever', children: <p>Friendly.</p> },
 *   { title: 'Siberian Husky', children: <p>Energetic.</p> },
 * ]} />
 * ```
 */
export function accordion(options: AccordionOptions = {}): ComponentSpecification {
  const hiddenClass = options.hiddenClass ?? 'is-hidden';

  const template = (a: Assigns) => {
    const id = readString(a, 'id') ?? '';
    const expandedMode = a.expanded;
    const mode = isAccordionExpandMode(expandedMode) ? expandedMode : 'all';
    const heading = readString(a, 'heading') ?? 'h3';

    return (
      <div id={id} class={rootClass(a)} {...a.rest}>
        {readSlot(a, 'section').map((section, i) => {
          const index = i + 1;
          const expanded = accordionSectionExpanded(index, mode);
          return (
            <div>
              <DynamicTag name={heading}>
                <button
                  id={accordionTriggerId(id, index)}
                  type="button"
                  aria-expanded={String(expanded)}
                  aria-controls={accordionSectionId(id, index)}
                  data-on-click={serialize(
                    toggleAccordionSection(id, index, hiddenClass)
                  )}
                >
                  <span>{readString(section, 'title')}</span>
                </button>
              </DynamicTag>
              <div
                id={accordionSectionId(id, index)}
                role="region"
                aria-labelledby={accordionTriggerId(id, index)}
                class={expanded ? undefined : hiddenClass}
              >
                {section.children}
              </div>
            </div>
          );
        })}
      </div>
    );
  };

  return withOptions(
    {
      name: 'accordion',
      kind: 'component',
      since: '0.1.0',
      doc: 'Headings that control the visibility of their content sections.',
      modifiers: [],
      attrs: [
        attr('id', 'string', { required: true }),
        attr('expanded', 'atom', {
          values: ACCORDION_EXPAND_MODES,
          default: 'all',
          doc: 'Initial state: all sections open, none, or only the first.',
        }),
        attr('heading', 'string', {
          values: ['h2', 'h3', 'h4', 'h5', 'h6'],
          default: 'h3',
          doc: 'Heading level wrapping each section trigger.',
        }),
        attr('rest', 'global'),
        slot('section', {
          required: true,
          attrs: [attr('title', 'string')],
        }),
      ],
      template,
    },
    options
  );
}
