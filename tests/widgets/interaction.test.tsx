/**
 * Command sequences run through the reference interpreter: one click flips
 * the widget state, a second click restores the original markup.
 */

import { describe, it, expect } from 'vitest';
import { html } from '../helpers/widgets';
import { click, mount } from '../helpers/command-runtime';
import { accordion, disclosureButton, toggleButton } from '../../src/widgets';
import { commands, toggleClass } from '../../src/commands';

function query(root: ParentNode, selector: string): Element {
  const el = root.querySelector(selector);
  if (!el) throw new Error(`missing ${selector}`);
  return el;
}

describe('accordion interaction', () => {
  const sections = [
    { title: 'One', children: 'a' },
    { title: 'Two', children: 'b' },
  ];

  it('should collapse and re-expand a section', () => {
    const { container, cleanup } = mount(
      html(accordion(), { id: 'acc', expanded: 'all', section: sections })
    );
    try {
      const before = container.innerHTML;
      const trigger = query(container, '#acc-trigger-1');
      const section = query(container, '#acc-section-1');

      click(trigger);
      expect(trigger.getAttribute('aria-expanded')).toBe('false');
      expect(section.classList.contains('is-hidden')).toBe(true);
      expect(query(container, '#acc-trigger-2').getAttribute('aria-expanded')).toBe(
        'true'
      );

      click(trigger);
      expect(container.innerHTML).toBe(before);
    } finally {
      cleanup();
    }
  });

  it('should open a collapsed section', () => {
    const { container, cleanup } = mount(
      html(accordion(), { id: 'acc', expanded: 'first', section: sections })
    );
    try {
      const trigger = query(container, '#acc-trigger-2');
      click(trigger);
      expect(trigger.getAttribute('aria-expanded')).toBe('true');
      expect(query(container, '#acc-section-2').classList.contains('is-hidden')).toBe(
        false
      );
    } finally {
      cleanup();
    }
  });
});

describe('disclosure button interaction', () => {
  it('should run caller commands and flip aria-expanded', () => {
    const { container, cleanup } = mount(
      '<div id="dog-info" class="is-hidden">Rex</div>' +
        html(disclosureButton(), {
          controls: 'dog-info',
          onClick: commands(toggleClass('dog-info', 'is-hidden')),
          children: 'Info',
        })
    );
    try {
      const before = container.innerHTML;
      const btn = query(container, 'button');
      const info = query(container, '#dog-info');

      click(btn);
      expect(btn.getAttribute('aria-expanded')).toBe('true');
      expect(info.classList.contains('is-hidden')).toBe(false);

      click(btn);
      expect(container.innerHTML).toBe(before);
    } finally {
      cleanup();
    }
  });
});

describe('toggle button interaction', () => {
  it('should flip aria-pressed after the caller commands', () => {
    const { container, cleanup } = mount(
      '<main id="page"></main>' +
        html(toggleButton(), {
          onClick: commands(toggleClass('page', 'dark')),
          children: 'Dark mode',
        })
    );
    try {
      const before = container.innerHTML;
      const btn = query(container, 'button');

      click(btn);
      expect(btn.getAttribute('aria-pressed')).toBe('true');
      expect(query(container, '#page').className).toBe('dark');

      click(btn);
      expect(container.innerHTML).toBe(before);
    } finally {
      cleanup();
    }
  });
});
