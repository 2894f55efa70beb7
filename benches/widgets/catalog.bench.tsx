/**
 * Widget render benchmarks
 *
 * Full path per iteration: declarations, modifier classes, template and
 * string rendering. Units are compiled once, outside the measured loop.
 */

import { bench, describe } from 'vitest';
import { defineComponents } from '../../src/spec/compile';
import { createRegistry } from '../../src/spec/registry';
import { builtinWidgets } from '../../src/widgets';
import { renderToString } from '../../src/ssr';
import type { AttributeBag } from '../../src/spec/declarations';
import type { RenderUnit } from '../../src/spec/types';

const units = defineComponents(builtinWidgets(), {
  registry: createRegistry(),
  freeze: true,
});

const COUNT = 200;

function renderUnit(unit: RenderUnit, bag: AttributeBag): string {
  return renderToString(unit.render(bag));
}

const sections = Array.from({ length: 20 }, (_, i) => ({
  title: `Section ${i + 1}`,
  children: <p>Content {i + 1}</p>,
}));

const trail = Array.from({ length: 6 }, (_, i) => ({
  href: `/level/${i}`,
  children: `Level ${i}`,
}));

describe('widget render', () => {
  bench(`button x${COUNT}`, () => {
    for (let i = 0; i < COUNT; i++) {
      renderUnit(units.button, { size: 'small', children: 'Save' });
    }
  });

  bench('accordion (20 sections)', () => {
    renderUnit(units.accordion, { id: 'acc', expanded: 'first', section: sections });
  });

  bench(`breadcrumb x${COUNT}`, () => {
    for (let i = 0; i < COUNT; i++) {
      renderUnit(units.breadcrumb, { item: trail });
    }
  });
});
