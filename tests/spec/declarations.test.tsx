import { describe, it, expect, vi, afterEach } from 'vitest';
import { applyDeclarations } from '../../src/spec/declarations';
import { attr, slot } from '../../src/spec/schema';
import { commands, toggleClass } from '../../src/commands';
import {
  InvalidAttributeTypeError,
  InvalidAttributeValueError,
  InvalidModifierValueError,
  MissingAttributeError,
  MissingSlotError,
} from '../../src/common/errors';

describe('applyDeclarations', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('attributes', () => {
    const decls = [
      attr('size', 'string', { values: ['small', 'large'], default: 'small' }),
      attr('label', 'string'),
      attr('rest', 'global'),
    ];

    it('should fill defaults and leave undeclared defaults unset', () => {
      const { values, rest } = applyDeclarations('thing', decls, {});
      expect(values).toEqual({ size: 'small' });
      expect('label' in values).toBe(false);
      expect(rest).toEqual({});
    });

    it('should treat an undefined value as unset', () => {
      const { values } = applyDeclarations('thing', decls, { size: undefined });
      expect(values.size).toBe('small');
    });

    it('should keep supplied values', () => {
      const { values } = applyDeclarations('thing', decls, {
        size: 'large',
        label: 'Hi',
      });
      expect(values).toEqual({ size: 'large', label: 'Hi' });
    });

    it('should reject a string outside the allowed values', () => {
      expect(() =>
        applyDeclarations('thing', decls, { size: 'huge' })
      ).toThrow(
        'Invalid value "huge" for attribute "size" of component "thing". Expected one of: "small", "large".'
      );
    });

    it('should reject a value of the wrong type', () => {
      expect(() => applyDeclarations('thing', decls, { size: 3 })).toThrow(
        new InvalidAttributeTypeError('thing', 'size', 'a string', 'number 3')
      );
    });

    it('should not type-check modifier declarations', () => {
      const modifierDecl = {
        ...attr('size', 'string', { values: ['small', 'large'] }),
        modifier: true,
      };
      const { values } = applyDeclarations('thing', [modifierDecl], { size: 3 });
      expect(values.size).toBe(3);
    });

    it('should require a command sequence for commands attributes', () => {
      const decl = attr('onClick', 'commands', { required: true });
      let caught: unknown;
      try {
        applyDeclarations('toggleButton', [decl], { onClick: 'toggle-mute' });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InvalidAttributeTypeError);
      expect(caught).toMatchObject({
        code: 'INVALID_ATTRIBUTE_TYPE',
        attribute: 'onClick',
        expected: 'a command sequence',
        received: 'the string "toggle-mute"',
      });

      const onClick = commands(toggleClass('page', 'dark'));
      const { values } = applyDeclarations('toggleButton', [decl], { onClick });
      expect(values.onClick).toBe(onClick);
    });

    it('should accept null for optional attributes only', () => {
      const optional = attr('label', 'string');
      const required = attr('id', 'string', { required: true });
      expect(
        applyDeclarations('thing', [optional], { label: null }).values.label
      ).toBe(null);
      expect(() => applyDeclarations('thing', [required], { id: null })).toThrow(
        new InvalidAttributeTypeError('thing', 'id', 'a string', 'null')
      );
    });

    it('should check booleans and numbers', () => {
      const decls2 = [attr('open', 'boolean'), attr('count', 'number')];
      expect(
        applyDeclarations('thing', decls2, { open: true, count: 2 }).values
      ).toEqual({ open: true, count: 2 });
      expect(() => applyDeclarations('thing', decls2, { open: 'yes' })).toThrow(
        new InvalidAttributeTypeError('thing', 'open', 'a boolean', 'the string "yes"')
      );
      expect(() => applyDeclarations('thing', decls2, { count: NaN })).toThrow(
        new InvalidAttributeTypeError('thing', 'count', 'a finite number', 'number NaN')
      );
    });

    it('should raise a modifier error for synthesized declarations', () => {
      const modifierDecl = {
        ...attr('variant', 'string', { values: [null, 'primary'] }),
        modifier: true,
      };
      let caught: unknown;
      try {
        applyDeclarations('badge', [modifierDecl], { variant: 'purple' });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InvalidModifierValueError);
      expect(caught).toBeInstanceOf(InvalidAttributeValueError);
      expect(caught).toMatchObject({
        code: 'INVALID_MODIFIER_VALUE',
        attribute: 'variant',
        value: 'purple',
      });
    });

    it('should accept null when it is an allowed value', () => {
      const decl = attr('variant', 'string', { values: [null, 'primary'] });
      const { values } = applyDeclarations('badge', [decl], { variant: null });
      expect(values.variant).toBe(null);
    });

    it('should reject null when it is not an allowed value', () => {
      const decl = attr('type', 'string', { values: ['button', 'submit'] });
      expect(() => applyDeclarations('button', [decl], { type: null })).toThrow(
        InvalidAttributeValueError
      );
    });

    it('should raise for a missing required attribute', () => {
      const decl = attr('id', 'string', { required: true });
      expect(() => applyDeclarations('accordion', [decl], {})).toThrow(
        new MissingAttributeError('accordion', 'id')
      );
    });
  });

  describe('undeclared attributes', () => {
    it('should collect them into rest when a global declaration exists', () => {
      const { values, rest } = applyDeclarations(
        'thing',
        [attr('id', 'string'), attr('rest', 'global')],
        { id: 'a', 'data-x': '1', title: 't' }
      );
      expect(values).toEqual({ id: 'a' });
      expect(rest).toEqual({ 'data-x': '1', title: 't' });
    });

    it('should drop them with a single warning otherwise', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const decls = [attr('id', 'string')];

      const first = applyDeclarations('thing', decls, { id: 'a', title: 't' });
      applyDeclarations('thing', decls, { id: 'b', title: 't' });

      expect(first.rest).toEqual({});
      expect(first.values).toEqual({ id: 'a' });
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        '[widgetry] Component "thing" does not accept the attribute "title"; it was dropped.'
      );
    });

    it('should not warn in production', () => {
      process.env.NODE_ENV = 'production';
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      applyDeclarations('thing', [attr('id', 'string')], { title: 't' });
      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe('slots', () => {
    it('should pass the default slot through as-is', () => {
      const content = <b>hi</b>;
      const { values } = applyDeclarations('box', [slot('children')], {
        children: content,
      });
      expect(values.children).toBe(content);
    });

    it('should raise for a missing required slot', () => {
      expect(() =>
        applyDeclarations('box', [slot('children', { required: true })], {})
      ).toThrow(new MissingSlotError('box', 'children'));
    });

    it('should treat an empty list as a missing slot', () => {
      expect(() =>
        applyDeclarations('breadcrumb', [slot('item', { required: true })], {
          item: [],
        })
      ).toThrow(MissingSlotError);
    });

    it('should default absent optional slots', () => {
      const { values } = applyDeclarations(
        'box',
        [slot('children'), slot('footer')],
        {}
      );
      expect(values.children).toBeUndefined();
      expect(values.footer).toEqual([]);
    });

    it('should normalize named slot entries', () => {
      const bold = <b>x</b>;
      const { values } = applyDeclarations('box', [slot('action')], {
        action: ['text', bold, { children: 'plain' }],
      });
      expect(values.action).toEqual([
        { children: 'text' },
        { children: bold },
        { children: 'plain' },
      ]);
    });

    it('should wrap a single entry in a list', () => {
      const { values } = applyDeclarations('box', [slot('footer')], {
        footer: 'bye',
      });
      expect(values.footer).toEqual([{ children: 'bye' }]);
    });

    it('should apply slot attribute declarations to every entry', () => {
      const decl = slot('section', {
        attrs: [
          attr('title', 'string', { required: true }),
          attr('open', 'boolean', { default: false }),
        ],
      });
      const { values } = applyDeclarations('accordion', [decl], {
        section: [{ title: 'One', children: 'a' }],
      });
      expect(values.section).toEqual([
        { title: 'One', open: false, children: 'a' },
      ]);

      expect(() =>
        applyDeclarations('accordion', [decl], { section: [{ children: 'a' }] })
      ).toThrow(
        'Component "accordion:section" requires the attribute "title".'
      );
    });
  });
});
