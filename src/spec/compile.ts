/**
 * Component specification compiler
 *
 * Turns a declarative specification into a render unit:
 *
 *   specification ─► validate ─► derive base class ─► extend schema ─► register
 *
 * and, per render call:
 *
 *   attribute bag ─► declarations ─► modifier classes ─► template
 */

import {
  DuplicateAttributeError,
  InvalidSpecificationError,
} from '../common/errors';
import { isDebugEnabled } from '../dev/config';
import { logger } from '../dev/logger';
import { applyDeclarations, type AttributeBag } from './declarations';
import { identityClassName, resolveModifierClasses } from './modifiers';
import { defaultRegistry, type ComponentRegistry } from './registry';
import {
  synthesizeModifierAttributes,
  type AttributeDeclaration,
  type Declaration,
  type ModifierDefinition,
  type SlotDeclaration,
} from './schema';
import type { Assigns, ComponentSpecification, RenderUnit } from './types';

export interface CompileOptions {
  /** Registry to register the unit in. Defaults to the process-wide one. */
  registry?: ComponentRegistry;
}

/**
 * Derive a root class from a component name: `_` and whitespace become `-`,
 * camel humps are split with `-`, and the result is lower-cased.
 * `button_link`, `buttonLink` and `ButtonLink` all give `button-link`.
 */
export function deriveBaseClass(name: string): string {
  return name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1-$2')
    .replace(/[_\s]+/g, '-')
    .toLowerCase();
}

function validateModifier(component: string, m: ModifierDefinition): void {
  if (!m.name) {
    throw new InvalidSpecificationError(component, 'modifier without a name');
  }
  if (m.required && m.default !== undefined) {
    throw new InvalidSpecificationError(
      component,
      `required modifier "${m.name}" must not have a default`
    );
  }
  if (
    m.values !== undefined &&
    m.values.length > 0 &&
    m.default !== undefined &&
    !m.values.includes(m.default)
  ) {
    throw new InvalidSpecificationError(
      component,
      `default ${JSON.stringify(m.default)} of modifier "${m.name}" is not one of its values`
    );
  }
}

/** Assign keys the compiler sets itself; no declaration may take them. */
const RESERVED_ASSIGNS: readonly string[] = ['baseClass', 'modifierClasses'];

/**
 * Merge explicit declarations with the synthesized modifier attributes.
 * Any name that appears twice, or that collides with a compiler-set assign,
 * is a `DuplicateAttributeError`.
 */
function buildSchema(
  component: string,
  explicit: readonly Declaration[],
  modifiers: readonly ModifierDefinition[]
): Declaration[] {
  const merged = [...explicit, ...synthesizeModifierAttributes(modifiers)];
  const seen = new Set<string>(RESERVED_ASSIGNS);
  let globals = 0;

  for (const decl of merged) {
    if (seen.has(decl.name)) {
      throw new DuplicateAttributeError(component, decl.name);
    }
    seen.add(decl.name);

    if (
      decl.name === 'rest' &&
      !(decl.kind === 'attr' && decl.type === 'global')
    ) {
      throw new DuplicateAttributeError(component, decl.name);
    }

    if (decl.kind === 'attr' && decl.type === 'global') {
      globals++;
      if (decl.name !== 'rest') {
        throw new InvalidSpecificationError(
          component,
          `the global attribute must be named "rest", got "${decl.name}"`
        );
      }
    }
  }
  if (globals > 1) {
    throw new InvalidSpecificationError(
      component,
      'at most one global attribute is allowed'
    );
  }
  return merged;
}

/**
 * Compile a specification into a render unit and register it.
 *
 * Throws (and registers nothing) on an invalid specification, a duplicated
 * attribute name, or a component name that is already registered.
 */
export function compile(
  spec: ComponentSpecification,
  options: CompileOptions = {}
): RenderUnit {
  const registry = options.registry ?? defaultRegistry;
  const name = spec.name.trim();
  if (!name) {
    throw new InvalidSpecificationError(spec.name, 'name must not be empty');
  }

  const modifiers = spec.modifiers ?? [];
  for (const m of modifiers) validateModifier(name, m);

  const baseClass = spec.baseClass ?? deriveBaseClass(name);
  const declarations = buildSchema(name, spec.attrs ?? [], modifiers);
  const modifierNames = modifiers.map((m) => m.name);
  const classNameFn = spec.classNameFn ?? identityClassName;
  const template = spec.template;

  const render = (bag: AttributeBag = {}) => {
    const { values, rest } = applyDeclarations(name, declarations, bag);
    const modifierClasses = resolveModifierClasses(
      modifierNames,
      classNameFn,
      values
    );
    const assigns: Assigns = { ...values, rest, baseClass, modifierClasses };
    if (isDebugEnabled()) {
      logger.debug('[widgetry] render %s', name, modifierClasses);
    }
    return template(assigns);
  };

  const unit: RenderUnit = Object.freeze({
    name,
    baseClass,
    kind: spec.kind ?? 'component',
    since: spec.since,
    doc: spec.doc,
    modifierNames: Object.freeze(modifierNames),
    acceptedAttributes: Object.freeze(
      declarations.filter((d): d is AttributeDeclaration => d.kind === 'attr')
    ),
    slots: Object.freeze(
      declarations.filter((d): d is SlotDeclaration => d.kind === 'slot')
    ),
    render,
  });

  registry.register(unit);

  if (isDebugEnabled()) {
    logger.debug(
      `[widgetry] compiled ${name} (.${baseClass}) modifiers=[${modifierNames.join(', ')}]`
    );
  }
  return unit;
}

export interface DefineComponentsOptions extends CompileOptions {
  /** Freeze the registry once every specification is compiled. */
  freeze?: boolean;
}

/**
 * Compile a list of specifications into one registry. Returns the units
 * keyed by component name.
 */
export function defineComponents(
  specs: readonly ComponentSpecification[],
  options: DefineComponentsOptions = {}
): Record<string, RenderUnit> {
  const units: Record<string, RenderUnit> = {};
  for (const spec of specs) {
    const unit = compile(spec, options);
    units[unit.name] = unit;
  }
  if (options.freeze) (options.registry ?? defaultRegistry).freeze();
  return units;
}
