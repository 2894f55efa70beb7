/**
 * widgetry: declaratively specified, server-rendered UI widgets
 *
 * Root exports cover the compiler, the registry and the widget catalog.
 * Lower tiers are exposed via explicit subpaths:
 * - widgetry/commands  (client interaction commands)
 * - widgetry/ssr       (string renderer)
 */

// Compiler and registry
export { compile, defineComponents, deriveBaseClass } from './spec/compile';
export type { CompileOptions, DefineComponentsOptions } from './spec/compile';
export { createRegistry, defaultRegistry, lookup } from './spec/registry';
export type { ComponentRegistry } from './spec/registry';

// Schema
export { attr, slot, synthesizeModifierAttributes } from './spec/schema';
export type {
  AllowedValues,
  AttributeDeclaration,
  AttributeType,
  Declaration,
  ModifierDefinition,
  SlotDeclaration,
} from './spec/schema';
export { applyDeclarations } from './spec/declarations';
export type {
  AttributeBag,
  DeclaredAttributes,
  SlotEntry,
} from './spec/declarations';

// Modifier classes
export {
  classList,
  classNames,
  identityClassName,
  resolveModifierClasses,
} from './spec/modifiers';
export type { ClassNameFn, ClassValue } from './spec/modifiers';

// Template helpers
export {
  hasSlot,
  readBoolean,
  readSlot,
  readString,
  rootClass,
} from './spec/assigns';
export type {
  Assigns,
  ComponentKind,
  ComponentSpecification,
  RenderUnit,
  Template,
} from './spec/types';

// Widget catalog
export * from './widgets';

// Commands (also available from `widgetry/commands`)
export {
  CommandSequence,
  commands,
  parseCommands,
  serialize,
  toggleAttribute,
  toggleClass,
} from './commands';
export type { CommandTarget, Instruction } from './commands';

// Rendering
export { renderToString } from './ssr';

// Errors
export {
  DuplicateAttributeError,
  DuplicateComponentError,
  EmptyCollectionError,
  InvalidAttributeTypeError,
  InvalidAttributeValueError,
  InvalidCommandError,
  InvalidModifierValueError,
  InvalidSpecificationError,
  MissingAttributeError,
  MissingLabelError,
  MissingSlotError,
  RegistryFrozenError,
  UnknownComponentError,
  WidgetError,
} from './common/errors';
export type { WidgetErrorCode } from './common/errors';

// Essential public types
export type { Props } from './common/props';
export type { JSXElement } from './jsx/types';

export { logger } from './dev/logger';
