/**
 * Error taxonomy
 *
 * Compile-time errors (specification, schema, registry) abort module
 * initialisation. Render-time errors surface to the caller of `render`.
 */

export type WidgetErrorCode =
  | 'INVALID_SPECIFICATION'
  | 'DUPLICATE_ATTRIBUTE'
  | 'DUPLICATE_COMPONENT'
  | 'REGISTRY_FROZEN'
  | 'UNKNOWN_COMPONENT'
  | 'MISSING_ATTRIBUTE'
  | 'MISSING_SLOT'
  | 'INVALID_ATTRIBUTE_VALUE'
  | 'INVALID_MODIFIER_VALUE'
  | 'INVALID_ATTRIBUTE_TYPE'
  | 'MISSING_LABEL'
  | 'EMPTY_COLLECTION'
  | 'INVALID_COMMAND';

export class WidgetError extends Error {
  readonly code: WidgetErrorCode;
  constructor(code: WidgetErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'WidgetError';
    Object.setPrototypeOf(this, WidgetError.prototype);
  }
}

export class InvalidSpecificationError extends WidgetError {
  constructor(
    readonly component: string,
    detail: string
  ) {
    super(
      'INVALID_SPECIFICATION',
      `Invalid specification for component "${component}": ${detail}`
    );
    this.name = 'InvalidSpecificationError';
    Object.setPrototypeOf(this, InvalidSpecificationError.prototype);
  }
}

export class DuplicateAttributeError extends WidgetError {
  constructor(
    readonly component: string,
    readonly attribute: string
  ) {
    super(
      'DUPLICATE_ATTRIBUTE',
      `Component "${component}" declares "${attribute}" more than once. ` +
        'Modifier names must not repeat an explicit attribute or slot name.'
    );
    this.name = 'DuplicateAttributeError';
    Object.setPrototypeOf(this, DuplicateAttributeError.prototype);
  }
}

export class DuplicateComponentError extends WidgetError {
  constructor(readonly component: string) {
    super(
      'DUPLICATE_COMPONENT',
      `A component named "${component}" is already registered. ` +
        'Pass a different `name` option to register a second variant.'
    );
    this.name = 'DuplicateComponentError';
    Object.setPrototypeOf(this, DuplicateComponentError.prototype);
  }
}

export class RegistryFrozenError extends WidgetError {
  constructor(readonly component: string) {
    super(
      'REGISTRY_FROZEN',
      `Cannot register "${component}": the component registry is frozen. ` +
        'Compile all components during initialisation.'
    );
    this.name = 'RegistryFrozenError';
    Object.setPrototypeOf(this, RegistryFrozenError.prototype);
  }
}

export class UnknownComponentError extends WidgetError {
  constructor(readonly component: string) {
    super('UNKNOWN_COMPONENT', `No component named "${component}" is registered.`);
    this.name = 'UnknownComponentError';
    Object.setPrototypeOf(this, UnknownComponentError.prototype);
  }
}

export class MissingAttributeError extends WidgetError {
  constructor(
    readonly component: string,
    readonly attribute: string
  ) {
    super(
      'MISSING_ATTRIBUTE',
      `Component "${component}" requires the attribute "${attribute}".`
    );
    this.name = 'MissingAttributeError';
    Object.setPrototypeOf(this, MissingAttributeError.prototype);
  }
}

export class MissingSlotError extends WidgetError {
  constructor(
    readonly component: string,
    readonly slot: string
  ) {
    super('MISSING_SLOT', `Component "${component}" requires the slot "${slot}".`);
    this.name = 'MissingSlotError';
    Object.setPrototypeOf(this, MissingSlotError.prototype);
  }
}

function formatAllowed(values: readonly (string | null)[]): string {
  return values.map((v) => (v === null ? 'null' : JSON.stringify(v))).join(', ');
}

export class InvalidAttributeValueError extends WidgetError {
  constructor(
    readonly component: string,
    readonly attribute: string,
    readonly value: string | null,
    readonly allowed: readonly (string | null)[],
    code: 'INVALID_ATTRIBUTE_VALUE' | 'INVALID_MODIFIER_VALUE' = 'INVALID_ATTRIBUTE_VALUE'
  ) {
    super(
      code,
      `Invalid value ${JSON.stringify(value)} for attribute "${attribute}" ` +
        `of component "${component}". Expected one of: ${formatAllowed(allowed)}.`
    );
    this.name = 'InvalidAttributeValueError';
    Object.setPrototypeOf(this, InvalidAttributeValueError.prototype);
  }
}

export class InvalidModifierValueError extends InvalidAttributeValueError {
  constructor(
    component: string,
    attribute: string,
    value: string | null,
    allowed: readonly (string | null)[]
  ) {
    super(component, attribute, value, allowed, 'INVALID_MODIFIER_VALUE');
    this.name = 'InvalidModifierValueError';
    Object.setPrototypeOf(this, InvalidModifierValueError.prototype);
  }
}

export class InvalidAttributeTypeError extends WidgetError {
  constructor(
    readonly component: string,
    readonly attribute: string,
    readonly expected: string,
    readonly received: string
  ) {
    super(
      'INVALID_ATTRIBUTE_TYPE',
      `Attribute "${attribute}" of component "${component}" expects ${expected}, got ${received}.`
    );
    this.name = 'InvalidAttributeTypeError';
    Object.setPrototypeOf(this, InvalidAttributeTypeError.prototype);
  }
}

export class MissingLabelError extends WidgetError {
  constructor(
    readonly component: string,
    example: string
  ) {
    super(
      'MISSING_LABEL',
      `The ${component} component requires either a "label" or a "labelledby" attribute. ` +
        `Example: label="${example}"`
    );
    this.name = 'MissingLabelError';
    Object.setPrototypeOf(this, MissingLabelError.prototype);
  }
}

export class EmptyCollectionError extends WidgetError {
  constructor(
    readonly component: string,
    readonly collection: string
  ) {
    super(
      'EMPTY_COLLECTION',
      `Component "${component}" requires at least one "${collection}" entry.`
    );
    this.name = 'EmptyCollectionError';
    Object.setPrototypeOf(this, EmptyCollectionError.prototype);
  }
}

export class InvalidCommandError extends WidgetError {
  constructor(detail: string) {
    super('INVALID_COMMAND', `Invalid command sequence: ${detail}`);
    this.name = 'InvalidCommandError';
    Object.setPrototypeOf(this, InvalidCommandError.prototype);
  }
}
