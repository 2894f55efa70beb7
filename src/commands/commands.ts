/**
 * Interaction commands
 *
 * A small instruction set for client-side state toggles. Templates build a
 * `CommandSequence`, serialize it onto an element (`data-on-click`), and an
 * external client runtime executes it when the element is activated.
 *
 * Execution semantics (owned by the client runtime):
 * - `toggle_attr`: if the attribute equals `on`, set it to `off`; otherwise
 *   set it to `on`. Two states only.
 * - `toggle_class`: flip the presence of the class.
 * Both are their own inverse, so running a sequence twice restores the
 * original state.
 */

import { InvalidCommandError } from '../common/errors';

/** Element id of the target, or `null` for the element carrying the sequence. */
export type CommandTarget = string | null;

export interface ToggleAttributeInstruction {
  readonly op: 'toggle_attr';
  readonly to: CommandTarget;
  readonly attr: string;
  readonly on: string;
  readonly off: string;
}

export interface ToggleClassInstruction {
  readonly op: 'toggle_class';
  readonly to: CommandTarget;
  readonly className: string;
}

export type Instruction = ToggleAttributeInstruction | ToggleClassInstruction;

/** Wire form of one instruction: `[op, params]`. */
export type WireCommand =
  | ['toggle_attr', { to?: string; attr: [string, string, string] }]
  | ['toggle_class', { to?: string; names: [string] }];

function checkTarget(to: CommandTarget): void {
  if (to !== null && (to === '' || /\s/.test(to))) {
    throw new InvalidCommandError(
      `target must be null or an element id without whitespace, got ${JSON.stringify(to)}`
    );
  }
}

function checkName(kind: string, name: string): void {
  if (!name || /\s/.test(name)) {
    throw new InvalidCommandError(
      `${kind} must be a non-empty name without whitespace, got ${JSON.stringify(name)}`
    );
  }
}

export function toggleAttribute(
  targetId: CommandTarget,
  attributeName: string,
  onValue: string,
  offValue: string
): ToggleAttributeInstruction {
  checkTarget(targetId);
  checkName('attribute', attributeName);
  const instruction: ToggleAttributeInstruction = {
    op: 'toggle_attr',
    to: targetId,
    attr: attributeName,
    on: onValue,
    off: offValue,
  };
  return Object.freeze(instruction);
}

export function toggleClass(
  targetId: CommandTarget,
  className: string
): ToggleClassInstruction {
  checkTarget(targetId);
  checkName('class', className);
  const instruction: ToggleClassInstruction = {
    op: 'toggle_class',
    to: targetId,
    className,
  };
  return Object.freeze(instruction);
}

function toWire(instruction: Instruction): WireCommand {
  const to = instruction.to === null ? {} : { to: `#${instruction.to}` };
  if (instruction.op === 'toggle_attr') {
    return [
      'toggle_attr',
      { ...to, attr: [instruction.attr, instruction.on, instruction.off] },
    ];
  }
  return ['toggle_class', { ...to, names: [instruction.className] }];
}

/**
 * An immutable, ordered list of instructions. Composition never reorders:
 * `a.append(x)` runs `a` then `x`, `a.concat(b)` runs `a` then `b`.
 */
export class CommandSequence {
  static readonly empty = new CommandSequence([]);

  readonly instructions: readonly Instruction[];

  private constructor(instructions: readonly Instruction[]) {
    this.instructions = Object.freeze([...instructions]);
    Object.freeze(this);
  }

  static of(...instructions: Instruction[]): CommandSequence {
    return instructions.length === 0
      ? CommandSequence.empty
      : new CommandSequence(instructions);
  }

  get length(): number {
    return this.instructions.length;
  }

  append(instruction: Instruction): CommandSequence {
    return new CommandSequence([...this.instructions, instruction]);
  }

  concat(other: CommandSequence): CommandSequence {
    if (other.length === 0) return this;
    if (this.length === 0) return other;
    return new CommandSequence([...this.instructions, ...other.instructions]);
  }

  toJSON(): WireCommand[] {
    return this.instructions.map(toWire);
  }

  /** The wire JSON attached to markup. */
  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}

/** Build a sequence from instructions, in order. */
export function commands(...instructions: Instruction[]): CommandSequence {
  return CommandSequence.of(...instructions);
}

export function serialize(sequence: CommandSequence): string {
  return sequence.toString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseTarget(params: Record<string, unknown>): CommandTarget {
  const to = params.to;
  if (to === undefined) return null;
  if (typeof to !== 'string' || !to.startsWith('#')) {
    throw new InvalidCommandError(`"to" must be an id selector, got ${JSON.stringify(to)}`);
  }
  return to.slice(1);
}

function isStringTuple(value: unknown, length: number): value is string[] {
  return (
    Array.isArray(value) &&
    value.length === length &&
    value.every((v) => typeof v === 'string')
  );
}

function parseInstruction(entry: unknown, index: number): Instruction {
  if (!Array.isArray(entry) || entry.length !== 2) {
    throw new InvalidCommandError(`entry ${index} is not an [op, params] pair`);
  }
  const op: unknown = entry[0];
  const params: unknown = entry[1];
  if (!isRecord(params)) {
    throw new InvalidCommandError(`entry ${index} has no params object`);
  }
  const to = parseTarget(params);

  if (op === 'toggle_attr' && isStringTuple(params.attr, 3)) {
    const [attr, on, off] = params.attr;
    return toggleAttribute(to, attr, on, off);
  }
  if (op === 'toggle_class' && isStringTuple(params.names, 1)) {
    return toggleClass(to, params.names[0]);
  }
  throw new InvalidCommandError(`entry ${index} has unknown op or malformed params`);
}

/** Parse wire JSON back into a sequence. */
export function parseCommands(json: string): CommandSequence {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new InvalidCommandError(
      `not valid JSON (${err instanceof Error ? err.message : String(err)})`
    );
  }
  if (!Array.isArray(raw)) {
    throw new InvalidCommandError('expected a JSON array');
  }
  return CommandSequence.of(...raw.map(parseInstruction));
}
