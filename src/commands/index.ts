export {
  CommandSequence,
  commands,
  parseCommands,
  serialize,
  toggleAttribute,
  toggleClass,
} from './commands';
export type {
  CommandTarget,
  Instruction,
  ToggleAttributeInstruction,
  ToggleClassInstruction,
  WireCommand,
} from './commands';
