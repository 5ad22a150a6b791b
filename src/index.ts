export { type ConsoleConfig, generateJsonSchema, initConfig, loadConsoleConfig } from './console-config.js';
export { type DecodeOptions, decodeKeys, describeKey, isCharacterKey, type KeyEvent, type KeyName } from './input.js';
export {
  colorSequence,
  type InputColor,
  type KeyInputHook,
  type KeyInputResult,
  type ReadLineOptions,
  type ReadLineOptionsInput,
  resolveReadLineOptions,
  type TextInputHook,
} from './options.js';
export { type InputResult, PromptConsole, type PromptConsoleOptions } from './PromptConsole.js';
export {
  type CursorPosition,
  NodeTerminal,
  type NodeTerminalOptions,
  type TerminalDevice,
  type TerminalInput,
  type TerminalOutput,
  type WindowSize,
} from './terminal.js';
export { TraceWriter } from './TraceWriter.js';
export { charWidth, stringWidth } from './width.js';
