import { z } from 'zod';
import type { KeyEvent } from './input.js';

export const INPUT_COLORS = ['default', 'black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white', 'gray'] as const;

export type InputColor = (typeof INPUT_COLORS)[number];

const COLOR_CODES: Record<InputColor, number | null> = {
  default: null,
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
  gray: 90,
};

export function colorSequence(color: InputColor): string {
  const code = COLOR_CODES[color];
  return code === null ? '' : `\x1B[${code}m`;
}

export const readLineOptionsSchema = z
  .object({
    inputColor: z.enum(INPUT_COLORS).optional().default('yellow').catch('yellow').describe('Foreground colour of typed input'),
    maxInputLength: z.int().min(1).optional().default(65_536).catch(65_536).describe('Maximum input length in UTF-16 units, counting the newlines between lines'),
    prompt: z.string().optional().default('> ').catch('> ').describe('Prompt shown before the input; line breaks split it into fixed lines above the input line'),
    multilinePrompt: z.string().optional().default('# ').catch('# ').describe('Prompt shown before each additional line of multi-line input'),
    multilineDelimiter: z.string().min(1).nullable().optional().default('"""').catch('"""').describe('Token that opens and closes multi-line input. Set to null to disable.'),
    lineContinuation: z.string().length(1).nullable().optional().default(null).catch(null).describe('Trailing character that continues input on a new line. Set to null to disable.'),
    cancelOnEscape: z.boolean().optional().default(false).catch(false).describe('Cancel the read when Escape is pressed'),
    allowEmptyLineInput: z.boolean().optional().default(false).catch(false).describe('Accept Enter when nothing has been typed'),
    maskingCharacter: z.string().max(1).optional().default('').catch('').describe('Character drawn in place of each column of input. Empty disables masking.'),
  })
  .meta({ title: 'Read line options', description: 'Options for a single read' });

export type KeyInputResult = 'notHandled' | 'handled' | 'cancel';

/** Runs before a key is applied; `handled` skips it, `cancel` ends the read as canceled. */
export type KeyInputHook = (key: KeyEvent) => KeyInputResult;

/** Runs on the assembled text; return the text to accept (possibly changed) or null to keep editing. */
export type TextInputHook = (text: string) => string | null;

export interface ReadLineHooks {
  keyInputHook?: KeyInputHook;
  textInputHook?: TextInputHook;
}

export type ReadLineSettings = z.infer<typeof readLineOptionsSchema>;

export type ReadLineOptions = ReadLineSettings & ReadLineHooks;

export type ReadLineOptionsInput = Partial<ReadLineSettings> & ReadLineHooks;

/** Fills in defaults; invalid values fall back to their defaults. */
export function resolveReadLineOptions(input: ReadLineOptionsInput = {}): ReadLineOptions {
  const { keyInputHook, textInputHook, ...settings } = input;
  return { ...readLineOptionsSchema.parse(settings), keyInputHook, textInputHook };
}
