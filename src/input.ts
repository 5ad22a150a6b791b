/**
 * Raw terminal input decoder.
 * Turns the characters read from a raw-mode TTY into normalized key events.
 *
 * Handles:
 * - CSI (\x1b[A) and SS3/application mode (\x1bOA) letter sequences
 * - VT numeric sequences (\x1b[3~) with xterm modifier parameters (\x1b[3;5~)
 * - rxvt modifier suffixes (\x1b[3^, \x1b[3$, \x1b[3@)
 * - Linux console function keys (\x1b[[A)
 * - Alt as an ESC prefix, including ESC ESC before a sequence
 * - Ctrl+letter control characters
 */

import { isHighSurrogate, isLowSurrogate } from './width.js';

export type FunctionKey = 'f1' | 'f2' | 'f3' | 'f4' | 'f5' | 'f6' | 'f7' | 'f8' | 'f9' | 'f10' | 'f11' | 'f12';

export type KeyName =
  | 'char'
  | 'enter'
  | 'backspace'
  | 'delete'
  | 'tab'
  | 'escape'
  | 'left'
  | 'right'
  | 'up'
  | 'down'
  | 'home'
  | 'end'
  | 'begin'
  | 'insert'
  | 'pageUp'
  | 'pageDown'
  | FunctionKey;

export interface KeyEvent {
  key: KeyName;
  /** The typed code point for `char` keys (the letter for Ctrl/Alt combinations), empty otherwise. */
  char: string;
  shift: boolean;
  alt: boolean;
  ctrl: boolean;
}

export interface DecodeOptions {
  /** Use the SCO function key letters (\x1b[M .. \x1b[X for F1..F12). */
  sco?: boolean;
  /** Treat ESC as an ordinary key, for input that is not coming from a terminal. */
  plain?: boolean;
}

const ESC = '\x1b';

const XTERM_LETTERS: Record<string, KeyName> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
  E: 'begin',
  F: 'end',
  H: 'home',
  M: 'enter',
  P: 'f1',
  Q: 'f2',
  R: 'f3',
  S: 'f4',
};

const SCO_LETTERS: Record<string, KeyName> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
  F: 'end',
  H: 'home',
  M: 'f1',
  N: 'f2',
  O: 'f3',
  P: 'f4',
  Q: 'f5',
  R: 'f6',
  S: 'f7',
  T: 'f8',
  U: 'f9',
  V: 'f10',
  W: 'f11',
  X: 'f12',
};

// rxvt reports shifted arrows as lowercase CSI letters and ctrl arrows as lowercase SS3 letters
const RXVT_ARROWS: Record<string, KeyName> = {
  a: 'up',
  b: 'down',
  c: 'right',
  d: 'left',
};

const LINUX_FUNCTION_KEYS: Record<string, KeyName> = {
  A: 'f1',
  B: 'f2',
  C: 'f3',
  D: 'f4',
  E: 'f5',
};

const VT_CODES: Record<number, KeyName> = {
  1: 'home',
  2: 'insert',
  3: 'delete',
  4: 'end',
  5: 'pageUp',
  6: 'pageDown',
  7: 'home',
  8: 'end',
  11: 'f1',
  12: 'f2',
  13: 'f3',
  14: 'f4',
  15: 'f5',
  17: 'f6',
  18: 'f7',
  19: 'f8',
  20: 'f9',
  21: 'f10',
  23: 'f11',
  24: 'f12',
};

const CSI_PARAMS = /(\d+)(?:;(\d+))?([~^$@A-Za-z])/y;

interface Decoded {
  event: KeyEvent;
  length: number;
}

function keyEvent(key: KeyName, char = '', modifiers: Partial<Pick<KeyEvent, 'shift' | 'alt' | 'ctrl'>> = {}): KeyEvent {
  return { key, char, shift: modifiers.shift ?? false, alt: modifiers.alt ?? false, ctrl: modifiers.ctrl ?? false };
}

/** xterm modifier parameter: 1 + (shift ? 1 : 0) + (alt ? 2 : 0) + (ctrl ? 4 : 0). */
function applyModifier(event: KeyEvent, parameter: number): void {
  const bits = parameter - 1;
  if (bits <= 0 || bits > 7) {
    return;
  }
  event.shift = event.shift || (bits & 1) !== 0;
  event.alt = event.alt || (bits & 2) !== 0;
  event.ctrl = event.ctrl || (bits & 4) !== 0;
}

function decodeSingle(data: string, index: number): Decoded {
  const code = data.charCodeAt(index);
  switch (code) {
    case 0x0d:
      return { event: keyEvent('enter'), length: data.charCodeAt(index + 1) === 0x0a ? 2 : 1 };
    case 0x0a:
      return { event: keyEvent('enter'), length: 1 };
    case 0x09:
      return { event: keyEvent('tab'), length: 1 };
    case 0x08:
    case 0x7f:
      return { event: keyEvent('backspace'), length: 1 };
    case 0x1b:
      return { event: keyEvent('escape'), length: 1 };
    case 0x00:
      return { event: keyEvent('char', '2', { ctrl: true }), length: 1 };
  }
  if (code < 0x1b) {
    return { event: keyEvent('char', String.fromCharCode(code + 0x60), { ctrl: true }), length: 1 };
  }
  if (code < 0x20) {
    // \x1c..\x1f are what Ctrl+4..Ctrl+7 produce
    return { event: keyEvent('char', String.fromCharCode(code - 0x1c + 0x34), { ctrl: true }), length: 1 };
  }
  if (isHighSurrogate(code) && isLowSurrogate(data.charCodeAt(index + 1))) {
    return { event: keyEvent('char', data.slice(index, index + 2)), length: 2 };
  }
  return { event: keyEvent('char', data[index] ?? ''), length: 1 };
}

function decodeParameters(data: string, index: number): Decoded | undefined {
  CSI_PARAMS.lastIndex = index;
  const match = CSI_PARAMS.exec(data);
  if (!match) {
    return undefined;
  }
  const [text, first, second, final] = match;
  const code = Number(first);
  let event: KeyEvent;
  switch (final) {
    case '~':
    case '^':
    case '$':
    case '@': {
      const key = VT_CODES[code];
      if (!key) {
        return undefined;
      }
      event = keyEvent(key, '', { ctrl: final === '^' || final === '@', shift: final === '$' || final === '@' });
      break;
    }
    default: {
      const key = XTERM_LETTERS[final];
      if (!key) {
        return undefined;
      }
      event = keyEvent(key);
    }
  }
  if (second !== undefined) {
    applyModifier(event, Number(second));
  }
  return { event, length: 2 + text.length };
}

function decodeEscape(data: string, index: number, options: DecodeOptions): Decoded | undefined {
  const intro = data[index + 1];
  if (intro === undefined) {
    return undefined;
  }
  if (intro === '[' || intro === 'O') {
    const next = data[index + 2];
    if (next === undefined) {
      return undefined;
    }
    if (intro === '[' && next === '[') {
      const key = LINUX_FUNCTION_KEYS[data[index + 3] ?? ''];
      return key ? { event: keyEvent(key), length: 4 } : undefined;
    }
    const arrow = RXVT_ARROWS[next];
    if (arrow) {
      return { event: keyEvent(arrow, '', intro === '[' ? { shift: true } : { ctrl: true }), length: 3 };
    }
    const letters = options.sco && intro === '[' ? SCO_LETTERS : XTERM_LETTERS;
    const key = letters[next];
    if (key) {
      return { event: keyEvent(key), length: 3 };
    }
    if (intro === '[' && next >= '0' && next <= '9') {
      return decodeParameters(data, index + 2);
    }
    return undefined;
  }
  if (intro === ESC) {
    const inner = decodeEscape(data, index + 1, options);
    if (!inner) {
      return undefined;
    }
    inner.event.alt = true;
    return { event: inner.event, length: inner.length + 1 };
  }
  const single = decodeSingle(data, index + 1);
  single.event.alt = true;
  return { event: single.event, length: single.length + 1 };
}

export function decodeKeys(data: string, options: DecodeOptions = {}): KeyEvent[] {
  const keys: KeyEvent[] = [];
  let index = 0;
  while (index < data.length) {
    const decoded = (data[index] === ESC && !options.plain ? decodeEscape(data, index, options) : undefined) ?? decodeSingle(data, index);
    keys.push(decoded.event);
    index += decoded.length;
  }
  return keys;
}

/** Printable keys are inserted as text; everything else is a control key. */
export function isCharacterKey(key: KeyEvent): boolean {
  return key.key === 'char' && !key.ctrl && !key.alt && key.char >= ' ';
}

export function describeKey(key: KeyEvent): string {
  const parts: string[] = [];
  if (key.ctrl) {
    parts.push('ctrl');
  }
  if (key.alt) {
    parts.push('alt');
  }
  if (key.shift) {
    parts.push('shift');
  }
  parts.push(key.key === 'char' ? JSON.stringify(key.char) : key.key);
  return parts.join('+');
}
