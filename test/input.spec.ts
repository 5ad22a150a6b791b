import { describe, expect, it } from 'vitest';
import { type DecodeOptions, decodeKeys, describeKey, isCharacterKey, type KeyEvent } from '../src/input.js';

const plainKey = (key: KeyEvent['key'], char = ''): KeyEvent => ({ key, char, shift: false, alt: false, ctrl: false });

function single(data: string, options: DecodeOptions = {}): KeyEvent {
  const keys = decodeKeys(data, options);
  expect(keys).toHaveLength(1);
  return keys[0];
}

describe('decodeKeys', () => {
  describe('plain characters', () => {
    it('decodes printable characters one key each', () => {
      expect(decodeKeys('ab')).toEqual([plainKey('char', 'a'), plainKey('char', 'b')]);
    });

    it('keeps a surrogate pair together', () => {
      expect(decodeKeys('😀')).toEqual([plainKey('char', '😀')]);
    });

    it('decodes CR LF as a single Enter', () => {
      expect(decodeKeys('\r\n')).toEqual([plainKey('enter')]);
    });

    it('decodes LF as Enter', () => {
      expect(single('\n').key).toBe('enter');
    });

    it('decodes DEL and BS as Backspace', () => {
      expect(single('\x7f').key).toBe('backspace');
      expect(single('\b').key).toBe('backspace');
    });

    it('decodes Tab', () => {
      expect(single('\t').key).toBe('tab');
    });
  });

  describe('control characters', () => {
    it('decodes Ctrl+letter', () => {
      expect(single('\x15')).toEqual({ key: 'char', char: 'u', shift: false, alt: false, ctrl: true });
    });

    it('decodes Ctrl+2 and Ctrl+4', () => {
      expect(single('\x00')).toMatchObject({ char: '2', ctrl: true });
      expect(single('\x1c')).toMatchObject({ char: '4', ctrl: true });
    });
  });

  describe('escape sequences', () => {
    it('decodes CSI arrows', () => {
      expect(decodeKeys('\x1b[A\x1b[B\x1b[C\x1b[D').map((k) => k.key)).toEqual(['up', 'down', 'right', 'left']);
    });

    it('decodes SS3 keys', () => {
      expect(single('\x1bOH').key).toBe('home');
      expect(single('\x1bOP').key).toBe('f1');
    });

    it('decodes xterm modifier parameters', () => {
      expect(single('\x1b[1;5C')).toEqual({ key: 'right', char: '', shift: false, alt: false, ctrl: true });
      expect(single('\x1b[3;2~')).toMatchObject({ key: 'delete', shift: true, ctrl: false });
      expect(single('\x1b[1;4A')).toMatchObject({ key: 'up', shift: true, alt: true });
    });

    it('decodes VT numeric keys', () => {
      expect(decodeKeys('\x1b[2~\x1b[3~\x1b[5~\x1b[6~\x1b[15~\x1b[24~').map((k) => k.key)).toEqual(['insert', 'delete', 'pageUp', 'pageDown', 'f5', 'f12']);
    });

    it('decodes rxvt modifier suffixes', () => {
      expect(single('\x1b[5^')).toMatchObject({ key: 'pageUp', ctrl: true, shift: false });
      expect(single('\x1b[2$')).toMatchObject({ key: 'insert', ctrl: false, shift: true });
      expect(single('\x1b[3@')).toMatchObject({ key: 'delete', ctrl: true, shift: true });
    });

    it('decodes rxvt shifted and ctrl arrows', () => {
      expect(single('\x1b[a')).toMatchObject({ key: 'up', shift: true });
      expect(single('\x1bOd')).toMatchObject({ key: 'left', ctrl: true });
    });

    it('decodes Linux console function keys', () => {
      expect(single('\x1b[[C').key).toBe('f3');
    });

    it('reads CSI M as Enter unless SCO letters are on', () => {
      expect(single('\x1b[M').key).toBe('enter');
      expect(single('\x1b[M', { sco: true }).key).toBe('f1');
      expect(single('\x1b[X', { sco: true }).key).toBe('f12');
    });
  });

  describe('alt prefix', () => {
    it('decodes ESC followed by a character as Alt', () => {
      expect(single('\x1bx')).toEqual({ key: 'char', char: 'x', shift: false, alt: true, ctrl: false });
    });

    it('decodes ESC before a sequence as Alt', () => {
      expect(single('\x1b\x1b[A')).toMatchObject({ key: 'up', alt: true });
    });
  });

  describe('incomplete or unknown sequences', () => {
    it('decodes a lone ESC as Escape', () => {
      expect(single('\x1b').key).toBe('escape');
    });

    it('falls back to Escape and characters for an unknown code', () => {
      expect(decodeKeys('\x1b[9~').map((k) => k.key === 'char' ? k.char : k.key)).toEqual(['escape', '[', '9', '~']);
    });

    it('falls back for a truncated CSI', () => {
      expect(decodeKeys('\x1b[')).toEqual([plainKey('escape'), plainKey('char', '[')]);
    });
  });

  it('treats ESC as an ordinary key in plain mode', () => {
    expect(decodeKeys('\x1b[A', { plain: true })).toEqual([plainKey('escape'), plainKey('char', '['), plainKey('char', 'A')]);
  });
});

describe('isCharacterKey', () => {
  it('accepts printable characters', () => {
    expect(isCharacterKey(plainKey('char', 'a'))).toBe(true);
    expect(isCharacterKey(plainKey('char', '😀'))).toBe(true);
  });

  it('rejects modified characters and named keys', () => {
    expect(isCharacterKey(single('\x15'))).toBe(false);
    expect(isCharacterKey(single('\x1bx'))).toBe(false);
    expect(isCharacterKey(plainKey('enter'))).toBe(false);
  });
});

describe('describeKey', () => {
  it('lists modifiers before the key', () => {
    expect(describeKey(single('\x1b[1;6D'))).toBe('ctrl+shift+left');
    expect(describeKey(single('\x15'))).toBe('ctrl+"u"');
  });
});
