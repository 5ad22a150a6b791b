import { describe, expect, it } from 'vitest';
import { createSession, input, rowShapes } from './FakeTerminal.js';

describe('ReadLineSession', () => {
  describe('prepare', () => {
    it('splits the prompt into fixed lines above the input line', () => {
      const { session } = createSession({ prompt: 'Name?\r\nAge?\n> ' });
      expect(session.lines.map((line) => line.promptText)).toEqual(['Name?', 'Age?', '> ']);
      expect(session.lines.map((line) => line.isInput)).toEqual([false, false, true]);
      expect(session.lines.map((line) => line.top)).toEqual([0, 1, 2]);
      expect(session.firstInputIndex).toBe(2);
      expect(session.location.lineIndex).toBe(2);
    });
  });

  describe('single line', () => {
    it('returns the typed text on Enter', () => {
      const { session } = createSession();
      expect(input(session, 'hello', 'enter')).toBe('hello');
    });

    it('keeps editing when Enter is pressed on empty input', () => {
      const { terminal, session } = createSession();
      terminal.takeOutput();
      expect(input(session, '', 'enter')).toBeUndefined();
      expect(terminal.takeOutput()).toBe('');
      expect(session.lines).toHaveLength(1);
      expect(session.mode).toBe('singleline');
      expect(session.location.arrayPosition).toBe(2);
    });

    it('accepts empty input when allowed', () => {
      const { session } = createSession({ allowEmptyLineInput: true });
      expect(input(session, '', 'enter')).toBe('');
    });
  });

  describe('maximum length', () => {
    it('truncates a paste to the remaining capacity', () => {
      const { session } = createSession({ maxInputLength: 5 });
      input(session, 'abcdef');
      expect(session.lines[0].inputText).toBe('abcde');
    });

    it('ignores keys once the input is full', () => {
      const { session } = createSession({ maxInputLength: 5 });
      for (const ch of 'abcdef') {
        input(session, ch);
      }
      expect(session.lines[0].inputText).toBe('abcde');
      expect(session.remainingCapacity()).toBe(0);
    });

    it('does not split a surrogate pair at the limit', () => {
      const { session } = createSession({ maxInputLength: 3 });
      input(session, 'ab😀');
      expect(session.lines[0].inputText).toBe('ab');
    });

    it('counts the newline between lines', () => {
      const { session } = createSession({ maxInputLength: 6 });
      input(session, '"""a', 'enter');
      expect(session.inputLength()).toBe(5);
      input(session, 'bcd');
      expect(session.lines[1].inputText).toBe('b');
    });
  });

  describe('delimiter mode', () => {
    it('collects lines until the closing delimiter and keeps the delimiters in the text', () => {
      const { session } = createSession();
      expect(input(session, '"""a', 'enter')).toBeUndefined();
      expect(session.mode).toBe('delimiter');
      expect(session.lines).toHaveLength(2);
      expect(session.lines[1].promptText).toBe('# ');

      expect(input(session, 'b', 'enter')).toBeUndefined();
      expect(session.lines).toHaveLength(3);

      expect(input(session, 'c"""', 'enter')).toBe('"""a\nb\nc"""');
      expect(session.mode).toBe('singleline');
    });

    it('returns at once when the delimiter opens and closes on one line', () => {
      const { session } = createSession();
      expect(input(session, '"""a"""', 'enter')).toBe('"""a"""');
    });

    it('does not add a line for Enter on an empty last line', () => {
      const { session } = createSession();
      input(session, '"""', 'enter');
      expect(input(session, '', 'enter')).toBeUndefined();
      expect(session.lines).toHaveLength(2);
    });

    it('moves to the next line when Enter is pressed on an earlier one', () => {
      const { session } = createSession();
      input(session, '"""a', 'enter');
      input(session, 'b');
      input(session, '', 'up');
      expect(session.location.lineIndex).toBe(0);
      expect(input(session, '', 'enter')).toBeUndefined();
      expect(session.location.lineIndex).toBe(1);
      expect(session.location.arrayPosition).toBe(2);
      expect(session.lines).toHaveLength(2);
    });

    it('removes an empty line on Backspace and returns to single-line mode', () => {
      const { session } = createSession();
      input(session, '"""', 'enter');
      input(session, '', 'backspace');
      expect(session.lines).toHaveLength(1);
      expect(session.mode).toBe('singleline');
      expect(session.location.lineIndex).toBe(0);
      expect(session.location.arrayPosition).toBe(5);
    });

    it('is off when no delimiter is set', () => {
      const { session } = createSession({ multilineDelimiter: null });
      expect(input(session, '"""a', 'enter')).toBe('"""a');
    });
  });

  describe('line continuation', () => {
    it('stitches continued lines without the continuation characters', () => {
      const { session } = createSession({ lineContinuation: '\\' });
      expect(input(session, 'A\\', 'enter')).toBeUndefined();
      expect(session.mode).toBe('lineContinuation');
      expect(input(session, 'B\\', 'enter')).toBeUndefined();
      expect(input(session, 'C', 'enter')).toBe('ABC');
      expect(session.mode).toBe('singleline');
    });
  });

  describe('painting', () => {
    it('paints the prompt and leaves the caret after it', () => {
      const { terminal, screen } = createSession({}, 20, 5);
      expect(terminal.takeOutput()).toBe('\x1b[?25l> \x1b[K\x1b[?25h');
      expect(screen.cursor).toEqual({ left: 2, top: 0 });
    });

    it('paints typed input in the input colour', () => {
      const { terminal, session } = createSession({}, 20, 5);
      terminal.takeOutput();
      input(session, 'ab');
      expect(terminal.takeOutput()).toBe('\x1b[?25l\x1b[33mab\x1b[0m\x1b[K\x1b[?25h');
    });

    it('draws the masking character instead of the input', () => {
      const { terminal, session } = createSession({ maskingCharacter: '*' }, 20, 5);
      terminal.takeOutput();
      input(session, 'pw');
      expect(terminal.takeOutput()).toBe('\x1b[?25l\x1b[33m**\x1b[0m\x1b[K\x1b[?25h');
      expect(session.lines[0].inputText).toBe('pw');
    });

    it('moves to the new row after filling one', () => {
      const { terminal, screen, session } = createSession({}, 10, 5);
      terminal.takeOutput();
      input(session, 'abcdefgh');
      expect(terminal.takeOutput()).toBe('\x1b[?25l\x1b[33mabcdefgh\x1b[0m\x1b[2;1H\x1b[K\x1b[?25h');
      expect(screen.cursor).toEqual({ left: 0, top: 1 });
    });

    it('repaints every row that units moved into', () => {
      const { terminal, session } = createSession({ prompt: '', inputColor: 'default' }, 4, 5);
      input(session, 'abc中de');
      expect(rowShapes(session)).toEqual([
        { start: 0, length: 3, width: 3 },
        { start: 3, length: 3, width: 4 },
        { start: 6, length: 0, width: 0 },
      ]);
      input(session, '', 'home');
      session.location.setPosition(3);
      terminal.takeOutput();

      input(session, 'xy');

      expect(rowShapes(session)).toEqual([
        { start: 0, length: 4, width: 4 },
        { start: 4, length: 3, width: 4 },
        { start: 7, length: 1, width: 1 },
      ]);
      expect(terminal.takeOutput()).toBe('\x1b[?25l\x1b[1;4Hx\x1b[2;1Hy中d\x1b[3;1He\x1b[K\x1b[2;2H\x1b[?25h');
    });

    it('scrolls the window when the input grows past the last row', () => {
      const { terminal, screen, session } = createSession({ prompt: 'Title\n> ', inputColor: 'default' }, 10, 2);
      terminal.takeOutput();
      input(session, 'abcdefgh');
      expect(terminal.takeOutput()).toBe('\x1b[?25l\x1b[1S\x1b[1;3Habcdefgh\x1b[2;1H\x1b[K\x1b[?25h');
      expect(session.lines.map((line) => line.top)).toEqual([-1, 0]);
      expect(screen.cursor).toEqual({ left: 0, top: 1 });
    });
  });

  describe('finish', () => {
    it('moves the cursor below the input', () => {
      const { terminal, screen, session } = createSession({}, 10, 5);
      input(session, 'abcdefghijk');
      terminal.takeOutput();
      session.finish();
      expect(terminal.takeOutput()).toBe('\x1b[2;1H\r\n');
      expect(screen.cursor).toEqual({ left: 0, top: 2 });
    });
  });
});
