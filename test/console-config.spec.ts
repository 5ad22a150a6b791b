import { existsSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { generateJsonSchema, initConfig, loadConsoleConfig, parseConsoleConfig } from '../src/console-config.js';

const DEFAULT_READ_OPTIONS = {
  inputColor: 'yellow',
  maxInputLength: 65_536,
  prompt: '> ',
  multilinePrompt: '# ',
  multilineDelimiter: '"""',
  lineContinuation: null,
  cancelOnEscape: false,
  allowEmptyLineInput: false,
  maskingCharacter: '',
};

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'prompt-console-config-'));
}

describe('parseConsoleConfig', () => {
  describe('defaults', () => {
    it('returns defaults for empty object', () => {
      const config = parseConsoleConfig({});
      expect(config).toEqual({
        defaults: DEFAULT_READ_OPTIONS,
        pollIntervalMs: 10,
        inputQueueCapacity: 256,
        traceFile: null,
      });
    });

    it('throws for undefined input', () => {
      expect(() => parseConsoleConfig(undefined)).toThrow();
    });

    it('drops $schema', () => {
      const config = parseConsoleConfig({ $schema: './prompt-console.schema.json' });
      expect(config).not.toHaveProperty('$schema');
    });
  });

  describe('overrides', () => {
    it('overrides pollIntervalMs', () => {
      const config = parseConsoleConfig({ pollIntervalMs: 25 });
      expect(config.pollIntervalMs).toBe(25);
    });

    it('overrides inputQueueCapacity', () => {
      const config = parseConsoleConfig({ inputQueueCapacity: 8 });
      expect(config.inputQueueCapacity).toBe(8);
    });

    it('overrides traceFile', () => {
      const config = parseConsoleConfig({ traceFile: '/tmp/trace.jsonl' });
      expect(config.traceFile).toBe('/tmp/trace.jsonl');
    });

    it('fills the rest of partial read defaults', () => {
      const config = parseConsoleConfig({ defaults: { prompt: '$ ', cancelOnEscape: true } });
      expect(config.defaults).toEqual({ ...DEFAULT_READ_OPTIONS, prompt: '$ ', cancelOnEscape: true });
    });
  });

  describe('catch fallback on invalid values', () => {
    it('falls back pollIntervalMs on wrong type', () => {
      const config = parseConsoleConfig({ pollIntervalMs: 'fast' });
      expect(config.pollIntervalMs).toBe(10);
    });

    it('falls back pollIntervalMs above the maximum', () => {
      const config = parseConsoleConfig({ pollIntervalMs: 5000 });
      expect(config.pollIntervalMs).toBe(10);
    });

    it('falls back inputQueueCapacity on zero', () => {
      const config = parseConsoleConfig({ inputQueueCapacity: 0 });
      expect(config.inputQueueCapacity).toBe(256);
    });

    it('falls back traceFile on empty string', () => {
      const config = parseConsoleConfig({ traceFile: '' });
      expect(config.traceFile).toBeNull();
    });

    it('falls back a single invalid read default', () => {
      const config = parseConsoleConfig({ defaults: { inputColor: 'purple', prompt: '$ ' } });
      expect(config.defaults.inputColor).toBe('yellow');
      expect(config.defaults.prompt).toBe('$ ');
    });
  });
});

describe('generateJsonSchema', () => {
  it('describes every option without required keys at the root', () => {
    const schema = generateJsonSchema();
    expect(schema).toMatchObject({
      title: 'Prompt Console Configuration',
      properties: {
        defaults: expect.any(Object),
        pollIntervalMs: expect.any(Object),
        inputQueueCapacity: expect.any(Object),
        traceFile: expect.any(Object),
      },
    });
    expect(schema).not.toHaveProperty('required');
  });
});

describe('loadConsoleConfig', () => {
  it('returns defaults when the file is missing', () => {
    const result = loadConsoleConfig(join(tempDir(), 'config.json'));
    expect(result.path).toBeNull();
    expect(result.warnings).toEqual([]);
    expect(result.config.pollIntervalMs).toBe(10);
  });

  it('reads the file', () => {
    const path = join(tempDir(), 'config.json');
    writeFileSync(path, JSON.stringify({ pollIntervalMs: 50, defaults: { maskingCharacter: '*' } }));
    const result = loadConsoleConfig(path);
    expect(result.path).toBe(path);
    expect(result.config.pollIntervalMs).toBe(50);
    expect(result.config.defaults.maskingCharacter).toBe('*');
  });

  it('warns and uses defaults for invalid JSON', () => {
    const path = join(tempDir(), 'config.json');
    writeFileSync(path, '{ not json');
    const result = loadConsoleConfig(path);
    expect(result.config).toEqual(parseConsoleConfig({}));
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].startsWith(`Failed to parse ${path}: `)).toBe(true);
  });
});

describe('initConfig', () => {
  it('writes the config and its schema beside it', () => {
    const dir = join(tempDir(), 'nested');
    const path = join(dir, 'config.json');
    const messages: string[] = [];

    initConfig((msg) => messages.push(msg), path);

    expect(messages).toEqual([`Created config at ${path}`]);
    expect(JSON.parse(readFileSync(path, 'utf8'))).toEqual({
      $schema: './prompt-console.schema.json',
      defaults: DEFAULT_READ_OPTIONS,
      pollIntervalMs: 10,
      inputQueueCapacity: 256,
      traceFile: null,
    });
    expect(existsSync(join(dir, 'prompt-console.schema.json'))).toBe(true);
  });

  it('leaves an existing config alone', () => {
    const path = join(tempDir(), 'config.json');
    writeFileSync(path, '{}');
    const messages: string[] = [];

    initConfig((msg) => messages.push(msg), path);

    expect(messages).toEqual([`Config already exists at ${path}`]);
    expect(readFileSync(path, 'utf8')).toBe('{}');
  });
});
