#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { CONFIG_PATH, generateJsonSchema, initConfig, loadConsoleConfig } from './console-config.js';
import { printHelp, printUsage, printVersion } from './help.js';
import type { KeyEvent } from './input.js';
import type { KeyInputResult } from './options.js';
import { PromptConsole } from './PromptConsole.js';
import { NodeTerminal } from './terminal.js';

const { values } = parseArgs({
  options: {
    config: { type: 'string', short: 'c' },
    version: { type: 'boolean', short: 'v', default: false },
    help: { type: 'boolean', short: 'h', default: false },
    'init-config': { type: 'boolean', default: false },
    'print-schema': { type: 'boolean', default: false },
  },
  strict: false,
});

const configPath = typeof values.config === 'string' ? values.config : CONFIG_PATH;

if (values.version) {
  // biome-ignore lint/suspicious/noConsole: CLI --version output before app starts
  printVersion(console.log);
  process.exit(0);
}

if (values.help || process.argv.includes('-?')) {
  // biome-ignore lint/suspicious/noConsole: CLI --help output before app starts
  printUsage(console.log);
  process.exit(0);
}

if (values['init-config']) {
  // biome-ignore lint/suspicious/noConsole: CLI --init-config output before app starts
  initConfig(console.log, configPath);
  process.exit(0);
}

if (values['print-schema']) {
  // biome-ignore lint/suspicious/noConsole: CLI --print-schema output before app starts
  console.log(JSON.stringify(generateJsonSchema(), null, 2));
  process.exit(0);
}

const { config, warnings } = loadConsoleConfig(configPath);
const terminal = new NodeTerminal();
const prompt = PromptConsole.fromConfig(terminal, config);
terminal.start();

for (const warning of warnings) {
  await prompt.log(`\x1b[33m${warning}\x1b[0m`);
}

const pending: Promise<unknown>[] = [];
const openNested = (): void => {
  pending.push(
    prompt.readLine({ prompt: 'nested> ', inputColor: 'cyan' }).then((result) => prompt.log(`nested: ${result.type === 'success' ? result.text : result.type}`)),
  );
};

const keyInputHook = (key: KeyEvent): KeyInputResult => {
  if (key.ctrl && key.key === 'char' && key.char === 'd') {
    prompt.terminate();
    return 'handled';
  }
  if (key.ctrl && key.key === 'char' && key.char === 'n') {
    openNested();
    return 'handled';
  }
  return 'notHandled';
};

for (;;) {
  const result = await prompt.readLine({ lineContinuation: '\\', cancelOnEscape: true, keyInputHook });
  if (result.type === 'terminated') {
    break;
  }
  if (result.type === 'canceled') {
    await prompt.log('canceled');
    continue;
  }
  const text = result.text.trim();
  if (text === 'exit') {
    break;
  }
  if (text === 'help') {
    for (const line of collect(printHelp)) {
      await prompt.writeLine(line);
    }
    continue;
  }
  if (text === 'secret') {
    const secret = await prompt.readLine({ prompt: 'secret: ', maskingCharacter: '*' });
    await prompt.log(secret.type === 'success' ? `read ${secret.text.length} characters` : secret.type);
    continue;
  }
  await prompt.log('echo:', result.text);
}

await Promise.all(pending);
terminal.stop();

function collect(print: (log: (msg: string) => void) => void): string[] {
  const lines: string[] = [];
  print((msg) => lines.push(msg));
  return lines;
}
