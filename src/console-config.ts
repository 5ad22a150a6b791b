import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { readLineOptionsSchema } from './options.js';

const consoleConfigSchema = z
  .object({
    $schema: z.string().optional().describe('JSON Schema reference for editor autocomplete'),
    defaults: readLineOptionsSchema.optional().default(readLineOptionsSchema.parse({})).catch(readLineOptionsSchema.parse({})).describe('Options applied to every read unless the caller overrides them'),
    pollIntervalMs: z.int().min(1).max(1000).optional().default(10).catch(10).describe('Delay in milliseconds between polls for keys while no input is waiting'),
    inputQueueCapacity: z.int().min(1).optional().default(256).catch(256).describe('Maximum number of injected inputs waiting to be read'),
    traceFile: z.string().min(1).nullable().optional().default(null).catch(null).describe('File that terminal failures and session events are appended to as JSON lines. Set to null to disable.'),
  })
  .meta({ title: 'Prompt Console Configuration', description: 'Configuration for prompt-console' });

export type ConsoleConfig = Omit<z.infer<typeof consoleConfigSchema>, '$schema'>;

export const CONFIG_PATH = resolve(homedir(), '.prompt-console', 'config.json');

const SCHEMA_FILE = 'prompt-console.schema.json';

const STRIP_KEYS = new Set(['required', 'additionalProperties']);

function cleanSchema(obj: unknown, isRoot = false): unknown {
  if (Array.isArray(obj)) {
    return obj.map((item) => cleanSchema(item));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (key === 'maximum' && value === Number.MAX_SAFE_INTEGER) {
        continue;
      }
      if (isRoot && STRIP_KEYS.has(key)) {
        continue;
      }
      result[key] = cleanSchema(value);
    }
    return result;
  }
  return obj;
}

export function generateJsonSchema(): unknown {
  return cleanSchema(consoleConfigSchema.toJSONSchema({ target: 'draft-07' }), true);
}

/** @private Exported for testing only. */
export function parseConsoleConfig(raw: unknown): ConsoleConfig {
  const { $schema: _schema, ...config } = consoleConfigSchema.parse(raw);
  return config;
}

export function loadConsoleConfig(path: string = CONFIG_PATH): { config: ConsoleConfig; warnings: string[]; path: string | null } {
  const defaults = parseConsoleConfig({});

  if (!existsSync(path)) {
    return { config: defaults, warnings: [], path: null };
  }

  try {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    return { config: parseConsoleConfig(raw), warnings: [], path };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { config: defaults, warnings: [`Failed to parse ${path}: ${reason}`], path };
  }
}

export function initConfig(log: (msg: string) => void, path: string = CONFIG_PATH): void {
  if (existsSync(path)) {
    log(`Config already exists at ${path}`);
    return;
  }

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const defaults = parseConsoleConfig({});
  const content = JSON.stringify(
    {
      $schema: `./${SCHEMA_FILE}`,
      defaults: defaults.defaults,
      pollIntervalMs: defaults.pollIntervalMs,
      inputQueueCapacity: defaults.inputQueueCapacity,
      traceFile: defaults.traceFile,
    },
    null,
    2,
  );

  writeFileSync(path, `${content}\n`);
  writeFileSync(resolve(dir, SCHEMA_FILE), `${JSON.stringify(generateJsonSchema(), null, 2)}\n`);
  log(`Created config at ${path}`);
}
