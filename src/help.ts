import { readFileSync } from 'node:fs';

type Log = (msg: string) => void;

interface PackageInfo {
  name: string;
  version: string;
}

function readPackageInfo(): PackageInfo {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  if (raw !== null && typeof raw === 'object' && 'name' in raw && 'version' in raw && typeof raw.name === 'string' && typeof raw.version === 'string') {
    return { name: raw.name, version: raw.version };
  }
  return { name: 'prompt-console', version: '0.0.0' };
}

export function printVersion(log: Log): void {
  const info = readPackageInfo();
  log(`${info.name} ${info.version}`);
  log(`  node:       ${process.version}`);
  log(`  platform:   ${process.platform}`);
}

export function printUsage(log: Log): void {
  const info = readPackageInfo();
  log(`${info.name} ${info.version}`);
  log('');
  log('Usage: prompt-console [options]');
  log('');
  log('Options:');
  log('  -c, --config <path>  Read configuration from <path>');
  log('  --init-config        Write the default configuration and its schema');
  log('  --print-schema       Print the configuration JSON schema');
  log('  -v, --version        Show version information');
  log('  -h, --help, -?       Show this help message');
}

export function printHelp(log: Log): void {
  log('Commands:');
  log('  help                  Show this list');
  log('  secret                Read a masked value');
  log('  exit                  Quit');
  log('');
  log('Controls:');
  log('  Enter                 Accept the input');
  log('  """                   Start or end multi-line input');
  log('  \\ at end of line      Continue on the next line');
  log('  Ctrl+U                Clear the current line');
  log('  Ctrl+N                Open a nested prompt');
  log('  Escape                Cancel the read');
  log('  Ctrl+D                Quit');
}
