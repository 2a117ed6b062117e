import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { manifestCommand } from './commands/manifest.js';
import { resolveCommand } from './commands/resolve.js';
import { checkCommand } from './commands/check.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export function createProgram(): Command {
  return new Command()
    .name('polybridge')
    .description('Inspect class hierarchies exposed to a host for overriding')
    .version(readVersion())
    .addCommand(manifestCommand)
    .addCommand(resolveCommand)
    .addCommand(checkCommand);
}
