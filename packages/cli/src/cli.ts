#!/usr/bin/env -S node --import tsx
/**
 * @unread/cli - command line for the unread usage analyzer
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { initCommand } from './commands/init.js';
import { checkCommand } from './commands/check.js';

function readVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('unread')
  .description('Find private fields, parameters and locals that are never read')
  .version(readVersion());

program.addCommand(initCommand);
program.addCommand(checkCommand);

await program.parseAsync();
