/**
 * Init command - write a starter .unread/config.yaml
 */

import { Command } from 'commander';
import { resolve, join } from 'path';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { stringify as stringifyYAML } from 'yaml';
import { CONFIG_DIR, DEFAULT_CONFIG } from '@unread/core';
import { exitWithError } from '../utils/errorFormatter.js';

/**
 * config.yaml content: the defaults with a header comment.
 */
export function generateConfigYAML(): string {
  const yaml = stringifyYAML(DEFAULT_CONFIG, {
    lineWidth: 0,
  });

  return `# unread configuration
# Every key is optional; omitted keys take these defaults.

${yaml}`;
}

export type InitOutcome = 'created' | 'overwritten' | 'exists';

/**
 * Write the config unless one exists (or force is set).
 */
export function initProject(projectPath: string, force: boolean = false): InitOutcome {
  const configDir = join(projectPath, CONFIG_DIR);
  const configPath = join(configDir, 'config.yaml');
  const existed = existsSync(configPath);

  if (existed && !force) {
    return 'exists';
  }

  mkdirSync(configDir, { recursive: true });
  writeFileSync(configPath, generateConfigYAML());
  return existed ? 'overwritten' : 'created';
}

interface InitOptions {
  force?: boolean;
}

export const initCommand = new Command('init')
  .description('Create .unread/config.yaml in a project')
  .argument('[path]', 'Project path', '.')
  .option('-f, --force', 'Overwrite existing config')
  .addHelpText('after', `
Examples:
  unread init                   Initialize in current directory
  unread init ./my-project      Initialize in specific directory
  unread init --force           Overwrite existing configuration
`)
  .action((path: string, options: InitOptions) => {
    const projectPath = resolve(path);

    if (!existsSync(projectPath)) {
      exitWithError(`Project directory not found: ${projectPath}`, ['Check the path argument']);
    }

    const outcome = initProject(projectPath, options.force);
    if (outcome === 'exists') {
      console.log(`✓ ${CONFIG_DIR}/config.yaml already exists`);
      console.log('  → Use --force to overwrite config');
      return;
    }

    console.log(`✓ ${outcome === 'created' ? 'Created' : 'Overwrote'} ${CONFIG_DIR}/config.yaml`);
    console.log('');
    console.log('Next steps:');
    console.log(`  1. Review config:  ${CONFIG_DIR}/config.yaml`);
    console.log('  2. Run:            unread check');
  });
