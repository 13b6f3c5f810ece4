/**
 * Version constants.
 *
 * Read from the @unread/core package.json at module load time.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Full version string (e.g., "0.1.0-beta") */
export const UNREAD_VERSION: string = readPackageVersion();

/**
 * major.minor.patch without the pre-release tag.
 *
 * "0.1.0-beta" → "0.1.0"
 * "1.0.0-alpha.1" → "1.0.0"
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0];
}
