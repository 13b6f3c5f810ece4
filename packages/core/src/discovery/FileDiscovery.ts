/**
 * File discovery - source files of a project, filtered by globs
 *
 * Walks the project root; node_modules and dot directories are never
 * entered, symlinks are not followed. Paths are matched relative to the
 * root with forward slashes. Output is sorted, so unit order (and every id
 * derived from it) is the same on every run.
 */

import { readdirSync } from 'fs';
import { join, relative } from 'path';
import { minimatch } from 'minimatch';

export interface DiscoveredFile {
  /** Project-relative, forward slashes */
  relativePath: string;
  absolutePath: string;
}

export function toPosixPath(path: string): string {
  return path.replace(/\\/g, '/');
}

export function matchesAny(relativePath: string, patterns: readonly string[]): boolean {
  const normalized = toPosixPath(relativePath);
  return patterns.some(pattern => minimatch(normalized, toPosixPath(pattern), { dot: true }));
}

export function discoverSourceFiles(
  projectPath: string,
  include: readonly string[],
  exclude: readonly string[]
): DiscoveredFile[] {
  const files: DiscoveredFile[] = [];

  const walk = (dir: string): void => {
    const entries = readdirSync(dir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);

      if (entry.isDirectory()) {
        if (entry.name.startsWith('.') || entry.name === 'node_modules') continue;
        walk(fullPath);
        continue;
      }

      if (!entry.isFile()) continue;

      const relativePath = toPosixPath(relative(projectPath, fullPath));
      if (matchesAny(relativePath, include) && !matchesAny(relativePath, exclude)) {
        files.push({ relativePath, absolutePath: fullPath });
      }
    }
  };

  walk(projectPath);
  return files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}
