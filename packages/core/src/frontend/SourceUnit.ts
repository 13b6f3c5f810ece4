/**
 * SourceUnit - one parsed file of the program
 *
 * The parser configuration follows the file extension: TypeScript syntax for
 * .ts/.mts/.cts/.tsx, JSX for .tsx/.jsx and plain JS files. Legacy decorators
 * and explicit resource management are always on.
 */

import { extname } from 'path';
import { parse, type ParserPlugin } from '@babel/parser';
import type { File } from '@babel/types';
import { LanguageError } from '../errors/UnreadError.js';

export interface SourceUnit {
  /** Project-relative path; used in keys, locations and diagnostics */
  id: string;
  /** Absolute path on disk */
  path: string;
  code: string;
  ast: File;
}

const TYPESCRIPT_EXTENSIONS = new Set(['.ts', '.mts', '.cts']);

export function parserPluginsFor(file: string): ParserPlugin[] {
  const ext = extname(file).toLowerCase();
  const plugins: ParserPlugin[] = ['decorators-legacy', 'explicitResourceManagement'];

  if (TYPESCRIPT_EXTENSIONS.has(ext)) {
    plugins.push('typescript');
  } else if (ext === '.tsx') {
    plugins.push('typescript', 'jsx');
  } else {
    plugins.push('jsx');
  }
  return plugins;
}

function syntaxErrorLine(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'loc' in error) {
    const loc: unknown = error.loc;
    if (typeof loc === 'object' && loc !== null && 'line' in loc && typeof loc.line === 'number') {
      return loc.line;
    }
  }
  return undefined;
}

/**
 * Parse one file.
 * @throws LanguageError (ERR_PARSE_FAILURE) when babel rejects the source
 */
export function parseSourceUnit(id: string, path: string, code: string): SourceUnit {
  try {
    const ast = parse(code, {
      sourceType: 'module',
      plugins: parserPluginsFor(path),
    });
    return { id, path, code, ast };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LanguageError(
      `Failed to parse ${id}: ${message}`,
      'ERR_PARSE_FAILURE',
      { filePath: id, lineNumber: syntaxErrorLine(error), phase: 'index' },
      'Fix the syntax error or add the file to "exclude" in .unread/config.yaml'
    );
  }
}
