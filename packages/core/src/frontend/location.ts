/**
 * Location extraction for babel nodes.
 *
 * Convention: line 0 / column 0 means "unknown location" (synthetic nodes).
 */
import type { Node } from '@babel/types';
import type { SourceSpan } from '@unread/types';

export function spanOf(node: Node, file: string): SourceSpan {
  return {
    file,
    line: node.loc?.start.line ?? 0,
    column: node.loc?.start.column ?? 0,
    endLine: node.loc?.end.line ?? 0,
    endColumn: node.loc?.end.column ?? 0,
    start: node.start ?? 0,
    end: node.end ?? 0,
  };
}

/**
 * `file:line:column`, the form editors understand.
 */
export function formatLocation(span: Pick<SourceSpan, 'file' | 'line' | 'column'>): string {
  return `${span.file}:${span.line}:${span.column + 1}`;
}

/**
 * Stable per-file position key, used to build binding identities.
 */
export function positionKey(node: Node): string {
  return `${node.start ?? 0}`;
}
