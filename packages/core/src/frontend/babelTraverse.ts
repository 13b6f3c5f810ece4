/**
 * Babel traverse helper for ESM/CJS interop
 *
 * Under ESM the CommonJS build of @babel/traverse arrives either as the
 * function itself or wrapped in `.default`, depending on the loader.
 *
 * Usage:
 *   import traverseModule from '@babel/traverse';
 *   const traverse = resolveTraverse(traverseModule);
 */

import type { Node, NodePath, Scope, TraverseOptions } from '@babel/traverse';

export type TraverseFunction = <S = undefined>(
  parent: Node,
  opts?: TraverseOptions<S>,
  scope?: Scope,
  state?: S,
  parentPath?: NodePath
) => void;

function isTraverseFunction(value: unknown): value is TraverseFunction {
  return typeof value === 'function';
}

export function resolveTraverse(traverseModule: unknown): TraverseFunction {
  if (typeof traverseModule === 'object' && traverseModule !== null && 'default' in traverseModule) {
    const wrapped: unknown = traverseModule.default;
    if (isTraverseFunction(wrapped)) return wrapped;
  }

  if (isTraverseFunction(traverseModule)) {
    return traverseModule;
  }

  throw new Error(
    'Unable to resolve @babel/traverse function. ' +
    'This may indicate an incompatible version or broken installation.'
  );
}
