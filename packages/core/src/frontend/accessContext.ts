/**
 * Access context extraction - the syntactic shape around an occurrence
 *
 * Works on the expression that names the binding (an Identifier or a member
 * access). Transparent wrappers are climbed first, then the parent decides:
 * assignment sides, update operands, `for` heads and destructuring targets
 * are the closed set of write shapes; every other position is a read.
 * An update operand also records whether the updated value is consumed.
 */

import type { NodePath } from '@babel/traverse';
import * as t from '@babel/types';
import { isCompoundAssignmentOperator, type AccessContext } from '@unread/types';
import { isTransparentWrapper } from './nodes.js';

/** The expression sits inside a declaration pattern (param, declarator id) */
type TargetResult = AccessContext | 'declaration' | undefined;

export function climbWrappers(path: NodePath): NodePath {
  let current = path;
  while (current.parentPath && isTransparentWrapper(current.parentPath.node)) {
    current = current.parentPath;
  }
  return current;
}

/**
 * Whether `path` is an element of the enclosing pattern.
 */
function isPatternSlot(path: NodePath): boolean {
  const parent = path.parentPath;
  if (!parent) return false;
  const { node } = parent;

  if (t.isArrayPattern(node) || t.isObjectPattern(node)) return true;
  if (t.isRestElement(node)) return path.key === 'argument';
  if (t.isAssignmentPattern(node)) return path.key === 'left';
  if (t.isObjectProperty(node)) {
    return path.key === 'value' && parent.parentPath !== null && t.isObjectPattern(parent.parentPath.node);
  }
  return false;
}

function patternRootContext(path: NodePath): TargetResult {
  let root = path;
  while (isPatternSlot(root)) {
    const parent = root.parentPath;
    if (!parent) break;
    root = t.isObjectProperty(parent.node) && parent.parentPath ? parent.parentPath : parent;
  }

  const holder = root.parentPath;
  if (!holder) return 'declaration';
  if (t.isAssignmentExpression(holder.node) && root.key === 'left') {
    return { kind: 'output-binding', binding: 'destructuring-assignment' };
  }
  if (t.isForOfStatement(holder.node) && root.key === 'left') {
    return { kind: 'output-binding', binding: 'for-of' };
  }
  if (t.isForInStatement(holder.node) && root.key === 'left') {
    return { kind: 'output-binding', binding: 'for-in' };
  }
  return 'declaration';
}

/**
 * Whether the value of `path` is dropped: an expression statement, a `for`
 * init or update slot, or a sequence element other than a used last one.
 */
function isValueDiscarded(path: NodePath): boolean {
  const target = climbWrappers(path);
  const parent = target.parentPath;
  if (!parent) return false;
  const { node } = parent;

  if (t.isExpressionStatement(node)) return true;
  if (t.isForStatement(node)) return target.key === 'init' || target.key === 'update';
  if (t.isSequenceExpression(node)) {
    return target.key !== node.expressions.length - 1 || isValueDiscarded(parent);
  }
  return false;
}

function targetContext(path: NodePath): TargetResult {
  const parent = path.parentPath;
  if (!parent) return undefined;
  const { node } = parent;

  if (t.isAssignmentExpression(node) && path.key === 'left') {
    if (node.operator === '=') return { kind: 'assignment-left-simple' };
    if (isCompoundAssignmentOperator(node.operator)) {
      return { kind: 'assignment-left-compound', operator: node.operator };
    }
    return { kind: 'other', shape: node.type };
  }
  if (t.isUpdateExpression(node)) {
    return {
      kind: 'increment-decrement',
      operator: node.operator,
      prefix: node.prefix,
      valueUsed: !isValueDiscarded(parent),
    };
  }
  if (t.isForOfStatement(node) && path.key === 'left') {
    return { kind: 'output-binding', binding: 'for-of' };
  }
  if (t.isForInStatement(node) && path.key === 'left') {
    return { kind: 'output-binding', binding: 'for-in' };
  }
  if (isPatternSlot(path)) return patternRootContext(path);
  return undefined;
}

function readContext(path: NodePath): AccessContext {
  const parent = path.parentPath;
  if (parent && t.isAssignmentExpression(parent.node) && path.key === 'right' && parent.node.operator === '=') {
    return { kind: 'assignment-right' };
  }
  return parent ? { kind: 'other', shape: parent.node.type } : { kind: 'other' };
}

/**
 * Context of an identifier occurrence; null when the identifier is not an
 * occurrence at all (declaration sites, property keys, labels).
 */
export function identifierContext(path: NodePath): AccessContext | null {
  const target = climbWrappers(path);
  const result = targetContext(target);
  if (result === 'declaration') return null;
  if (result) return result;
  if (!path.isReferencedIdentifier()) return null;
  return readContext(target);
}

/**
 * Context of a member access (`this.x`, `obj.#x`, `obj['x']`).
 */
export function expressionContext(path: NodePath): AccessContext {
  const target = climbWrappers(path);
  const result = targetContext(target);
  if (result && result !== 'declaration') return result;
  return readContext(target);
}
