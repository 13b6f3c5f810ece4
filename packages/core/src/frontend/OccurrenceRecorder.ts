/**
 * OccurrenceRecorder - occurrence events of one unit (usage phase)
 *
 * Identifiers are resolved through babel's scope bindings and routed to the
 * callable that declared them. Member accesses resolve to the innermost
 * enclosing class whose table knows the name; a string-literal bracket
 * access with no such class falls back to the program-wide index of
 * TypeScript-private fields.
 *
 * A callable's tracker is finalized when the walk leaves it: at that point
 * its body, its parameter defaults and every nested closure have been seen.
 */

import traverseModule from '@babel/traverse';
import type { NodePath } from '@babel/traverse';
import * as t from '@babel/types';
import type { AccessContext, Declaration, DeclarationId, Logger } from '@unread/types';
import {
  addTrackerStats,
  emptyTrackerStats,
  type UsageTrackerStats,
  type WholeProgramUsageTracker,
} from '../usage/UsageTracker.js';
import { expressionContext, identifierContext } from './accessContext.js';
import { resolveTraverse } from './babelTraverse.js';
import type { CallableCollection, CallableScope } from './CallableCollector.js';
import type { FieldTables, PrivateFieldNameIndex } from './FieldCollector.js';
import { isComputed, isTransparentWrapper, memberName } from './nodes.js';
import type { SourceUnit } from './SourceUnit.js';

const traverse = resolveTraverse(traverseModule);

export interface OccurrenceRecorderOptions {
  /** null when fields are not analysed */
  fieldTracker: WholeProgramUsageTracker | null;
  fieldTables: FieldTables;
  privateNames: PrivateFieldNameIndex;
  callables: CallableCollection;
  /** Skip unused, unwritten parameters that precede a read parameter */
  ignorePositionalPlaceholders: boolean;
  logger?: Logger;
}

export interface UnitUsage {
  /** Unused parameters and locals of every callable of the unit */
  unused: Declaration[];
  /** Summed over the unit's single-body trackers */
  stats: UsageTrackerStats;
  fieldOccurrences: number;
}

const DESTRUCTURING_FROM_THIS: AccessContext = { kind: 'other', shape: 'destructuring-from-this' };

function unwrap(node: t.Node): t.Node {
  let current = node;
  while (isTransparentWrapper(current) && 'expression' in current) {
    current = current.expression;
  }
  return current;
}

/**
 * Unused declarations of a finished callable. With placeholders ignored,
 * a never-touched parameter before the last read parameter stays
 * unreported; a parameter that is written is always reported.
 */
export function finalizeCallable(scope: CallableScope, ignorePositionalPlaceholders: boolean): Declaration[] {
  const unused = scope.tracker.finalize();
  if (!ignorePositionalPlaceholders || scope.parameters.length === 0) return unused;

  let lastRead = -1;
  const placeholders = new Map<DeclarationId, number>();
  for (const { id, position } of scope.parameters) {
    const record = scope.tracker.getRecord(id);
    if (record?.hasRead && position > lastRead) lastRead = position;
    if (!record?.hasWrite) placeholders.set(id, position);
  }

  return unused.filter(declaration => {
    const position = placeholders.get(declaration.id);
    return position === undefined || position >= lastRead;
  });
}

export function recordOccurrences(unit: SourceUnit, options: OccurrenceRecorderOptions): UnitUsage {
  const { fieldTracker, fieldTables, privateNames, callables, ignorePositionalPlaceholders, logger } = options;
  const usage: UnitUsage = { unused: [], stats: emptyTrackerStats(), fieldOccurrences: 0 };

  const recordField = (ids: readonly DeclarationId[], context: AccessContext): void => {
    if (!fieldTracker) return;
    for (const id of ids) {
      fieldTracker.recordAccess(id, context);
      usage.fieldOccurrences++;
    }
  };

  /** Ids the name resolves to in the innermost class that declares it */
  const resolveField = (path: NodePath, name: string): readonly DeclarationId[] | null => {
    let classPath = path.findParent(p => p.isClass());
    while (classPath) {
      const ids = fieldTables.get(classPath.node)?.get(name);
      if (ids) return ids;
      classPath = classPath.findParent(p => p.isClass());
    }
    return null;
  };

  const allFieldsOfInnermostClass = (path: NodePath): DeclarationId[] => {
    const classPath = path.findParent(p => p.isClass());
    const table = classPath ? fieldTables.get(classPath.node) : undefined;
    return table ? [...table.values()].flat() : [];
  };

  const recordBinding = (path: NodePath, name: string): void => {
    const binding = path.scope.getBinding(name);
    if (!binding || binding.identifier === path.node) return;
    const route = callables.routes.get(binding.identifier);
    if (!route) return;

    const context = identifierContext(path);
    if (context) route.scope.tracker.recordAccess(route.id, context);
  };

  const recordMember = (path: NodePath<t.MemberExpression | t.OptionalMemberExpression>): void => {
    if (!fieldTracker) return;
    const { node } = path;
    const name = memberName(node.property, isComputed(node));
    if (name === null) return;

    const context = expressionContext(path);
    const ids = resolveField(path, name);
    if (ids) {
      recordField(ids, context);
    } else if (node.computed && t.isStringLiteral(node.property)) {
      recordField(privateNames.lookup(name), context);
    }
  };

  const recordDestructuringFromThis = (path: NodePath, pattern: t.Node, source: t.Node | null | undefined): void => {
    if (!fieldTracker || !t.isObjectPattern(pattern) || !source || !t.isThisExpression(unwrap(source))) return;

    for (const property of pattern.properties) {
      if (t.isRestElement(property)) {
        recordField(allFieldsOfInnermostClass(path), DESTRUCTURING_FROM_THIS);
        continue;
      }
      const name = memberName(property.key, property.computed);
      const ids = name === null ? null : resolveField(path, name);
      if (ids) recordField(ids, DESTRUCTURING_FROM_THIS);
    }
  };

  const leaveCallable = (node: t.Node): void => {
    const scope = callables.callables.get(node);
    if (!scope) return;
    usage.unused.push(...finalizeCallable(scope, ignorePositionalPlaceholders));
    addTrackerStats(usage.stats, scope.tracker.getStats());
  };

  traverse(unit.ast, {
    Identifier(path: NodePath<t.Identifier>) {
      recordBinding(path, path.node.name);
    },
    JSXIdentifier(path: NodePath<t.JSXIdentifier>) {
      if (path.isReferencedIdentifier()) recordBinding(path, path.node.name);
    },
    MemberExpression(path: NodePath<t.MemberExpression>) {
      recordMember(path);
    },
    OptionalMemberExpression(path: NodePath<t.OptionalMemberExpression>) {
      recordMember(path);
    },
    BinaryExpression(path: NodePath<t.BinaryExpression>) {
      const { node } = path;
      if (node.operator !== 'in' || !t.isPrivateName(node.left)) return;
      const ids = resolveField(path, `#${node.left.id.name}`);
      if (ids) recordField(ids, { kind: 'other', shape: 'BinaryExpression' });
    },
    VariableDeclarator(path: NodePath<t.VariableDeclarator>) {
      recordDestructuringFromThis(path, path.node.id, path.node.init);
    },
    AssignmentExpression(path: NodePath<t.AssignmentExpression>) {
      recordDestructuringFromThis(path, path.node.left, path.node.right);
    },
    Function: {
      exit(path: NodePath<t.Function>) {
        leaveCallable(path.node);
      },
    },
    TSDeclareFunction: {
      exit(path: NodePath<t.TSDeclareFunction>) {
        leaveCallable(path.node);
      },
    },
    TSDeclareMethod: {
      exit(path: NodePath<t.TSDeclareMethod>) {
        leaveCallable(path.node);
      },
    },
  });

  logger?.debug('Occurrences recorded', {
    file: unit.id,
    accesses: usage.stats.recordedAccesses,
    fieldOccurrences: usage.fieldOccurrences,
    unused: usage.unused.length,
  });
  return usage;
}
