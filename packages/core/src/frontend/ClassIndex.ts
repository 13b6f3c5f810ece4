/**
 * ClassIndex - program-wide index of classes and interfaces
 *
 * Built during the index phase from every unit, read during the usage phase
 * to decide whether a method signature is dictated from outside: a member
 * that a superclass or an implemented interface also declares.
 *
 * Names are matched program-wide without module resolution. A heritage name
 * that matches nothing (a library type, a mixin call, a global like Error)
 * is unresolvable, and every method of such a class counts as a contract.
 */

import traverseModule from '@babel/traverse';
import type { NodePath } from '@babel/traverse';
import * as t from '@babel/types';
import { resolveTraverse } from './babelTraverse.js';
import { classNameOf, heritageNames, isComputed, memberName } from './nodes.js';
import type { SourceUnit } from './SourceUnit.js';

const traverse = resolveTraverse(traverseModule);

export interface TypeEntry {
  name: string;
  kind: 'class' | 'interface';
  file: string;
  /** Superclass name for classes; null when there is none */
  superClass: string | null;
  /** `implements` names for classes, `extends` names for interfaces */
  heritage: string[];
  members: Set<string>;
}

export function describeClass(node: t.Class, name: string, file: string): TypeEntry {
  const members = new Set<string>();

  for (const member of node.body.body) {
    if (t.isStaticBlock(member) || t.isTSIndexSignature(member)) continue;

    const memberKey = memberName(member.key, isComputed(member));
    if (memberKey !== null) members.add(memberKey);

    if (t.isClassMethod(member) && member.kind === 'constructor') {
      for (const param of member.params) {
        if (!t.isTSParameterProperty(param)) continue;
        const inner = t.isAssignmentPattern(param.parameter) ? param.parameter.left : param.parameter;
        if (t.isIdentifier(inner)) members.add(inner.name);
      }
    }
  }

  return {
    name,
    kind: 'class',
    file,
    superClass: node.superClass ? superClassName(node.superClass) : null,
    heritage: heritageNames(node.implements),
    members,
  };
}

function superClassName(expression: t.Expression): string {
  if (t.isIdentifier(expression)) return expression.name;
  if (t.isMemberExpression(expression) && !expression.computed && t.isIdentifier(expression.property)) {
    return t.isIdentifier(expression.object)
      ? `${expression.object.name}.${expression.property.name}`
      : '<expression>';
  }
  return '<expression>';
}

export function describeInterface(node: t.TSInterfaceDeclaration, file: string): TypeEntry {
  const members = new Set<string>();
  for (const element of node.body.body) {
    if (t.isTSPropertySignature(element) || t.isTSMethodSignature(element)) {
      const name = memberName(element.key, isComputed(element));
      if (name !== null) members.add(name);
    }
  }

  return {
    name: node.id.name,
    kind: 'interface',
    file,
    superClass: null,
    heritage: heritageNames(node.extends),
    members,
  };
}

export class ClassIndex {
  private readonly types = new Map<string, TypeEntry[]>();

  add(entry: TypeEntry): void {
    const entries = this.types.get(entry.name);
    if (entries) {
      entries.push(entry);
    } else {
      this.types.set(entry.name, [entry]);
    }
  }

  /**
   * Index every named class and interface of a unit.
   */
  addUnit(unit: SourceUnit): number {
    let added = 0;
    traverse(unit.ast, {
      Class: (path: NodePath<t.Class>) => {
        const name = classNameOf(path);
        if (name === null) return;
        this.add(describeClass(path.node, name, unit.id));
        added++;
      },
      TSInterfaceDeclaration: (path: NodePath<t.TSInterfaceDeclaration>) => {
        this.add(describeInterface(path.node, unit.id));
        added++;
      },
    });
    return added;
  }

  lookup(name: string): readonly TypeEntry[] {
    return this.types.get(name) ?? [];
  }

  get size(): number {
    let count = 0;
    for (const entries of this.types.values()) count += entries.length;
    return count;
  }

  /**
   * Whether `member` of this class is declared by a supertype, or the
   * hierarchy cannot be resolved far enough to tell.
   */
  isContractMember(node: t.Class, member: string): boolean {
    if (member === 'constructor' || member.startsWith('#')) return false;
    const own = describeClass(node, '', '');
    return this.inherits(own, member, new Set());
  }

  private inherits(entry: TypeEntry, member: string, visited: Set<string>): boolean {
    const supertypes = entry.superClass === null ? entry.heritage : [entry.superClass, ...entry.heritage];
    return supertypes.some(name => this.declares(name, member, visited));
  }

  private declares(name: string, member: string, visited: Set<string>): boolean {
    if (visited.has(name)) return false;
    visited.add(name);

    const candidates = this.types.get(name);
    if (!candidates) return true;

    return candidates.some(candidate =>
      candidate.members.has(member) || this.inherits(candidate, member, visited)
    );
  }
}
