/**
 * Small readers over babel nodes shared by the front-end walks.
 */

import type { NodePath } from '@babel/traverse';
import * as t from '@babel/types';

/**
 * Static name of a class/object/interface member key.
 * `#x` keeps its hash; computed keys other than literals have no name.
 */
export function memberName(key: t.Node, computed: boolean): string | null {
  if (!computed) {
    if (t.isIdentifier(key)) return key.name;
    if (t.isPrivateName(key)) return `#${key.id.name}`;
  }
  if (t.isStringLiteral(key)) return key.value;
  if (t.isNumericLiteral(key)) return String(key.value);
  return null;
}

/**
 * Dotted text of a type reference in `extends` / `implements`.
 * Anything that is not a plain entity name yields '<expression>',
 * which never resolves.
 */
export function entityName(node: t.Node | null | undefined): string {
  if (!node) return '<expression>';
  if (t.isIdentifier(node)) return node.name;
  if (t.isTSQualifiedName(node)) return `${entityName(node.left)}.${node.right.name}`;
  if (t.isMemberExpression(node) && !node.computed && t.isIdentifier(node.property)) {
    return `${entityName(node.object)}.${node.property.name}`;
  }
  return '<expression>';
}

export function heritageNames(
  clauses: ReadonlyArray<t.TSExpressionWithTypeArguments | t.ClassImplements> | null | undefined
): string[] {
  if (!clauses) return [];
  return clauses.map(clause =>
    t.isClassImplements(clause) ? clause.id.name : entityName(clause.expression)
  );
}

/**
 * Declared or inferred class name: `class Foo`, `const Foo = class {}`.
 */
export function classNameOf(path: NodePath<t.Class>): string | null {
  const { node, parent } = path;
  if (node.id) return node.id.name;
  if (t.isVariableDeclarator(parent) && t.isIdentifier(parent.id)) return parent.id.name;
  if (t.isAssignmentExpression(parent) && t.isIdentifier(parent.left)) return parent.left.name;
  return null;
}

export function isComputed(node: t.Node): boolean {
  return 'computed' in node && node.computed === true;
}

export function decoratorCount(node: t.Node): number {
  if ('decorators' in node && Array.isArray(node.decorators)) {
    return node.decorators.length;
  }
  return 0;
}

/**
 * Reads a boolean modifier babel sets only on some node shapes
 * (`abstract`, `override`, `readonly`, `declare`, `static`).
 */
export function hasModifier(node: t.Node, modifier: string): boolean {
  return modifier in node && Reflect.get(node, modifier) === true;
}

/**
 * `private` / `protected` / `public` as written, 'none' when absent.
 */
export function accessibilityOf(node: t.Node): 'public' | 'protected' | 'private' | 'none' {
  const value: unknown = 'accessibility' in node ? node.accessibility : undefined;
  if (value === 'public' || value === 'protected' || value === 'private') return value;
  return 'none';
}

/**
 * Literal initializers whose value is fixed at compile time.
 */
export function isLiteralInitializer(node: t.Node | null | undefined): boolean {
  if (!node) return false;
  if (
    t.isNumericLiteral(node)
    || t.isStringLiteral(node)
    || t.isBooleanLiteral(node)
    || t.isBigIntLiteral(node)
    || t.isNullLiteral(node)
  ) {
    return true;
  }
  if (t.isTemplateLiteral(node)) return node.expressions.length === 0;
  if (t.isUnaryExpression(node) && (node.operator === '-' || node.operator === '+')) {
    return t.isNumericLiteral(node.argument) || t.isBigIntLiteral(node.argument);
  }
  return false;
}

/**
 * Parentheses and type-only wrappers that do not change the role of the
 * expression they wrap.
 */
export function isTransparentWrapper(node: t.Node): node is t.ParenthesizedExpression | t.TSAsExpression | t.TSSatisfiesExpression | t.TSNonNullExpression | t.TSTypeAssertion | t.TSInstantiationExpression {
  return t.isParenthesizedExpression(node)
    || t.isTSAsExpression(node)
    || t.isTSSatisfiesExpression(node)
    || t.isTSNonNullExpression(node)
    || t.isTSTypeAssertion(node)
    || t.isTSInstantiationExpression(node);
}
