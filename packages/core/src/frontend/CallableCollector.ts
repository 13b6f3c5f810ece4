/**
 * CallableCollector - parameter and local declarations of one unit
 *
 * Each callable (function, method, arrow, overload signature) gets its own
 * SingleBodyUsageTracker. Parameters and the locals whose nearest enclosing
 * function is the callable are declared into it before any occurrence is
 * recorded, so hoisted uses see their declaration.
 *
 * Tracked bindings are routed by the identity of their binding Identifier,
 * the same node babel's scope analysis hands back for every reference.
 * Module-level variables belong to no callable and are not tracked.
 */

import traverseModule from '@babel/traverse';
import type { NodePath } from '@babel/traverse';
import * as t from '@babel/types';
import type {
  CallableForm,
  CallableInfo,
  DeclarationId,
  ExemptionPolicy,
  LocalSite,
  Logger,
  ParameterKind,
  ParameterSite,
} from '@unread/types';
import type { DeclarationRegistry } from '../usage/DeclarationRegistry.js';
import { SingleBodyUsageTracker } from '../usage/UsageTracker.js';
import { resolveTraverse } from './babelTraverse.js';
import type { ClassIndex } from './ClassIndex.js';
import { spanOf } from './location.js';
import { decoratorCount, hasModifier, isComputed, memberName } from './nodes.js';
import type { SourceUnit } from './SourceUnit.js';

const traverse = resolveTraverse(traverseModule);

type CallableNode = t.Function | t.TSDeclareFunction | t.TSDeclareMethod;

export interface CallableParameter {
  id: DeclarationId;
  position: number;
}

export interface CallableScope {
  node: CallableNode;
  info: CallableInfo;
  tracker: SingleBodyUsageTracker;
  /** Tracked parameters with their position in the list */
  parameters: CallableParameter[];
}

export interface BindingRoute {
  scope: CallableScope;
  id: DeclarationId;
}

export interface CallableCollectorOptions {
  registry: DeclarationRegistry;
  classIndex: ClassIndex;
  parameterPolicy: ExemptionPolicy<ParameterSite>;
  localPolicy: ExemptionPolicy<LocalSite>;
  trackParameters: boolean;
  trackLocals: boolean;
  logger?: Logger;
}

export interface CallableCollection {
  /** Keyed by callable node */
  callables: Map<t.Node, CallableScope>;
  /** Keyed by binding Identifier */
  routes: Map<t.Node, BindingRoute>;
  /** Exemption reason -> count */
  exempt: Map<string, number>;
}

function callableForm(node: CallableNode): CallableForm {
  switch (node.type) {
    case 'FunctionDeclaration':
    case 'TSDeclareFunction':
      return 'function';
    case 'FunctionExpression':
      return 'function-expression';
    case 'ArrowFunctionExpression':
      return 'arrow';
    case 'ObjectMethod':
      if (node.kind === 'get') return 'getter';
      if (node.kind === 'set') return 'setter';
      return 'object-method';
    case 'ClassMethod':
    case 'ClassPrivateMethod':
    case 'TSDeclareMethod':
      if (node.kind === 'constructor') return 'constructor';
      if (node.kind === 'get') return 'getter';
      if (node.kind === 'set') return 'setter';
      return 'method';
  }
}

/**
 * The class member a callable implements, if any: a method, or a function
 * stored in a class property (`handle = (e) => {}`).
 */
function classMemberOf(path: NodePath<CallableNode>): { owner: t.Class; member: t.Node; name: string | null } | null {
  const { node } = path;
  const holder = t.isClassMethod(node) || t.isClassPrivateMethod(node) || t.isTSDeclareMethod(node)
    ? path
    : path.parentPath;
  if (!holder) return null;
  if (holder !== path && !(t.isClassProperty(holder.node) && path.key === 'value')) return null;

  const owner = holder.parentPath?.parentPath;
  if (!owner || !t.isClass(owner.node)) return null;

  const memberNode = holder.node;
  if (!('key' in memberNode)) return null;
  return { owner: owner.node, member: memberNode, name: memberName(memberNode.key, isComputed(memberNode)) };
}

function callableName(path: NodePath<CallableNode>): string {
  const { node, parent } = path;
  if ('id' in node && node.id) return node.id.name;
  if ('key' in node) return memberName(node.key, isComputed(node)) ?? '<computed>';
  if (t.isVariableDeclarator(parent) && t.isIdentifier(parent.id)) return parent.id.name;
  if ((t.isClassProperty(parent) || t.isObjectProperty(parent)) && path.key === 'value') {
    return memberName(parent.key, isComputed(parent)) ?? '<computed>';
  }
  return '<anonymous>';
}

function parameterKindOf(path: NodePath<CallableNode>): ParameterKind {
  const { node } = path;
  if (t.isArrowFunctionExpression(node) || t.isFunctionExpression(node)) return 'lambda-parameter';
  if (t.isFunctionDeclaration(node) || t.isTSDeclareFunction(node)) {
    return path.getFunctionParent() ? 'local-function-parameter' : 'parameter';
  }
  return 'parameter';
}

/**
 * Identifiers that sit directly beside a `...rest` element of an object
 * pattern, anywhere inside `pattern`.
 */
function restSiblings(pattern: t.Node, into = new Set<t.Node>()): Set<t.Node> {
  if (t.isObjectPattern(pattern)) {
    const hasRest = pattern.properties.some(property => t.isRestElement(property));
    for (const property of pattern.properties) {
      if (!t.isObjectProperty(property)) continue;
      const value = t.isAssignmentPattern(property.value) ? property.value.left : property.value;
      if (hasRest && t.isIdentifier(value)) into.add(value);
      restSiblings(value, into);
    }
  } else if (t.isArrayPattern(pattern)) {
    for (const element of pattern.elements) {
      if (element) restSiblings(element, into);
    }
  } else if (t.isAssignmentPattern(pattern)) {
    restSiblings(pattern.left, into);
  } else if (t.isRestElement(pattern)) {
    restSiblings(pattern.argument, into);
  }
  return into;
}

export function collectCallables(unit: SourceUnit, options: CallableCollectorOptions): CallableCollection {
  const { registry, classIndex, parameterPolicy, localPolicy, trackParameters, trackLocals, logger } = options;
  const collection: CallableCollection = { callables: new Map(), routes: new Map(), exempt: new Map() };

  const countExempt = (reason: string): void => {
    collection.exempt.set(reason, (collection.exempt.get(reason) ?? 0) + 1);
  };

  const enterCallable = (path: NodePath<CallableNode>): void => {
    const { node } = path;
    const member = classMemberOf(path);
    const memberHolder = member?.member;
    const info: CallableInfo = {
      form: callableForm(node),
      name: callableName(path),
      hasBody: t.isFunction(node),
      isAbstract: hasModifier(node, 'abstract'),
      isDeclare: t.isTSDeclareFunction(node) || t.isTSDeclareMethod(node) || hasModifier(node, 'declare'),
      isOverride: hasModifier(node, 'override') || (memberHolder !== undefined && hasModifier(memberHolder, 'override')),
      satisfiesExternalContract: member !== null && member.name !== null
        && classIndex.isContractMember(member.owner, member.name),
    };

    const line = node.loc?.start.line ?? 0;
    const column = node.loc?.start.column ?? 0;
    const scope: CallableScope = {
      node,
      info,
      tracker: new SingleBodyUsageTracker(`${unit.id}:${line}:${column} ${info.name}`, registry),
      parameters: [],
    };
    collection.callables.set(node, scope);

    if (!trackParameters) return;

    const kind = parameterKindOf(path);
    node.params.forEach((param, position) => {
      const isParameterProperty = t.isTSParameterProperty(param);
      const bindings = Object.values(t.getBindingIdentifiers(isParameterProperty ? param.parameter : param));
      const siblingGroup = bindings.length > 1 ? `${unit.id}:${param.start ?? 0}` : undefined;

      for (const identifier of bindings) {
        const site: ParameterSite = {
          key: `${unit.id}@${identifier.start ?? 0}`,
          name: identifier.name,
          kind,
          location: spanOf(identifier, unit.id),
          ...(siblingGroup !== undefined ? { siblingGroup } : {}),
          position,
          callable: info,
          decoratorCount: decoratorCount(param),
          isThisParameter: identifier.name === 'this',
          isParameterProperty,
        };

        const verdict = parameterPolicy.evaluate(site);
        if (!verdict.tracked) {
          countExempt(verdict.reason);
          logger?.trace('Parameter exempt', { callable: info.name, parameter: site.name, reason: verdict.reason });
          continue;
        }

        const id = scope.tracker.declare(site);
        scope.parameters.push({ id, position });
        collection.routes.set(identifier, { scope, id });
      }
    });
  };

  traverse(unit.ast, {
    Function(path: NodePath<t.Function>) {
      enterCallable(path);
    },
    TSDeclareFunction(path: NodePath<t.TSDeclareFunction>) {
      enterCallable(path);
    },
    TSDeclareMethod(path: NodePath<t.TSDeclareMethod>) {
      enterCallable(path);
    },
    VariableDeclarator(path: NodePath<t.VariableDeclarator>) {
      if (!trackLocals) return;

      const owner = path.getFunctionParent();
      const scope = owner ? collection.callables.get(owner.node) : undefined;
      const declaration = path.parentPath.node;
      if (!scope || !t.isVariableDeclaration(declaration)) return;

      const bindings = Object.values(t.getBindingIdentifiers(path.node.id));
      const siblingGroup = Object.keys(t.getBindingIdentifiers(declaration)).length > 1
        ? `${unit.id}:${declaration.start ?? 0}`
        : undefined;
      const siblings = restSiblings(path.node.id);

      for (const identifier of bindings) {
        // A redeclaring `var` shares the first binding (earlier var or parameter)
        const binding = path.scope.getBinding(identifier.name);
        if (binding && binding.identifier !== identifier) continue;

        const site: LocalSite = {
          key: `${unit.id}@${identifier.start ?? 0}`,
          name: identifier.name,
          kind: 'local-variable',
          location: spanOf(identifier, unit.id),
          ...(siblingGroup !== undefined ? { siblingGroup } : {}),
          declarationKind: declaration.kind,
          hasRestSibling: siblings.has(identifier),
        };

        const verdict = localPolicy.evaluate(site);
        if (!verdict.tracked) {
          countExempt(verdict.reason);
          continue;
        }

        const id = scope.tracker.declare(site);
        collection.routes.set(identifier, { scope, id });
      }
    },
  });

  logger?.debug('Callables collected', {
    file: unit.id,
    callables: collection.callables.size,
    tracked: collection.routes.size,
  });
  return collection;
}
