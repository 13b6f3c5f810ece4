/**
 * FieldCollector - field declarations of one unit (index phase)
 *
 * Every class gets a table from field name to the declaration ids that name
 * resolves to. Exempt fields are in the table too, with no ids: they still
 * shadow a same-named field of an enclosing class.
 *
 * TypeScript-private fields are also published to a program-wide name index,
 * used to match `obj['name']` written outside the declaring class.
 */

import traverseModule from '@babel/traverse';
import type { NodePath } from '@babel/traverse';
import * as t from '@babel/types';
import type { DeclarationId, ExemptionPolicy, FieldSite, Logger } from '@unread/types';
import type { WholeProgramUsageTracker } from '../usage/UsageTracker.js';
import { resolveTraverse } from './babelTraverse.js';
import { spanOf } from './location.js';
import {
  accessibilityOf,
  classNameOf,
  decoratorCount,
  hasModifier,
  isComputed,
  isLiteralInitializer,
  memberName,
} from './nodes.js';
import type { SourceUnit } from './SourceUnit.js';

const traverse = resolveTraverse(traverseModule);

export type FieldTable = Map<string, DeclarationId[]>;
/** Keyed by class node */
export type FieldTables = Map<t.Node, FieldTable>;

/**
 * Program-wide index of tracked TypeScript-private fields by name.
 */
export class PrivateFieldNameIndex {
  private readonly byName = new Map<string, DeclarationId[]>();

  add(name: string, id: DeclarationId): void {
    const ids = this.byName.get(name);
    if (ids) {
      if (!ids.includes(id)) ids.push(id);
    } else {
      this.byName.set(name, [id]);
    }
  }

  lookup(name: string): readonly DeclarationId[] {
    return this.byName.get(name) ?? [];
  }
}

export interface FieldCollectorOptions {
  tracker: WholeProgramUsageTracker;
  policy: ExemptionPolicy<FieldSite>;
  privateNames: PrivateFieldNameIndex;
  logger?: Logger;
}

export interface FieldCollection {
  tables: FieldTables;
  declared: number;
  /** Exemption reason -> count */
  exempt: Map<string, number>;
}

export function collectFields(unit: SourceUnit, options: FieldCollectorOptions): FieldCollection {
  const { tracker, policy, privateNames, logger } = options;
  const collection: FieldCollection = { tables: new Map(), declared: 0, exempt: new Map() };

  const place = (table: FieldTable, site: FieldSite): void => {
    const ids = table.get(site.name) ?? [];
    table.set(site.name, ids);

    const verdict = policy.evaluate(site);
    if (!verdict.tracked) {
      collection.exempt.set(verdict.reason, (collection.exempt.get(verdict.reason) ?? 0) + 1);
      logger?.trace('Field exempt', { field: `${site.className}.${site.name}`, reason: verdict.reason });
      return;
    }

    const id = tracker.declare(site);
    ids.push(id);
    collection.declared++;
    if (site.accessibility === 'private') privateNames.add(site.name, id);
  };

  traverse(unit.ast, {
    Class(path: NodePath<t.Class>) {
      const { node } = path;
      const className = classNameOf(path) ?? '<anonymous>';
      const classKey = `${unit.id}#${className}@${node.loc?.start.line ?? 0}:${node.loc?.start.column ?? 0}`;
      const table: FieldTable = new Map();
      collection.tables.set(node, table);

      for (const member of node.body.body) {
        if (t.isClassProperty(member) || t.isClassPrivateProperty(member) || t.isClassAccessorProperty(member)) {
          const name = memberName(member.key, isComputed(member));
          if (name === null) continue;
          const isStatic = hasModifier(member, 'static');

          place(table, {
            key: `${classKey}.${isStatic ? 'static ' : ''}${name}`,
            name,
            kind: 'field',
            location: spanOf(member.key, unit.id),
            className,
            accessibility: t.isPrivateName(member.key) ? 'hash-private' : accessibilityOf(member),
            isStatic,
            isReadonly: hasModifier(member, 'readonly'),
            isDeclare: hasModifier(member, 'declare'),
            isAccessorStorage: t.isClassAccessorProperty(member),
            isParameterProperty: false,
            hasLiteralInitializer: isLiteralInitializer(member.value),
            decoratorCount: decoratorCount(member),
          });
        } else if (t.isClassMethod(member) && member.kind === 'constructor') {
          for (const param of member.params) {
            if (!t.isTSParameterProperty(param)) continue;
            const binding = t.isAssignmentPattern(param.parameter) ? param.parameter.left : param.parameter;
            if (!t.isIdentifier(binding)) continue;

            place(table, {
              key: `${classKey}.${binding.name}`,
              name: binding.name,
              kind: 'field',
              location: spanOf(binding, unit.id),
              className,
              accessibility: accessibilityOf(param),
              isStatic: false,
              isReadonly: hasModifier(param, 'readonly'),
              isDeclare: false,
              isAccessorStorage: false,
              isParameterProperty: true,
              hasLiteralInitializer: false,
              decoratorCount: decoratorCount(param),
            });
          }
        }
      }
    },
  });

  logger?.debug('Fields collected', {
    file: unit.id,
    classes: collection.tables.size,
    declared: collection.declared,
  });
  return collection;
}
