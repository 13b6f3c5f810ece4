/**
 * ClassIndex Tests
 *
 * Program-wide type index and contract-member resolution.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import traverseModule from '@babel/traverse';
import type { NodePath } from '@babel/traverse';
import type * as t from '@babel/types';
import { ClassIndex, parseSourceUnit, resolveTraverse, type SourceUnit } from '@unread/core';

const traverse = resolveTraverse(traverseModule);

function unitOf(id: string, code: string): SourceUnit {
  return parseSourceUnit(id, `/virtual/${id}`, code);
}

function classNamed(unit: SourceUnit, name: string): t.Class {
  const found: t.Class[] = [];
  traverse(unit.ast, {
    Class(path: NodePath<t.Class>) {
      if (path.node.id?.name === name) found.push(path.node);
    },
  });
  const [first] = found;
  if (!first) throw new Error(`class ${name} not found`);
  return first;
}

describe('ClassIndex', () => {
  it('should index named classes and interfaces', () => {
    const index = new ClassIndex();
    const unit = unitOf('src/a.ts', [
      'interface Shape { area(): number; name: string; }',
      'class Square implements Shape {',
      '  constructor(private side: number) {}',
      '  area() { return this.side ** 2; }',
      '  name = "square";',
      '}',
      'const Anonymous = class {};',
      'export default class {}',
    ].join('\n'));

    assert.strictEqual(index.addUnit(unit), 3);
    assert.strictEqual(index.size, 3);

    const [shape] = index.lookup('Shape');
    assert.strictEqual(shape.kind, 'interface');
    assert.deepStrictEqual([...shape.members], ['area', 'name']);

    const [square] = index.lookup('Square');
    assert.strictEqual(square.superClass, null);
    assert.deepStrictEqual(square.heritage, ['Shape']);
    assert.deepStrictEqual([...square.members].sort(), ['area', 'constructor', 'name', 'side']);

    assert.strictEqual(index.lookup('Anonymous').length, 1);
    assert.deepStrictEqual(index.lookup('Missing'), []);
  });

  it('should resolve members declared by superclasses and interfaces', () => {
    const index = new ClassIndex();
    const base = unitOf('src/base.ts', [
      'interface Named { rename(next: string): void; }',
      'interface Entity extends Named { save(): void; }',
      'class Base { load() {} }',
    ].join('\n'));
    const derived = unitOf('src/derived.ts', [
      'class Model extends Base implements Entity {',
      '  load() {}',
      '  save() {}',
      '  rename(next: string) {}',
      '  extra() {}',
      '  constructor() { super(); }',
      '}',
    ].join('\n'));
    index.addUnit(base);
    index.addUnit(derived);

    const model = classNamed(derived, 'Model');
    assert.strictEqual(index.isContractMember(model, 'load'), true);
    assert.strictEqual(index.isContractMember(model, 'save'), true);
    assert.strictEqual(index.isContractMember(model, 'rename'), true);
    assert.strictEqual(index.isContractMember(model, 'extra'), false);
    assert.strictEqual(index.isContractMember(model, 'constructor'), false);
  });

  it('should treat unresolvable supertypes as contracts except for constructors and # members', () => {
    const index = new ClassIndex();
    const unit = unitOf('src/widget.ts', [
      "import { Component } from 'framework';",
      'class Widget extends Component {',
      '  render() {}',
      '  #draw() {}',
      '}',
    ].join('\n'));
    index.addUnit(unit);

    const widget = classNamed(unit, 'Widget');
    assert.strictEqual(index.isContractMember(widget, 'render'), true);
    assert.strictEqual(index.isContractMember(widget, 'anything'), true);
    assert.strictEqual(index.isContractMember(widget, '#draw'), false);
    assert.strictEqual(index.isContractMember(widget, 'constructor'), false);
  });

  it('should not loop on cyclic hierarchies', () => {
    const index = new ClassIndex();
    const unit = unitOf('src/cycle.ts', [
      'interface A extends B { a(): void; }',
      'interface B extends A { b(): void; }',
      'class C implements A { c() {} a() {} }',
    ].join('\n'));
    index.addUnit(unit);

    const c = classNamed(unit, 'C');
    assert.strictEqual(index.isContractMember(c, 'a'), true);
    assert.strictEqual(index.isContractMember(c, 'b'), true);
    assert.strictEqual(index.isContractMember(c, 'c'), false);
  });

  it('should report no contract for a class without heritage', () => {
    const index = new ClassIndex();
    const unit = unitOf('src/plain.ts', 'class Plain { run() {} }');
    index.addUnit(unit);

    assert.strictEqual(index.isContractMember(classNamed(unit, 'Plain'), 'run'), false);
  });
});
