/**
 * Tests for type reference resolution and member lookup
 */

import { describe, it, expect } from 'vitest';
import { AstFactory } from '../../src/ast/factory.js';
import { Lookup } from '../../src/lookup/lookup.js';
import { Bounds } from '../../src/solver/bounds.js';
import { formatType } from '../../src/types/format.js';

function setup() {
  const f = new AstFactory();
  const bounds = new Bounds();
  const lookup = new Lookup(f.declarations, bounds);
  return { f, bounds, lookup };
}

describe('Lookup.typeref', () => {
  it('should resolve a qualified path through nested declarations', () => {
    const { f, lookup } = setup();
    const outer = f.class('Outer');
    const inner = f.class('Inner', {}, outer);

    const found = lookup.typeref(f.module.symbols, f.typeref('Outer', 'Inner'));

    expect(found?.kind).toBe('LookupRef');
    expect(found && formatType(found)).toBe('Inner');
    if (found?.kind === 'LookupRef') {
      expect(found.def).toBe(inner.id);
    }
  });

  it('should fail on an undefined segment', () => {
    const { f, lookup } = setup();
    f.class('Outer');

    expect(lookup.typeref(f.module.symbols, f.typeref('Nope'))).toBeUndefined();
    expect(lookup.typeref(f.module.symbols, f.typeref('Outer', 'Nope'))).toBeUndefined();
  });

  it('should fail on too many or missing type arguments', () => {
    const { f, lookup } = setup();
    const a = f.class('A');
    f.class('Box', { typeparams: [f.typeParam('T')] });

    const tooMany = f.typeref(f.typename('Box', [f.ref(a), f.ref(a)]));
    expect(lookup.typeref(f.module.symbols, tooMany)).toBeUndefined();
    expect(lookup.typeref(f.module.symbols, f.typeref('Box'))).toBeUndefined();
  });

  it('should fill missing arguments from defaults', () => {
    const { f, lookup } = setup();
    const a = f.class('A');
    f.class('Cell', { typeparams: [f.typeParam('T', { dflt: f.ref(a) })] });

    const found = lookup.typeref(f.module.symbols, f.typeref('Cell'));
    expect(found && formatType(found)).toBe('Cell[A]');
  });

  it('should resolve an alias to the aliased type', () => {
    const { f, lookup } = setup();
    const a = f.class('A');
    f.alias('Num', f.isect(f.imm(), f.ref(a)));

    const found = lookup.typeref(f.module.symbols, f.typeref('Num'));
    expect(found && formatType(found)).toBe('imm & A');
  });

  it('should substitute alias arguments', () => {
    const { f, lookup } = setup();
    const a = f.class('A');
    const t = f.typeParam('T');
    const box = f.class('Box', { typeparams: [t] });
    const u = f.typeParam('U');
    f.alias('Wrap', f.ref(box, [f.ref(u)]), { typeparams: [u] });

    const found = lookup.typeref(f.module.symbols, f.typeref(f.typename('Wrap', [f.ref(a)])));
    expect(found && formatType(found)).toBe('Box[A]');
  });
});

describe('Lookup.member', () => {
  it('should find members through every disjunct of a union', () => {
    const { f, lookup } = setup();
    const a = f.class('A');
    const b = f.class('B');
    const getA = f.function('get', {}, () => undefined, a);
    const getB = f.function('get', {}, () => undefined, b);
    const refA = f.ref(a);
    const refB = f.ref(b);

    const found = lookup.member(f.union(refA, refB), f.typename('get'));

    expect(found).toHaveLength(2);
    expect(found[0]?.def).toBe(getA.id);
    expect(found[0]?.self).toBe(refA);
    expect(found[1]?.def).toBe(getB.id);
    expect(found[1]?.self).toBe(refB);
  });

  it('should skip disjuncts without the member', () => {
    const { f, lookup } = setup();
    const a = f.class('A');
    const b = f.class('B');
    const get = f.function('get', {}, () => undefined, a);

    const found = lookup.member(f.union(f.ref(a), f.ref(b)), f.typename('get'));

    expect(found).toHaveLength(1);
    expect(found[0]?.def).toBe(get.id);
  });

  it('should search the inherits chain', () => {
    const { f, lookup } = setup();
    const i = f.interface('I');
    const g = f.function('g', {}, () => undefined, i);
    const c = f.class('C', { inherits: f.ref(i) });

    const found = lookup.member(f.ref(c), f.typename('g'));

    expect(found).toHaveLength(1);
    expect(found[0]?.def).toBe(g.id);
  });

  it('should look through the upper bound of a type parameter', () => {
    const { f, lookup } = setup();
    const a = f.class('A');
    const get = f.function('get', {}, () => undefined, a);
    const t = f.typeParam('T', { upper: f.ref(a) });

    const found = lookup.member(f.ref(t), f.typename('get'));

    expect(found).toHaveLength(1);
    expect(found[0]?.def).toBe(get.id);
  });

  it('should look through the upper bound of an inference variable', () => {
    const { f, bounds, lookup } = setup();
    const a = f.class('A');
    const get = f.function('get', {}, () => undefined, a);
    const alpha = f.infer();
    bounds.set(alpha.id, { upper: f.ref(a) });

    const found = lookup.member(alpha, f.typename('get'));

    expect(found).toHaveLength(1);
    expect(found[0]?.def).toBe(get.id);
  });

  it('should not look through a bound that is a union', () => {
    const { f, bounds, lookup } = setup();
    const a = f.class('A');
    const b = f.class('B');
    f.function('get', {}, () => undefined, a);
    f.function('get', {}, () => undefined, b);
    const alpha = f.infer();
    bounds.set(alpha.id, { upper: f.union(f.ref(a), f.ref(b)) });

    expect(lookup.member(alpha, f.typename('get'))).toEqual([]);
  });

  it('should look through aliases', () => {
    const { f, lookup } = setup();
    const a = f.class('A');
    const get = f.function('get', {}, () => undefined, a);
    const alias = f.alias('Self', f.ref(a));

    const found = lookup.member(f.ref(alias), f.typename('get'));

    expect(found).toHaveLength(1);
    expect(found[0]?.def).toBe(get.id);
  });

  it('should bind the type arguments of a selected method', () => {
    const { f, lookup } = setup();
    const a = f.class('A');
    const b = f.class('B');
    const u = f.typeParam('U');
    f.function('pick', {
      typeparams: [u],
      params: [{ name: 'self', type: f.ref(a) }, { name: 'x', type: f.ref(u) }],
      result: f.ref(u),
    }, body => {
      body.ret('x');
    }, a);

    const [found] = lookup.member(f.ref(a), f.typename('pick', [f.ref(b)]));
    const signature = found && lookup.signature(found);

    expect(signature && formatType(signature)).toBe('(A, B) -> B');
  });
});

describe('Lookup.expand', () => {
  it('should stop at an alias that refers to itself', () => {
    const { f, lookup } = setup();
    const a = f.class('A');
    const loop = f.alias('Loop', f.ref(a));
    loop.inherits = f.union(f.ref(loop), f.ref(a));

    expect(formatType(lookup.expand(f.ref(loop)))).toBe('Loop | A');
  });

  it('should leave a dropped declaration unresolved', () => {
    const { f, lookup } = setup();
    const a = f.class('A');
    const ref = f.ref(a);
    f.declarations.drop(a.id);

    expect(lookup.entity(ref)).toBeUndefined();
    expect(lookup.signature(ref)).toBeUndefined();
    expect(lookup.inherits(ref)).toBeUndefined();
  });
});
