/**
 * Tests for the subtype solver
 */

import { describe, it, expect } from 'vitest';
import { AstFactory } from '../../src/ast/factory.js';
import { Lookup } from '../../src/lookup/lookup.js';
import { Bounds } from '../../src/solver/bounds.js';
import { Subtype } from '../../src/solver/subtype.js';
import { DiagnosticSink } from '../../src/diagnostics/diagnostic.js';
import { DEFAULT_CONFIG } from '../../src/config.js';
import type { Logger } from '../../src/logger.js';
import { functionType } from '../../src/types/factory.js';
import { formatType } from '../../src/types/format.js';

function setup(options: { maxDepth?: number; trace?: boolean } = {}) {
  const f = new AstFactory();
  const bounds = new Bounds();
  const lookup = new Lookup(f.declarations, bounds);
  const sink = new DiagnosticSink();
  const debug: string[] = [];
  const warnings: string[] = [];
  const logger: Logger = {
    debug: message => debug.push(message),
    warn: message => warnings.push(message),
  };
  const subtype = new Subtype(lookup, bounds, sink, { ...DEFAULT_CONFIG, ...options, logger }, f.name('apply'));
  return { f, bounds, lookup, sink, subtype, debug, warnings };
}

describe('Subtype', () => {
  describe('Capabilities', () => {
    it('should let iso stand in for imm and mut', () => {
      const { f, subtype } = setup();

      expect(subtype.check(f.iso(), f.imm())).toBe(true);
      expect(subtype.check(f.iso(), f.mut())).toBe(true);
      expect(subtype.check(f.imm(), f.imm())).toBe(true);
      expect(subtype.ok).toBe(true);
    });

    it('should keep imm, mut and iso otherwise apart', () => {
      const { f, subtype } = setup();

      expect(subtype.check(f.imm(), f.mut())).toBe(false);
      expect(subtype.check(f.mut(), f.iso())).toBe(false);
      expect(subtype.ok).toBe(false);
    });

    it('should reach a capability through a supertype', () => {
      const { f, subtype } = setup();
      const a = f.class('A');
      const b = f.class('B', { inherits: f.imm() });

      expect(subtype.check(f.ref(a), f.imm())).toBe(false);
      expect(subtype.check(f.ref(b), f.imm())).toBe(true);
    });
  });

  describe('Diagnostics', () => {
    it('should cite both sides of a failed constraint', () => {
      const { f, sink, subtype } = setup();
      const a = f.class('A');

      subtype.check(f.isect(f.imm(), f.ref(a)), f.mut());

      expect(sink.messages()).toEqual(['Type imm & A is not a subtype of mut.']);
      const parts = sink.all()[0]?.parts ?? [];
      expect(parts[1]?.message).toBe('The supertype is here.');
      expect(parts[1]?.location.view()).toBe('mut');
    });

    it('should trace each constraint when asked', () => {
      const { f, subtype, debug } = setup({ trace: true });

      subtype.check(f.iso(), f.imm());
      subtype.check(f.imm(), f.iso());

      expect(debug).toEqual(['iso <: imm holds', 'imm <: iso fails']);
    });

    it('should give up on checks deeper than the limit', () => {
      const { f, sink, subtype, warnings } = setup({ maxDepth: 1 });

      expect(subtype.check(f.tuple(f.iso()), f.tuple(f.imm()))).toBe(false);
      expect(warnings).toEqual(['Subtype check gave up after 1 levels: iso <: imm']);
      expect(sink.messages()).toEqual(['Type (iso) is not a subtype of (imm).']);
    });
  });

  describe('Unions and intersections', () => {
    it('should accept a type into a union containing it', () => {
      const { f, subtype } = setup();
      const a = f.class('A');
      const b = f.class('B');

      expect(subtype.check(f.ref(a), f.union(f.ref(a), f.ref(b)))).toBe(true);
      expect(subtype.check(f.union(f.ref(a), f.ref(b)), f.ref(a))).toBe(false);
    });

    it('should need one conjunct on the left and every conjunct on the right', () => {
      const { f, subtype } = setup();
      const a = f.class('A');

      expect(subtype.check(f.isect(f.imm(), f.ref(a)), f.ref(a))).toBe(true);
      expect(subtype.check(f.ref(a), f.isect(f.imm(), f.ref(a)))).toBe(false);
    });

    it('should distribute before comparing', () => {
      const { f, subtype } = setup();
      const a = f.class('A');
      const b = f.class('B');
      const c = f.class('C');
      const left = f.isect(f.union(f.ref(a), f.ref(b)), f.ref(c));

      expect(subtype.check(left, f.union(f.ref(a), f.ref(b)))).toBe(true);
      expect(subtype.check(left, f.ref(a))).toBe(false);
    });
  });

  describe('Structural types', () => {
    it('should compare tuples pointwise', () => {
      const { f, subtype } = setup();
      const a = f.class('A');

      expect(subtype.check(f.tuple(f.iso(), f.ref(a)), f.tuple(f.imm(), f.ref(a)))).toBe(true);
      expect(subtype.check(f.tuple(f.iso()), f.tuple(f.imm(), f.imm()))).toBe(false);
    });

    it('should compare function arguments contravariantly', () => {
      const { f, subtype } = setup();

      expect(subtype.check(f.fn([f.imm()], f.iso()), f.fn([f.iso()], f.imm()))).toBe(true);
      expect(subtype.check(f.fn([f.iso()], f.imm()), f.fn([f.imm()], f.imm()))).toBe(false);
    });

    it('should not mix nullary and unary functions', () => {
      const { f, subtype } = setup();

      expect(subtype.check(f.fn([], f.imm()), f.fn([f.imm()], f.imm()))).toBe(false);
      expect(subtype.check(f.fn([], f.iso()), f.fn([], f.imm()))).toBe(true);
    });

    it('should compare thrown types covariantly', () => {
      const { f, subtype } = setup();
      const a = f.class('A');

      expect(subtype.check(f.throws(f.iso()), f.throws(f.imm()))).toBe(true);
      expect(subtype.check(f.throws(f.ref(a)), f.ref(a))).toBe(false);
    });
  });

  describe('Declarations', () => {
    it('should follow inherits to a supertype', () => {
      const { f, subtype } = setup();
      const i = f.interface('I');
      const c = f.class('C', { inherits: f.ref(i) });

      expect(subtype.check(f.ref(c), f.ref(i))).toBe(true);
      expect(subtype.check(f.ref(i), f.ref(c))).toBe(false);
    });

    it('should keep type arguments invariant', () => {
      const { f, subtype } = setup();
      const i = f.interface('I');
      const c = f.class('C', { inherits: f.ref(i) });
      const box = f.class('Box', { typeparams: [f.typeParam('T')] });

      expect(subtype.check(f.ref(box, [f.ref(c)]), f.ref(box, [f.ref(c)]))).toBe(true);
      expect(subtype.check(f.ref(box, [f.ref(c)]), f.ref(box, [f.ref(i)]))).toBe(false);
    });

    it('should compare a function reference by its signature', () => {
      const { f, subtype } = setup();
      const a = f.class('A');
      const b = f.class('B');
      const id = f.function('id', { params: [{ name: 'x', type: f.ref(a) }], result: f.ref(a) }, body => {
        body.ret('x');
      });

      expect(subtype.check(f.ref(id), f.fn([f.ref(a)], f.ref(a)))).toBe(true);
      expect(subtype.check(f.ref(id), f.fn([f.ref(b)], f.ref(a)))).toBe(false);
    });

    it('should call a class through its apply member', () => {
      const { f, subtype } = setup();
      const k = f.class('K');
      f.function('apply', { result: f.ref(k) }, () => undefined, k);

      expect(subtype.check(f.ref(k), f.fn([], f.ref(k)))).toBe(true);
      expect(subtype.check(f.ref(k), f.fn([], f.imm()))).toBe(false);
    });

    it('should compare a type parameter by its upper bound', () => {
      const { f, subtype } = setup();
      const a = f.class('A');
      const bounded = f.typeParam('T', { upper: f.ref(a) });
      const free = f.typeParam('U');

      expect(subtype.check(f.ref(bounded), f.ref(a))).toBe(true);
      expect(subtype.check(f.ref(free), f.ref(a))).toBe(false);
    });

    it('should expand aliases on both sides', () => {
      const { f, subtype } = setup();
      const a = f.class('A');
      const num = f.alias('Num', f.isect(f.imm(), f.ref(a)));

      expect(subtype.check(f.ref(num), f.imm())).toBe(true);
      expect(subtype.check(f.isect(f.iso(), f.ref(a)), f.ref(num))).toBe(true);
    });
  });

  describe('Inference variables', () => {
    it('should narrow and widen bounds', () => {
      const { f, bounds, subtype } = setup();
      const alpha = f.infer();

      expect(subtype.check(alpha, f.imm())).toBe(true);
      expect(subtype.check(f.iso(), alpha)).toBe(true);

      const bound = bounds.get(alpha.id);
      expect(bound.upper && formatType(bound.upper)).toBe('imm');
      expect(bound.lower && formatType(bound.lower)).toBe('iso');
    });

    it('should roll back the bounds of a failed constraint', () => {
      const { f, bounds, subtype } = setup();
      const a = f.class('A');
      const alpha = f.infer();

      expect(subtype.check(alpha, f.isect(f.imm(), f.ref(a)))).toBe(true);
      expect(subtype.check(f.iso(), alpha)).toBe(false);

      const bound = bounds.get(alpha.id);
      expect(bound.lower).toBeUndefined();
      expect(bound.upper && formatType(bound.upper)).toBe('imm & A');
    });

    it('should link two variables', () => {
      const { f, bounds, subtype } = setup();
      const alpha = f.infer();
      const beta = f.infer();

      expect(subtype.check(alpha, beta)).toBe(true);

      const a = bounds.get(alpha.id);
      const b = bounds.get(beta.id);
      expect(a.upper && formatType(a.upper)).toBe('τ1');
      expect(b.lower && formatType(b.lower)).toBe('τ0');
    });

    it('should keep an upper bound that already implies the constraint', () => {
      const { f, bounds, subtype } = setup();
      const a = f.class('A');
      const alpha = f.infer();

      subtype.check(alpha, f.isect(f.imm(), f.ref(a)));
      subtype.check(alpha, f.imm());

      const upper = bounds.get(alpha.id).upper;
      expect(upper && formatType(upper)).toBe('imm & A');
    });

    it('should prefer a concrete member of a union to a variable', () => {
      const { f, bounds, subtype } = setup();
      const a = f.class('A');
      const alpha = f.infer();

      expect(subtype.check(f.ref(a), f.union(alpha, f.ref(a)))).toBe(true);
      expect(bounds.has(alpha.id)).toBe(false);
    });
  });

  describe('Dynamic dispatch', () => {
    function dispatchSetup() {
      const env = setup();
      const { f } = env;
      const a = f.class('A');
      const b = f.class('B');
      const refA = f.ref(a);
      const refB = f.ref(b);
      return { ...env, a, b, refA, refB };
    }

    it('should narrow the receiver to the disjuncts that have the member', () => {
      const { f, lookup, subtype, a, refA, refB } = dispatchSetup();
      const get = f.function('get', { params: [{ name: 'self', type: refA }], result: f.imm() }, () => undefined, a);
      const receiver = f.union(refA, refB);
      const call = functionType(receiver, f.infer());

      const members = subtype.dynamic(lookup.member(receiver, f.typename('get')), call);

      expect(members).toHaveLength(1);
      expect(members?.[0]?.def).toBe(get.id);
      expect(call.left && formatType(call.left)).toBe('(A | B) & A');
    });

    it('should keep the receiver when every disjunct has the member', () => {
      const { f, lookup, subtype, a, b, refA, refB } = dispatchSetup();
      f.function('get', { params: [{ name: 'self', type: refA }], result: f.imm() }, () => undefined, a);
      f.function('get', { params: [{ name: 'self', type: refB }], result: f.imm() }, () => undefined, b);
      const receiver = f.union(refA, refB);
      const call = functionType(receiver, f.infer());

      const members = subtype.dynamic(lookup.member(receiver, f.typename('get')), call);

      expect(members).toHaveLength(2);
      expect(call.left && formatType(call.left)).toBe('A | B');
    });

    it('should fail without touching the call when no member fits', () => {
      const { f, lookup, sink, subtype, a, refA, refB } = dispatchSetup();
      f.function('get', { params: [{ name: 'self', type: refA }], result: f.imm() }, () => undefined, a);
      const receiver = f.union(refA, refB);
      const call = functionType(receiver, refB);

      expect(subtype.dynamic(lookup.member(receiver, f.typename('get')), call)).toBeUndefined();
      expect(call.left && formatType(call.left)).toBe('A | B');
      expect(sink.all()).toHaveLength(0);
    });

    it('should fail when there are no candidates', () => {
      const { f, subtype, refA } = dispatchSetup();

      expect(subtype.dynamic([], functionType(refA, f.imm()))).toBeUndefined();
    });
  });
});
