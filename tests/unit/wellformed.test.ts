/**
 * Tests for the well-formedness check after inference
 */

import { describe, it, expect } from 'vitest';
import { AstFactory } from '../../src/ast/factory.js';
import { DiagnosticSink } from '../../src/diagnostics/diagnostic.js';
import { run } from '../../src/inference/infer.js';
import { wellformed } from '../../src/inference/wellformed.js';

function program(assignX: boolean): AstFactory {
  const f = new AstFactory();
  f.class('Integer');
  f.function('main', { result: f.imm() }, b => {
    b.declare('x');
    if (assignX) {
      b.assign(b.ref('x'), b.int('1'));
    }
  });
  return f;
}

describe('wellformed', () => {
  it('should report an unconstrained local when asked', () => {
    const f = program(false);
    expect(run(f.module, new DiagnosticSink())).toBe(true);

    const sink = new DiagnosticSink();
    expect(wellformed(f.module, sink, { reportUnresolved: true })).toBe(false);
    expect(sink.messages()).toEqual(['Unresolved type.']);
    expect(sink.all()[0]?.parts[0]?.location.view()).toBe('x');
  });

  it('should stay quiet by default', () => {
    const f = program(false);
    run(f.module, new DiagnosticSink());

    const sink = new DiagnosticSink();
    expect(wellformed(f.module, sink)).toBe(true);
    expect(sink.all()).toHaveLength(0);
  });

  it('should accept locals the run solved', () => {
    const f = program(true);
    expect(run(f.module, new DiagnosticSink())).toBe(true);

    const sink = new DiagnosticSink();
    expect(wellformed(f.module, sink, { reportUnresolved: true })).toBe(true);
    expect(sink.all()).toHaveLength(0);
  });

  it('should treat every variable as unsolved before any run', () => {
    const f = program(true);

    const sink = new DiagnosticSink();
    expect(wellformed(f.module, sink, { reportUnresolved: true })).toBe(false);
    expect(sink.messages()).toEqual(['Unresolved type.']);
  });
});
