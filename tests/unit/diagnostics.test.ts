/**
 * Tests for diagnostic collection and rendering
 */

import { describe, it, expect } from 'vitest';
import { Ident } from '../../src/ast/ident.js';
import { Source, Location } from '../../src/ast/location.js';
import { DiagnosticSink } from '../../src/diagnostics/diagnostic.js';
import { renderDiagnostic, renderDiagnostics, text } from '../../src/diagnostics/render.js';

describe('DiagnosticSink', () => {
  it('should keep diagnostics in report order', () => {
    const ident = new Ident();
    const sink = new DiagnosticSink();

    sink.error().at(ident.intern('x'), 'first').at(ident.intern('y'), 'related');
    sink.warning().at(ident.intern('z'), 'second');

    expect(sink.messages()).toEqual(['first', 'second']);
    expect(sink.all()[0]?.parts).toHaveLength(2);
    expect(sink.errorCount).toBe(1);
    expect(sink.hasErrors()).toBe(true);
  });

  it('should forget everything on clear', () => {
    const sink = new DiagnosticSink();
    sink.error().at(new Ident().intern('x'), 'gone');

    sink.clear();

    expect(sink.all()).toHaveLength(0);
    expect(sink.hasErrors()).toBe(false);
  });
});

describe('Rendering', () => {
  const source = new Source('a.cap', 'let x;\nx = 3;\n');

  it('should show a code frame for file locations', () => {
    const sink = new DiagnosticSink();
    sink.error().at(new Location(source, 7, 8), 'Variable used before assignment');

    const [diagnostic] = sink.all();
    const rendered = diagnostic && renderDiagnostic(diagnostic);

    expect(rendered).toBe('error: a.cap:2:1: Variable used before assignment\n> 2 | x = 3;\n    | ^');
  });

  it('should show interned names as their text', () => {
    const location = new Ident().intern('x');
    const sink = new DiagnosticSink();
    sink.error().at(location, 'msg');

    expect(text(location)).toBe('x');
    expect(renderDiagnostics(sink.all())).toBe('error: msg\nx');
  });

  it('should separate diagnostics by a blank line', () => {
    const ident = new Ident();
    const sink = new DiagnosticSink();
    sink.error().at(ident.intern('a'), 'one');
    sink.warning().at(ident.intern('b'), 'two');

    expect(renderDiagnostics(sink.all())).toBe('error: one\na\n\nwarning: two\nb');
  });
});
