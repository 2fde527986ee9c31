/**
 * Diagnostics
 */

export type { Severity, Diagnostic, DiagnosticPart } from './diagnostic.js';
export { DiagnosticBuilder, DiagnosticSink } from './diagnostic.js';
export type { RenderOptions } from './render.js';
export { text, renderDiagnostic, renderDiagnostics } from './render.js';
