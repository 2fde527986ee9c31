/**
 * Diagnostics - Error accumulation shared by the visitor and the solver
 *
 * A diagnostic is an ordered list of (location, message) parts: the first
 * part says what went wrong, later parts point at related code ("Definition
 * is here."). Nothing is thrown for a type error; passes keep going and the
 * sink collects everything in the order it was reported.
 */

import type { Location } from '../ast/location.js';

export type Severity = 'error' | 'warning';

export interface DiagnosticPart {
  readonly location: Location;
  readonly message: string;
}

export interface Diagnostic {
  readonly severity: Severity;
  readonly parts: readonly DiagnosticPart[];
}

/**
 * Appends parts to a diagnostic that is already recorded in its sink
 */
export class DiagnosticBuilder {
  constructor(private readonly parts: DiagnosticPart[]) {}

  /**
   * Add a located message
   */
  at(location: Location, message: string): this {
    this.parts.push({ location, message });
    return this;
  }
}

/**
 * Collects diagnostics in report order
 */
export class DiagnosticSink {
  private readonly diagnostics: Diagnostic[] = [];

  /**
   * Start a new error
   */
  error(): DiagnosticBuilder {
    return this.report('error');
  }

  /**
   * Start a new warning
   */
  warning(): DiagnosticBuilder {
    return this.report('warning');
  }

  private report(severity: Severity): DiagnosticBuilder {
    const parts: DiagnosticPart[] = [];
    this.diagnostics.push({ severity, parts });
    return new DiagnosticBuilder(parts);
  }

  /**
   * All diagnostics in report order
   */
  all(): readonly Diagnostic[] {
    return this.diagnostics;
  }

  /**
   * Errors only
   */
  errors(): readonly Diagnostic[] {
    return this.diagnostics.filter(d => d.severity === 'error');
  }

  get errorCount(): number {
    return this.errors().length;
  }

  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error');
  }

  /**
   * The headline message of every diagnostic, in order
   */
  messages(): string[] {
    return this.diagnostics.map(d => d.parts[0]?.message ?? '');
  }

  clear(): void {
    this.diagnostics.length = 0;
  }
}
