/**
 * Diagnostic Rendering - Plain-text output with source excerpts
 *
 * Parts located in a real source file get a code frame underlining the
 * range; interned names have no file to show and render as their text.
 */

import { codeFrameColumns } from '@babel/code-frame';
import type { Location } from '../ast/location.js';
import type { Diagnostic, DiagnosticPart } from './diagnostic.js';

export interface RenderOptions {
  /** Lines of context above and below the excerpt */
  contextLines?: number;
  /** ANSI colours in the excerpt */
  color?: boolean;
}

const DEFAULT_RENDER_OPTIONS: Required<RenderOptions> = {
  contextLines: 0,
  color: false,
};

/**
 * The source text a location points at, as shown under a message
 */
export function text(location: Location, options: RenderOptions = {}): string {
  if (!location.isFile()) {
    return location.view();
  }

  const opts = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const source = location.source;
  const start = source.linecol(location.start);
  const end = source.linecol(Math.max(location.start, location.end));

  return codeFrameColumns(
    source.contents,
    {
      start: { line: start.line, column: start.column },
      end: { line: end.line, column: end.column },
    },
    {
      highlightCode: opts.color,
      forceColor: opts.color,
      linesAbove: opts.contextLines,
      linesBelow: opts.contextLines,
    }
  );
}

function renderPart(part: DiagnosticPart, options: RenderOptions): string {
  const header = part.location.isFile()
    ? `${part.location.toString()}: ${part.message}`
    : part.message;
  const excerpt = text(part.location, options);
  return excerpt === '' ? header : `${header}\n${excerpt}`;
}

/**
 * Render one diagnostic
 */
export function renderDiagnostic(diagnostic: Diagnostic, options: RenderOptions = {}): string {
  const body = diagnostic.parts.map(p => renderPart(p, options)).join('\n');
  return `${diagnostic.severity}: ${body}`;
}

/**
 * Render diagnostics separated by blank lines
 */
export function renderDiagnostics(diagnostics: readonly Diagnostic[], options: RenderOptions = {}): string {
  return diagnostics.map(d => renderDiagnostic(d, options)).join('\n\n');
}
