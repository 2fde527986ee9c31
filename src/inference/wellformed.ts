/**
 * Well-formedness - Post-pass check for unsolved inference variables
 *
 * An inference variable is unsolved when its bounds (as attached to the
 * module by the last inference run) do not give it a solution. Reporting is
 * off by default; with `reportUnresolved` every unsolved occurrence is an
 * error.
 */

import type { Node, Module, Solution, InferType } from '../ast/nodes.js';
import type { DiagnosticSink } from '../diagnostics/diagnostic.js';
import type { InferConfig } from '../config.js';
import { resolveConfig } from '../config.js';
import { Pass } from './pass.js';

class WellFormed extends Pass {
  constructor(
    sink: DiagnosticSink,
    private readonly solution: Solution | undefined,
    private readonly config: InferConfig
  ) {
    super(sink);
  }

  protected override post(node: Node): void {
    if (node.kind === 'InferType') {
      this.postInfer(node);
    }
  }

  private postInfer(node: InferType): void {
    if (!this.config.reportUnresolved) {
      return;
    }

    const solved = this.solution ? this.solution.solve(node) : node;
    if (solved.kind === 'InferType') {
      this.error().at(node.location, 'Unresolved type.');
    }
  }
}

/**
 * Check a module after inference.
 *
 * @returns true when no error was reported
 */
export function wellformed(ast: Module, sink: DiagnosticSink, config: Partial<InferConfig> = {}): boolean {
  const pass = new WellFormed(sink, ast.solution, resolveConfig(config));
  return pass.traverse(ast);
}
