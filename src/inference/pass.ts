/**
 * Pass - Post-order AST traversal with an explicit ancestor path
 *
 * Subclasses implement `post`, which runs after a node's children. While it
 * runs, `path` holds the node and all its ancestors, and the scope stack
 * holds the symbol tables enclosing the node. A scope node's own table is
 * popped before its `post` runs, so a lambda sees the scope it is defined in.
 */

import type { Node, Kind, NodeOfKind } from '../ast/nodes.js';
import { hasKind, isScope } from '../ast/nodes.js';
import type { SymbolTable } from '../ast/symbols.js';
import { children } from '../ast/traversal.js';
import type { DiagnosticSink, DiagnosticBuilder } from '../diagnostics/diagnostic.js';

export abstract class Pass {
  private readonly path: Node[] = [];
  private readonly scopes: SymbolTable[] = [];
  private errorCount = 0;

  constructor(private readonly sink: DiagnosticSink) {}

  /**
   * True while this pass has reported no errors
   */
  get ok(): boolean {
    return this.errorCount === 0;
  }

  /**
   * Visit a whole tree
   */
  traverse(root: Node): boolean {
    this.visit(root);
    return this.ok;
  }

  protected abstract post(node: Node): void;

  private visit(node: Node): void {
    const scoped = isScope(node);
    if (scoped) {
      this.scopes.push(node.symbols);
    }
    this.path.push(node);

    for (const child of children(node)) {
      this.visit(child);
    }

    if (scoped) {
      this.scopes.pop();
    }
    this.post(node);
    this.path.pop();
  }

  // ==========================================================================
  // Context
  // ==========================================================================

  /**
   * The ancestor `level` steps up from the current node
   */
  protected parent(level = 1): Node | undefined {
    return this.path[this.path.length - 1 - level];
  }

  /**
   * The nearest strict ancestor of a kind
   */
  protected enclosing<K extends Kind>(kind: K): NodeOfKind<K> | undefined {
    for (let i = this.path.length - 2; i >= 0; i--) {
      const node = this.path[i];
      if (node && hasKind(node, kind)) {
        return node;
      }
    }
    return undefined;
  }

  /**
   * The innermost symbol table enclosing the current node
   */
  protected symbols(): SymbolTable {
    const table = this.scopes[this.scopes.length - 1];
    if (!table) {
      throw new Error('Pass is not inside any scope');
    }
    return table;
  }

  /**
   * Start an error diagnostic counted against this pass
   */
  protected error(): DiagnosticBuilder {
    this.errorCount++;
    return this.sink.error();
  }
}
