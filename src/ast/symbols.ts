/**
 * Symbol Tables - Lexical scoping for locals and declarations
 *
 * Every scope (module, class, interface, lambda) owns a table chained to the
 * table of its enclosing scope. Name resolution fills the tables; inference
 * only reads them.
 */

import type { Location } from './location.js';
import type { Entity, Local } from './nodes.js';
import { isEntity, isLocal } from './nodes.js';

export type Binding = Local | Entity;

export class SymbolTable {
  private readonly symbols = new Map<string, Binding>();

  constructor(readonly parent: SymbolTable | null = null) {}

  /**
   * Create a table for a nested scope
   */
  extend(): SymbolTable {
    return new SymbolTable(this);
  }

  /**
   * Define a name in this scope
   */
  define(name: Location, symbol: Binding): void {
    const key = name.view();
    if (this.symbols.has(key)) {
      throw new Error(`'${key}' is already defined in this scope`);
    }
    this.symbols.set(key, symbol);
  }

  /**
   * Look up a name in this scope only
   */
  get(name: Location): Binding | undefined {
    return this.symbols.get(name.view());
  }

  /**
   * Find the local visible under this name, walking outwards
   */
  getLocal(name: Location): Local | undefined {
    const symbol = this.symbols.get(name.view());
    if (symbol && isLocal(symbol)) {
      return symbol;
    }
    return this.parent?.getLocal(name);
  }

  /**
   * Find the declaration visible under this name, walking outwards
   */
  lookupType(name: Location): Entity | undefined {
    const symbol = this.symbols.get(name.view());
    if (symbol && isEntity(symbol)) {
      return symbol;
    }
    return this.parent?.lookupType(name);
  }

  /**
   * Names defined directly in this scope
   */
  names(): IterableIterator<string> {
    return this.symbols.keys();
  }
}
