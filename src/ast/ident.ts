/**
 * Identifier Interner
 *
 * Maps names to stable locations. Interning the same string twice yields
 * the same Location object, so interned names can be compared by identity
 * as well as by text.
 */

import { Location, Source } from './location.js';

/** Names every pass needs before it looks at the AST */
const PREINTERNED = ['imm', 'Bool', 'Integer', 'Float', 'apply'] as const;

export class Ident {
  private readonly names = new Map<string, Location>();

  constructor() {
    for (const name of PREINTERNED) {
      this.intern(name);
    }
  }

  /**
   * Get the location for a name, creating it on first use
   */
  intern(name: string): Location {
    const existing = this.names.get(name);
    if (existing) {
      return existing;
    }

    const location = new Location(new Source('', name), 0, name.length);
    this.names.set(name, location);
    return location;
  }

  /**
   * Check whether a name has been interned
   */
  has(name: string): boolean {
    return this.names.has(name);
  }

  get size(): number {
    return this.names.size;
  }
}
