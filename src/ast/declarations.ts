/**
 * Declaration Arena
 *
 * Declarations are referred to by handle. LookupRefs and substitutions hold
 * handles, so a method whose signature names its own class does not make the
 * type graph cyclic.
 */

import type { DeclId, Entity } from './nodes.js';

export class Declarations {
  private readonly entities = new Map<DeclId, Entity>();
  private counter = 0;

  /**
   * Reserve a handle for a declaration about to be built
   */
  reserve(): DeclId {
    return this.counter++;
  }

  /**
   * Register a declaration under its handle
   */
  register<T extends Entity>(entity: T): T {
    if (this.entities.has(entity.id)) {
      throw new Error(`Declaration handle ${entity.id} is already in use`);
    }
    this.entities.set(entity.id, entity);
    return entity;
  }

  /**
   * Resolve a handle; undefined once the declaration has been dropped
   */
  get(id: DeclId): Entity | undefined {
    return this.entities.get(id);
  }

  /**
   * Resolve a handle that must be live
   */
  expect(id: DeclId): Entity {
    const entity = this.entities.get(id);
    if (!entity) {
      throw new Error(`Dangling declaration handle ${id}`);
    }
    return entity;
  }

  /**
   * Drop a declaration. References to it stop resolving.
   */
  drop(id: DeclId): boolean {
    return this.entities.delete(id);
  }

  get size(): number {
    return this.entities.size;
  }
}
