/**
 * Bounds - The interval known for each inference variable
 *
 * Each variable α has `lower <: α <: upper`. Intervals only tighten:
 * lower bounds are joined, upper bounds are met. Bound records are
 * immutable, so a snapshot is a shallow copy of the map and rolling back a
 * failed check is restoring that copy.
 */

import type { Type, InferType, Solution } from '../ast/nodes.js';
import { isect, union, mapType } from '../types/factory.js';

export interface Bound {
  readonly lower?: Type;
  readonly upper?: Type;
}

export type BoundsSnapshot = ReadonlyMap<number, Bound>;

const UNBOUNDED: Bound = {};

export class Bounds implements Solution {
  private bounds = new Map<number, Bound>();

  get(id: number): Bound {
    return this.bounds.get(id) ?? UNBOUNDED;
  }

  set(id: number, bound: Bound): void {
    this.bounds.set(id, bound);
  }

  has(id: number): boolean {
    return this.bounds.has(id);
  }

  snapshot(): BoundsSnapshot {
    return new Map(this.bounds);
  }

  restore(snapshot: BoundsSnapshot): void {
    this.bounds = new Map(snapshot);
  }

  entries(): IterableIterator<[number, Bound]> {
    return this.bounds.entries();
  }

  get size(): number {
    return this.bounds.size;
  }

  // ==========================================================================
  // Solutions
  // ==========================================================================

  /**
   * Replace every solvable inference variable in a type by its solution.
   *
   * A variable solves to its lower bound when that is known, otherwise to
   * its upper bound. Variables that stay unsolved (no bounds, or only
   * bounds that lead back to themselves) are dropped from intersections
   * and unions that have other members, and kept as-is elsewhere.
   */
  solve(type: Type): Type {
    return this.solveType(type, new Set());
  }

  /**
   * Check whether a variable has a solution
   */
  isSolved(infer: InferType): boolean {
    return this.solveVar(infer, new Set()) !== undefined;
  }

  private solveType(type: Type, visiting: ReadonlySet<number>): Type {
    switch (type.kind) {
      case 'InferType':
        return this.solveVar(type, visiting) ?? type;

      case 'IsectType':
      case 'UnionType': {
        const members = type.types.map(t => this.solveType(t, visiting));
        const solved = members.filter(t => t.kind !== 'InferType');
        const keep = solved.length > 0 ? solved : members;
        return type.kind === 'IsectType'
          ? isect(keep, type.location)
          : union(keep, type.location);
      }

      default:
        return mapType(type, child => this.solveType(child, visiting));
    }
  }

  private solveVar(infer: InferType, visiting: ReadonlySet<number>): Type | undefined {
    if (visiting.has(infer.id)) {
      return undefined;
    }

    const bound = this.get(infer.id);
    const next = new Set(visiting).add(infer.id);

    for (const candidate of [bound.lower, bound.upper]) {
      if (candidate === undefined) continue;
      const solved = this.solveType(candidate, next);
      if (solved.kind !== 'InferType') {
        return solved;
      }
    }

    return undefined;
  }
}
