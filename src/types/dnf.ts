/**
 * Disjunctive Normal Form
 *
 * A normalized type is a single clause or a union of clauses, where a clause
 * is an atom or an intersection of atoms:
 *
 *   (A | B) & C  =>  (A & C) | (B & C)
 *
 * Tuples, functions and throw types are atoms whose components are
 * normalized in place. Throw types distribute over unions:
 *
 *   throw (A | B)  =>  throw A | throw B
 */

import type { Type } from '../ast/nodes.js';
import {
  isect,
  union,
  tuple,
  functionType,
  throwType,
} from './factory.js';

/**
 * Rewrite a type into union-of-intersections form
 */
export function dnf(type: Type): Type {
  switch (type.kind) {
    case 'UnionType':
      return union(type.types.map(dnf), type.location);

    case 'IsectType': {
      // Cartesian product of the members' disjuncts
      let clauses: Type[][] = [[]];
      for (const member of type.types) {
        const next: Type[][] = [];
        for (const clause of clauses) {
          for (const d of disjuncts(dnf(member))) {
            next.push([...clause, d]);
          }
        }
        clauses = next;
      }
      return union(clauses.map(c => isect(c, type.location)), type.location);
    }

    case 'TupleType':
      return tuple(type.types.map(dnf), type.location);

    case 'FunctionType':
      return functionType(
        type.left === undefined ? undefined : dnf(type.left),
        dnf(type.right),
        type.location
      );

    case 'ThrowType':
      return throwtype(dnf(type.type));

    default:
      return type;
  }
}

/**
 * Wrap a type as a thrown result, distributing over unions.
 * An already thrown type is not wrapped again.
 */
export function throwtype(type: Type): Type {
  switch (type.kind) {
    case 'UnionType':
      return union(type.types.map(throwtype), type.location);
    case 'ThrowType':
      return type;
    default:
      return throwType(type, type.location);
  }
}

/**
 * Narrow an upper bound: `upper & type`
 */
export function conjunction(upper: Type | undefined, type: Type): Type {
  return upper === undefined ? type : isect([upper, type], upper.location);
}

/**
 * Widen a lower bound: `lower | type`
 */
export function disjunction(lower: Type | undefined, type: Type): Type {
  return lower === undefined ? type : union([lower, type], lower.location);
}

/**
 * Top-level disjuncts of a type (itself if it is not a union)
 */
export function disjuncts(type: Type): readonly Type[] {
  return type.kind === 'UnionType' ? type.types : [type];
}

/**
 * Top-level conjuncts of a type (itself if it is not an intersection)
 */
export function conjuncts(type: Type): readonly Type[] {
  return type.kind === 'IsectType' ? type.types : [type];
}
