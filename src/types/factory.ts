/**
 * Type Factory - Constructors that keep the lattice invariants
 *
 * - intersections and unions are flattened, deduplicated by structural key,
 *   and collapse to their single member
 * - function types take their argument list in the shape calls use:
 *   absent, a single type, or a tuple
 */

import type {
  Type,
  IsectType,
  UnionType,
  TupleType,
  FunctionType,
  ThrowType,
  InferType,
  LookupRef,
  Imm,
  Mut,
  Iso,
  DeclId,
  Substitution,
  Lambda,
  TypeName,
  TypeRef,
} from '../ast/nodes.js';
import type { Location } from '../ast/location.js';
import { typeKey } from './format.js';

// ============================================================================
// Lattice Operators
// ============================================================================

/**
 * Create an intersection. Nested intersections are flattened.
 */
export function isect(types: readonly Type[], location?: Location): Type {
  const members = flatten(types, 'IsectType');
  const first = members[0];
  if (first === undefined) {
    throw new Error('An intersection needs at least one member');
  }
  if (members.length === 1) {
    return first;
  }
  const result: IsectType = {
    kind: 'IsectType',
    location: location ?? first.location,
    types: members,
  };
  return result;
}

/**
 * Create a union. Nested unions are flattened.
 */
export function union(types: readonly Type[], location?: Location): Type {
  const members = flatten(types, 'UnionType');
  const first = members[0];
  if (first === undefined) {
    throw new Error('A union needs at least one member');
  }
  if (members.length === 1) {
    return first;
  }
  const result: UnionType = {
    kind: 'UnionType',
    location: location ?? first.location,
    types: members,
  };
  return result;
}

function flatten(types: readonly Type[], kind: 'IsectType' | 'UnionType'): Type[] {
  const seen = new Set<string>();
  const out: Type[] = [];

  const add = (type: Type): void => {
    if (type.kind === kind) {
      type.types.forEach(add);
      return;
    }
    const key = typeKey(type);
    if (!seen.has(key)) {
      seen.add(key);
      out.push(type);
    }
  };

  types.forEach(add);
  return out;
}

// ============================================================================
// Structural Types
// ============================================================================

export function tuple(types: readonly Type[], location: Location): TupleType {
  return { kind: 'TupleType', location, types };
}

export function functionType(left: Type | undefined, right: Type, location?: Location): FunctionType {
  return { kind: 'FunctionType', location: location ?? right.location, left, right };
}

export function throwType(type: Type, location?: Location): ThrowType {
  return { kind: 'ThrowType', location: location ?? type.location, type };
}

/**
 * Pack argument types the way call sites do: none, one, or a tuple
 */
export function argumentType(types: readonly Type[], location: Location): Type | undefined {
  if (types.length === 0) {
    return undefined;
  }
  if (types.length === 1) {
    return types[0];
  }
  return tuple(types, location);
}

/**
 * The function type of a lambda: its parameter types to its result
 */
export function functionTypeOf(lambda: Lambda): FunctionType {
  return functionType(
    argumentType(lambda.params.map(p => p.type), lambda.location),
    lambda.result,
    lambda.location
  );
}

/**
 * The receiver (self) slot of a call's argument type
 */
export function receiverType(left: Type): Type {
  if (left.kind === 'TupleType') {
    const first = left.types[0];
    if (first !== undefined) {
      return first;
    }
  }
  return left;
}

/**
 * Replace the receiver slot of a call's argument type
 */
export function withReceiver(left: Type, receiver: Type): Type {
  if (left.kind === 'TupleType' && left.types.length > 0) {
    return tuple([receiver, ...left.types.slice(1)], left.location);
  }
  return receiver;
}

// ============================================================================
// Atoms
// ============================================================================

export function imm(location: Location): Imm {
  return { kind: 'Imm', location };
}

export function mut(location: Location): Mut {
  return { kind: 'Mut', location };
}

export function iso(location: Location): Iso {
  return { kind: 'Iso', location };
}

export function inferType(id: number, location: Location): InferType {
  return { kind: 'InferType', location, id };
}

export function lookupRef(
  def: DeclId,
  location: Location,
  subs: Substitution = new Map(),
  self?: Type
): LookupRef {
  return self === undefined
    ? { kind: 'LookupRef', location, def, subs }
    : { kind: 'LookupRef', location, def, subs, self };
}

export function typeName(location: Location, typeargs: readonly Type[] = []): TypeName {
  return { kind: 'TypeName', location, typeargs };
}

export function typeRef(typenames: readonly TypeName[], location?: Location): TypeRef {
  const first = typenames[0];
  if (first === undefined) {
    throw new Error('A type reference needs at least one name');
  }
  return { kind: 'TypeRef', location: location ?? first.location, typenames };
}

// ============================================================================
// Traversal
// ============================================================================

/**
 * Rebuild a type with `fn` applied to each direct child type.
 * Intersections and unions go back through the factories, so results keep
 * the lattice invariants.
 */
export function mapType(type: Type, fn: (child: Type) => Type): Type {
  switch (type.kind) {
    case 'IsectType':
      return isect(type.types.map(fn), type.location);
    case 'UnionType':
      return union(type.types.map(fn), type.location);
    case 'TupleType':
      return tuple(type.types.map(fn), type.location);
    case 'FunctionType':
      return functionType(
        type.left === undefined ? undefined : fn(type.left),
        fn(type.right),
        type.location
      );
    case 'ThrowType':
      return throwType(fn(type.type), type.location);
    case 'LookupRef': {
      const subs = new Map<DeclId, Type>();
      for (const [id, arg] of type.subs) {
        subs.set(id, fn(arg));
      }
      return lookupRef(type.def, type.location, subs, type.self);
    }
    case 'TypeRef':
      return typeRef(
        type.typenames.map(n => typeName(n.location, n.typeargs.map(fn))),
        type.location
      );
    case 'Imm':
    case 'Mut':
    case 'Iso':
    case 'InferType':
      return type;
  }
}

/**
 * Check whether a type mentions any inference variable
 */
export function containsInfer(type: Type): boolean {
  let found = false;
  const visit = (t: Type): Type => {
    if (t.kind === 'InferType') {
      found = true;
      return t;
    }
    return mapType(t, visit);
  };
  visit(type);
  return found;
}
