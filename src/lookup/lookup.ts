/**
 * Lookup Engine - Resolve type references and member selectors
 *
 * Both operations only read the program: they walk symbol tables and the
 * declaration arena, and read (never write) the solver's current bounds
 * when a receiver is an inference variable.
 */

import type {
  Type,
  TypeRef,
  TypeName,
  LookupRef,
  Entity,
  DeclId,
  Member,
} from '../ast/nodes.js';
import { typeParamsOf } from '../ast/nodes.js';
import type { Declarations } from '../ast/declarations.js';
import type { SymbolTable } from '../ast/symbols.js';
import type { Location } from '../ast/location.js';
import type { Bounds } from '../solver/bounds.js';
import { lookupRef, mapType, functionTypeOf } from '../types/factory.js';
import { substitute, extend } from '../types/substitute.js';
import { dnf, disjuncts, conjuncts } from '../types/dnf.js';

export class Lookup {
  constructor(
    private readonly declarations: Declarations,
    private readonly bounds: Bounds
  ) {}

  // ==========================================================================
  // Type References
  // ==========================================================================

  /**
   * Resolve a qualified type path.
   *
   * The first segment is looked up from `scope` outwards; each later segment
   * is a member of the declaration the previous one resolved to. Type
   * arguments bind to the declaration's type parameters, with defaults
   * filling in missing trailing arguments. A type alias resolves to its
   * aliased type.
   *
   * @returns undefined for an undefined segment or an arity mismatch
   */
  typeref(scope: SymbolTable, ref: TypeRef): Type | undefined {
    let subs = new Map<DeclId, Type>();
    let container: LookupRef | undefined;
    let result: Type | undefined;

    for (const [index, name] of ref.typenames.entries()) {
      const entity = index === 0
        ? scope.lookupType(name.location)
        : this.memberEntity(container, name.location);

      if (!entity) {
        return undefined;
      }

      const bound = this.bind(entity, name.typeargs, subs);
      if (!bound) {
        return undefined;
      }
      subs = bound;

      if (entity.kind === 'TypeAlias') {
        result = substitute(entity.inherits, subs);
        if (result.kind === 'LookupRef') {
          container = result;
          subs = extend(subs, result.subs);
        } else {
          container = undefined;
        }
      } else {
        container = lookupRef(entity.id, name.location, new Map(subs));
        result = container;
      }
    }

    return result;
  }

  /**
   * A declaration nested directly in the class or interface `container`
   */
  private memberEntity(container: LookupRef | undefined, name: Location): Member | undefined {
    if (!container) {
      return undefined;
    }

    const owner = this.entity(container);
    if (!owner || (owner.kind !== 'Class' && owner.kind !== 'Interface')) {
      return undefined;
    }

    const found = owner.symbols.get(name);
    if (!found) {
      return undefined;
    }

    switch (found.kind) {
      case 'Class':
      case 'Interface':
      case 'TypeAlias':
      case 'Function':
      case 'Field':
        return found;
      default:
        return undefined;
    }
  }

  /**
   * Bind type arguments to an entity's type parameters on top of `outer`
   */
  private bind(entity: Entity, typeargs: readonly Type[], outer: ReadonlyMap<DeclId, Type>): Map<DeclId, Type> | undefined {
    const params = typeParamsOf(entity);
    if (typeargs.length > params.length) {
      return undefined;
    }

    const subs = new Map(outer);
    for (const [i, param] of params.entries()) {
      const arg = typeargs[i] ?? (param.dflt && substitute(param.dflt, subs));
      if (!arg) {
        return undefined;
      }
      subs.set(param.id, arg);
    }
    return subs;
  }

  // ==========================================================================
  // Members
  // ==========================================================================

  /**
   * Every member named `name` reachable through any disjunct of `receiver`.
   * Each result's `self` is the disjunct it was found through.
   */
  member(receiver: Type, name: TypeName): LookupRef[] {
    const results: LookupRef[] = [];

    for (const clause of disjuncts(dnf(this.expand(receiver)))) {
      for (const found of this.clauseMembers(clause, name.location, new Set())) {
        const bound = this.bindMethod(found, name);
        if (bound) {
          results.push(lookupRef(found.def, name.location, bound, clause));
        }
      }
    }

    return results;
  }

  private clauseMembers(clause: Type, name: Location, visiting: Set<string>): LookupRef[] {
    const results: LookupRef[] = [];

    for (const atom of conjuncts(clause)) {
      switch (atom.kind) {
        case 'LookupRef': {
          const entity = this.entity(atom);
          if (!entity) break;

          if (entity.kind === 'Class' || entity.kind === 'Interface') {
            const found = this.findMember(atom, name);
            if (found) results.push(found);
          } else if (entity.kind === 'TypeParam' && entity.upper) {
            const key = `#${entity.id}`;
            if (visiting.has(key)) break;
            visiting.add(key);
            results.push(...this.singleClauseMembers(substitute(entity.upper, atom.subs), name, visiting));
          }
          break;
        }

        case 'InferType': {
          const key = `?${atom.id}`;
          const upper = this.bounds.get(atom.id).upper;
          if (!upper || visiting.has(key)) break;
          visiting.add(key);
          results.push(...this.singleClauseMembers(upper, name, visiting));
          break;
        }

        default:
          break;
      }
    }

    return results;
  }

  /**
   * Members of a bound, which only count when the bound is a single clause
   */
  private singleClauseMembers(bound: Type, name: Location, visiting: Set<string>): LookupRef[] {
    const normal = dnf(this.expand(bound));
    return normal.kind === 'UnionType' ? [] : this.clauseMembers(normal, name, visiting);
  }

  /**
   * Bind a selected method's own type parameters from the selector
   */
  private bindMethod(found: LookupRef, name: TypeName): Map<DeclId, Type> | undefined {
    const entity = this.entity(found);
    if (!entity) {
      return undefined;
    }
    if (name.typeargs.length === 0) {
      return new Map(found.subs);
    }
    return this.bind(entity, name.typeargs, found.subs);
  }

  /**
   * Find a member of a class or interface, searching its `inherits` chain
   * when it does not declare one itself
   */
  findMember(ref: LookupRef, name: Location, visited: Set<DeclId> = new Set()): LookupRef | undefined {
    const owner = this.entity(ref);
    if (!owner || (owner.kind !== 'Class' && owner.kind !== 'Interface')) {
      return undefined;
    }
    if (visited.has(owner.id)) {
      return undefined;
    }
    visited.add(owner.id);

    const member = this.memberEntity(ref, name);
    if (member) {
      return lookupRef(member.id, name, ref.subs);
    }

    const inherits = this.inherits(ref);
    if (!inherits) {
      return undefined;
    }

    const normal = dnf(this.expand(inherits));
    if (normal.kind === 'UnionType') {
      return undefined;
    }

    for (const atom of conjuncts(normal)) {
      if (atom.kind === 'LookupRef') {
        const found = this.findMember(atom, name, visited);
        if (found) return found;
      }
    }
    return undefined;
  }

  // ==========================================================================
  // Declarations
  // ==========================================================================

  /**
   * The declaration a reference points at; undefined once it has been dropped
   */
  entity(ref: LookupRef): Entity | undefined {
    return this.declarations.get(ref.def);
  }

  /**
   * The type a function, field or alias reference stands for, with the
   * reference's substitution applied
   */
  signature(ref: LookupRef): Type | undefined {
    const entity = this.entity(ref);
    if (!entity) {
      return undefined;
    }

    switch (entity.kind) {
      case 'Function':
        return substitute(functionTypeOf(entity.lambda), ref.subs);
      case 'Field':
        return substitute(entity.type, ref.subs);
      case 'TypeAlias':
        return substitute(entity.inherits, ref.subs);
      default:
        return undefined;
    }
  }

  /**
   * The declared supertype of a class or interface reference
   */
  inherits(ref: LookupRef): Type | undefined {
    const entity = this.entity(ref);
    if ((entity?.kind === 'Class' || entity?.kind === 'Interface') && entity.inherits) {
      return substitute(entity.inherits, ref.subs);
    }
    return undefined;
  }

  /**
   * Expand type aliases everywhere in a type. A cyclic alias is left as
   * a reference at the point it recurs.
   */
  expand(type: Type, visiting: ReadonlySet<DeclId> = new Set()): Type {
    if (type.kind === 'LookupRef') {
      const entity = this.entity(type);
      if (entity?.kind === 'TypeAlias' && !visiting.has(entity.id)) {
        const next = new Set(visiting).add(entity.id);
        return this.expand(substitute(entity.inherits, type.subs), next);
      }
      return type;
    }
    if (type.kind === 'InferType') {
      return type;
    }
    return mapType(type, child => this.expand(child, visiting));
  }
}
