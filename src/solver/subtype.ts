/**
 * Subtype Solver - Decide A <: B while narrowing inference variables
 *
 * Every top-level constraint is transactional: the bounds are snapshotted
 * before the check and restored when it fails, so a failed constraint leaves
 * no trace but its diagnostic. Trials inside a check (picking a disjunct on
 * the right, a conjunct on the left, a dispatch candidate) are nested
 * transactions of the same kind.
 *
 * Termination: a pair already under examination in the current check is
 * assumed to hold (coinduction), which cuts cycles through inference
 * variables and through recursive declarations. `maxDepth` is a backstop
 * for types that keep growing.
 */

import type {
  Type,
  InferType,
  LookupRef,
  FunctionType,
  TupleType,
} from '../ast/nodes.js';
import type { Location } from '../ast/location.js';
import type { DiagnosticSink } from '../diagnostics/diagnostic.js';
import type { InferConfig } from '../config.js';
import type { Lookup } from '../lookup/lookup.js';
import type { Bounds, BoundsSnapshot } from './bounds.js';
import {
  isect,
  union,
  functionType,
  receiverType,
  withReceiver,
  containsInfer,
} from '../types/factory.js';
import { substitute } from '../types/substitute.js';
import { dnf, conjunction, disjunction, disjuncts, conjuncts } from '../types/dnf.js';
import { formatType, typeKey } from '../types/format.js';

type SolverConfig = Pick<InferConfig, 'trace' | 'maxDepth' | 'logger'>;

/** A top-level constraint that held when it was added */
export interface Constraint {
  readonly lhs: Type;
  readonly rhs: Type;
}

interface Checkpoint {
  readonly bounds: BoundsSnapshot;
  readonly seen: ReadonlySet<string>;
}

export class Subtype {
  /** Pairs under examination in the current top-level check */
  private seen = new Set<string>();

  private depth = 0;

  private errorCount = 0;

  private readonly accepted: Constraint[] = [];

  constructor(
    private readonly lookup: Lookup,
    private readonly bounds: Bounds,
    private readonly sink: DiagnosticSink,
    private readonly config: SolverConfig,
    /** Name of the member that makes a class callable */
    private readonly apply: Location
  ) {}

  /**
   * True while no top-level constraint has failed
   */
  get ok(): boolean {
    return this.errorCount === 0;
  }

  /**
   * Constraints added through `check` that held, in the order they were added
   */
  get constraints(): readonly Constraint[] {
    return this.accepted;
  }

  // ==========================================================================
  // Entry Points
  // ==========================================================================

  /**
   * Add the constraint `lhs <: rhs`.
   * On failure the bounds roll back and a diagnostic citing both sides is
   * reported.
   */
  check(lhs: Type, rhs: Type): boolean {
    this.reset();
    const checkpoint = this.checkpoint();
    const ok = this.sub(lhs, rhs);

    this.trace(`${formatType(lhs)} <: ${formatType(rhs)}`, ok);

    if (!ok) {
      this.rollback(checkpoint);
      this.errorCount++;
      const left = formatType(this.bounds.solve(lhs));
      const right = formatType(this.bounds.solve(rhs));
      this.sink.error()
        .at(lhs.location, `Type ${left} is not a subtype of ${right}.`)
        .at(rhs.location, 'The supertype is here.');
      return false;
    }

    this.accepted.push({ lhs, rhs });
    return true;
  }

  /**
   * Dynamic dispatch: find members substitutable for a call.
   *
   * Candidates are grouped by the receiver disjunct they were found through.
   * Every group must supply one member `M` with `M <: call'`, where `call'`
   * is `call` with its receiver narrowed to `receiver & M.self`. On success
   * the call's receiver slot becomes `receiver & (self₁ | … | selfₙ)` and
   * the chosen members are returned. On failure nothing is reported, the
   * bounds roll back and the result is undefined.
   */
  dynamic(candidates: readonly LookupRef[], call: FunctionType): LookupRef[] | undefined {
    const left = call.left;
    if (left === undefined || candidates.length === 0) {
      return undefined;
    }

    this.reset();
    const checkpoint = this.checkpoint();
    const receiver = receiverType(left);

    // Group by self, keeping first-seen order
    const groups = new Map<string, LookupRef[]>();
    for (const candidate of candidates) {
      const key = typeKey(candidate.self ?? receiver);
      const group = groups.get(key);
      if (group) {
        group.push(candidate);
      } else {
        groups.set(key, [candidate]);
      }
    }

    const matched: LookupRef[] = [];
    for (const group of groups.values()) {
      const found = group.find(member => {
        const self = member.self ?? receiver;
        const trial = functionType(
          withReceiver(left, isect([receiver, self])),
          call.right,
          call.location
        );
        return this.attempt(() => this.sub(member, trial));
      });

      if (!found) {
        this.rollback(checkpoint);
        this.trace(`dynamic ${formatType(call)}`, false);
        return undefined;
      }
      matched.push(found);
    }

    const selves = matched.map(m => m.self ?? receiver);
    call.left = withReceiver(left, isect([receiver, union(selves)]));
    this.trace(`dynamic ${formatType(call)}`, true);
    return matched;
  }

  // ==========================================================================
  // Transactions
  // ==========================================================================

  private reset(): void {
    this.seen = new Set();
    this.depth = 0;
  }

  private checkpoint(): Checkpoint {
    return { bounds: this.bounds.snapshot(), seen: new Set(this.seen) };
  }

  private rollback(checkpoint: Checkpoint): void {
    this.bounds.restore(checkpoint.bounds);
    this.seen = new Set(checkpoint.seen);
  }

  /**
   * Run a trial; undo everything it did if it fails
   */
  private attempt(trial: () => boolean): boolean {
    const checkpoint = this.checkpoint();
    if (trial()) {
      return true;
    }
    this.rollback(checkpoint);
    return false;
  }

  /**
   * Try candidates in order until one holds. Inference variables go last so
   * that a concrete alternative is preferred to narrowing a variable.
   */
  private some(types: readonly Type[], trial: (type: Type) => boolean): boolean {
    const ordered = [
      ...types.filter(t => t.kind !== 'InferType'),
      ...types.filter(t => t.kind === 'InferType'),
    ];
    return ordered.some(t => this.attempt(() => trial(t)));
  }

  private trace(what: string, ok: boolean): void {
    if (this.config.trace) {
      this.config.logger.debug(`${what} ${ok ? 'holds' : 'fails'}`);
    }
  }

  // ==========================================================================
  // Relation
  // ==========================================================================

  private sub(lhs: Type, rhs: Type): boolean {
    const lkey = typeKey(lhs);
    const rkey = typeKey(rhs);

    // Rule: identical types
    if (lkey === rkey) {
      return true;
    }

    const key = `${lkey}<:${rkey}`;

    // Rule: a pair under examination holds (coinduction)
    if (this.seen.has(key)) {
      return true;
    }
    this.seen.add(key);

    if (this.depth >= this.config.maxDepth) {
      this.config.logger.warn(
        `Subtype check gave up after ${this.config.maxDepth} levels: ${formatType(lhs)} <: ${formatType(rhs)}`
      );
      return false;
    }

    this.depth++;
    try {
      return this.relate(lhs, rhs);
    } finally {
      this.depth--;
    }
  }

  private relate(lhs: Type, rhs: Type): boolean {
    const l = dnf(this.lookup.expand(lhs));
    const r = dnf(this.lookup.expand(rhs));

    if (l.kind === 'InferType' && r.kind === 'InferType') {
      return this.flow(l, r);
    }
    if (l.kind === 'InferType') {
      return this.narrowUpper(l, r);
    }
    if (r.kind === 'InferType') {
      return this.widenLower(l, r);
    }

    // Rule: (A₁ | A₂) <: B  =>  A₁ <: B ∧ A₂ <: B
    if (l.kind === 'UnionType') {
      return l.types.every(t => this.sub(t, r));
    }

    // Rule: A <: (B₁ | B₂)  =>  A <: B₁ ∨ A <: B₂
    if (r.kind === 'UnionType') {
      return this.some(disjuncts(r), t => this.sub(l, t));
    }

    // Rule: A <: (B₁ & B₂)  =>  A <: B₁ ∧ A <: B₂
    if (r.kind === 'IsectType') {
      return conjuncts(r).every(t => this.sub(l, t));
    }

    // Rule: (A₁ & A₂) <: B  =>  A₁ <: B ∨ A₂ <: B
    if (l.kind === 'IsectType') {
      return this.some(conjuncts(l), t => this.sub(t, r));
    }

    return this.atom(l, r);
  }

  // ==========================================================================
  // Inference Variables
  // ==========================================================================

  /**
   * Rule: α <: β. α is bounded above by β, β below by α.
   */
  private flow(alpha: InferType, beta: InferType): boolean {
    if (alpha.id === beta.id) {
      return true;
    }

    const a = this.bounds.get(alpha.id);
    const b = this.bounds.get(beta.id);
    this.bounds.set(alpha.id, { ...a, upper: conjunction(a.upper, beta) });
    this.bounds.set(beta.id, { ...b, lower: disjunction(b.lower, alpha) });

    return a.lower && b.upper ? this.sub(a.lower, b.upper) : true;
  }

  /**
   * Rule: α <: B. Narrow α's upper bound to `upper & B`, then check that
   * α's lower bound still fits under B. When the variable-free part of the
   * upper bound already implies B, the bound is kept as it is.
   */
  private narrowUpper(alpha: InferType, rhs: Type): boolean {
    const bound = this.bounds.get(alpha.id);
    const upper = bound.upper;
    const fixed = upper ? conjuncts(upper).filter(t => !containsInfer(t)) : [];

    if (fixed.length > 0 && this.attempt(() => this.sub(isect(fixed), rhs))) {
      return true;
    }

    this.bounds.set(alpha.id, { ...bound, upper: conjunction(upper, rhs) });
    return bound.lower ? this.sub(bound.lower, rhs) : true;
  }

  /**
   * Rule: A <: β. Widen β's lower bound to `lower | A`, then check that A
   * fits under β's upper bound. When A is variable-free and already under
   * the variable-free part of the lower bound, the bound is kept as it is.
   */
  private widenLower(lhs: Type, beta: InferType): boolean {
    const bound = this.bounds.get(beta.id);
    const lower = bound.lower;
    const fixed = lower ? disjuncts(lower).filter(t => !containsInfer(t)) : [];

    if (fixed.length > 0 && !containsInfer(lhs) && this.attempt(() => this.sub(lhs, union(fixed)))) {
      return true;
    }

    this.bounds.set(beta.id, { ...bound, lower: disjunction(lower, lhs) });
    return bound.upper ? this.sub(lhs, bound.upper) : true;
  }

  // ==========================================================================
  // Atoms
  // ==========================================================================

  private atom(lhs: Type, rhs: Type): boolean {
    switch (rhs.kind) {
      // Rule: imm <: imm, iso <: imm
      case 'Imm':
        return lhs.kind === 'Imm' || lhs.kind === 'Iso' || this.nominalOnly(lhs, rhs);
      // Rule: mut <: mut, iso <: mut
      case 'Mut':
        return lhs.kind === 'Mut' || lhs.kind === 'Iso' || this.nominalOnly(lhs, rhs);
      // Rule: iso <: iso
      case 'Iso':
        return lhs.kind === 'Iso' || this.nominalOnly(lhs, rhs);
      default:
        break;
    }

    switch (lhs.kind) {
      case 'TupleType':
        return rhs.kind === 'TupleType' && this.tuple(lhs, rhs);
      case 'FunctionType':
        return rhs.kind === 'FunctionType' && this.function(lhs, rhs);
      case 'ThrowType':
        // Rule: throw A <: throw B  =>  A <: B
        return rhs.kind === 'ThrowType' && this.sub(lhs.type, rhs.type);
      case 'LookupRef':
        return this.nominal(lhs, rhs);
      default:
        return false;
    }
  }

  /**
   * A capability on the right is only reachable from a declaration
   * through its supertypes
   */
  private nominalOnly(lhs: Type, rhs: Type): boolean {
    return lhs.kind === 'LookupRef' && this.nominal(lhs, rhs);
  }

  /**
   * Rule: (a₁, …, aₙ) <: (b₁, …, bₙ)  =>  aᵢ <: bᵢ
   */
  private tuple(lhs: TupleType, rhs: TupleType): boolean {
    if (lhs.types.length !== rhs.types.length) {
      return false;
    }
    return lhs.types.every((t, i) => {
      const other = rhs.types[i];
      return other !== undefined && this.sub(t, other);
    });
  }

  /**
   * Rule: (L₁ -> R₁) <: (L₂ -> R₂)  =>  L₂ <: L₁ ∧ R₁ <: R₂
   */
  private function(lhs: FunctionType, rhs: FunctionType): boolean {
    if (lhs.left === undefined || rhs.left === undefined) {
      return lhs.left === rhs.left && this.sub(lhs.right, rhs.right);
    }
    return this.sub(rhs.left, lhs.left) && this.sub(lhs.right, rhs.right);
  }

  /**
   * Rules for a resolved reference on the left
   */
  private nominal(lhs: LookupRef, rhs: Type): boolean {
    const entity = this.lookup.entity(lhs);
    if (!entity) {
      return false;
    }

    // Rule: N[args] <: N[args'] with invariant arguments
    if (rhs.kind === 'LookupRef' && rhs.def === lhs.def) {
      return this.invariantArgs(lhs, rhs);
    }

    switch (entity.kind) {
      case 'TypeParam':
        // Rule: T <: B  =>  upper(T) <: B
        return entity.upper !== undefined && this.sub(substitute(entity.upper, lhs.subs), rhs);

      case 'Class':
      case 'Interface': {
        // Rule: C <: (L -> R)  =>  C::apply <: (L -> R)
        if (rhs.kind === 'FunctionType') {
          const apply = this.lookup.findMember(lhs, this.apply);
          const signature = apply && this.lookup.signature(apply);
          if (signature && this.attempt(() => this.sub(signature, rhs))) {
            return true;
          }
        }

        // Rule: C <: B  =>  inherits(C) <: B
        const inherits = this.lookup.inherits(lhs);
        return inherits !== undefined && this.sub(inherits, rhs);
      }

      case 'Function':
      case 'Field':
      case 'TypeAlias': {
        // Rule: f <: B  =>  signature(f) <: B
        const signature = this.lookup.signature(lhs);
        return signature !== undefined && this.sub(signature, rhs);
      }
    }
  }

  private invariantArgs(lhs: LookupRef, rhs: LookupRef): boolean {
    if (lhs.subs.size !== rhs.subs.size) {
      return false;
    }
    for (const [id, arg] of lhs.subs) {
      const other = rhs.subs.get(id);
      if (other === undefined || !this.sub(arg, other) || !this.sub(other, arg)) {
        return false;
      }
    }
    return true;
  }
}
