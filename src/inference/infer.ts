/**
 * Inference Visitor - Constraint generation over a three-address AST
 *
 * Every expression result is bound to a local, so each handler relates the
 * types of locals: the local an expression is assigned to (the lhs of the
 * enclosing Assign), the locals it reads, and the declared types it names.
 * Constraints go to the subtype solver one at a time, in post-order, which
 * is also the order diagnostics come out in.
 */

import type {
  Node,
  Module,
  Expr,
  Local,
  Type,
  Ref,
  Free,
  Assign,
  Oftype,
  Throw,
  Tuple,
  Select,
  Lambda,
  LookupRef,
  FunctionType,
  Int,
  Float,
  Bool,
  DeclId,
} from '../ast/nodes.js';
import type { Location } from '../ast/location.js';
import type { Declarations } from '../ast/declarations.js';
import { Ident } from '../ast/ident.js';
import { walk } from '../ast/traversal.js';
import type { DiagnosticSink } from '../diagnostics/diagnostic.js';
import type { InferConfig } from '../config.js';
import { resolveConfig } from '../config.js';
import { Lookup } from '../lookup/lookup.js';
import { Bounds } from '../solver/bounds.js';
import { Subtype } from '../solver/subtype.js';
import {
  isect,
  tuple,
  functionType,
  functionTypeOf,
  receiverType,
  imm,
  typeName,
  typeRef,
} from '../types/factory.js';
import { substitute } from '../types/substitute.js';
import { throwtype } from '../types/dnf.js';
import { Pass } from './pass.js';

interface Target {
  readonly expr: Expr;
  readonly local: Local;
}

/** Inference variables a tuple assignment replaced, restored on the next run */
const replacedTypes = new WeakMap<Local, Type>();

export class Infer extends Pass {
  readonly bounds: Bounds;
  readonly lookup: Lookup;
  readonly subtype: Subtype;

  private readonly nameImm: Location;
  private readonly nameBool: Location;
  private readonly nameInt: Location;
  private readonly nameFloat: Location;

  constructor(
    sink: DiagnosticSink,
    private readonly declarations: Declarations,
    config: InferConfig
  ) {
    super(sink);

    const ident = new Ident();
    this.nameImm = ident.intern('imm');
    this.nameBool = ident.intern('Bool');
    this.nameInt = ident.intern('Integer');
    this.nameFloat = ident.intern('Float');

    this.bounds = new Bounds();
    this.lookup = new Lookup(declarations, this.bounds);
    this.subtype = new Subtype(this.lookup, this.bounds, sink, config, ident.intern('apply'));
  }

  protected override post(node: Node): void {
    switch (node.kind) {
      case 'Int':
      case 'Float':
        return this.postNumber(node);
      case 'Bool':
        return this.postBool(node);
      case 'Tuple':
        return this.postTuple(node);
      case 'Ref':
        return this.postRef(node);
      case 'Oftype':
        return this.postOftype(node);
      case 'Throw':
        return this.postThrow(node);
      case 'Assign':
        return this.postAssign(node);
      case 'Select':
        return this.postSelect(node);
      case 'Lambda':
        return this.postLambda(node);
      case 'Free':
        return this.postFree(node);
      case 'LookupRef':
        return this.postLookupRef(node);

      // Accepted; their children carry the constraints
      case 'New':
      case 'ObjectLiteral':
      case 'Match':
      case 'When':
      case 'EscapedString':
        return;
    }
  }

  // ==========================================================================
  // Locals
  // ==========================================================================

  /**
   * The local visible under a name
   */
  private g(name: Location): Local {
    const local = this.symbols().getLocal(name);
    if (!local) {
      throw new Error(`No local named '${name.view()}' is in scope`);
    }
    return local;
  }

  /**
   * The type an expression's result has: its local's type, or the tuple of
   * its components' types
   */
  private localType(expr: Expr): Type {
    if (expr.kind === 'Tuple') {
      return tuple(expr.seq.map(e => this.localType(e)), expr.location);
    }
    return this.g(expr.location).type;
  }

  /**
   * The assignment the current expression is the right side of
   */
  private assignment(): Assign {
    const assign = this.enclosing('Assign');
    if (!assign) {
      throw new Error('Expression is not inside an assignment');
    }
    return assign;
  }

  /**
   * Locals written by an assignment target
   */
  private targets(left: Expr): Target[] {
    switch (left.kind) {
      case 'Let':
      case 'Var':
        return [{ expr: left, local: left }];
      case 'Ref':
        return [{ expr: left, local: this.g(left.location) }];
      case 'Tuple':
        return left.seq.flatMap(e => this.targets(e));
      default:
        throw new Error(`Cannot assign to ${left.kind}`);
    }
  }

  /**
   * A defining occurrence: an Assign's left, or a component of a tuple
   * pattern that is
   */
  private isPattern(node: Node): boolean {
    const parent = this.parent();
    if (parent?.kind === 'Assign') {
      return parent.left === node;
    }
    const grandparent = this.parent(2);
    return parent?.kind === 'Tuple' && grandparent?.kind === 'Assign' && grandparent.left === parent;
  }

  // ==========================================================================
  // Literals
  // ==========================================================================

  /**
   * `imm & Name`, located at the literal. Undefined when Name is not in
   * scope.
   */
  private constantType(name: Location, at: Location): Type | undefined {
    const found = this.lookup.typeref(this.symbols(), typeRef([typeName(name)]));
    return found && isect([imm(this.nameImm), found], at);
  }

  /**
   * A number literal bounds the local it is assigned to from above
   */
  private postNumber(node: Int | Float): void {
    const name = node.kind === 'Int' ? this.nameInt : this.nameFloat;
    const type = this.constantType(name, node.location);

    if (!type) {
      this.error().at(node.location, `No type ${name.view()} in scope.`);
      return;
    }

    this.subtype.check(this.localType(this.assignment().left), type);
  }

  /**
   * A boolean literal bounds the local it is assigned to from below
   */
  private postBool(node: Bool): void {
    const type = this.constantType(this.nameBool, node.location);

    if (!type) {
      this.error().at(node.location, 'No type Bool in scope.');
      return;
    }

    this.subtype.check(type, this.localType(this.assignment().left));
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  private postTuple(node: Tuple): void {
    const parent = this.parent();
    if (parent?.kind !== 'Assign' || parent.left === node) {
      return;
    }

    const type = tuple(node.seq.map(e => this.localType(e)), node.location);

    if (parent.left.kind === 'Tuple') {
      this.subtype.check(type, this.localType(parent.left));
      return;
    }

    const local = this.g(parent.left.location);
    const previous = local.type;
    if (previous.kind === 'InferType') {
      replacedTypes.set(local, previous);
      local.type = type;
    }
    // The replaced variable keeps whatever bounds it already has
    this.subtype.check(type, previous);
  }

  private postRef(node: Ref): void {
    const parent = this.parent();

    // An unassigned local may be ascribed a type
    if (parent?.kind === 'Oftype') {
      return;
    }

    // Defining occurrence
    if (this.isPattern(node)) {
      return;
    }

    const local = this.g(node.location);

    if (parent?.kind === 'Assign') {
      this.subtype.check(local.type, this.localType(parent.left));
    } else if (parent?.kind === 'Lambda') {
      const result = parent.result;
      if (!this.subtype.check(local.type, result)) {
        this.error()
          .at(node.location, 'The return value is not a subtype of the result type.')
          .at(result.location, 'The result type is here.');
      }
    }

    if (!local.assigned) {
      this.error().at(node.location, 'Variable used before assignment');
    }
  }

  private postOftype(node: Oftype): void {
    this.subtype.check(this.localType(node.expr), node.type);
  }

  private postThrow(node: Throw): void {
    const lambda = this.enclosing('Lambda');
    if (!lambda) {
      throw new Error('Throw is not inside a lambda');
    }
    this.subtype.check(throwtype(this.localType(node.expr)), lambda.result);
  }

  private postAssign(node: Assign): void {
    for (const { expr, local } of this.targets(node.left)) {
      if (!local.assigned || local.kind === 'Var') {
        local.assigned = true;
      } else {
        this.error()
          .at(node.right.location, "This expression can't be assigned")
          .at(expr.location, 'This local has already been assigned to');
      }
    }
  }

  private postFree(node: Free): void {
    const local = this.g(node.location);

    if (!local.assigned) {
      this.error()
        .at(node.location, "Free variables can't be captured if they haven't been assigned to.")
        .at(local.location, 'Definition is here.');
    }
  }

  private postLambda(node: Lambda): void {
    const parent = this.parent();

    switch (parent?.kind) {
      case 'Assign':
        this.subtype.check(functionTypeOf(node), this.localType(parent.left));
        break;

      case 'Param':
        // A default argument is checked where it is used
        break;

      case 'Field': {
        const type = parent.type;
        if (!this.subtype.check(node.result, type)) {
          this.error()
            .at(node.location, 'The field initialiser is not a subtype of the field type.')
            .at(type.location, 'Field type is here.');
        }
        break;
      }

      default:
        break;
    }
  }

  /**
   * Type arguments must fit under their parameters' upper bounds
   */
  private postLookupRef(node: LookupRef): void {
    this.checkTypeArgs(node.subs);
  }

  private checkTypeArgs(subs: ReadonlyMap<DeclId, Type>): void {
    for (const [id, arg] of subs) {
      const param = this.declarations.get(id);
      if (param?.kind === 'TypeParam' && param.upper) {
        this.subtype.check(arg, substitute(param.upper, subs));
      }
    }
  }

  // ==========================================================================
  // Calls
  // ==========================================================================

  /**
   * `(receiver, args...) -> lhs`. A receiver or argument local holding a
   * tuple is spliced into the argument list.
   */
  private callType(node: Select, assign: Assign): FunctionType {
    const right = this.localType(assign.left);
    const parts = [node.expr, node.args].flatMap(e => (e ? [this.localType(e)] : []));
    const [first, second] = parts;

    if (!first) {
      return functionType(undefined, right, node.location);
    }
    if (!second) {
      return functionType(first, right, node.location);
    }

    const spliced = parts.flatMap(t => (t.kind === 'TupleType' ? t.types : [t]));
    return functionType(tuple(spliced, first.location), right, node.location);
  }

  private postSelect(node: Select): void {
    const call = this.callType(node, this.assignment());
    const [name, ...rest] = node.typeref.typenames;

    // A single unqualified name with a receiver may dispatch dynamically
    if (name && rest.length === 0 && call.left !== undefined) {
      const candidates = this.lookup.member(receiverType(call.left), name);
      const members = this.subtype.dynamic(candidates, call);

      if (members && call.left !== undefined) {
        node.dispatch = { kind: 'dynamic', receiver: receiverType(call.left), members };
        members.forEach(member => this.checkTypeArgs(member.subs));
        return;
      }
    }

    const find = this.lookup.typeref(this.symbols(), node.typeref);

    if (!find) {
      this.error().at(node.location, "Couldn't find this function.");
      return;
    }

    if (find.kind !== 'LookupRef') {
      this.error().at(node.location, `Expected a function but found ${find.kind}`);
      return;
    }

    this.subtype.check(find, call);
    this.checkTypeArgs(find.subs);
    node.dispatch = { kind: 'static', target: find };
  }
}

// ============================================================================
// Entry Points
// ============================================================================

/**
 * Clear what a previous run wrote into the tree
 */
function reset(ast: Module): void {
  walk(ast, node => {
    if (node.kind === 'Let' || node.kind === 'Var' || node.kind === 'Param') {
      node.type = replacedTypes.get(node) ?? node.type;
      replacedTypes.delete(node);
    }
    if (node.kind === 'Let' || node.kind === 'Var') {
      node.assigned = false;
    } else if (node.kind === 'Select') {
      node.dispatch = undefined;
    }
  });
}

/**
 * Run type inference over a module, annotating it in place.
 *
 * @returns true when neither the visitor nor the solver reported an error
 */
export function run(ast: Module, sink: DiagnosticSink, config: Partial<InferConfig> = {}): boolean {
  const infer = new Infer(sink, ast.declarations, resolveConfig(config));
  reset(ast);
  infer.traverse(ast);
  ast.solution = infer.bounds;
  return infer.ok && infer.subtype.ok;
}

/**
 * The solution of a type under the bounds of the last run
 */
export function solve(ast: Module, type: Type): Type {
  return ast.solution ? ast.solution.solve(type) : type;
}
