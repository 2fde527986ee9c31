/**
 * AST Factory - Build name-resolved, three-address trees in code
 *
 * Stands in for the parser and name resolution: every declaration is
 * registered in the arena and defined in its scope's symbol table, every
 * local is defined in its lambda's table, and every local without a written
 * type gets a fresh inference variable. Names are interned, so locations
 * render as the names themselves.
 *
 * ```ts
 * const f = new AstFactory();
 * const integer = f.class('Integer');
 * f.function('main', {}, b => {
 *   b.assign(b.let('x'), b.int('3'));
 *   b.ret('x');
 * });
 * run(f.module, sink);
 * ```
 */

import type {
  Type,
  TypeName,
  TypeRef,
  InferType,
  LookupRef,
  Imm,
  Mut,
  Iso,
  DeclId,
  Entity,
  TypeParam,
  Class,
  Interface,
  TypeAlias,
  FunctionDecl,
  Field,
  Member,
  Module,
  Let,
  Var,
  Param,
  Expr,
  Ref,
  Free,
  Assign,
  Oftype,
  Throw,
  Tuple,
  Select,
  New,
  ObjectLiteral,
  Match,
  When,
  Int,
  Float,
  Bool,
  EscapedString,
  Lambda,
} from './nodes.js';
import { typeParamsOf } from './nodes.js';
import type { Location } from './location.js';
import { Ident } from './ident.js';
import { SymbolTable } from './symbols.js';
import { Declarations } from './declarations.js';
import * as types from '../types/factory.js';

/** Declarations that hold members */
export type Container = Module | Class | Interface;

export interface ParamSpec {
  readonly name: string;
  /** Defaults to a fresh inference variable */
  readonly type?: Type;
  readonly dflt?: (body: LambdaBuilder) => void;
}

export interface LambdaSpec {
  readonly typeparams?: readonly TypeParam[];
  readonly params?: readonly (string | ParamSpec)[];
  /** Defaults to a fresh inference variable */
  readonly result?: Type;
}

export interface DeclSpec {
  readonly typeparams?: readonly TypeParam[];
  readonly inherits?: Type;
}

export class AstFactory {
  readonly ident = new Ident();
  readonly declarations = new Declarations();
  readonly module: Module;

  private nextInfer = 0;

  constructor(name = 'module') {
    this.module = {
      kind: 'Module',
      location: this.ident.intern(name),
      members: [],
      symbols: new SymbolTable(),
      declarations: this.declarations,
    };
  }

  /**
   * An interned name
   */
  name(text: string): Location {
    return this.ident.intern(text);
  }

  // ==========================================================================
  // Types
  // ==========================================================================

  /**
   * A fresh inference variable
   */
  infer(name = 'τ'): InferType {
    return types.inferType(this.nextInfer++, this.name(name));
  }

  imm(): Imm {
    return types.imm(this.name('imm'));
  }

  mut(): Mut {
    return types.mut(this.name('mut'));
  }

  iso(): Iso {
    return types.iso(this.name('iso'));
  }

  /**
   * A resolved reference to a declaration, with arguments for its type
   * parameters in order
   */
  ref(decl: Entity, args: readonly Type[] = []): LookupRef {
    const subs = new Map<DeclId, Type>();
    typeParamsOf(decl).forEach((param, i) => {
      const arg = args[i];
      if (arg) subs.set(param.id, arg);
    });
    return types.lookupRef(decl.id, decl.location, subs);
  }

  isect(...members: Type[]): Type {
    return types.isect(members);
  }

  union(...members: Type[]): Type {
    return types.union(members);
  }

  tuple(...members: Type[]): Type {
    const first = members[0];
    return types.tuple(members, first ? first.location : this.name('()'));
  }

  fn(left: readonly Type[], right: Type): Type {
    return types.functionType(types.argumentType(left, right.location), right);
  }

  throws(type: Type): Type {
    return types.throwType(type);
  }

  /**
   * One segment of a type path
   */
  typename(text: string, typeargs: readonly Type[] = []): TypeName {
    return types.typeName(this.name(text), typeargs);
  }

  /**
   * A type path: `typeref('A', 'create')` is `A::create`
   */
  typeref(...segments: (string | TypeName)[]): TypeRef {
    return types.typeRef(segments.map(s => (typeof s === 'string' ? this.typename(s) : s)));
  }

  // ==========================================================================
  // Declarations
  // ==========================================================================

  /**
   * A type parameter. It becomes visible by name once a declaration lists it.
   */
  typeParam(name: string, bounds: { upper?: Type; dflt?: Type } = {}): TypeParam {
    const param: TypeParam = {
      kind: 'TypeParam',
      location: this.name(name),
      id: this.declarations.reserve(),
      ...bounds,
    };
    return this.declarations.register(param);
  }

  class(name: string, spec: DeclSpec = {}, within: Container = this.module): Class {
    const decl: Class = {
      kind: 'Class',
      location: this.name(name),
      id: this.declarations.reserve(),
      ...this.scope(spec, within),
    };
    return this.member(decl, within);
  }

  interface(name: string, spec: DeclSpec = {}, within: Container = this.module): Interface {
    const decl: Interface = {
      kind: 'Interface',
      location: this.name(name),
      id: this.declarations.reserve(),
      ...this.scope(spec, within),
    };
    return this.member(decl, within);
  }

  /**
   * The scope-related fields of a class or interface
   */
  private scope(spec: DeclSpec, within: Container): Pick<Class, 'typeparams' | 'inherits' | 'members' | 'symbols'> {
    const symbols = within.symbols.extend();
    const typeparams = [...(spec.typeparams ?? [])];
    for (const param of typeparams) {
      symbols.define(param.location, param);
    }
    const members: Member[] = [];
    return spec.inherits
      ? { typeparams, inherits: spec.inherits, members, symbols }
      : { typeparams, members, symbols };
  }

  alias(name: string, inherits: Type, spec: Omit<DeclSpec, 'inherits'> = {}, within: Container = this.module): TypeAlias {
    const alias: TypeAlias = {
      kind: 'TypeAlias',
      location: this.name(name),
      id: this.declarations.reserve(),
      typeparams: [...(spec.typeparams ?? [])],
      inherits,
    };
    return this.member(alias, within);
  }

  /**
   * A function; `body` fills in its lambda
   */
  function(
    name: string,
    spec: LambdaSpec,
    body: (b: LambdaBuilder) => void,
    within: Container = this.module
  ): FunctionDecl {
    const decl: FunctionDecl = {
      kind: 'Function',
      location: this.name(name),
      id: this.declarations.reserve(),
      lambda: this.lambda(within.symbols, spec, body),
    };
    return this.member(decl, within);
  }

  /**
   * A field with an optional nullary initialiser
   */
  field(
    name: string,
    type: Type,
    within: Class | Interface,
    init?: { readonly result?: Type; readonly body: (b: LambdaBuilder) => void }
  ): Field {
    const field: Field = {
      kind: 'Field',
      location: this.name(name),
      id: this.declarations.reserve(),
      type,
    };
    if (init) {
      field.init = this.lambda(within.symbols, init.result ? { result: init.result } : {}, init.body);
    }
    return this.member(field, within);
  }

  private member<T extends Member>(decl: T, within: Container): T {
    this.declarations.register(decl);
    within.symbols.define(decl.location, decl);
    within.members.push(decl);
    return decl;
  }

  /**
   * A lambda whose scope is nested in `scope`
   */
  lambda(scope: SymbolTable, spec: LambdaSpec, body: (b: LambdaBuilder) => void): Lambda {
    const symbols = scope.extend();
    const typeparams = [...(spec.typeparams ?? [])];
    for (const param of typeparams) {
      symbols.define(param.location, param);
    }

    const params = (spec.params ?? []).map(p => this.param(symbols, typeof p === 'string' ? { name: p } : p));

    const lambda: Lambda = {
      kind: 'Lambda',
      location: this.name('lambda'),
      typeparams,
      params,
      result: spec.result ?? this.infer('result'),
      body: [],
      symbols,
    };

    body(new LambdaBuilder(this, lambda));
    return lambda;
  }

  private param(scope: SymbolTable, spec: ParamSpec): Param {
    const location = this.name(spec.name);
    const type = spec.type ?? this.infer(spec.name);
    const param: Param = spec.dflt
      ? { kind: 'Param', location, type, assigned: true, dflt: this.lambda(scope, {}, spec.dflt) }
      : { kind: 'Param', location, type, assigned: true };
    scope.define(location, param);
    return param;
  }
}

/**
 * Builds the body of one lambda. Statement methods (`assign`, `oftype`,
 * `throw`, `ret`, `emit`, `declare`) append to the body; the others only
 * create expressions.
 */
export class LambdaBuilder {
  constructor(
    private readonly factory: AstFactory,
    readonly node: Lambda
  ) {}

  // ==========================================================================
  // Locals
  // ==========================================================================

  /**
   * A new single-assignment local, defined but not yet in the body
   */
  let(name: string, type?: Type): Let {
    const location = this.factory.name(name);
    const local: Let = {
      kind: 'Let',
      location,
      type: type ?? this.factory.infer(name),
      assigned: false,
    };
    this.node.symbols.define(location, local);
    return local;
  }

  /**
   * A new reassignable local, defined but not yet in the body
   */
  var(name: string, type?: Type): Var {
    const location = this.factory.name(name);
    const local: Var = {
      kind: 'Var',
      location,
      type: type ?? this.factory.infer(name),
      assigned: false,
    };
    this.node.symbols.define(location, local);
    return local;
  }

  /**
   * A local declared by a statement of its own: `let x;`
   */
  declare(name: string, type?: Type): Let {
    return this.emit(this.let(name, type));
  }

  ref(name: string): Ref {
    return { kind: 'Ref', location: this.factory.name(name) };
  }

  free(name: string): Free {
    return { kind: 'Free', location: this.factory.name(name) };
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  int(text: string): Int {
    return { kind: 'Int', location: this.factory.name(text) };
  }

  float(text: string): Float {
    return { kind: 'Float', location: this.factory.name(text) };
  }

  bool(text: 'true' | 'false'): Bool {
    return { kind: 'Bool', location: this.factory.name(text) };
  }

  string(text: string): EscapedString {
    return { kind: 'EscapedString', location: this.factory.name(JSON.stringify(text)) };
  }

  tuple(...seq: Expr[]): Tuple {
    const text = `(${seq.map(e => e.location.view()).join(', ')})`;
    return { kind: 'Tuple', location: this.factory.name(text), seq };
  }

  /**
   * A call `expr.name(args)`; a string name is a single-segment path
   */
  select(name: string | TypeRef, expr?: Expr, args?: Expr): Select {
    const typeref = typeof name === 'string' ? this.factory.typeref(name) : name;
    return {
      kind: 'Select',
      location: typeref.location,
      typeref,
      ...(expr ? { expr } : {}),
      ...(args ? { args } : {}),
    };
  }

  new(args?: Expr): New {
    return { kind: 'New', location: this.factory.name('new'), ...(args ? { args } : {}) };
  }

  object(members: readonly Member[] = [], inherits?: Type): ObjectLiteral {
    return {
      kind: 'ObjectLiteral',
      location: this.factory.name('new'),
      members,
      ...(inherits ? { inherits } : {}),
    };
  }

  match(test: Expr, cases: readonly Lambda[]): Match {
    return { kind: 'Match', location: this.factory.name('match'), test, cases };
  }

  when(waitfor: Expr, behaviour: Lambda): When {
    return { kind: 'When', location: this.factory.name('when'), waitfor, behaviour };
  }

  /**
   * A lambda nested in this one
   */
  lambda(spec: LambdaSpec, body: (b: LambdaBuilder) => void): Lambda {
    return this.factory.lambda(this.node.symbols, spec, body);
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  emit<T extends Expr>(expr: T): T {
    this.node.body.push(expr);
    return expr;
  }

  assign(left: Expr, right: Expr): Assign {
    return this.emit({ kind: 'Assign', location: right.location, left, right });
  }

  oftype(expr: Expr, type: Type): Oftype {
    return this.emit({ kind: 'Oftype', location: expr.location, expr, type });
  }

  throw(expr: Expr): Throw {
    return this.emit({ kind: 'Throw', location: this.factory.name('throw'), expr });
  }

  /**
   * Make a local the lambda's value
   */
  ret(name: string): Ref {
    return this.emit(this.ref(name));
  }
}
