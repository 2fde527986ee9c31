/**
 * AST Node Model
 *
 * The tree consumed and annotated by the inference pass. Construction is the
 * parser's job (see factory.ts for a programmatic builder); by the time the
 * pass runs:
 * - expressions are in three-address form: every result is bound to a local
 * - every local and declaration is registered in a symbol table
 * - types in declarations are resolved to LookupRefs
 * - every local without a written type carries a fresh InferType
 *
 * Types are nodes too, so a traversal sees the types written in the program.
 */

import type { Location } from './location.js';
import type { SymbolTable } from './symbols.js';
import type { Declarations } from './declarations.js';

/** Stable handle of a declaration in the module's declaration arena */
export type DeclId = number;

/**
 * Type-parameter handle -> argument. Keys are handles, never the
 * declarations themselves, so a LookupRef never owns what it points at.
 */
export type Substitution = ReadonlyMap<DeclId, Type>;

interface NodeBase {
  readonly kind: string;
  readonly location: Location;
}

// ============================================================================
// Types
// ============================================================================

/**
 * One segment of a qualified type path: a name and its type arguments
 */
export interface TypeName extends NodeBase {
  readonly kind: 'TypeName';
  readonly typeargs: readonly Type[];
}

/**
 * Unresolved nominal reference: `A[T]::B::c`
 */
export interface TypeRef extends NodeBase {
  readonly kind: 'TypeRef';
  readonly typenames: readonly TypeName[];
}

/** Intersection: a value satisfies every member */
export interface IsectType extends NodeBase {
  readonly kind: 'IsectType';
  readonly types: readonly Type[];
}

/** Union: a value satisfies at least one member */
export interface UnionType extends NodeBase {
  readonly kind: 'UnionType';
  readonly types: readonly Type[];
}

/** Ordered heterogeneous product */
export interface TupleType extends NodeBase {
  readonly kind: 'TupleType';
  readonly types: readonly Type[];
}

/**
 * `left -> right`. `left` is absent for a nullary function, a single type
 * for one argument, and a TupleType otherwise. It is writable because
 * dynamic dispatch narrows the receiver slot of a call type in place.
 */
export interface FunctionType extends NodeBase {
  readonly kind: 'FunctionType';
  left: Type | undefined;
  readonly right: Type;
}

/** Marks a value travelling on the exception channel */
export interface ThrowType extends NodeBase {
  readonly kind: 'ThrowType';
  readonly type: Type;
}

/** Immutable capability */
export interface Imm extends NodeBase {
  readonly kind: 'Imm';
}

/** Mutable (shared) capability */
export interface Mut extends NodeBase {
  readonly kind: 'Mut';
}

/** Isolated capability */
export interface Iso extends NodeBase {
  readonly kind: 'Iso';
}

/** An inference variable; `id` is its identity in the solver */
export interface InferType extends NodeBase {
  readonly kind: 'InferType';
  readonly id: number;
}

/**
 * A resolved reference to a declaration.
 * `self` is set by member lookup: the receiver disjunct the member was found
 * through.
 */
export interface LookupRef extends NodeBase {
  readonly kind: 'LookupRef';
  readonly def: DeclId;
  readonly subs: Substitution;
  readonly self?: Type;
}

export type Capability = Imm | Mut | Iso;

export type Type =
  | TypeRef
  | IsectType
  | UnionType
  | TupleType
  | FunctionType
  | ThrowType
  | Imm
  | Mut
  | Iso
  | InferType
  | LookupRef
  ;

// ============================================================================
// Declarations
// ============================================================================

export interface TypeParam extends NodeBase {
  readonly kind: 'TypeParam';
  readonly id: DeclId;
  upper?: Type;
  dflt?: Type;
}

export interface Class extends NodeBase {
  readonly kind: 'Class';
  readonly id: DeclId;
  readonly typeparams: TypeParam[];
  inherits?: Type;
  readonly members: Member[];
  readonly symbols: SymbolTable;
}

export interface Interface extends NodeBase {
  readonly kind: 'Interface';
  readonly id: DeclId;
  readonly typeparams: TypeParam[];
  inherits?: Type;
  readonly members: Member[];
  readonly symbols: SymbolTable;
}

/** `type Name[T] = inherits` */
export interface TypeAlias extends NodeBase {
  readonly kind: 'TypeAlias';
  readonly id: DeclId;
  readonly typeparams: TypeParam[];
  inherits: Type;
}

export interface FunctionDecl extends NodeBase {
  readonly kind: 'Function';
  readonly id: DeclId;
  readonly lambda: Lambda;
}

/** A field; its initialiser is a nullary lambda */
export interface Field extends NodeBase {
  readonly kind: 'Field';
  readonly id: DeclId;
  readonly type: Type;
  init?: Lambda;
}

export type Member = Class | Interface | TypeAlias | FunctionDecl | Field;

/** Everything the declaration arena can hold */
export type Entity = Member | TypeParam;

/**
 * The root of a compilation unit. `solution` is written by the inference
 * pass: the bounds it solved.
 */
export interface Module extends NodeBase {
  readonly kind: 'Module';
  readonly members: Member[];
  readonly symbols: SymbolTable;
  readonly declarations: Declarations;
  solution?: Solution;
}

/**
 * Read access to solved inference variables
 */
export interface Solution {
  /** Replace every solvable inference variable in a type by its solution */
  solve(type: Type): Type;
}

// ============================================================================
// Locals
// ============================================================================

/** Single-assignment local */
export interface Let extends NodeBase {
  readonly kind: 'Let';
  type: Type;
  assigned: boolean;
}

/** Reassignable local */
export interface Var extends NodeBase {
  readonly kind: 'Var';
  type: Type;
  assigned: boolean;
}

/** Lambda parameter, assigned on entry. `dflt` is a default-argument lambda. */
export interface Param extends NodeBase {
  readonly kind: 'Param';
  type: Type;
  assigned: boolean;
  dflt?: Lambda;
}

export type Local = Let | Var | Param;

// ============================================================================
// Expressions
// ============================================================================

/** Use of a local */
export interface Ref extends NodeBase {
  readonly kind: 'Ref';
}

/** Use of a local captured from an enclosing lambda */
export interface Free extends NodeBase {
  readonly kind: 'Free';
}

/** `left = right`; left is a Let, Var, Ref or a Tuple of those */
export interface Assign extends NodeBase {
  readonly kind: 'Assign';
  readonly left: Expr;
  readonly right: Expr;
}

/** Type ascription `expr: type` */
export interface Oftype extends NodeBase {
  readonly kind: 'Oftype';
  readonly expr: Expr;
  readonly type: Type;
}

export interface Throw extends NodeBase {
  readonly kind: 'Throw';
  readonly expr: Expr;
}

export interface Tuple extends NodeBase {
  readonly kind: 'Tuple';
  readonly seq: readonly Expr[];
}

/**
 * How a call site was resolved by inference
 */
export type Dispatch =
  | {
      readonly kind: 'dynamic';
      /** The receiver type after narrowing by the selected members */
      readonly receiver: Type;
      readonly members: readonly LookupRef[];
    }
  | {
      readonly kind: 'static';
      readonly target: LookupRef;
    }
  ;

/**
 * A call `expr.typeref(args)`. Either of `expr` and `args` may be absent.
 */
export interface Select extends NodeBase {
  readonly kind: 'Select';
  readonly expr?: Expr;
  readonly typeref: TypeRef;
  readonly args?: Expr;
  dispatch?: Dispatch;
}

export interface New extends NodeBase {
  readonly kind: 'New';
  readonly args?: Expr;
  readonly in?: Location;
}

export interface ObjectLiteral extends NodeBase {
  readonly kind: 'ObjectLiteral';
  readonly inherits?: Type;
  readonly members: readonly Member[];
}

export interface Match extends NodeBase {
  readonly kind: 'Match';
  readonly test: Expr;
  readonly cases: readonly Lambda[];
}

export interface When extends NodeBase {
  readonly kind: 'When';
  readonly waitfor: Expr;
  readonly behaviour: Lambda;
}

export interface Int extends NodeBase {
  readonly kind: 'Int';
}

export interface Float extends NodeBase {
  readonly kind: 'Float';
}

export interface Bool extends NodeBase {
  readonly kind: 'Bool';
}

export interface EscapedString extends NodeBase {
  readonly kind: 'EscapedString';
}

export interface Lambda extends NodeBase {
  readonly kind: 'Lambda';
  readonly typeparams: TypeParam[];
  readonly params: Param[];
  result: Type;
  readonly body: Expr[];
  readonly symbols: SymbolTable;
}

export type Expr =
  | Let
  | Var
  | Ref
  | Free
  | Assign
  | Oftype
  | Throw
  | Tuple
  | Select
  | New
  | ObjectLiteral
  | Match
  | When
  | Int
  | Float
  | Bool
  | EscapedString
  | Lambda
  ;

// ============================================================================
// All Nodes
// ============================================================================

export type Node = Module | Entity | Param | Expr | Type | TypeName;

export type Kind = Node['kind'];

export type NodeOfKind<K extends Kind> = Extract<Node, { kind: K }>;

/** Nodes that own a symbol table */
export type Scope = Module | Class | Interface | Lambda;

/**
 * Narrow a node by kind
 */
export function hasKind<K extends Kind>(node: Node, kind: K): node is NodeOfKind<K> {
  return node.kind === kind;
}

export function isScope(node: Node): node is Scope {
  return node.kind === 'Module' || node.kind === 'Class' ||
         node.kind === 'Interface' || node.kind === 'Lambda';
}

export function isLocal(node: Node): node is Local {
  return node.kind === 'Let' || node.kind === 'Var' || node.kind === 'Param';
}

export function isEntity(node: Node): node is Entity {
  switch (node.kind) {
    case 'Class':
    case 'Interface':
    case 'TypeAlias':
    case 'Function':
    case 'Field':
    case 'TypeParam':
      return true;
    default:
      return false;
  }
}

/**
 * Type parameters declared by an entity
 */
export function typeParamsOf(entity: Entity): readonly TypeParam[] {
  switch (entity.kind) {
    case 'Class':
    case 'Interface':
    case 'TypeAlias':
      return entity.typeparams;
    case 'Function':
      return entity.lambda.typeparams;
    case 'Field':
    case 'TypeParam':
      return [];
  }
}
