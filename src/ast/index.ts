/**
 * AST - Node model, scoping and construction
 */

export type {
  DeclId,
  Substitution,
  TypeName,
  TypeRef,
  IsectType,
  UnionType,
  TupleType,
  FunctionType,
  ThrowType,
  Imm,
  Mut,
  Iso,
  InferType,
  LookupRef,
  Capability,
  Type,
  TypeParam,
  Class,
  Interface,
  TypeAlias,
  FunctionDecl,
  Field,
  Member,
  Entity,
  Module,
  Solution,
  Let,
  Var,
  Param,
  Local,
  Ref,
  Free,
  Assign,
  Oftype,
  Throw,
  Tuple,
  Dispatch,
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
  Expr,
  Node,
  Kind,
  NodeOfKind,
  Scope,
} from './nodes.js';
export { hasKind, isScope, isLocal, isEntity, typeParamsOf } from './nodes.js';

export { Source, Location } from './location.js';
export type { LineCol } from './location.js';

export { Ident } from './ident.js';
export { SymbolTable } from './symbols.js';
export type { Binding } from './symbols.js';
export { Declarations } from './declarations.js';
export { children, walk } from './traversal.js';

export { AstFactory, LambdaBuilder } from './factory.js';
export type { Container, ParamSpec, LambdaSpec, DeclSpec } from './factory.js';
