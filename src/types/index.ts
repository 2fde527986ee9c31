/**
 * Type Lattice - Constructors, normal forms and formatting
 */

export {
  isect,
  union,
  tuple,
  functionType,
  throwType,
  argumentType,
  functionTypeOf,
  receiverType,
  withReceiver,
  imm,
  mut,
  iso,
  inferType,
  lookupRef,
  typeName,
  typeRef,
  mapType,
  containsInfer,
} from './factory.js';

export { dnf, throwtype, conjunction, disjunction, disjuncts, conjuncts } from './dnf.js';
export { substitute, extend } from './substitute.js';
export { formatType, typeKey } from './format.js';
