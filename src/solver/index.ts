/**
 * Subtype Solver - Bounds and the subtype relation
 */

export { Bounds } from './bounds.js';
export type { Bound, BoundsSnapshot } from './bounds.js';
export { Subtype } from './subtype.js';
export type { Constraint } from './subtype.js';
