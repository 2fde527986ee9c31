/**
 * Type Inference - The visitor pass and the well-formedness check
 */

export { Infer, run, solve } from './infer.js';
export { wellformed } from './wellformed.js';
export { Pass } from './pass.js';
