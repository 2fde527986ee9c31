/**
 * captype - Type inference for a capability-oriented language with
 * structural subtyping
 *
 * Entry points:
 * - run: infer types over a module, annotating call sites and locals
 * - wellformed: check the result for unsolved inference variables
 * - solve: read the solution of a type after a run
 */

export { run, solve, wellformed, Infer, Pass } from './inference/index.js';

export * from './ast/index.js';
export * from './types/index.js';
export * from './solver/index.js';
export { Lookup } from './lookup/index.js';
export * from './diagnostics/index.js';

export type { InferConfig } from './config.js';
export { DEFAULT_CONFIG, resolveConfig } from './config.js';
export type { Logger } from './logger.js';
export { consoleLogger, silentLogger } from './logger.js';
