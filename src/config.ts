/**
 * Configuration for the inference pass and the well-formedness check
 */

import type { Logger } from './logger.js';
import { consoleLogger } from './logger.js';

export interface InferConfig {
  /** Report inference variables left unsolved by the pass */
  reportUnresolved: boolean;
  /** Log every top-level subtype constraint and its verdict */
  trace: boolean;
  /** Recursion limit of a single subtype check */
  maxDepth: number;
  /** Where trace output and warnings go */
  logger: Logger;
}

export const DEFAULT_CONFIG: InferConfig = {
  reportUnresolved: false,
  trace: false,
  maxDepth: 256,
  logger: consoleLogger,
};

/**
 * Fill in defaults for everything not given
 */
export function resolveConfig(config: Partial<InferConfig> = {}): InferConfig {
  return { ...DEFAULT_CONFIG, ...config };
}
