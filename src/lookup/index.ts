/**
 * Lookup Engine
 */

export { Lookup } from './lookup.js';
