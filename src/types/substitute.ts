/**
 * Substitution - Replace type-parameter references by their arguments
 */

import type { Type, Substitution, DeclId } from '../ast/nodes.js';
import { lookupRef, mapType } from './factory.js';

/**
 * Apply a substitution to a type.
 *
 * A LookupRef whose handle is a key of `subs` is a reference to that type
 * parameter and is replaced by its argument. Other LookupRefs have the
 * substitution applied to their own arguments.
 */
export function substitute(type: Type, subs: Substitution): Type {
  if (subs.size === 0) {
    return type;
  }

  if (type.kind === 'LookupRef') {
    const arg = subs.get(type.def);
    if (arg !== undefined && type.subs.size === 0) {
      return arg;
    }
    const inner = new Map<DeclId, Type>();
    for (const [id, a] of type.subs) {
      inner.set(id, substitute(a, subs));
    }
    return lookupRef(type.def, type.location, inner, type.self);
  }

  return mapType(type, child => substitute(child, subs));
}

/**
 * Combine an outer substitution with bindings made inside it.
 * Inner bindings win.
 */
export function extend(outer: Substitution, inner: Iterable<readonly [DeclId, Type]>): Map<DeclId, Type> {
  const result = new Map(outer);
  for (const [id, arg] of inner) {
    result.set(id, arg);
  }
  return result;
}
