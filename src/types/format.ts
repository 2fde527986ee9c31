/**
 * Type Formatting - Human-readable strings and structural keys
 *
 * formatType is what diagnostics and tests print. typeKey is a structural
 * identity: two types with the same key are interchangeable, which the
 * factories use to drop duplicate members and the solver uses to memoize
 * pairs it has already examined.
 */

import type { Type, LookupRef } from '../ast/nodes.js';

/**
 * Format a type for display
 */
export function formatType(type: Type): string {
  switch (type.kind) {
    case 'Imm':
      return 'imm';
    case 'Mut':
      return 'mut';
    case 'Iso':
      return 'iso';
    case 'InferType':
      return `τ${type.id}`;
    case 'LookupRef':
      return formatLookupRef(type);
    case 'TypeRef':
      return type.typenames
        .map(n => n.location.view() + formatArgs(n.typeargs))
        .join('::');
    case 'IsectType':
      return type.types.map(t => wrap(t, ['UnionType', 'FunctionType'])).join(' & ');
    case 'UnionType':
      return type.types.map(t => wrap(t, ['FunctionType'])).join(' | ');
    case 'TupleType':
      return `(${type.types.map(formatType).join(', ')})`;
    case 'FunctionType': {
      const left = type.left === undefined
        ? '()'
        : wrap(type.left, ['FunctionType', 'UnionType', 'IsectType', 'ThrowType']);
      return `${left} -> ${formatType(type.right)}`;
    }
    case 'ThrowType':
      return `throw ${wrap(type.type, ['UnionType', 'IsectType', 'FunctionType'])}`;
  }
}

function formatLookupRef(ref: LookupRef): string {
  return ref.location.view() + formatArgs([...ref.subs.values()]);
}

function formatArgs(args: readonly Type[]): string {
  return args.length === 0 ? '' : `[${args.map(formatType).join(', ')}]`;
}

function wrap(type: Type, kinds: readonly Type['kind'][]): string {
  const text = formatType(type);
  return kinds.includes(type.kind) ? `(${text})` : text;
}

/**
 * Structural key of a type. Locations are ignored; declarations are keyed
 * by handle, not by name.
 */
export function typeKey(type: Type): string {
  switch (type.kind) {
    case 'Imm':
    case 'Mut':
    case 'Iso':
      return type.kind;
    case 'InferType':
      return `?${type.id}`;
    case 'LookupRef': {
      const subs = [...type.subs].map(([id, arg]) => `${id}=${typeKey(arg)}`);
      return subs.length === 0 ? `#${type.def}` : `#${type.def}[${subs.join(',')}]`;
    }
    case 'TypeRef':
      return `ref:${formatType(type)}`;
    case 'IsectType':
      return `&(${type.types.map(typeKey).join(',')})`;
    case 'UnionType':
      return `|(${type.types.map(typeKey).join(',')})`;
    case 'TupleType':
      return `*(${type.types.map(typeKey).join(',')})`;
    case 'FunctionType':
      return `fn(${type.left === undefined ? '' : typeKey(type.left)};${typeKey(type.right)})`;
    case 'ThrowType':
      return `throw(${typeKey(type.type)})`;
  }
}
