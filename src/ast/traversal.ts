/**
 * AST Traversal - Child enumeration in evaluation order
 */

import type { Node } from './nodes.js';

/**
 * Direct children of a node, in the order a post-order pass visits them
 */
export function children(node: Node): Node[] {
  const out: Node[] = [];
  const add = (child: Node | undefined): void => {
    if (child) out.push(child);
  };

  switch (node.kind) {
    case 'Module':
      out.push(...node.members);
      break;

    case 'Class':
    case 'Interface':
      out.push(...node.typeparams);
      add(node.inherits);
      out.push(...node.members);
      break;

    case 'TypeAlias':
      out.push(...node.typeparams);
      add(node.inherits);
      break;

    case 'TypeParam':
      add(node.upper);
      add(node.dflt);
      break;

    case 'Function':
      add(node.lambda);
      break;

    case 'Field':
      add(node.type);
      add(node.init);
      break;

    case 'Lambda':
      out.push(...node.typeparams, ...node.params);
      add(node.result);
      out.push(...node.body);
      break;

    case 'Param':
      add(node.type);
      add(node.dflt);
      break;

    case 'Let':
    case 'Var':
      add(node.type);
      break;

    case 'Assign':
      add(node.left);
      add(node.right);
      break;

    case 'Oftype':
      add(node.expr);
      add(node.type);
      break;

    case 'Throw':
      add(node.expr);
      break;

    case 'Tuple':
      out.push(...node.seq);
      break;

    case 'Select':
      add(node.expr);
      add(node.typeref);
      add(node.args);
      break;

    case 'New':
      add(node.args);
      break;

    case 'ObjectLiteral':
      add(node.inherits);
      out.push(...node.members);
      break;

    case 'Match':
      add(node.test);
      out.push(...node.cases);
      break;

    case 'When':
      add(node.waitfor);
      add(node.behaviour);
      break;

    case 'TypeRef':
      out.push(...node.typenames);
      break;

    case 'TypeName':
      out.push(...node.typeargs);
      break;

    case 'IsectType':
    case 'UnionType':
    case 'TupleType':
      out.push(...node.types);
      break;

    case 'FunctionType':
      add(node.left);
      add(node.right);
      break;

    case 'ThrowType':
      add(node.type);
      break;

    case 'LookupRef':
      out.push(...node.subs.values());
      break;

    case 'Ref':
    case 'Free':
    case 'Int':
    case 'Float':
    case 'Bool':
    case 'EscapedString':
    case 'Imm':
    case 'Mut':
    case 'Iso':
    case 'InferType':
      break;
  }

  return out;
}

/**
 * Pre-order walk over a whole tree
 */
export function walk(node: Node, visit: (node: Node) => void): void {
  visit(node);
  for (const child of children(node)) {
    walk(child, visit);
  }
}
