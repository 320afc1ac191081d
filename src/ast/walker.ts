/**
 * Child enumeration and depth-first traversal over the syntax tree.
 */
import type { AstNode } from './types.js';

/**
 * Returns the direct children of a node in source order.
 */
export function childrenOf(node: AstNode): AstNode[] {
  switch (node.kind) {
    case 'NamedType':
      return [...node.typeArguments];
    case 'Expression':
      return [];
    case 'CompilationUnit':
      return [...node.declarations];
    case 'FunctionDeclaration':
    case 'MethodDeclaration':
      return compact([node.returnType, node.parameters, node.body]);
    case 'ClassDeclaration':
      return [...node.members];
    case 'ConstructorDeclaration':
      return compact([node.parameters, node.body]);
    case 'Block':
      return [...node.statements];
    case 'ExpressionStatement':
      return [node.expression];
    case 'ReturnStatement':
      return compact([node.expression]);
    case 'VariableDeclarationStatement':
      return [node.variables];
    case 'VariableDeclarationList':
      return compact([node.type, ...node.variables]);
    case 'VariableDeclaration':
      return compact([node.initializer]);
    case 'ForStatement':
      return [node.forLoopParts, node.body];
    case 'ForEachPartsWithDeclaration':
      return [node.loopVariable, node.iterable];
    case 'ForEachPartsWithIdentifier':
      return [node.iterable];
    case 'ForPartsWithDeclarations':
      return compact([node.variables, node.condition, ...node.updaters]);
    case 'ForPartsWithExpression':
      return compact([node.initialization, node.condition, ...node.updaters]);
    case 'DeclaredIdentifier':
    case 'SimpleFormalParameter':
    case 'FieldFormalParameter':
    case 'SuperFormalParameter':
      return compact([node.type]);
    case 'FunctionTypedFormalParameter':
      return compact([node.returnType, node.parameters]);
    case 'DefaultFormalParameter':
      return compact([node.parameter, node.defaultValue]);
    case 'FormalParameterList':
      return [...node.parameters];
    default: {
      const unreachable: never = node;
      return unreachable;
    }
  }
}

/**
 * Walks the tree depth-first (pre-order), calling the callback for each node.
 */
export function walkTree(node: AstNode, callback: (node: AstNode) => void): void {
  callback(node);
  for (const child of childrenOf(node)) {
    walkTree(child, callback);
  }
}

/**
 * Finds all descendant nodes (including the root) of the given kinds.
 */
export function findNodesOfKind(root: AstNode, kinds: readonly AstNode['kind'][]): AstNode[] {
  const results: AstNode[] = [];
  const kindSet = new Set<string>(kinds);

  walkTree(root, (node) => {
    if (kindSet.has(node.kind)) {
      results.push(node);
    }
  });

  return results;
}

function compact(nodes: ReadonlyArray<AstNode | null>): AstNode[] {
  return nodes.filter((node): node is AstNode => node !== null);
}
