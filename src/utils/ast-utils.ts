/**
 * Flow AST traversal helpers
 */

import type { Expression, FlowNode, FunctionUnit, Statement } from '../types/index.js';

/**
 * Direct children of a node, in evaluation order. Closures are not
 * descended into; see `nestedFunction`.
 */
export function childNodes(node: FlowNode): FlowNode[] {
  switch (node.kind) {
    case 'booleanLiteral':
    case 'nullLiteral':
    case 'literal':
    case 'variableGet':
    case 'function':
    case 'localFunction':
    case 'break':
    case 'continue':
      return [];
    case 'variableSet':
    case 'ifNullSet':
      return [node.value];
    case 'logical':
    case 'ifNull':
    case 'equality':
      return [node.left, node.right];
    case 'conditional':
      return [node.condition, node.then, node.otherwise];
    case 'not':
    case 'is':
    case 'cast':
    case 'nullCheck':
    case 'await':
    case 'throw':
      return [node.operand];
    case 'call':
      return node.target ? [node.target, ...node.arguments] : [...node.arguments];
    case 'propertyGet':
      return [node.target];
    case 'block':
      return [...node.statements];
    case 'expressionStatement':
      return [node.expression];
    case 'declaration':
      return node.initializer ? [node.initializer] : [];
    case 'if':
      return node.otherwise ? [node.condition, node.then, node.otherwise] : [node.condition, node.then];
    case 'while':
      return [node.condition, node.body];
    case 'doWhile':
      return [node.body, node.condition];
    case 'for': {
      const children: FlowNode[] = [];
      if (node.initializer) children.push(node.initializer);
      if (node.condition) children.push(node.condition);
      children.push(node.body, ...node.updaters);
      return children;
    }
    case 'forEach':
      return [node.iterable, node.body];
    case 'switch':
      return [
        node.discriminant,
        ...node.cases.flatMap((switchCase): FlowNode[] => [...switchCase.labels, ...switchCase.body]),
      ];
    case 'try':
      return [
        node.body,
        ...node.catches.map((clause) => clause.body),
        ...(node.finallyBody ? [node.finallyBody] : []),
      ];
    case 'return':
      return node.value ? [node.value] : [];
    case 'yield':
      return [node.value];
    case 'labeled':
      return [node.body];
  }
}

/**
 * The function unit a closure or local function node introduces
 */
export function nestedFunction(node: FlowNode): FunctionUnit | undefined {
  return node.kind === 'function' || node.kind === 'localFunction' ? node.function : undefined;
}

/**
 * Is the node an expression (as opposed to a statement)?
 */
export function isExpression(node: FlowNode): node is Expression {
  switch (node.kind) {
    case 'block':
    case 'expressionStatement':
    case 'declaration':
    case 'localFunction':
    case 'if':
    case 'while':
    case 'doWhile':
    case 'for':
    case 'forEach':
    case 'switch':
    case 'try':
    case 'return':
    case 'yield':
    case 'break':
    case 'continue':
    case 'labeled':
      return false;
    default:
      return true;
  }
}

/**
 * Narrow a node to a statement
 */
export function isStatement(node: FlowNode): node is Statement {
  return !isExpression(node);
}
