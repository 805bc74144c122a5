/**
 * Per-variable, per-point queries over an analysis result
 */

import type { Expression, FlowNode, Statement, Type, Variable } from '../types/index.js';
import { isExpression } from '../utils/ast-utils.js';
import type { FlowModel } from './model/flow-model.js';
import { getVariable } from './model/flow-model.js';
import type { VariableModel } from './model/variable-model.js';
import { currentType } from './model/variable-model.js';
import type { FunctionFlowResult } from './driver.js';

/**
 * Which published model of a node to read
 */
export type FlowPoint = 'before' | 'after' | 'ifTrue' | 'ifFalse' | 'ifNull' | 'ifNotNull';

/**
 * A node's model at `point`; statements only publish `before` and `after`
 */
export function modelAt(result: FunctionFlowResult, node: FlowNode, point: FlowPoint = 'before'): FlowModel | undefined {
  if (isExpression(node)) {
    return result.expressions.get(node)?.[point];
  }
  const flow = result.statements.get(node);
  if (!flow) return undefined;
  return point === 'before' ? flow.before : flow.after;
}

function variableAt(
  result: FunctionFlowResult,
  node: FlowNode,
  variable: Variable,
  point: FlowPoint
): VariableModel | undefined {
  const model = modelAt(result, node, point);
  return model ? getVariable(model, variable) : undefined;
}

/**
 * The type a read of `variable` has at `point` of `node`
 */
export function promotedTypeAt(
  result: FunctionFlowResult,
  node: FlowNode,
  variable: Variable,
  point: FlowPoint = 'before'
): Type | undefined {
  const info = variableAt(result, node, variable, point);
  return info ? currentType(info) : undefined;
}

export function isDefinitelyAssignedAt(
  result: FunctionFlowResult,
  node: FlowNode,
  variable: Variable,
  point: FlowPoint = 'before'
): boolean {
  return variableAt(result, node, variable, point)?.assigned ?? false;
}

export function isDefinitelyUnassignedAt(
  result: FunctionFlowResult,
  node: FlowNode,
  variable: Variable,
  point: FlowPoint = 'before'
): boolean {
  return variableAt(result, node, variable, point)?.unassigned ?? false;
}

export function isWriteCapturedAt(
  result: FunctionFlowResult,
  node: FlowNode,
  variable: Variable,
  point: FlowPoint = 'before'
): boolean {
  return variableAt(result, node, variable, point)?.writeCaptured ?? false;
}

/**
 * Static type the analysis gave an expression
 */
export function typeOfRead(result: FunctionFlowResult, node: Expression): Type | undefined {
  return result.staticTypes.get(node);
}

/**
 * Break and continue models a loop or switch accumulated
 */
export function jumpModelsOf(
  result: FunctionFlowResult,
  node: Statement
): { breakModel: FlowModel | null; continueModel: FlowModel | null } {
  const flow = result.statements.get(node);
  return {
    breakModel: flow?.breakModel ?? null,
    continueModel: flow?.continueModel ?? null,
  };
}
