/**
 * Flow Analysis Driver
 *
 * Runs both passes over one function unit: the assigned-variable pre-pass,
 * then the node analyzer from the entry model. Every run owns its memo
 * tables, so analyzing the same unit twice yields equal results.
 */

import type { Expression, FunctionUnit, Statement, Type, TypeOracle, Variable } from '../types/index.js';
import { createEntryModel } from './model/flow-model.js';
import type { FlowModel } from './model/flow-model.js';
import { computeAssignedVariables } from './engine/assigned.js';
import type { AssignedVariables } from './engine/assigned.js';
import type {
  AnalysisOptions,
  ExpressionFlow,
  FlowDiagnostic,
  FunctionExit,
  StatementFlow,
} from './engine/context.js';
import { createAnalysisContext } from './engine/context.js';
import { analyzeFunctionBody, checkMissingReturn } from './engine/functions.js';

/**
 * Everything one run publishes
 */
export interface FunctionFlowResult {
  readonly unit: FunctionUnit;
  readonly expressions: ReadonlyMap<Expression, ExpressionFlow>;
  readonly statements: ReadonlyMap<Statement, StatementFlow>;
  readonly staticTypes: ReadonlyMap<Expression, Type>;
  readonly declaredTypes: ReadonlyMap<Variable, Type>;
  /** Exit facts for the unit and every closure inside it */
  readonly functions: ReadonlyMap<FunctionUnit, FunctionExit>;
  readonly assigned: AssignedVariables;
  /** Model where control falls off the end of the body */
  readonly exit: FlowModel;
  readonly exitReachable: boolean;
  readonly exitTypes: readonly Type[];
  readonly diagnostics: readonly FlowDiagnostic[];
}

/**
 * Analyze one function, method or initializer body
 */
export function analyzeFunction(
  unit: FunctionUnit,
  oracle: TypeOracle,
  options: AnalysisOptions = {}
): FunctionFlowResult {
  const assigned = computeAssignedVariables(unit);
  const ctx = createAnalysisContext(oracle, assigned, options);

  const exit = analyzeFunctionBody(unit, createEntryModel(), ctx);
  checkMissingReturn(unit, exit, ctx);

  return {
    unit,
    expressions: ctx.expressions,
    statements: ctx.statements,
    staticTypes: ctx.staticTypes,
    declaredTypes: ctx.declaredTypes,
    functions: ctx.functions,
    assigned,
    exit: exit.end,
    exitReachable: exit.exitReachable,
    exitTypes: exit.exitTypes,
    diagnostics: ctx.diagnostics,
  };
}
