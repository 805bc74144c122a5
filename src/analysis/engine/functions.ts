/**
 * Function bodies and closures
 */

import type { Block, FlowNode, FunctionUnit, ReturnStatement, Type, TypeOracle, Variable } from '../../types/index.js';
import { Types, futureArgument, futureOrArgument, isBlock } from '../../types/index.js';
import type { FlowModel } from '../model/flow-model.js';
import { isReachable } from '../model/flow-model.js';
import { conservativeJoin, declareVariable, removeVariables, split } from '../model/lattice.js';
import type { AnalysisContext, FunctionExit, FunctionFrame } from './context.js';
import { report } from './context.js';
import { analyzeStatement } from './statements.js';

const NO_VARIABLES: ReadonlySet<Variable> = new Set();

/**
 * Analyze `unit`'s body from `entry`, with its parameters bound
 */
export function analyzeFunctionBody(unit: FunctionUnit, entry: FlowModel, ctx: AnalysisContext): FunctionExit {
  let model = entry;
  for (const parameter of unit.parameters) {
    const declaredType = parameter.declaredType ?? Types.dynamic;
    ctx.declaredTypes.set(parameter, declaredType);
    model = declareVariable(model, parameter, declaredType, true);
  }

  const frame: FunctionFrame = { unit, exitTypes: [] };
  ctx.frames.push(frame);
  const end = analyzeStatement(bodyStatement(unit, ctx), model, ctx).after;
  ctx.frames.pop();

  const exit: FunctionExit = {
    end: removeVariables(end, unit.parameters),
    exitReachable: isReachable(end),
    exitTypes: frame.exitTypes,
  };
  ctx.functions.set(unit, exit);
  return exit;
}

/**
 * The body as a statement; `=> e` is `{ return e; }`
 */
export function bodyStatement(unit: FunctionUnit, ctx: AnalysisContext): Block | ReturnStatement {
  if (isBlock(unit.body)) return unit.body;

  let statement = ctx.syntheticReturns.get(unit);
  if (!statement) {
    statement = { kind: 'return', value: unit.body, loc: unit.body.loc };
    ctx.syntheticReturns.set(unit, statement);
  }
  return statement;
}

/**
 * Analyze a closure or local function at `node` and return the model
 * after it. The body may run at any later point, so it starts from a
 * state that forgets everything the enclosing function can change.
 */
export function analyzeClosure(
  node: FlowNode,
  unit: FunctionUnit,
  before: FlowModel,
  ctx: AnalysisContext
): FlowModel {
  const enclosing = ctx.frames[ctx.frames.length - 1]?.unit;
  const assignedOutside = enclosing ? ctx.assigned.assignedIn(enclosing) : NO_VARIABLES;
  const entry = conservativeJoin(split(before), assignedOutside, ctx.assigned.capturedIn(unit));

  const parentLive = ctx.parentLive;
  ctx.parentLive = isReachable(entry);
  const exit = analyzeFunctionBody(unit, entry, ctx);
  ctx.parentLive = parentLive;

  checkMissingReturn(unit, exit, ctx);

  // Variables the closure writes are write-captured from here on
  return conservativeJoin(before, NO_VARIABLES, ctx.assigned.capturedIn(node));
}

/**
 * Report a body that can complete normally when its return type needs a value
 */
export function checkMissingReturn(unit: FunctionUnit, exit: FunctionExit, ctx: AnalysisContext): void {
  if (!ctx.options.reportMissingReturn) return;
  if (unit.isGenerator || !exit.exitReachable || !unit.returnType) return;
  if (admitsImplicitNull(unit.returnType, unit.isAsync, ctx.oracle)) return;

  report(ctx, {
    kind: 'missing-return',
    severity: 'error',
    message: `'${unit.name}' can complete without returning a value`,
    node: unit,
  });
}

/**
 * Whether falling off the end of a body is a valid way to produce `returnType`
 */
export function admitsImplicitNull(returnType: Type, isAsync: boolean, oracle: TypeOracle): boolean {
  const valueType = isAsync
    ? futureArgument(returnType) ?? futureOrArgument(returnType) ?? returnType
    : returnType;
  if (valueType.kind === 'void' || valueType.kind === 'dynamic') return true;
  return oracle.isSubtype(Types.nullType, valueType);
}
