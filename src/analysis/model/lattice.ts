/**
 * Lattice Operators - combine and transform flow models across edges
 *
 * All operators are pure. `join` is the same-depth lattice join
 * (commutative, associative, idempotent); `merge` is a control-flow
 * junction that also closes the split both sides were analyzed under, so
 * `drop(M)` equals `merge(M, M)`.
 */

import type { Type, TypeOracle, Variable } from '../../types/index.js';
import type { FlowModel } from './flow-model.js';
import { setVariable, sortedVariableInfo } from './flow-model.js';
import {
  isLocallyReachable,
  joinReachability,
  markUnreachable,
  meetReachability,
  popSplit,
  pushSplit,
} from './reachability.js';
import type { VariableModel } from './variable-model.js';
import { canonicalTypeSet } from '../../utils/type-utils.js';
import { createVariableModel, currentType, joinVariableModels } from './variable-model.js';
import { assignVariableModel, isStrictlyNarrower } from './promotion.js';

/**
 * Enter a conditionally reached region
 */
export function split(model: FlowModel): FlowModel {
  return { ...model, reachable: pushSplit(model.reachable) };
}

/**
 * Close the innermost split with a single path through it
 */
export function drop(model: FlowModel): FlowModel {
  return { ...model, reachable: popSplit(model.reachable) };
}

/**
 * Close splits until the stack has `depth` entries
 */
export function unsplitTo(model: FlowModel, depth: number): FlowModel {
  if (model.reachable.length < depth) {
    throw new Error(`Cannot unsplit depth ${model.reachable.length} to depth ${depth}`);
  }
  let result = model;
  while (result.reachable.length > depth) {
    result = drop(result);
  }
  return result;
}

/**
 * Control cannot get past this point
 */
export function exit(model: FlowModel): FlowModel {
  return { ...model, reachable: markUnreachable(model.reachable) };
}

/**
 * Same-depth join. A locally dead side contributes nothing when the
 * other side is locally live; otherwise variables are joined key-wise
 * over the variables both sides have in scope.
 */
export function join(m1: FlowModel, m2: FlowModel): FlowModel {
  if (m1 === m2) return m1;
  const reachable = joinReachability(m1.reachable, m2.reachable);

  const live1 = isLocallyReachable(m1.reachable);
  const live2 = isLocallyReachable(m2.reachable);
  if (live1 && !live2) return { reachable, variableInfo: m1.variableInfo };
  if (live2 && !live1) return { reachable, variableInfo: m2.variableInfo };

  const entries: Array<[Variable, VariableModel]> = [];
  for (const [variable, info1] of m1.variableInfo) {
    const info2 = m2.variableInfo.get(variable);
    if (info2) entries.push([variable, joinVariableModels(info1, info2)]);
  }
  return { reachable, variableInfo: sortedVariableInfo(entries) };
}

/**
 * Junction of two paths that diverged at the innermost split
 */
export function merge(m1: FlowModel, m2: FlowModel): FlowModel {
  return drop(join(m1, m2));
}

/**
 * Join that tolerates a missing side, for accumulating break/continue
 */
export function joinOptional(m1: FlowModel | null, m2: FlowModel): FlowModel {
  return m1 ? join(m1, m2) : m2;
}

/**
 * Loop heads and closure bodies: forget what writes inside the region
 * could invalidate. Assigned variables lose promotions and definite
 * unassignment; captured variables also become write-captured.
 */
export function conservativeJoin(
  model: FlowModel,
  assigned: ReadonlySet<Variable>,
  captured: ReadonlySet<Variable>
): FlowModel {
  let result = model;
  for (const [variable, info] of model.variableInfo) {
    if (captured.has(variable)) {
      result = setVariable(result, variable, {
        ...info,
        promotedTypes: [],
        unassigned: false,
        writeCaptured: true,
      });
    } else if (assigned.has(variable)) {
      result = setVariable(result, variable, { ...info, promotedTypes: [], unassigned: false });
    }
  }
  return result;
}

/**
 * After `try { B } finally { F }`: the end of B, with everything F
 * established applied on top
 */
export function restrict(
  afterTry: FlowModel,
  afterFinally: FlowModel,
  assignedInFinally: ReadonlySet<Variable>,
  oracle: TypeOracle
): FlowModel {
  const entries: Array<[Variable, VariableModel]> = [];
  for (const [variable, tryInfo] of afterTry.variableInfo) {
    const finallyInfo = afterFinally.variableInfo.get(variable);
    if (!finallyInfo) continue;
    if (assignedInFinally.has(variable)) {
      entries.push([variable, finallyInfo]);
      continue;
    }

    const promotedTypes = [...tryInfo.promotedTypes];
    for (const promoted of finallyInfo.promotedTypes) {
      const current = promotedTypes[promotedTypes.length - 1] ?? tryInfo.declaredType;
      if (isStrictlyNarrower(promoted, current, oracle)) promotedTypes.push(promoted);
    }
    entries.push([
      variable,
      {
        declaredType: tryInfo.declaredType,
        promotedTypes,
        tested: canonicalTypeSet([...tryInfo.tested, ...finallyInfo.tested]),
        assigned: tryInfo.assigned || finallyInfo.assigned,
        unassigned: tryInfo.unassigned && finallyInfo.unassigned,
        writeCaptured: tryInfo.writeCaptured || finallyInfo.writeCaptured,
      },
    ]);
  }
  return {
    reachable: meetReachability(afterTry.reachable, afterFinally.reachable),
    variableInfo: sortedVariableInfo(entries),
  };
}

/**
 * A variable enters scope
 */
export function declareVariable(
  model: FlowModel,
  variable: Variable,
  declaredType: Type,
  assigned: boolean
): FlowModel {
  return setVariable(model, variable, createVariableModel(declaredType, assigned));
}

/**
 * Variables leave scope
 */
export function removeVariables(model: FlowModel, variables: Iterable<Variable>): FlowModel {
  let variableInfo: Map<Variable, VariableModel> | null = null;
  for (const variable of variables) {
    if (!model.variableInfo.has(variable)) continue;
    variableInfo ??= new Map(model.variableInfo);
    variableInfo.delete(variable);
  }
  return variableInfo ? { ...model, variableInfo } : model;
}

/**
 * Apply `update` to one variable's model, if it is in scope
 */
export function updateVariable(
  model: FlowModel,
  variable: Variable,
  update: (info: VariableModel) => VariableModel
): FlowModel {
  const info = model.variableInfo.get(variable);
  return info ? setVariable(model, variable, update(info)) : model;
}

/**
 * assign(x, E, M): `model` is the state after evaluating E, whose
 * static type is `type`
 */
export function assign(model: FlowModel, variable: Variable, type: Type, oracle: TypeOracle): FlowModel {
  return updateVariable(model, variable, (info) =>
    assignVariableModel(info, type, oracle, variable.declaredType !== null)
  );
}

/**
 * The type a read of `variable` has at this point
 */
export function promotedTypeOf(model: FlowModel, variable: Variable): Type | undefined {
  const info = model.variableInfo.get(variable);
  return info ? currentType(info) : undefined;
}
