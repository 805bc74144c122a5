/**
 * Flow Model - everything known at one program point
 */

import type { Variable } from '../../types/index.js';
import type { Reachability } from './reachability.js';
import { ENTRY_REACHABILITY, isLocallyReachable, isOverallReachable } from './reachability.js';
import type { VariableModel } from './variable-model.js';
import { variableModelsEqual } from './variable-model.js';

export interface FlowModel {
  readonly reachable: Reachability;
  /** Every variable in lexical scope */
  readonly variableInfo: ReadonlyMap<Variable, VariableModel>;
}

/**
 * Model at function entry, before parameters are bound
 */
export function createEntryModel(): FlowModel {
  return { reachable: ENTRY_REACHABILITY, variableInfo: new Map() };
}

/**
 * Is this point reachable from function entry?
 */
export function isReachable(model: FlowModel): boolean {
  return isOverallReachable(model.reachable);
}

/**
 * Is this point reachable from the innermost open split?
 */
export function isLocallyLive(model: FlowModel): boolean {
  return isLocallyReachable(model.reachable);
}

/**
 * Variable model lookup; undefined when the variable is out of scope
 */
export function getVariable(model: FlowModel, variable: Variable): VariableModel | undefined {
  return model.variableInfo.get(variable);
}

/**
 * Replace one variable's model
 */
export function setVariable(model: FlowModel, variable: Variable, info: VariableModel): FlowModel {
  if (model.variableInfo.get(variable) === info) return model;
  const variableInfo = new Map(model.variableInfo);
  variableInfo.set(variable, info);
  return { ...model, variableInfo };
}

/**
 * Map with keys ordered by variable id, so equal models print and
 * iterate identically regardless of how they were built
 */
export function sortedVariableInfo(
  entries: Iterable<[Variable, VariableModel]>
): ReadonlyMap<Variable, VariableModel> {
  return new Map([...entries].sort(([a], [b]) => a.id - b.id));
}

/**
 * Structural equality of two flow models
 */
export function flowModelsEqual(a: FlowModel, b: FlowModel): boolean {
  if (a === b) return true;
  if (a.reachable.length !== b.reachable.length) return false;
  if (!a.reachable.every((entry, i) => entry === b.reachable[i])) return false;
  if (a.variableInfo.size !== b.variableInfo.size) return false;
  for (const [variable, info] of a.variableInfo) {
    const other = b.variableInfo.get(variable);
    if (!other || !variableModelsEqual(info, other)) return false;
  }
  return true;
}
