/**
 * Promotion Policy - decide how a fact changes a variable's model
 *
 * Facts are type tests (`is`, `as`), null checks and assignments. Each
 * function returns a new VariableModel; none of them look at reachability.
 */

import type { Type, TypeOracle } from '../../types/index.js';
import { nonNullable, nullType, promotedTypeParameter } from '../../types/index.js';
import { containsType } from '../../utils/type-utils.js';
import type { VariableModel } from './variable-model.js';
import { currentType, withTested } from './variable-model.js';

/**
 * `narrower <: wider` but not the other way round
 */
export function isStrictlyNarrower(narrower: Type, wider: Type, oracle: TypeOracle): boolean {
  return oracle.isSubtype(narrower, wider) && !oracle.isSubtype(wider, narrower);
}

/**
 * Append `type` to the chain if it narrows the current type
 */
function pushPromotion(model: VariableModel, type: Type, oracle: TypeOracle): VariableModel {
  const current = currentType(model);
  if (isStrictlyNarrower(type, current, oracle)) {
    return { ...model, promotedTypes: [...model.promotedTypes, type] };
  }
  // `X is T` where X is a type parameter and T fits its bound: X & T
  if (current.kind === 'typeParameter' && oracle.isSubtype(type, current.bound)) {
    const intersection = promotedTypeParameter(current, type);
    if (isStrictlyNarrower(intersection, current, oracle)) {
      return { ...model, promotedTypes: [...model.promotedTypes, intersection] };
    }
  }
  return model;
}

/**
 * True branch of `x is T`, and the after state of `x as T`
 */
export function promoteByTypeTest(model: VariableModel, type: Type, oracle: TypeOracle): VariableModel {
  const tested = withTested(model, type);
  if (model.writeCaptured) return tested;
  return pushPromotion(tested, type, oracle);
}

/**
 * False branch of `x is T`: remove what T accounts for from the current type
 */
export function promoteByTypeTestFailure(model: VariableModel, type: Type, oracle: TypeOracle): VariableModel {
  const tested = withTested(model, type);
  if (model.writeCaptured) return tested;

  const current = currentType(model);
  if (current.kind !== 'nullable') return tested;

  // S? is not T, and Null is T: S remains
  if (oracle.isSubtype(nullType, type)) {
    return pushPromotion(tested, current.inner, oracle);
  }
  // S? is not T, and S is T: only null remains
  if (oracle.isSubtype(current.inner, type)) {
    return pushPromotion(tested, nullType, oracle);
  }
  return tested;
}

/**
 * `x != null` held: promote to NonNull of the current type
 */
export function promoteToNonNull(model: VariableModel, oracle: TypeOracle): VariableModel {
  const target = nonNullable(currentType(model));
  const tested = withTested(model, target);
  if (model.writeCaptured) return tested;
  return pushPromotion(tested, target, oracle);
}

/**
 * `x == null` held: nothing narrows, but NonNull of the current type
 * becomes a type an assignment may promote to
 */
export function recordNullTest(model: VariableModel): VariableModel {
  return withTested(model, nonNullable(currentType(model)));
}

/**
 * Whether an assignment is the first write of an untyped, uninitialized
 * variable. A variable that has been tested or promoted is governed by
 * the assignment rules instead.
 */
export function isInitializingAssignment(model: VariableModel, hasExplicitType: boolean): boolean {
  return (
    !hasExplicitType &&
    model.unassigned &&
    !model.writeCaptured &&
    model.promotedTypes.length === 0 &&
    model.tested.length === 0
  );
}

/**
 * Model after `x = e` where `e` has static type `type`
 */
export function assignVariableModel(
  model: VariableModel,
  type: Type,
  oracle: TypeOracle,
  hasExplicitType: boolean
): VariableModel {
  const written: VariableModel = { ...model, assigned: true, unassigned: false };
  if (model.writeCaptured) return written;

  if (isInitializingAssignment(model, hasExplicitType)) {
    return isStrictlyNarrower(type, model.declaredType, oracle)
      ? { ...written, promotedTypes: [type] }
      : written;
  }

  // Demote: keep the promotions the new value still satisfies
  const kept: Type[] = [];
  for (const promoted of model.promotedTypes) {
    if (!oracle.isSubtype(type, promoted)) break;
    kept.push(promoted);
  }
  const demoted: VariableModel = { ...written, promotedTypes: kept };

  const current = currentType(demoted);
  if (!oracle.isSubtype(type, current)) return demoted;

  const target = chooseTypeOfInterest(type, current, model.tested, oracle);
  return target ? { ...demoted, promotedTypes: [...kept, target] } : demoted;
}

/**
 * Pick the tested type an assignment of `type` may promote to: `type`
 * itself when it was tested, else the most specific tested supertype of
 * `type` that still narrows `current`
 */
function chooseTypeOfInterest(
  type: Type,
  current: Type,
  tested: readonly Type[],
  oracle: TypeOracle
): Type | undefined {
  if (containsType(tested, type) && isStrictlyNarrower(type, current, oracle)) {
    return type;
  }

  let best: Type | undefined;
  for (const candidate of tested) {
    if (!oracle.isSubtype(type, candidate)) continue;
    if (!isStrictlyNarrower(candidate, current, oracle)) continue;
    if (!best || oracle.isSubtype(candidate, best)) best = candidate;
  }
  return best;
}
