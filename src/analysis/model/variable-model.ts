/**
 * Variable Model - per-variable lattice element
 */

import type { Type } from '../../types/index.js';
import { canonicalTypeSet, typesEqual } from '../../utils/type-utils.js';

export interface VariableModel {
  /** Same in every model of one variable within a function body */
  readonly declaredType: Type;
  /** Strictly narrowing chain; the last entry is the current type */
  readonly promotedTypes: readonly Type[];
  /** Types tested against (`is`, `as`, null checks), canonically ordered */
  readonly tested: readonly Type[];
  /** Definitely assigned */
  readonly assigned: boolean;
  /** Definitely unassigned */
  readonly unassigned: boolean;
  /** A closure may write the variable; monotone within its scope */
  readonly writeCaptured: boolean;
}

/**
 * Model for a variable entering scope
 */
export function createVariableModel(declaredType: Type, assigned: boolean): VariableModel {
  return {
    declaredType,
    promotedTypes: [],
    tested: [],
    assigned,
    unassigned: !assigned,
    writeCaptured: false,
  };
}

/**
 * The current promoted type, or the declared type when not promoted
 */
export function currentType(model: VariableModel): Type {
  return model.promotedTypes[model.promotedTypes.length - 1] ?? model.declaredType;
}

/**
 * Record `type` as tested
 */
export function withTested(model: VariableModel, type: Type): VariableModel {
  if (model.tested.some((tested) => typesEqual(tested, type))) return model;
  return { ...model, tested: canonicalTypeSet([...model.tested, type]) };
}

/**
 * joinV: ordered intersection of promotions, union of test sites,
 * AND of assignment facts, OR of write capture
 */
export function joinVariableModels(a: VariableModel, b: VariableModel): VariableModel {
  if (a === b) return a;
  return {
    declaredType: a.declaredType,
    promotedTypes: a.promotedTypes.filter((type) =>
      b.promotedTypes.some((other) => typesEqual(type, other))
    ),
    tested: canonicalTypeSet([...a.tested, ...b.tested]),
    assigned: a.assigned && b.assigned,
    unassigned: a.unassigned && b.unassigned,
    writeCaptured: a.writeCaptured || b.writeCaptured,
  };
}

/**
 * Structural equality of two variable models
 */
export function variableModelsEqual(a: VariableModel, b: VariableModel): boolean {
  return (
    a.assigned === b.assigned &&
    a.unassigned === b.unassigned &&
    a.writeCaptured === b.writeCaptured &&
    typesEqual(a.declaredType, b.declaredType) &&
    typeListEqual(a.promotedTypes, b.promotedTypes) &&
    typeListEqual(a.tested, b.tested)
  );
}

function typeListEqual(a: readonly Type[], b: readonly Type[]): boolean {
  return a.length === b.length && a.every((type, i) => {
    const other = b[i];
    return other !== undefined && typesEqual(type, other);
  });
}
