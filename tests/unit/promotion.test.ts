/**
 * Tests for the promotion policy
 */

import { describe, it, expect } from 'vitest';
import type { Type } from '../../src/types/index.js';
import { NominalTypeOracle, Types, nullable, typeParameter } from '../../src/types/index.js';
import type { VariableModel } from '../../src/analysis/index.js';
import {
  createVariableModel,
  currentType,
  isStrictlyNarrower,
  joinVariableModels,
  promoteByTypeTest,
  promoteByTypeTestFailure,
  promoteToNonNull,
  recordNullTest,
} from '../../src/analysis/index.js';
import { assignVariableModel } from '../../src/analysis/model/promotion.js';
import { typeToString } from '../../src/utils/index.js';

const oracle = new NominalTypeOracle();

function names(types: readonly Type[]): string[] {
  return types.map((type) => typeToString(type));
}

/** Every promotion is a subtype of the declared type and of every earlier one */
function expectMonotone(model: VariableModel): void {
  model.promotedTypes.forEach((type, i) => {
    expect(oracle.isSubtype(type, model.declaredType)).toBe(true);
    for (const earlier of model.promotedTypes.slice(0, i)) {
      expect(oracle.isSubtype(type, earlier)).toBe(true);
    }
  });
}

describe('Promotion Policy', () => {
  describe('isStrictlyNarrower', () => {
    it('should hold only one way', () => {
      expect(isStrictlyNarrower(Types.int, Types.num, oracle)).toBe(true);
      expect(isStrictlyNarrower(Types.num, Types.int, oracle)).toBe(false);
      expect(isStrictlyNarrower(Types.int, Types.int, oracle)).toBe(false);
    });
  });

  describe('promoteByTypeTest', () => {
    it('should promote to a narrower tested type', () => {
      const model = promoteByTypeTest(createVariableModel(Types.nullableObject, true), Types.string, oracle);
      expect(names(model.promotedTypes)).toEqual(['String']);
      expect(names(model.tested)).toEqual(['String']);
    });

    it('should record but not promote to an unrelated type', () => {
      const model = promoteByTypeTest(createVariableModel(Types.int, true), Types.string, oracle);
      expect(model.promotedTypes).toEqual([]);
      expect(names(model.tested)).toEqual(['String']);
    });

    it('should not promote a write-captured variable', () => {
      const captured = { ...createVariableModel(Types.num, true), writeCaptured: true };
      const model = promoteByTypeTest(captured, Types.int, oracle);
      expect(model.promotedTypes).toEqual([]);
      expect(names(model.tested)).toEqual(['int']);
    });

    it('should intersect a type parameter with the tested type', () => {
      const T = typeParameter('T');
      const model = promoteByTypeTest(createVariableModel(T, true), Types.num, oracle);
      expect(typeToString(currentType(model))).toBe('T & num');
    });
  });

  describe('promoteByTypeTestFailure', () => {
    it('should factor out Null', () => {
      const model = promoteByTypeTestFailure(createVariableModel(nullable(Types.int), true), Types.nullType, oracle);
      expect(typeToString(currentType(model))).toBe('int');
    });

    it('should leave only Null when the non-null part was tested', () => {
      const model = promoteByTypeTestFailure(createVariableModel(nullable(Types.int), true), Types.num, oracle);
      expect(typeToString(currentType(model))).toBe('Null');
    });

    it('should not promote non-nullable types', () => {
      const model = promoteByTypeTestFailure(createVariableModel(Types.num, true), Types.int, oracle);
      expect(model.promotedTypes).toEqual([]);
      expect(names(model.tested)).toEqual(['int']);
    });
  });

  describe('promoteToNonNull', () => {
    it('should promote T? to T', () => {
      const model = promoteToNonNull(createVariableModel(nullable(Types.string), true), oracle);
      expect(names(model.promotedTypes)).toEqual(['String']);
    });

    it('should not promote a non-nullable type', () => {
      const model = promoteToNonNull(createVariableModel(Types.string, true), oracle);
      expect(model.promotedTypes).toEqual([]);
      expect(names(model.tested)).toEqual(['String']);
    });
  });

  describe('recordNullTest', () => {
    it('should record the non-null type without promoting', () => {
      const model = recordNullTest(createVariableModel(nullable(Types.int), true));
      expect(model.promotedTypes).toEqual([]);
      expect(names(model.tested)).toEqual(['int']);
    });

    it('should let a later assignment promote to the recorded type', () => {
      const model = recordNullTest(createVariableModel(nullable(Types.int), true));
      const assigned = assignVariableModel(model, Types.int, oracle, true);
      expect(names(assigned.promotedTypes)).toEqual(['int']);
    });
  });

  describe('assignVariableModel', () => {
    it('should demote to the promotions the value still satisfies', () => {
      let model = createVariableModel(nullable(Types.num), true);
      model = promoteToNonNull(model, oracle);
      model = promoteByTypeTest(model, Types.int, oracle);
      expect(names(model.promotedTypes)).toEqual(['num', 'int']);

      const assigned = assignVariableModel(model, Types.double, oracle, true);
      expect(names(assigned.promotedTypes)).toEqual(['num']);
    });

    it('should promote to the most specific tested supertype of the value', () => {
      let model = createVariableModel(Types.nullableObject, true);
      model = { ...model, tested: [Types.num, Types.object] };
      const assigned = assignVariableModel(model, Types.int, oracle, true);
      expect(names(assigned.promotedTypes)).toEqual(['num']);
    });

    it('should prefer type-test promotion over initialization promotion', () => {
      let model = createVariableModel(Types.dynamic, false);
      model = promoteByTypeTest(model, Types.num, oracle);
      const assigned = assignVariableModel(model, Types.int, oracle, false);
      expect(names(assigned.promotedTypes)).toEqual(['num']);
    });

    it('should promote an untyped variable to its first value', () => {
      const assigned = assignVariableModel(createVariableModel(Types.dynamic, false), Types.int, oracle, false);
      expect(names(assigned.promotedTypes)).toEqual(['int']);
      expect(assigned.assigned).toBe(true);
      expect(assigned.unassigned).toBe(false);
    });

    it('should only mark a write-captured variable assigned', () => {
      const captured = { ...createVariableModel(nullable(Types.int), false), writeCaptured: true };
      const assigned = assignVariableModel(captured, Types.int, oracle, true);
      expect(assigned.promotedTypes).toEqual([]);
      expect(assigned.assigned).toBe(true);
    });
  });

  describe('joinVariableModels', () => {
    it('should keep the common promotions', () => {
      const declared = createVariableModel(nullable(Types.num), true);
      const a = promoteByTypeTest(promoteToNonNull(declared, oracle), Types.int, oracle);
      const b = promoteToNonNull(declared, oracle);
      const joined = joinVariableModels(a, b);
      expect(names(joined.promotedTypes)).toEqual(['num']);
      expect(names(joined.tested)).toEqual(['int', 'num']);
    });

    it('should OR write capture', () => {
      const plain = createVariableModel(Types.int, true);
      expect(joinVariableModels(plain, { ...plain, writeCaptured: true }).writeCaptured).toBe(true);
    });
  });

  describe('monotonicity', () => {
    it('should keep the chain ordered through any sequence of facts', () => {
      let model = createVariableModel(Types.nullableObject, true);
      const steps: Array<(m: VariableModel) => VariableModel> = [
        (m) => promoteByTypeTest(m, Types.num, oracle),
        (m) => promoteByTypeTest(m, Types.int, oracle),
        (m) => promoteByTypeTest(m, Types.num, oracle),
        (m) => assignVariableModel(m, Types.double, oracle, true),
        (m) => promoteToNonNull(m, oracle),
        (m) => assignVariableModel(m, Types.int, oracle, true),
        (m) => promoteByTypeTestFailure(m, Types.string, oracle),
      ];
      for (const step of steps) {
        model = step(model);
        expectMonotone(model);
      }
      expect(names(model.promotedTypes)).toEqual(['num', 'int']);
    });
  });
});
