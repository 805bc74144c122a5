/**
 * Tests for reachability stacks and the flow-model lattice
 */

import { describe, it, expect } from 'vitest';
import type { Type, Variable } from '../../src/types/index.js';
import { NominalTypeOracle, Types, nullable } from '../../src/types/index.js';
import type { FlowModel } from '../../src/analysis/index.js';
import {
  assign,
  conservativeJoin,
  createEntryModel,
  declareVariable,
  drop,
  exit,
  flowModelsEqual,
  getVariable,
  isLocallyLive,
  isReachable,
  join,
  merge,
  promoteToNonNull,
  promotedTypeOf,
  removeVariables,
  restrict,
  split,
  unsplitTo,
} from '../../src/analysis/index.js';
import { updateVariable } from '../../src/analysis/model/lattice.js';
import { typeToString } from '../../src/utils/index.js';

const oracle = new NominalTypeOracle();

function variable(id: number, name: string, declaredType: Type | null): Variable {
  return { id, name, declaredType, kind: 'local' };
}

const x = variable(0, 'x', nullable(Types.int));
const y = variable(1, 'y', Types.string);

function show(type: Type | undefined): string | undefined {
  return type && typeToString(type);
}

/** Entry model with x (int?) and y (String) in scope, opened one split deep */
function base(xAssigned: boolean): FlowModel {
  const declared = declareVariable(
    declareVariable(createEntryModel(), x, nullable(Types.int), xAssigned),
    y,
    Types.string,
    true
  );
  return split(declared);
}

function promoteX(model: FlowModel): FlowModel {
  return updateVariable(model, x, (info) => promoteToNonNull(info, oracle));
}

describe('Reachability', () => {
  it('should push true on split', () => {
    expect(split(createEntryModel()).reachable).toEqual([true, true]);
  });

  it('should mark only the top unreachable on exit', () => {
    const model = exit(split(createEntryModel()));
    expect(model.reachable).toEqual([true, false]);
    expect(isLocallyLive(model)).toBe(false);
    expect(isReachable(model)).toBe(false);
  });

  it('should AND the top into the element below on drop', () => {
    expect(drop(exit(split(createEntryModel()))).reachable).toEqual([false]);
    expect(drop(split(createEntryModel())).reachable).toEqual([true]);
  });

  it('should refuse to drop the function-entry element', () => {
    expect(() => drop(createEntryModel())).toThrow('Cannot drop the function-entry reachability');
  });

  it('should unsplit to a given depth', () => {
    const deep = split(exit(split(createEntryModel())));
    expect(deep.reachable).toEqual([true, false, true]);
    expect(unsplitTo(deep, 1).reachable).toEqual([false]);
    expect(unsplitTo(deep, 3)).toBe(deep);
  });

  it('should refuse to unsplit to a deeper stack', () => {
    expect(() => unsplitTo(createEntryModel(), 2)).toThrow('Cannot unsplit depth 1 to depth 2');
  });

  it('should refuse to join models of different depth', () => {
    expect(() => join(createEntryModel(), split(createEntryModel()))).toThrow(
      'Cannot join reachability of depth 1 with depth 2'
    );
  });
});

describe('Lattice laws', () => {
  const m1 = promoteX(base(true));
  const m2 = base(false);
  const m3 = exit(promoteX(base(false)));

  it('should join commutatively', () => {
    expect(flowModelsEqual(join(m1, m2), join(m2, m1))).toBe(true);
    expect(flowModelsEqual(join(m1, m3), join(m3, m1))).toBe(true);
  });

  it('should join associatively', () => {
    expect(flowModelsEqual(join(join(m1, m2), m3), join(m1, join(m2, m3)))).toBe(true);
  });

  it('should join idempotently', () => {
    expect(flowModelsEqual(join(m1, m1), m1)).toBe(true);
  });

  it('should make drop a merge of a model with itself', () => {
    expect(flowModelsEqual(drop(m1), merge(m1, m1))).toBe(true);
  });

  it('should intersect promotions and AND assignment facts', () => {
    const joined = join(m1, m2);
    const info = getVariable(joined, x);
    expect(info?.promotedTypes).toEqual([]);
    expect(info?.assigned).toBe(false);
    expect(info?.unassigned).toBe(false);
    expect(info?.tested.map((type) => typeToString(type))).toEqual(['int']);
  });

  it('should take the live side when the other side is locally dead', () => {
    const joined = join(m2, m3);
    expect(joined.reachable).toEqual([true, true]);
    expect(getVariable(joined, x)).toBe(getVariable(m2, x));
  });

  it('should keep only variables in scope on both sides', () => {
    const narrowed = removeVariables(m2, [y]);
    const joined = join(m1, narrowed);
    expect([...joined.variableInfo.keys()]).toEqual([x]);
  });
});

describe('conservativeJoin', () => {
  it('should drop promotions of variables assigned in the region', () => {
    const model = conservativeJoin(promoteX(base(false)), new Set([x]), new Set());
    const info = getVariable(model, x);
    expect(info?.promotedTypes).toEqual([]);
    expect(info?.unassigned).toBe(false);
    expect(info?.writeCaptured).toBe(false);
  });

  it('should mark captured variables write-captured', () => {
    const model = conservativeJoin(promoteX(base(true)), new Set([x]), new Set([x]));
    expect(getVariable(model, x)?.writeCaptured).toBe(true);
    expect(show(promotedTypeOf(model, x))).toBe('int?');
  });

  it('should leave other variables alone', () => {
    const before = promoteX(base(true));
    const model = conservativeJoin(before, new Set([y]), new Set());
    expect(getVariable(model, x)).toBe(getVariable(before, x));
  });
});

describe('restrict', () => {
  it('should apply promotions made in finally', () => {
    const afterTry = drop(base(true));
    const afterFinally = drop(promoteX(base(false)));
    const model = restrict(afterTry, afterFinally, new Set(), oracle);
    const info = getVariable(model, x);
    expect(show(promotedTypeOf(model, x))).toBe('int');
    expect(info?.assigned).toBe(true);
  });

  it('should take the finally state of variables finally assigns', () => {
    const afterTry = drop(promoteX(base(true)));
    const afterFinally = drop(base(false));
    const model = restrict(afterTry, afterFinally, new Set([x]), oracle);
    expect(getVariable(model, x)).toBe(getVariable(afterFinally, x));
  });

  it('should be unreachable when finally cannot complete', () => {
    const model = restrict(drop(base(true)), exit(drop(base(true))), new Set(), oracle);
    expect(model.reachable).toEqual([false]);
  });
});

describe('assign', () => {
  it('should not promote an explicitly typed variable on its own', () => {
    const model = assign(base(false), x, Types.int, oracle);
    const info = getVariable(model, x);
    expect(info?.assigned).toBe(true);
    expect(info?.unassigned).toBe(false);
    expect(show(promotedTypeOf(model, x))).toBe('int?');
  });

  it('should promote to a tested type', () => {
    const tested = updateVariable(base(true), x, (info) => ({ ...info, tested: [Types.int] }));
    expect(show(promotedTypeOf(assign(tested, x, Types.int, oracle), x))).toBe('int');
  });

  it('should promote an untyped variable on its first assignment', () => {
    const z = variable(2, 'z', null);
    const model = declareVariable(createEntryModel(), z, Types.dynamic, false);
    expect(show(promotedTypeOf(assign(model, z, Types.int, oracle), z))).toBe('int');
  });

  it('should ignore variables out of scope', () => {
    const model = base(true);
    expect(assign(model, variable(9, 'w', Types.int), Types.int, oracle)).toBe(model);
  });
});

describe('Unreachable code', () => {
  it('should stay unreachable through splits, joins and assignments', () => {
    const dead = exit(declareVariable(createEntryModel(), x, nullable(Types.int), false));
    expect(isReachable(dead)).toBe(false);

    const nested = split(dead);
    expect(isLocallyLive(nested)).toBe(true);
    expect(isReachable(nested)).toBe(false);

    const promoted = promoteX(assign(nested, x, Types.int, oracle));
    const joined = join(promoted, nested);
    expect(isReachable(joined)).toBe(false);
    expect(isReachable(drop(joined))).toBe(false);
  });

  it('should keep promotion data inside dead code', () => {
    const nested = split(exit(declareVariable(createEntryModel(), x, nullable(Types.int), true)));
    const promoted = promoteX(nested);
    expect(show(promotedTypeOf(promoted, x))).toBe('int');
    expect(show(promotedTypeOf(drop(promoted), x))).toBe('int');
  });
});
