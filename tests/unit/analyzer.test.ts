/**
 * Tests for the flow analysis engine over hand-built flow ASTs
 */

import { describe, it, expect } from 'vitest';
import type {
  Block,
  DoWhileStatement,
  EqualityExpression,
  Expression,
  ExpressionStatement,
  FunctionExpression,
  FunctionUnit,
  IfStatement,
  Literal,
  PropertyGet,
  ReturnStatement,
  Statement,
  Type,
  Variable,
  VariableDeclaration,
  VariableGet,
  VariableKind,
  VariableSet,
  WhileStatement,
} from '../../src/types/index.js';
import { NominalTypeOracle, Types, nullable } from '../../src/types/index.js';
import {
  admitsImplicitNull,
  analyzeFunction,
  flowModelsEqual,
  isDefinitelyAssignedAt,
  isDefinitelyUnassignedAt,
  isReachable,
  isWriteCapturedAt,
  jumpModelsOf,
  modelAt,
  promotedTypeAt,
  promotedTypeOf,
  typeOfRead,
} from '../../src/analysis/index.js';
import { typeToString } from '../../src/utils/index.js';

const oracle = new NominalTypeOracle();

// ============================================================================
// Builders
// ============================================================================

let nextId = 0;

function local(name: string, declaredType: Type | null, kind: VariableKind = 'local'): Variable {
  return { id: nextId++, name, declaredType, kind };
}

function param(name: string, declaredType: Type | null): Variable {
  return local(name, declaredType, 'parameter');
}

function get(variable: Variable): VariableGet {
  return { kind: 'variableGet', variable };
}

function set(variable: Variable, value: Expression): VariableSet {
  return { kind: 'variableSet', variable, value };
}

function lit(value: string | number): Literal {
  return { kind: 'literal', value, type: typeof value === 'string' ? Types.string : Types.int };
}

function prop(target: Expression, name: string): PropertyGet {
  return { kind: 'propertyGet', target, name };
}

function isNull(variable: Variable, negated = false): EqualityExpression {
  return { kind: 'equality', left: get(variable), right: { kind: 'nullLiteral' }, negated };
}

function stmt(expression: Expression): ExpressionStatement {
  return { kind: 'expressionStatement', expression };
}

function ret(value: Expression | null): ReturnStatement {
  return { kind: 'return', value };
}

function block(...statements: Statement[]): Block {
  return { kind: 'block', statements };
}

function ifStmt(condition: Expression, then: Statement, otherwise: Statement | null = null): IfStatement {
  return { kind: 'if', condition, then, otherwise };
}

function declare(variable: Variable, initializer: Expression | null = null): VariableDeclaration {
  return { kind: 'declaration', variable, initializer };
}

function unit(
  name: string,
  parameters: Variable[],
  statements: Statement[],
  returnType: Type | null = null,
  modifiers: { isAsync?: boolean; isGenerator?: boolean } = {}
): FunctionUnit {
  return {
    name,
    parameters,
    body: block(...statements),
    returnType,
    isAsync: modifiers.isAsync ?? false,
    isGenerator: modifiers.isGenerator ?? false,
  };
}

function show(type: Type | undefined): string | undefined {
  return type && typeToString(type);
}

// ============================================================================
// Scenarios
// ============================================================================

describe('Flow Analysis', () => {
  describe('promotion and reachability', () => {
    it('should promote inside a null check and report nothing', () => {
      const s = param('s', nullable(Types.string));
      const length = prop(get(s), 'length');
      const inner = ret(length);
      const last = ret(lit(0));
      const result = analyzeFunction(unit('f', [s], [ifStmt(isNull(s, true), inner), last], Types.int), oracle);

      expect(result.diagnostics).toEqual([]);
      expect(show(promotedTypeAt(result, inner, s))).toBe('String');
      expect(show(promotedTypeAt(result, last, s))).toBe('String?');
      expect(show(typeOfRead(result, length))).toBe('int');
      expect(result.exitReachable).toBe(false);
      expect(result.exitTypes.map((type) => typeToString(type))).toEqual(['int', 'int']);
    });

    it('should report a body that can complete without returning', () => {
      const s = param('s', nullable(Types.string));
      const f = unit('stringLength', [s], [ifStmt(isNull(s, true), ret(prop(get(s), 'length')))], Types.int);
      const result = analyzeFunction(f, oracle);

      expect(result.exitReachable).toBe(true);
      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]?.kind).toBe('missing-return');
      expect(result.diagnostics[0]?.message).toBe("'stringLength' can complete without returning a value");
      expect(result.diagnostics[0]?.node).toBe(f);
    });

    it('should mark a guarded body unreachable without losing promotions', () => {
      const a = local('a', nullable(Types.int));
      const use = get(a);
      const body = stmt(use);
      const condition: Expression = {
        kind: 'logical',
        operator: '&&',
        left: { kind: 'booleanLiteral', value: false },
        right: isNull(a, true),
      };
      const result = analyzeFunction(unit('f', [], [declare(a, { kind: 'nullLiteral' }), ifStmt(condition, block(body))]), oracle);

      expect(result.diagnostics.map((d) => d.kind)).toEqual(['dead-code']);
      expect(result.diagnostics[0]?.node).toBe(body);
      expect(show(promotedTypeAt(result, use, a))).toBe('int');
      const before = modelAt(result, body);
      expect(before && isReachable(before)).toBe(false);
      expect(result.exitReachable).toBe(true);
    });

    it('should report dead code once per run of statements', () => {
      const first = stmt(lit(1));
      const second = stmt(lit(2));
      const result = analyzeFunction(unit('f', [], [ret(null), first, second]), oracle);

      expect(result.diagnostics.map((d) => d.kind)).toEqual(['dead-code']);
      expect(result.diagnostics[0]?.node).toBe(first);
    });

    it('should treat an expression of type Never as an exit', () => {
      const after = stmt(lit(1));
      const fail: Expression = { kind: 'call', name: 'fail', target: null, arguments: [], returnType: Types.never };
      const result = analyzeFunction(unit('f', [], [stmt(fail), after]), oracle);

      expect(result.exitReachable).toBe(false);
      expect(result.diagnostics.map((d) => d.node)).toEqual([after]);
    });

    it('should not report reads in dead code', () => {
      const s = local('s', Types.string);
      const result = analyzeFunction(
        unit('f', [], [declare(s), { kind: 'expressionStatement', expression: { kind: 'throw', operand: lit('x') } }, stmt(get(s))]),
        oracle
      );

      expect(result.diagnostics.map((d) => d.kind)).toEqual(['dead-code']);
    });
  });

  describe('definite assignment', () => {
    it('should report a read not assigned on every path', () => {
      const b = param('b', Types.bool);
      const s = local('s', Types.string);
      const last = ret(prop(get(s), 'length'));
      const f = unit('f', [b], [declare(s), ifStmt(get(b), block(stmt(set(s, lit('x'))))), last], Types.int);
      const result = analyzeFunction(f, oracle);

      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]?.kind).toBe('possibly-unassigned');
      expect(result.diagnostics[0]?.variable).toBe(s);
      expect(result.diagnostics[0]?.message).toBe("Variable 's' might not be assigned on every path to this read");
      expect(isDefinitelyAssignedAt(result, last, s)).toBe(false);
      expect(isDefinitelyUnassignedAt(result, last, s)).toBe(false);
    });

    it('should accept a variable assigned on both branches', () => {
      const b = param('b', Types.bool);
      const s = local('s', Types.string);
      const last = ret(prop(get(s), 'length'));
      const branches = ifStmt(get(b), block(stmt(set(s, lit('x')))), block(stmt(set(s, lit('y')))));
      const result = analyzeFunction(unit('f', [b], [declare(s), branches, last], Types.int), oracle);

      expect(result.diagnostics).toEqual([]);
      expect(isDefinitelyAssignedAt(result, last, s)).toBe(true);
    });

    it('should report a read before any assignment', () => {
      const s = local('s', Types.string);
      const read = stmt(get(s));
      const result = analyzeFunction(unit('f', [], [declare(s), read]), oracle);

      expect(result.diagnostics[0]?.message).toBe("Variable 's' is read before it is assigned");
      expect(isDefinitelyUnassignedAt(result, read, s)).toBe(true);
    });

    it('should let a nullable local without initializer hold null', () => {
      const s = local('s', nullable(Types.string));
      const inner = ret(prop(get(s), 'length'));
      const f = unit('f', [], [declare(s), ifStmt(isNull(s, true), inner), ret(lit(0))], Types.int);
      const result = analyzeFunction(f, oracle);

      expect(result.diagnostics).toEqual([]);
      expect(show(promotedTypeAt(result, inner, s))).toBe('String');
      expect(isDefinitelyUnassignedAt(result, inner, s)).toBe(true);
    });

    it('should report each unassigned variable once', () => {
      const s = local('s', Types.string);
      const first = get(s);
      const result = analyzeFunction(unit('f', [], [declare(s), stmt(first), stmt(get(s))]), oracle);

      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]?.node).toBe(first);
    });

    it('should skip unassigned reads when disabled', () => {
      const s = local('s', Types.string);
      const result = analyzeFunction(unit('f', [], [declare(s), stmt(get(s))]), oracle, {
        reportUnassignedReads: false,
      });

      expect(result.diagnostics).toEqual([]);
    });
  });

  describe('expression rules', () => {
    it('should promote past an || whose left side is a null test', () => {
      const x = param('x', nullable(Types.int));
      const b = param('b', Types.bool);
      const guard = ret(null);
      const use = get(x);
      const condition: Expression = { kind: 'logical', operator: '||', left: isNull(x), right: get(b) };
      const result = analyzeFunction(unit('f', [x, b], [ifStmt(condition, guard), stmt(use)]), oracle);

      expect(show(promotedTypeAt(result, guard, x))).toBe('int?');
      expect(show(promotedTypeAt(result, use, x))).toBe('int');
    });

    it('should type ?? from the non-null left side and the right side', () => {
      const x = param('x', nullable(Types.int));
      const result = analyzeFunction(
        unit('f', [x], [ret({ kind: 'ifNull', left: get(x), right: lit(0) })], Types.int),
        oracle
      );

      expect(result.exitTypes.map((type) => typeToString(type))).toEqual(['int']);
      expect(result.diagnostics).toEqual([]);
    });

    it('should keep the non-null left side of ?? when the right side never completes', () => {
      const x = param('x', nullable(Types.int));
      const fail: Expression = { kind: 'call', name: 'fail', target: null, arguments: [], returnType: Types.never };
      const use = get(x);
      const result = analyzeFunction(
        unit('f', [x], [stmt({ kind: 'ifNull', left: get(x), right: fail }), stmt(use)]),
        oracle
      );

      expect(show(promotedTypeAt(result, use, x))).toBe('int');
      expect(result.diagnostics).toEqual([]);
    });

    it('should join the branches of a conditional', () => {
      const x = param('x', nullable(Types.int));
      const b = param('b', Types.bool);
      const both = get(x);
      const one = get(x);
      const bothChecked: Expression = {
        kind: 'conditional',
        condition: get(b),
        then: isNull(x, true),
        otherwise: isNull(x, true),
      };
      const oneChecked: Expression = {
        kind: 'conditional',
        condition: get(b),
        then: isNull(x, true),
        otherwise: { kind: 'booleanLiteral', value: true },
      };
      const result = analyzeFunction(
        unit('f', [x, b], [ifStmt(bothChecked, stmt(both)), ifStmt(oneChecked, stmt(one))]),
        oracle
      );

      expect(show(promotedTypeAt(result, both, x))).toBe('int');
      expect(show(promotedTypeAt(result, one, x))).toBe('int?');
    });

    it('should leave a variable non-nullable after ??=', () => {
      const x = param('x', nullable(Types.int));
      const compound: Expression = { kind: 'ifNullSet', variable: x, value: lit(0) };
      const use = get(x);
      const result = analyzeFunction(unit('f', [x], [stmt(compound), stmt(use)]), oracle);

      expect(show(promotedTypeAt(result, use, x))).toBe('int');
      expect(show(typeOfRead(result, compound))).toBe('int');
    });

    it('should promote on assignment in the null branch of a test', () => {
      const x = param('x', nullable(Types.int));
      const use = get(x);
      const result = analyzeFunction(unit('f', [x], [ifStmt(isNull(x), stmt(set(x, lit(0)))), stmt(use)]), oracle);

      expect(show(promotedTypeAt(result, use, x))).toBe('int');
    });
  });

  describe('declarations', () => {
    it('should give an untyped variable its initializer type', () => {
      const v = local('v', null);
      const result = analyzeFunction(unit('f', [], [declare(v, lit(3))]), oracle);
      expect(show(result.declaredTypes.get(v))).toBe('int');
    });

    it('should widen an untyped null initializer to dynamic', () => {
      const v = local('v', null);
      const result = analyzeFunction(unit('f', [], [declare(v, { kind: 'nullLiteral' })]), oracle);
      expect(show(result.declaredTypes.get(v))).toBe('dynamic');
    });

    it('should remove block-scoped variables at the end of the block', () => {
      const v = local('v', Types.int);
      const inner = block(declare(v, lit(1)));
      const result = analyzeFunction(unit('f', [], [inner]), oracle);
      expect(modelAt(result, inner, 'after')?.variableInfo.has(v)).toBe(false);
    });
  });

  describe('loops', () => {
    it('should forget promotions of variables the loop assigns', () => {
      const x = param('x', nullable(Types.int));
      const b = param('b', Types.bool);
      const use = get(x);
      const loop: WhileStatement = {
        kind: 'while',
        condition: get(b),
        body: block(stmt(use), stmt(set(x, { kind: 'nullLiteral' }))),
      };
      const result = analyzeFunction(unit('f', [x, b], [ifStmt(isNull(x), ret(null)), loop]), oracle);

      expect(show(promotedTypeAt(result, loop, x))).toBe('int');
      expect(show(promotedTypeAt(result, use, x))).toBe('int?');
      expect(show(promotedTypeAt(result, loop, x, 'after'))).toBe('int?');
    });

    it('should keep promotions of variables the loop does not assign', () => {
      const x = param('x', nullable(Types.int));
      const b = param('b', Types.bool);
      const use = get(x);
      const loop: WhileStatement = { kind: 'while', condition: get(b), body: stmt(use) };
      const result = analyzeFunction(unit('f', [x, b], [ifStmt(isNull(x), ret(null)), loop]), oracle);

      expect(show(promotedTypeAt(result, use, x))).toBe('int');
    });

    it('should accumulate break models', () => {
      const x = param('x', nullable(Types.int));
      const b = param('b', Types.bool);
      const use = get(x);
      const loop: { -readonly [K in keyof WhileStatement]: WhileStatement[K] } = {
        kind: 'while',
        condition: get(b),
        body: block(),
      };
      loop.body = block(ifStmt(isNull(x), { kind: 'break', target: loop }), stmt(use));
      const result = analyzeFunction(unit('f', [x, b], [loop]), oracle);

      expect(show(promotedTypeAt(result, use, x))).toBe('int');
      const { breakModel, continueModel } = jumpModelsOf(result, loop);
      expect(breakModel?.reachable).toEqual([true, true]);
      expect(continueModel).toBeNull();
      expect(modelAt(result, loop, 'after')?.reachable).toEqual([true]);
    });

    it('should join every continue of a loop', () => {
      const x = param('x', nullable(Types.int));
      const b = param('b', Types.bool);
      const loop: { -readonly [K in keyof WhileStatement]: WhileStatement[K] } = {
        kind: 'while',
        condition: get(b),
        body: block(),
      };
      loop.body = block(ifStmt(isNull(x), { kind: 'continue', target: loop }), { kind: 'continue', target: loop });
      const result = analyzeFunction(unit('f', [x, b], [loop]), oracle);

      const { breakModel, continueModel } = jumpModelsOf(result, loop);
      expect(breakModel).toBeNull();
      expect(continueModel?.reachable).toEqual([true, true, true]);
      expect(show(continueModel ? promotedTypeOf(continueModel, x) : undefined)).toBe('int?');
      expect(result.diagnostics).toEqual([]);
    });

    it('should evaluate a do-while condition from the continue and body models', () => {
      const x = param('x', nullable(Types.int));
      const use = get(x);
      const conditionRead = get(x);
      const loop: { -readonly [K in keyof DoWhileStatement]: DoWhileStatement[K] } = {
        kind: 'doWhile',
        body: block(),
        condition: { kind: 'equality', left: conditionRead, right: { kind: 'nullLiteral' }, negated: true },
      };
      loop.body = block(ifStmt(isNull(x), { kind: 'continue', target: loop }), stmt(use));
      const result = analyzeFunction(unit('f', [x], [loop]), oracle);

      expect(show(promotedTypeAt(result, use, x))).toBe('int');
      expect(show(promotedTypeAt(result, conditionRead, x))).toBe('int?');
      const { continueModel } = jumpModelsOf(result, loop);
      expect(continueModel?.reachable).toEqual([true, true]);
      expect(modelAt(result, loop, 'after')?.reachable).toEqual([true]);
    });

    it('should reject a jump to a statement that does not enclose it', () => {
      const outside: WhileStatement = { kind: 'while', condition: { kind: 'booleanLiteral', value: true }, body: block() };
      expect(() => analyzeFunction(unit('f', [], [{ kind: 'break', target: outside }]), oracle)).toThrow(
        'Jump to a while statement that does not enclose it'
      );
    });
  });

  describe('closures', () => {
    it('should write-capture variables a closure assigns', () => {
      const x = param('x', nullable(Types.int));
      const closure: FunctionExpression = {
        kind: 'function',
        function: unit('f.<closure>', [], [stmt(set(x, { kind: 'nullLiteral' }))]),
      };
      const closureStatement = stmt(closure);
      const insideRead = get(x);
      const inside = stmt(insideRead);
      const after = stmt(get(x));
      const f = unit('f', [x], [ifStmt(isNull(x, true), block(closureStatement, inside)), after]);
      const result = analyzeFunction(f, oracle);

      expect(show(promotedTypeAt(result, closureStatement, x))).toBe('int');
      expect(isWriteCapturedAt(result, closureStatement, x)).toBe(false);
      expect(isWriteCapturedAt(result, inside, x)).toBe(true);
      expect(show(promotedTypeAt(result, insideRead, x))).toBe('int?');
      expect(isWriteCapturedAt(result, after, x)).toBe(true);
      expect(result.functions.has(closure.function)).toBe(true);
    });

    it('should not promote a write-captured variable', () => {
      const x = param('x', nullable(Types.int));
      const closure: FunctionExpression = {
        kind: 'function',
        function: unit('f.<closure>', [], [stmt(set(x, lit(1)))]),
      };
      const use = get(x);
      const result = analyzeFunction(unit('f', [x], [stmt(closure), ifStmt(isNull(x, true), stmt(use))]), oracle);

      expect(show(promotedTypeAt(result, use, x))).toBe('int?');
    });
  });

  describe('missing return', () => {
    it('should accept bodies whose return type admits null', () => {
      const result = analyzeFunction(unit('f', [], [], nullable(Types.int)), oracle);
      expect(result.diagnostics).toEqual([]);
    });

    it('should check the awaited type of async bodies', () => {
      const bad = analyzeFunction(unit('f', [], [], Types.future(Types.int), { isAsync: true }), oracle);
      const ok = analyzeFunction(unit('g', [], [], Types.future(nullable(Types.int)), { isAsync: true }), oracle);
      expect(bad.diagnostics.map((d) => d.kind)).toEqual(['missing-return']);
      expect(ok.diagnostics).toEqual([]);
    });

    it('should skip generators', () => {
      const gen = unit('gen', [], [{ kind: 'yield', value: lit(1) }], Types.interfaceType('Iterable', [Types.int]), {
        isGenerator: true,
      });
      const result = analyzeFunction(gen, oracle);
      expect(result.diagnostics).toEqual([]);
      expect(result.exitTypes.map((type) => typeToString(type))).toEqual(['int']);
    });

    it('should wrap expression bodies in a return', () => {
      const n = param('n', Types.int);
      const body: Expression = { kind: 'call', name: '+', target: get(n), arguments: [lit(1)] };
      const arrow: FunctionUnit = { name: 'inc', parameters: [n], body, returnType: Types.int, isAsync: false, isGenerator: false };
      const result = analyzeFunction(arrow, oracle);

      expect(result.exitReachable).toBe(false);
      expect(result.exitTypes.map((type) => typeToString(type))).toEqual(['int']);
      expect(result.diagnostics).toEqual([]);
    });

    it('should decide which return types admit an implicit null', () => {
      expect(admitsImplicitNull(Types.voidType, false, oracle)).toBe(true);
      expect(admitsImplicitNull(Types.dynamic, false, oracle)).toBe(true);
      expect(admitsImplicitNull(nullable(Types.int), false, oracle)).toBe(true);
      expect(admitsImplicitNull(Types.int, false, oracle)).toBe(false);
      expect(admitsImplicitNull(Types.future(nullable(Types.int)), false, oracle)).toBe(false);
      expect(admitsImplicitNull(Types.futureOr(Types.voidType), true, oracle)).toBe(true);
    });
  });

  describe('queries', () => {
    it('should give statements only before and after models', () => {
      const last = ret(lit(0));
      const result = analyzeFunction(unit('f', [], [last]), oracle);
      expect(modelAt(result, last, 'ifTrue')).toBe(modelAt(result, last, 'after'));
      expect(modelAt(result, last, 'before')?.reachable).toEqual([true]);
    });

    it('should return undefined for nodes the run never reached', () => {
      const result = analyzeFunction(unit('f', [], []), oracle);
      expect(modelAt(result, ret(null))).toBeUndefined();
      expect(promotedTypeAt(result, ret(null), param('p', Types.int))).toBeUndefined();
    });
  });

  describe('determinism', () => {
    it('should produce equal results for repeated runs', () => {
      const b = param('b', Types.bool);
      const s = local('s', Types.string);
      const f = unit('f', [b], [declare(s), ifStmt(get(b), block(stmt(set(s, lit('x'))))), ret(prop(get(s), 'length'))], Types.int);

      const first = analyzeFunction(f, oracle);
      const second = analyzeFunction(f, oracle);

      expect(flowModelsEqual(first.exit, second.exit)).toBe(true);
      for (const [node, flow] of first.statements) {
        const other = second.statements.get(node);
        expect(other && flowModelsEqual(flow.after, other.after)).toBe(true);
      }
      expect(second.diagnostics.map((d) => d.message)).toEqual(first.diagnostics.map((d) => d.message));
    });
  });
});
