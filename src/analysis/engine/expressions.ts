/**
 * Expression Analysis - before/after/true/false/null/notNull per node
 *
 * Each rule receives before(N) and returns the full ExpressionFlow. The
 * result and the node's static type are memoized in the context.
 */

import type {
  Expression,
  Type,
  Variable,
  VariableGet,
  LogicalExpression,
  IfNullExpression,
  ConditionalExpression,
  IsExpression,
  EqualityExpression,
  CallExpression,
  IfNullSet,
} from '../../types/index.js';
import { Types, flatten, nonNullable } from '../../types/index.js';
import type { FlowModel } from '../model/flow-model.js';
import { isReachable } from '../model/flow-model.js';
import {
  assign,
  exit,
  join,
  merge,
  promotedTypeOf,
  split,
  drop,
  updateVariable,
} from '../model/lattice.js';
import {
  promoteByTypeTest,
  promoteByTypeTestFailure,
  promoteToNonNull,
  recordNullTest,
} from '../model/promotion.js';
import type { AnalysisContext, ExpressionFlow } from './context.js';
import { report } from './context.js';
import { approximateUpperBound, callReturnType, functionUnitType, propertyType } from './typing.js';
import { analyzeClosure } from './functions.js';

interface Analyzed {
  readonly flow: ExpressionFlow;
  readonly type: Type;
}

/**
 * Analyze an expression starting from `before`
 */
export function analyzeExpression(node: Expression, before: FlowModel, ctx: AnalysisContext): ExpressionFlow {
  const { type, ...analyzed } = analyzeExpressionInternal(node, before, ctx);
  let flow = analyzed.flow;

  // An expression of type Never does not complete
  if (type.kind === 'never') {
    flow = mapVariants(flow, exit);
  }

  ctx.expressions.set(node, flow);
  ctx.staticTypes.set(node, type);
  return flow;
}

/**
 * Static type of an already analyzed expression
 */
export function staticTypeOf(node: Expression, ctx: AnalysisContext): Type {
  return ctx.staticTypes.get(node) ?? Types.dynamic;
}

function analyzeExpressionInternal(node: Expression, before: FlowModel, ctx: AnalysisContext): Analyzed {
  switch (node.kind) {
    case 'booleanLiteral':
      return {
        flow: node.value
          ? fromCondition(before, before, exit(before))
          : fromCondition(before, exit(before), before),
        type: Types.bool,
      };

    case 'nullLiteral':
      return {
        flow: { ...plain(before, before), ifNotNull: exit(before) },
        type: Types.nullType,
      };

    case 'literal':
      return {
        flow: { ...plain(before, before), ifNull: exit(before) },
        type: node.type,
      };

    case 'variableGet':
      return analyzeVariableGet(node, before, ctx);

    case 'variableSet': {
      const value = analyzeExpression(node.value, before, ctx);
      const type = staticTypeOf(node.value, ctx);
      return {
        flow: mapVariants(value, (model) => assign(model, node.variable, type, ctx.oracle), before),
        type,
      };
    }

    case 'ifNullSet':
      return analyzeIfNullSet(node, before, ctx);

    case 'logical':
      return analyzeLogical(node, before, ctx);

    case 'ifNull':
      return analyzeIfNull(node, before, ctx);

    case 'conditional':
      return analyzeConditional(node, before, ctx);

    case 'not': {
      const operand = analyzeExpression(node.operand, before, ctx);
      return {
        flow: fromCondition(before, operand.ifFalse, operand.ifTrue),
        type: Types.bool,
      };
    }

    case 'is':
      return analyzeIs(node, before, ctx);

    case 'cast': {
      const operand = analyzeExpression(node.operand, before, ctx);
      const variable = promotableVariable(node.operand);
      const after = variable
        ? updateVariable(operand.after, variable, (info) => promoteByTypeTest(info, node.type, ctx.oracle))
        : operand.after;
      return { flow: plain(before, after), type: node.type };
    }

    case 'nullCheck': {
      const operand = analyzeExpression(node.operand, before, ctx);
      const after = operand.ifNotNull;
      return {
        flow: { ...plain(before, after), ifNull: exit(after) },
        type: nonNullable(staticTypeOf(node.operand, ctx)),
      };
    }

    case 'equality':
      return analyzeEquality(node, before, ctx);

    case 'call':
      return analyzeCall(node, before, ctx);

    case 'propertyGet': {
      const target = analyzeExpression(node.target, before, ctx);
      return {
        flow: plain(before, target.after),
        type: propertyType(node, staticTypeOf(node.target, ctx), ctx.oracle),
      };
    }

    case 'await': {
      const operand = analyzeExpression(node.operand, before, ctx);
      return {
        flow: plain(before, operand.after),
        type: flatten(staticTypeOf(node.operand, ctx)),
      };
    }

    case 'throw': {
      const operand = analyzeExpression(node.operand, before, ctx);
      return { flow: plain(before, exit(operand.after)), type: Types.never };
    }

    case 'function': {
      const after = analyzeClosure(node, node.function, before, ctx);
      return {
        flow: { ...plain(before, after), ifNull: exit(after) },
        type: functionUnitType(node.function),
      };
    }
  }
}

// ============================================================================
// Variables
// ============================================================================

function analyzeVariableGet(node: VariableGet, before: FlowModel, ctx: AnalysisContext): Analyzed {
  const variable = node.variable;
  checkDefinitelyAssigned(node, variable, before, ctx);

  const ifNull = updateVariable(before, variable, recordNullTest);
  const ifNotNull = updateVariable(before, variable, (info) => promoteToNonNull(info, ctx.oracle));
  return {
    flow: { ...plain(before, before), ifNull, ifNotNull },
    type: readType(variable, before, ctx),
  };
}

function analyzeIfNullSet(node: IfNullSet, before: FlowModel, ctx: AnalysisContext): Analyzed {
  const variable = node.variable;
  checkDefinitelyAssigned(node, variable, before, ctx);
  const readAs = readType(variable, before, ctx);

  const value = analyzeExpression(node.value, split(updateVariable(before, variable, recordNullTest)), ctx);
  const valueType = staticTypeOf(node.value, ctx);
  const assigned = assign(value.after, variable, valueType, ctx.oracle);
  const skipped = split(updateVariable(before, variable, (info) => promoteToNonNull(info, ctx.oracle)));

  return {
    flow: plain(before, merge(skipped, assigned)),
    type: approximateUpperBound(nonNullable(readAs), valueType, ctx.oracle),
  };
}

function readType(variable: Variable, model: FlowModel, ctx: AnalysisContext): Type {
  return (
    promotedTypeOf(model, variable) ??
    ctx.declaredTypes.get(variable) ??
    variable.declaredType ??
    Types.dynamic
  );
}

function checkDefinitelyAssigned(
  node: Expression,
  variable: Variable,
  model: FlowModel,
  ctx: AnalysisContext
): void {
  if (!ctx.options.reportUnassignedReads) return;
  // Dead code never produces findings
  if (!isReachable(model)) return;

  const info = model.variableInfo.get(variable);
  if (!info || info.assigned) return;
  // A variable whose type admits null starts out holding null
  if (ctx.oracle.isSubtype(Types.nullType, info.declaredType)) return;
  // One finding per variable
  if (ctx.unassignedReads.has(variable)) return;
  ctx.unassignedReads.add(variable);

  report(ctx, {
    kind: 'possibly-unassigned',
    severity: 'error',
    message: info.unassigned
      ? `Variable '${variable.name}' is read before it is assigned`
      : `Variable '${variable.name}' might not be assigned on every path to this read`,
    node,
    variable,
  });
}

/**
 * The variable a promotion applies to, when the expression is a plain read
 */
function promotableVariable(node: Expression): Variable | undefined {
  return node.kind === 'variableGet' ? node.variable : undefined;
}

// ============================================================================
// Short-circuit and branching forms
// ============================================================================

function analyzeLogical(node: LogicalExpression, before: FlowModel, ctx: AnalysisContext): Analyzed {
  const left = analyzeExpression(node.left, before, ctx);

  if (node.operator === '&&') {
    const right = analyzeExpression(node.right, split(left.ifTrue), ctx);
    return {
      flow: fromCondition(before, drop(right.ifTrue), merge(split(left.ifFalse), right.ifFalse)),
      type: Types.bool,
    };
  }

  const right = analyzeExpression(node.right, split(left.ifFalse), ctx);
  return {
    flow: fromCondition(before, merge(split(left.ifTrue), right.ifTrue), drop(right.ifFalse)),
    type: Types.bool,
  };
}

function analyzeIfNull(node: IfNullExpression, before: FlowModel, ctx: AnalysisContext): Analyzed {
  const left = analyzeExpression(node.left, before, ctx);
  const right = analyzeExpression(node.right, split(left.ifNull), ctx);
  const leftNotNull = split(left.ifNotNull);

  const after = merge(leftNotNull, right.after);
  return {
    flow: {
      before,
      after,
      ifTrue: merge(leftNotNull, right.ifTrue),
      ifFalse: merge(leftNotNull, right.ifFalse),
      ifNull: drop(right.ifNull),
      ifNotNull: merge(leftNotNull, right.ifNotNull),
    },
    type: approximateUpperBound(
      nonNullable(staticTypeOf(node.left, ctx)),
      staticTypeOf(node.right, ctx),
      ctx.oracle
    ),
  };
}

function analyzeConditional(node: ConditionalExpression, before: FlowModel, ctx: AnalysisContext): Analyzed {
  const condition = analyzeExpression(node.condition, before, ctx);
  const then = analyzeExpression(node.then, split(condition.ifTrue), ctx);
  const otherwise = analyzeExpression(node.otherwise, split(condition.ifFalse), ctx);

  return {
    flow: {
      before,
      after: merge(then.after, otherwise.after),
      ifTrue: merge(then.ifTrue, otherwise.ifTrue),
      ifFalse: merge(then.ifFalse, otherwise.ifFalse),
      ifNull: merge(then.ifNull, otherwise.ifNull),
      ifNotNull: merge(then.ifNotNull, otherwise.ifNotNull),
    },
    type: approximateUpperBound(staticTypeOf(node.then, ctx), staticTypeOf(node.otherwise, ctx), ctx.oracle),
  };
}

// ============================================================================
// Tests
// ============================================================================

function analyzeIs(node: IsExpression, before: FlowModel, ctx: AnalysisContext): Analyzed {
  const operand = analyzeExpression(node.operand, before, ctx);
  const variable = promotableVariable(node.operand);

  let whenIs = operand.after;
  let whenIsNot = operand.after;
  if (variable) {
    whenIs = updateVariable(operand.after, variable, (info) => promoteByTypeTest(info, node.type, ctx.oracle));
    whenIsNot = updateVariable(operand.after, variable, (info) =>
      promoteByTypeTestFailure(info, node.type, ctx.oracle)
    );
  }

  return {
    flow: node.negated
      ? fromCondition(before, whenIsNot, whenIs)
      : fromCondition(before, whenIs, whenIsNot),
    type: Types.bool,
  };
}

function analyzeEquality(node: EqualityExpression, before: FlowModel, ctx: AnalysisContext): Analyzed {
  const left = analyzeExpression(node.left, before, ctx);
  const right = analyzeExpression(node.right, left.after, ctx);

  let whenEqual = right.after;
  let whenNotEqual = right.after;
  if (node.right.kind === 'nullLiteral') {
    whenEqual = left.ifNull;
    whenNotEqual = left.ifNotNull;
  } else if (node.left.kind === 'nullLiteral') {
    whenEqual = right.ifNull;
    whenNotEqual = right.ifNotNull;
  }

  return {
    flow: node.negated
      ? fromCondition(before, whenNotEqual, whenEqual)
      : fromCondition(before, whenEqual, whenNotEqual),
    type: Types.bool,
  };
}

// ============================================================================
// Calls
// ============================================================================

function analyzeCall(node: CallExpression, before: FlowModel, ctx: AnalysisContext): Analyzed {
  let current = before;
  let targetType: Type | undefined;
  if (node.target) {
    current = analyzeExpression(node.target, current, ctx).after;
    targetType = staticTypeOf(node.target, ctx);
  }
  for (const argument of node.arguments) {
    current = analyzeExpression(argument, current, ctx).after;
  }
  return {
    flow: plain(before, current),
    type: callReturnType(node, targetType, ctx.oracle),
  };
}

// ============================================================================
// Derivations
// ============================================================================

/**
 * A rule that only defines `after`: every conditioned state is `after`
 */
function plain(before: FlowModel, after: FlowModel): ExpressionFlow {
  return { before, after, ifTrue: after, ifFalse: after, ifNull: after, ifNotNull: after };
}

/**
 * A rule that only defines `true`/`false`: a boolean is never null
 */
function fromCondition(before: FlowModel, ifTrue: FlowModel, ifFalse: FlowModel): ExpressionFlow {
  const ifNotNull = join(ifTrue, ifFalse);
  return { before, after: ifNotNull, ifTrue, ifFalse, ifNull: exit(ifNotNull), ifNotNull };
}

/**
 * Apply `fn` to every published state except `before`
 */
function mapVariants(
  flow: ExpressionFlow,
  fn: (model: FlowModel) => FlowModel,
  before: FlowModel = flow.before
): ExpressionFlow {
  return {
    before,
    after: fn(flow.after),
    ifTrue: fn(flow.ifTrue),
    ifFalse: fn(flow.ifFalse),
    ifNull: fn(flow.ifNull),
    ifNotNull: fn(flow.ifNotNull),
  };
}
