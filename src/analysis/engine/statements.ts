/**
 * Statement Analysis - before/after per statement, break/continue models
 *
 * A statement's before and after models have the same stack depth. Every
 * construct that branches opens a split for its region and closes it on
 * the way out; `break` and `continue` unsplit to the depth their target
 * recorded before joining into its accumulated model.
 */

import type {
  Block,
  DoWhileStatement,
  FlowNode,
  ForEachStatement,
  ForStatement,
  IfStatement,
  LabeledStatement,
  Statement,
  SwitchStatement,
  TryStatement,
  Type,
  Variable,
  VariableDeclaration,
  WhileStatement,
} from '../../types/index.js';
import { Types } from '../../types/index.js';
import type { FlowModel } from '../model/flow-model.js';
import { isReachable } from '../model/flow-model.js';
import {
  assign,
  conservativeJoin,
  declareVariable,
  drop,
  exit,
  join,
  joinOptional,
  merge,
  removeVariables,
  restrict,
  split,
  unsplitTo,
} from '../model/lattice.js';
import type { AnalysisContext, JumpTarget, StatementFlow } from './context.js';
import { currentFrame, report } from './context.js';
import { analyzeExpression, staticTypeOf } from './expressions.js';
import { analyzeClosure } from './functions.js';
import { functionUnitType, iterableElementType } from './typing.js';

/**
 * Analyze a statement starting from `before`
 */
export function analyzeStatement(node: Statement, before: FlowModel, ctx: AnalysisContext): StatementFlow {
  // Blocks and labels are transparent to dead-code reporting
  if (node.kind === 'block' || node.kind === 'labeled') {
    const flow = analyzeStatementInternal(node, before, ctx);
    ctx.statements.set(node, flow);
    return flow;
  }

  const live = isReachable(before);
  if (!live && ctx.parentLive && ctx.options.reportDeadCode) {
    report(ctx, {
      kind: 'dead-code',
      severity: 'info',
      message: 'Dead code',
      node,
    });
  }

  ctx.parentLive = live;
  const flow = analyzeStatementInternal(node, before, ctx);
  ctx.parentLive = live;

  ctx.statements.set(node, flow);
  return flow;
}

function analyzeStatementInternal(node: Statement, before: FlowModel, ctx: AnalysisContext): StatementFlow {
  switch (node.kind) {
    case 'block':
      return { before, after: analyzeBlock(node, before, ctx) };

    case 'expressionStatement':
      return { before, after: analyzeExpression(node.expression, before, ctx).after };

    case 'declaration':
      return { before, after: analyzeDeclaration(node, before, ctx) };

    case 'localFunction': {
      const declaredType = functionUnitType(node.function);
      ctx.declaredTypes.set(node.variable, declaredType);
      const declared = declareVariable(before, node.variable, declaredType, true);
      return { before, after: analyzeClosure(node, node.function, declared, ctx) };
    }

    case 'if':
      return analyzeIf(node, before, ctx);

    case 'while':
      return analyzeWhile(node, before, ctx);

    case 'doWhile':
      return analyzeDoWhile(node, before, ctx);

    case 'for':
      return analyzeFor(node, before, ctx);

    case 'forEach':
      return analyzeForEach(node, before, ctx);

    case 'switch':
      return analyzeSwitch(node, before, ctx);

    case 'try':
      return analyzeTry(node, before, ctx);

    case 'labeled':
      return analyzeLabeled(node, before, ctx);

    case 'return': {
      const frame = currentFrame(ctx);
      if (!node.value) {
        frame.exitTypes.push(Types.nullType);
        return { before, after: exit(before) };
      }
      const value = analyzeExpression(node.value, before, ctx);
      frame.exitTypes.push(staticTypeOf(node.value, ctx));
      return { before, after: exit(value.after) };
    }

    case 'yield': {
      const value = analyzeExpression(node.value, before, ctx);
      currentFrame(ctx).exitTypes.push(staticTypeOf(node.value, ctx));
      return { before, after: value.after };
    }

    case 'break': {
      const target = jumpTarget(node.target, ctx);
      target.breakModel = joinOptional(target.breakModel, unsplitTo(before, target.depth));
      return { before, after: exit(before) };
    }

    case 'continue': {
      const target = jumpTarget(node.target, ctx);
      target.continueModel = joinOptional(target.continueModel, unsplitTo(before, target.continueDepth));
      return { before, after: exit(before) };
    }
  }
}

// ============================================================================
// Sequences and declarations
// ============================================================================

function analyzeBlock(node: Block, before: FlowModel, ctx: AnalysisContext): FlowModel {
  const after = analyzeSequence(node.statements, before, ctx);
  return removeVariables(after, declaredIn(node.statements));
}

function analyzeSequence(statements: readonly Statement[], before: FlowModel, ctx: AnalysisContext): FlowModel {
  let current = before;
  for (const statement of statements) {
    current = analyzeStatement(statement, current, ctx).after;
  }
  return current;
}

/**
 * Variables a statement list brings into scope
 */
function declaredIn(statements: readonly Statement[]): Variable[] {
  const variables: Variable[] = [];
  for (const statement of statements) {
    if (statement.kind === 'declaration' || statement.kind === 'localFunction') {
      variables.push(statement.variable);
    }
  }
  return variables;
}

function analyzeDeclaration(node: VariableDeclaration, before: FlowModel, ctx: AnalysisContext): FlowModel {
  const variable = node.variable;

  if (!node.initializer) {
    const declaredType = variable.declaredType ?? Types.dynamic;
    ctx.declaredTypes.set(variable, declaredType);
    return declareVariable(before, variable, declaredType, false);
  }

  const value = analyzeExpression(node.initializer, before, ctx);
  const valueType = staticTypeOf(node.initializer, ctx);

  if (variable.declaredType) {
    ctx.declaredTypes.set(variable, variable.declaredType);
    const declared = declareVariable(value.after, variable, variable.declaredType, false);
    return assign(declared, variable, valueType, ctx.oracle);
  }

  // An untyped variable takes its initializer's type
  const declaredType = inferredDeclarationType(valueType);
  ctx.declaredTypes.set(variable, declaredType);
  return declareVariable(value.after, variable, declaredType, true);
}

function inferredDeclarationType(valueType: Type): Type {
  switch (valueType.kind) {
    case 'null':
    case 'never':
    case 'void':
      return Types.dynamic;
    default:
      return valueType;
  }
}

// ============================================================================
// Branches
// ============================================================================

function analyzeIf(node: IfStatement, before: FlowModel, ctx: AnalysisContext): StatementFlow {
  const condition = analyzeExpression(node.condition, before, ctx);
  const thenAfter = analyzeStatement(node.then, split(condition.ifTrue), ctx).after;
  const elseAfter = node.otherwise
    ? analyzeStatement(node.otherwise, split(condition.ifFalse), ctx).after
    : split(condition.ifFalse);
  return { before, after: merge(thenAfter, elseAfter) };
}

/**
 * Cases share one split. A case is entered by matching its labels or by
 * falling through from the previous case.
 */
function analyzeSwitch(node: SwitchStatement, before: FlowModel, ctx: AnalysisContext): StatementFlow {
  const discriminant = analyzeExpression(node.discriminant, before, ctx);
  let matching = split(discriminant.after);
  const target = enterTarget(node, matching.reachable.length, matching.reachable.length, ctx);

  let fallthrough: FlowModel | null = null;
  let hasDefault = false;
  const declared: Variable[] = [];
  for (const switchCase of node.cases) {
    for (const label of switchCase.labels) {
      matching = analyzeExpression(label, matching, ctx).after;
    }
    if (switchCase.isDefault) hasDefault = true;

    const caseBefore = joinOptional(fallthrough, matching);
    fallthrough = analyzeSequence(switchCase.body, caseBefore, ctx);
    declared.push(...declaredIn(switchCase.body));
  }

  let end = fallthrough ?? exit(matching);
  if (!hasDefault && !node.exhaustive) {
    end = join(end, matching);
  }
  if (target.breakModel) {
    end = join(end, target.breakModel);
  }
  leaveTarget(node, ctx);

  return {
    before,
    after: removeVariables(drop(end), declared),
    breakModel: target.breakModel,
  };
}

function analyzeTry(node: TryStatement, before: FlowModel, ctx: AnalysisContext): StatementFlow {
  const { assigned } = ctx;
  const bodyAfter = analyzeStatement(node.body, split(before), ctx).after;

  // A handler can be entered from any point in the body
  const handlerEntry = split(conservativeJoin(before, assigned.assignedIn(node.body), assigned.capturedIn(node.body)));

  let joined = bodyAfter;
  for (const clause of node.catches) {
    let clauseBefore = handlerEntry;
    if (clause.exception) {
      const exceptionType = clause.exception.declaredType ?? Types.dynamic;
      ctx.declaredTypes.set(clause.exception, exceptionType);
      clauseBefore = declareVariable(clauseBefore, clause.exception, exceptionType, true);
    }
    let clauseAfter = analyzeStatement(clause.body, clauseBefore, ctx).after;
    if (clause.exception) clauseAfter = removeVariables(clauseAfter, [clause.exception]);
    joined = join(joined, clauseAfter);
  }
  const afterTryCatch = drop(joined);

  if (!node.finallyBody) {
    return { before, after: afterTryCatch };
  }

  // Finally runs after any prefix of the body or a handler
  const protectedNodes = [node.body, ...node.catches.map((clause) => clause.body)];
  const finallyEntry = split(
    conservativeJoin(before, assigned.assignedInAll(protectedNodes), assigned.capturedInAll(protectedNodes))
  );
  const finallyAfter = drop(analyzeStatement(node.finallyBody, finallyEntry, ctx).after);

  return {
    before,
    after: restrict(afterTryCatch, finallyAfter, assigned.assignedIn(node.finallyBody), ctx.oracle),
  };
}

function analyzeLabeled(node: LabeledStatement, before: FlowModel, ctx: AnalysisContext): StatementFlow {
  // Labeled loops are their own break/continue targets
  if (isLoop(node.body)) {
    const body = analyzeStatement(node.body, before, ctx);
    return { before, after: body.after };
  }

  const entry = split(before);
  const target = enterTarget(node, entry.reachable.length, entry.reachable.length, ctx);
  const bodyAfter = analyzeStatement(node.body, entry, ctx).after;
  leaveTarget(node, ctx);

  return {
    before,
    after: drop(joinOptional(target.breakModel, bodyAfter)),
    breakModel: target.breakModel,
  };
}

// ============================================================================
// Loops
// ============================================================================

/**
 * Loop heads are entered once, from a state that already forgets what
 * the loop could change on a later iteration
 */
function loopHead(before: FlowModel, region: FlowNode, ctx: AnalysisContext): FlowModel {
  return split(conservativeJoin(before, ctx.assigned.assignedIn(region), ctx.assigned.capturedIn(region)));
}

function analyzeWhile(node: WhileStatement, before: FlowModel, ctx: AnalysisContext): StatementFlow {
  const head = loopHead(before, node, ctx);
  const depth = head.reachable.length;
  const target = enterTarget(node, depth, depth + 1, ctx);

  const condition = analyzeExpression(node.condition, head, ctx);
  analyzeStatement(node.body, split(condition.ifTrue), ctx);
  leaveTarget(node, ctx);

  return loopFlow(before, condition.ifFalse, target);
}

function analyzeDoWhile(node: DoWhileStatement, before: FlowModel, ctx: AnalysisContext): StatementFlow {
  const head = loopHead(before, node, ctx);
  const depth = head.reachable.length;
  const target = enterTarget(node, depth, depth, ctx);

  const bodyAfter = analyzeStatement(node.body, head, ctx).after;
  const condition = analyzeExpression(node.condition, joinOptional(target.continueModel, bodyAfter), ctx);
  leaveTarget(node, ctx);

  return loopFlow(before, condition.ifFalse, target);
}

function analyzeFor(node: ForStatement, before: FlowModel, ctx: AnalysisContext): StatementFlow {
  const initialized = node.initializer ? analyzeStatement(node.initializer, before, ctx).after : before;

  const { assigned } = ctx;
  const loopNodes = [...(node.condition ? [node.condition] : []), node.body, ...node.updaters];
  const head = split(conservativeJoin(initialized, assigned.assignedInAll(loopNodes), assigned.capturedInAll(loopNodes)));
  const depth = head.reachable.length;
  const target = enterTarget(node, depth, depth + 1, ctx);

  let whenTrue = head;
  let whenFalse = exit(head);
  if (node.condition) {
    const condition = analyzeExpression(node.condition, head, ctx);
    whenTrue = condition.ifTrue;
    whenFalse = condition.ifFalse;
  }

  const bodyAfter = analyzeStatement(node.body, split(whenTrue), ctx).after;
  let current = joinOptional(target.continueModel, bodyAfter);
  for (const updater of node.updaters) {
    current = analyzeExpression(updater, current, ctx).after;
  }
  leaveTarget(node, ctx);

  const flow = loopFlow(before, whenFalse, target);
  const loopVariables =
    node.initializer?.kind === 'declaration' ? [node.initializer.variable] : [];
  return { ...flow, after: removeVariables(flow.after, loopVariables) };
}

function analyzeForEach(node: ForEachStatement, before: FlowModel, ctx: AnalysisContext): StatementFlow {
  const iterable = analyzeExpression(node.iterable, before, ctx);
  const head = loopHead(iterable.after, node.body, ctx);
  const depth = head.reachable.length;
  const target = enterTarget(node, depth, depth + 1, ctx);

  const variable = node.variable;
  const elementType = variable.declaredType ?? iterableElementType(staticTypeOf(node.iterable, ctx), ctx.oracle);
  ctx.declaredTypes.set(variable, elementType);
  const bodyBefore = declareVariable(split(head), variable, elementType, true);
  analyzeStatement(node.body, bodyBefore, ctx);
  leaveTarget(node, ctx);

  // Zero iterations leave the head state
  const flow = loopFlow(before, head, target);
  return { ...flow, after: removeVariables(flow.after, [variable]) };
}

function loopFlow(before: FlowModel, exitModel: FlowModel, target: JumpTarget): StatementFlow {
  return {
    before,
    after: drop(joinOptional(target.breakModel, exitModel)),
    breakModel: target.breakModel,
    continueModel: target.continueModel,
  };
}

function isLoop(node: Statement): boolean {
  switch (node.kind) {
    case 'while':
    case 'doWhile':
    case 'for':
    case 'forEach':
      return true;
    default:
      return false;
  }
}

// ============================================================================
// Jump targets
// ============================================================================

function enterTarget(node: Statement, depth: number, continueDepth: number, ctx: AnalysisContext): JumpTarget {
  const target: JumpTarget = { depth, continueDepth, breakModel: null, continueModel: null };
  ctx.targets.set(node, target);
  return target;
}

function leaveTarget(node: Statement, ctx: AnalysisContext): void {
  ctx.targets.delete(node);
}

function jumpTarget(node: Statement, ctx: AnalysisContext): JumpTarget {
  const target = ctx.targets.get(node);
  if (!target) {
    throw new Error(`Jump to a ${node.kind} statement that does not enclose it`);
  }
  return target;
}
