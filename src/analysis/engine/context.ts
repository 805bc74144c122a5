/**
 * Analysis Context - per-run state for the flow analysis traversal
 *
 * One context is created per analyzed function body and discarded with
 * it. The result maps it owns are the memo tables for that run; nothing
 * here is shared between runs.
 */

import type {
  Expression,
  FlowNode,
  FunctionUnit,
  ReturnStatement,
  Statement,
  Type,
  TypeOracle,
  Variable,
} from '../../types/index.js';
import type { FlowModel } from '../model/flow-model.js';
import type { AssignedVariables } from './assigned.js';

/**
 * Models published for an expression
 */
export interface ExpressionFlow {
  readonly before: FlowModel;
  readonly after: FlowModel;
  /** State if the expression evaluated to `true` */
  readonly ifTrue: FlowModel;
  /** State if the expression evaluated to `false` */
  readonly ifFalse: FlowModel;
  /** State if the expression evaluated to `null` */
  readonly ifNull: FlowModel;
  /** State if the expression evaluated to a non-null value */
  readonly ifNotNull: FlowModel;
}

/**
 * Models published for a statement
 */
export interface StatementFlow {
  readonly before: FlowModel;
  readonly after: FlowModel;
  /** Join of the states at every `break` leaving this statement */
  readonly breakModel?: FlowModel | null;
  /** Join of the states at every `continue` of this loop */
  readonly continueModel?: FlowModel | null;
}

/**
 * End-of-body facts for a function or closure
 */
export interface FunctionExit {
  /** State where control falls off the end of the body */
  readonly end: FlowModel;
  readonly exitReachable: boolean;
  /** Types contributed by `return`/`yield` */
  readonly exitTypes: readonly Type[];
}

export type DiagnosticKind = 'possibly-unassigned' | 'missing-return' | 'dead-code';

/**
 * A finding. Analysis continues after every one of them.
 */
export interface FlowDiagnostic {
  readonly kind: DiagnosticKind;
  readonly severity: 'error' | 'info';
  readonly message: string;
  readonly node: FlowNode | FunctionUnit;
  readonly variable?: Variable;
}

/**
 * Analysis options
 */
export interface AnalysisOptions {
  /** Report the first statement of each run of unreachable code */
  reportDeadCode?: boolean;
  /** Report reads of variables that are not definitely assigned */
  reportUnassignedReads?: boolean;
  /** Report bodies that can complete normally without returning a value */
  reportMissingReturn?: boolean;
}

export const DEFAULT_ANALYSIS_OPTIONS: Required<AnalysisOptions> = {
  reportDeadCode: true,
  reportUnassignedReads: true,
  reportMissingReturn: true,
};

/**
 * A statement `break` or `continue` can target
 */
export interface JumpTarget {
  /** Stack depth of the statement's before/after models */
  readonly depth: number;
  /** Stack depth a `continue` lands at */
  readonly continueDepth: number;
  breakModel: FlowModel | null;
  continueModel: FlowModel | null;
}

/**
 * The function whose body is being walked
 */
export interface FunctionFrame {
  readonly unit: FunctionUnit;
  readonly exitTypes: Type[];
}

/**
 * Mutable traversal context
 */
export interface AnalysisContext {
  readonly oracle: TypeOracle;
  readonly assigned: AssignedVariables;
  readonly options: Required<AnalysisOptions>;
  readonly expressions: Map<Expression, ExpressionFlow>;
  readonly statements: Map<Statement, StatementFlow>;
  readonly staticTypes: Map<Expression, Type>;
  readonly declaredTypes: Map<Variable, Type>;
  readonly functions: Map<FunctionUnit, FunctionExit>;
  readonly diagnostics: FlowDiagnostic[];
  readonly targets: Map<Statement, JumpTarget>;
  readonly frames: FunctionFrame[];
  /** `return e` statements standing in for expression bodies */
  readonly syntheticReturns: Map<FunctionUnit, ReturnStatement>;
  /** Variables already reported as possibly unassigned */
  readonly unassignedReads: Set<Variable>;
  /** Whether the enclosing statement started out reachable */
  parentLive: boolean;
}

/**
 * Create a fresh context for one analysis run
 */
export function createAnalysisContext(
  oracle: TypeOracle,
  assigned: AssignedVariables,
  options: AnalysisOptions = {}
): AnalysisContext {
  return {
    oracle,
    assigned,
    options: { ...DEFAULT_ANALYSIS_OPTIONS, ...options },
    expressions: new Map(),
    statements: new Map(),
    staticTypes: new Map(),
    declaredTypes: new Map(),
    functions: new Map(),
    diagnostics: [],
    targets: new Map(),
    frames: [],
    syntheticReturns: new Map(),
    unassignedReads: new Set(),
    parentLive: true,
  };
}

/**
 * The innermost function being analyzed
 */
export function currentFrame(ctx: AnalysisContext): FunctionFrame {
  const frame = ctx.frames[ctx.frames.length - 1];
  if (!frame) {
    throw new Error('No function is being analyzed');
  }
  return frame;
}

/**
 * Record a diagnostic
 */
export function report(ctx: AnalysisContext, diagnostic: FlowDiagnostic): void {
  ctx.diagnostics.push(diagnostic);
}
