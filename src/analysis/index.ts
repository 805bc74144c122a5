/**
 * Analysis module exports
 */

export { analyzeFunction, type FunctionFlowResult } from './driver.js';
export {
  modelAt,
  promotedTypeAt,
  isDefinitelyAssignedAt,
  isDefinitelyUnassignedAt,
  isWriteCapturedAt,
  typeOfRead,
  jumpModelsOf,
  type FlowPoint,
} from './queries.js';

export {
  DEFAULT_ANALYSIS_OPTIONS,
  type AnalysisOptions,
  type DiagnosticKind,
  type ExpressionFlow,
  type FlowDiagnostic,
  type FunctionExit,
  type StatementFlow,
} from './engine/context.js';
export { AssignedVariables, computeAssignedVariables } from './engine/assigned.js';
export { admitsImplicitNull } from './engine/functions.js';

export type { FlowModel } from './model/flow-model.js';
export { createEntryModel, isReachable, isLocallyLive, getVariable, flowModelsEqual } from './model/flow-model.js';
export type { VariableModel } from './model/variable-model.js';
export { createVariableModel, currentType, joinVariableModels, variableModelsEqual } from './model/variable-model.js';
export type { Reachability } from './model/reachability.js';
export {
  split,
  drop,
  unsplitTo,
  exit,
  join,
  merge,
  conservativeJoin,
  restrict,
  declareVariable,
  removeVariables,
  assign,
  promotedTypeOf,
} from './model/lattice.js';
export {
  promoteByTypeTest,
  promoteByTypeTestFailure,
  promoteToNonNull,
  recordNullTest,
  isStrictlyNarrower,
} from './model/promotion.js';
