/**
 * Source front end - parse, lower and analyze TypeScript-annotated code
 */

import type { AnalysisOptions } from '../analysis/engine/context.js';
import type { FunctionFlowResult } from '../analysis/driver.js';
import { analyzeFunction } from '../analysis/driver.js';
import { parse } from '../parser/index.js';
import type { ParseError, ParseOptions } from '../parser/index.js';
import { NominalTypeOracle } from '../types/index.js';
import type { LowerError } from './lower.js';
import { lowerProgram } from './lower.js';

export { lowerProgram } from './lower.js';
export type { LowerError, LoweredProgram } from './lower.js';
export {
  convertAnnotation,
  convertType,
  declareTypeParameters,
  parameterType,
  EMPTY_TYPE_SCOPE,
  type TypeScope,
} from './annotations.js';

export interface AnalyzeSourceOptions extends ParseOptions, AnalysisOptions {}

export interface SourceAnalysis {
  readonly parseErrors: readonly ParseError[];
  readonly lowerErrors: readonly LowerError[];
  readonly oracle: NominalTypeOracle;
  /** One result per function unit, in source order */
  readonly results: readonly FunctionFlowResult[];
}

/**
 * Parse `source`, lower every function in it and analyze each one
 */
export function analyzeSource(source: string, options: AnalyzeSourceOptions = {}): SourceAnalysis {
  const { filename, sourceType, ...analysisOptions } = options;
  const { ast, errors: parseErrors } = parse(source, { filename, sourceType });
  const program = lowerProgram(ast);
  const oracle = new NominalTypeOracle(program.classes);

  return {
    parseErrors,
    lowerErrors: program.errors,
    oracle,
    results: program.units.map((unit) => analyzeFunction(unit, oracle, analysisOptions)),
  };
}
