/**
 * Source parser wrapper
 *
 * Uses @babel/parser with the TypeScript plugin, so type annotations are
 * kept in the AST for the front end to lower.
 */

import { parse as babelParse, type ParserOptions, type ParserPlugin } from '@babel/parser';
import * as t from '@babel/types';

export interface ParseOptions {
  /** Source filename (for error messages) */
  filename?: string;
  /** Source type */
  sourceType?: 'script' | 'module' | 'unambiguous';
}

export const DEFAULT_PARSE_OPTIONS: Required<ParseOptions> = {
  filename: '<input>',
  sourceType: 'module',
};

export interface ParseResult {
  /** The parsed AST */
  ast: t.File;
  /** Any parsing errors */
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

const PLUGINS: ParserPlugin[] = [
  'typescript',
  'classProperties',
  'classPrivateProperties',
  'classPrivateMethods',
  'classStaticBlock',
  'asyncGenerators',
  'logicalAssignment',
  'nullishCoalescingOperator',
  'optionalCatchBinding',
  'optionalChaining',
  'numericSeparator',
  'topLevelAwait',
];

/**
 * Parse source code into an AST
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const parserOptions: ParserOptions = {
    sourceType: options.sourceType ?? DEFAULT_PARSE_OPTIONS.sourceType,
    sourceFilename: options.filename ?? DEFAULT_PARSE_OPTIONS.filename,
    errorRecovery: true, // Continue parsing after errors
    plugins: PLUGINS,
  };

  try {
    const ast = babelParse(source, parserOptions);

    const errors: ParseError[] = (ast.errors ?? []).map((err) => ({
      message: err.message,
      line: err.loc?.line ?? 0,
      column: err.loc?.column ?? 0,
    }));

    return { ast, errors };
  } catch (error) {
    // Some errors are fatal even with errorRecovery
    if (error instanceof SyntaxError) {
      const loc = errorLocation(error);
      return {
        ast: t.file(t.program([])),
        errors: [{ message: error.message, line: loc.line, column: loc.column }],
      };
    }
    throw error;
  }
}

function errorLocation(error: SyntaxError): { line: number; column: number } {
  if ('loc' in error) {
    const loc: unknown = error.loc;
    if (typeof loc === 'object' && loc !== null && 'line' in loc && 'column' in loc) {
      const { line, column } = loc;
      if (typeof line === 'number' && typeof column === 'number') return { line, column };
    }
  }
  return { line: 0, column: 0 };
}

/**
 * Parse a single expression
 */
export function parseExpression(source: string): t.Expression {
  const result = parse(`(${source})`);
  const stmt = result.ast.program.body[0];
  if (stmt && stmt.type === 'ExpressionStatement') {
    return stmt.expression;
  }
  throw new Error('Failed to parse expression');
}
