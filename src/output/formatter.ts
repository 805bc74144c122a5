/**
 * Formatter - Converts types, flow models and analysis results to text
 *
 * Supports:
 * 1. Types in source-like notation (`int?`, `T & num`, `int Function(String)`)
 * 2. Flow models on one line (for debugging and the CLI)
 * 3. Report (human-readable analysis report)
 * 4. JSON (machine-readable)
 */

import type { Type } from '../types/index.js';
import type { FlowModel } from '../analysis/model/flow-model.js';
import type { VariableModel } from '../analysis/model/variable-model.js';
import type { FunctionFlowResult } from '../analysis/driver.js';
import type { FlowDiagnostic } from '../analysis/engine/context.js';
import { typeToString } from '../utils/type-utils.js';

/**
 * Format options
 */
export interface FormatOptions {
  /** Maximum depth for nested types */
  maxDepth?: number;
  /** Include the exit flow model of every function in reports */
  showModels?: boolean;
}

export const DEFAULT_FORMAT_OPTIONS: Required<FormatOptions> = {
  maxDepth: 5,
  showModels: false,
};

/**
 * Analysis results for one file, ready for output
 */
export interface FlowReport {
  filename: string;
  results: readonly FunctionFlowResult[];
  /** Parse and lowering errors */
  errors: ReadonlyArray<{ message: string; line: number; column: number }>;
}

// ============================================================================
// Types
// ============================================================================

/**
 * Format a type in source-like notation
 */
export function formatType(type: Type, options: FormatOptions = {}): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  return typeToString(type, opts.maxDepth);
}

// ============================================================================
// Flow models
// ============================================================================

/**
 * Format a flow model on one line:
 * `[true, false] { s#0: String? promoted [String] tested [String] assigned }`
 */
export function formatModel(model: FlowModel, options: FormatOptions = {}): string {
  const reachable = `[${model.reachable.join(', ')}]`;
  const variables = [...model.variableInfo].map(
    ([variable, info]) => `${variable.name}#${variable.id}: ${formatVariableModel(info, options)}`
  );
  return variables.length === 0 ? `${reachable} {}` : `${reachable} { ${variables.join('; ')} }`;
}

function formatVariableModel(info: VariableModel, options: FormatOptions): string {
  const parts = [formatType(info.declaredType, options)];
  if (info.promotedTypes.length > 0) {
    parts.push(`promoted [${info.promotedTypes.map((type) => formatType(type, options)).join(', ')}]`);
  }
  if (info.tested.length > 0) {
    parts.push(`tested [${info.tested.map((type) => formatType(type, options)).join(', ')}]`);
  }
  if (info.assigned) parts.push('assigned');
  if (info.unassigned) parts.push('unassigned');
  if (info.writeCaptured) parts.push('captured');
  return parts.join(' ');
}

// ============================================================================
// Reports
// ============================================================================

function diagnosticPosition(diagnostic: FlowDiagnostic): { line: number; column: number } {
  const loc = diagnostic.node.loc;
  return { line: loc?.line ?? 0, column: loc?.column ?? 0 };
}

function signature(result: FunctionFlowResult, options: FormatOptions): string {
  const unit = result.unit;
  const params = unit.parameters.map((param) =>
    param.declaredType ? `${param.name}: ${formatType(param.declaredType, options)}` : param.name
  );
  const returnType = unit.returnType ? `: ${formatType(unit.returnType, options)}` : '';
  const modifiers = [unit.isAsync ? 'async ' : '', unit.isGenerator ? '*' : ''].join('');
  return `${modifiers}${unit.name}(${params.join(', ')})${returnType}`;
}

/**
 * Format analysis results as a human-readable report
 */
export function formatReport(report: FlowReport, options: FormatOptions = {}): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  const lines: string[] = [];
  const diagnostics = report.results.flatMap((result) => result.diagnostics);

  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push(`  Flow Analysis Report: ${report.filename}`);
  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push('');

  lines.push('  Summary:');
  lines.push(`    Functions:   ${report.results.length}`);
  lines.push(`    Errors:      ${diagnostics.filter((d) => d.severity === 'error').length}`);
  lines.push(`    Dead code:   ${diagnostics.filter((d) => d.kind === 'dead-code').length}`);
  lines.push(`    Input errors: ${report.errors.length}`);
  lines.push('');

  if (report.errors.length > 0) {
    lines.push('───────────────────────────────────────────────────────────────');
    lines.push('  Input Errors:');
    lines.push('───────────────────────────────────────────────────────────────');
    for (const err of report.errors) {
      lines.push(`    Line ${err.line}:${err.column} - ${err.message}`);
    }
    lines.push('');
  }

  lines.push('───────────────────────────────────────────────────────────────');
  lines.push('  Functions:');
  lines.push('───────────────────────────────────────────────────────────────');
  lines.push('');

  for (const result of report.results) {
    lines.push(`  ${signature(result, opts)}`);
    lines.push(`    exit reachable: ${result.exitReachable ? 'yes' : 'no'}`);
    if (result.exitTypes.length > 0) {
      lines.push(`    returns: ${result.exitTypes.map((type) => formatType(type, opts)).join(', ')}`);
    }
    if (opts.showModels) {
      lines.push(`    exit model: ${formatModel(result.exit, opts)}`);
    }
    for (const diagnostic of result.diagnostics) {
      const { line, column } = diagnosticPosition(diagnostic);
      const location = `${line}:${column}`.padEnd(8);
      lines.push(`    ${location} ${diagnostic.severity.padEnd(6)} ${diagnostic.kind.padEnd(20)} ${diagnostic.message}`);
    }
    lines.push('');
  }

  lines.push('═══════════════════════════════════════════════════════════════');

  return lines.join('\n');
}

/**
 * Format analysis results as JSON
 */
export function formatJSON(report: FlowReport, indent = 2): string {
  const serializable = {
    filename: report.filename,
    errors: report.errors,
    functions: report.results.map((result) => ({
      name: result.unit.name,
      line: result.unit.loc?.line ?? 0,
      exitReachable: result.exitReachable,
      exitTypes: result.exitTypes.map((type) => formatType(type)),
      diagnostics: result.diagnostics.map((diagnostic) => ({
        kind: diagnostic.kind,
        severity: diagnostic.severity,
        message: diagnostic.message,
        ...diagnosticPosition(diagnostic),
        ...(diagnostic.variable ? { variable: diagnostic.variable.name } : {}),
      })),
    })),
  };
  return JSON.stringify(serializable, null, indent);
}
