#!/usr/bin/env npx tsx
/**
 * CLI script to run flow analysis on a TypeScript file
 * Usage: npx tsx scripts/analyze.ts <file.ts> [options]
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { analyzeSource } from '../src/frontend/index.js';
import { formatReport, formatJSON, type FlowReport } from '../src/output/index.js';

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.log('Usage: npx tsx scripts/analyze.ts <file.ts> [options]');
    console.log('');
    console.log('Options:');
    console.log('  --format=report   Human-readable analysis report (default)');
    console.log('  --format=json     Machine-readable JSON output');
    console.log('  --models          Include the exit flow model of each function');
    console.log('  --no-dead-code    Do not report unreachable code');
    console.log('  --verbose         Show timing and node counts');
    process.exit(1);
  }

  // Parse arguments
  let filePath = '';
  let format = 'report';
  let showModels = false;
  let reportDeadCode = true;
  let verbose = false;

  for (const arg of args) {
    if (arg.startsWith('--format=')) {
      format = arg.slice('--format='.length);
    } else if (arg === '--models') {
      showModels = true;
    } else if (arg === '--no-dead-code') {
      reportDeadCode = false;
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (!arg.startsWith('-')) {
      filePath = arg;
    }
  }

  if (!filePath) {
    console.error('Error: No file path provided');
    process.exit(1);
  }

  // Resolve and read file
  const absolutePath = resolve(process.cwd(), filePath);
  let source: string;

  try {
    source = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`Error: Could not read file '${absolutePath}': ${reason}`);
    process.exit(1);
  }

  console.error(`Analyzing ${filePath}...`);
  const startTime = Date.now();
  const analysis = analyzeSource(source, { filename: filePath, reportDeadCode });
  const elapsed = Date.now() - startTime;

  if (verbose) {
    const expressions = analysis.results.reduce((sum, result) => sum + result.expressions.size, 0);
    const statements = analysis.results.reduce((sum, result) => sum + result.statements.size, 0);
    console.error('');
    console.error('Statistics:');
    console.error(`  Functions: ${analysis.results.length}`);
    console.error(`  Statements: ${statements}`);
    console.error(`  Expressions: ${expressions}`);
  }

  console.error(`Analysis completed in ${elapsed}ms`);
  const diagnostics = analysis.results.reduce((sum, result) => sum + result.diagnostics.length, 0);
  console.error(`Found ${diagnostics} diagnostics`);
  console.error('');

  const report: FlowReport = {
    filename: filePath,
    results: analysis.results,
    errors: [...analysis.parseErrors, ...analysis.lowerErrors],
  };

  // Format output
  let output: string;
  switch (format) {
    case 'json':
      output = formatJSON(report);
      break;
    case 'report':
    default:
      output = formatReport(report, { showModels });
      break;
  }

  console.log(output);

  if (report.results.some((result) => result.diagnostics.some((d) => d.severity === 'error'))) {
    process.exitCode = 1;
  }
}

main();
