/**
 * flowscope - flow analysis for type promotion, definite assignment
 * and reachability
 */

// Type model, oracle and flow AST
export * from './types/index.js';

// Helpers for types and flow AST nodes
export * as Utils from './utils/index.js';

// Flow analysis engine
export * from './analysis/index.js';

// Parser and source front end
export * from './parser/index.js';
export * from './frontend/index.js';

// Output
export * from './output/index.js';
