/**
 * Parser module exports
 */

export { parse, parseExpression, DEFAULT_PARSE_OPTIONS } from './parser.js';
export type { ParseOptions, ParseResult, ParseError } from './parser.js';
