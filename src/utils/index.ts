/**
 * Utils module exports
 */

export {
  isTypeKind,
  typesEqual,
  containsType,
  typeToString,
  canonicalTypeSet,
} from './type-utils.js';
export { childNodes, nestedFunction, isExpression, isStatement } from './ast-utils.js';
