/**
 * Types module exports
 */

export type {
  Type,
  TypeKind,
  TypeByKind,
  InterfaceType,
  FunctionType,
  TypeParameterType,
  PromotedTypeParameterType,
  NullableType,
  LegacyType,
  FutureOrType,
  ObjectType,
  NullType,
  NeverType,
  DynamicType,
  VoidType,
} from './types.js';

export type { TypeOracle } from './oracle.js';

export * from './ast.js';

export {
  Types,
  object,
  nullableObject,
  nullType,
  never,
  dynamic,
  voidType,
  int,
  double,
  num,
  string,
  bool,
  interfaceType,
  future,
  futureOr,
  func,
  typeParameter,
  promotedTypeParameter,
  nullable,
  legacy,
  nonNullable,
  isPotentiallyNullable,
  futureArgument,
  futureOrArgument,
  flatten,
  isTopType,
} from './factory.js';

export {
  NominalTypeOracle,
  BUILTIN_CLASSES,
  declareClass,
  substitute,
} from './subtyping.js';
export type { ClassDeclaration } from './subtyping.js';
