/**
 * Type Factory - Constructors, sentinels and deconstructors for types
 *
 * Provides a clean API for creating types without verbose object literals.
 * Constructors normalize as they build (`int??` is `int?`, `Null?` is
 * `Null`) so that structurally equal types print the same way.
 */

import type {
  Type,
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

// ============================================================================
// Sentinels (Singletons)
// ============================================================================

/** `Object` */
export const object: ObjectType = { kind: 'object' };

/** `Null` */
export const nullType: NullType = { kind: 'null' };

/** `Never` */
export const never: NeverType = { kind: 'never' };

/** `dynamic` */
export const dynamic: DynamicType = { kind: 'dynamic' };

/** `void` */
export const voidType: VoidType = { kind: 'void' };

/** `Object?` */
export const nullableObject: NullableType = { kind: 'nullable', inner: object };

// ============================================================================
// Interface Types
// ============================================================================

/**
 * Create an interface type
 */
export function interfaceType(name: string, typeArguments: readonly Type[] = []): InterfaceType {
  return { kind: 'interface', name, typeArguments };
}

export const int = interfaceType('int');
export const double = interfaceType('double');
export const num = interfaceType('num');
export const string = interfaceType('String');
export const bool = interfaceType('bool');

/**
 * `Future<T>`
 */
export function future(inner: Type): InterfaceType {
  return interfaceType('Future', [inner]);
}

/**
 * `FutureOr<T>`
 */
export function futureOr(inner: Type): FutureOrType {
  return { kind: 'futureOr', inner };
}

// ============================================================================
// Function and Type Parameter Types
// ============================================================================

/**
 * Create a function type
 */
export function func(parameters: readonly Type[], returnType: Type): FunctionType {
  return { kind: 'function', parameters, returnType };
}

/**
 * Create a type parameter reference. The bound defaults to `Object?`.
 */
export function typeParameter(name: string, bound: Type = nullableObject): TypeParameterType {
  return { kind: 'typeParameter', name, bound };
}

/**
 * `T & S`
 */
export function promotedTypeParameter(
  parameter: TypeParameterType,
  promotedBound: Type
): PromotedTypeParameterType {
  return { kind: 'promotedTypeParameter', parameter, promotedBound };
}

// ============================================================================
// Nullability
// ============================================================================

/**
 * `T?`
 */
export function nullable(inner: Type): Type {
  switch (inner.kind) {
    case 'nullable':
    case 'null':
    case 'dynamic':
    case 'void':
      return inner;
    case 'never':
      return nullType;
    case 'legacy':
      return nullable(inner.inner);
    default: {
      const result: NullableType = { kind: 'nullable', inner };
      return result;
    }
  }
}

/**
 * `T*`
 */
export function legacy(inner: Type): Type {
  switch (inner.kind) {
    case 'nullable':
    case 'legacy':
    case 'null':
    case 'dynamic':
    case 'void':
      return inner;
    default: {
      const result: LegacyType = { kind: 'legacy', inner };
      return result;
    }
  }
}

/**
 * NonNull(T): the type of a `T` value after it has been checked against null
 */
export function nonNullable(type: Type): Type {
  switch (type.kind) {
    case 'nullable':
    case 'legacy':
      return nonNullable(type.inner);
    case 'null':
      return never;
    case 'futureOr':
      return futureOr(nonNullable(type.inner));
    case 'typeParameter':
      return isPotentiallyNullable(type.bound) ? promotedTypeParameter(type, object) : type;
    case 'promotedTypeParameter':
      return promotedTypeParameter(type.parameter, nonNullable(type.promotedBound));
    default:
      return type;
  }
}

/**
 * Whether `null` may inhabit the type, judged from its structure alone
 */
export function isPotentiallyNullable(type: Type): boolean {
  switch (type.kind) {
    case 'nullable':
    case 'legacy':
    case 'null':
    case 'dynamic':
    case 'void':
      return true;
    case 'futureOr':
      return isPotentiallyNullable(type.inner);
    case 'typeParameter':
      return isPotentiallyNullable(type.bound);
    case 'promotedTypeParameter':
      return isPotentiallyNullable(type.promotedBound);
    default:
      return false;
  }
}

// ============================================================================
// Deconstructors
// ============================================================================

/**
 * `T` for `Future<T>`, otherwise undefined
 */
export function futureArgument(type: Type): Type | undefined {
  if (type.kind === 'interface' && type.name === 'Future' && type.typeArguments.length === 1) {
    return type.typeArguments[0];
  }
  return undefined;
}

/**
 * `T` for `FutureOr<T>`, otherwise undefined
 */
export function futureOrArgument(type: Type): Type | undefined {
  return type.kind === 'futureOr' ? type.inner : undefined;
}

/**
 * flatten(T): the type an `await` of a `T` value produces
 */
export function flatten(type: Type): Type {
  switch (type.kind) {
    case 'nullable':
      return nullable(flatten(type.inner));
    case 'legacy':
      return legacy(flatten(type.inner));
    case 'futureOr':
      return type.inner;
    default:
      return futureArgument(type) ?? type;
  }
}

/**
 * True for `dynamic`, `void`, `Object?` and their legacy forms
 */
export function isTopType(type: Type): boolean {
  switch (type.kind) {
    case 'dynamic':
    case 'void':
      return true;
    case 'nullable':
    case 'legacy':
      return type.inner.kind === 'object' || isTopType(type.inner);
    case 'futureOr':
      return isTopType(type.inner);
    default:
      return false;
  }
}

// ============================================================================
// Convenience namespace
// ============================================================================

export const Types = {
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
} as const;
