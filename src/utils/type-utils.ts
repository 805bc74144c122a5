/**
 * Type utilities for comparing and printing types
 */

import type { Type, TypeKind } from '../types/index.js';

/**
 * Check if a type is of a specific kind
 */
export function isTypeKind<K extends TypeKind>(type: Type, kind: K): type is Extract<Type, { kind: K }> {
  return type.kind === kind;
}

/**
 * Check if two types are structurally equal
 */
export function typesEqual(t1: Type, t2: Type): boolean {
  if (t1 === t2) return true;

  switch (t1.kind) {
    case 'interface':
      return (
        t2.kind === 'interface' &&
        t1.name === t2.name &&
        typeListsEqual(t1.typeArguments, t2.typeArguments)
      );
    case 'function':
      return (
        t2.kind === 'function' &&
        typesEqual(t1.returnType, t2.returnType) &&
        typeListsEqual(t1.parameters, t2.parameters)
      );
    case 'typeParameter':
      return t2.kind === 'typeParameter' && t1.name === t2.name && typesEqual(t1.bound, t2.bound);
    case 'promotedTypeParameter':
      return (
        t2.kind === 'promotedTypeParameter' &&
        typesEqual(t1.parameter, t2.parameter) &&
        typesEqual(t1.promotedBound, t2.promotedBound)
      );
    case 'nullable':
    case 'legacy':
    case 'futureOr':
      return t2.kind === t1.kind && typesEqual(t1.inner, t2.inner);
    default:
      return t1.kind === t2.kind;
  }
}

function typeListsEqual(a: readonly Type[], b: readonly Type[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((type, i) => {
    const other = b[i];
    return other !== undefined && typesEqual(type, other);
  });
}

/**
 * Check if a type occurs in a list (by structural equality)
 */
export function containsType(types: readonly Type[], type: Type): boolean {
  return types.some((candidate) => typesEqual(candidate, type));
}

/**
 * Convert type to its source-like string form. Types nested deeper than
 * `maxDepth` print as `...`.
 */
export function typeToString(type: Type, maxDepth = Infinity): string {
  return printType(type, maxDepth, 0);
}

function printType(type: Type, maxDepth: number, depth: number): string {
  if (depth > maxDepth) return '...';
  const nested = (inner: Type): string => printType(inner, maxDepth, depth + 1);

  switch (type.kind) {
    case 'interface':
      return type.typeArguments.length === 0
        ? type.name
        : `${type.name}<${type.typeArguments.map(nested).join(', ')}>`;
    case 'function':
      return `${nested(type.returnType)} Function(${type.parameters.map(nested).join(', ')})`;
    case 'typeParameter':
      return type.name;
    case 'promotedTypeParameter':
      return `${type.parameter.name} & ${nested(type.promotedBound)}`;
    case 'nullable':
      return `${wrapCompound(type.inner, nested)}?`;
    case 'legacy':
      return `${wrapCompound(type.inner, nested)}*`;
    case 'futureOr':
      return `FutureOr<${nested(type.inner)}>`;
    case 'object':
      return 'Object';
    case 'null':
      return 'Null';
    case 'never':
      return 'Never';
    case 'dynamic':
      return 'dynamic';
    case 'void':
      return 'void';
  }
}

/** `(int Function())?`, not `int Function()?` */
function wrapCompound(type: Type, print: (type: Type) => string): string {
  const text = print(type);
  return type.kind === 'function' || type.kind === 'promotedTypeParameter' ? `(${text})` : text;
}

/**
 * Sort and deduplicate types by their printed form
 */
export function canonicalTypeSet(types: Iterable<Type>): Type[] {
  const byKey = new Map<string, Type>();
  for (const type of types) {
    const key = typeToString(type);
    if (!byKey.has(key)) byKey.set(key, type);
  }
  return [...byKey.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, type]) => type);
}
