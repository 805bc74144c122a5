/**
 * Type Annotations - TypeScript annotations to analysis types
 *
 * `T | null` and `T | undefined` become `T?`, `Promise<T>` becomes
 * `Future<T>`, arrays become `List<E>`. Unions of several non-null
 * members have no counterpart and widen to `Object`.
 */

import * as t from '@babel/types';
import type { Type, TypeParameterType } from '../types/index.js';
import { Types, future, futureOr, func, interfaceType, nullable, typeParameter } from '../types/index.js';

/**
 * Type parameters visible at a point, innermost last
 */
export type TypeScope = ReadonlyMap<string, TypeParameterType>;

export const EMPTY_TYPE_SCOPE: TypeScope = new Map();

/**
 * Convert an annotation; a missing annotation is `null`
 */
export function convertAnnotation(
  annotation: t.TSTypeAnnotation | t.TypeAnnotation | t.Noop | null | undefined,
  scope: TypeScope
): Type | null {
  if (!annotation || !t.isTSTypeAnnotation(annotation)) return null;
  return convertType(annotation.typeAnnotation, scope);
}

/**
 * Convert a TypeScript type node
 */
export function convertType(node: t.TSType, scope: TypeScope): Type {
  switch (node.type) {
    case 'TSStringKeyword':
      return Types.string;
    case 'TSNumberKeyword':
      return Types.num;
    case 'TSBooleanKeyword':
      return Types.bool;
    case 'TSAnyKeyword':
      return Types.dynamic;
    case 'TSUnknownKeyword':
      return Types.nullableObject;
    case 'TSObjectKeyword':
      return Types.object;
    case 'TSVoidKeyword':
      return Types.voidType;
    case 'TSNeverKeyword':
      return Types.never;
    case 'TSNullKeyword':
    case 'TSUndefinedKeyword':
      return Types.nullType;

    case 'TSLiteralType':
      return literalType(node);

    case 'TSUnionType':
      return unionType(node.types, scope);

    case 'TSArrayType':
      return interfaceType('List', [convertType(node.elementType, scope)]);

    case 'TSFunctionType':
      return func(
        node.parameters.map((param) => parameterType(param, scope) ?? Types.dynamic),
        convertAnnotation(node.typeAnnotation, scope) ?? Types.dynamic
      );

    case 'TSParenthesizedType':
      return convertType(node.typeAnnotation, scope);

    case 'TSTypeReference':
      return referenceType(node, scope);

    default:
      return Types.dynamic;
  }
}

function literalType(node: t.TSLiteralType): Type {
  switch (node.literal.type) {
    case 'StringLiteral':
    case 'TemplateLiteral':
      return Types.string;
    case 'NumericLiteral':
      return Number.isInteger(node.literal.value) ? Types.int : Types.double;
    case 'BooleanLiteral':
      return Types.bool;
    default:
      return Types.num;
  }
}

function unionType(members: readonly t.TSType[], scope: TypeScope): Type {
  let hasNull = false;
  const rest: Type[] = [];
  for (const member of members) {
    const type = convertType(member, scope);
    if (type.kind === 'null') {
      hasNull = true;
    } else {
      rest.push(type);
    }
  }

  const [single] = rest;
  let base: Type;
  if (rest.length === 0) {
    base = Types.never;
  } else if (rest.length === 1 && single) {
    base = single;
  } else {
    base = Types.object;
  }
  return hasNull ? nullable(base) : base;
}

function referenceType(node: t.TSTypeReference, scope: TypeScope): Type {
  if (!t.isIdentifier(node.typeName)) {
    // Qualified names (ns.Type) are opaque
    return Types.dynamic;
  }
  const name = node.typeName.name;
  const args = (node.typeParameters?.params ?? []).map((param) => convertType(param, scope));

  const parameter = scope.get(name);
  if (parameter) return parameter;

  switch (name) {
    case 'Promise':
      return future(args[0] ?? Types.dynamic);
    case 'FutureOr':
      return futureOr(args[0] ?? Types.dynamic);
    case 'Array':
    case 'ReadonlyArray':
      return interfaceType('List', [args[0] ?? Types.dynamic]);
    case 'Object':
      return Types.object;
    default:
      return interfaceType(name, args);
  }
}

/**
 * Declared type of a function parameter, or null when unannotated
 */
export function parameterType(param: t.Node, scope: TypeScope): Type | null {
  if (t.isIdentifier(param)) {
    const type = convertAnnotation(param.typeAnnotation, scope);
    return type && param.optional ? nullable(type) : type;
  }
  if (t.isAssignmentPattern(param)) {
    return parameterType(param.left, scope);
  }
  if (t.isRestElement(param)) {
    return convertAnnotation(param.typeAnnotation, scope);
  }
  if (t.isTSParameterProperty(param)) {
    return parameterType(param.parameter, scope);
  }
  return null;
}

/**
 * Extend `outer` with a declaration's type parameters
 */
export function declareTypeParameters(
  declaration: t.TSTypeParameterDeclaration | t.TypeParameterDeclaration | t.Noop | null | undefined,
  outer: TypeScope
): { scope: TypeScope; parameters: TypeParameterType[] } {
  if (!declaration || !t.isTSTypeParameterDeclaration(declaration)) {
    return { scope: outer, parameters: [] };
  }

  const scope = new Map(outer);
  const parameters: TypeParameterType[] = [];
  for (const param of declaration.params) {
    // Bounds may mention earlier parameters of the same list
    const bound = param.constraint ? convertType(param.constraint, scope) : undefined;
    const parameter = typeParameter(param.name, bound);
    scope.set(param.name, parameter);
    parameters.push(parameter);
  }
  return { scope, parameters };
}
