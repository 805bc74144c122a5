/**
 * Static types of expressions
 *
 * Leaf types come from the node or the oracle; variable reads use the
 * promoted type in the current flow model. Compound forms use the small
 * rule set below. Where a real inferencer would compute a least upper
 * bound, `approximateUpperBound` falls back to the nearer of the two types
 * or to `Object`/`Object?`.
 */

import type { CallExpression, FunctionType, FunctionUnit, PropertyGet, Type, TypeOracle } from '../../types/index.js';
import { Types, func, isPotentiallyNullable, nullable } from '../../types/index.js';

/**
 * A bound of `a` and `b` good enough for flow analysis
 */
export function approximateUpperBound(a: Type, b: Type, oracle: TypeOracle): Type {
  if (oracle.isSubtype(a, b)) return b;
  if (oracle.isSubtype(b, a)) return a;
  if (a.kind === 'null') return nullable(b);
  if (b.kind === 'null') return nullable(a);
  if (a.kind === 'dynamic' || b.kind === 'dynamic') return Types.dynamic;
  if (isPotentiallyNullable(a) || isPotentiallyNullable(b)) return Types.nullableObject;
  return Types.object;
}

/**
 * Type of a property read on a receiver of type `targetType`
 */
export function propertyType(node: PropertyGet, targetType: Type, oracle: TypeOracle): Type {
  return node.type ?? oracle.memberType?.(targetType, node.name) ?? Types.dynamic;
}

/**
 * Type of a call, given its receiver's type when it has one
 */
export function callReturnType(node: CallExpression, targetType: Type | undefined, oracle: TypeOracle): Type {
  if (node.returnType) return node.returnType;
  if (!targetType) return Types.dynamic;

  if (targetType.kind === 'function' && node.name === 'call') {
    return targetType.returnType;
  }
  const member = oracle.memberType?.(targetType, node.name);
  if (member?.kind === 'function') return member.returnType;
  return Types.dynamic;
}

/**
 * Element type of a for-each iterable. `Iterable.first` carries the
 * element type through the class hierarchy.
 */
export function iterableElementType(iterableType: Type, oracle: TypeOracle): Type {
  if (iterableType.kind === 'dynamic') return Types.dynamic;
  return oracle.memberType?.(iterableType, 'first') ?? Types.dynamic;
}

/**
 * Type of a closure or local function; omitted annotations are `dynamic`
 */
export function functionUnitType(unit: FunctionUnit): FunctionType {
  return func(
    unit.parameters.map((param) => param.declaredType ?? Types.dynamic),
    unit.returnType ?? Types.dynamic
  );
}
