/**
 * Subtyping Relations - A nominal reference TypeOracle
 *
 * Flow analysis only needs yes/no answers, so this oracle implements the
 * null-safe subtype rules over a class hierarchy and nothing more. No
 * upper or lower bounds are computed.
 *
 * Key relations:
 * - Top: T <: dynamic, void, Object?
 * - Bottom: Never <: T
 * - Nullable: S? <: T when S <: T and Null <: T
 * - FutureOr: S <: FutureOr<T> when S <: Future<T> or S <: T
 * - Type parameters: X <: T when X's bound <: T
 * - Functions: contravariant parameters, covariant return
 * - Interfaces: by walking declared supertypes, generics covariant
 */

import type { Type, InterfaceType, TypeParameterType } from './types.js';
import type { TypeOracle } from './oracle.js';
import {
  Types,
  nullable,
  future,
  interfaceType,
  isTopType,
  typeParameter,
  func,
} from './factory.js';
import { typesEqual } from '../utils/type-utils.js';

/**
 * A class or interface declaration known to the hierarchy
 */
export interface ClassDeclaration {
  readonly name: string;
  readonly typeParameters: readonly TypeParameterType[];
  /** Direct supertypes, written in terms of `typeParameters` */
  readonly supertypes: readonly InterfaceType[];
  /** Fields, getters and methods (as function types) */
  readonly members: ReadonlyMap<string, Type>;
}

const E = typeParameter('E');
const T = typeParameter('T');

/**
 * Core library classes every hierarchy starts from
 */
export const BUILTIN_CLASSES: readonly ClassDeclaration[] = [
  declareClass('num', [], [], {
    abs: func([], interfaceType('num')),
    isNegative: Types.bool,
    '+': func([Types.num], Types.num),
    '-': func([Types.num], Types.num),
    '*': func([Types.num], Types.num),
    '/': func([Types.num], Types.double),
    '%': func([Types.num], Types.num),
    '<': func([Types.num], Types.bool),
    '<=': func([Types.num], Types.bool),
    '>': func([Types.num], Types.bool),
    '>=': func([Types.num], Types.bool),
  }),
  declareClass('int', [], [Types.num], {
    isEven: Types.bool,
    isOdd: Types.bool,
    '+': func([Types.int], Types.int),
    '-': func([Types.int], Types.int),
    '*': func([Types.int], Types.int),
  }),
  declareClass('double', [], [Types.num], {
    isNaN: Types.bool,
  }),
  declareClass('String', [], [], {
    length: Types.int,
    isEmpty: Types.bool,
    substring: func([Types.int], Types.string),
    toUpperCase: func([], Types.string),
    '+': func([Types.string], Types.string),
  }),
  declareClass('bool', [], [], {}),
  declareClass('Function', [], [], {}),
  declareClass('Iterable', [E], [], {
    length: Types.int,
    isEmpty: Types.bool,
    first: E,
  }),
  declareClass('List', [E], [interfaceType('Iterable', [E])], {
    add: func([E], Types.voidType),
  }),
  declareClass('Future', [T], [], {}),
];

/**
 * Build a class declaration from a member record
 */
export function declareClass(
  name: string,
  typeParameters: readonly TypeParameterType[],
  supertypes: readonly InterfaceType[],
  members: Record<string, Type>
): ClassDeclaration {
  return {
    name,
    typeParameters,
    supertypes,
    members: new Map(Object.entries(members)),
  };
}

/**
 * Replace type parameters by name
 */
export function substitute(type: Type, bindings: ReadonlyMap<string, Type>): Type {
  if (bindings.size === 0) return type;

  switch (type.kind) {
    case 'interface':
      return interfaceType(
        type.name,
        type.typeArguments.map((arg) => substitute(arg, bindings))
      );
    case 'function':
      return func(
        type.parameters.map((param) => substitute(param, bindings)),
        substitute(type.returnType, bindings)
      );
    case 'typeParameter':
      return bindings.get(type.name) ?? type;
    case 'promotedTypeParameter':
      return bindings.get(type.parameter.name) ?? type;
    case 'nullable':
      return nullable(substitute(type.inner, bindings));
    case 'legacy':
      return Types.legacy(substitute(type.inner, bindings));
    case 'futureOr':
      return Types.futureOr(substitute(type.inner, bindings));
    default:
      return type;
  }
}

/**
 * Nominal subtype oracle over a class hierarchy
 */
export class NominalTypeOracle implements TypeOracle {
  private readonly classes = new Map<string, ClassDeclaration>();

  constructor(classes: Iterable<ClassDeclaration> = []) {
    for (const decl of BUILTIN_CLASSES) {
      this.classes.set(decl.name, decl);
    }
    for (const decl of classes) {
      this.classes.set(decl.name, decl);
    }
  }

  /**
   * Look up a class declaration
   */
  getClass(name: string): ClassDeclaration | undefined {
    return this.classes.get(name);
  }

  isSubtype(sub: Type, sup: Type): boolean {
    // Reflexivity
    if (typesEqual(sub, sup)) return true;

    // Top and bottom
    if (isTopType(sup)) return true;
    if (sub.kind === 'never') return true;

    // Legacy types behave as nullable on the right, non-nullable on the left
    if (sub.kind === 'legacy') return this.isSubtype(sub.inner, sup);
    if (sup.kind === 'legacy') return this.isSubtype(sub, nullable(sup.inner));

    if (sup.kind === 'object') return this.isNonNullable(sub);

    if (sub.kind === 'null') {
      if (sup.kind === 'nullable' || sup.kind === 'null') return true;
      if (sup.kind === 'futureOr') return this.isSubtype(sub, sup.inner);
      return false;
    }

    if (sub.kind === 'dynamic' || sub.kind === 'void') return false;

    // Left FutureOr and left nullable split into both halves
    if (sub.kind === 'futureOr') {
      return this.isSubtype(future(sub.inner), sup) && this.isSubtype(sub.inner, sup);
    }
    if (sub.kind === 'nullable') {
      return this.isSubtype(sub.inner, sup) && this.isSubtype(Types.nullType, sup);
    }

    // Right FutureOr and right nullable accept either half, or a bound that fits
    if (sup.kind === 'futureOr') {
      return (
        this.isSubtype(sub, future(sup.inner)) ||
        this.isSubtype(sub, sup.inner) ||
        this.boundIsSubtype(sub, sup)
      );
    }
    if (sup.kind === 'nullable') {
      return (
        this.isSubtype(sub, sup.inner) ||
        this.isSubtype(sub, Types.nullType) ||
        this.boundIsSubtype(sub, sup)
      );
    }

    if (sub.kind === 'promotedTypeParameter') {
      return this.isSubtype(sub.parameter, sup) || this.isSubtype(sub.promotedBound, sup);
    }
    if (sup.kind === 'promotedTypeParameter') {
      return this.isSubtype(sub, sup.parameter) && this.isSubtype(sub, sup.promotedBound);
    }
    if (sub.kind === 'typeParameter') {
      return this.isSubtype(sub.bound, sup);
    }

    if (sub.kind === 'function') {
      if (sup.kind === 'interface') return sup.name === 'Function';
      if (sup.kind !== 'function') return false;
      if (sub.parameters.length !== sup.parameters.length) return false;
      const paramsOk = sub.parameters.every((param, i) => {
        const other = sup.parameters[i];
        return other !== undefined && this.isSubtype(other, param);
      });
      return paramsOk && this.isSubtype(sub.returnType, sup.returnType);
    }

    if (sub.kind === 'interface' && sup.kind === 'interface') {
      const instance = this.asInstanceOf(sub, sup.name);
      if (!instance || instance.typeArguments.length !== sup.typeArguments.length) return false;
      return instance.typeArguments.every((arg, i) => {
        const other = sup.typeArguments[i];
        return other !== undefined && this.isSubtype(arg, other);
      });
    }

    return false;
  }

  memberType(receiver: Type, name: string): Type | undefined {
    switch (receiver.kind) {
      case 'legacy':
        return this.memberType(receiver.inner, name);
      case 'typeParameter':
        return this.memberType(receiver.bound, name);
      case 'promotedTypeParameter':
        return (
          this.memberType(receiver.promotedBound, name) ??
          this.memberType(receiver.parameter.bound, name)
        );
      case 'interface':
        return this.lookupMember(receiver, name, new Set());
      default:
        return undefined;
    }
  }

  /**
   * Find `type`'s supertype named `name`, instantiated for `type`'s arguments
   */
  asInstanceOf(type: InterfaceType, name: string, seen: Set<string> = new Set()): InterfaceType | undefined {
    if (type.name === name) return type;
    if (seen.has(type.name)) return undefined;
    seen.add(type.name);

    const decl = this.classes.get(type.name);
    if (!decl) return undefined;

    const bindings = this.bindingsFor(decl, type);
    for (const supertype of decl.supertypes) {
      const instantiated = substitute(supertype, bindings);
      if (instantiated.kind !== 'interface') continue;
      const found = this.asInstanceOf(instantiated, name, seen);
      if (found) return found;
    }
    return undefined;
  }

  private lookupMember(type: InterfaceType, name: string, seen: Set<string>): Type | undefined {
    if (seen.has(type.name)) return undefined;
    seen.add(type.name);

    const decl = this.classes.get(type.name);
    if (!decl) return undefined;

    const bindings = this.bindingsFor(decl, type);
    const own = decl.members.get(name);
    if (own) return substitute(own, bindings);

    for (const supertype of decl.supertypes) {
      const instantiated = substitute(supertype, bindings);
      if (instantiated.kind !== 'interface') continue;
      const found = this.lookupMember(instantiated, name, seen);
      if (found) return found;
    }
    return undefined;
  }

  private bindingsFor(decl: ClassDeclaration, type: InterfaceType): Map<string, Type> {
    const bindings = new Map<string, Type>();
    decl.typeParameters.forEach((param, i) => {
      bindings.set(param.name, type.typeArguments[i] ?? Types.dynamic);
    });
    return bindings;
  }

  private boundIsSubtype(sub: Type, sup: Type): boolean {
    if (sub.kind === 'typeParameter') return this.isSubtype(sub.bound, sup);
    if (sub.kind === 'promotedTypeParameter') return this.isSubtype(sub.promotedBound, sup);
    return false;
  }

  private isNonNullable(type: Type): boolean {
    switch (type.kind) {
      case 'interface':
      case 'function':
      case 'object':
      case 'never':
        return true;
      case 'futureOr':
        return this.isNonNullable(type.inner);
      case 'typeParameter':
        return this.isNonNullable(type.bound);
      case 'promotedTypeParameter':
        return this.isNonNullable(type.promotedBound) || this.isNonNullable(type.parameter.bound);
      default:
        return false;
    }
  }
}
