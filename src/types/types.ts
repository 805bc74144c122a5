/**
 * flowscope - Type values consumed by flow analysis
 *
 * Types are a closed tagged union so that promotion and subtype logic
 * can switch over `kind` exhaustively. The engine never computes bounds
 * on these values; it only compares them and asks a TypeOracle whether
 * one is a subtype of another.
 */

/**
 * A class or interface type, possibly generic (`List<int>`, `Future<T>`)
 */
export interface InterfaceType {
  readonly kind: 'interface';
  readonly name: string;
  readonly typeArguments: readonly Type[];
}

/**
 * Function type: `R Function(P1, P2)`
 */
export interface FunctionType {
  readonly kind: 'function';
  readonly parameters: readonly Type[];
  readonly returnType: Type;
}

/**
 * Reference to a generic type parameter
 */
export interface TypeParameterType {
  readonly kind: 'typeParameter';
  readonly name: string;
  /** Declared bound; `Object?` when the declaration has none */
  readonly bound: Type;
}

/**
 * A type parameter narrowed by a type test: `T & S`
 */
export interface PromotedTypeParameterType {
  readonly kind: 'promotedTypeParameter';
  readonly parameter: TypeParameterType;
  readonly promotedBound: Type;
}

/**
 * `T?`
 */
export interface NullableType {
  readonly kind: 'nullable';
  readonly inner: Type;
}

/**
 * `T*` - a type from code that predates null safety
 */
export interface LegacyType {
  readonly kind: 'legacy';
  readonly inner: Type;
}

/**
 * `FutureOr<T>`
 */
export interface FutureOrType {
  readonly kind: 'futureOr';
  readonly inner: Type;
}

/** `Object` - the non-nullable top */
export interface ObjectType {
  readonly kind: 'object';
}

/** `Null` */
export interface NullType {
  readonly kind: 'null';
}

/** `Never` - the type of expressions that do not complete */
export interface NeverType {
  readonly kind: 'never';
}

/** `dynamic` */
export interface DynamicType {
  readonly kind: 'dynamic';
}

/** `void` */
export interface VoidType {
  readonly kind: 'void';
}

export type Type =
  | InterfaceType
  | FunctionType
  | TypeParameterType
  | PromotedTypeParameterType
  | NullableType
  | LegacyType
  | FutureOrType
  | ObjectType
  | NullType
  | NeverType
  | DynamicType
  | VoidType;

/**
 * Type kind discriminant
 */
export type TypeKind = Type['kind'];

/**
 * Extract type by kind
 */
export type TypeByKind<K extends TypeKind> = Extract<Type, { kind: K }>;
