/**
 * Flow AST - the tree shape flow analysis walks
 *
 * Nodes are identified by object identity; every per-node result is
 * memoized in maps keyed by the node itself. The front end in
 * `src/frontend` produces these from Babel's AST, but any producer works.
 */

import type { Type } from './types.js';

/**
 * Source position carried through from the producer for diagnostics
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
}

export type VariableKind = 'parameter' | 'local' | 'catch' | 'function';

/**
 * A local variable or parameter. Identity is the variable's identity.
 */
export interface Variable {
  readonly id: number;
  readonly name: string;
  /** Explicit declared type; null for `var x` style declarations */
  readonly declaredType: Type | null;
  readonly kind: VariableKind;
  readonly loc?: SourceLocation;
}

interface NodeBase {
  readonly loc?: SourceLocation;
}

// ============================================================================
// Expressions
// ============================================================================

export interface BooleanLiteral extends NodeBase {
  readonly kind: 'booleanLiteral';
  readonly value: boolean;
}

export interface NullLiteral extends NodeBase {
  readonly kind: 'nullLiteral';
}

/**
 * Any other non-null literal (numbers, strings)
 */
export interface Literal extends NodeBase {
  readonly kind: 'literal';
  readonly value: string | number;
  readonly type: Type;
}

export interface VariableGet extends NodeBase {
  readonly kind: 'variableGet';
  readonly variable: Variable;
}

/**
 * `x = value`
 */
export interface VariableSet extends NodeBase {
  readonly kind: 'variableSet';
  readonly variable: Variable;
  readonly value: Expression;
}

/**
 * `x ??= value`
 */
export interface IfNullSet extends NodeBase {
  readonly kind: 'ifNullSet';
  readonly variable: Variable;
  readonly value: Expression;
}

export interface LogicalExpression extends NodeBase {
  readonly kind: 'logical';
  readonly operator: '&&' | '||';
  readonly left: Expression;
  readonly right: Expression;
}

/**
 * `left ?? right`
 */
export interface IfNullExpression extends NodeBase {
  readonly kind: 'ifNull';
  readonly left: Expression;
  readonly right: Expression;
}

export interface ConditionalExpression extends NodeBase {
  readonly kind: 'conditional';
  readonly condition: Expression;
  readonly then: Expression;
  readonly otherwise: Expression;
}

export interface NotExpression extends NodeBase {
  readonly kind: 'not';
  readonly operand: Expression;
}

/**
 * `operand is T` / `operand is! T`
 */
export interface IsExpression extends NodeBase {
  readonly kind: 'is';
  readonly operand: Expression;
  readonly type: Type;
  readonly negated: boolean;
}

/**
 * `operand as T`
 */
export interface CastExpression extends NodeBase {
  readonly kind: 'cast';
  readonly operand: Expression;
  readonly type: Type;
}

/**
 * `operand!`
 */
export interface NullCheckExpression extends NodeBase {
  readonly kind: 'nullCheck';
  readonly operand: Expression;
}

/**
 * `left == right` / `left != right`
 */
export interface EqualityExpression extends NodeBase {
  readonly kind: 'equality';
  readonly left: Expression;
  readonly right: Expression;
  readonly negated: boolean;
}

/**
 * A function, method or operator invocation. Operators such as `+` and
 * `<` are calls whose `name` is the operator.
 */
export interface CallExpression extends NodeBase {
  readonly kind: 'call';
  readonly name: string;
  /** Receiver for method and operator calls */
  readonly target: Expression | null;
  readonly arguments: readonly Expression[];
  /** Return type when the producer knows it */
  readonly returnType?: Type;
}

export interface PropertyGet extends NodeBase {
  readonly kind: 'propertyGet';
  readonly target: Expression;
  readonly name: string;
  /** Property type when the producer knows it */
  readonly type?: Type;
}

export interface AwaitExpression extends NodeBase {
  readonly kind: 'await';
  readonly operand: Expression;
}

export interface ThrowExpression extends NodeBase {
  readonly kind: 'throw';
  readonly operand: Expression;
}

/**
 * A closure. Its body is analyzed in place, with the enclosing
 * function's variables in scope.
 */
export interface FunctionExpression extends NodeBase {
  readonly kind: 'function';
  readonly function: FunctionUnit;
}

export type Expression =
  | BooleanLiteral
  | NullLiteral
  | Literal
  | VariableGet
  | VariableSet
  | IfNullSet
  | LogicalExpression
  | IfNullExpression
  | ConditionalExpression
  | NotExpression
  | IsExpression
  | CastExpression
  | NullCheckExpression
  | EqualityExpression
  | CallExpression
  | PropertyGet
  | AwaitExpression
  | ThrowExpression
  | FunctionExpression;

// ============================================================================
// Statements
// ============================================================================

export interface Block extends NodeBase {
  readonly kind: 'block';
  readonly statements: readonly Statement[];
}

export interface ExpressionStatement extends NodeBase {
  readonly kind: 'expressionStatement';
  readonly expression: Expression;
}

export interface VariableDeclaration extends NodeBase {
  readonly kind: 'declaration';
  readonly variable: Variable;
  readonly initializer: Expression | null;
}

/**
 * A named local function; `variable` holds the function itself
 */
export interface LocalFunctionDeclaration extends NodeBase {
  readonly kind: 'localFunction';
  readonly variable: Variable;
  readonly function: FunctionUnit;
}

export interface IfStatement extends NodeBase {
  readonly kind: 'if';
  readonly condition: Expression;
  readonly then: Statement;
  readonly otherwise: Statement | null;
}

export interface WhileStatement extends NodeBase {
  readonly kind: 'while';
  readonly condition: Expression;
  readonly body: Statement;
}

export interface DoWhileStatement extends NodeBase {
  readonly kind: 'doWhile';
  readonly body: Statement;
  readonly condition: Expression;
}

export interface ForStatement extends NodeBase {
  readonly kind: 'for';
  readonly initializer: Statement | null;
  readonly condition: Expression | null;
  readonly updaters: readonly Expression[];
  readonly body: Statement;
}

/**
 * `for (variable of iterable) body`
 */
export interface ForEachStatement extends NodeBase {
  readonly kind: 'forEach';
  readonly variable: Variable;
  readonly iterable: Expression;
  readonly body: Statement;
}

export interface SwitchCase extends NodeBase {
  /** Case expressions; empty for `default` */
  readonly labels: readonly Expression[];
  readonly isDefault: boolean;
  readonly body: readonly Statement[];
}

export interface SwitchStatement extends NodeBase {
  readonly kind: 'switch';
  readonly discriminant: Expression;
  readonly cases: readonly SwitchCase[];
  /** Set by an external exhaustiveness checker */
  readonly exhaustive: boolean;
}

export interface CatchClause extends NodeBase {
  readonly exception: Variable | null;
  readonly body: Block;
}

export interface TryStatement extends NodeBase {
  readonly kind: 'try';
  readonly body: Block;
  readonly catches: readonly CatchClause[];
  readonly finallyBody: Block | null;
}

export interface ReturnStatement extends NodeBase {
  readonly kind: 'return';
  readonly value: Expression | null;
}

/**
 * A generator's `yield`: contributes an element type, then continues
 */
export interface YieldStatement extends NodeBase {
  readonly kind: 'yield';
  readonly value: Expression;
}

export interface BreakStatement extends NodeBase {
  readonly kind: 'break';
  /** The loop, switch or labeled statement this leaves */
  readonly target: Statement;
}

export interface ContinueStatement extends NodeBase {
  readonly kind: 'continue';
  /** The loop this continues */
  readonly target: Statement;
}

export interface LabeledStatement extends NodeBase {
  readonly kind: 'labeled';
  readonly label: string;
  readonly body: Statement;
}

export type Statement =
  | Block
  | ExpressionStatement
  | VariableDeclaration
  | LocalFunctionDeclaration
  | IfStatement
  | WhileStatement
  | DoWhileStatement
  | ForStatement
  | ForEachStatement
  | SwitchStatement
  | TryStatement
  | ReturnStatement
  | YieldStatement
  | BreakStatement
  | ContinueStatement
  | LabeledStatement;

export type FlowNode = Expression | Statement;

// ============================================================================
// Function units
// ============================================================================

/**
 * A function, method, closure or initializer body to analyze
 */
export interface FunctionUnit {
  readonly name: string;
  readonly parameters: readonly Variable[];
  /** A block, or an expression body (`=> e`) */
  readonly body: Block | Expression;
  /** Declared return type; null when omitted */
  readonly returnType: Type | null;
  readonly isAsync: boolean;
  readonly isGenerator: boolean;
  readonly loc?: SourceLocation;
}

/**
 * Narrow a body to a block
 */
export function isBlock(body: Block | Expression): body is Block {
  return body.kind === 'block';
}
