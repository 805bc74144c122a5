/**
 * Lowering - Babel AST to the flow AST
 *
 * Resolves identifiers to variables with block scoping, resolves
 * `break`/`continue` to the statements they leave, converts annotations
 * and collects class and interface declarations for the oracle. Every
 * top-level function, class method and constructor becomes one
 * FunctionUnit.
 *
 * Constructs with no flow meaning of their own (object and array
 * literals, templates, member writes) lower to opaque calls, so their
 * operands are still analyzed in evaluation order.
 */

import * as t from '@babel/types';
import type {
  Block,
  CallExpression,
  CatchClause,
  ClassDeclaration,
  DoWhileStatement,
  Expression,
  ForEachStatement,
  ForStatement,
  FunctionType,
  FunctionUnit,
  InterfaceType,
  LabeledStatement,
  SourceLocation,
  Statement,
  SwitchStatement,
  Type,
  Variable,
  VariableKind,
  WhileStatement,
} from '../types/index.js';
import { Types, declareClass, func, interfaceType } from '../types/index.js';
import type { TypeScope } from './annotations.js';
import {
  EMPTY_TYPE_SCOPE,
  convertAnnotation,
  convertType,
  declareTypeParameters,
  parameterType,
} from './annotations.js';

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * A construct the front end could not lower
 */
export interface LowerError {
  message: string;
  line: number;
  column: number;
}

export interface LoweredProgram {
  units: FunctionUnit[];
  classes: ClassDeclaration[];
  errors: LowerError[];
}

interface Scope {
  readonly parent: Scope | null;
  readonly variables: Map<string, Variable>;
}

/**
 * A statement `break`/`continue` can leave
 */
interface JumpScope {
  readonly labels: readonly string[];
  readonly statement: Statement;
  /** Target of an unlabeled `break` */
  readonly breakable: boolean;
  /** Target of `continue` */
  readonly loop: boolean;
}

/**
 * Program-wide lowering state
 */
interface LowerContext {
  nextVariableId: number;
  readonly errors: LowerError[];
  readonly classes: ClassDeclaration[];
  /** Signatures of top-level functions, for calls by name */
  readonly signatures: Map<string, FunctionType>;
  /** Type parameter count of every declared class */
  readonly classArity: Map<string, number>;
}

/**
 * Per-function lowering state
 */
interface FunctionState {
  readonly name: string;
  readonly scope: Scope;
  readonly typeScope: TypeScope;
  readonly jumps: JumpScope[];
  readonly thisVariable: Variable | null;
}

const TYPEOF_TESTS: Readonly<Record<string, Type>> = {
  string: Types.string,
  number: Types.num,
  boolean: Types.bool,
  function: Types.interfaceType('Function'),
};

const COMPOUND_OPERATORS: Readonly<Record<string, string>> = {
  '+=': '+',
  '-=': '-',
  '*=': '*',
  '/=': '/',
  '%=': '%',
  '**=': '**',
  '<<=': '<<',
  '>>=': '>>',
  '>>>=': '>>>',
  '|=': '|',
  '&=': '&',
  '^=': '^',
};

/**
 * Lower a parsed file
 */
export function lowerProgram(ast: t.File): LoweredProgram {
  const ctx: LowerContext = {
    nextVariableId: 0,
    errors: [],
    classes: [],
    signatures: new Map(),
    classArity: new Map(),
  };

  const declarations = ast.program.body.map(unwrapExport);

  // Signatures and classes first, so bodies can refer to later declarations
  for (const node of declarations) {
    if (t.isFunctionDeclaration(node) && node.id) {
      ctx.signatures.set(node.id.name, functionSignature(node, EMPTY_TYPE_SCOPE));
    } else if (t.isVariableDeclaration(node)) {
      for (const declarator of node.declarations) {
        const init = declarator.init;
        if (t.isIdentifier(declarator.id) && isFunctionExpression(init)) {
          ctx.signatures.set(declarator.id.name, functionSignature(init, EMPTY_TYPE_SCOPE));
        }
      }
    } else if (t.isClassDeclaration(node)) {
      addClass(classDeclaration(node), ctx);
    } else if (t.isTSInterfaceDeclaration(node)) {
      addClass(interfaceDeclaration(node), ctx);
    }
  }

  const units: FunctionUnit[] = [];
  const root: Scope = { parent: null, variables: new Map() };
  for (const node of declarations) {
    if (t.isFunctionDeclaration(node)) {
      const name = node.id?.name ?? '<default>';
      units.push(lowerFunction(name, node, topLevelState(name, root, EMPTY_TYPE_SCOPE, null), ctx));
    } else if (t.isVariableDeclaration(node)) {
      for (const declarator of node.declarations) {
        const init = declarator.init;
        if (t.isIdentifier(declarator.id) && isFunctionExpression(init)) {
          const name = declarator.id.name;
          units.push(lowerFunction(name, init, topLevelState(name, root, EMPTY_TYPE_SCOPE, null), ctx));
        }
      }
    } else if (t.isClassDeclaration(node)) {
      units.push(...lowerClassMembers(node, root, ctx));
    }
  }

  return { units, classes: ctx.classes, errors: ctx.errors };
}

function unwrapExport(node: t.Statement): t.Node {
  if (t.isExportNamedDeclaration(node) && node.declaration) return node.declaration;
  if (t.isExportDefaultDeclaration(node)) return node.declaration;
  return node;
}

function isFunctionExpression(
  node: t.Node | null | undefined
): node is t.ArrowFunctionExpression | t.FunctionExpression {
  return t.isArrowFunctionExpression(node) || t.isFunctionExpression(node);
}

function topLevelState(
  name: string,
  root: Scope,
  typeScope: TypeScope,
  thisVariable: Variable | null
): FunctionState {
  return { name, scope: root, typeScope, jumps: [], thisVariable };
}

// ============================================================================
// Classes and interfaces
// ============================================================================

function addClass(decl: ClassDeclaration, ctx: LowerContext): void {
  ctx.classes.push(decl);
  ctx.classArity.set(decl.name, decl.typeParameters.length);
}

function memberName(key: t.Node): string | null {
  if (t.isIdentifier(key)) return key.name;
  if (t.isStringLiteral(key)) return key.value;
  if (t.isPrivateName(key)) return `#${key.id.name}`;
  return null;
}

function heritageType(node: t.Node, scope: TypeScope): InterfaceType | null {
  if (!t.isTSExpressionWithTypeArguments(node) || !t.isIdentifier(node.expression)) return null;
  const args = (node.typeParameters?.params ?? []).map((param) => convertType(param, scope));
  return interfaceType(node.expression.name, args);
}

function classDeclaration(node: t.ClassDeclaration): ClassDeclaration {
  const name = node.id?.name ?? '<anonymous>';
  const { scope, parameters } = declareTypeParameters(node.typeParameters, EMPTY_TYPE_SCOPE);

  const supertypes: InterfaceType[] = [];
  if (t.isIdentifier(node.superClass)) {
    const params: readonly t.TSType[] = t.isTSTypeParameterInstantiation(node.superTypeParameters)
      ? node.superTypeParameters.params
      : [];
    supertypes.push(interfaceType(node.superClass.name, params.map((param) => convertType(param, scope))));
  }
  for (const heritage of node.implements ?? []) {
    const type = heritageType(heritage, scope);
    if (type) supertypes.push(type);
  }

  const members: Record<string, Type> = {};
  for (const member of node.body.body) {
    if (t.isClassProperty(member) || t.isClassPrivateProperty(member)) {
      const key = memberName(member.key);
      if (key) members[key] = convertAnnotation(member.typeAnnotation, scope) ?? Types.dynamic;
    } else if (t.isClassMethod(member) || t.isClassPrivateMethod(member)) {
      const key = memberName(member.key);
      if (!key) continue;
      if (member.kind === 'constructor') {
        // Parameter properties declare fields
        for (const param of member.params) {
          if (t.isTSParameterProperty(param) && t.isIdentifier(param.parameter)) {
            members[param.parameter.name] = parameterType(param, scope) ?? Types.dynamic;
          }
        }
      } else if (member.kind === 'get') {
        members[key] = convertAnnotation(member.returnType, scope) ?? Types.dynamic;
      } else if (member.kind === 'method') {
        members[key] = functionSignature(member, scope);
      }
    }
  }

  return declareClass(name, parameters, supertypes, members);
}

function interfaceDeclaration(node: t.TSInterfaceDeclaration): ClassDeclaration {
  const { scope, parameters } = declareTypeParameters(node.typeParameters, EMPTY_TYPE_SCOPE);

  const supertypes: InterfaceType[] = [];
  for (const heritage of node.extends ?? []) {
    const type = heritageType(heritage, scope);
    if (type) supertypes.push(type);
  }

  const members: Record<string, Type> = {};
  for (const member of node.body.body) {
    if (t.isTSPropertySignature(member)) {
      const key = memberName(member.key);
      const type = convertAnnotation(member.typeAnnotation, scope) ?? Types.dynamic;
      if (key) members[key] = member.optional ? Types.nullable(type) : type;
    } else if (t.isTSMethodSignature(member)) {
      const key = memberName(member.key);
      if (!key) continue;
      members[key] = func(
        member.parameters.map((param) => parameterType(param, scope) ?? Types.dynamic),
        convertAnnotation(member.typeAnnotation, scope) ?? Types.dynamic
      );
    }
  }

  return declareClass(node.id.name, parameters, supertypes, members);
}

function lowerClassMembers(node: t.ClassDeclaration, root: Scope, ctx: LowerContext): FunctionUnit[] {
  const className = node.id?.name ?? '<anonymous>';
  const { scope: typeScope, parameters } = declareTypeParameters(node.typeParameters, EMPTY_TYPE_SCOPE);
  const thisVariable = newVariable(ctx, 'this', interfaceType(className, parameters), 'parameter', node);

  const units: FunctionUnit[] = [];
  for (const member of node.body.body) {
    if (t.isClassMethod(member) || t.isClassPrivateMethod(member)) {
      const name = `${className}.${memberName(member.key) ?? '<computed>'}`;
      units.push(lowerFunction(name, member, topLevelState(name, root, typeScope, thisVariable), ctx));
    } else if (t.isClassProperty(member) && isFunctionExpression(member.value)) {
      const name = `${className}.${memberName(member.key) ?? '<computed>'}`;
      units.push(lowerFunction(name, member.value, topLevelState(name, root, typeScope, thisVariable), ctx));
    }
  }
  return units;
}

// ============================================================================
// Functions
// ============================================================================

function functionSignature(node: t.Function, scope: TypeScope): FunctionType {
  const { scope: inner } = declareTypeParameters(node.typeParameters, scope);
  const params: readonly t.Node[] = node.params;
  return func(
    params
      .filter((param) => !isThisParameter(param))
      .map((param) => parameterType(param, inner) ?? Types.dynamic),
    convertAnnotation(node.returnType, inner) ?? Types.dynamic
  );
}

/** TypeScript's `this: T` pseudo-parameter */
function isThisParameter(param: t.Node): boolean {
  return t.isIdentifier(param) && param.name === 'this';
}

function parameterName(param: t.Node, index: number): string {
  if (t.isIdentifier(param)) return param.name;
  if (t.isAssignmentPattern(param) || t.isTSParameterProperty(param)) {
    const inner = t.isAssignmentPattern(param) ? param.left : param.parameter;
    return parameterName(inner, index);
  }
  if (t.isRestElement(param)) return parameterName(param.argument, index);
  return `$${index}`;
}

function lowerFunction(name: string, node: t.Function, outer: FunctionState, ctx: LowerContext): FunctionUnit {
  const { scope: typeScope } = declareTypeParameters(node.typeParameters, outer.typeScope);
  const scope: Scope = { parent: outer.scope, variables: new Map() };
  const state: FunctionState = {
    name,
    scope,
    typeScope,
    jumps: [],
    // Only methods and arrow functions see the enclosing `this`
    thisVariable: t.isFunctionExpression(node) || t.isFunctionDeclaration(node) ? null : outer.thisVariable,
  };

  const params: readonly t.Node[] = node.params;
  const parameters: Variable[] = [];
  params.forEach((param, index) => {
    if (isThisParameter(param)) return;
    const variable = newVariable(ctx, parameterName(param, index), parameterType(param, typeScope), 'parameter', param);
    scope.variables.set(variable.name, variable);
    parameters.push(variable);
  });

  const body = t.isBlockStatement(node.body)
    ? lowerBlock(node.body, state, ctx)
    : lowerExpression(node.body, state, ctx);

  return {
    name,
    parameters,
    body,
    returnType: convertAnnotation(node.returnType, typeScope),
    isAsync: node.async,
    isGenerator: node.generator,
    loc: location(node),
  };
}

// ============================================================================
// Scopes
// ============================================================================

function newVariable(
  ctx: LowerContext,
  name: string,
  declaredType: Type | null,
  kind: VariableKind,
  node: t.Node
): Variable {
  return { id: ctx.nextVariableId++, name, declaredType, kind, loc: location(node) };
}

function childState(state: FunctionState): FunctionState {
  return { ...state, scope: { parent: state.scope, variables: new Map() } };
}

function lookup(scope: Scope | null, name: string): Variable | undefined {
  for (let current = scope; current; current = current.parent) {
    const variable = current.variables.get(name);
    if (variable) return variable;
  }
  return undefined;
}

/**
 * Bring a block's declarations into scope before lowering its statements
 */
function hoist(statements: readonly t.Statement[], state: FunctionState, ctx: LowerContext): void {
  for (const statement of statements) {
    if (t.isVariableDeclaration(statement)) {
      for (const declarator of statement.declarations) {
        for (const id of Object.values(t.getBindingIdentifiers(declarator.id))) {
          declareLocal(id.name, bindingType(id, state), 'local', id, state, ctx);
        }
      }
    } else if (t.isFunctionDeclaration(statement) && statement.id) {
      declareLocal(statement.id.name, functionSignature(statement, state.typeScope), 'function', statement, state, ctx);
    }
  }
}

function bindingType(id: t.Identifier, state: FunctionState): Type | null {
  return convertAnnotation(id.typeAnnotation, state.typeScope);
}

/**
 * The variable `name` in the innermost scope, created if needed
 */
function declareLocal(
  name: string,
  declaredType: Type | null,
  kind: VariableKind,
  node: t.Node,
  state: FunctionState,
  ctx: LowerContext
): Variable {
  const existing = state.scope.variables.get(name);
  if (existing) return existing;
  const variable = newVariable(ctx, name, declaredType, kind, node);
  state.scope.variables.set(name, variable);
  return variable;
}

// ============================================================================
// Statements
// ============================================================================

function lowerBlock(node: t.BlockStatement, outer: FunctionState, ctx: LowerContext): Block {
  const state = childState(outer);
  hoist(node.body, state, ctx);
  return {
    kind: 'block',
    statements: node.body.flatMap((statement) => lowerStatement(statement, state, ctx)),
    loc: location(node),
  };
}

function block(statements: Statement[], node: t.Node): Block {
  return { kind: 'block', statements, loc: location(node) };
}

/**
 * A nested statement position (`if` branch, loop body)
 */
function lowerBody(node: t.Statement, state: FunctionState, ctx: LowerContext): Statement {
  const statements = lowerStatement(node, state, ctx);
  const [single] = statements;
  return statements.length === 1 && single ? single : block(statements, node);
}

function lowerStatement(node: t.Statement, state: FunctionState, ctx: LowerContext): Statement[] {
  const loc = location(node);
  switch (node.type) {
    case 'BlockStatement':
      return [lowerBlock(node, state, ctx)];

    case 'EmptyStatement':
    case 'DebuggerStatement':
    case 'TSTypeAliasDeclaration':
    case 'TSInterfaceDeclaration':
    case 'TSDeclareFunction':
      return [];

    case 'ExpressionStatement':
      if (t.isYieldExpression(node.expression)) {
        const argument = node.expression.argument;
        return [
          {
            kind: 'yield',
            value: argument ? lowerExpression(argument, state, ctx) : { kind: 'nullLiteral', loc },
            loc,
          },
        ];
      }
      return [{ kind: 'expressionStatement', expression: lowerExpression(node.expression, state, ctx), loc }];

    case 'VariableDeclaration':
      return lowerVariableDeclaration(node, state, ctx);

    case 'FunctionDeclaration': {
      const name = node.id?.name ?? '<anonymous>';
      const variable = declareLocal(name, functionSignature(node, state.typeScope), 'function', node, state, ctx);
      return [{ kind: 'localFunction', variable, function: lowerFunction(name, node, state, ctx), loc }];
    }

    case 'ClassDeclaration':
      addClass(classDeclaration(node), ctx);
      return [];

    case 'ReturnStatement':
      return [{ kind: 'return', value: node.argument ? lowerExpression(node.argument, state, ctx) : null, loc }];

    case 'ThrowStatement':
      return [
        {
          kind: 'expressionStatement',
          expression: { kind: 'throw', operand: lowerExpression(node.argument, state, ctx), loc },
          loc,
        },
      ];

    case 'IfStatement':
      return [
        {
          kind: 'if',
          condition: lowerExpression(node.test, state, ctx),
          then: lowerBody(node.consequent, state, ctx),
          otherwise: node.alternate ? lowerBody(node.alternate, state, ctx) : null,
          loc,
        },
      ];

    case 'WhileStatement':
    case 'DoWhileStatement':
    case 'ForStatement':
    case 'ForOfStatement':
    case 'ForInStatement':
      return [lowerLoop(node, [], state, ctx)];

    case 'SwitchStatement':
      return [lowerSwitch(node, [], state, ctx)];

    case 'TryStatement':
      return [lowerTry(node, state, ctx)];

    case 'BreakStatement':
    case 'ContinueStatement':
      return lowerJump(node, state, ctx);

    case 'LabeledStatement':
      return [lowerLabeled(node, [], state, ctx)];

    default:
      reportUnsupported(`Unsupported statement: ${node.type}`, node, ctx);
      return [];
  }
}

function lowerVariableDeclaration(
  node: t.VariableDeclaration,
  state: FunctionState,
  ctx: LowerContext
): Statement[] {
  const statements: Statement[] = [];
  for (const declarator of node.declarations) {
    const loc = location(declarator);

    if (t.isIdentifier(declarator.id)) {
      const name = declarator.id.name;
      const variable = declareLocal(name, bindingType(declarator.id, state), 'local', declarator.id, state, ctx);
      statements.push({
        kind: 'declaration',
        variable,
        initializer: declarator.init ? lowerExpression(declarator.init, state, ctx, name) : null,
        loc,
      });
      continue;
    }

    // Destructuring: evaluate the source once, bind every name opaquely
    if (declarator.init) {
      statements.push({ kind: 'expressionStatement', expression: lowerExpression(declarator.init, state, ctx), loc });
    }
    for (const id of Object.values(t.getBindingIdentifiers(declarator.id))) {
      const variable = declareLocal(id.name, bindingType(id, state), 'local', id, state, ctx);
      statements.push({ kind: 'declaration', variable, initializer: opaque('destructure', [], id), loc });
    }
  }
  return statements;
}

// ============================================================================
// Loops, switch, labels and jumps
// ============================================================================

type LoopNode =
  | t.WhileStatement
  | t.DoWhileStatement
  | t.ForStatement
  | t.ForOfStatement
  | t.ForInStatement;

function isLoopNode(node: t.Node): node is LoopNode {
  return (
    t.isWhileStatement(node) ||
    t.isDoWhileStatement(node) ||
    t.isForStatement(node) ||
    t.isForOfStatement(node) ||
    t.isForInStatement(node)
  );
}

function emptyBlock(): Block {
  return { kind: 'block', statements: [] };
}

/**
 * Lower a loop body with the loop registered as a jump target
 */
function lowerLoopBody(
  body: t.Statement,
  loop: Statement,
  labels: readonly string[],
  state: FunctionState,
  ctx: LowerContext
): Statement {
  state.jumps.push({ labels, statement: loop, breakable: true, loop: true });
  const lowered = lowerBody(body, state, ctx);
  state.jumps.pop();
  return lowered;
}

function lowerLoop(node: LoopNode, labels: readonly string[], outer: FunctionState, ctx: LowerContext): Statement {
  const loc = location(node);
  switch (node.type) {
    case 'WhileStatement': {
      const loop: Mutable<WhileStatement> = {
        kind: 'while',
        condition: lowerExpression(node.test, outer, ctx),
        body: emptyBlock(),
        loc,
      };
      loop.body = lowerLoopBody(node.body, loop, labels, outer, ctx);
      return loop;
    }

    case 'DoWhileStatement': {
      const loop: Mutable<DoWhileStatement> = {
        kind: 'doWhile',
        body: emptyBlock(),
        condition: { kind: 'booleanLiteral', value: true },
        loc,
      };
      loop.body = lowerLoopBody(node.body, loop, labels, outer, ctx);
      loop.condition = lowerExpression(node.test, outer, ctx);
      return loop;
    }

    case 'ForStatement': {
      const state = childState(outer);
      const init = node.init;
      let initializer: Statement[] = [];
      if (t.isVariableDeclaration(init)) {
        initializer = lowerVariableDeclaration(init, state, ctx);
      } else if (init) {
        initializer = [{ kind: 'expressionStatement', expression: lowerExpression(init, state, ctx), loc }];
      }
      const [single] = initializer;
      const inline = initializer.length === 1 && single ? single : null;

      const loop: Mutable<ForStatement> = {
        kind: 'for',
        initializer: inline,
        condition: node.test ? lowerExpression(node.test, state, ctx) : null,
        updaters: [],
        body: emptyBlock(),
        loc,
      };
      loop.body = lowerLoopBody(node.body, loop, labels, state, ctx);
      const update = node.update;
      if (t.isSequenceExpression(update)) {
        loop.updaters = update.expressions.map((expression) => lowerExpression(expression, state, ctx));
      } else if (update) {
        loop.updaters = [lowerExpression(update, state, ctx)];
      }

      // Several initializers are declared in a block around the loop
      return inline || initializer.length === 0 ? loop : block([...initializer, loop], node);
    }

    case 'ForOfStatement':
    case 'ForInStatement': {
      const state = childState(outer);
      const iterable = lowerExpression(node.right, outer, ctx);
      // for-in enumerates keys
      const defaultType = node.type === 'ForInStatement' ? Types.string : null;

      const prologue: Statement[] = [];
      let variable: Variable;
      const left = node.left;
      const declared = t.isVariableDeclaration(left) ? left.declarations[0]?.id : undefined;
      if (declared && t.isIdentifier(declared)) {
        variable = declareLocal(declared.name, bindingType(declared, state) ?? defaultType, 'local', declared, state, ctx);
      } else {
        const target = t.isIdentifier(left) ? lookup(outer.scope, left.name) : undefined;
        variable = newVariable(ctx, target?.name ?? '$element', defaultType, 'local', left);
        const element: Expression = { kind: 'variableGet', variable, loc };
        if (target) {
          // An existing variable is assigned from a fresh loop variable
          prologue.push({ kind: 'expressionStatement', expression: { kind: 'variableSet', variable: target, value: element, loc }, loc });
        } else {
          const pattern = t.isVariableDeclaration(left) ? left.declarations[0]?.id : left;
          for (const id of pattern ? Object.values(t.getBindingIdentifiers(pattern)) : []) {
            const bound = declareLocal(id.name, bindingType(id, state), 'local', id, state, ctx);
            prologue.push({ kind: 'declaration', variable: bound, initializer: opaque('destructure', [], id), loc });
          }
        }
      }

      const loop: Mutable<ForEachStatement> = { kind: 'forEach', variable, iterable, body: emptyBlock(), loc };
      const body = lowerLoopBody(node.body, loop, labels, state, ctx);
      loop.body = prologue.length > 0 ? block([...prologue, body], node.body) : body;
      return loop;
    }
  }
}

function lowerSwitch(
  node: t.SwitchStatement,
  labels: readonly string[],
  outer: FunctionState,
  ctx: LowerContext
): Statement {
  const statement: Mutable<SwitchStatement> = {
    kind: 'switch',
    discriminant: lowerExpression(node.discriminant, outer, ctx),
    cases: [],
    exhaustive: false,
    loc: location(node),
  };

  // All cases share one scope
  const state = childState(outer);
  hoist(node.cases.flatMap((switchCase) => switchCase.consequent), state, ctx);

  state.jumps.push({ labels, statement, breakable: true, loop: false });
  statement.cases = node.cases.map((switchCase) => ({
    labels: switchCase.test ? [lowerExpression(switchCase.test, state, ctx)] : [],
    isDefault: !switchCase.test,
    body: switchCase.consequent.flatMap((consequent) => lowerStatement(consequent, state, ctx)),
    loc: location(switchCase),
  }));
  state.jumps.pop();

  return statement;
}

function lowerTry(node: t.TryStatement, state: FunctionState, ctx: LowerContext): Statement {
  const handler = node.handler;
  const catches: CatchClause[] = [];
  if (handler) {
    const catchState = childState(state);
    let exception: Variable | null = null;
    if (t.isIdentifier(handler.param)) {
      exception = declareLocal(handler.param.name, bindingType(handler.param, state), 'catch', handler.param, catchState, ctx);
    }
    catches.push({ exception, body: lowerBlock(handler.body, catchState, ctx), loc: location(handler) });
  }

  return {
    kind: 'try',
    body: lowerBlock(node.block, state, ctx),
    catches,
    finallyBody: node.finalizer ? lowerBlock(node.finalizer, state, ctx) : null,
    loc: location(node),
  };
}

function lowerLabeled(
  node: t.LabeledStatement,
  outerLabels: readonly string[],
  state: FunctionState,
  ctx: LowerContext
): Statement {
  const labels = [...outerLabels, node.label.name];
  const body = node.body;
  const loc = location(node);

  if (isLoopNode(body)) {
    return { kind: 'labeled', label: node.label.name, body: lowerLoop(body, labels, state, ctx), loc };
  }
  if (t.isSwitchStatement(body)) {
    return { kind: 'labeled', label: node.label.name, body: lowerSwitch(body, labels, state, ctx), loc };
  }
  if (t.isLabeledStatement(body)) {
    return { kind: 'labeled', label: node.label.name, body: lowerLabeled(body, labels, state, ctx), loc };
  }

  const statement: Mutable<LabeledStatement> = { kind: 'labeled', label: node.label.name, body: emptyBlock(), loc };
  state.jumps.push({ labels, statement, breakable: false, loop: false });
  statement.body = lowerBody(body, state, ctx);
  state.jumps.pop();
  return statement;
}

function lowerJump(
  node: t.BreakStatement | t.ContinueStatement,
  state: FunctionState,
  ctx: LowerContext
): Statement[] {
  const isBreak = t.isBreakStatement(node);
  const label = node.label?.name;

  for (let i = state.jumps.length - 1; i >= 0; i--) {
    const scope = state.jumps[i];
    if (!scope) continue;
    const matches = label ? scope.labels.includes(label) : isBreak ? scope.breakable : scope.loop;
    if (!matches) continue;
    if (!isBreak && !scope.loop) break;

    const loc = location(node);
    return isBreak
      ? [{ kind: 'break', target: scope.statement, loc }]
      : [{ kind: 'continue', target: scope.statement, loc }];
  }

  reportUnsupported(`No target for ${isBreak ? 'break' : 'continue'}${label ? ` ${label}` : ''}`, node, ctx);
  return [];
}

// ============================================================================
// Expressions
// ============================================================================

function lowerExpression(
  node: t.Expression,
  state: FunctionState,
  ctx: LowerContext,
  nameHint?: string
): Expression {
  const loc = location(node);
  switch (node.type) {
    case 'BooleanLiteral':
      return { kind: 'booleanLiteral', value: node.value, loc };
    case 'NullLiteral':
      return { kind: 'nullLiteral', loc };
    case 'NumericLiteral':
      return numericLiteral(node.value, loc);
    case 'BigIntLiteral':
      return { kind: 'literal', value: node.value, type: Types.int, loc };
    case 'StringLiteral':
      return { kind: 'literal', value: node.value, type: Types.string, loc };
    case 'RegExpLiteral':
      return { kind: 'literal', value: node.pattern, type: interfaceType('RegExp'), loc };
    case 'TemplateLiteral': {
      const parts = node.expressions.filter((part): part is t.Expression => t.isExpression(part));
      if (parts.length === 0) {
        const cooked = node.quasis.map((quasi) => quasi.value.cooked ?? quasi.value.raw).join('');
        return { kind: 'literal', value: cooked, type: Types.string, loc };
      }
      return opaque('template', parts.map((part) => lowerExpression(part, state, ctx)), node, Types.string);
    }

    case 'Identifier':
      return lowerIdentifier(node, state, ctx);

    case 'ThisExpression':
      return state.thisVariable
        ? { kind: 'variableGet', variable: state.thisVariable, loc }
        : opaque('this', [], node);

    case 'ParenthesizedExpression':
    case 'TSSatisfiesExpression':
    case 'TSInstantiationExpression':
      return lowerExpression(node.expression, state, ctx, nameHint);

    case 'TSAsExpression':
    case 'TSTypeAssertion': {
      const operand = lowerExpression(node.expression, state, ctx, nameHint);
      if (isConstAssertion(node.typeAnnotation)) return operand;
      return { kind: 'cast', operand, type: convertType(node.typeAnnotation, state.typeScope), loc };
    }

    case 'TSNonNullExpression':
      return { kind: 'nullCheck', operand: lowerExpression(node.expression, state, ctx), loc };

    case 'AwaitExpression':
      return { kind: 'await', operand: lowerExpression(node.argument, state, ctx), loc };

    case 'YieldExpression':
      return opaque('yield', node.argument ? [lowerExpression(node.argument, state, ctx)] : [], node);

    case 'LogicalExpression': {
      const left = lowerExpression(node.left, state, ctx);
      const right = lowerExpression(node.right, state, ctx);
      return node.operator === '??'
        ? { kind: 'ifNull', left, right, loc }
        : { kind: 'logical', operator: node.operator, left, right, loc };
    }

    case 'ConditionalExpression':
      return {
        kind: 'conditional',
        condition: lowerExpression(node.test, state, ctx),
        then: lowerExpression(node.consequent, state, ctx),
        otherwise: lowerExpression(node.alternate, state, ctx),
        loc,
      };

    case 'UnaryExpression':
      return lowerUnary(node, state, ctx);

    case 'BinaryExpression':
      return lowerBinary(node, state, ctx);

    case 'AssignmentExpression':
      return lowerAssignment(node, state, ctx);

    case 'UpdateExpression': {
      const target = t.isIdentifier(node.argument) ? lookup(state.scope, node.argument.name) : undefined;
      if (!target) return opaque(node.operator, [lowerExpression(node.argument, state, ctx)], node);
      const current: Expression = { kind: 'variableGet', variable: target, loc };
      const step = call(node.operator === '++' ? '+' : '-', current, [numericLiteral(1, loc)], node);
      return { kind: 'variableSet', variable: target, value: step, loc };
    }

    case 'CallExpression':
    case 'OptionalCallExpression':
      return lowerCall(node, state, ctx);

    case 'NewExpression': {
      const args = lowerArguments(node.arguments, state, ctx);
      if (t.isIdentifier(node.callee)) {
        return opaque(`new ${node.callee.name}`, args, node, classType(node.callee.name, ctx));
      }
      return opaque('new', args, node);
    }

    case 'MemberExpression':
    case 'OptionalMemberExpression':
      return lowerMember(node, state, ctx);

    case 'ArrowFunctionExpression':
    case 'FunctionExpression': {
      const name = node.type === 'FunctionExpression' && node.id ? node.id.name : nameHint ?? `${state.name}.<closure>`;
      return { kind: 'function', function: lowerFunction(name, node, state, ctx), loc };
    }

    case 'SequenceExpression':
      return opaque(',', node.expressions.map((expression) => lowerExpression(expression, state, ctx)), node);

    case 'ObjectExpression': {
      const values: Expression[] = [];
      for (const property of node.properties) {
        if (t.isObjectProperty(property) && t.isExpression(property.value)) {
          values.push(lowerExpression(property.value, state, ctx));
        } else if (t.isSpreadElement(property)) {
          values.push(lowerExpression(property.argument, state, ctx));
        }
      }
      return opaque('{}', values, node, Types.object);
    }

    case 'ArrayExpression':
      return opaque(
        '[]',
        lowerArguments(node.elements.filter((element): element is t.Expression | t.SpreadElement => element !== null), state, ctx),
        node,
        interfaceType('List', [Types.dynamic])
      );

    default:
      reportUnsupported(`Unsupported expression: ${node.type}`, node, ctx);
      return opaque(node.type, [], node);
  }
}

function numericLiteral(value: number, loc: SourceLocation | undefined): Expression {
  return { kind: 'literal', value, type: Number.isInteger(value) ? Types.int : Types.double, loc };
}

function isConstAssertion(type: t.TSType): boolean {
  return t.isTSTypeReference(type) && t.isIdentifier(type.typeName) && type.typeName.name === 'const';
}

function lowerIdentifier(node: t.Identifier, state: FunctionState, ctx: LowerContext): Expression {
  const variable = lookup(state.scope, node.name);
  if (variable) return { kind: 'variableGet', variable, loc: location(node) };
  if (node.name === 'undefined') return { kind: 'nullLiteral', loc: location(node) };
  // Free identifiers read as opaque values
  return opaque(node.name, [], node, ctx.signatures.get(node.name));
}

function lowerUnary(node: t.UnaryExpression, state: FunctionState, ctx: LowerContext): Expression {
  const loc = location(node);
  if (node.operator === '-' && t.isNumericLiteral(node.argument)) {
    return numericLiteral(-node.argument.value, loc);
  }

  const operand = lowerExpression(node.argument, state, ctx);
  switch (node.operator) {
    case '!':
      return { kind: 'not', operand, loc };
    case 'typeof':
      return opaque('typeof', [operand], node, Types.string);
    case 'void':
      return opaque('void', [operand], node, Types.nullType);
    case 'delete':
      return opaque('delete', [operand], node, Types.bool);
    default:
      return call(`unary${node.operator}`, operand, [], node);
  }
}

function lowerBinary(node: t.BinaryExpression, state: FunctionState, ctx: LowerContext): Expression {
  const loc = location(node);
  if (t.isPrivateName(node.left)) {
    return opaque(node.operator, [lowerExpression(node.right, state, ctx)], node, Types.bool);
  }

  const negated = node.operator === '!=' || node.operator === '!==';
  const isEquality = negated || node.operator === '==' || node.operator === '===';
  if (isEquality) {
    const typeTest = lowerTypeofTest(node.left, node.right, negated, node, state, ctx) ??
      lowerTypeofTest(node.right, node.left, negated, node, state, ctx);
    if (typeTest) return typeTest;
    return {
      kind: 'equality',
      left: lowerExpression(node.left, state, ctx),
      right: lowerExpression(node.right, state, ctx),
      negated,
      loc,
    };
  }

  const left = lowerExpression(node.left, state, ctx);
  if (node.operator === 'instanceof' && t.isIdentifier(node.right)) {
    return { kind: 'is', operand: left, type: classType(node.right.name, ctx), negated: false, loc };
  }

  const right = lowerExpression(node.right, state, ctx);
  if (node.operator === 'in' || node.operator === 'instanceof') {
    return opaque(node.operator, [left, right], node, Types.bool);
  }
  return call(node.operator, left, [right], node);
}

/**
 * `typeof x === 'string'` tests `x is String`
 */
function lowerTypeofTest(
  typeofSide: t.Expression,
  literalSide: t.Expression,
  negated: boolean,
  node: t.Node,
  state: FunctionState,
  ctx: LowerContext
): Expression | null {
  if (!t.isUnaryExpression(typeofSide) || typeofSide.operator !== 'typeof') return null;
  if (!t.isStringLiteral(literalSide)) return null;

  const loc = location(node);
  if (literalSide.value === 'undefined') {
    const operand = lowerExpression(typeofSide.argument, state, ctx);
    return { kind: 'equality', left: operand, right: { kind: 'nullLiteral', loc }, negated, loc };
  }
  const type = TYPEOF_TESTS[literalSide.value];
  if (!type) return null;
  return { kind: 'is', operand: lowerExpression(typeofSide.argument, state, ctx), type, negated, loc };
}

function lowerAssignment(node: t.AssignmentExpression, state: FunctionState, ctx: LowerContext): Expression {
  const loc = location(node);
  const target = t.isIdentifier(node.left) ? lookup(state.scope, node.left.name) : undefined;

  if (!target) {
    // Member writes and destructuring assignments
    const operands: Expression[] = [];
    if (t.isMemberExpression(node.left) && t.isExpression(node.left.object)) {
      operands.push(lowerExpression(node.left.object, state, ctx));
    }
    const value = lowerExpression(node.right, state, ctx);
    operands.push(value);
    return opaque(node.operator, operands, node);
  }

  const hint = target.name;
  const current = (): Expression => ({ kind: 'variableGet', variable: target, loc });
  switch (node.operator) {
    case '=':
      return { kind: 'variableSet', variable: target, value: lowerExpression(node.right, state, ctx, hint), loc };
    case '??=':
      return { kind: 'ifNullSet', variable: target, value: lowerExpression(node.right, state, ctx, hint), loc };
    case '||=':
    case '&&=': {
      const operator = node.operator === '||=' ? '||' : '&&';
      const value: Expression = { kind: 'logical', operator, left: current(), right: lowerExpression(node.right, state, ctx), loc };
      return { kind: 'variableSet', variable: target, value, loc };
    }
    default: {
      const operator = COMPOUND_OPERATORS[node.operator] ?? node.operator;
      const value = call(operator, current(), [lowerExpression(node.right, state, ctx)], node);
      return { kind: 'variableSet', variable: target, value, loc };
    }
  }
}

function lowerArguments(
  args: ReadonlyArray<t.Expression | t.SpreadElement | t.ArgumentPlaceholder | t.JSXNamespacedName>,
  state: FunctionState,
  ctx: LowerContext
): Expression[] {
  const lowered: Expression[] = [];
  for (const arg of args) {
    if (t.isSpreadElement(arg)) {
      lowered.push(lowerExpression(arg.argument, state, ctx));
    } else if (t.isExpression(arg)) {
      lowered.push(lowerExpression(arg, state, ctx));
    }
  }
  return lowered;
}

function lowerCall(
  node: t.CallExpression | t.OptionalCallExpression,
  state: FunctionState,
  ctx: LowerContext
): Expression {
  const callee = node.callee;

  if ((t.isMemberExpression(callee) || t.isOptionalMemberExpression(callee)) && !callee.computed) {
    const name = memberName(callee.property);
    if (name && t.isExpression(callee.object)) {
      const target = lowerExpression(callee.object, state, ctx);
      return call(name, target, lowerArguments(node.arguments, state, ctx), node);
    }
  }

  if (t.isIdentifier(callee) && !lookup(state.scope, callee.name)) {
    const args = lowerArguments(node.arguments, state, ctx);
    return opaque(callee.name, args, node, ctx.signatures.get(callee.name)?.returnType);
  }

  if (!t.isExpression(callee)) {
    return opaque('call', lowerArguments(node.arguments, state, ctx), node);
  }
  const target = lowerExpression(callee, state, ctx);
  return call('call', target, lowerArguments(node.arguments, state, ctx), node);
}

function lowerMember(
  node: t.MemberExpression | t.OptionalMemberExpression,
  state: FunctionState,
  ctx: LowerContext
): Expression {
  const loc = location(node);
  if (!t.isExpression(node.object)) {
    return opaque('super', [], node);
  }

  if (node.computed) {
    const target = lowerExpression(node.object, state, ctx);
    const index = t.isExpression(node.property) ? [lowerExpression(node.property, state, ctx)] : [];
    return call('[]', target, index, node);
  }

  const name = memberName(node.property) ?? '<computed>';

  // `x?.p` on a variable: x == null ? null : x!.p
  if (t.isOptionalMemberExpression(node) && node.optional && t.isIdentifier(node.object)) {
    const variable = lookup(state.scope, node.object.name);
    if (variable) {
      return {
        kind: 'conditional',
        condition: {
          kind: 'equality',
          left: { kind: 'variableGet', variable, loc },
          right: { kind: 'nullLiteral', loc },
          negated: false,
          loc,
        },
        then: { kind: 'nullLiteral', loc },
        otherwise: {
          kind: 'propertyGet',
          target: { kind: 'nullCheck', operand: { kind: 'variableGet', variable, loc }, loc },
          name,
          loc,
        },
        loc,
      };
    }
  }

  return { kind: 'propertyGet', target: lowerExpression(node.object, state, ctx), name, loc };
}

// ============================================================================
// Helpers
// ============================================================================

function classType(name: string, ctx: LowerContext): Type {
  switch (name) {
    case 'Array':
      return interfaceType('List', [Types.dynamic]);
    case 'Promise':
      return Types.future(Types.dynamic);
    case 'Object':
      return Types.object;
    case 'String':
      return Types.string;
    case 'Number':
      return Types.num;
    case 'Boolean':
      return Types.bool;
    default:
      return interfaceType(name, Array.from({ length: ctx.classArity.get(name) ?? 0 }, () => Types.dynamic));
  }
}

function call(name: string, target: Expression | null, args: Expression[], node: t.Node): CallExpression {
  return { kind: 'call', name, target, arguments: args, loc: location(node) };
}

/**
 * A call with no receiver whose result type is known up front, or dynamic
 */
function opaque(name: string, args: Expression[], node: t.Node, returnType?: Type): CallExpression {
  const expression = call(name, null, args, node);
  return returnType ? { ...expression, returnType } : expression;
}

function location(node: t.Node): SourceLocation | undefined {
  const start = node.loc?.start;
  return start ? { line: start.line, column: start.column } : undefined;
}

function reportUnsupported(message: string, node: t.Node, ctx: LowerContext): void {
  const loc = location(node);
  ctx.errors.push({ message, line: loc?.line ?? 0, column: loc?.column ?? 0 });
}
