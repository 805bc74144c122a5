/**
 * Assigned-variable pre-pass
 *
 * For every subtree: which variables are assigned somewhere inside it
 * (reachable or not), and which are assigned inside a closure nested in
 * it. Computed bottom-up once, before the main pass, and read-only after.
 */

import type { FlowNode, FunctionUnit, Variable } from '../../types/index.js';
import { childNodes, nestedFunction } from '../../utils/ast-utils.js';

const EMPTY: ReadonlySet<Variable> = new Set();

export class AssignedVariables {
  private readonly assigned = new Map<FlowNode | FunctionUnit, ReadonlySet<Variable>>();
  private readonly captured = new Map<FlowNode | FunctionUnit, ReadonlySet<Variable>>();

  /**
   * Variables assigned anywhere within `node`
   */
  assignedIn(node: FlowNode | FunctionUnit): ReadonlySet<Variable> {
    return this.assigned.get(node) ?? EMPTY;
  }

  /**
   * Variables assigned by closures within `node`
   */
  capturedIn(node: FlowNode | FunctionUnit): ReadonlySet<Variable> {
    return this.captured.get(node) ?? EMPTY;
  }

  /**
   * Assigned(node, variable)
   */
  isAssigned(node: FlowNode | FunctionUnit, variable: Variable): boolean {
    return this.assignedIn(node).has(variable);
  }

  /**
   * Union of `assignedIn` over several nodes
   */
  assignedInAll(nodes: Iterable<FlowNode>): ReadonlySet<Variable> {
    return unionOf([...nodes].map((node) => this.assignedIn(node)));
  }

  /**
   * Union of `capturedIn` over several nodes
   */
  capturedInAll(nodes: Iterable<FlowNode>): ReadonlySet<Variable> {
    return unionOf([...nodes].map((node) => this.capturedIn(node)));
  }

  /** @internal */
  record(
    node: FlowNode | FunctionUnit,
    assigned: ReadonlySet<Variable>,
    captured: ReadonlySet<Variable>
  ): void {
    this.assigned.set(node, assigned);
    this.captured.set(node, captured);
  }
}

/**
 * Run the pre-pass over a function unit and everything nested in it
 */
export function computeAssignedVariables(unit: FunctionUnit): AssignedVariables {
  const result = new AssignedVariables();
  visitFunction(unit, result);
  return result;
}

function visitFunction(unit: FunctionUnit, result: AssignedVariables): ReadonlySet<Variable> {
  const assigned = visitNode(unit.body, result);
  result.record(unit, assigned, result.capturedIn(unit.body));
  return assigned;
}

function visitNode(node: FlowNode, result: AssignedVariables): ReadonlySet<Variable> {
  const assigned = new Set<Variable>();
  const captured = new Set<Variable>();

  const nested = nestedFunction(node);
  if (nested) {
    for (const variable of visitFunction(nested, result)) {
      assigned.add(variable);
      captured.add(variable);
    }
    for (const variable of result.capturedIn(nested)) {
      captured.add(variable);
    }
  }

  switch (node.kind) {
    case 'variableSet':
    case 'ifNullSet':
    case 'forEach':
    case 'localFunction':
      assigned.add(node.variable);
      break;
    case 'declaration':
      if (node.initializer) assigned.add(node.variable);
      break;
    case 'try':
      for (const clause of node.catches) {
        if (clause.exception) assigned.add(clause.exception);
      }
      break;
    default:
      break;
  }

  for (const child of childNodes(node)) {
    for (const variable of visitNode(child, result)) assigned.add(variable);
    for (const variable of result.capturedIn(child)) captured.add(variable);
  }

  result.record(node, assigned, captured);
  return assigned;
}

function unionOf(sets: ReadonlyArray<ReadonlySet<Variable>>): ReadonlySet<Variable> {
  if (sets.length === 1 && sets[0]) return sets[0];
  const union = new Set<Variable>();
  for (const set of sets) {
    for (const variable of set) union.add(variable);
  }
  return union;
}

