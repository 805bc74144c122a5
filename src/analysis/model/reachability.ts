/**
 * Reachability stack
 *
 * One boolean per open control-flow split, bottom first. The top is the
 * *local* reachability (relative to the innermost split); the AND of every
 * element is the *overall* reachability (relative to function entry).
 * Splits always push `true`, so code nested inside dead code is analyzed
 * as locally reachable and keeps its promotion data.
 */

export type Reachability = readonly boolean[];

/** Reachability at function entry */
export const ENTRY_REACHABILITY: Reachability = [true];

/**
 * Top of the stack
 */
export function isLocallyReachable(reachable: Reachability): boolean {
  return reachable[reachable.length - 1] ?? false;
}

/**
 * AND of the whole stack
 */
export function isOverallReachable(reachable: Reachability): boolean {
  return reachable.every((entry) => entry);
}

/**
 * Push a fresh `true` for a new split
 */
export function pushSplit(reachable: Reachability): Reachability {
  return [...reachable, true];
}

/**
 * Pop the top, ANDing it into the element below
 */
export function popSplit(reachable: Reachability): Reachability {
  if (reachable.length < 2) {
    throw new Error('Cannot drop the function-entry reachability');
  }
  const top = reachable[reachable.length - 1] ?? false;
  const below = reachable[reachable.length - 2] ?? false;
  return [...reachable.slice(0, -2), below && top];
}

/**
 * Replace the top with `false`
 */
export function markUnreachable(reachable: Reachability): Reachability {
  if (reachable.length === 0) {
    throw new Error('Reachability stack is empty');
  }
  return [...reachable.slice(0, -1), false];
}

/**
 * Element-wise OR of two stacks of equal depth
 */
export function joinReachability(r1: Reachability, r2: Reachability): Reachability {
  if (r1.length !== r2.length) {
    throw new Error(`Cannot join reachability of depth ${r1.length} with depth ${r2.length}`);
  }
  return r1.map((entry, i) => entry || (r2[i] ?? false));
}

/**
 * Element-wise AND of two stacks of equal depth
 */
export function meetReachability(r1: Reachability, r2: Reachability): Reachability {
  if (r1.length !== r2.length) {
    throw new Error(`Cannot restrict reachability of depth ${r1.length} with depth ${r2.length}`);
  }
  return r1.map((entry, i) => entry && (r2[i] ?? false));
}
