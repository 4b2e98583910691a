import type { Action, Position, SearchNode } from "./types";

export function createRootNode(state: Position): SearchNode {
  return Object.freeze({ state, action: null, parent: null, costSoFar: 0, priority: 0 });
}

/**
 * Builds the successor of `parent` reached via `action`.
 *
 * @param stepCost  Cost of entering `state`.
 * @param heuristic Estimated remaining cost from `state`.
 */
export function createChildNode(
  parent: SearchNode,
  action: Action,
  state: Position,
  stepCost: number,
  heuristic: number
): SearchNode {
  const costSoFar = parent.costSoFar + stepCost;
  return Object.freeze({
    state,
    action,
    parent,
    costSoFar,
    priority: costSoFar + heuristic,
  });
}

/** Ascending by priority. */
export function compareNodes(a: SearchNode, b: SearchNode): number {
  return a.priority - b.priority;
}

/**
 * Walks parent links from `node` back to the root and returns the actions
 * in root-to-node order. The root contributes no action.
 */
export function reconstructActions(node: SearchNode): Action[] {
  const actions: Action[] = [];
  let current: SearchNode | null = node;
  while (current !== null) {
    if (current.action !== null) {
      actions.push(current.action);
    }
    current = current.parent;
  }
  return actions.reverse();
}
