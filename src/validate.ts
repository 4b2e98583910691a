import type { Position, TransitionModel, ValidationResult } from "./types";
import { isAction } from "./actions";
import { samePosition } from "./position";

const INVALID: ValidationResult = Object.freeze({ isSolution: false, cost: -1 });

/**
 * Replays `actions` from `model.initial` and reports whether they solve the
 * key-then-goal problem, together with the total entry cost.
 *
 * A step is legal only when it is one of `model.transitions(current)`, so
 * walls and out-of-bounds moves are rejected the same way the search
 * rejects them. When the model defines a key, it must be entered (or be the
 * starting cell) for the sequence to count as a solution.
 *
 * Never throws: every failure is reported as `{ isSolution: false, cost: -1 }`.
 *
 * @example
 * ```ts
 * validateSolution(problem, ["D", "D", "R"]); // { isSolution: true, cost: 3 }
 * validateSolution(problem, null);           // { isSolution: false, cost: -1 }
 * ```
 */
export function validateSolution(
  model: TransitionModel,
  actions: ReadonlyArray<string> | null | undefined
): ValidationResult {
  if (actions === null || actions === undefined || actions.length === 0) {
    return INVALID;
  }

  const key = model.key;
  let current: Position = model.initial;
  let hasKey = key === null || samePosition(current, key);
  let cost = 0;

  for (const action of actions) {
    if (!isAction(action)) {
      return INVALID;
    }
    const next = model.transitions(current).get(action);
    if (next === undefined) {
      return INVALID;
    }
    current = next;
    if (key !== null && samePosition(current, key)) {
      hasKey = true;
    }
    cost += model.cost(current);
  }

  if (!hasKey || !model.isGoal(current)) {
    return INVALID;
  }
  return { isSolution: true, cost };
}
