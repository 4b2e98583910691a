import type { Position } from "./types";
import { manhattan } from "./position";

export type Heuristic = (state: Position) => number;

/** Manhattan distance to a single target. Used while seeking the key. */
export function targetHeuristic(target: Position): Heuristic {
  return (state) => manhattan(state, target);
}

/**
 * Manhattan distance to the closest of `goals`. Used while seeking a goal.
 *
 * @throws {RangeError} if `goals` is empty.
 */
export function nearestGoalHeuristic(goals: ReadonlyArray<Position>): Heuristic {
  if (goals.length === 0) {
    throw new RangeError("nearestGoalHeuristic needs at least one goal.");
  }
  return (state) => {
    let best = Infinity;
    for (const goal of goals) {
      best = Math.min(best, manhattan(state, goal));
    }
    return best;
  };
}
