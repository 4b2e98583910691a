import type {
  Action,
  PathfinderConfig,
  Position,
  SearchHooks,
  SearchNode,
  SearchPhase,
  SearchResult,
  TransitionModel,
} from "./types";
import { SearchLimitError } from "./errors";
import { Frontier } from "./frontier";
import { nearestGoalHeuristic, targetHeuristic, type Heuristic } from "./heuristic";
import { positionKey, samePosition } from "./position";
import {
  compareNodes,
  createChildNode,
  createRootNode,
  reconstructActions,
} from "./searchNode";

export { SearchLimitError } from "./errors";

/** Mutable counters shared by both phases of one search. */
interface SearchContext {
  problem: TransitionModel;
  hooks: SearchHooks | undefined;
  maxExpansions: number;
  expansions: number;
}

function resolveMaxExpansions(value: number | undefined): number {
  if (value === undefined) {
    return Infinity;
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`maxExpansions must be a positive integer, got ${value}.`);
  }
  return value;
}

/**
 * One best-first sub-search from `start` until a successor satisfies
 * `isTarget`, with a fresh frontier and visited set.
 *
 * A state is marked visited when one of its successors is first accepted
 * for insertion, i.e. while it is being expanded. Successors already in the
 * visited set are skipped, but the same state may sit in the frontier more
 * than once under different parents.
 *
 * @returns The terminal node, or `null` once the frontier is exhausted.
 */
function runPhase(
  phase: SearchPhase,
  start: Position,
  heuristic: Heuristic,
  isTarget: (state: Position) => boolean,
  ctx: SearchContext
): SearchNode | null {
  const { problem, hooks } = ctx;
  const visited = new Set<string>();
  const frontier = new Frontier<SearchNode>(compareNodes);
  frontier.push(createRootNode(start));

  hooks?.onPhaseStart?.(phase, start);

  let expanding = frontier.pop();
  while (expanding !== undefined) {
    ctx.expansions++;
    if (ctx.expansions > ctx.maxExpansions) {
      throw new SearchLimitError(ctx.maxExpansions);
    }
    hooks?.onNodeExpand?.(expanding.state, phase, ctx.expansions);

    for (const [action, successor] of problem.transitions(expanding.state)) {
      if (visited.has(positionKey(successor))) {
        continue;
      }
      visited.add(positionKey(expanding.state));

      const child = createChildNode(
        expanding,
        action,
        successor,
        problem.cost(successor),
        heuristic(successor)
      );
      if (isTarget(child.state)) {
        hooks?.onPhaseComplete?.(phase, child);
        return child;
      }
      frontier.push(child);
    }
    expanding = frontier.pop();
  }

  hooks?.onPhaseComplete?.(phase, null);
  return null;
}

/**
 * Creates a two-phase pathfinder for a single problem: first reach the key
 * (skipped when the problem has none), then reach the nearest goal.
 *
 * @throws {RangeError} if `maxExpansions` is given but is not a positive integer.
 *
 * @example
 * ```ts
 * const result = createPathfinder({ problem }).search();
 * if (result.success) {
 *   console.log(result.actions.join(""), result.cost);
 * }
 * ```
 */
export function createPathfinder(config: PathfinderConfig) {
  const maxExpansions = resolveMaxExpansions(config.maxExpansions);

  return {
    /**
     * Runs both phases and returns either the concatenated action sequence
     * or a failure descriptor.
     *
     * @throws {SearchLimitError} when `maxExpansions` is exceeded.
     */
    search(): SearchResult {
      const { problem } = config;
      const ctx: SearchContext = {
        problem,
        hooks: config.hooks,
        maxExpansions,
        expansions: 0,
      };

      let start = problem.initial;
      let keyActions: Action[] = [];
      let keyCost = 0;

      // Starting on the key already holds it.
      const key = problem.key;
      if (key !== null && !samePosition(start, key)) {
        const reachedKey = runPhase(
          "key",
          start,
          targetHeuristic(key),
          (state) => samePosition(state, key),
          ctx
        );
        if (reachedKey === null) {
          return { success: false, reason: "KEY_UNREACHABLE", expansions: ctx.expansions };
        }
        keyActions = reconstructActions(reachedKey);
        keyCost = reachedKey.costSoFar;
        start = reachedKey.state;
      }

      // An empty goal set can never be satisfied.
      if (problem.goals.length === 0) {
        return { success: false, reason: "GOAL_UNREACHABLE", expansions: ctx.expansions };
      }

      const reachedGoal = runPhase(
        "goal",
        start,
        nearestGoalHeuristic(problem.goals),
        (state) => problem.isGoal(state),
        ctx
      );
      if (reachedGoal === null) {
        return { success: false, reason: "GOAL_UNREACHABLE", expansions: ctx.expansions };
      }

      return {
        success: true,
        actions: [...keyActions, ...reconstructActions(reachedGoal)],
        cost: keyCost + reachedGoal.costSoFar,
        expansions: ctx.expansions,
      };
    },
  };
}

/**
 * Solves `problem` and returns the action sequence, or `null` when no
 * solution exists. A solved result is never empty.
 */
export function solve(problem: TransitionModel): Action[] | null {
  const result = createPathfinder({ problem }).search();
  return result.success ? [...result.actions] : null;
}

/**
 * Reusable pathfinder bound to a set of hooks and an optional expansion limit.
 *
 * @example
 * ```ts
 * const pathfinder = new Pathfinder({ onPhaseStart: (phase) => console.log(phase) });
 * const actions = pathfinder.solve(MazeProblem.fromRows(rows));
 * ```
 */
export class Pathfinder {
  constructor(
    private readonly hooks?: SearchHooks,
    private readonly maxExpansions?: number
  ) {}

  /**
   * Runs the two-phase search against `problem`.
   *
   * @returns A {@link SearchResult} with either the actions and their cost or a failure reason.
   */
  search(problem: TransitionModel): SearchResult {
    return createPathfinder({
      problem,
      hooks: this.hooks,
      maxExpansions: this.maxExpansions,
    }).search();
  }

  /** Same as {@link search}, reduced to the action list or `null`. */
  solve(problem: TransitionModel): Action[] | null {
    const result = this.search(problem);
    return result.success ? [...result.actions] : null;
  }
}
