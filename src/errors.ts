import type { Position } from "./types";

/**
 * Reason codes carried by {@link InvalidMazeError}.
 */
export type InvalidMazeReason =
  | "EMPTY_GRID"
  | "RAGGED_ROWS"
  | "UNRECOGNIZED_SYMBOL"
  | "MISSING_INITIAL"
  | "DUPLICATE_INITIAL"
  | "DUPLICATE_KEY"
  | "NO_GOALS"
  | "INVALID_COST";

/**
 * Thrown while constructing a {@link MazeProblem} from a grid that cannot
 * describe a solvable configuration (no initial cell, an unknown symbol,
 * ragged rows...). No search ever runs on such a grid.
 *
 * @example
 * ```ts
 * try {
 *   MazeProblem.fromRows(["XXX", "X?X", "XXX"]);
 * } catch (err) {
 *   if (err instanceof InvalidMazeError) {
 *     console.error(err.reason, err.position);
 *   }
 * }
 * ```
 */
export class InvalidMazeError extends Error {
  readonly reason: InvalidMazeReason;
  /** The offending cell, when the problem is tied to one. */
  readonly position: Position | undefined;

  constructor(reason: InvalidMazeReason, detail: string, position?: Position) {
    super(`Invalid maze (${reason}): ${detail}`);
    this.name = "InvalidMazeError";
    this.reason = reason;
    this.position = position;
  }
}

/**
 * Thrown when a search configured with `maxExpansions` pops more nodes than
 * allowed.
 *
 * @example
 * ```ts
 * try {
 *   createPathfinder({ problem, maxExpansions: 10_000 }).search();
 * } catch (err) {
 *   if (err instanceof SearchLimitError) {
 *     console.error(`Gave up after ${err.maxExpansions} expansions`);
 *   }
 * }
 * ```
 */
export class SearchLimitError extends Error {
  readonly maxExpansions: number;

  constructor(maxExpansions: number) {
    super(`Pathfinder exceeded the maximum of ${maxExpansions} node expansions.`);
    this.name = "SearchLimitError";
    this.maxExpansions = maxExpansions;
  }
}
