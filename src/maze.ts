import type {
  Action,
  CellKind,
  Position,
  TransitionModel,
  ValidationResult,
} from "./types";
import { InvalidMazeError } from "./errors";
import { ACTIONS, ACTION_OFFSETS } from "./actions";
import { createPosition, formatPosition, positionKey, translate } from "./position";
import { validateSolution } from "./validate";

/**
 * Symbol table used by {@link MazeProblem.fromRows} when no legend is given.
 */
export const DEFAULT_LEGEND: Readonly<Record<string, CellKind>> = Object.freeze({
  X: "wall",
  ".": "open",
  M: "difficult",
  I: "initial",
  K: "key",
  G: "goal",
});

/**
 * Options accepted by the {@link MazeProblem} constructors.
 */
export interface MazeOptions {
  /** Cost of entering any passable cell that is not difficult terrain. Defaults to 1. */
  openCost?: number;
  /** Cost of entering a difficult-terrain cell. Defaults to 3. */
  difficultCost?: number;
  /**
   * Extra or overriding symbol mappings merged over {@link DEFAULT_LEGEND}.
   * Only consulted by {@link MazeProblem.fromRows}.
   */
  legend?: Readonly<Record<string, CellKind>>;
}

const DEFAULT_OPEN_COST = 1;
const DEFAULT_DIFFICULT_COST = 3;

function resolveCost(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidMazeError("INVALID_COST", `${name} must be a positive integer, got ${value}.`);
  }
  return value;
}

/**
 * A grid-backed {@link TransitionModel}. The grid is scanned once at
 * construction to locate the initial, key and goal cells; afterwards the
 * instance is read-only.
 *
 * @example
 * ```ts
 * const problem = MazeProblem.fromRows([
 *   "XXXXX",
 *   "XI..X",
 *   "X.X.X",
 *   "X.G.X",
 *   "XXXXX",
 * ]);
 * problem.transitions(problem.initial); // Map { "D" => (1, 2), "R" => (2, 1) }
 * ```
 */
export class MazeProblem implements TransitionModel {
  readonly rows: number;
  readonly cols: number;

  private readonly _grid: ReadonlyArray<ReadonlyArray<CellKind>>;
  private readonly _initial: Position;
  private readonly _key: Position | null;
  private readonly _goals: ReadonlyArray<Position>;
  private readonly _goalKeys: ReadonlySet<string>;
  private readonly _openCost: number;
  private readonly _difficultCost: number;

  /**
   * @throws {InvalidMazeError} if the grid is empty or ragged, lacks an
   *   initial cell or a goal, has more than one initial or key cell, or if
   *   a cost option is not a positive integer.
   */
  constructor(grid: ReadonlyArray<ReadonlyArray<CellKind>>, options: MazeOptions = {}) {
    this._openCost = resolveCost("openCost", options.openCost, DEFAULT_OPEN_COST);
    this._difficultCost = resolveCost(
      "difficultCost",
      options.difficultCost,
      DEFAULT_DIFFICULT_COST
    );

    this.rows = grid.length;
    this.cols = this.rows === 0 ? 0 : grid[0].length;
    if (this.cols === 0) {
      throw new InvalidMazeError("EMPTY_GRID", "the grid has no cells.");
    }

    let initial: Position | null = null;
    let key: Position | null = null;
    const goals: Position[] = [];
    const rows: CellKind[][] = [];

    for (let row = 0; row < this.rows; row++) {
      if (grid[row].length !== this.cols) {
        throw new InvalidMazeError(
          "RAGGED_ROWS",
          `row ${row} has ${grid[row].length} cells, expected ${this.cols}.`
        );
      }
      rows.push([...grid[row]]);
      for (let col = 0; col < this.cols; col++) {
        const here = createPosition(col, row);
        switch (grid[row][col]) {
          case "initial":
            if (initial !== null) {
              throw new InvalidMazeError(
                "DUPLICATE_INITIAL",
                `second initial cell at ${formatPosition(here)}.`,
                here
              );
            }
            initial = here;
            break;
          case "key":
            if (key !== null) {
              throw new InvalidMazeError(
                "DUPLICATE_KEY",
                `second key cell at ${formatPosition(here)}.`,
                here
              );
            }
            key = here;
            break;
          case "goal":
            goals.push(here);
            break;
          case "wall":
          case "open":
          case "difficult":
            break;
          default:
            throw new InvalidMazeError(
              "UNRECOGNIZED_SYMBOL",
              `cell kind "${String(grid[row][col])}" at ${formatPosition(here)} is not recognized.`,
              here
            );
        }
      }
    }

    if (initial === null) {
      throw new InvalidMazeError("MISSING_INITIAL", "the grid has no initial cell.");
    }
    if (goals.length === 0) {
      throw new InvalidMazeError("NO_GOALS", "the grid has no goal cell.");
    }

    this._grid = rows;
    this._initial = initial;
    this._key = key;
    this._goals = Object.freeze(goals);
    this._goalKeys = new Set(goals.map(positionKey));
  }

  /**
   * Builds a problem from its textual form, one string per row, mapping each
   * character through the legend.
   *
   * @throws {InvalidMazeError} with reason `UNRECOGNIZED_SYMBOL` for a
   *   character missing from the legend, plus every constructor failure.
   */
  static fromRows(rows: ReadonlyArray<string>, options: MazeOptions = {}): MazeProblem {
    const legend: Readonly<Record<string, CellKind>> = { ...DEFAULT_LEGEND, ...options.legend };
    const grid = rows.map((line, row) =>
      Array.from(line, (symbol, col): CellKind => {
        if (!Object.prototype.hasOwnProperty.call(legend, symbol)) {
          const here = createPosition(col, row);
          throw new InvalidMazeError(
            "UNRECOGNIZED_SYMBOL",
            `symbol "${symbol}" at ${formatPosition(here)} is not in the legend.`,
            here
          );
        }
        return legend[symbol];
      })
    );
    return new MazeProblem(grid, options);
  }

  get initial(): Position {
    return this._initial;
  }

  get key(): Position | null {
    return this._key;
  }

  get goals(): ReadonlyArray<Position> {
    return this._goals;
  }

  /**
   * Returns the cell kind at `position`, or `undefined` when it lies
   * outside the grid.
   */
  cellAt(position: Position): CellKind | undefined {
    if (!this.inBounds(position)) {
      return undefined;
    }
    return this._grid[position.row][position.col];
  }

  isGoal(state: Position): boolean {
    return this._goalKeys.has(positionKey(state));
  }

  cost(state: Position): number {
    return this.cellAt(state) === "difficult" ? this._difficultCost : this._openCost;
  }

  /**
   * Lists the in-bounds, non-wall neighbours of `state` in `ACTIONS` order.
   */
  transitions(state: Position): ReadonlyMap<Action, Position> {
    const result = new Map<Action, Position>();
    for (const action of ACTIONS) {
      const next = translate(state, ACTION_OFFSETS[action]);
      const cell = this.cellAt(next);
      if (cell !== undefined && cell !== "wall") {
        result.set(action, next);
      }
    }
    return result;
  }

  validate(actions: ReadonlyArray<string> | null | undefined): ValidationResult {
    return validateSolution(this, actions);
  }

  private inBounds(position: Position): boolean {
    return (
      position.row >= 0 &&
      position.row < this.rows &&
      position.col >= 0 &&
      position.col < this.cols
    );
  }
}
