/**
 * A cell coordinate in the grid. Column 0 / row 0 is the upper-left corner;
 * rows grow downward and columns grow to the right.
 */
export interface Position {
  readonly col: number;
  readonly row: number;
}

/**
 * One of the four directional moves available from any cell.
 */
export type Action = "U" | "D" | "L" | "R";

/**
 * Classification of a single grid cell as seen by the search core.
 */
export type CellKind = "wall" | "open" | "difficult" | "initial" | "key" | "goal";

/**
 * The result of replaying a candidate action sequence against a model.
 * `cost` is `-1` whenever `isSolution` is false.
 */
export interface ValidationResult {
  readonly isSolution: boolean;
  readonly cost: number;
}

/**
 * The problem description consumed by the pathfinder: legal moves, entry
 * costs, the initial / key / goal positions and a solution checker.
 *
 * Implementations must be read-only for the duration of a search.
 */
export interface TransitionModel {
  /** Where every search and every validation replay starts. */
  readonly initial: Position;
  /** The cell that must be visited before any goal, or `null` when there is none. */
  readonly key: Position | null;
  readonly goals: ReadonlyArray<Position>;
  /**
   * Legal moves from `state`, mapped to the positions they lead to.
   * Iteration order must be deterministic.
   */
  transitions(state: Position): ReadonlyMap<Action, Position>;
  /** Positive cost of entering `state`. Never queried for walls. */
  cost(state: Position): number;
  isGoal(state: Position): boolean;
  /** Total over every input, including `null` and empty sequences. */
  validate(actions: ReadonlyArray<string> | null | undefined): ValidationResult;
}

/**
 * A node in the search tree. Only the parent-ward link is stored, so nodes
 * form a tree whose root has `action === null` and `parent === null`.
 */
export interface SearchNode {
  readonly state: Position;
  /** The action that led from `parent` to this node. */
  readonly action: Action | null;
  readonly parent: SearchNode | null;
  readonly costSoFar: number;
  /** `costSoFar` plus the heuristic estimate; the frontier orders by this. */
  readonly priority: number;
}

/**
 * The two sequential sub-searches: reach the key, then reach a goal.
 */
export type SearchPhase = "key" | "goal";

/**
 * Optional observability callbacks invoked synchronously during search.
 * None of them can influence the result.
 */
export interface SearchHooks {
  /** Called when a phase begins, with the state its root node represents. */
  onPhaseStart?: (phase: SearchPhase, start: Position) => void;
  /**
   * Called each time a node is popped from the frontier.
   * `expansions` is the running total across both phases.
   */
  onNodeExpand?: (state: Position, phase: SearchPhase, expansions: number) => void;
  /** Called when a phase ends; `terminal` is `null` if the phase failed. */
  onPhaseComplete?: (phase: SearchPhase, terminal: SearchNode | null) => void;
}

/**
 * Configuration options accepted by {@link createPathfinder}.
 */
export interface PathfinderConfig {
  problem: TransitionModel;
  hooks?: SearchHooks;
  /**
   * Upper bound on node expansions across both phases. Exceeding it throws
   * a `SearchLimitError`. Unbounded when omitted.
   */
  maxExpansions?: number;
}

/**
 * Reason codes returned when no solution exists.
 */
export type SearchFailureReason = "KEY_UNREACHABLE" | "GOAL_UNREACHABLE";

/**
 * Returned when the key (if any) and then a goal were both reached.
 */
export interface SearchSuccess {
  success: true;
  /** Key-phase actions followed by goal-phase actions. */
  actions: ReadonlyArray<Action>;
  cost: number;
  expansions: number;
}

/**
 * Returned when either phase exhausts its frontier.
 */
export interface SearchFailure {
  success: false;
  reason: SearchFailureReason;
  expansions: number;
}

/**
 * Union result type returned by `createPathfinder().search()`.
 */
export type SearchResult = SearchSuccess | SearchFailure;
