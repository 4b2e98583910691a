export type {
  Position,
  Action,
  CellKind,
  ValidationResult,
  TransitionModel,
  SearchNode,
  SearchPhase,
  SearchHooks,
  PathfinderConfig,
  SearchFailureReason,
  SearchFailure,
  SearchSuccess,
  SearchResult,
} from "./types";

export type { MazeOptions } from "./maze";
export type { Heuristic } from "./heuristic";
export type { InvalidMazeReason } from "./errors";

export { MazeProblem, DEFAULT_LEGEND } from "./maze";
export { validateSolution } from "./validate";
export { ACTIONS, ACTION_OFFSETS, isAction } from "./actions";
export {
  createPosition,
  translate,
  samePosition,
  positionKey,
  manhattan,
  formatPosition,
} from "./position";
export { Frontier } from "./frontier";
export { targetHeuristic, nearestGoalHeuristic } from "./heuristic";
export {
  createRootNode,
  createChildNode,
  compareNodes,
  reconstructActions,
} from "./searchNode";
export { createPathfinder, solve, Pathfinder } from "./pathfinder";
export { InvalidMazeError, SearchLimitError } from "./errors";
