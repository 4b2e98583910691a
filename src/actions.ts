import type { Action, Position } from "./types";

/**
 * Fixed iteration order for transitions. Frontier tie-breaks depend on it,
 * so it must never change between runs.
 */
export const ACTIONS: ReadonlyArray<Action> = Object.freeze(["U", "D", "L", "R"] as const);

/** Offset applied to a position by each action. */
export const ACTION_OFFSETS: Readonly<Record<Action, Position>> = Object.freeze({
  U: Object.freeze({ col: 0, row: -1 }),
  D: Object.freeze({ col: 0, row: 1 }),
  L: Object.freeze({ col: -1, row: 0 }),
  R: Object.freeze({ col: 1, row: 0 }),
});

export function isAction(value: unknown): value is Action {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(ACTION_OFFSETS, value);
}
