import type { Position } from "./types";

/** Creates a frozen position. */
export function createPosition(col: number, row: number): Position {
  return Object.freeze({ col, row });
}

/**
 * Returns the position reached by moving `position` by `offset`.
 * Neither argument is mutated.
 */
export function translate(position: Position, offset: Position): Position {
  return createPosition(position.col + offset.col, position.row + offset.row);
}

export function samePosition(a: Position, b: Position): boolean {
  return a.col === b.col && a.row === b.row;
}

/**
 * Canonical `"col,row"` key, used wherever positions are stored in a
 * `Set` or `Map`.
 */
export function positionKey(position: Position): string {
  return `${position.col},${position.row}`;
}

export function manhattan(a: Position, b: Position): number {
  return Math.abs(a.col - b.col) + Math.abs(a.row - b.row);
}

export function formatPosition(position: Position): string {
  return `(${position.col}, ${position.row})`;
}
