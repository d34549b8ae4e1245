import type { Cell } from "../types.ts";

export const BOARD_SIZE = 8;

export type CellId = string;

export function makeCellId(r: number, c: number): CellId {
  return `r${r}c${c}`;
}

export function cellId(cell: Cell): CellId {
  return makeCellId(cell.row, cell.col);
}

export function inBounds(r: number, c: number): boolean {
  return Number.isInteger(r) && Number.isInteger(c) && r >= 0 && r < BOARD_SIZE && c >= 0 && c < BOARD_SIZE;
}

/** Pieces only ever stand on the dark cells. */
export function isPlayable(r: number, c: number): boolean {
  return inBounds(r, c) && (r + c) % 2 === 1;
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col;
}

/** Rotates a cell 180° into the peer's view of the board. */
export function mirrorCell(cell: Cell): Cell {
  return { row: BOARD_SIZE - 1 - cell.row, col: BOARD_SIZE - 1 - cell.col };
}
