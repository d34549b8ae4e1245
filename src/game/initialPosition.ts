import type { Cell } from "../types.ts";
import type { BoardState } from "./board.ts";
import { clearBoard, createEmptyBoard, placePiece } from "./board.ts";
import { BOARD_SIZE, isPlayable } from "./coords.ts";

export const PIECES_PER_SIDE = 12;

function computePlayableCellsForRow(r: number): Cell[] {
  const res: Cell[] = [];
  for (let c = 0; c < BOARD_SIZE; c++) {
    if (isPlayable(r, c)) res.push({ row: r, col: c });
  }
  return res;
}

function computeStartCells(rows: readonly number[]): Cell[] {
  return rows.flatMap((r) => computePlayableCellsForRow(r));
}

/** The peer's pieces fill the top three rows, ours the bottom three. */
export const AWAY_START_CELLS: readonly Cell[] = computeStartCells([0, 1, 2]);
export const HOME_START_CELLS: readonly Cell[] = computeStartCells([5, 6, 7]);

/**
 * Resets `board` to the 24-piece opening layout. The same BoardState object is
 * reused so that sessions and observers holding it keep seeing the live board.
 */
export function setupInitialPosition(board: BoardState): BoardState {
  clearBoard(board);
  for (const cell of AWAY_START_CELLS) placePiece(board, "away", cell);
  for (const cell of HOME_START_CELLS) placePiece(board, "home", cell);
  return board;
}

export function createInitialBoard(): BoardState {
  return setupInitialPosition(createEmptyBoard());
}
