import type { Side } from "../types.ts";
import type { BoardState } from "./board.ts";

/**
 * The side that has run out of pieces, or null while both still have some.
 * If both lists are somehow empty, home is reported first.
 */
export function loser(board: BoardState): Side | null {
  if (board.pieces.home.length === 0) return "home";
  if (board.pieces.away.length === 0) return "away";
  return null;
}

export function isGameOver(board: BoardState): boolean {
  return loser(board) !== null;
}
