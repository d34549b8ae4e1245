import type { Piece, Side } from "../types.ts";
import { BOARD_SIZE } from "./coords.ts";

export function farRank(side: Side): number {
  return side === "home" ? 0 : BOARD_SIZE - 1;
}

/**
 * Crown a man that stands on its far rank. Kings never revert, so this only
 * ever flips the flag from false to true.
 * @returns true if promotion occurred
 */
export function promoteIfNeeded(piece: Piece): boolean {
  if (piece.king) return false;
  if (piece.row !== farRank(piece.owner)) return false;
  piece.king = true;
  return true;
}
