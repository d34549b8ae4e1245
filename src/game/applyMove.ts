import type { Cell, Piece } from "../types.ts";
import type { BoardState } from "./board.ts";
import type { Move } from "./moveTypes.ts";
import { movePiece, pieceAt, removePiece } from "./board.ts";
import { promoteIfNeeded } from "./promote.ts";

export interface AppliedMove {
  piece: Piece;
  captured: Piece | null;
  didPromote: boolean;
}

/** The cell strictly between two cells two diagonal steps apart. */
export function midpoint(from: Cell, to: Cell): Cell {
  return { row: (from.row + to.row) / 2, col: (from.col + to.col) / 2 };
}

export function isCaptureDisplacement(from: Cell, to: Cell): boolean {
  return Math.abs(to.row - from.row) >= 2 || Math.abs(to.col - from.col) >= 2;
}

/**
 * Moves the piece on `from` to `to`, removing the jumped piece when the leg
 * spans two cells, then crowns the mover if it reached its far rank.
 * Mutates `board` in place.
 */
export function applyMove(board: BoardState, move: Pick<Move, "from" | "to">): AppliedMove {
  const piece = pieceAt(board, move.from.row, move.from.col);
  if (!piece) {
    throw new Error(`applyMove: no piece at (${move.from.row},${move.from.col})`);
  }

  let captured: Piece | null = null;
  if (isCaptureDisplacement(move.from, move.to)) {
    const over = midpoint(move.from, move.to);
    const victim = pieceAt(board, over.row, over.col);
    if (!victim || victim.owner === piece.owner) {
      throw new Error(`applyMove: no opposing piece to capture at (${over.row},${over.col})`);
    }
    removePiece(board, victim);
    captured = victim;
  }

  movePiece(board, piece, move.to);
  const didPromote = promoteIfNeeded(piece);

  return { piece, captured, didPromote };
}
