import type { Cell, Piece, Side } from "../types.ts";
import type { BoardState } from "./board.ts";
import type { CaptureMove, Move, QuietMove } from "./moveTypes.ts";
import { isOccupied, isOccupiedByOpponent } from "./board.ts";
import { inBounds } from "./coords.ts";

type Delta = { dr: number; dc: number };

const ALL_DIAGONALS: readonly Delta[] = [
  { dr: -1, dc: -1 },
  { dr: -1, dc: +1 },
  { dr: +1, dc: -1 },
  { dr: +1, dc: +1 },
];

/** Home men advance toward row 0, away men toward row 7. */
export function forwardDirection(side: Side): number {
  return side === "home" ? -1 : +1;
}

function directionsFor(piece: Piece): readonly Delta[] {
  if (piece.king) return ALL_DIAGONALS;
  const dr = forwardDirection(piece.owner);
  return [
    { dr, dc: -1 },
    { dr, dc: +1 },
  ];
}

export function legalSimpleMoves(board: BoardState, piece: Piece): Cell[] {
  const out: Cell[] = [];
  for (const { dr, dc } of directionsFor(piece)) {
    const nr = piece.row + dr;
    const nc = piece.col + dc;
    if (!inBounds(nr, nc)) continue;
    if (isOccupied(board, nr, nc)) continue;
    out.push({ row: nr, col: nc });
  }
  return out;
}

export function capturesFrom(board: BoardState, piece: Piece): CaptureMove[] {
  const out: CaptureMove[] = [];
  const from: Cell = { row: piece.row, col: piece.col };
  for (const { dr, dc } of directionsFor(piece)) {
    const overR = piece.row + dr;
    const overC = piece.col + dc;
    const toR = piece.row + 2 * dr;
    const toC = piece.col + 2 * dc;
    if (!inBounds(toR, toC)) continue;
    if (!isOccupiedByOpponent(board, overR, overC, piece.owner)) continue;
    if (isOccupied(board, toR, toC)) continue;
    out.push({ kind: "capture", from, over: { row: overR, col: overC }, to: { row: toR, col: toC } });
  }
  return out;
}

/** Every capture open to `side`, in no particular order of preference. */
export function legalCaptures(board: BoardState, side: Side): CaptureMove[] {
  return board.pieces[side].flatMap((piece) => capturesFrom(board, piece));
}

export function hasAnotherCaptureFrom(board: BoardState, piece: Piece): boolean {
  return capturesFrom(board, piece).length > 0;
}

/** Captures when any exist (mandatory capture), otherwise every simple move. */
export function generateLegalMoves(board: BoardState, side: Side): Move[] {
  const captures = legalCaptures(board, side);
  if (captures.length > 0) return captures;

  const moves: QuietMove[] = [];
  for (const piece of board.pieces[side]) {
    const from: Cell = { row: piece.row, col: piece.col };
    for (const to of legalSimpleMoves(board, piece)) {
      moves.push({ kind: "move", from, to });
    }
  }
  return moves;
}
