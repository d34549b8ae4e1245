import type { Cell, Piece, Side } from "../types.ts";
import { BOARD_SIZE, inBounds } from "./coords.ts";

export interface BoardState {
  /** cells[row][col] */
  cells: Array<Array<Piece | null>>;
  pieces: Record<Side, Piece[]>;
}

function assertInBounds(fn: string, r: number, c: number): void {
  if (!inBounds(r, c)) throw new Error(`${fn}: cell (${r},${c}) is off the board`);
}

export function createEmptyBoard(): BoardState {
  const cells: Array<Array<Piece | null>> = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    cells.push(new Array<Piece | null>(BOARD_SIZE).fill(null));
  }
  return { cells, pieces: { home: [], away: [] } };
}

export function pieceAt(board: BoardState, r: number, c: number): Piece | null {
  assertInBounds("pieceAt", r, c);
  return board.cells[r][c];
}

export function isOccupied(board: BoardState, r: number, c: number): boolean {
  return pieceAt(board, r, c) !== null;
}

export function isOccupiedByOpponent(board: BoardState, r: number, c: number, askingSide: Side): boolean {
  const piece = pieceAt(board, r, c);
  return piece !== null && piece.owner !== askingSide;
}

export function placePiece(board: BoardState, owner: Side, cell: Cell, king = false): Piece {
  if (isOccupied(board, cell.row, cell.col)) {
    throw new Error(`placePiece: cell (${cell.row},${cell.col}) is already occupied`);
  }
  const piece: Piece = { owner, king, row: cell.row, col: cell.col };
  board.cells[cell.row][cell.col] = piece;
  board.pieces[owner].push(piece);
  return piece;
}

export function removePiece(board: BoardState, piece: Piece): void {
  assertInBounds("removePiece", piece.row, piece.col);
  if (board.cells[piece.row][piece.col] !== piece) {
    throw new Error(`removePiece: piece is not on (${piece.row},${piece.col})`);
  }
  board.cells[piece.row][piece.col] = null;
  const list = board.pieces[piece.owner];
  const idx = list.indexOf(piece);
  if (idx >= 0) list.splice(idx, 1);
}

export function movePiece(board: BoardState, piece: Piece, to: Cell): void {
  assertInBounds("movePiece", to.row, to.col);
  if (board.cells[piece.row][piece.col] !== piece) {
    throw new Error(`movePiece: piece is not on (${piece.row},${piece.col})`);
  }
  if (board.cells[to.row][to.col] !== null) {
    throw new Error(`movePiece: destination (${to.row},${to.col}) is not empty`);
  }
  board.cells[piece.row][piece.col] = null;
  piece.row = to.row;
  piece.col = to.col;
  board.cells[to.row][to.col] = piece;
}

/** Empties the board in place so existing references stay valid. */
export function clearBoard(board: BoardState): void {
  for (const row of board.cells) row.fill(null);
  board.pieces.home.length = 0;
  board.pieces.away.length = 0;
}

/** Deep copy; pieces in the copy are new objects. */
export function cloneBoard(board: BoardState): BoardState {
  const copy = createEmptyBoard();
  for (const side of ["home", "away"] as const) {
    for (const p of board.pieces[side]) placePiece(copy, p.owner, { row: p.row, col: p.col }, p.king);
  }
  return copy;
}
