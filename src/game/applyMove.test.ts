import { describe, it, expect } from "vitest";
import { createEmptyBoard, pieceAt, placePiece } from "./board.ts";
import { applyMove, isCaptureDisplacement, midpoint } from "./applyMove.ts";
import { farRank, promoteIfNeeded } from "./promote.ts";

describe("applyMove", () => {
  it("applies a quiet move", () => {
    const board = createEmptyBoard();
    const p = placePiece(board, "home", { row: 5, col: 2 });
    const res = applyMove(board, { from: { row: 5, col: 2 }, to: { row: 4, col: 3 } });
    expect(res).toEqual({ piece: p, captured: null, didPromote: false });
    expect(pieceAt(board, 4, 3)).toBe(p);
    expect(pieceAt(board, 5, 2)).toBeNull();
  });

  it("removes the jumped piece on a capture leg", () => {
    const board = createEmptyBoard();
    placePiece(board, "away", { row: 2, col: 1 });
    const victim = placePiece(board, "home", { row: 3, col: 2 });
    const res = applyMove(board, { from: { row: 2, col: 1 }, to: { row: 4, col: 3 } });
    expect(res.captured).toBe(victim);
    expect(pieceAt(board, 3, 2)).toBeNull();
    expect(board.pieces.home).toHaveLength(0);
    expect(pieceAt(board, 4, 3)?.owner).toBe("away");
  });

  it("promotes on reaching the far rank, including mid-chain", () => {
    const board = createEmptyBoard();
    const p = placePiece(board, "home", { row: 2, col: 5 });
    placePiece(board, "away", { row: 1, col: 4 });
    placePiece(board, "away", { row: 1, col: 2 });

    const res = applyMove(board, { from: { row: 2, col: 5 }, to: { row: 0, col: 3 } });
    expect(res.didPromote).toBe(true);
    expect(p.king).toBe(true);

    // Crowned mid-chain, so the next leg may run backward.
    const next = applyMove(board, { from: { row: 0, col: 3 }, to: { row: 2, col: 1 } });
    expect(next.didPromote).toBe(false);
    expect(next.captured?.row).toBe(1);
    expect(board.pieces.away).toHaveLength(0);
  });

  it("throws when there is nothing to move or capture", () => {
    const board = createEmptyBoard();
    expect(() => applyMove(board, { from: { row: 5, col: 2 }, to: { row: 4, col: 3 } })).toThrow(
      "applyMove: no piece at (5,2)"
    );
    placePiece(board, "home", { row: 5, col: 2 });
    placePiece(board, "home", { row: 4, col: 3 });
    expect(() => applyMove(board, { from: { row: 5, col: 2 }, to: { row: 3, col: 4 } })).toThrow(
      "applyMove: no opposing piece to capture at (4,3)"
    );
  });

  it("geometry helpers", () => {
    expect(midpoint({ row: 5, col: 2 }, { row: 3, col: 4 })).toEqual({ row: 4, col: 3 });
    expect(isCaptureDisplacement({ row: 5, col: 2 }, { row: 3, col: 4 })).toBe(true);
    expect(isCaptureDisplacement({ row: 5, col: 2 }, { row: 4, col: 3 })).toBe(false);
  });
});

describe("promoteIfNeeded", () => {
  it("crowns men on their far rank only", () => {
    expect(farRank("home")).toBe(0);
    expect(farRank("away")).toBe(7);
    expect(promoteIfNeeded({ owner: "away", king: false, row: 7, col: 0 })).toBe(true);
    expect(promoteIfNeeded({ owner: "away", king: false, row: 0, col: 1 })).toBe(false);
    expect(promoteIfNeeded({ owner: "home", king: true, row: 0, col: 1 })).toBe(false);
  });
});
