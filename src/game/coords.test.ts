import { describe, it, expect } from "vitest";
import { cellId, inBounds, isPlayable, makeCellId, mirrorCell, sameCell } from "./coords.ts";

describe("coords", () => {
  it("makes cell ids", () => {
    expect(makeCellId(3, 5)).toBe("r3c5");
    expect(cellId({ row: 0, col: 7 })).toBe("r0c7");
  });

  it("bounds and playability", () => {
    expect(inBounds(0, 0)).toBe(true);
    expect(inBounds(7, 7)).toBe(true);
    expect(inBounds(-1, 0)).toBe(false);
    expect(inBounds(8, 0)).toBe(false);
    expect(inBounds(1.5, 2)).toBe(false);

    // Dark cells only
    expect(isPlayable(0, 1)).toBe(true);
    expect(isPlayable(0, 0)).toBe(false);
    expect(isPlayable(7, 0)).toBe(true);
    expect(isPlayable(8, 1)).toBe(false);
  });

  it("mirrors a cell into the other player's view", () => {
    expect(mirrorCell({ row: 5, col: 2 })).toEqual({ row: 2, col: 5 });
    expect(mirrorCell({ row: 0, col: 7 })).toEqual({ row: 7, col: 0 });
    expect(sameCell(mirrorCell(mirrorCell({ row: 4, col: 3 })), { row: 4, col: 3 })).toBe(true);
  });
});
