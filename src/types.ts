/** "home" is this instance's own side (bottom of its board); "away" is the peer's. */
export type Side = "home" | "away";

/** Which end of the connection this process is. */
export type SessionRole = "host" | "client";

export interface Cell { row: number; col: number; }

export interface Piece {
  readonly owner: Side;
  king: boolean;
  row: number;
  col: number;
}

export function otherSide(side: Side): Side {
  return side === "home" ? "away" : "home";
}
