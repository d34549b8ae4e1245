import type { Cell } from "../types.ts";

export interface QuietMove {
  kind: "move";
  from: Cell;
  to: Cell;
}

export interface CaptureMove {
  kind: "capture";
  from: Cell;
  over: Cell;
  to: Cell;
}

export type Move = QuietMove | CaptureMove;
