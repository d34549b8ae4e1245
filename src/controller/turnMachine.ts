import type { Cell, SessionRole } from "../types.ts";
import type { BoardState } from "../game/board.ts";
import type { CaptureMove, Move } from "../game/moveTypes.ts";
import { pieceAt } from "../game/board.ts";
import { cellId, sameCell } from "../game/coords.ts";
import { capturesFrom, generateLegalMoves, hasAnotherCaptureFrom, legalSimpleMoves } from "../game/movegen.ts";
import { applyMove } from "../game/applyMove.ts";

export type TurnState =
  | { kind: "AwaitingFirstSelection" }
  | { kind: "ForcedCaptureAvailable"; capturers: Cell[] }
  | { kind: "AwaitingDestination"; selected: Cell; moves: Move[]; forced: boolean }
  | { kind: "ContinuingCaptureChain"; selected: Cell; moves: CaptureMove[] }
  | { kind: "OpponentTurn" };

export type TurnStateKind = TurnState["kind"];

export type SelectionOutcome =
  | { type: "ignored" }
  | { type: "selected" }
  | { type: "deselected" }
  | { type: "moved"; move: Move; didPromote: boolean; turnEnded: boolean };

export interface Transition {
  state: TurnState;
  outcome: SelectionOutcome;
}

/** The state a role opens each game in: the host always moves first. */
export function initialTurnState(role: SessionRole): TurnState {
  return role === "host" ? { kind: "AwaitingFirstSelection" } : { kind: "OpponentTurn" };
}

/** Entry state for the local side's turn, honoring mandatory capture. */
export function startTurn(board: BoardState): TurnState {
  const allLegal = generateLegalMoves(board, "home");
  if (allLegal.length > 0 && allLegal[0].kind === "capture") {
    const seen = new Set<string>();
    const capturers: Cell[] = [];
    for (const m of allLegal) {
      const id = cellId(m.from);
      if (seen.has(id)) continue;
      seen.add(id);
      capturers.push(m.from);
    }
    return { kind: "ForcedCaptureAvailable", capturers };
  }
  return { kind: "AwaitingFirstSelection" };
}

function ignored(state: TurnState): Transition {
  return { state, outcome: { type: "ignored" } };
}

function applyChosenMove(board: BoardState, move: Move): Transition {
  const { piece, didPromote } = applyMove(board, move);

  if (move.kind === "capture" && hasAnotherCaptureFrom(board, piece)) {
    return {
      state: {
        kind: "ContinuingCaptureChain",
        selected: { row: piece.row, col: piece.col },
        moves: capturesFrom(board, piece),
      },
      outcome: { type: "moved", move, didPromote, turnEnded: false },
    };
  }

  return {
    state: { kind: "OpponentTurn" },
    outcome: { type: "moved", move, didPromote, turnEnded: true },
  };
}

/**
 * Feeds one board selection into the turn state machine. Legal destinations
 * are applied to `board` through the rule engine; everything else either
 * leaves the state as it was or clears the current selection.
 */
export function selectCell(board: BoardState, state: TurnState, cell: Cell): Transition {
  switch (state.kind) {
    case "OpponentTurn":
      return ignored(state);

    case "AwaitingFirstSelection": {
      const piece = pieceAt(board, cell.row, cell.col);
      if (!piece || piece.owner !== "home") return ignored(state);
      const targets = legalSimpleMoves(board, piece);
      if (targets.length === 0) return ignored(state);
      return {
        state: {
          kind: "AwaitingDestination",
          selected: cell,
          moves: targets.map((to): Move => ({ kind: "move", from: cell, to })),
          forced: false,
        },
        outcome: { type: "selected" },
      };
    }

    case "ForcedCaptureAvailable": {
      if (!state.capturers.some((c) => sameCell(c, cell))) return ignored(state);
      const piece = pieceAt(board, cell.row, cell.col);
      if (!piece) return ignored(state);
      return {
        state: { kind: "AwaitingDestination", selected: cell, moves: capturesFrom(board, piece), forced: true },
        outcome: { type: "selected" },
      };
    }

    case "AwaitingDestination": {
      const move = state.moves.find((m) => sameCell(m.to, cell));
      if (!move) return { state: startTurn(board), outcome: { type: "deselected" } };
      return applyChosenMove(board, move);
    }

    case "ContinuingCaptureChain": {
      // Switching pieces mid-chain is not allowed.
      const move = state.moves.find((m) => sameCell(m.to, cell));
      if (!move) return ignored(state);
      return applyChosenMove(board, move);
    }
  }
}

/** Cells a presentation layer should highlight for the current state. */
export function selectionOf(state: TurnState): { selected: Cell | null; destinations: Cell[]; capturers: Cell[] } {
  switch (state.kind) {
    case "ForcedCaptureAvailable":
      return { selected: null, destinations: [], capturers: state.capturers };
    case "AwaitingDestination":
    case "ContinuingCaptureChain":
      return { selected: state.selected, destinations: state.moves.map((m) => m.to), capturers: [] };
    default:
      return { selected: null, destinations: [], capturers: [] };
  }
}
