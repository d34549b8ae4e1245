import type { Cell } from "../types.ts";
import { BOARD_SIZE, mirrorCell } from "../game/coords.ts";
import { ProtocolError } from "./errors.ts";

/**
 * Frame layout (one WebSocket message per frame):
 *
 *   %                 quit
 *   *<name>: <text>   chat line
 *   @<name>           handshake (display name)
 *   r0,c0,r1,c1       one move leg
 *   leg+leg+...       capture chain, when longer than SINGLE_MOVE_MAX_LENGTH
 *
 * Outbound legs are mirrored into the peer's view; inbound legs are already
 * in ours and are used as-is.
 */
export const QUIT_FRAME = "%";
export const CHAT_PREFIX = "*";
export const HANDSHAKE_PREFIX = "@";
export const SEGMENT_SEPARATOR = "+";
export const SINGLE_MOVE_MAX_LENGTH = 8;

export interface MoveSegment {
  from: Cell;
  to: Cell;
}

export type InboundMessage =
  | { type: "quit" }
  | { type: "chat"; line: string }
  | { type: "handshake"; name: string }
  | { type: "move"; segments: MoveSegment[] };

export function encodeChat(senderName: string, text: string): string {
  return `${CHAT_PREFIX}${senderName}: ${text}`;
}

export function encodeHandshake(displayName: string): string {
  return `${HANDSHAKE_PREFIX}${displayName}`;
}

function encodeSegment(seg: MoveSegment): string {
  const from = mirrorCell(seg.from);
  const to = mirrorCell(seg.to);
  return `${from.row},${from.col},${to.row},${to.col}`;
}

/** One frame for a whole local turn, every leg in the order it was played. */
export function encodeMove(segments: readonly MoveSegment[]): string {
  if (segments.length === 0) throw new Error("encodeMove: a turn needs at least one leg");
  return segments.map(encodeSegment).join(SEGMENT_SEPARATOR);
}

function decodeSegment(text: string, frame: string): MoveSegment {
  const parts = text.split(",");
  if (parts.length !== 4) {
    throw new ProtocolError(`Move leg "${text}" needs 4 coordinates, got ${parts.length}`, frame);
  }
  const nums = parts.map((p) => {
    if (!/^\d+$/.test(p)) throw new ProtocolError(`Move leg "${text}" has a non-numeric coordinate`, frame);
    const n = Number(p);
    if (n >= BOARD_SIZE) throw new ProtocolError(`Move leg "${text}" leaves the board`, frame);
    return n;
  });
  return {
    from: { row: nums[0], col: nums[1] },
    to: { row: nums[2], col: nums[3] },
  };
}

/** Classifies one inbound frame. Throws ProtocolError on anything malformed. */
export function decodeFrame(frame: string): InboundMessage {
  if (frame.length === 0) throw new ProtocolError("Empty frame", frame);
  if (frame === QUIT_FRAME) return { type: "quit" };
  if (frame.startsWith(CHAT_PREFIX)) return { type: "chat", line: frame.slice(CHAT_PREFIX.length) };
  if (frame.startsWith(HANDSHAKE_PREFIX)) return { type: "handshake", name: frame.slice(HANDSHAKE_PREFIX.length) };

  if (frame.length <= SINGLE_MOVE_MAX_LENGTH) {
    return { type: "move", segments: [decodeSegment(frame, frame)] };
  }
  const segments = frame.split(SEGMENT_SEPARATOR).map((s) => decodeSegment(s, frame));
  return { type: "move", segments };
}
