import type { Cell, SessionRole } from "../types.ts";
import type { BoardState } from "../game/board.ts";
import type { SessionTransport } from "../driver/sessionTransport.ts";
import type { MoveSegment } from "../shared/wireProtocol.ts";
import type { SessionObserver } from "./notificationBus.ts";
import type { TurnState, TurnStateKind } from "./turnMachine.ts";
import { cloneBoard, pieceAt } from "../game/board.ts";
import { inBounds } from "../game/coords.ts";
import { createInitialBoard, setupInitialPosition } from "../game/initialPosition.ts";
import { applyMove, isCaptureDisplacement, midpoint } from "../game/applyMove.ts";
import { loser } from "../game/gameOver.ts";
import { ProtocolError } from "../shared/errors.ts";
import { QUIT_FRAME, decodeFrame, encodeChat, encodeHandshake, encodeMove } from "../shared/wireProtocol.ts";
import { NotificationBus } from "./notificationBus.ts";
import { initialTurnState, selectCell, selectionOf, startTurn } from "./turnMachine.ts";

export const DEFAULT_NAMES: Readonly<Record<SessionRole, string>> = {
  host: "Player 1",
  client: "Player 2",
};

export interface GameSessionOptions {
  role: SessionRole;
  /** Display name for our own role; the role's default name is used when omitted or blank. */
  localName?: string;
  observers?: Iterable<SessionObserver>;
}

export interface SessionSnapshot {
  role: SessionRole;
  active: boolean;
  names: Record<SessionRole, string>;
  scores: Record<SessionRole, number>;
  turn: TurnStateKind;
  turnName: string;
  chatLines: number;
}

export function peerRole(role: SessionRole): SessionRole {
  return role === "host" ? "client" : "host";
}

/**
 * Checks that an inbound leg describes a real move of one of the peer's
 * pieces on our board. Legality beyond that is the peer's responsibility.
 */
function checkInboundLeg(board: BoardState, leg: MoveSegment, frame: string): void {
  const { from, to } = leg;
  const mover = pieceAt(board, from.row, from.col);
  if (!mover || mover.owner !== "away") {
    throw new ProtocolError(`No opposing piece at (${from.row},${from.col})`, frame);
  }

  const dr = Math.abs(to.row - from.row);
  const dc = Math.abs(to.col - from.col);
  if (dr !== dc || (dr !== 1 && dr !== 2)) {
    throw new ProtocolError(`Leg (${from.row},${from.col})->(${to.row},${to.col}) is not a diagonal step or jump`, frame);
  }
  if (pieceAt(board, to.row, to.col)) {
    throw new ProtocolError(`Landing cell (${to.row},${to.col}) is occupied`, frame);
  }
  if (isCaptureDisplacement(from, to)) {
    const over = midpoint(from, to);
    const victim = pieceAt(board, over.row, over.col);
    if (!victim || victim.owner !== "home") {
      throw new ProtocolError(`Jump over (${over.row},${over.col}) has nothing to capture`, frame);
    }
  }
}

/**
 * One side of a two-player game: owns the board, the turn state, names,
 * scores and chat, and keeps them in step with the peer over a transport.
 *
 * Local selections and inbound frames share a single action chain, so a
 * frame is always decoded, applied and announced before the next selection
 * (or frame) is looked at.
 */
export class GameSession {
  readonly role: SessionRole;

  private readonly board: BoardState;
  private turn: TurnState;
  private readonly bus: NotificationBus;
  private transport: SessionTransport | null = null;
  private readonly chat: string[] = [];
  private readonly names: Record<SessionRole, string>;
  private readonly scores: Record<SessionRole, number> = { host: 0, client: 0 };
  /** Legs of the local turn in progress, sent as one frame when it ends. */
  private turnLegs: MoveSegment[] = [];
  private ended = false;
  private actionChain: Promise<void> = Promise.resolve();

  constructor(opts: GameSessionOptions) {
    this.role = opts.role;
    this.board = createInitialBoard();
    this.turn = initialTurnState(opts.role);
    this.bus = new NotificationBus(opts.observers ?? []);

    const localName = opts.localName?.trim();
    this.names = { ...DEFAULT_NAMES };
    if (localName) this.names[opts.role] = localName;
  }

  subscribe(observer: SessionObserver): () => void {
    return this.bus.subscribe(observer);
  }

  /** Binds the connection, starts reading from it and introduces ourselves. */
  attach(transport: SessionTransport): void {
    if (this.transport) throw new Error("GameSession.attach: a transport is already attached");
    if (this.ended) throw new Error("GameSession.attach: session has already ended");

    this.transport = transport;
    transport.start({
      onFrame: (frame) => {
        void this.handleInboundFrame(frame);
      },
      // Queued so frames that arrived before the close are still applied.
      onClosed: (reason) => {
        void this.queueAction("connection close", () => this.terminate(`connection closed: ${reason}`, false));
      },
    });
    transport.send(encodeHandshake(this.names[this.role]));
  }

  applyLocalSelection(row: number, col: number): Promise<void> {
    if (!inBounds(row, col)) {
      throw new Error(`applyLocalSelection: cell (${row},${col}) is off the board`);
    }
    return this.queueAction("selection", () => this.selectNow({ row, col }));
  }

  handleInboundFrame(raw: string): Promise<void> {
    return this.queueAction("inbound frame", () => this.processFrame(raw));
  }

  /** Empty text is ignored. `role` picks whose name the line is signed with. */
  sendChat(text: string, role: SessionRole = this.role): void {
    if (text === "" || this.ended) return;
    const name = this.names[role];
    this.chat.push(`${name}: ${text}`);
    this.send(encodeChat(name, text));
    this.bus.emit("onChatChanged");
  }

  quitSession(): void {
    this.terminate("quit locally", true);
  }

  /** Resolves once every queued selection and frame has been handled. */
  idle(): Promise<void> {
    return this.actionChain;
  }

  getBoard(): BoardState {
    return this.board;
  }

  getTurnState(): TurnState {
    return this.turn;
  }

  getSelection(): { selected: Cell | null; destinations: Cell[]; capturers: Cell[] } {
    return selectionOf(this.turn);
  }

  getChatLog(): readonly string[] {
    return this.chat;
  }

  getNames(): Record<SessionRole, string> {
    return { ...this.names };
  }

  getScores(): Record<SessionRole, number> {
    return { ...this.scores };
  }

  /** Display name of whoever is expected to move next. */
  currentTurnName(): string {
    return this.turn.kind === "OpponentTurn" ? this.names[peerRole(this.role)] : this.names[this.role];
  }

  isActive(): boolean {
    return this.transport !== null && !this.ended;
  }

  snapshot(): SessionSnapshot {
    return {
      role: this.role,
      active: this.isActive(),
      names: this.getNames(),
      scores: this.getScores(),
      turn: this.turn.kind,
      turnName: this.currentTurnName(),
      chatLines: this.chat.length,
    };
  }

  private queueAction(label: string, fn: () => void): Promise<void> {
    // Chain actions so at most one runs at a time.
    const next = this.actionChain.then(() => {
      if (this.ended) return;
      fn();
    });
    this.actionChain = next.catch((err) => {
      // eslint-disable-next-line no-console
      console.error(`[checkers-session] ${label} failed`, err);
    });
    return this.actionChain;
  }

  private send(frame: string): void {
    if (!this.transport) {
      // eslint-disable-next-line no-console
      console.warn("[checkers-session] no transport attached; dropping frame", frame);
      return;
    }
    this.transport.send(frame);
  }

  private selectNow(cell: Cell): void {
    if (!this.transport) return;

    const { state, outcome } = selectCell(this.board, this.turn, cell);
    this.turn = state;
    if (outcome.type === "ignored") return;

    if (outcome.type === "moved") {
      this.turnLegs.push({ from: outcome.move.from, to: outcome.move.to });
      if (outcome.turnEnded) {
        const frame = encodeMove(this.turnLegs);
        this.turnLegs = [];
        this.send(frame);
        this.resolveGameOver();
      }
    }

    this.bus.emit("onBoardChanged");
  }

  private processFrame(raw: string): void {
    try {
      const msg = decodeFrame(raw);
      switch (msg.type) {
        case "quit":
          this.terminate("peer quit", false);
          return;
        case "chat":
          this.chat.push(msg.line);
          this.bus.emit("onChatChanged");
          return;
        case "handshake": {
          const name = msg.name.trim();
          if (!name) return;
          this.names[peerRole(this.role)] = name;
          // eslint-disable-next-line no-console
          console.log(`[checkers-session] peer is ${name}`);
          this.bus.emit("onScoreChanged");
          return;
        }
        case "move":
          this.applyInboundMove(msg.segments, raw);
          return;
      }
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;
      // eslint-disable-next-line no-console
      console.error(`[checkers-session] protocol error: ${err.message}`, { frame: err.frame });
      this.terminate(`protocol error: ${err.message}`, true);
    }
  }

  private applyInboundMove(segments: MoveSegment[], frame: string): void {
    if (this.turn.kind !== "OpponentTurn") {
      // eslint-disable-next-line no-console
      console.warn(`[checkers-session] peer moved during ${this.turn.kind}; applying anyway`);
    }

    // Check the whole chain on a copy; the live board only changes once every leg fits.
    const scratch = cloneBoard(this.board);
    for (const leg of segments) {
      checkInboundLeg(scratch, leg, frame);
      applyMove(scratch, leg);
    }
    for (const leg of segments) applyMove(this.board, leg);

    this.turnLegs = [];
    if (!this.resolveGameOver()) this.turn = startTurn(this.board);
    this.bus.emit("onBoardChanged");
  }

  /**
   * Scores a finished game and lays out the next one. Returns false while
   * both sides still have pieces.
   */
  private resolveGameOver(): boolean {
    const lost = loser(this.board);
    if (!lost) return false;

    const winner: SessionRole = lost === "away" ? this.role : peerRole(this.role);
    this.scores[winner] += 1;
    // eslint-disable-next-line no-console
    console.log(
      `[checkers-session] ${this.names[winner]} wins (host ${this.scores.host} / client ${this.scores.client})`
    );

    setupInitialPosition(this.board);
    this.turn = initialTurnState(this.role);
    this.turnLegs = [];
    this.bus.emit("onScoreChanged");
    return true;
  }

  private terminate(reason: string, notifyPeer: boolean): void {
    if (this.ended) return;
    this.ended = true;
    this.turnLegs = [];
    // eslint-disable-next-line no-console
    console.log(`[checkers-session] session ended: ${reason}`);

    const transport = this.transport;
    if (transport) {
      if (notifyPeer) transport.send(QUIT_FRAME);
      transport.close();
    }
    this.bus.emit("onReturnToMenu");
  }
}
