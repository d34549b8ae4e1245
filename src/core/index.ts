// "Core" is the engine surface presentation code talks to (no DOM, no rendering).

export type { Side, SessionRole, Cell, Piece } from "../types.ts";
export type { BoardState } from "../game/board.ts";
export type { Move, QuietMove, CaptureMove } from "../game/moveTypes.ts";
export type { TurnState, TurnStateKind, SelectionOutcome } from "../controller/turnMachine.ts";
export type { SessionObserver, SessionSignal } from "../controller/notificationBus.ts";
export type { GameSessionOptions, SessionSnapshot } from "../controller/gameSession.ts";
export type { SessionTransport, TransportHandlers, TransportMode } from "../driver/sessionTransport.ts";
export type { InboundMessage, MoveSegment } from "../shared/wireProtocol.ts";
export type { SessionConfig } from "../shared/sessionConfig.ts";

export { BOARD_SIZE, inBounds, isPlayable, mirrorCell } from "../game/coords.ts";
export { createEmptyBoard, pieceAt, isOccupied, isOccupiedByOpponent } from "../game/board.ts";
export { createInitialBoard, setupInitialPosition } from "../game/initialPosition.ts";
export { legalSimpleMoves, legalCaptures, generateLegalMoves } from "../game/movegen.ts";
export { applyMove } from "../game/applyMove.ts";
export { isGameOver, loser } from "../game/gameOver.ts";

export { NotificationBus } from "../controller/notificationBus.ts";
export { GameSession, DEFAULT_NAMES } from "../controller/gameSession.ts";
export { LoopbackTransport } from "../driver/loopbackTransport.ts";
export { WebSocketTransport } from "../driver/webSocketTransport.ts";
export { connectToHost, joinSession, createLoopbackSessions } from "../driver/createSession.ts";

export { decodeFrame, encodeChat, encodeHandshake, encodeMove, QUIT_FRAME } from "../shared/wireProtocol.ts";
export { TransportError, ProtocolError } from "../shared/errors.ts";
export { resolveSessionConfig } from "../shared/sessionConfig.ts";
