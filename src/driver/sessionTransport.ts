export type TransportMode = "loopback" | "websocket";

export interface TransportHandlers {
  /** One complete inbound frame, in arrival order. */
  onFrame(frame: string): void;
  /** Fired once, whether the peer quit, the socket failed or we closed it. */
  onClosed(reason: string): void;
}

/**
 * One connection to the peer. Frames that arrive before `start` are buffered
 * and replayed to the handlers in order.
 *
 * IMPORTANT: prefer `transport.mode === "websocket"` over `instanceof` checks;
 * test doubles implement this interface without extending the real classes.
 */
export interface SessionTransport {
  readonly mode: TransportMode;

  start(handlers: TransportHandlers): void;

  /** Fire-and-forget. A failed write is logged; the read side reports the loss. */
  send(frame: string): void;

  close(): void;
}
