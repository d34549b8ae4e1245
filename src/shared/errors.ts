/** Connecting, accepting or listening failed before a session existed. */
export class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransportError";
  }
}

/** The peer sent a frame that cannot be decoded or does not fit the board. */
export class ProtocolError extends Error {
  readonly frame: string;

  constructor(message: string, frame: string) {
    super(message);
    this.name = "ProtocolError";
    this.frame = frame;
  }
}
