import WebSocket, { type RawData } from "ws";
import type { SessionTransport, TransportHandlers } from "./sessionTransport.ts";

function rawToText(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString("utf8");
  return raw.toString("utf8");
}

/**
 * A connected `ws` socket. Each WebSocket message carries exactly one frame,
 * so the WebSocket framing is the length prefix.
 */
export class WebSocketTransport implements SessionTransport {
  readonly mode = "websocket" as const;

  private handlers: TransportHandlers | null = null;
  private pending: string[] = [];
  private closedReason: string | null = null;
  private closeReported = false;
  private disposed = false;

  constructor(
    private readonly ws: WebSocket,
    private readonly label: string,
    /** Extra teardown once the socket is done, e.g. stopping the host's listener. */
    private readonly onDispose?: () => Promise<void>
  ) {
    ws.on("message", (raw: RawData) => {
      if (this.closedReason !== null) return;
      const frame = rawToText(raw);
      if (this.handlers) this.handlers.onFrame(frame);
      else this.pending.push(frame);
    });

    ws.on("close", (code: number, reason: Buffer) => {
      const detail = reason.length > 0 ? `${code} ${reason.toString("utf8")}` : String(code);
      this.markClosed(`socket closed (${detail})`);
    });

    ws.on("error", (err: Error) => {
      // eslint-disable-next-line no-console
      console.warn(`[checkers-transport] ${this.label} socket error`, err.message);
      // close handler does the cleanup
    });
  }

  start(handlers: TransportHandlers): void {
    this.handlers = handlers;
    const queued = this.pending;
    this.pending = [];
    for (const frame of queued) handlers.onFrame(frame);
    this.reportClosed();
  }

  send(frame: string): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      // eslint-disable-next-line no-console
      console.warn(`[checkers-transport] ${this.label} send dropped; socket not open`);
      return;
    }
    this.ws.send(frame, (err?: Error) => {
      if (!err) return;
      // eslint-disable-next-line no-console
      console.warn(`[checkers-transport] ${this.label} send failed`, err.message);
    });
  }

  close(): void {
    // Close first so anything already queued (a quit frame) goes out ahead of the close frame.
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(1000, "session ended");
    }
    this.markClosed("closed locally");
  }

  private markClosed(reason: string): void {
    if (this.closedReason === null) this.closedReason = reason;
    this.reportClosed();
    this.dispose();
  }

  private reportClosed(): void {
    if (this.closeReported || this.closedReason === null || !this.handlers) return;
    this.closeReported = true;
    this.handlers.onClosed(this.closedReason);
  }

  private dispose(): void {
    if (this.disposed || !this.onDispose) return;
    this.disposed = true;
    this.onDispose().catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.error(`[checkers-transport] ${this.label} teardown error`, err);
    });
  }
}
