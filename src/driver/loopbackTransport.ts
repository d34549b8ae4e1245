import type { SessionTransport, TransportHandlers } from "./sessionTransport.ts";

/**
 * In-process transport: two ends wired back to back. Frames and the close
 * notification reach the other end on a later macrotask, in send order, the
 * way a socket would deliver them.
 */
export class LoopbackTransport implements SessionTransport {
  readonly mode = "loopback" as const;

  /** Every frame this end has written, oldest first. */
  readonly sent: string[] = [];

  private peer: LoopbackTransport | null = null;
  private handlers: TransportHandlers | null = null;
  private pending: string[] = [];
  private closedReason: string | null = null;
  private closeReported = false;

  static pair(): [LoopbackTransport, LoopbackTransport] {
    const a = new LoopbackTransport();
    const b = new LoopbackTransport();
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  start(handlers: TransportHandlers): void {
    this.handlers = handlers;
    const queued = this.pending;
    this.pending = [];
    for (const frame of queued) handlers.onFrame(frame);
    this.reportClosed();
  }

  send(frame: string): void {
    const peer = this.peer;
    if (this.closedReason !== null || !peer) {
      // eslint-disable-next-line no-console
      console.warn("[checkers-transport] send on closed loopback dropped", frame);
      return;
    }
    this.sent.push(frame);
    setImmediate(() => peer.deliver(frame));
  }

  close(): void {
    if (this.closedReason !== null) return;
    this.markClosed("closed locally");
    const peer = this.peer;
    if (peer) setImmediate(() => peer.markClosed("peer closed"));
  }

  isClosed(): boolean {
    return this.closedReason !== null;
  }

  private deliver(frame: string): void {
    if (this.closedReason !== null) return;
    if (this.handlers) this.handlers.onFrame(frame);
    else this.pending.push(frame);
  }

  private markClosed(reason: string): void {
    if (this.closedReason !== null) return;
    this.closedReason = reason;
    this.reportClosed();
  }

  private reportClosed(): void {
    if (this.closeReported || this.closedReason === null || !this.handlers) return;
    this.closeReported = true;
    this.handlers.onClosed(this.closedReason);
  }
}
