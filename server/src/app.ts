import express from "express";
import cors from "cors";
import { createServer, type Server } from "node:http";

import WebSocket, { WebSocketServer } from "ws";

import { GameSession, type SessionSnapshot } from "../../src/controller/gameSession.ts";
import type { SessionObserver } from "../../src/controller/notificationBus.ts";
import { WebSocketTransport } from "../../src/driver/webSocketTransport.ts";
import { TransportError } from "../../src/shared/errors.ts";
import { DEFAULT_ACCEPT_TIMEOUT_MS, WS_PATH } from "../../src/shared/sessionConfig.ts";

type HostOpts = {
  /** Reported by GET /api/session; null until a session exists. */
  describeSession?: () => SessionSnapshot | null;
};

type PeerWaiter = {
  resolve: (transport: WebSocketTransport) => void;
  reject: (err: Error) => void;
};

export function createHostApp(opts: HostOpts = {}): {
  app: express.Express;
  attachWebSockets: (server: Server, onPeerGone: () => Promise<void>) => void;
  nextPeer: () => Promise<WebSocketTransport>;
  shutdown: () => void;
} {
  let wss: WebSocketServer | null = null;
  let peer: WebSocketTransport | null = null;
  let waiter: PeerWaiter | null = null;
  let isShuttingDown = false;

  function attachWebSockets(server: Server, onPeerGone: () => Promise<void>): void {
    if (wss) return;

    wss = new WebSocketServer({ server, path: WS_PATH });

    wss.on("connection", (ws: WebSocket) => {
      // One peer per session; later dialers are turned away.
      if (peer || isShuttingDown) {
        ws.close(1008, "Session already has a peer");
        return;
      }

      // Wrap immediately so frames sent before the session attaches are buffered.
      peer = new WebSocketTransport(ws, "host", onPeerGone);
      // eslint-disable-next-line no-console
      console.log("[checkers-host] peer connected");

      if (waiter) {
        waiter.resolve(peer);
        waiter = null;
      }
    });
  }

  function nextPeer(): Promise<WebSocketTransport> {
    if (peer) return Promise.resolve(peer);
    if (waiter) return Promise.reject(new Error("nextPeer: already waiting for a peer"));
    return new Promise<WebSocketTransport>((resolve, reject) => {
      waiter = { resolve, reject };
    });
  }

  function shutdown(): void {
    if (isShuttingDown) return;
    isShuttingDown = true;

    if (waiter) {
      waiter.reject(new TransportError("Host closed before a peer connected"));
      waiter = null;
    }

    if (wss) {
      for (const ws of wss.clients) {
        if (ws.readyState === WebSocket.OPEN) ws.close(1001, "host shutting down");
      }
      wss.close();
      wss = null;
    }
  }

  const app = express();
  app.use(cors());

  app.use((req, _res, next) => {
    // eslint-disable-next-line no-console
    console.log(`[checkers-host] ${req.method} ${req.path}`);
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/session", (_req, res) => {
    const snapshot = opts.describeSession?.() ?? null;
    if (!snapshot) {
      res.status(404).json({ error: "No session" });
      return;
    }
    res.json(snapshot);
  });

  return { app, attachWebSockets, nextPeer, shutdown };
}

function isNotRunning(err: Error): boolean {
  return "code" in err && err.code === "ERR_SERVER_NOT_RUNNING";
}

export type HostServer = {
  app: express.Express;
  server: Server;
  /** http://127.0.0.1:<port> */
  url: string;
  /** Where the peer dials in. */
  wsUrl: string;
  port: number;
  /**
   * Resolves with the first peer to connect. Rejects with a TransportError
   * (and shuts the host down) if nobody arrives within the accept timeout;
   * a timeout of 0 waits indefinitely.
   */
  accept: () => Promise<WebSocketTransport>;
  close: () => Promise<void>;
};

export async function startHostServer(args: {
  port: number;
  acceptTimeoutMs?: number;
  describeSession?: () => SessionSnapshot | null;
}): Promise<HostServer> {
  const acceptTimeoutMs = Math.max(0, Number(args.acceptTimeoutMs ?? DEFAULT_ACCEPT_TIMEOUT_MS));
  const { app, attachWebSockets, nextPeer, shutdown } = createHostApp({ describeSession: args.describeSession });

  const server = createServer(app);

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    if (closing) return closing;
    shutdown();
    closing = new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err && !isNotRunning(err)) reject(err);
        else resolve();
      });
    });
    return closing;
  };

  // The host only ever serves one game; once the peer's socket is gone, stop listening.
  attachWebSockets(server, close);

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      reject(new TransportError(`Could not listen on port ${args.port}: ${err.message}`));
    };
    server.once("error", onError);
    server.listen(args.port, () => {
      server.off("error", onError);
      resolve();
    });
  });

  const address = server.address();
  const port = address !== null && typeof address === "object" ? address.port : args.port;

  const accept = async (): Promise<WebSocketTransport> => {
    let timer: NodeJS.Timeout | undefined;
    const peer = nextPeer();
    // The losing side of the race must not surface as an unhandled rejection.
    peer.catch(() => undefined);

    const waits: Array<Promise<WebSocketTransport>> = [peer];
    if (acceptTimeoutMs > 0) {
      waits.push(
        new Promise<never>((_resolve, reject) => {
          timer = setTimeout(() => {
            reject(new TransportError(`No peer connected within ${acceptTimeoutMs} ms`));
          }, acceptTimeoutMs);
        })
      );
    }

    try {
      return await Promise.race(waits);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error("[checkers-host] accept failed", err instanceof Error ? err.message : err);
      await close();
      throw err;
    } finally {
      clearTimeout(timer);
    }
  };

  return {
    app,
    server,
    url: `http://127.0.0.1:${port}`,
    wsUrl: `ws://127.0.0.1:${port}${WS_PATH}`,
    port,
    accept,
    close,
  };
}

/**
 * Starts listening, waits for the peer and binds a host-side GameSession to
 * it. The returned session has already sent its handshake.
 */
export async function hostSession(args: {
  port: number;
  acceptTimeoutMs?: number;
  name?: string;
  observers?: Iterable<SessionObserver>;
  /** Called once the port is bound, before waiting for the peer. */
  onListening?: (host: HostServer) => void;
}): Promise<{ session: GameSession; host: HostServer }> {
  const session = new GameSession({ role: "host", localName: args.name, observers: args.observers });
  const host = await startHostServer({
    port: args.port,
    acceptTimeoutMs: args.acceptTimeoutMs,
    describeSession: () => session.snapshot(),
  });

  // eslint-disable-next-line no-console
  console.log(`[checkers-host] waiting for a peer on ${host.wsUrl}`);
  args.onListening?.(host);
  const transport = await host.accept();
  session.attach(transport);
  return { session, host };
}
