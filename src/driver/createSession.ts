import WebSocket from "ws";

import { GameSession } from "../controller/gameSession.ts";
import type { SessionObserver } from "../controller/notificationBus.ts";
import { TransportError } from "../shared/errors.ts";
import { DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_HOST_ADDRESS, WS_PATH } from "../shared/sessionConfig.ts";
import { LoopbackTransport } from "./loopbackTransport.ts";
import { WebSocketTransport } from "./webSocketTransport.ts";

export function hostUrl(host: string, port: number): string {
  return `ws://${host}:${port}${WS_PATH}`;
}

/** Dials a listening host. Rejects with a TransportError when the socket can't be opened in time. */
export function connectToHost(args: {
  host?: string;
  port: number;
  connectTimeoutMs?: number;
}): Promise<WebSocketTransport> {
  const url = hostUrl(args.host ?? DEFAULT_HOST_ADDRESS, args.port);
  const timeout = Math.max(0, Number(args.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS));

  return new Promise<WebSocketTransport>((resolve, reject) => {
    const ws = new WebSocket(url, timeout > 0 ? { handshakeTimeout: timeout } : {});

    const cleanup = () => {
      ws.off("open", onOpen);
      ws.off("error", onError);
    };
    const onOpen = () => {
      cleanup();
      // eslint-disable-next-line no-console
      console.log(`[checkers-client] connected to ${url}`);
      resolve(new WebSocketTransport(ws, "client"));
    };
    const onError = (err: Error) => {
      cleanup();
      // eslint-disable-next-line no-console
      console.error(`[checkers-client] connect to ${url} failed`, err.message);
      reject(new TransportError(`Could not connect to ${url}: ${err.message}`));
    };

    ws.on("open", onOpen);
    ws.on("error", onError);
  });
}

/** Connects to a host and binds a client-side GameSession to the connection. */
export async function joinSession(args: {
  host?: string;
  port: number;
  connectTimeoutMs?: number;
  name?: string;
  observers?: Iterable<SessionObserver>;
}): Promise<GameSession> {
  const transport = await connectToHost(args);
  const session = new GameSession({ role: "client", localName: args.name, observers: args.observers });
  session.attach(transport);
  return session;
}

/** Both ends of a game in one process, wired through a loopback pair. */
export function createLoopbackSessions(args: { hostName?: string; clientName?: string } = {}): {
  host: GameSession;
  client: GameSession;
  hostTransport: LoopbackTransport;
  clientTransport: LoopbackTransport;
} {
  const [hostTransport, clientTransport] = LoopbackTransport.pair();
  const host = new GameSession({ role: "host", localName: args.hostName });
  const client = new GameSession({ role: "client", localName: args.clientName });
  host.attach(hostTransport);
  client.attach(clientTransport);
  return { host, client, hostTransport, clientTransport };
}
