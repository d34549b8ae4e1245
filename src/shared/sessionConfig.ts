export const DEFAULT_PORT = 30000;
export const HOST_PORT_MIN = 30000;
export const HOST_PORT_MAX = 40000;
export const DEFAULT_HOST_ADDRESS = "127.0.0.1";
export const DEFAULT_ACCEPT_TIMEOUT_MS = 10_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 3_000;
export const WS_PATH = "/api/ws";

export interface SessionConfig {
  /** Port the host listens on and the client dials. */
  port: number;
  /** Address the client dials. */
  hostAddress: string;
  /** Our display name; blank means the role's default. */
  name: string;
  /** How long the host waits for a peer. 0 waits indefinitely. */
  acceptTimeoutMs: number;
  /** How long the client waits for the host's handshake. 0 waits indefinitely. */
  connectTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function parseIntOr(raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) ? n : fallback;
}

/** Host ports are limited to 30000–40000; anything else falls back to the default. */
export function normalizeHostPort(port: number): number {
  return Number.isInteger(port) && port >= HOST_PORT_MIN && port <= HOST_PORT_MAX ? port : DEFAULT_PORT;
}

export function normalizeClientPort(port: number): number {
  return Number.isInteger(port) && port >= 1 && port <= 65535 ? port : DEFAULT_PORT;
}

/** Blank and wildcard addresses can't be dialled; use loopback instead. */
export function normalizeHostAddress(address: string | undefined): string {
  const a = (address ?? "").trim();
  if (!a || a === "0.0.0.0") return DEFAULT_HOST_ADDRESS;
  return a;
}

export function resolveSessionConfig(role: "host" | "client", env: Env = process.env): SessionConfig {
  const rawPort = parseIntOr(env.CHECKERS_PORT, DEFAULT_PORT);
  return {
    port: role === "host" ? normalizeHostPort(rawPort) : normalizeClientPort(rawPort),
    hostAddress: normalizeHostAddress(env.CHECKERS_HOST),
    name: (env.CHECKERS_NAME ?? "").trim(),
    acceptTimeoutMs: Math.max(0, parseIntOr(env.CHECKERS_ACCEPT_TIMEOUT_MS, DEFAULT_ACCEPT_TIMEOUT_MS)),
    connectTimeoutMs: Math.max(0, parseIntOr(env.CHECKERS_CONNECT_TIMEOUT_MS, DEFAULT_CONNECT_TIMEOUT_MS)),
  };
}
