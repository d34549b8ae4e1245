import { describe, it, expect } from "vitest";
import { normalizeClientPort, normalizeHostAddress, normalizeHostPort, resolveSessionConfig } from "./sessionConfig.ts";

describe("sessionConfig", () => {
  it("defaults when nothing is set", () => {
    expect(resolveSessionConfig("host", {})).toEqual({
      port: 30000,
      hostAddress: "127.0.0.1",
      name: "",
      acceptTimeoutMs: 10000,
      connectTimeoutMs: 3000,
    });
  });

  it("reads the environment", () => {
    const cfg = resolveSessionConfig("client", {
      CHECKERS_PORT: "31000",
      CHECKERS_HOST: " 10.0.0.5 ",
      CHECKERS_NAME: "  Ann ",
      CHECKERS_ACCEPT_TIMEOUT_MS: "500",
      CHECKERS_CONNECT_TIMEOUT_MS: "250",
    });
    expect(cfg).toEqual({
      port: 31000,
      hostAddress: "10.0.0.5",
      name: "Ann",
      acceptTimeoutMs: 500,
      connectTimeoutMs: 250,
    });
  });

  it("host ports outside 30000-40000 fall back to 30000", () => {
    expect(normalizeHostPort(30000)).toBe(30000);
    expect(normalizeHostPort(40000)).toBe(40000);
    expect(normalizeHostPort(8080)).toBe(30000);
    expect(normalizeHostPort(40001)).toBe(30000);
    expect(resolveSessionConfig("host", { CHECKERS_PORT: "8080" }).port).toBe(30000);
  });

  it("client ports only need to be valid TCP ports", () => {
    expect(normalizeClientPort(8080)).toBe(8080);
    expect(normalizeClientPort(0)).toBe(30000);
    expect(normalizeClientPort(70000)).toBe(30000);
    expect(resolveSessionConfig("client", { CHECKERS_PORT: "abc" }).port).toBe(30000);
  });

  it("blank and wildcard host addresses become loopback", () => {
    expect(normalizeHostAddress(undefined)).toBe("127.0.0.1");
    expect(normalizeHostAddress("  ")).toBe("127.0.0.1");
    expect(normalizeHostAddress("0.0.0.0")).toBe("127.0.0.1");
    expect(normalizeHostAddress("192.168.1.20")).toBe("192.168.1.20");
  });

  it("negative timeouts clamp to zero, which means no timeout", () => {
    expect(resolveSessionConfig("host", { CHECKERS_ACCEPT_TIMEOUT_MS: "-5" }).acceptTimeoutMs).toBe(0);
    expect(resolveSessionConfig("client", { CHECKERS_CONNECT_TIMEOUT_MS: "0" }).connectTimeoutMs).toBe(0);
  });
});
