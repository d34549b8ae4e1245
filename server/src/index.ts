import { hostSession } from "./app.ts";
import type { GameSession } from "../../src/controller/gameSession.ts";
import { resolveSessionConfig } from "../../src/shared/sessionConfig.ts";

const config = resolveSessionConfig("host");

let session: GameSession | null = null;
let chatSeen = 0;

hostSession({
  port: config.port,
  acceptTimeoutMs: config.acceptTimeoutMs,
  name: config.name,
  observers: [
    {
      onChatChanged() {
        if (!session) return;
        const log = session.getChatLog();
        for (const line of log.slice(chatSeen)) {
          // eslint-disable-next-line no-console
          console.log(`[checkers-host] chat ${line}`);
        }
        chatSeen = log.length;
      },
      onScoreChanged() {
        if (!session) return;
        const names = session.getNames();
        const scores = session.getScores();
        // eslint-disable-next-line no-console
        console.log(
          `[checkers-host] ${names.host} ${scores.host} : ${scores.client} ${names.client}`
        );
      },
      onReturnToMenu() {
        // eslint-disable-next-line no-console
        console.log("[checkers-host] session over");
      },
    },
  ],
})
  .then(({ session: s, host }) => {
    session = s;
    // eslint-disable-next-line no-console
    console.log(`[checkers-host] playing as ${s.getNames().host} on ${host.wsUrl}`);
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error("[checkers-host] failed to start", err);
    process.exitCode = 1;
  });
