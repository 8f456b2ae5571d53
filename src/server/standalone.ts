import { randomInt } from "node:crypto";
import { createServer } from "node:http";
import { matchConfigFromEnv } from "../config/matchConfig.js";
import { WebSocketServerTransport } from "../transport/WebSocketServerTransport.js";
import { MatchHost } from "./MatchHost.js";
import { initServerLog, installCrashHandlers, serverLog } from "./serverLog.js";

const PORT = parseInt(process.env.PORT ?? "3001", 10);
const DATA_DIR = process.env.DATA_DIR ?? "./data";
const WS_PATH = process.env.WS_PATH ?? "/match";
const DEFAULT_TARGET_POPULATION = 2;

const httpServer = createServer((req, res) => {
  if (req.url === "/health") {
    const body = JSON.stringify({ matches: host.list() });
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(body);
    return;
  }
  res.writeHead(404);
  res.end("Not Found");
});

initServerLog(DATA_DIR);
installCrashHandlers();

// Fail fast on a bad environment before accepting sockets.
matchConfigFromEnv(process.env, { matchId: 0, seed: 0, targetPopulation: DEFAULT_TARGET_POPULATION });

const host = new MatchHost({
  createConfig: (matchId) =>
    matchConfigFromEnv(process.env, {
      matchId,
      seed: randomInt(0, 0xffffffff),
      targetPopulation: DEFAULT_TARGET_POPULATION,
      notifyLobby: true,
    }),
  onMatchEnd: (outcome) => {
    serverLog(`match ${outcome.matchId} ended: ${outcome.status}`);
  },
});

const transport = new WebSocketServerTransport({ server: httpServer, path: WS_PATH });
host.attach(transport);

httpServer.listen(PORT, () => {
  serverLog(`Match server listening on ws://localhost:${PORT}${WS_PATH}`);
});

function shutdown() {
  serverLog("Shutting down...");
  host.close();
  transport.close();
  httpServer.close();
  process.exit(0);
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
