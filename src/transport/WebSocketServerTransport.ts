import { randomUUID } from "node:crypto";
import type { Server as HttpServer, IncomingMessage } from "node:http";
import { type WebSocket, WebSocketServer } from "ws";
import { serverLog } from "../server/serverLog.js";
import type { IServerTransport, PlayerConnection } from "./Transport.js";
import { WebSocketConnection } from "./WebSocketConnection.js";

/**
 * WebSocket-backed server transport for Node.js. Every accepted socket is
 * wrapped in a WebSocketConnection and handed to the connection handler.
 */
export class WebSocketServerTransport implements IServerTransport {
  private wss: WebSocketServer;
  private connectionHandler: ((connection: PlayerConnection) => void) | null = null;

  constructor(options: { server: HttpServer; path?: string }) {
    if (options.path) {
      // noServer mode: only accept upgrades on the specified path.
      const path = options.path;
      this.wss = new WebSocketServer({ noServer: true });
      options.server.on("upgrade", (req, socket, head) => {
        const url = req.url ?? "";
        if (url === path || url.startsWith(`${path}?`)) {
          this.wss.handleUpgrade(req, socket, head, (ws) => {
            this.wss.emit("connection", ws, req);
          });
        } else {
          socket.destroy();
        }
      });
    } else {
      this.wss = new WebSocketServer({ server: options.server });
    }

    this.wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
      const label = `${req.socket.remoteAddress ?? "unknown"}#${randomUUID().slice(0, 8)}`;
      serverLog(`socket accepted: ${label}`);
      const connection = new WebSocketConnection(label, ws);
      if (!this.connectionHandler) {
        ws.close(1013, "Server not ready");
        return;
      }
      this.connectionHandler(connection);
    });
  }

  onConnection(handler: (connection: PlayerConnection) => void): void {
    this.connectionHandler = handler;
  }

  close(): void {
    for (const ws of this.wss.clients) {
      ws.close(1001, "Server shutting down");
    }
    this.wss.close();
  }
}
