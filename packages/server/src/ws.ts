// packages/server/src/ws.ts

import type { FastifyInstance } from "fastify";
import WebSocket, { type RawData } from "ws";
import type { PokerEngine } from "./engine";
import type { SnapshotSink } from "./hub";
import type { ServerMessage } from "./messages";

function rawDataToString(data: RawData): string {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString();
  if (Array.isArray(data)) return Buffer.concat(data).toString();
  return Buffer.from(data).toString();
}

/** Adapts a `ws` socket to the engine's sink interface. */
export class WebSocketSink implements SnapshotSink {
  constructor(private readonly socket: WebSocket) {}

  send(message: ServerMessage): Promise<boolean> {
    if (this.socket.readyState !== WebSocket.OPEN) return Promise.resolve(false);
    return new Promise((resolve) => {
      this.socket.send(JSON.stringify(message), (err) => resolve(!err));
    });
  }

  close(code: number, reason: string): void {
    if (
      this.socket.readyState === WebSocket.CLOSING ||
      this.socket.readyState === WebSocket.CLOSED
    ) {
      return;
    }
    this.socket.close(code, reason);
  }
}

export function registerPokerWebSocket(server: FastifyInstance, engine: PokerEngine) {
  server.get("/ws", { websocket: true }, (socket) => {
    const connId = engine.connect(new WebSocketSink(socket));

    socket.on("message", (data) => {
      void engine.handleRaw(connId, rawDataToString(data));
    });

    function handleSocketTermination(kind: "close" | "error") {
      engine.disconnect(connId).catch((err) => {
        server.log.error({ tag: "poker:disconnect_error", connId, kind, err });
      });
    }

    socket.on("close", () => handleSocketTermination("close"));
    socket.on("error", () => handleSocketTermination("error"));
  });
}
