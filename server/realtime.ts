import type { Server } from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import { SCHEDULER_WS_PATH } from "@shared/scheduler";
import { rawDataToString } from "@shared/ws-data";
import { logError } from "./lib/log";
import type { SessionBroker } from "./services/scheduler/broker";
import { createWsChannel } from "./services/scheduler/ws-channel";

export type RealtimeOptions = {
  path?: string;
  pingIntervalMs?: number;
};

export type RealtimeHandle = {
  wss: WebSocketServer;
  close: () => Promise<void>;
};

export function attachSchedulerSocket(
  httpServer: Server,
  broker: SessionBroker,
  options: RealtimeOptions = {},
): RealtimeHandle {
  const wss = new WebSocketServer({
    server: httpServer,
    path: options.path ?? SCHEDULER_WS_PATH,
  });
  // ws re-emits the http server's errors; the bind failure itself is handled by the caller
  wss.on("error", (error) => logError("websocket server error", error, "broker"));
  const alive = new WeakMap<WebSocket, boolean>();
  let seq = 0;

  // Keepalive: a socket that missed the previous pong is terminated
  const pingInterval = setInterval(() => {
    for (const ws of Array.from(wss.clients)) {
      if (alive.get(ws) === false) {
        ws.terminate();
        continue;
      }
      alive.set(ws, false);
      if (ws.readyState === WebSocket.OPEN) {
        ws.ping();
      }
    }
  }, options.pingIntervalMs ?? 30_000);
  httpServer.on("close", () => clearInterval(pingInterval));

  wss.on("connection", (ws, req) => {
    seq += 1;
    const id = `c${seq}@${req.socket.remoteAddress ?? "unknown"}:${req.socket.remotePort ?? 0}`;
    alive.set(ws, true);
    broker.accept(createWsChannel(id, ws));

    ws.on("pong", () => alive.set(ws, true));
    ws.on("message", (data) => broker.receive(id, rawDataToString(data)));
    ws.on("close", (code) => broker.disconnect(id, `socket closed (${code})`));
    ws.on("error", (error) => {
      logError(`socket error on ${id}`, error, "broker");
      ws.terminate();
    });
  });

  return {
    wss,
    close: () =>
      new Promise<void>((resolve, reject) => {
        clearInterval(pingInterval);
        wss.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
