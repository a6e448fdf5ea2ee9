import { WebSocket } from "ws";
import { logError } from "../../lib/log";
import type { BrokerChannel } from "./broker";

export const createWsChannel = (id: string, socket: WebSocket): BrokerChannel => ({
  id,
  send: (data) =>
    new Promise<void>((resolve, reject) => {
      if (socket.readyState !== WebSocket.OPEN) {
        reject(new Error("socket is not open"));
        return;
      }
      socket.send(data, (err) => (err ? reject(err) : resolve()));
    }),
  close: (code, reason) => {
    if (socket.readyState !== WebSocket.OPEN && socket.readyState !== WebSocket.CONNECTING) {
      return;
    }
    try {
      socket.close(code, reason);
    } catch (error) {
      // ws throws on an invalid code or an over-long reason; the socket still has to go
      logError(`close of ${id} failed, terminating`, error, "broker");
      socket.terminate();
    }
  },
});
