import WebSocket from "ws";
import { handshakeReplySchema, SCHEDULER_WS_PATH, type ClientRole } from "@shared/scheduler";
import { rawDataToString } from "@shared/ws-data";

export const DEFAULT_SCHEDULER_URL = `ws://127.0.0.1:5555${SCHEDULER_WS_PATH}`;

export type SchedulerClientOptions = {
  url: string;
  role: ClientRole;
  handshakeTimeoutMs?: number;
  /** Every frame after the handshake reply, already JSON-decoded. */
  onFrame: (frame: unknown) => void;
  onMalformedFrame?: (raw: string) => void;
};

export type SchedulerConnection = {
  send: (payload: unknown) => void;
  close: () => void;
  /** Resolves with the close code once the socket is gone. */
  closed: Promise<{ code: number; reason: string }>;
};

/**
 * Opens a connection and completes the role handshake. Frames are routed
 * to `onFrame` from the moment the handshake succeeds, so nothing sent
 * right after the reply is missed.
 */
export const connectSchedulerClient = (
  options: SchedulerClientOptions,
): Promise<SchedulerConnection> =>
  new Promise<SchedulerConnection>((resolve, reject) => {
    const socket = new WebSocket(options.url);
    let handshakeDone = false;
    let settled = false;

    const closed = new Promise<{ code: number; reason: string }>((resolveClosed) => {
      socket.on("close", (code, reason) => {
        resolveClosed({ code, reason: reason.toString("utf8") });
        clearTimeout(timer);
        if (!settled) {
          settled = true;
          reject(new Error(`connection closed before handshake (${code})`));
        }
      });
    });

    const fail = (error: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(error);
      socket.terminate();
    };

    const timer = setTimeout(
      () => fail(new Error("handshake timed out")),
      options.handshakeTimeoutMs ?? 5000,
    );

    socket.on("open", () => {
      socket.send(JSON.stringify({ role: options.role }));
    });

    socket.on("error", (error) => fail(error));

    socket.on("message", (data) => {
      const raw = rawDataToString(data);
      let frame: unknown;
      try {
        frame = JSON.parse(raw);
      } catch {
        if (!handshakeDone) {
          fail(new Error("server sent a malformed handshake reply"));
        } else {
          options.onMalformedFrame?.(raw);
        }
        return;
      }

      if (handshakeDone) {
        options.onFrame(frame);
        return;
      }

      const reply = handshakeReplySchema.safeParse(frame);
      if (!reply.success) {
        fail(new Error("server sent an unexpected handshake reply"));
        return;
      }
      if (!reply.data.ok) {
        fail(new Error(`handshake rejected: ${reply.data.reason}`));
        return;
      }
      handshakeDone = true;
      settled = true;
      clearTimeout(timer);
      resolve({
        send: (payload) => socket.send(JSON.stringify(payload)),
        close: () => socket.close(1000, "client done"),
        closed,
      });
    });
  });
