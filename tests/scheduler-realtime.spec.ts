import { createServer } from "node:http";
import WebSocket from "ws";
import { afterEach, describe, expect, it, vi } from "vitest";
import { SCHEDULER_WS_PATH, snapshotSchema, type Snapshot } from "@shared/scheduler";
import { connectSchedulerClient } from "../cli/lib/scheduler-client";
import { createSchedulerApp } from "../server/app";
import { attachSchedulerSocket } from "../server/realtime";
import { createSchedulerRuntime } from "../server/services/scheduler/runtime";

describe("scheduler websocket endpoint", () => {
  const cleanups: Array<() => Promise<void> | void> = [];

  afterEach(async () => {
    while (cleanups.length > 0) {
      const cleanup = cleanups.pop();
      if (cleanup) await cleanup();
    }
  });

  const startServer = async () => {
    const runtime = createSchedulerRuntime({ tickIntervalMs: 10 });
    const server = createServer(createSchedulerApp(runtime));
    const realtime = attachSchedulerSocket(server, runtime.broker, { pingIntervalMs: 60_000 });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    cleanups.push(
      () =>
        new Promise<void>((resolve) => {
          server.closeAllConnections();
          server.close(() => resolve());
        }),
      () => realtime.close(),
      () => runtime.stop(),
    );
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server did not bind a TCP port");
    }
    return { runtime, url: `ws://127.0.0.1:${address.port}${SCHEDULER_WS_PATH}` };
  };

  it("streams snapshots to a renderer and acknowledges an injector", async () => {
    const { runtime, url } = await startServer();
    const frames: Snapshot[] = [];
    const replies: unknown[] = [];

    const renderer = await connectSchedulerClient({
      url,
      role: "renderer",
      onFrame: (frame) => {
        const parsed = snapshotSchema.safeParse(frame);
        if (parsed.success) frames.push(parsed.data);
      },
    });
    const injector = await connectSchedulerClient({ url, role: "injector", onFrame: (frame) => replies.push(frame) });
    cleanups.push(() => renderer.close(), () => injector.close());

    injector.send({ arrival_tick: 0, burst_total: 2, priority: 1 });
    await vi.waitFor(() => expect(replies).toEqual([{ accepted: true, id: 1 }]));
    expect(runtime.broker.roster().renderers).toHaveLength(1);

    runtime.start();
    await vi.waitFor(() => expect(frames.map((frame) => frame.tick)).toEqual([1, 2]));
    expect(frames[1].processes[0]).toMatchObject({ id: 1, state: "Finished", finish_tick: 2 });
  });

  it("closes a connection with a multibyte role and keeps accepting clients", async () => {
    const { url } = await startServer();
    const socket = new WebSocket(url);

    const closed = await new Promise<{ code: number; reason: string }>((resolve) => {
      socket.on("open", () => socket.send(JSON.stringify({ role: "€".repeat(60) })));
      socket.on("close", (code, reason) => resolve({ code, reason: reason.toString("utf8") }));
    });

    expect(closed.code).toBe(1008);
    expect(closed.reason).toMatch(/^invalid handshake: role: /);
    const renderer = await connectSchedulerClient({ url, role: "renderer", onFrame: () => undefined });
    cleanups.push(() => renderer.close());
  });

  it("closes a connection whose handshake is not JSON", async () => {
    const { url } = await startServer();
    const socket = new WebSocket(url);

    const closeCode = await new Promise<number>((resolve) => {
      socket.on("open", () => socket.send("hello"));
      socket.on("close", (code) => resolve(code));
    });

    expect(closeCode).toBe(1008);
  });
});
