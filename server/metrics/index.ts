import type { Express } from "express";
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from "prom-client";
import type { ClientRole } from "@shared/scheduler";

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const ticksTotal = new Counter({
  name: "scheduler_ticks_total",
  help: "Ticks applied to the scheduling engine",
  registers: [registry],
});

const tickDuration = new Histogram({
  name: "scheduler_tick_duration_ms",
  help: "Time spent applying one tick and queueing its broadcast",
  buckets: [0.1, 0.5, 1, 2, 5, 10, 25, 50, 100],
  registers: [registry],
});

const injectionsTotal = new Counter({
  name: "scheduler_injections_total",
  help: "Add-process requests by outcome",
  labelNames: ["result"],
  registers: [registry],
});

const clientsConnected = new Gauge({
  name: "scheduler_clients",
  help: "Connected clients by role",
  labelNames: ["role"],
  registers: [registry],
});

const rendererEvictions = new Counter({
  name: "scheduler_renderer_evictions_total",
  help: "Renderers disconnected for failing to keep up",
  labelNames: ["reason"],
  registers: [registry],
});

const protocolErrors = new Counter({
  name: "scheduler_protocol_errors_total",
  help: "Connections closed for malformed handshakes or frames",
  registers: [registry],
});

export type InjectionResult = "accepted" | "rejected";
export type EvictionReason = "overflow" | "timeout" | "send_failed";

export const metrics = {
  recordTick(durationMs: number): void {
    ticksTotal.inc();
    tickDuration.observe(durationMs);
  },
  recordInjection(result: InjectionResult): void {
    injectionsTotal.inc({ result });
  },
  setClients(role: ClientRole, count: number): void {
    clientsConnected.set({ role }, count);
  },
  recordEviction(reason: EvictionReason): void {
    rendererEvictions.inc({ reason });
  },
  recordProtocolError(): void {
    protocolErrors.inc();
  },
};

export function registerMetricsEndpoint(app: Express): void {
  app.get("/metrics", async (_req, res) => {
    res.setHeader("Content-Type", registry.contentType);
    res.send(await registry.metrics());
  });
}
