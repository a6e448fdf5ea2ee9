import request from "supertest";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createSchedulerApp } from "../server/app";
import { createSchedulerRuntime, type SchedulerRuntime } from "../server/services/scheduler/runtime";

describe("scheduler HTTP routes", () => {
  let runtime: SchedulerRuntime | null = null;

  const buildApp = (tickIntervalMs = 1000) => {
    const created = createSchedulerRuntime({ tickIntervalMs });
    runtime = created;
    return { app: createSchedulerApp(created), runtime: created };
  };

  afterEach(() => {
    runtime?.stop();
    runtime = null;
  });

  it("serves the latest snapshot", async () => {
    const { app } = buildApp();

    const res = await request(app).get("/api/scheduler/state");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ tick: 0, policy: "FCFS", processes: [], running_id: null });
  });

  it("accepts a process and reports it in the statistics", async () => {
    const { app } = buildApp();

    const res = await request(app)
      .post("/api/scheduler/processes")
      .send({ arrival_tick: 0, burst_total: 3, priority: 2 });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ accepted: true, id: 1 });
    const stats = await request(app).get("/api/scheduler/stats");
    expect(stats.body.total).toBe(1);
    expect(stats.body.finished).toBe(0);
  });

  it("rejects a process that fails the schema", async () => {
    const { app } = buildApp();

    const res = await request(app).post("/api/scheduler/processes").send({ arrival_tick: 0 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ accepted: false, reason: "burst_total: Required" });
  });

  it("rejects a process the engine refuses", async () => {
    const { app } = buildApp();

    const res = await request(app)
      .post("/api/scheduler/processes")
      .send({ arrival_tick: 0, burst_total: 0, priority: 2 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ accepted: false, reason: "burst_total must be positive, got 0" });
  });

  it("answers malformed JSON with BAD_JSON", async () => {
    const { app } = buildApp();

    const res = await request(app)
      .post("/api/scheduler/processes")
      .set("Content-Type", "application/json")
      .send("{not json");

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("BAD_JSON");
  });

  it("answers an oversized body with 413", async () => {
    const { app } = buildApp();

    const res = await request(app)
      .post("/api/scheduler/processes")
      .send({ arrival_tick: 0, burst_total: 1, priority: 1, note: "x".repeat(20_000) });

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ error: "BAD_REQUEST", message: "request entity too large" });
  });

  it("changes the policy before anything has run", async () => {
    const { app } = buildApp();

    const res = await request(app).put("/api/scheduler/policy").send({ policy: "RR", quantum: 4 });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ kind: "RR", quantum: 4, locked: false });
    const state = await request(app).get("/api/scheduler/state");
    expect(state.body.policy).toBe("RR");
  });

  it("rejects an unknown policy name", async () => {
    const { app } = buildApp();

    const res = await request(app).put("/api/scheduler/policy").send({ policy: "LOTTERY" });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("INVALID_POLICY");
    expect(res.body.message).toMatch(/^policy: /);
  });

  it("refuses a policy change once a process has run", async () => {
    const { app, runtime } = buildApp(5);
    await request(app).post("/api/scheduler/processes").send({ arrival_tick: 0, burst_total: 50, priority: 1 });
    runtime.start();
    await vi.waitFor(() => expect(runtime.snapshot().tick).toBeGreaterThan(0));

    const res = await request(app).put("/api/scheduler/policy").send({ policy: "SJF" });

    expect(res.status).toBe(409);
    expect(res.body).toEqual({
      error: "POLICY_LOCKED",
      message: "policy cannot change once a process has run",
    });
    const policy = await request(app).get("/api/scheduler/policy");
    expect(policy.body).toEqual({ kind: "FCFS", locked: true });
  });

  it("pauses and resumes the clock", async () => {
    const { app } = buildApp();

    const paused = await request(app).post("/api/scheduler/clock/pause");
    expect(paused.body).toEqual({ paused: true });
    const clock = await request(app).get("/api/scheduler/clock");
    expect(clock.body).toEqual({ running: false, paused: true, intervalMs: 1000 });

    const resumed = await request(app).post("/api/scheduler/clock/resume");
    expect(resumed.body).toEqual({ paused: false });
  });

  it("lists connected clients", async () => {
    const { app } = buildApp();

    const res = await request(app).get("/api/scheduler/clients");

    expect(res.body).toEqual({ renderers: [], injectors: [] });
  });

  it("reports health", async () => {
    const { app, runtime } = buildApp();
    runtime.start();

    const res = await request(app).get("/healthz");

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: "ok", tick: 0, paused: false });
    expect(typeof res.body.timestamp).toBe("string");
  });

  it("exposes Prometheus metrics", async () => {
    const { app } = buildApp();

    const res = await request(app).get("/metrics");

    expect(res.status).toBe(200);
    expect(res.text).toContain("# TYPE scheduler_ticks_total counter");
  });
});
