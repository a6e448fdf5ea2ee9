import { describe, expect, it } from "vitest";
import { InvalidPolicyError } from "../server/services/scheduler/errors";
import { applyPolicy, buildPolicy, describePolicy } from "../server/services/scheduler/policies";
import { createProcess, type ProcessRecord } from "../server/services/scheduler/process";

const ready = (id: number, fields: Partial<ProcessRecord> = {}): ProcessRecord => ({
  ...createProcess(id, { arrival_tick: 0, burst_total: 5, priority: 5 }),
  state: "Ready",
  ...fields,
});

const running = (id: number, fields: Partial<ProcessRecord> = {}): ProcessRecord =>
  ready(id, { state: "Running", ...fields });

describe("buildPolicy", () => {
  it("attaches a quantum to Round Robin only", () => {
    expect(buildPolicy("RR", 4)).toEqual({ kind: "RR", quantum: 4 });
    expect(buildPolicy("RR")).toEqual({ kind: "RR", quantum: 2 });
    expect(buildPolicy("SJF", 4)).toEqual({ kind: "SJF" });
  });

  it("rejects a quantum below one", () => {
    expect(() => buildPolicy("RR", 0)).toThrow(InvalidPolicyError);
    expect(() => buildPolicy("RR", 1.5)).toThrow("quantum must be a positive integer, got 1.5");
  });

  it("describes itself for logs", () => {
    expect(describePolicy(buildPolicy("RR", 3))).toBe("RR (quantum 3)");
    expect(describePolicy(buildPolicy("PRIORITY"))).toBe("PRIORITY");
  });
});

describe("applyPolicy", () => {
  it("idles with nothing ready", () => {
    expect(applyPolicy(buildPolicy("FCFS"), null, [])).toEqual({ type: "idle" });
  });

  it("dispatches the earliest arrival under FCFS", () => {
    const early = ready(2, { arrival_tick: 1 });
    const late = ready(1, { arrival_tick: 3 });

    expect(applyPolicy(buildPolicy("FCFS"), null, [late, early])).toEqual({ type: "dispatch", next: early });
  });

  it("dispatches by lowest priority value and breaks ties on id", () => {
    const a = ready(3, { priority: 1 });
    const b = ready(2, { priority: 1 });
    const c = ready(1, { priority: 7 });

    expect(applyPolicy(buildPolicy("PRIORITY"), null, [a, b, c])).toEqual({ type: "dispatch", next: b });
  });

  it("keeps the runner under non-preemptive policies", () => {
    const current = running(1, { remaining: 9, priority: 9 });
    const shorter = ready(2, { remaining: 1, priority: 0 });

    expect(applyPolicy(buildPolicy("SJF"), current, [shorter]).type).toBe("keep");
    expect(applyPolicy(buildPolicy("PRIORITY"), current, [shorter]).type).toBe("keep");
  });

  it("preempts under SRTF only for a strictly shorter remaining time", () => {
    const current = running(1, { remaining: 3 });

    expect(applyPolicy(buildPolicy("SRTF"), current, [ready(2, { remaining: 3 })]).type).toBe("keep");
    const shorter = ready(3, { remaining: 2 });
    expect(applyPolicy(buildPolicy("SRTF"), current, [shorter])).toEqual({
      type: "preempt",
      running: current,
      next: shorter,
    });
  });

  it("rotates Round Robin to the oldest ready entry once the quantum is used", () => {
    const current = running(1, { quantum_used: 2 });
    const older = ready(3, { ready_seq: 4 });
    const newer = ready(2, { ready_seq: 9 });

    expect(applyPolicy(buildPolicy("RR", 2), current, [newer, older])).toEqual({
      type: "preempt",
      running: current,
      next: older,
    });
    expect(applyPolicy(buildPolicy("RR", 3), current, [newer, older]).type).toBe("keep");
  });

  it("re-dispatches a lone Round Robin process", () => {
    const current = running(1, { quantum_used: 2 });

    expect(applyPolicy(buildPolicy("RR", 2), current, [])).toEqual({
      type: "preempt",
      running: current,
      next: current,
    });
  });
});
