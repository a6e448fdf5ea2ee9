import type { ProcessState, ProcessView } from "@shared/scheduler";

export type ProcessSpec = {
  arrival_tick: number;
  burst_total: number;
  priority: number;
};

/**
 * One schedulable unit. Owned and mutated by the engine only; everything
 * that leaves the engine goes through {@link toProcessView}.
 */
export type ProcessRecord = {
  readonly id: number;
  readonly arrival_tick: number;
  readonly burst_total: number;
  readonly priority: number;
  remaining: number;
  state: ProcessState;
  finish_tick: number | null;
  // slot of the first CPU unit; feeds response time
  first_run_tick: number | null;
  // ready-queue insertion order, refreshed on every entry into Ready
  ready_seq: number;
  // consecutive units in the current dispatch
  quantum_used: number;
};

export const createProcess = (id: number, spec: ProcessSpec): ProcessRecord => ({
  id,
  arrival_tick: spec.arrival_tick,
  burst_total: spec.burst_total,
  priority: spec.priority,
  remaining: spec.burst_total,
  state: "Pending",
  finish_tick: null,
  first_run_tick: null,
  ready_seq: 0,
  quantum_used: 0,
});

export const markReady = (process: ProcessRecord, seq: number): void => {
  process.state = "Ready";
  process.ready_seq = seq;
  process.quantum_used = 0;
};

export const dispatch = (process: ProcessRecord): void => {
  process.state = "Running";
  process.quantum_used = 0;
};

/** Consumes one CPU unit in slot `tick`. Returns true when the process finished. */
export const runOneUnit = (process: ProcessRecord, tick: number): boolean => {
  if (process.first_run_tick === null) {
    process.first_run_tick = tick;
  }
  process.remaining = Math.max(0, process.remaining - 1);
  process.quantum_used += 1;
  if (process.remaining === 0) {
    process.state = "Finished";
    process.finish_tick = tick + 1;
    return true;
  }
  return false;
};

export const toProcessView = (process: ProcessRecord): ProcessView =>
  Object.freeze({
    id: process.id,
    state: process.state,
    remaining: process.remaining,
    burst_total: process.burst_total,
    arrival_tick: process.arrival_tick,
    priority: process.priority,
    finish_tick: process.finish_tick,
  });
