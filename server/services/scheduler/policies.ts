import type { PolicyName } from "@shared/scheduler";
import type { ProcessRecord } from "./process";
import { InvalidPolicyError } from "./errors";

export type SchedulingPolicy =
  | { kind: "FCFS" }
  | { kind: "SJF" }
  | { kind: "SRTF" }
  | { kind: "RR"; quantum: number }
  | { kind: "PRIORITY" };

export type PolicyDecision =
  | { type: "idle" }
  | { type: "keep"; running: ProcessRecord }
  | { type: "dispatch"; next: ProcessRecord }
  // `next` may be the preempted process itself (RR with an otherwise empty queue)
  | { type: "preempt"; running: ProcessRecord; next: ProcessRecord };

export const DEFAULT_QUANTUM = 2;

export const buildPolicy = (name: PolicyName, quantum?: number): SchedulingPolicy => {
  switch (name) {
    case "RR": {
      const q = quantum ?? DEFAULT_QUANTUM;
      if (!Number.isInteger(q) || q <= 0) {
        throw new InvalidPolicyError(`quantum must be a positive integer, got ${q}`);
      }
      return { kind: "RR", quantum: q };
    }
    case "FCFS":
    case "SJF":
    case "SRTF":
    case "PRIORITY":
      return { kind: name };
    default: {
      const unknownName: never = name;
      throw new InvalidPolicyError(`unknown policy ${String(unknownName)}`);
    }
  }
};

type RankKey = (process: ProcessRecord) => number;

const pickMin = (ready: readonly ProcessRecord[], key: RankKey): ProcessRecord | null => {
  let best: ProcessRecord | null = null;
  for (const candidate of ready) {
    if (!best) {
      best = candidate;
      continue;
    }
    const delta = key(candidate) - key(best);
    if (delta < 0 || (delta === 0 && candidate.id < best.id)) {
      best = candidate;
    }
  }
  return best;
};

const byArrival: RankKey = (p) => p.arrival_tick;
const byRemaining: RankKey = (p) => p.remaining;
const byPriority: RankKey = (p) => p.priority;
const byReadySeq: RankKey = (p) => p.ready_seq;

const selectionKey = (policy: SchedulingPolicy): RankKey => {
  switch (policy.kind) {
    case "FCFS":
      return byArrival;
    case "SJF":
    case "SRTF":
      return byRemaining;
    case "RR":
      return byReadySeq;
    case "PRIORITY":
      return byPriority;
  }
};

/**
 * The single selection rule applied at step (b) of every tick.
 * `ready` holds the Ready processes only; the running process is passed
 * separately.
 */
export const applyPolicy = (
  policy: SchedulingPolicy,
  running: ProcessRecord | null,
  ready: readonly ProcessRecord[],
): PolicyDecision => {
  const key = selectionKey(policy);

  if (!running) {
    const next = pickMin(ready, key);
    return next ? { type: "dispatch", next } : { type: "idle" };
  }

  if (policy.kind === "SRTF") {
    const challenger = pickMin(ready, byRemaining);
    if (challenger && challenger.remaining < running.remaining) {
      return { type: "preempt", running, next: challenger };
    }
    return { type: "keep", running };
  }

  if (policy.kind === "RR" && running.quantum_used >= policy.quantum) {
    // the expired process re-enters at the tail, so anything already Ready goes first
    const next = pickMin(ready, byReadySeq) ?? running;
    return { type: "preempt", running, next };
  }

  return { type: "keep", running };
};

export const policyName = (policy: SchedulingPolicy): PolicyName => policy.kind;

export const describePolicy = (policy: SchedulingPolicy): string =>
  policy.kind === "RR" ? `RR (quantum ${policy.quantum})` : policy.kind;
