import type { PolicyName, Snapshot } from "@shared/scheduler";
import { InvalidProcessSpecError, PolicyLockedError } from "./errors";
import {
  applyPolicy,
  buildPolicy,
  DEFAULT_QUANTUM,
  policyName,
  type SchedulingPolicy,
} from "./policies";
import {
  createProcess,
  dispatch,
  markReady,
  runOneUnit,
  toProcessView,
  type ProcessRecord,
  type ProcessSpec,
} from "./process";
import { appendGantt, computeStatistics, type GanttSegment, type RunStatistics } from "./stats";

export type SchedulingEngineOptions = {
  policy?: PolicyName;
  quantum?: number;
  maxProcesses?: number;
};

export const DEFAULT_MAX_PROCESSES = 64;

/**
 * Owns the simulation state: the process table, the ready ordering, the
 * running slot and the logical tick. Callers only ever see frozen snapshots.
 *
 * Slot semantics: `tick()` executes the slot `[t, t + 1)` where
 * `t = current_tick`, so a process consuming its last unit in slot `t`
 * finishes at `t + 1`, which is also the tick the returned snapshot carries.
 */
export class SchedulingEngine {
  private currentTick = 0;
  private policy: SchedulingPolicy;
  private readonly defaultQuantum: number;
  private readonly maxProcesses: number;
  private readonly processes = new Map<number, ProcessRecord>();
  private running: ProcessRecord | null = null;
  private nextId = 1;
  private readySeq = 0;
  private dispatched = false;
  private contextSwitches = 0;
  private readonly gantt: GanttSegment[] = [];
  private latest: Snapshot;

  constructor(options: SchedulingEngineOptions = {}) {
    this.defaultQuantum = options.quantum ?? DEFAULT_QUANTUM;
    this.maxProcesses = options.maxProcesses ?? DEFAULT_MAX_PROCESSES;
    this.policy = buildPolicy(options.policy ?? "FCFS", this.defaultQuantum);
    this.latest = this.buildSnapshot();
  }

  getCurrentTick(): number {
    return this.currentTick;
  }

  addProcess(spec: ProcessSpec): number {
    this.validateSpec(spec);
    const id = this.nextId;
    this.nextId += 1;
    this.processes.set(id, createProcess(id, spec));
    return id;
  }

  tick(): Snapshot {
    if (this.isComplete()) {
      return this.latest;
    }
    const slot = this.currentTick;

    for (const process of this.processes.values()) {
      if (process.state === "Pending" && process.arrival_tick <= slot) {
        markReady(process, this.nextReadySeq());
      }
    }

    const ready = this.readyProcesses();
    const previous = this.running;
    const decision = applyPolicy(this.policy, previous, ready);
    switch (decision.type) {
      case "dispatch":
        this.startRunning(decision.next, previous);
        break;
      case "preempt":
        markReady(decision.running, this.nextReadySeq());
        this.running = null;
        this.startRunning(decision.next, previous);
        break;
      case "keep":
      case "idle":
        break;
    }

    const active = this.running;
    if (active) {
      appendGantt(this.gantt, active.id, slot);
      if (runOneUnit(active, slot)) {
        this.running = null;
      }
    } else {
      appendGantt(this.gantt, null, slot);
    }

    this.currentTick = slot + 1;
    this.latest = this.buildSnapshot();
    return this.latest;
  }

  setPolicy(name: PolicyName, quantum?: number): void {
    if (this.dispatched) {
      throw new PolicyLockedError();
    }
    this.policy = buildPolicy(name, quantum ?? this.defaultQuantum);
    this.latest = this.buildSnapshot();
  }

  snapshot(): Snapshot {
    return this.latest;
  }

  /** True when every known process is Finished (vacuously true with none). */
  isComplete(): boolean {
    for (const process of this.processes.values()) {
      if (process.state !== "Finished") return false;
    }
    return true;
  }

  isPolicyLocked(): boolean {
    return this.dispatched;
  }

  currentPolicy(): SchedulingPolicy {
    return { ...this.policy };
  }

  stats(): RunStatistics {
    return computeStatistics({
      tick: this.currentTick,
      processes: Array.from(this.processes.values()),
      gantt: this.gantt,
      contextSwitches: this.contextSwitches,
    });
  }

  private validateSpec(spec: ProcessSpec): void {
    const fields: Array<keyof ProcessSpec> = ["arrival_tick", "burst_total", "priority"];
    for (const field of fields) {
      if (!Number.isInteger(spec[field])) {
        throw new InvalidProcessSpecError(`${field} must be an integer`);
      }
    }
    if (spec.burst_total <= 0) {
      throw new InvalidProcessSpecError(`burst_total must be positive, got ${spec.burst_total}`);
    }
    if (spec.arrival_tick < this.currentTick) {
      throw new InvalidProcessSpecError(
        `arrival_tick ${spec.arrival_tick} is before the current tick ${this.currentTick}`,
      );
    }
    if (this.processes.size >= this.maxProcesses) {
      throw new InvalidProcessSpecError(`process table is full (${this.maxProcesses})`);
    }
  }

  private readyProcesses(): ProcessRecord[] {
    const ready: ProcessRecord[] = [];
    for (const process of this.processes.values()) {
      if (process.state === "Ready") ready.push(process);
    }
    return ready;
  }

  private startRunning(next: ProcessRecord, previous: ProcessRecord | null): void {
    dispatch(next);
    if (next !== previous) {
      this.contextSwitches += 1;
    }
    this.running = next;
    this.dispatched = true;
  }

  private nextReadySeq(): number {
    this.readySeq += 1;
    return this.readySeq;
  }

  private buildSnapshot(): Snapshot {
    const processes = Array.from(this.processes.values(), toProcessView);
    Object.freeze(processes);
    const snapshot: Snapshot = {
      tick: this.currentTick,
      policy: policyName(this.policy),
      processes,
      running_id: this.running?.id ?? null,
    };
    return Object.freeze(snapshot);
  }
}
