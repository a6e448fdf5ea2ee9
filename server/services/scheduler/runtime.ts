import type { AddProcessRequest, PolicyName, Snapshot } from "@shared/scheduler";
import { log, logError } from "../../lib/log";
import { metrics } from "../../metrics";
import { reportError } from "../observability/error-reporter";
import { SessionBroker, type BrokerEvent } from "./broker";
import { createSimulationClock, type SimulationClock, type SimulationClockOptions } from "./clock";
import { SchedulingEngine } from "./engine";
import { describePolicy, type SchedulingPolicy } from "./policies";
import { SerialExecutor } from "./serial-executor";
import type { RunStatistics } from "./stats";

export type SchedulerRuntimeOptions = {
  policy?: PolicyName;
  quantum?: number;
  maxProcesses?: number;
  tickIntervalMs?: number;
  deliveryTimeoutMs?: number;
  outboundLimit?: number;
  startPaused?: boolean;
  timers?: Pick<SimulationClockOptions, "now" | "setTimer" | "clearTimer">;
  onBrokerEvent?: (event: BrokerEvent) => void;
};

export type SchedulerRuntime = {
  broker: SessionBroker;
  clock: SimulationClock;
  snapshot: () => Snapshot;
  stats: () => RunStatistics;
  policy: () => SchedulingPolicy & { locked: boolean };
  submit: (request: AddProcessRequest) => Promise<number>;
  setPolicy: (name: PolicyName, quantum?: number) => Promise<Snapshot>;
  start: () => void;
  stop: () => void;
};

/**
 * Wires the engine behind a single serialized owner. The clock and the
 * broker only ever reach the engine through `executor.run`.
 */
export const createSchedulerRuntime = (options: SchedulerRuntimeOptions = {}): SchedulerRuntime => {
  const engine = new SchedulingEngine({
    policy: options.policy,
    quantum: options.quantum,
    maxProcesses: options.maxProcesses,
  });
  const executor = new SerialExecutor();
  let announcedComplete = false;

  const submit = (request: AddProcessRequest): Promise<number> =>
    executor.run("add-process", () => {
      const id = engine.addProcess(request);
      announcedComplete = false;
      return id;
    });

  const broker = new SessionBroker({
    submit,
    deliveryTimeoutMs: options.deliveryTimeoutMs,
    outboundLimit: options.outboundLimit,
    onEvent: options.onBrokerEvent,
  });

  const advance = (): Promise<Snapshot> =>
    executor.run("tick", () => {
      const startedAt = performance.now();
      const before = engine.getCurrentTick();
      const snapshot = engine.tick();
      if (snapshot.tick === before) {
        // complete: nothing to observe until the next arrival is injected
        return snapshot;
      }
      broker.broadcast(snapshot);
      metrics.recordTick(performance.now() - startedAt);
      if (engine.isComplete() && !announcedComplete) {
        announcedComplete = true;
        log(`all processes finished at tick ${snapshot.tick}`, "scheduler");
      }
      return snapshot;
    });

  const clock = createSimulationClock({
    ...options.timers,
    intervalMs: options.tickIntervalMs,
    onTick: async () => {
      await advance();
    },
    onError: (error) => {
      logError("tick failed", error, "clock");
      reportError(error, { source: "clock" });
    },
  });

  const setPolicy = (name: PolicyName, quantum?: number): Promise<Snapshot> =>
    executor.run("set-policy", () => {
      engine.setPolicy(name, quantum);
      log(`policy set to ${describePolicy(engine.currentPolicy())}`, "scheduler");
      return engine.snapshot();
    });

  return {
    broker,
    clock,
    snapshot: () => engine.snapshot(),
    stats: () => engine.stats(),
    policy: () => ({ ...engine.currentPolicy(), locked: engine.isPolicyLocked() }),
    submit,
    setPolicy,
    start: () => {
      clock.start({ paused: options.startPaused ?? false });
      log(
        `clock started (${clock.intervalMs}ms per tick${clock.isPaused() ? ", paused" : ""})`,
        "clock",
      );
    },
    stop: () => {
      clock.stop();
      broker.closeAll();
    },
  };
};
