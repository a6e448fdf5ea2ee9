import type { ProcessRecord } from "./process";

export type GanttSegment = {
  // null marks an idle CPU
  id: number | null;
  start: number;
  end: number;
};

export type ProcessMetrics = {
  id: number;
  turnaround: number;
  waiting: number;
  response: number;
};

export type RunStatistics = {
  tick: number;
  total: number;
  finished: number;
  avg_waiting: number;
  avg_turnaround: number;
  avg_response: number;
  throughput: number;
  cpu_utilization: number;
  context_switches: number;
  processes: ProcessMetrics[];
  gantt: GanttSegment[];
};

export const appendGantt = (timeline: GanttSegment[], id: number | null, slot: number): void => {
  const last = timeline[timeline.length - 1];
  if (last && last.id === id && last.end === slot) {
    last.end = slot + 1;
    return;
  }
  timeline.push({ id, start: slot, end: slot + 1 });
};

const mean = (values: number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

export const processMetrics = (process: ProcessRecord): ProcessMetrics | null => {
  if (process.finish_tick === null || process.first_run_tick === null) return null;
  const turnaround = process.finish_tick - process.arrival_tick;
  return {
    id: process.id,
    turnaround,
    waiting: turnaround - process.burst_total,
    response: process.first_run_tick - process.arrival_tick,
  };
};

export const computeStatistics = (input: {
  tick: number;
  processes: readonly ProcessRecord[];
  gantt: readonly GanttSegment[];
  contextSwitches: number;
}): RunStatistics => {
  const metrics: ProcessMetrics[] = [];
  for (const process of input.processes) {
    const entry = processMetrics(process);
    if (entry) metrics.push(entry);
  }
  const busy = input.gantt.reduce(
    (sum, segment) => (segment.id === null ? sum : sum + (segment.end - segment.start)),
    0,
  );
  const elapsed = input.tick;
  return {
    tick: input.tick,
    total: input.processes.length,
    finished: metrics.length,
    avg_waiting: mean(metrics.map((m) => m.waiting)),
    avg_turnaround: mean(metrics.map((m) => m.turnaround)),
    avg_response: mean(metrics.map((m) => m.response)),
    throughput: elapsed > 0 ? metrics.length / elapsed : 0,
    cpu_utilization: elapsed > 0 ? busy / elapsed : 0,
    context_switches: input.contextSwitches,
    processes: metrics,
    gantt: input.gantt.map((segment) => ({ ...segment })),
  };
};
