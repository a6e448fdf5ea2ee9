import { describe, expect, it } from "vitest";
import type { Snapshot } from "@shared/scheduler";
import { parseInjectArgs, parseWatchArgs } from "../cli/lib/args";
import { formatReply, formatSnapshotLine } from "../cli/lib/format";

describe("sched-watch arguments", () => {
  it("parses the url and json flags", () => {
    expect(parseWatchArgs(["--url", "ws://localhost:9/ws/scheduler", "--json"])).toEqual({
      url: "ws://localhost:9/ws/scheduler",
      json: true,
    });
    expect(parseWatchArgs(["--url=ws://h/x"])).toEqual({ url: "ws://h/x" });
  });

  it("rejects unknown arguments", () => {
    expect(() => parseWatchArgs(["--verbose"])).toThrow("unknown argument --verbose");
  });
});

describe("sched-inject arguments", () => {
  it("parses long, short and inline forms", () => {
    expect(parseInjectArgs(["--burst", "4", "-p", "2", "--arrival=7"])).toEqual({
      burst: 4,
      priority: 2,
      arrival: 7,
    });
    expect(parseInjectArgs(["-r", "5", "--lead", "3", "-h"])).toEqual({ random: 5, lead: 3, help: true });
  });

  it("rejects missing and non-integer values", () => {
    expect(() => parseInjectArgs(["--burst"])).toThrow("missing value for --burst");
    expect(() => parseInjectArgs(["--burst", "2.5"])).toThrow("--burst expects an integer, got 2.5");
    expect(() => parseInjectArgs(["--color", "red"])).toThrow("unknown argument --color");
  });
});

describe("terminal formatting", () => {
  const snapshot: Snapshot = {
    tick: 4,
    policy: "RR",
    running_id: 2,
    processes: [
      { id: 1, state: "Ready", remaining: 2, burst_total: 3, arrival_tick: 0, priority: 5, finish_tick: null },
      { id: 2, state: "Running", remaining: 1, burst_total: 3, arrival_tick: 0, priority: 5, finish_tick: null },
      { id: 3, state: "Pending", remaining: 2, burst_total: 2, arrival_tick: 6, priority: 5, finish_tick: null },
      { id: 4, state: "Finished", remaining: 0, burst_total: 1, arrival_tick: 1, priority: 5, finish_tick: 2 },
    ],
  };

  it("summarises a snapshot on one line", () => {
    expect(formatSnapshotLine(snapshot)).toBe("[t=4] RR cpu=P2(1/3) ready=[P1] pending=[P3@6] done=[P4@2]");
  });

  it("shows an idle CPU", () => {
    expect(formatSnapshotLine({ tick: 0, policy: "FCFS", processes: [], running_id: null })).toBe(
      "[t=0] FCFS cpu=idle ready=[] pending=[] done=[]",
    );
  });

  it("describes injection replies", () => {
    expect(formatReply({ accepted: true, id: 3 })).toBe("accepted as P3");
    expect(formatReply({ accepted: false, reason: "process table is full (64)" })).toBe(
      "rejected: process table is full (64)",
    );
  });
});
