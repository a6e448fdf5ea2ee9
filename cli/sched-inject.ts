#!/usr/bin/env node
import { randomInt } from "node:crypto";
import {
  addProcessReplySchema,
  snapshotSchema,
  type AddProcessReply,
  type AddProcessRequest,
} from "@shared/scheduler";
import { parseInjectArgs, type InjectArgs } from "./lib/args";
import { formatReply } from "./lib/format";
import { connectSchedulerClient, DEFAULT_SCHEDULER_URL } from "./lib/scheduler-client";

const USAGE = `Usage: sched-inject [--url ws://host:port/ws/scheduler] [options]

Connects as an injector and submits processes.
  --burst, -b <n>      CPU ticks the process needs
  --priority, -p <n>   lower value = higher priority (default 5)
  --arrival, -a <n>    arrival tick (default: current tick + lead)
  --random, -r <n>     submit n random processes (burst 2-15, priority 1-10)
  --lead <n>           ticks ahead of the current tick for a default arrival (default 1)`;

const stateUrlFor = (wsUrl: string): string => {
  const parsed = new URL(wsUrl);
  parsed.protocol = parsed.protocol === "wss:" ? "https:" : "http:";
  parsed.pathname = "/api/scheduler/state";
  parsed.search = "";
  return parsed.toString();
};

const currentTick = async (wsUrl: string): Promise<number> => {
  const response = await fetch(stateUrlFor(wsUrl));
  if (!response.ok) {
    throw new Error(`state lookup failed with HTTP ${response.status}`);
  }
  const snapshot = snapshotSchema.parse(await response.json());
  return snapshot.tick;
};

const buildRequests = (args: InjectArgs, arrival: number): AddProcessRequest[] => {
  if (args.random !== undefined) {
    return Array.from({ length: Math.max(0, args.random) }, () => ({
      arrival_tick: arrival,
      burst_total: randomInt(2, 16),
      priority: randomInt(1, 11),
    }));
  }
  if (args.burst === undefined) {
    throw new Error("--burst or --random is required");
  }
  return [{ arrival_tick: arrival, burst_total: args.burst, priority: args.priority ?? 5 }];
};

async function main() {
  const args = parseInjectArgs(process.argv.slice(2));
  if (args.help) {
    console.error(USAGE);
    process.exit(0);
  }
  const url = args.url ?? process.env.SCHED_URL ?? DEFAULT_SCHEDULER_URL;
  const arrival = args.arrival ?? (await currentTick(url)) + (args.lead ?? 1);
  const requests = buildRequests(args, arrival);

  const waiters: Array<(reply: AddProcessReply) => void> = [];
  const connection = await connectSchedulerClient({
    url,
    role: "injector",
    onFrame: (frame) => {
      const reply = addProcessReplySchema.safeParse(frame);
      const waiter = waiters.shift();
      if (!reply.success || !waiter) {
        console.error("[sched-inject] unexpected frame from server");
        return;
      }
      waiter(reply.data);
    },
  });

  const lost: Promise<never> = connection.closed.then(({ code }) => {
    throw new Error(`connection closed while waiting for a reply (${code})`);
  });
  // handled by the race below; this keeps a close after the last reply quiet
  void lost.catch(() => undefined);

  let rejected = 0;
  for (const request of requests) {
    const replied = new Promise<AddProcessReply>((resolve) => waiters.push(resolve));
    connection.send(request);
    const reply = await Promise.race([replied, lost]);
    if (!reply.accepted) rejected += 1;
    console.log(
      `arrival=${request.arrival_tick} burst=${request.burst_total} priority=${request.priority} -> ${formatReply(reply)}`,
    );
  }

  connection.close();
  if (rejected > 0) {
    process.exit(2);
  }
}

main().catch((err) => {
  console.error("[sched-inject]", err instanceof Error ? err.message : err);
  process.exit(1);
});
