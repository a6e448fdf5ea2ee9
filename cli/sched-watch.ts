#!/usr/bin/env node
import { snapshotSchema } from "@shared/scheduler";
import { parseWatchArgs } from "./lib/args";
import { formatSnapshotLine } from "./lib/format";
import { connectSchedulerClient, DEFAULT_SCHEDULER_URL } from "./lib/scheduler-client";

const USAGE = `Usage: sched-watch [--url ws://host:port/ws/scheduler] [--json]

Connects as a renderer and prints one line per tick.
  --url    scheduler websocket (default ${DEFAULT_SCHEDULER_URL}, or SCHED_URL)
  --json   print the raw snapshot instead of the summary line`;

async function main() {
  const args = parseWatchArgs(process.argv.slice(2));
  if (args.help) {
    console.error(USAGE);
    process.exit(0);
  }
  const url = args.url ?? process.env.SCHED_URL ?? DEFAULT_SCHEDULER_URL;

  const connection = await connectSchedulerClient({
    url,
    role: "renderer",
    onFrame: (frame) => {
      const snapshot = snapshotSchema.safeParse(frame);
      if (!snapshot.success) {
        console.error("[sched-watch] ignoring unexpected frame");
        return;
      }
      process.stdout.write(
        `${args.json ? JSON.stringify(snapshot.data) : formatSnapshotLine(snapshot.data)}\n`,
      );
    },
    onMalformedFrame: () => console.error("[sched-watch] ignoring malformed frame"),
  });
  console.error(`[sched-watch] watching ${url}`);

  process.on("SIGINT", () => connection.close());
  const { code, reason } = await connection.closed;
  console.error(`[sched-watch] disconnected (${code}${reason ? ` ${reason}` : ""})`);
}

main().catch((err) => {
  console.error("[sched-watch]", err instanceof Error ? err.message : err);
  process.exit(1);
});
