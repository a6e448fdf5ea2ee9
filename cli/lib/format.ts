import type { AddProcessReply, Snapshot } from "@shared/scheduler";

const label = (id: number) => `P${id}`;

const list = (items: string[]) => `[${items.join(",")}]`;

/** One terminal line per tick: `[t=4] RR cpu=P2(1/3) ready=[P1] pending=[P3@6] done=[]`. */
export const formatSnapshotLine = (snapshot: Snapshot): string => {
  const running = snapshot.processes.find((p) => p.id === snapshot.running_id);
  const cpu = running ? `${label(running.id)}(${running.remaining}/${running.burst_total})` : "idle";
  const ready = snapshot.processes.filter((p) => p.state === "Ready").map((p) => label(p.id));
  const pending = snapshot.processes
    .filter((p) => p.state === "Pending")
    .map((p) => `${label(p.id)}@${p.arrival_tick}`);
  const done = snapshot.processes
    .filter((p) => p.state === "Finished")
    .map((p) => `${label(p.id)}@${p.finish_tick ?? "?"}`);
  return `[t=${snapshot.tick}] ${snapshot.policy} cpu=${cpu} ready=${list(ready)} pending=${list(pending)} done=${list(done)}`;
};

export const formatReply = (reply: AddProcessReply): string =>
  reply.accepted ? `accepted as ${label(reply.id)}` : `rejected: ${reply.reason}`;
