// Wire contract shared by the scheduling server and its renderer / injector clients.
import { z } from "zod";

export const policyNameSchema = z.enum(["FCFS", "SJF", "SRTF", "RR", "PRIORITY"]);
export type PolicyName = z.infer<typeof policyNameSchema>;

export const processStateSchema = z.enum(["Pending", "Ready", "Running", "Finished"]);
export type ProcessState = z.infer<typeof processStateSchema>;

export const clientRoleSchema = z.enum(["renderer", "injector"]);
export type ClientRole = z.infer<typeof clientRoleSchema>;

export const handshakeSchema = z.object({
  role: clientRoleSchema,
});
export type Handshake = z.infer<typeof handshakeSchema>;

export const handshakeReplySchema = z.union([
  z.object({ ok: z.literal(true) }),
  z.object({ ok: z.literal(false), reason: z.string() }),
]);
export type HandshakeReply = z.infer<typeof handshakeReplySchema>;

export const addProcessRequestSchema = z.object({
  arrival_tick: z.number().int(),
  burst_total: z.number().int(),
  priority: z.number().int(),
});
export type AddProcessRequest = z.infer<typeof addProcessRequestSchema>;

export const addProcessReplySchema = z.union([
  z.object({ accepted: z.literal(true), id: z.number().int().positive() }),
  z.object({ accepted: z.literal(false), reason: z.string() }),
]);
export type AddProcessReply = z.infer<typeof addProcessReplySchema>;

export const processViewSchema = z.object({
  id: z.number().int().positive(),
  state: processStateSchema,
  remaining: z.number().int().nonnegative(),
  burst_total: z.number().int().positive(),
  arrival_tick: z.number().int().nonnegative(),
  priority: z.number().int(),
  finish_tick: z.number().int().nonnegative().nullable(),
});
export type ProcessView = z.infer<typeof processViewSchema>;

export const snapshotSchema = z.object({
  tick: z.number().int().nonnegative(),
  policy: policyNameSchema,
  processes: z.array(processViewSchema),
  running_id: z.number().int().positive().nullable(),
});
export type Snapshot = z.infer<typeof snapshotSchema>;

export const setPolicyRequestSchema = z.object({
  policy: policyNameSchema,
  quantum: z.number().int().positive().optional(),
});
export type SetPolicyRequest = z.infer<typeof setPolicyRequestSchema>;

export const SCHEDULER_WS_PATH = "/ws/scheduler";

/** Formats the first zod issue as `path: message` for rejection reasons. */
export const describeIssues = (error: z.ZodError): string => {
  const issue = error.issues[0];
  if (!issue) return "invalid message";
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
};
