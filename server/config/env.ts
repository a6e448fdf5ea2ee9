// Centralized environment switches for the scheduling server
import { z } from "zod";
import { describeIssues, policyNameSchema } from "@shared/scheduler";

const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const intFromEnv = (value: string | undefined, defaultValue: number): number => {
  if (value === undefined || value.trim() === "") return defaultValue;
  return Number(value);
};

const schedulerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  policy: policyNameSchema,
  quantum: z.number().int().positive(),
  tickIntervalMs: z.number().int().positive(),
  deliveryTimeoutMs: z.number().int().positive(),
  outboundLimit: z.number().int().positive(),
  maxProcesses: z.number().int().positive(),
  startPaused: z.boolean(),
});
export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const loadSchedulerConfig = (env: NodeJS.ProcessEnv = process.env): SchedulerConfig => {
  const candidate = {
    host: env.SCHED_HOST?.trim() || "127.0.0.1",
    port: intFromEnv(env.SCHED_PORT, 5555),
    policy: (env.SCHED_POLICY?.trim() || "FCFS").toUpperCase(),
    quantum: intFromEnv(env.SCHED_QUANTUM, 2),
    tickIntervalMs: intFromEnv(env.SCHED_TICK_MS, 1000),
    deliveryTimeoutMs: intFromEnv(env.SCHED_DELIVERY_TIMEOUT_MS, 2000),
    outboundLimit: intFromEnv(env.SCHED_OUTBOUND_LIMIT, 32),
    maxProcesses: intFromEnv(env.SCHED_MAX_PROCESSES, 64),
    startPaused: flagEnabled(env.SCHED_START_PAUSED, false),
  };
  const parsed = schedulerConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(`invalid scheduler configuration: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
};
