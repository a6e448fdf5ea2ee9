import { Router } from "express";
import type { Response } from "express";
import {
  addProcessRequestSchema,
  describeIssues,
  setPolicyRequestSchema,
  type AddProcessReply,
} from "@shared/scheduler";
import { log, logError } from "../lib/log";
import { metrics } from "../metrics";
import { reportError } from "../services/observability/error-reporter";
import { errorMessage, isSchedulerError } from "../services/scheduler/errors";
import type { SchedulerRuntime } from "../services/scheduler/runtime";

const sendFailure = (res: Response, error: unknown, route: string) => {
  if (isSchedulerError(error)) {
    res.status(error.status).json({ error: error.code, message: error.message });
    return;
  }
  logError(`${route} failed`, error, "http");
  reportError(error, { route });
  res.status(500).json({ error: "INTERNAL", message: errorMessage(error) });
};

export function createSchedulerRouter(runtime: SchedulerRuntime): Router {
  const router = Router();

  router.get("/state", (_req, res) => {
    res.json(runtime.snapshot());
  });

  router.get("/stats", (_req, res) => {
    res.json(runtime.stats());
  });

  router.get("/clients", (_req, res) => {
    res.json(runtime.broker.roster());
  });

  router.get("/clock", (_req, res) => {
    const { clock } = runtime;
    res.json({ running: clock.isRunning(), paused: clock.isPaused(), intervalMs: clock.intervalMs });
  });

  router.post("/clock/pause", (_req, res) => {
    runtime.clock.pause();
    log("clock paused by operator", "http");
    res.json({ paused: true });
  });

  router.post("/clock/resume", (_req, res) => {
    runtime.clock.resume();
    log("clock resumed by operator", "http");
    res.json({ paused: false });
  });

  router.get("/policy", (_req, res) => {
    res.json(runtime.policy());
  });

  router.put("/policy", async (req, res) => {
    const parsed = setPolicyRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "INVALID_POLICY", message: describeIssues(parsed.error) });
      return;
    }
    try {
      await runtime.setPolicy(parsed.data.policy, parsed.data.quantum);
      res.json(runtime.policy());
    } catch (error) {
      sendFailure(res, error, "PUT /policy");
    }
  });

  router.post("/processes", async (req, res) => {
    const parsed = addProcessRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      metrics.recordInjection("rejected");
      const reply: AddProcessReply = { accepted: false, reason: describeIssues(parsed.error) };
      res.status(400).json(reply);
      return;
    }
    try {
      const id = await runtime.submit(parsed.data);
      metrics.recordInjection("accepted");
      const reply: AddProcessReply = { accepted: true, id };
      res.status(201).json(reply);
    } catch (error) {
      metrics.recordInjection("rejected");
      if (isSchedulerError(error) && error.code === "INVALID_PROCESS_SPEC") {
        const reply: AddProcessReply = { accepted: false, reason: error.message };
        res.status(400).json(reply);
        return;
      }
      sendFailure(res, error, "POST /processes");
    }
  });

  return router;
}
