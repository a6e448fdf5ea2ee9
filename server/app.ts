import express, { type NextFunction, type Request, type Response } from "express";
import { log, logError } from "./lib/log";
import { registerMetricsEndpoint } from "./metrics";
import { createSchedulerRouter } from "./routes/scheduler";
import { reportError } from "./services/observability/error-reporter";
import { errorMessage } from "./services/scheduler/errors";
import type { SchedulerRuntime } from "./services/scheduler/runtime";

// body-parser failures (oversized body, bad charset) carry their own 4xx status
const clientErrorStatus = (err: unknown): number | null => {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
};

export function createSchedulerApp(runtime: SchedulerRuntime): express.Express {
  const app = express();
  app.use(express.json({ limit: "16kb" }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        log(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`, "http");
      }
    });
    next();
  });

  app.get("/healthz", (_req, res) => {
    const { clock } = runtime;
    res.json({
      status: clock.isRunning() ? "ok" : "stopped",
      tick: runtime.snapshot().tick,
      paused: clock.isPaused(),
      timestamp: new Date().toISOString(),
    });
  });

  app.use("/api/scheduler", createSchedulerRouter(runtime));
  registerMetricsEndpoint(app);

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "BAD_JSON", message: "request body is not valid JSON" });
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== null) {
      res.status(status).json({ error: "BAD_REQUEST", message: errorMessage(err) });
      return;
    }
    logError("unhandled request error", err, "http");
    reportError(err);
    res.status(500).json({ error: "INTERNAL", message: "internal error" });
  });

  return app;
}
