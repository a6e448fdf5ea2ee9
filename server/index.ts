import { createServer, type Server } from "node:http";
import { SCHEDULER_WS_PATH } from "@shared/scheduler";
import { createSchedulerApp } from "./app";
import { ConfigError, loadSchedulerConfig, type SchedulerConfig } from "./config/env";
import { log, logError } from "./lib/log";
import { attachSchedulerSocket, type RealtimeHandle } from "./realtime";
import { flushErrorReporter, initErrorReporter } from "./services/observability/error-reporter";
import { createSchedulerRuntime, type SchedulerRuntime } from "./services/scheduler/runtime";

let serverInstance: Server | null = null;
let realtime: RealtimeHandle | null = null;
let runtime: SchedulerRuntime | null = null;
let shuttingDown = false;

const requestShutdown = (signal: NodeJS.Signals) => {
  log(`signal received: ${signal}`, "process");
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  const forceExitTimer = setTimeout(() => {
    logError("forcing exit after graceful shutdown timeout", undefined, "process");
    process.exit(1);
  }, 5000);

  const exit = (code: number) => {
    clearTimeout(forceExitTimer);
    flushErrorReporter()
      .catch((err: unknown) => logError("error reporter flush failed", err, "process"))
      .finally(() => process.exit(code));
  };

  runtime?.stop();

  const closeRealtime = realtime ? realtime.close() : Promise.resolve();
  closeRealtime
    .catch((err: unknown) => logError("websocket server close failed", err, "process"))
    .finally(() => {
      if (!serverInstance) {
        exit(0);
        return;
      }
      serverInstance.close((err) => {
        if (err) {
          logError("error while closing server", err, "process");
          exit(1);
          return;
        }
        exit(0);
      });
    });
};

for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.on(sig, () => requestShutdown(sig));
}

const loadConfigOrExit = (): SchedulerConfig => {
  try {
    return loadSchedulerConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logError(err.message, undefined, "config");
      process.exit(1);
    }
    throw err;
  }
};

const main = async () => {
  await initErrorReporter();
  const config = loadConfigOrExit();

  runtime = createSchedulerRuntime({
    policy: config.policy,
    quantum: config.quantum,
    maxProcesses: config.maxProcesses,
    tickIntervalMs: config.tickIntervalMs,
    deliveryTimeoutMs: config.deliveryTimeoutMs,
    outboundLimit: config.outboundLimit,
    startPaused: config.startPaused,
  });

  const app = createSchedulerApp(runtime);
  const server = createServer(app);
  serverInstance = server;
  realtime = attachSchedulerSocket(server, runtime.broker);

  // Binding is the only failure that takes the process down
  server.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EADDRINUSE") {
      logError(`port ${config.port} is already in use`, undefined, "server");
    } else {
      logError("listen failed", err, "server");
    }
    process.exit(1);
  });

  const activeRuntime = runtime;
  server.listen({ port: config.port, host: config.host }, () => {
    log(`listening on http://${config.host}:${config.port} (ws path ${SCHEDULER_WS_PATH})`, "server");
    log(`policy ${config.policy}, quantum ${config.quantum}, tick ${config.tickIntervalMs}ms`, "server");
    activeRuntime.start();
  });
};

main().catch((err: unknown) => {
  logError("startup failed", err, "process");
  process.exit(1);
});
