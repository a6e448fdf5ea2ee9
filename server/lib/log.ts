const quiet = (): boolean => {
  const value = process.env.SCHED_LOG_QUIET?.trim().toLowerCase();
  return value === "1" || value === "true";
};

const timestamp = (): string =>
  new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

export function log(message: string, source = "scheduler"): void {
  if (quiet()) return;
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function logWarn(message: string, source = "scheduler"): void {
  if (quiet()) return;
  console.warn(`${timestamp()} [${source}] ${message}`);
}

export function logError(message: string, error?: unknown, source = "scheduler"): void {
  if (error === undefined) {
    console.error(`${timestamp()} [${source}] ${message}`);
    return;
  }
  console.error(`${timestamp()} [${source}] ${message}`, error);
}
