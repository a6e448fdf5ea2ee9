import { logError, logWarn } from "../../lib/log";

type ErrorReporter = {
  captureException: (error: unknown, context?: Record<string, unknown>) => void;
  flush?: (timeout?: number) => Promise<boolean>;
};

type SentryModule = {
  init: (options: Record<string, unknown>) => void;
  captureException: (error: unknown, context?: Record<string, unknown>) => void;
  flush?: (timeout?: number) => Promise<boolean>;
};

// optional dependency; resolved at run time only when SENTRY_DSN is set
const SENTRY_MODULE = "@sentry/node";

let reporter: ErrorReporter | null = null;

const isSentryModule = (value: unknown): value is SentryModule => {
  if (typeof value !== "object" || value === null) return false;
  return (
    "init" in value &&
    typeof value.init === "function" &&
    "captureException" in value &&
    typeof value.captureException === "function"
  );
};

export const initErrorReporter = async (): Promise<void> => {
  const dsn = process.env.SENTRY_DSN?.trim();
  if (!dsn) return;
  try {
    const mod: unknown = await import(SENTRY_MODULE);
    if (!isSentryModule(mod)) {
      logWarn("Sentry module has an unexpected shape; reporting disabled", "observability");
      return;
    }
    mod.init({
      dsn,
      environment: process.env.SENTRY_ENV ?? process.env.NODE_ENV ?? "development",
      release: process.env.SENTRY_RELEASE,
    });
    reporter = {
      captureException: mod.captureException,
      flush: mod.flush,
    };
  } catch (error) {
    logWarn(`Sentry init skipped: ${error instanceof Error ? error.message : String(error)}`, "observability");
  }
};

export const reportError = (error: unknown, context?: Record<string, unknown>): void => {
  if (!reporter) return;
  try {
    reporter.captureException(error, context);
  } catch (reportFailure) {
    logError("error reporter failed", reportFailure, "observability");
  }
};

export const flushErrorReporter = async (timeoutMs = 2000): Promise<void> => {
  if (!reporter?.flush) return;
  try {
    await reporter.flush(timeoutMs);
  } catch (flushFailure) {
    logError("error reporter flush failed", flushFailure, "observability");
  }
};
