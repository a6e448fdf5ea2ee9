export type SchedulerErrorCode =
  | "INVALID_PROCESS_SPEC"
  | "POLICY_LOCKED"
  | "INVALID_POLICY"
  | "PROTOCOL_ERROR"
  | "CONNECTION_LOST";

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode;
  status: number;
  constructor(code: SchedulerErrorCode, message: string, status = 400) {
    super(message);
    this.code = code;
    this.status = status;
    this.name = "SchedulerError";
  }
}

export class InvalidProcessSpecError extends SchedulerError {
  constructor(message: string) {
    super("INVALID_PROCESS_SPEC", message, 400);
    this.name = "InvalidProcessSpecError";
  }
}

export class PolicyLockedError extends SchedulerError {
  constructor(message = "policy cannot change once a process has run") {
    super("POLICY_LOCKED", message, 409);
    this.name = "PolicyLockedError";
  }
}

export class InvalidPolicyError extends SchedulerError {
  constructor(message: string) {
    super("INVALID_POLICY", message, 400);
    this.name = "InvalidPolicyError";
  }
}

export class ProtocolError extends SchedulerError {
  constructor(message: string) {
    super("PROTOCOL_ERROR", message, 400);
    this.name = "ProtocolError";
  }
}

export class ConnectionLostError extends SchedulerError {
  readonly connectionId: string;
  constructor(connectionId: string, message = "connection lost") {
    super("CONNECTION_LOST", message, 499);
    this.connectionId = connectionId;
    this.name = "ConnectionLostError";
  }
}

export const isSchedulerError = (error: unknown): error is SchedulerError =>
  error instanceof SchedulerError;

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};
