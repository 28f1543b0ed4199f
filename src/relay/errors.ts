export type RelayErrorCode =
  | "DISCOVERY_FAILED"
  | "INVALID_TRANSITION"
  | "CONNECT_FAILED"
  | "TIMEOUT"
  | "PROTOCOL_ERROR"
  | "BACKEND_ABORT"
  | "CALLER_CANCELED"
  | "CAPACITY_EXCEEDED"
  | "BAD_REQUEST"
  | "NOT_FOUND"
  | "CONFIG_INVALID"
  | "INTERNAL";

/**
 * Codes that end a delegated task as `failed`. None of them is retried inside the relay.
 */
export const DELEGATION_FAILURES: ReadonlySet<RelayErrorCode> = new Set<RelayErrorCode>([
  "CONNECT_FAILED",
  "TIMEOUT",
  "PROTOCOL_ERROR",
  "BACKEND_ABORT"
]);

export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly details?: unknown;

  constructor(code: RelayErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "RelayError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }

  toJSON(): { code: RelayErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

export function isRelayError(err: unknown, code?: RelayErrorCode): err is RelayError {
  return err instanceof RelayError && (code === undefined || err.code === code);
}

export function toRelayError(err: unknown): RelayError {
  if (err instanceof RelayError) return err;
  if (err instanceof Error) {
    // Zod validation errors
    if (err.name === "ZodError") {
      const issues = "issues" in err ? err.issues : undefined;
      return new RelayError("BAD_REQUEST", "Validation error", { issues });
    }
    return new RelayError("INTERNAL", err.message, { name: err.name, stack: err.stack });
  }
  return new RelayError("INTERNAL", "Unknown error", { err });
}

/**
 * Caller-visible failure reason carried by a task and by a failed channel close.
 */
export type FailureReason = {
  kind: RelayErrorCode;
  message: string;
};

export function toFailureReason(err: unknown): FailureReason {
  const relayErr = toRelayError(err);
  return { kind: relayErr.code, message: relayErr.message };
}
