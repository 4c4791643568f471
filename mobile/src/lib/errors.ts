/**
 * Error types shared across features.
 *
 * Every error carries a machine-readable `code` (UPPER_SNAKE_CASE) alongside
 * the human-readable message, the same envelope the API uses.
 */

export class LexicubeError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (details && Object.keys(details).length > 0) this.details = details;
  }
}

/** The match exists but nobody has saved a turn yet. Expected for new matches. */
export class NoTurnDataYetError extends LexicubeError {
  constructor() {
    super("NO_TURN_DATA_YET", "Match has no turn data yet.");
  }
}

/** The match carries bytes that do not decode into a turn payload. */
export class MalformedTurnDataError extends LexicubeError {
  constructor(reason: string, issues: string[] = []) {
    super("MALFORMED_TURN_DATA", `Turn data could not be decoded: ${reason}`, {
      issues,
    });
  }
}

export type TurnDataError = NoTurnDataYetError | MalformedTurnDataError;

/** A call into an external client (match service, store, API) failed. Never retried. */
export class CommandFailedError extends LexicubeError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("COMMAND_FAILED", `Command "${command}" failed: ${reason}`);
    this.command = command;
    this.cause = cause;
  }
}

export class ApiRequestError extends LexicubeError {
  readonly status: number;

  constructor(status: number, code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.status = status;
  }
}

/** Wrap anything thrown into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/** Exhaustiveness check for tagged unions */
export function assertNever(value: never): never {
  throw new LexicubeError("UNHANDLED_VARIANT", `Unhandled variant: ${JSON.stringify(value)}`);
}
