export type ErrorCode = "VALIDATION" | "NOT_FOUND" | "STRATEGY" | "SESSION_STATE" | "CONFIG";

export abstract class SimError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed order: non-positive price/qty, unknown side, duplicate id. */
export class ValidationError extends SimError {
  readonly code = "VALIDATION";
}

/** Cancel (or lookup) of an order id that is not resting. */
export class NotFoundError extends SimError {
  readonly code = "NOT_FOUND";

  constructor(readonly orderId: string) {
    super(`Order ${orderId} not found`);
  }
}

export class StrategyComputationError extends SimError {
  readonly code = "STRATEGY";

  constructor(readonly trader: string, message: string, options?: { cause?: unknown }) {
    super(`${trader}: ${message}`, options);
  }
}

export class SessionStateError extends SimError {
  readonly code = "SESSION_STATE";
}

/** The only fatal error: raised before a session can start. */
export class ConfigError extends SimError {
  readonly code = "CONFIG";
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
