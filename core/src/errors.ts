// =============================================================================
// Error Types
// =============================================================================

export type ErrorCategory =
  | "authorization"
  | "availability"
  | "rate-limit"
  | "protocol"
  | "validation";

export type ErrorCode =
  | "PERMISSION_DENIED"
  | "SYSTEM_PAUSED"
  | "ALREADY_PAUSED"
  | "ALREADY_UNPAUSED"
  | "BATCH_NOT_OPEN"
  | "COOLDOWN_ACTIVE"
  | "UNKNOWN_REQUEST"
  | "REPLAY_ATTEMPT"
  | "STATE_MISMATCH"
  | "INVALID_PROOF"
  | "MALFORMED_CLEARTEXT"
  | "INVALID_INPUT";

const CATEGORIES: Record<ErrorCode, ErrorCategory> = {
  PERMISSION_DENIED: "authorization",
  SYSTEM_PAUSED: "availability",
  ALREADY_PAUSED: "availability",
  ALREADY_UNPAUSED: "availability",
  BATCH_NOT_OPEN: "availability",
  COOLDOWN_ACTIVE: "rate-limit",
  UNKNOWN_REQUEST: "protocol",
  REPLAY_ATTEMPT: "protocol",
  STATE_MISMATCH: "protocol",
  INVALID_PROOF: "protocol",
  MALFORMED_CLEARTEXT: "protocol",
  INVALID_INPUT: "validation",
};

/**
 * Base class for every rejection raised by the market. An operation that
 * throws a MarketError has left all state untouched.
 */
export class MarketError extends Error {
  readonly category: ErrorCategory;

  constructor(message: string, public readonly code: ErrorCode) {
    super(message);
    this.name = "MarketError";
    this.category = CATEGORIES[code];
  }
}

export class PermissionDeniedError extends MarketError {
  constructor(message: string) {
    super(message, "PERMISSION_DENIED");
    this.name = "PermissionDeniedError";
  }
}

export class SystemPausedError extends MarketError {
  constructor() {
    super("System is paused", "SYSTEM_PAUSED");
    this.name = "SystemPausedError";
  }
}

export class AlreadyPausedError extends MarketError {
  constructor() {
    super("System is already paused", "ALREADY_PAUSED");
    this.name = "AlreadyPausedError";
  }
}

export class AlreadyUnpausedError extends MarketError {
  constructor() {
    super("System is not paused", "ALREADY_UNPAUSED");
    this.name = "AlreadyUnpausedError";
  }
}

export class BatchNotOpenError extends MarketError {
  constructor() {
    super("No batch is open", "BATCH_NOT_OPEN");
    this.name = "BatchNotOpenError";
  }
}

export class CooldownActiveError extends MarketError {
  constructor() {
    super("Cooldown period has not elapsed", "COOLDOWN_ACTIVE");
    this.name = "CooldownActiveError";
  }
}

export class UnknownRequestError extends MarketError {
  constructor(requestId: bigint) {
    super(`Unknown decryption request ${requestId}`, "UNKNOWN_REQUEST");
    this.name = "UnknownRequestError";
  }
}

export class ReplayAttemptError extends MarketError {
  constructor(requestId: bigint) {
    super(`Decryption request ${requestId} already processed`, "REPLAY_ATTEMPT");
    this.name = "ReplayAttemptError";
  }
}

export class StateMismatchError extends MarketError {
  constructor(requestId: bigint) {
    super(
      `Encrypted state changed since decryption request ${requestId}`,
      "STATE_MISMATCH"
    );
    this.name = "StateMismatchError";
  }
}

export class InvalidProofError extends MarketError {
  constructor(requestId: bigint) {
    super(`Invalid decryption proof for request ${requestId}`, "INVALID_PROOF");
    this.name = "InvalidProofError";
  }
}

export class MalformedCleartextError extends MarketError {
  constructor(message: string) {
    super(message, "MALFORMED_CLEARTEXT");
    this.name = "MalformedCleartextError";
  }
}

export class InvalidInputError extends MarketError {
  constructor(message: string) {
    super(message, "INVALID_INPUT");
    this.name = "InvalidInputError";
  }
}

export function isMarketError(err: unknown): err is MarketError {
  return err instanceof MarketError;
}
