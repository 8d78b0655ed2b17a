/**
 * Sealed Market
 *
 * Encrypted batch state for a multiplayer trading simulation, with
 * proof-checked asynchronous decryption through a confidential-compute
 * oracle.
 *
 * @packageDocumentation
 */

// =============================================================================
// Main Exports
// =============================================================================

export { ConfidentialMarket, type MarketOptions } from "./market.js";
export { loadConfig } from "./config.js";
export { createLogger, type Logger } from "./utils/logger.js";

// Types
export type { MarketConfig } from "./types/config.js";
export type {
  ActionCategory,
  BatchInfo,
  CiphertextHandle,
  Clock,
  DecryptedValues,
  DecryptionContext,
  EncryptedSlotSet,
  SlotName,
  SlotValue,
} from "./types/state.js";
export { SLOT_ORDER, systemClock } from "./types/state.js";
export type { EventRecord, MarketEvent, MarketEventType } from "./types/events.js";

// Error types
export {
  MarketError,
  PermissionDeniedError,
  SystemPausedError,
  AlreadyPausedError,
  AlreadyUnpausedError,
  BatchNotOpenError,
  CooldownActiveError,
  UnknownRequestError,
  ReplayAttemptError,
  StateMismatchError,
  InvalidProofError,
  MalformedCleartextError,
  InvalidInputError,
  isMarketError,
  type ErrorCategory,
  type ErrorCode,
} from "./errors.js";

// =============================================================================
// Oracle
// =============================================================================

export type { DecryptionCallback, DecryptionOracle } from "./oracle/types.js";
export { LocalOracle, type LocalOracleOptions, type SignedCleartexts } from "./oracle/local.js";
export { CiphertextVault } from "./oracle/vault.js";
export { decryptionDigest, signDecryption, verifyDecryption } from "./oracle/proof.js";

// =============================================================================
// Utility Exports
// =============================================================================

export { computeStateHash, commitSlots } from "./engine/commitment.js";
export { decodeCleartexts, encodeCleartexts, CLEARTEXT_SIZE } from "./engine/cleartext.js";
export { EventLog, type EventListener, type EventView } from "./engine/events.js";
