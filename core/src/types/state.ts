import type { Address, Hex } from "viem";

/**
 * Slots of an encrypted slot set. SLOT_ORDER is the order used both for the
 * state commitment and for the cleartext layout returned by the oracle.
 */
export const SLOT_ORDER = [
  "stockPrice",
  "playerBalance",
  "playerStockHolding",
  "newsImpact",
] as const;

export type SlotName = (typeof SLOT_ORDER)[number];

/** Opaque reference to an encrypted value held by the oracle. */
export type CiphertextHandle = Hex;

export type SlotValue =
  | { readonly kind: "unset" }
  | { readonly kind: "ciphertext"; readonly handle: CiphertextHandle };

export type EncryptedSlotSet = Readonly<Record<SlotName, SlotValue>>;

export type ActionCategory = "submission" | "decryptionRequest";

export interface BatchInfo {
  batchId: bigint;
  isOpen: boolean;
}

/**
 * Plaintext published on a successful fulfillment.
 */
export interface DecryptedValues {
  stockPrice: bigint;
  playerBalance: bigint;
  playerStockHolding: bigint;
  newsImpact: bigint;
}

export interface DecryptionContext {
  requestId: bigint;
  batchId: bigint;
  stateHash: Hex;
  requester: Address;
  requestedAt: number; // unix seconds
  processed: boolean;
  fulfilledAt?: number;
}

/** Source of the current time in unix seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
