import type { Address } from "viem";
import type { DecryptedValues } from "./state.js";

export type MarketEvent =
  | { type: "OwnershipTransferred"; previousOwner: Address; newOwner: Address }
  | { type: "ProviderAdded"; account: Address }
  | { type: "ProviderRemoved"; account: Address }
  | { type: "CooldownUpdated"; previousSeconds: number; cooldownSeconds: number }
  | { type: "Paused"; account: Address }
  | { type: "Unpaused"; account: Address }
  | { type: "BatchOpened"; batchId: bigint }
  | { type: "BatchClosed"; batchId: bigint }
  | { type: "NewsSubmitted"; batchId: bigint; provider: Address }
  | { type: "TradeSubmitted"; batchId: bigint; trader: Address }
  | { type: "DecryptionRequested"; requestId: bigint; batchId: bigint; requester: Address }
  | {
      type: "DecryptionCompleted";
      requestId: bigint;
      batchId: bigint;
      values: DecryptedValues;
    };

export type MarketEventType = MarketEvent["type"];

/**
 * A logged event. seq starts at 1 and increases by one per emitted event.
 */
export interface EventRecord {
  seq: number;
  emittedAt: number;
  event: MarketEvent;
}
