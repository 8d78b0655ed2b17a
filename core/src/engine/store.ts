/**
 * Per-batch table of encrypted slots.
 *
 * Writes overwrite: the last handle written to a slot for a batch is the one
 * that counts. No homomorphic combination happens here.
 */

import type { Hex } from "viem";
import {
  SLOT_ORDER,
  type CiphertextHandle,
  type EncryptedSlotSet,
  type SlotName,
  type SlotValue,
} from "../types/state.js";

export function emptySlotSet(): EncryptedSlotSet {
  return {
    stockPrice: { kind: "unset" },
    playerBalance: { kind: "unset" },
    playerStockHolding: { kind: "unset" },
    newsImpact: { kind: "unset" },
  };
}

function copySlot(value: SlotValue): SlotValue {
  return value.kind === "ciphertext"
    ? { kind: "ciphertext", handle: value.handle }
    : { kind: "unset" };
}

function copySlotSet(set: EncryptedSlotSet): EncryptedSlotSet {
  return {
    stockPrice: copySlot(set.stockPrice),
    playerBalance: copySlot(set.playerBalance),
    playerStockHolding: copySlot(set.playerStockHolding),
    newsImpact: copySlot(set.newsImpact),
  };
}

export class EncryptedStateStore {
  private slots = new Map<bigint, EncryptedSlotSet>();

  /**
   * Copy of a batch's slot set as it stands now. Batches never written to
   * read as all unset.
   */
  get(batchId: bigint): EncryptedSlotSet {
    const set = this.slots.get(batchId);
    return set ? copySlotSet(set) : emptySlotSet();
  }

  getSlot(batchId: bigint, slot: SlotName): SlotValue {
    const set = this.slots.get(batchId);
    return set ? copySlot(set[slot]) : { kind: "unset" };
  }

  /**
   * Handles in SLOT_ORDER, null for unset slots.
   */
  handles(batchId: bigint): (Hex | null)[] {
    const set = this.slots.get(batchId) ?? emptySlotSet();
    return SLOT_ORDER.map((name) => {
      const value = set[name];
      return value.kind === "ciphertext" ? value.handle : null;
    });
  }

  write(batchId: bigint, writes: Partial<Record<SlotName, CiphertextHandle>>): EncryptedSlotSet {
    const next: Record<SlotName, SlotValue> = { ...this.get(batchId) };
    for (const name of SLOT_ORDER) {
      const handle = writes[name];
      if (handle !== undefined) next[name] = { kind: "ciphertext", handle };
    }
    this.slots.set(batchId, next);
    return copySlotSet(next);
  }

  batchIds(): bigint[] {
    return Array.from(this.slots.keys());
  }
}
