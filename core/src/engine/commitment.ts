/**
 * State commitment over a batch's encrypted slots.
 *
 * stateHash = keccak256(abi.encode(bytes32[] handles, address market))
 *
 * Handles are taken in SLOT_ORDER and unset slots contribute the zero word,
 * so every slot is present positionally. The market address ties the
 * commitment to one instance.
 */

import { encodeAbiParameters, keccak256, zeroHash, type Address, type Hex } from "viem";
import type { EncryptedSlotSet } from "../types/state.js";
import { SLOT_ORDER } from "../types/state.js";

export function computeStateHash(
  handles: readonly (Hex | null)[],
  market: Address
): Hex {
  if (handles.length !== SLOT_ORDER.length) {
    throw new Error(
      `Expected ${SLOT_ORDER.length} handles for a state commitment, got ${handles.length}`
    );
  }
  return keccak256(
    encodeAbiParameters(
      [{ type: "bytes32[]" }, { type: "address" }],
      [handles.map((h) => h ?? zeroHash), market]
    )
  );
}

export function commitSlots(slots: EncryptedSlotSet, market: Address): Hex {
  return computeStateHash(
    SLOT_ORDER.map((name) => {
      const value = slots[name];
      return value.kind === "ciphertext" ? value.handle : null;
    }),
    market
  );
}
