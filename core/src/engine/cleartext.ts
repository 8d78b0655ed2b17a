/**
 * Cleartext layout returned by the oracle: four big-endian uint256 words in
 * SLOT_ORDER at offsets 0, 32, 64 and 96. Bytes past 128 are ignored.
 */

import { encodeAbiParameters, hexToBigInt, size, slice, type Hex } from "viem";
import { MalformedCleartextError } from "../errors.js";
import { SLOT_ORDER, type DecryptedValues } from "../types/state.js";

const WORD_SIZE = 32;
export const CLEARTEXT_SIZE = SLOT_ORDER.length * WORD_SIZE;

export function decodeCleartexts(cleartexts: Hex): DecryptedValues {
  const length = size(cleartexts);
  if (length < CLEARTEXT_SIZE) {
    throw new MalformedCleartextError(
      `Expected at least ${CLEARTEXT_SIZE} bytes of cleartext, got ${length}`
    );
  }
  const word = (i: number) =>
    hexToBigInt(slice(cleartexts, i * WORD_SIZE, (i + 1) * WORD_SIZE));
  return {
    stockPrice: word(0),
    playerBalance: word(1),
    playerStockHolding: word(2),
    newsImpact: word(3),
  };
}

export function encodeCleartexts(values: DecryptedValues): Hex {
  return encodeAbiParameters(
    [{ type: "uint256" }, { type: "uint256" }, { type: "uint256" }, { type: "uint256" }],
    [values.stockPrice, values.playerBalance, values.playerStockHolding, values.newsImpact]
  );
}
