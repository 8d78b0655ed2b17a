import type { Hex } from "viem";
import type { DecryptedValues } from "../types/state.js";

/**
 * Entry point the oracle invokes once it has decrypted a request.
 */
export type DecryptionCallback = (
  requestId: bigint,
  cleartexts: Hex,
  proof: Hex
) => Promise<DecryptedValues>;

/**
 * Contract of the external confidential-compute oracle.
 *
 * requestDecryption must return a request id it has never issued before and
 * must not invoke the callback before the returned promise settles. It must
 * settle promptly: the market awaits it inside its serial executor, so a
 * promise that never settles blocks every later operation.
 */
export interface DecryptionOracle {
  requestDecryption(handles: readonly Hex[], callback: DecryptionCallback): Promise<bigint>;
  verifyProof(requestId: bigint, cleartexts: Hex, proof: Hex): Promise<boolean>;
}
