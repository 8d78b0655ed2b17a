/**
 * Decryption proofs.
 *
 * A proof is an EIP-191 signature by the oracle key over
 *   keccak256(abi.encode(uint256 requestId, bytes32[] handles, bytes cleartexts))
 * which binds the cleartext to one request and to the exact handles that
 * were submitted with it.
 */

import {
  encodeAbiParameters,
  keccak256,
  size,
  verifyMessage,
  type Address,
  type Hex,
  type LocalAccount,
} from "viem";
import type { Logger } from "../utils/logger.js";

const SIGNATURE_SIZE = 65;

export function decryptionDigest(
  requestId: bigint,
  handles: readonly Hex[],
  cleartexts: Hex
): Hex {
  return keccak256(
    encodeAbiParameters(
      [{ type: "uint256" }, { type: "bytes32[]" }, { type: "bytes" }],
      [requestId, [...handles], cleartexts]
    )
  );
}

export async function signDecryption(
  account: LocalAccount,
  requestId: bigint,
  handles: readonly Hex[],
  cleartexts: Hex
): Promise<Hex> {
  const digest = decryptionDigest(requestId, handles, cleartexts);
  return account.signMessage({ message: { raw: digest } });
}

/**
 * True iff proof is a signature by signer over the decryption digest.
 * Malformed signatures verify as false.
 */
export async function verifyDecryption(
  signer: Address,
  requestId: bigint,
  handles: readonly Hex[],
  cleartexts: Hex,
  proof: Hex,
  logger?: Logger
): Promise<boolean> {
  if (size(proof) !== SIGNATURE_SIZE) return false;
  const digest = decryptionDigest(requestId, handles, cleartexts);
  try {
    return await verifyMessage({ address: signer, message: { raw: digest }, signature: proof });
  } catch (err) {
    logger?.debug({ requestId: requestId.toString(), err }, "Proof signature could not be recovered");
    return false;
  }
}
