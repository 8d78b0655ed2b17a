import { getAddress, hexToBigInt, isAddress, isHex, size, type Address, type Hex } from "viem";
import { InvalidInputError } from "../errors.js";

/**
 * Validate an account address and return its checksummed form.
 */
export function parseAddress(value: string, field = "address"): Address {
  if (!isAddress(value, { strict: false })) {
    throw new InvalidInputError(`${field} is not a valid address: ${value}`);
  }
  return getAddress(value);
}

/**
 * Validate a ciphertext handle: 32 bytes of hex, not the zero word (which
 * stands for an unset slot).
 */
export function parseHandle(value: string, field = "handle"): Hex {
  if (!isHex(value, { strict: true }) || size(value) !== 32) {
    throw new InvalidInputError(`${field} must be a 32-byte hex value`);
  }
  if (hexToBigInt(value) === 0n) {
    throw new InvalidInputError(`${field} must not be the zero handle`);
  }
  return value;
}

export function parseCooldownSeconds(value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidInputError(
      `cooldownSeconds must be a non-negative integer, got ${value}`
    );
  }
  return value;
}
