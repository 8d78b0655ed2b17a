/**
 * Ciphertext vault for the local oracle.
 *
 * Values are sealed with AES-256-GCM under a vault key that never leaves
 * this object. A handle is keccak256(iv || ciphertext || authTag), so it
 * reveals nothing about the value and differs on every encryption.
 */

import * as crypto from "crypto";
import { bytesToHex, hexToBigInt, hexToBytes, keccak256, numberToHex, type Hex } from "viem";

interface SealedValue {
  iv: Buffer;
  ciphertext: Buffer;
  authTag: Buffer;
}

const MAX_UINT256 = 2n ** 256n - 1n;

export class CiphertextVault {
  private key: Buffer;
  private sealed = new Map<string, SealedValue>();

  constructor(key: Buffer = crypto.randomBytes(32)) {
    if (key.length !== 32) {
      throw new Error(`Vault key must be 32 bytes, got ${key.length}`);
    }
    this.key = key;
  }

  /**
   * Encrypt a uint256 and return its handle.
   */
  encrypt(value: bigint): Hex {
    if (value < 0n || value > MAX_UINT256) {
      throw new RangeError(`Value out of uint256 range: ${value}`);
    }
    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv("aes-256-gcm", this.key, iv);
    const plaintext = Buffer.from(hexToBytes(numberToHex(value, { size: 32 })));
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    const authTag = cipher.getAuthTag();

    const handle = keccak256(Buffer.concat([iv, ciphertext, authTag]));
    this.sealed.set(handle, { iv, ciphertext, authTag });
    return handle;
  }

  /**
   * Decrypt a handle. The zero handle stands for an unset slot and
   * decrypts to 0.
   */
  decrypt(handle: Hex): bigint {
    if (hexToBigInt(handle) === 0n) return 0n;
    const sealed = this.sealed.get(handle.toLowerCase());
    if (!sealed) {
      throw new Error(`Unknown ciphertext handle: ${handle}`);
    }
    const decipher = crypto.createDecipheriv("aes-256-gcm", this.key, sealed.iv);
    decipher.setAuthTag(sealed.authTag);
    const plaintext = Buffer.concat([decipher.update(sealed.ciphertext), decipher.final()]);
    return hexToBigInt(bytesToHex(plaintext));
  }

  has(handle: Hex): boolean {
    return this.sealed.has(handle.toLowerCase());
  }
}
