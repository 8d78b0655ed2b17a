/**
 * In-process confidential-compute oracle.
 *
 * Holds the ciphertext vault, issues fresh request ids (1, 2, 3, …), and on
 * fulfill() decrypts the submitted handles, signs the cleartext and delivers
 * it to the registered callback. Delivery retries transport failures only:
 * a MarketError is the market's verdict on this attempt and is rethrown.
 */

import { generatePrivateKey, privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import type { Address, Hex } from "viem";
import { isMarketError } from "../errors.js";
import { encodeCleartexts } from "../engine/cleartext.js";
import type { DecryptedValues } from "../types/state.js";
import type { Logger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import { signDecryption, verifyDecryption } from "./proof.js";
import type { DecryptionCallback, DecryptionOracle } from "./types.js";
import { CiphertextVault } from "./vault.js";

export interface LocalOracleOptions {
  logger: Logger;
  vault?: CiphertextVault;
  privateKey?: Hex | null;
  maxRetries?: number;
  baseDelayMs?: number;
}

interface DecryptionJob {
  requestId: bigint;
  handles: Hex[];
  callback: DecryptionCallback;
  deliveries: number;
}

export interface SignedCleartexts {
  cleartexts: Hex;
  proof: Hex;
}

export class LocalOracle implements DecryptionOracle {
  readonly vault: CiphertextVault;
  private account: PrivateKeyAccount;
  private nextRequestId = 1n;
  private jobs = new Map<bigint, DecryptionJob>();
  private logger: Logger;
  private maxRetries: number;
  private baseDelayMs: number;

  constructor(opts: LocalOracleOptions) {
    this.vault = opts.vault ?? new CiphertextVault();
    this.account = privateKeyToAccount(opts.privateKey ?? generatePrivateKey());
    this.logger = opts.logger;
    this.maxRetries = opts.maxRetries ?? 2;
    this.baseDelayMs = opts.baseDelayMs ?? 500;
  }

  get signerAddress(): Address {
    return this.account.address;
  }

  async requestDecryption(handles: readonly Hex[], callback: DecryptionCallback): Promise<bigint> {
    const requestId = this.nextRequestId;
    this.nextRequestId += 1n;
    this.jobs.set(requestId, { requestId, handles: [...handles], callback, deliveries: 0 });
    this.logger.debug(
      { requestId: requestId.toString(), handleCount: handles.length },
      "Oracle accepted decryption request"
    );
    return requestId;
  }

  async verifyProof(requestId: bigint, cleartexts: Hex, proof: Hex): Promise<boolean> {
    const job = this.jobs.get(requestId);
    if (!job) return false;
    return verifyDecryption(
      this.account.address,
      requestId,
      job.handles,
      cleartexts,
      proof,
      this.logger
    );
  }

  /**
   * Requests that were accepted but never delivered successfully.
   */
  undeliveredRequestIds(): bigint[] {
    return Array.from(this.jobs.values())
      .filter((job) => job.deliveries === 0)
      .map((job) => job.requestId);
  }

  /**
   * Decrypt the handles submitted with a request and sign the result,
   * without delivering it.
   */
  async decrypt(requestId: bigint): Promise<SignedCleartexts> {
    const job = this.requireJob(requestId);
    const [stockPrice, playerBalance, playerStockHolding, newsImpact] = job.handles.map((h) =>
      this.vault.decrypt(h)
    );
    const cleartexts = encodeCleartexts({
      stockPrice,
      playerBalance,
      playerStockHolding,
      newsImpact,
    });
    return { cleartexts, proof: await this.sign(requestId, cleartexts) };
  }

  /**
   * Sign arbitrary cleartexts for a known request.
   */
  async sign(requestId: bigint, cleartexts: Hex): Promise<Hex> {
    const job = this.requireJob(requestId);
    return signDecryption(this.account, requestId, job.handles, cleartexts);
  }

  /**
   * Decrypt, sign and deliver to the request's callback.
   */
  async fulfill(requestId: bigint): Promise<DecryptedValues> {
    const { cleartexts, proof } = await this.decrypt(requestId);
    return this.deliver(requestId, cleartexts, proof);
  }

  /**
   * Deliver already prepared cleartexts and proof to the request's callback.
   */
  async deliver(requestId: bigint, cleartexts: Hex, proof: Hex): Promise<DecryptedValues> {
    const job = this.requireJob(requestId);
    const values = await withRetry(() => job.callback(job.requestId, cleartexts, proof), {
      maxRetries: this.maxRetries,
      baseDelayMs: this.baseDelayMs,
      logger: this.logger,
      shouldRetry: (err) => !isMarketError(err),
    });
    job.deliveries += 1;
    this.logger.info({ requestId: job.requestId.toString() }, "Decryption delivered");
    return values;
  }

  private requireJob(requestId: bigint): DecryptionJob {
    const job = this.jobs.get(requestId);
    if (!job) throw new Error(`Oracle has no request ${requestId}`);
    return job;
  }
}
