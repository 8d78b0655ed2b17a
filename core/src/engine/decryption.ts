/**
 * Decryption request manager: request → oracle → callback.
 *
 * A request snapshots a commitment over the batch's four slot handles and
 * hands the handles to the oracle. The callback is accepted only when:
 *   1. the request id is known,
 *   2. the context has not been fulfilled yet,
 *   3. the commitment over the slots as they stand now equals the snapshot,
 *   4. the oracle verifies the proof.
 * Any rejection leaves the context in Requested; only a successful
 * fulfillment flips processed, and it does so once.
 *
 * Contexts are never deleted and never expire.
 */

import { zeroHash, type Address, type Hex } from "viem";
import {
  InvalidProofError,
  ReplayAttemptError,
  StateMismatchError,
  UnknownRequestError,
} from "../errors.js";
import type { Clock, DecryptedValues, DecryptionContext } from "../types/state.js";
import type { DecryptionCallback, DecryptionOracle } from "../oracle/types.js";
import type { EncryptedStateStore } from "./store.js";
import type { EventLog } from "./events.js";
import type { Logger } from "../utils/logger.js";
import { computeStateHash } from "./commitment.js";
import { decodeCleartexts } from "./cleartext.js";

export interface DecryptionManagerOptions {
  store: EncryptedStateStore;
  oracle: DecryptionOracle;
  market: Address;
  events: EventLog;
  logger: Logger;
  clock: Clock;
}

export class DecryptionRequestManager {
  private contexts = new Map<bigint, DecryptionContext>();
  private store: EncryptedStateStore;
  private oracle: DecryptionOracle;
  private market: Address;
  private events: EventLog;
  private logger: Logger;
  private clock: Clock;

  constructor(opts: DecryptionManagerOptions) {
    this.store = opts.store;
    this.oracle = opts.oracle;
    this.market = opts.market;
    this.events = opts.events;
    this.logger = opts.logger;
    this.clock = opts.clock;
  }

  /**
   * Snapshot the batch, delegate to the oracle and record the context.
   * Nothing is recorded if the oracle rejects the request.
   */
  async request(
    batchId: bigint,
    requester: Address,
    callback: DecryptionCallback
  ): Promise<bigint> {
    const handles = this.store.handles(batchId);
    const stateHash = computeStateHash(handles, this.market);

    const requestId = await this.oracle.requestDecryption(
      handles.map((h) => h ?? zeroHash),
      callback
    );
    if (this.contexts.has(requestId)) {
      throw new Error(`Oracle reissued request id ${requestId}`);
    }

    this.contexts.set(requestId, {
      requestId,
      batchId,
      stateHash,
      requester,
      requestedAt: this.clock(),
      processed: false,
    });

    this.logger.info(
      { requestId: requestId.toString(), batchId: batchId.toString(), stateHash },
      "Decryption requested"
    );
    this.events.emit({ type: "DecryptionRequested", requestId, batchId, requester });
    return requestId;
  }

  async fulfill(requestId: bigint, cleartexts: Hex, proof: Hex): Promise<DecryptedValues> {
    const context = this.contexts.get(requestId);
    if (!context) throw new UnknownRequestError(requestId);
    if (context.processed) throw new ReplayAttemptError(requestId);

    const currentHash = computeStateHash(this.store.handles(context.batchId), this.market);
    if (currentHash !== context.stateHash) {
      this.logger.debug(
        { requestId: requestId.toString(), expected: context.stateHash, actual: currentHash },
        "State hash drifted since request"
      );
      throw new StateMismatchError(requestId);
    }

    const valid = await this.oracle.verifyProof(requestId, cleartexts, proof);
    if (!valid) throw new InvalidProofError(requestId);

    const values = decodeCleartexts(cleartexts);

    context.processed = true;
    context.fulfilledAt = this.clock();

    this.logger.info(
      { requestId: requestId.toString(), batchId: context.batchId.toString() },
      "Decryption completed"
    );
    this.events.emit({
      type: "DecryptionCompleted",
      requestId,
      batchId: context.batchId,
      values: Object.freeze({ ...values }),
    });
    return values;
  }

  getContext(requestId: bigint): DecryptionContext | undefined {
    const context = this.contexts.get(requestId);
    return context ? { ...context } : undefined;
  }

  /**
   * Contexts still awaiting a successful fulfillment, oldest first.
   */
  pending(): DecryptionContext[] {
    const out: DecryptionContext[] = [];
    for (const context of this.contexts.values()) {
      if (!context.processed) out.push({ ...context });
    }
    return out;
  }
}
