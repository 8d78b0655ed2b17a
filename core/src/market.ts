/**
 * Sealed market: public entry points.
 *
 * Every mutating operation runs through one SerialExecutor and evaluates all
 * of its guards before its first write, so it either commits completely or
 * leaves state untouched. Guards run in the order: input validation, role,
 * pause, cooldown, batch.
 *
 * Reads are synchronous and unrestricted; confidentiality lives in the
 * ciphertext, not in access control.
 */

import { isHex, type Address, type Hex } from "viem";
import { InvalidInputError, isMarketError } from "./errors.js";
import { AccessControl } from "./engine/access.js";
import { BatchLifecycle } from "./engine/batch.js";
import { CooldownThrottle } from "./engine/cooldown.js";
import { DecryptionRequestManager } from "./engine/decryption.js";
import { EventLog, type EventView } from "./engine/events.js";
import { PauseControl } from "./engine/pause.js";
import { EncryptedStateStore } from "./engine/store.js";
import type { DecryptionOracle } from "./oracle/types.js";
import {
  systemClock,
  type ActionCategory,
  type BatchInfo,
  type Clock,
  type DecryptedValues,
  type DecryptionContext,
  type EncryptedSlotSet,
  type SlotName,
  type SlotValue,
} from "./types/state.js";
import type { Logger } from "./utils/logger.js";
import { SerialExecutor } from "./utils/serial.js";
import { parseAddress, parseCooldownSeconds, parseHandle } from "./utils/validate.js";

export interface MarketOptions {
  /** Identity bound into every state commitment. */
  marketAddress: string;
  owner: string;
  oracle: DecryptionOracle;
  logger: Logger;
  clock?: Clock;
  cooldownSeconds?: number;
}

export class ConfidentialMarket {
  readonly address: Address;
  private events: EventLog;
  private access: AccessControl;
  private pauseControl: PauseControl;
  private cooldown: CooldownThrottle;
  private batches: BatchLifecycle;
  private store: EncryptedStateStore;
  private decryption: DecryptionRequestManager;
  private serial = new SerialExecutor();
  private logger: Logger;

  constructor(opts: MarketOptions) {
    const clock = opts.clock ?? systemClock;
    this.address = parseAddress(opts.marketAddress, "marketAddress");
    this.logger = opts.logger;
    this.events = new EventLog(clock);
    this.access = new AccessControl({
      owner: parseAddress(opts.owner, "owner"),
      events: this.events,
      logger: this.logger,
    });
    this.pauseControl = new PauseControl({
      access: this.access,
      events: this.events,
      logger: this.logger,
    });
    this.cooldown = new CooldownThrottle({
      access: this.access,
      events: this.events,
      logger: this.logger,
      clock,
      cooldownSeconds:
        opts.cooldownSeconds === undefined
          ? undefined
          : parseCooldownSeconds(opts.cooldownSeconds),
    });
    this.batches = new BatchLifecycle({
      access: this.access,
      pause: this.pauseControl,
      events: this.events,
      logger: this.logger,
    });
    this.store = new EncryptedStateStore();
    this.decryption = new DecryptionRequestManager({
      store: this.store,
      oracle: opts.oracle,
      market: this.address,
      events: this.events,
      logger: this.logger,
      clock,
    });
  }

  // ============ Access control ============

  transferOwnership(caller: string, newOwner: string): Promise<void> {
    return this.serial.run(() => {
      const from = parseAddress(caller, "caller");
      const to = parseAddress(newOwner, "newOwner");
      this.access.transferOwnership(from, to);
    });
  }

  /**
   * Resolves to false when the account already was a provider.
   */
  addProvider(caller: string, account: string): Promise<boolean> {
    return this.serial.run(() =>
      this.access.addProvider(parseAddress(caller, "caller"), parseAddress(account, "account"))
    );
  }

  removeProvider(caller: string, account: string): Promise<boolean> {
    return this.serial.run(() =>
      this.access.removeProvider(parseAddress(caller, "caller"), parseAddress(account, "account"))
    );
  }

  setCooldownSeconds(caller: string, seconds: number): Promise<void> {
    return this.serial.run(() => {
      const from = parseAddress(caller, "caller");
      const value = parseCooldownSeconds(seconds);
      this.cooldown.setCooldownSeconds(from, value);
    });
  }

  // ============ Pause ============

  pause(caller: string): Promise<void> {
    return this.serial.run(() => this.pauseControl.pause(parseAddress(caller, "caller")));
  }

  unpause(caller: string): Promise<void> {
    return this.serial.run(() => this.pauseControl.unpause(parseAddress(caller, "caller")));
  }

  // ============ Batch lifecycle ============

  openBatch(caller: string): Promise<bigint> {
    return this.serial.run(() => this.batches.openBatch(parseAddress(caller, "caller")));
  }

  closeBatch(caller: string): Promise<bigint> {
    return this.serial.run(() => this.batches.closeBatch(parseAddress(caller, "caller")));
  }

  // ============ Submissions ============

  /**
   * Provider-only. Overwrites the newsImpact slot of the open batch and
   * resolves to that batch's id.
   */
  submitNews(caller: string, handle: string): Promise<bigint> {
    return this.serial.run(() => {
      const provider = parseAddress(caller, "caller");
      const newsHandle = parseHandle(handle, "handle");
      this.access.requireProvider(provider);
      this.pauseControl.requireNotPaused();
      const now = this.cooldown.check(provider, "submission");
      const batchId = this.batches.requireOpen();

      this.store.write(batchId, { newsImpact: newsHandle });
      this.cooldown.record(provider, "submission", now);

      this.logger.info({ batchId: batchId.toString(), provider }, "News submitted");
      this.events.emit({ type: "NewsSubmitted", batchId, provider });
      return batchId;
    });
  }

  /**
   * Overwrites the playerBalance and playerStockHolding slots of the open
   * batch and resolves to that batch's id.
   */
  submitTrade(caller: string, balanceHandle: string, holdingHandle: string): Promise<bigint> {
    return this.serial.run(() => {
      const trader = parseAddress(caller, "caller");
      const balance = parseHandle(balanceHandle, "balanceHandle");
      const holding = parseHandle(holdingHandle, "holdingHandle");
      this.pauseControl.requireNotPaused();
      const now = this.cooldown.check(trader, "submission");
      const batchId = this.batches.requireOpen();

      this.store.write(batchId, { playerBalance: balance, playerStockHolding: holding });
      this.cooldown.record(trader, "submission", now);

      this.logger.info({ batchId: batchId.toString(), trader }, "Trade submitted");
      this.events.emit({ type: "TradeSubmitted", batchId, trader });
      return batchId;
    });
  }

  // ============ Decryption ============

  /**
   * Ask the oracle to decrypt the open batch's slots. Resolves to the
   * request id; the plaintext arrives later through fulfillDecryption.
   */
  requestBatchDecryption(caller: string): Promise<bigint> {
    return this.serial.run(async () => {
      const requester = parseAddress(caller, "caller");
      this.pauseControl.requireNotPaused();
      const now = this.cooldown.check(requester, "decryptionRequest");
      const batchId = this.batches.requireOpen();

      const requestId = await this.decryption.request(batchId, requester, (id, cleartexts, proof) =>
        this.fulfillDecryption(id, cleartexts, proof)
      );
      this.cooldown.record(requester, "decryptionRequest", now);
      return requestId;
    });
  }

  /**
   * Oracle callback. Not restricted by caller identity: the proof is what
   * authenticates it.
   */
  fulfillDecryption(requestId: bigint, cleartexts: Hex, proof: Hex): Promise<DecryptedValues> {
    return this.serial.run(async () => {
      if (!isHex(cleartexts) || !isHex(proof)) {
        throw new InvalidInputError("cleartexts and proof must be hex");
      }
      try {
        return await this.decryption.fulfill(requestId, cleartexts, proof);
      } catch (err) {
        if (isMarketError(err)) {
          this.logger.warn(
            { requestId: requestId.toString(), code: err.code },
            "Decryption callback rejected"
          );
        }
        throw err;
      }
    });
  }

  // ============ Reads ============

  get owner(): Address {
    return this.access.owner;
  }

  isProvider(account: string): boolean {
    return this.access.isProvider(parseAddress(account, "account"));
  }

  listProviders(): Address[] {
    return this.access.listProviders();
  }

  get isPaused(): boolean {
    return this.pauseControl.isPaused;
  }

  /**
   * True while the market accepts mutating operations.
   */
  isAvailable(): boolean {
    return !this.pauseControl.isPaused;
  }

  get cooldownSeconds(): number {
    return this.cooldown.cooldownSeconds;
  }

  lastActionAt(account: string, category: ActionCategory): number | undefined {
    return this.cooldown.lastActionAt(parseAddress(account, "account"), category);
  }

  currentBatch(): BatchInfo {
    return this.batches.current;
  }

  getSlots(batchId: bigint): EncryptedSlotSet {
    return this.store.get(batchId);
  }

  getSlot(batchId: bigint, slot: SlotName): SlotValue {
    return this.store.getSlot(batchId, slot);
  }

  getDecryptionContext(requestId: bigint): DecryptionContext | undefined {
    return this.decryption.getContext(requestId);
  }

  pendingRequests(): DecryptionContext[] {
    return this.decryption.pending();
  }

  eventLog(): EventView {
    return this.events.view();
  }
}
