/**
 * Batch lifecycle: Closed (initial) → Open → Closed → Open → …
 *
 * batchId starts at 0 with no batch open and grows by exactly one on every
 * open, including an open issued while a batch is already open.
 */

import type { Address } from "viem";
import { BatchNotOpenError } from "../errors.js";
import type { BatchInfo } from "../types/state.js";
import type { AccessControl } from "./access.js";
import type { PauseControl } from "./pause.js";
import type { EventLog } from "./events.js";
import type { Logger } from "../utils/logger.js";

export interface BatchLifecycleOptions {
  access: AccessControl;
  pause: PauseControl;
  events: EventLog;
  logger: Logger;
}

export class BatchLifecycle {
  private batchId = 0n;
  private open = false;
  private access: AccessControl;
  private pause: PauseControl;
  private events: EventLog;
  private logger: Logger;

  constructor(opts: BatchLifecycleOptions) {
    this.access = opts.access;
    this.pause = opts.pause;
    this.events = opts.events;
    this.logger = opts.logger;
  }

  get current(): BatchInfo {
    return { batchId: this.batchId, isOpen: this.open };
  }

  /**
   * Returns the id of the open batch, or throws BatchNotOpen.
   */
  requireOpen(): bigint {
    if (!this.open) throw new BatchNotOpenError();
    return this.batchId;
  }

  openBatch(caller: Address): bigint {
    this.access.requireOwner(caller);
    this.pause.requireNotPaused();
    if (this.open) {
      this.logger.debug({ batchId: this.batchId.toString() }, "Opening over an open batch");
    }
    this.batchId += 1n;
    this.open = true;
    this.logger.info({ batchId: this.batchId.toString() }, "Batch opened");
    this.events.emit({ type: "BatchOpened", batchId: this.batchId });
    return this.batchId;
  }

  closeBatch(caller: Address): bigint {
    this.access.requireOwner(caller);
    this.pause.requireNotPaused();
    if (!this.open) throw new BatchNotOpenError();
    this.open = false;
    this.logger.info({ batchId: this.batchId.toString() }, "Batch closed");
    this.events.emit({ type: "BatchClosed", batchId: this.batchId });
    return this.batchId;
  }
}
