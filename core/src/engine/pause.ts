import type { Address } from "viem";
import {
  AlreadyPausedError,
  AlreadyUnpausedError,
  SystemPausedError,
} from "../errors.js";
import type { AccessControl } from "./access.js";
import type { EventLog } from "./events.js";
import type { Logger } from "../utils/logger.js";

export interface PauseControlOptions {
  access: AccessControl;
  events: EventLog;
  logger: Logger;
}

/**
 * Global halt switch. Mutating entry points call requireNotPaused() before
 * touching state; reads ignore it.
 */
export class PauseControl {
  private paused = false;
  private access: AccessControl;
  private events: EventLog;
  private logger: Logger;

  constructor(opts: PauseControlOptions) {
    this.access = opts.access;
    this.events = opts.events;
    this.logger = opts.logger;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  requireNotPaused(): void {
    if (this.paused) throw new SystemPausedError();
  }

  pause(caller: Address): void {
    this.access.requireOwner(caller);
    if (this.paused) throw new AlreadyPausedError();
    this.paused = true;
    this.logger.warn({ account: caller }, "System paused");
    this.events.emit({ type: "Paused", account: caller });
  }

  unpause(caller: Address): void {
    this.access.requireOwner(caller);
    if (!this.paused) throw new AlreadyUnpausedError();
    this.paused = false;
    this.logger.info({ account: caller }, "System unpaused");
    this.events.emit({ type: "Unpaused", account: caller });
  }
}
