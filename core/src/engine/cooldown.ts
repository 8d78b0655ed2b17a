/**
 * Per-account, per-category rate limiter.
 *
 * An action is accepted when the account has never acted in the category,
 * or when now >= last + cooldownSeconds. Checking and recording are separate
 * steps so a caller can record only after the whole operation has passed
 * its guards.
 */

import type { Address } from "viem";
import { CooldownActiveError } from "../errors.js";
import type { ActionCategory, Clock } from "../types/state.js";
import type { AccessControl } from "./access.js";
import type { EventLog } from "./events.js";
import type { Logger } from "../utils/logger.js";

export const DEFAULT_COOLDOWN_SECONDS = 30;

export interface CooldownThrottleOptions {
  access: AccessControl;
  events: EventLog;
  logger: Logger;
  clock: Clock;
  cooldownSeconds?: number;
}

export class CooldownThrottle {
  private seconds: number;
  private lastAction: Record<ActionCategory, Map<Address, number>> = {
    submission: new Map(),
    decryptionRequest: new Map(),
  };
  private access: AccessControl;
  private events: EventLog;
  private logger: Logger;
  private clock: Clock;

  constructor(opts: CooldownThrottleOptions) {
    this.seconds = opts.cooldownSeconds ?? DEFAULT_COOLDOWN_SECONDS;
    this.access = opts.access;
    this.events = opts.events;
    this.logger = opts.logger;
    this.clock = opts.clock;
  }

  get cooldownSeconds(): number {
    return this.seconds;
  }

  lastActionAt(account: Address, category: ActionCategory): number | undefined {
    return this.lastAction[category].get(account);
  }

  setCooldownSeconds(caller: Address, seconds: number): void {
    this.access.requireOwner(caller);
    const previousSeconds = this.seconds;
    this.seconds = seconds;
    this.logger.info({ previousSeconds, cooldownSeconds: seconds }, "Cooldown updated");
    this.events.emit({ type: "CooldownUpdated", previousSeconds, cooldownSeconds: seconds });
  }

  /**
   * Throws CooldownActive if the account may not act yet. Returns the
   * timestamp to pass to record().
   */
  check(account: Address, category: ActionCategory): number {
    const now = this.clock();
    const last = this.lastAction[category].get(account);
    if (last !== undefined && now < last + this.seconds) {
      this.logger.debug(
        { account, category, last, now, cooldownSeconds: this.seconds },
        "Cooldown active"
      );
      throw new CooldownActiveError();
    }
    return now;
  }

  record(account: Address, category: ActionCategory, at: number): void {
    this.lastAction[category].set(account, at);
  }
}
