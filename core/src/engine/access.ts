/**
 * Owner and provider roles.
 *
 * The owner drives the batch lifecycle and configuration; providers are the
 * only accounts allowed to submit news impact.
 */

import type { Address } from "viem";
import { PermissionDeniedError } from "../errors.js";
import type { EventLog } from "./events.js";
import type { Logger } from "../utils/logger.js";

export interface AccessControlOptions {
  owner: Address;
  events: EventLog;
  logger: Logger;
}

export class AccessControl {
  private currentOwner: Address;
  private providers = new Set<Address>();
  private events: EventLog;
  private logger: Logger;

  constructor(opts: AccessControlOptions) {
    this.currentOwner = opts.owner;
    this.events = opts.events;
    this.logger = opts.logger;
  }

  get owner(): Address {
    return this.currentOwner;
  }

  isProvider(account: Address): boolean {
    return this.providers.has(account);
  }

  listProviders(): Address[] {
    return Array.from(this.providers);
  }

  requireOwner(caller: Address): void {
    if (caller !== this.currentOwner) {
      throw new PermissionDeniedError(`${caller} is not the owner`);
    }
  }

  requireProvider(caller: Address): void {
    if (!this.providers.has(caller)) {
      throw new PermissionDeniedError(`${caller} is not a provider`);
    }
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.requireOwner(caller);
    const previousOwner = this.currentOwner;
    this.currentOwner = newOwner;
    this.logger.info({ previousOwner, newOwner }, "Ownership transferred");
    this.events.emit({ type: "OwnershipTransferred", previousOwner, newOwner });
  }

  /**
   * Returns false, emitting nothing, when the account already is a provider.
   */
  addProvider(caller: Address, account: Address): boolean {
    this.requireOwner(caller);
    if (this.providers.has(account)) return false;
    this.providers.add(account);
    this.logger.info({ account }, "Provider added");
    this.events.emit({ type: "ProviderAdded", account });
    return true;
  }

  removeProvider(caller: Address, account: Address): boolean {
    this.requireOwner(caller);
    if (!this.providers.delete(account)) return false;
    this.logger.info({ account }, "Provider removed");
    this.events.emit({ type: "ProviderRemoved", account });
    return true;
  }
}
