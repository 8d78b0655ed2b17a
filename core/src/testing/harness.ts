/**
 * Shared setup for market tests: digit-only addresses (their checksummed
 * form is identical), a manual clock and a silent logger.
 */

import { numberToHex, type Hex } from "viem";
import { ConfidentialMarket } from "../market.js";
import { LocalOracle } from "../oracle/local.js";
import { createLogger } from "../utils/logger.js";

export const MARKET = "0x5555555555555555555555555555555555555555";
export const OWNER = "0x1111111111111111111111111111111111111111";
export const PROVIDER = "0x2222222222222222222222222222222222222222";
export const TRADER_A = "0x3333333333333333333333333333333333333333";
export const TRADER_B = "0x4444444444444444444444444444444444444444";

export class ManualClock {
  private t: number;

  constructor(start = 0) {
    this.t = start;
  }

  readonly now = (): number => this.t;

  set(t: number): void {
    this.t = t;
  }

  advance(seconds: number): void {
    this.t += seconds;
  }
}

/** A fixed, non-zero 32-byte handle. */
export function handle(n: number | bigint): Hex {
  return numberToHex(BigInt(n), { size: 32 });
}

export function silentLogger() {
  return createLogger("silent");
}

export function createTestMarket(opts: { cooldownSeconds?: number; start?: number } = {}) {
  const clock = new ManualClock(opts.start ?? 0);
  const logger = silentLogger();
  const oracle = new LocalOracle({ logger, baseDelayMs: 1 });
  const market = new ConfidentialMarket({
    marketAddress: MARKET,
    owner: OWNER,
    oracle,
    logger,
    clock: clock.now,
    cooldownSeconds: opts.cooldownSeconds,
  });
  return { market, oracle, clock, logger };
}
