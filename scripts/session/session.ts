/**
 * Scripted local session: one batch, one news item, one trade, one
 * decryption round trip through the in-process oracle.
 *
 * With `stale`, a second trader overwrites the trade slots after the
 * request and before the oracle answers, so the callback is rejected.
 */

import {
  ConfidentialMarket,
  LocalOracle,
  isMarketError,
  type Clock,
  type DecryptedValues,
  type ErrorCode,
  type EventRecord,
  type Logger,
  type MarketConfig,
} from "../../core/src/index.js";

export const DEMO_ACCOUNTS = {
  owner: "0x0000000000000000000000000000000000000011",
  provider: "0x0000000000000000000000000000000000000022",
  traderA: "0x0000000000000000000000000000000000000033",
  traderB: "0x0000000000000000000000000000000000000044",
} as const;

export interface SessionOptions {
  config: MarketConfig;
  logger: Logger;
  stale?: boolean;
  clock?: Clock;
}

export type SessionOutcome =
  | { status: "completed"; values: DecryptedValues }
  | { status: "rejected"; code: ErrorCode; message: string };

export interface SessionResult {
  batchId: bigint;
  requestId: bigint;
  outcome: SessionOutcome;
  events: readonly EventRecord[];
}

export async function runSession(opts: SessionOptions): Promise<SessionResult> {
  const { config, logger } = opts;
  const oracle = new LocalOracle({ logger, privateKey: config.oraclePrivateKey, baseDelayMs: 10 });
  const market = new ConfidentialMarket({
    marketAddress: config.marketAddress,
    owner: config.ownerAddress,
    oracle,
    logger,
    clock: opts.clock,
    cooldownSeconds: config.cooldownSeconds,
  });
  const owner = config.ownerAddress;
  const vault = oracle.vault;

  await market.addProvider(owner, DEMO_ACCOUNTS.provider);
  const batchId = await market.openBatch(owner);
  await market.submitNews(DEMO_ACCOUNTS.provider, vault.encrypt(1n));
  await market.submitTrade(DEMO_ACCOUNTS.traderA, vault.encrypt(500n), vault.encrypt(10n));
  const requestId = await market.requestBatchDecryption(DEMO_ACCOUNTS.traderA);

  if (opts.stale) {
    await market.submitTrade(DEMO_ACCOUNTS.traderB, vault.encrypt(450n), vault.encrypt(12n));
  }

  let outcome: SessionOutcome;
  try {
    outcome = { status: "completed", values: await oracle.fulfill(requestId) };
  } catch (err) {
    if (!isMarketError(err)) throw err;
    outcome = { status: "rejected", code: err.code, message: err.message };
  }

  return { batchId, requestId, outcome, events: market.eventLog().list() };
}

/**
 * One line per event, bigint fields rendered in decimal.
 */
export function formatEvent(record: EventRecord): string {
  const { type, ...fields } = record.event;
  const body = JSON.stringify(fields, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value
  );
  return `#${record.seq} ${type} ${body}`;
}
