import { describe, it, expect, vi } from "vitest";
import { zeroHash, type Hex } from "viem";
import { DecryptionRequestManager } from "./decryption.js";
import { EncryptedStateStore } from "./store.js";
import { EventLog } from "./events.js";
import { computeStateHash } from "./commitment.js";
import { encodeCleartexts } from "./cleartext.js";
import {
  InvalidProofError,
  MalformedCleartextError,
  ReplayAttemptError,
  StateMismatchError,
  UnknownRequestError,
} from "../errors.js";
import type { DecryptionCallback, DecryptionOracle } from "../oracle/types.js";
import { MARKET, ManualClock, TRADER_A, handle, silentLogger } from "../testing/harness.js";

/**
 * Oracle stand-in: ids start at 7, proofs are accepted while `valid` is true.
 */
class FakeOracle implements DecryptionOracle {
  nextId = 7n;
  valid = true;
  requests: { requestId: bigint; handles: Hex[] }[] = [];

  async requestDecryption(handles: readonly Hex[], _callback: DecryptionCallback): Promise<bigint> {
    const requestId = this.nextId;
    this.nextId += 1n;
    this.requests.push({ requestId, handles: [...handles] });
    return requestId;
  }

  async verifyProof(_requestId: bigint, _cleartexts: Hex, _proof: Hex): Promise<boolean> {
    return this.valid;
  }
}

const notDelivered: DecryptionCallback = () => Promise.reject(new Error("not delivered here"));

const CLEARTEXTS = encodeCleartexts({
  stockPrice: 100n,
  playerBalance: 500n,
  playerStockHolding: 10n,
  newsImpact: 1n,
});
const PROOF: Hex = `0x${"11".repeat(65)}`;

function setup() {
  const clock = new ManualClock(50);
  const store = new EncryptedStateStore();
  const events = new EventLog(clock.now);
  const oracle = new FakeOracle();
  const manager = new DecryptionRequestManager({
    store,
    oracle,
    market: MARKET,
    events,
    logger: silentLogger(),
    clock: clock.now,
  });
  store.write(1n, { newsImpact: handle(1), playerBalance: handle(2), playerStockHolding: handle(3) });
  return { clock, store, events, oracle, manager };
}

describe("DecryptionRequestManager.request", () => {
  it("snapshots the batch commitment and records a Requested context", async () => {
    const { manager, oracle, events } = setup();
    const requestId = await manager.request(1n, TRADER_A, notDelivered);

    expect(requestId).toBe(7n);
    expect(manager.getContext(7n)).toEqual({
      requestId: 7n,
      batchId: 1n,
      stateHash: computeStateHash([null, handle(2), handle(3), handle(1)], MARKET),
      requester: TRADER_A,
      requestedAt: 50,
      processed: false,
    });
    expect(events.ofType("DecryptionRequested")).toEqual([
      { type: "DecryptionRequested", requestId: 7n, batchId: 1n, requester: TRADER_A },
    ]);
  });

  it("hands the oracle all four handles with unset slots as the zero word", async () => {
    const { manager, oracle } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    expect(oracle.requests[0].handles).toEqual([zeroHash, handle(2), handle(3), handle(1)]);
  });

  it("records nothing when the oracle rejects the request", async () => {
    const { manager, oracle, events } = setup();
    vi.spyOn(oracle, "requestDecryption").mockRejectedValueOnce(new Error("oracle offline"));

    await expect(manager.request(1n, TRADER_A, notDelivered)).rejects.toThrow("oracle offline");
    expect(manager.pending()).toEqual([]);
    expect(events.list()).toHaveLength(0);
  });

  it("refuses a request id the oracle already issued", async () => {
    const { manager, oracle } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    oracle.nextId = 7n;

    await expect(manager.request(1n, TRADER_A, notDelivered)).rejects.toThrow(
      "Oracle reissued request id 7"
    );
    expect(manager.pending()).toHaveLength(1);
  });
});

describe("DecryptionRequestManager.fulfill", () => {
  it("publishes the decoded values and marks the context processed", async () => {
    const { manager, events, clock } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    clock.set(80);

    const values = await manager.fulfill(7n, CLEARTEXTS, PROOF);

    expect(values).toEqual({
      stockPrice: 100n,
      playerBalance: 500n,
      playerStockHolding: 10n,
      newsImpact: 1n,
    });
    expect(manager.getContext(7n)).toMatchObject({ processed: true, fulfilledAt: 80 });
    expect(events.ofType("DecryptionCompleted")).toEqual([
      { type: "DecryptionCompleted", requestId: 7n, batchId: 1n, values },
    ]);
    expect(manager.pending()).toEqual([]);
  });

  it("fails UnknownRequest for an id that was never issued", async () => {
    const { manager } = setup();
    await expect(manager.fulfill(99n, CLEARTEXTS, PROOF)).rejects.toBeInstanceOf(
      UnknownRequestError
    );
  });

  it("fails ReplayAttempt on a second fulfillment and publishes nothing new", async () => {
    const { manager, events } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    await manager.fulfill(7n, CLEARTEXTS, PROOF);

    await expect(manager.fulfill(7n, CLEARTEXTS, PROOF)).rejects.toBeInstanceOf(ReplayAttemptError);
    await expect(manager.fulfill(7n, CLEARTEXTS, PROOF)).rejects.toBeInstanceOf(ReplayAttemptError);
    expect(events.ofType("DecryptionCompleted")).toHaveLength(1);
  });

  it("checks replay before state drift", async () => {
    const { manager, store } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    await manager.fulfill(7n, CLEARTEXTS, PROOF);
    store.write(1n, { newsImpact: handle(50) });

    await expect(manager.fulfill(7n, CLEARTEXTS, PROOF)).rejects.toBeInstanceOf(ReplayAttemptError);
  });

  it("fails StateMismatch when a slot was overwritten after the request", async () => {
    const { manager, store, events } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    store.write(1n, { playerBalance: handle(20), playerStockHolding: handle(30) });

    await expect(manager.fulfill(7n, CLEARTEXTS, PROOF)).rejects.toBeInstanceOf(StateMismatchError);
    expect(manager.getContext(7n)?.processed).toBe(false);
    expect(events.ofType("DecryptionCompleted")).toEqual([]);
  });

  it("accepts a later fulfillment once the slots match the snapshot again", async () => {
    const { manager, store } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    store.write(1n, { newsImpact: handle(40) });
    await expect(manager.fulfill(7n, CLEARTEXTS, PROOF)).rejects.toBeInstanceOf(StateMismatchError);

    store.write(1n, { newsImpact: handle(1) });
    await expect(manager.fulfill(7n, CLEARTEXTS, PROOF)).resolves.toMatchObject({ newsImpact: 1n });
  });

  it("ignores writes to other batches", async () => {
    const { manager, store } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    store.write(2n, { newsImpact: handle(99) });

    await expect(manager.fulfill(7n, CLEARTEXTS, PROOF)).resolves.toMatchObject({ stockPrice: 100n });
  });

  it("checks state drift before asking the oracle about the proof", async () => {
    const { manager, store, oracle } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    store.write(1n, { newsImpact: handle(40) });
    oracle.valid = false;
    const verify = vi.spyOn(oracle, "verifyProof");

    await expect(manager.fulfill(7n, CLEARTEXTS, PROOF)).rejects.toBeInstanceOf(StateMismatchError);
    expect(verify).not.toHaveBeenCalled();
  });

  it("fails InvalidProof without mutating, and a valid retry still succeeds", async () => {
    const { manager, oracle, events } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    oracle.valid = false;

    await expect(manager.fulfill(7n, CLEARTEXTS, PROOF)).rejects.toBeInstanceOf(InvalidProofError);
    expect(manager.getContext(7n)?.processed).toBe(false);
    expect(events.ofType("DecryptionCompleted")).toEqual([]);

    oracle.valid = true;
    await manager.fulfill(7n, CLEARTEXTS, PROOF);
    expect(manager.getContext(7n)?.processed).toBe(true);
  });

  it("fails MalformedCleartext on a short buffer without mutating", async () => {
    const { manager } = setup();
    await manager.request(1n, TRADER_A, notDelivered);

    await expect(manager.fulfill(7n, `0x${"00".repeat(64)}`, PROOF)).rejects.toBeInstanceOf(
      MalformedCleartextError
    );
    expect(manager.getContext(7n)?.processed).toBe(false);
  });

  it("publishes values that the returned result cannot alter", async () => {
    const { manager, events } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    const values = await manager.fulfill(7n, CLEARTEXTS, PROOF);

    values.stockPrice = 999n;

    expect(events.ofType("DecryptionCompleted")[0].values.stockPrice).toBe(100n);
  });

  it("returns copies of contexts", async () => {
    const { manager } = setup();
    await manager.request(1n, TRADER_A, notDelivered);
    const copy = manager.getContext(7n);
    if (!copy) throw new Error("context missing");
    copy.processed = true;
    expect(manager.getContext(7n)?.processed).toBe(false);
  });
});
