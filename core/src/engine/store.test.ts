import { describe, it, expect } from "vitest";
import { EncryptedStateStore, emptySlotSet } from "./store.js";
import { handle } from "../testing/harness.js";

describe("EncryptedStateStore", () => {
  it("reads unknown batches as all unset", () => {
    const store = new EncryptedStateStore();
    expect(store.get(5n)).toEqual(emptySlotSet());
    expect(store.getSlot(5n, "stockPrice")).toEqual({ kind: "unset" });
    expect(store.handles(5n)).toEqual([null, null, null, null]);
  });

  it("writes only the named slots", () => {
    const store = new EncryptedStateStore();
    store.write(1n, { playerBalance: handle(1), playerStockHolding: handle(2) });

    expect(store.get(1n)).toEqual({
      stockPrice: { kind: "unset" },
      playerBalance: { kind: "ciphertext", handle: handle(1) },
      playerStockHolding: { kind: "ciphertext", handle: handle(2) },
      newsImpact: { kind: "unset" },
    });
  });

  it("overwrites instead of accumulating", () => {
    const store = new EncryptedStateStore();
    store.write(1n, { newsImpact: handle(10) });
    store.write(1n, { newsImpact: handle(11) });
    expect(store.getSlot(1n, "newsImpact")).toEqual({ kind: "ciphertext", handle: handle(11) });
  });

  it("keeps batches apart", () => {
    const store = new EncryptedStateStore();
    store.write(1n, { newsImpact: handle(10) });
    store.write(2n, { newsImpact: handle(20) });
    expect(store.handles(1n)).toEqual([null, null, null, handle(10)]);
    expect(store.handles(2n)).toEqual([null, null, null, handle(20)]);
    expect(store.batchIds()).toEqual([1n, 2n]);
  });

  it("lists handles in slot order", () => {
    const store = new EncryptedStateStore();
    store.write(3n, {
      newsImpact: handle(4),
      stockPrice: handle(1),
      playerStockHolding: handle(3),
      playerBalance: handle(2),
    });
    expect(store.handles(3n)).toEqual([handle(1), handle(2), handle(3), handle(4)]);
  });

  it("does not let a returned slot set change the store", () => {
    const store = new EncryptedStateStore();
    store.write(1n, { newsImpact: handle(1) });
    const before = store.get(1n);
    store.write(1n, { newsImpact: handle(2) });
    expect(before.newsImpact).toEqual({ kind: "ciphertext", handle: handle(1) });
  });

  it("hands out copies that cannot rewrite stored slots", () => {
    const store = new EncryptedStateStore();
    store.write(1n, { playerBalance: handle(1) });

    Object.assign(store.getSlot(1n, "playerBalance"), { handle: handle(0xee) });
    Object.assign(store.get(1n).playerBalance, { handle: handle(0xee) });
    Object.assign(store.get(1n).stockPrice, { kind: "ciphertext", handle: handle(0xee) });

    expect(store.getSlot(1n, "playerBalance")).toEqual({ kind: "ciphertext", handle: handle(1) });
    expect(store.handles(1n)).toEqual([null, handle(1), null, null]);
  });

  it("does not share unset slots between batches", () => {
    const store = new EncryptedStateStore();
    Object.assign(store.getSlot(7n, "newsImpact"), { kind: "ciphertext", handle: handle(0xee) });
    expect(store.getSlot(8n, "newsImpact")).toEqual({ kind: "unset" });
    expect(store.handles(7n)).toEqual([null, null, null, null]);
  });
});
