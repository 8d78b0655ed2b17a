import { describe, it, expect } from "vitest";
import { SerialExecutor } from "./serial.js";

function tick(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("SerialExecutor", () => {
  it("does not start an operation before the previous one settles", async () => {
    const serial = new SerialExecutor();
    const trace: string[] = [];

    const first = serial.run(async () => {
      trace.push("first:start");
      await tick(20);
      trace.push("first:end");
      return 1;
    });
    const second = serial.run(() => {
      trace.push("second");
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(trace).toEqual(["first:start", "first:end", "second"]);
  });

  it("delivers a rejection to its caller and keeps running later operations", async () => {
    const serial = new SerialExecutor();

    const failing = serial.run(() => {
      throw new Error("boom");
    });
    const next = serial.run(() => "after");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
  });
});
