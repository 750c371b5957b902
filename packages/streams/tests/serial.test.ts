/**
 * Tests for SerialExecutor.
 */

import { describe, it, expect } from "vitest";
import { SerialExecutor } from "../src/serial.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("SerialExecutor", () => {
  it("runs tasks one at a time in submission order", async () => {
    const executor = new SerialExecutor();
    const log: string[] = [];

    const first = executor.run(async () => {
      log.push("first:start");
      await delay(20);
      log.push("first:end");
      return 1;
    });
    const second = executor.run(() => {
      log.push("second");
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(log).toEqual(["first:start", "first:end", "second"]);
  });

  it("keeps going after a failed task", async () => {
    const executor = new SerialExecutor();

    const failing = executor.run(() => {
      throw new Error("boom");
    });
    const next = executor.run(() => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
