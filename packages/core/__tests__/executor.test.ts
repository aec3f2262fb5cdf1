/**
 * Tests for BackendExecutor and CachedCapability
 */

import { CachedCapability } from "../src/capability";
import { BackendExecutor } from "../src/executor";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("BackendExecutor", () => {
  it("should run tasks one at a time in submission order", async () => {
    const executor = new BackendExecutor();
    const events: string[] = [];

    const slow = executor.run(async () => {
      events.push("slow:start");
      await delay(20);
      events.push("slow:end");
      return 1;
    });
    const fast = executor.run(() => {
      events.push("fast");
      return 2;
    });

    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(events).toEqual(["slow:start", "slow:end", "fast"]);
  });

  it("should keep running after a task fails", async () => {
    const executor = new BackendExecutor();

    const failed = executor.run(() => {
      throw new Error("boom");
    });
    const next = executor.run(() => "still running");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("still running");
  });

  it("should count pending tasks and settle idle()", async () => {
    const executor = new BackendExecutor();

    const first = executor.run(() => delay(5));
    const second = executor.run(() => delay(5));
    expect(executor.pending).toBe(2);

    await executor.idle();
    await Promise.all([first, second]);
    expect(executor.pending).toBe(0);
  });
});

describe("CachedCapability", () => {
  it("should check once and cache the answer", () => {
    const check = jest.fn(() => true);
    const capability = new CachedCapability(check);

    expect(capability.isCached).toBe(false);
    expect(capability.value).toBe(true);
    expect(capability.value).toBe(true);
    expect(capability.isCached).toBe(true);
    expect(check).toHaveBeenCalledTimes(1);
  });

  it("should check again after invalidate()", () => {
    let available = false;
    const capability = new CachedCapability(() => available);

    expect(capability.value).toBe(false);
    available = true;
    expect(capability.value).toBe(false);

    capability.invalidate();
    expect(capability.value).toBe(true);
  });
});
