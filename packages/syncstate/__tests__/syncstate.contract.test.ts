/**
 * Contract tests for SyncStateStore implementations.
 * Every store must behave identically according to the interface contract.
 */

import type { RunSummary, SyncStateStore } from "@artisync/core";
import { InMemorySyncStateStore } from "../src/in-memory-sync-state";

function createRun(runId: string, jobId: string, status: RunSummary["status"]): RunSummary {
  return {
    runId,
    jobId,
    startedAt: new Date("2024-01-01T00:00:00Z"),
    endedAt: new Date("2024-01-01T00:00:01Z"),
    status,
    stats: { kinds: {}, errors: [], durationMs: 1000 },
  };
}

/**
 * Test suite that works with any SyncStateStore implementation.
 */
function runSyncStateContractTests(createStore: () => SyncStateStore, implementationName: string) {
  describe(`SyncStateStore Contract Tests - ${implementationName}`, () => {
    let store: SyncStateStore;

    beforeEach(() => {
      store = createStore();
    });

    describe("Fingerprints", () => {
      it("should save and load fingerprints", async () => {
        await store.saveFingerprint("job1", "target", "function", "0x401000", "fp-a");

        expect(await store.loadFingerprint("job1", "target", "function", "0x401000")).toBe("fp-a");
      });

      it("should return null for unknown fingerprints", async () => {
        expect(await store.loadFingerprint("job1", "target", "struct", "point")).toBeNull();
      });

      it("should overwrite fingerprints", async () => {
        await store.saveFingerprint("job1", "target", "enum", "color", "fp-1");
        await store.saveFingerprint("job1", "target", "enum", "color", "fp-2");

        expect(await store.loadFingerprint("job1", "target", "enum", "color")).toBe("fp-2");
      });

      it("should track fingerprints per job, peer, and kind independently", async () => {
        await store.saveFingerprint("job1", "target", "function", "0x10", "fp-1");
        await store.saveFingerprint("job1", "source", "function", "0x10", "fp-2");
        await store.saveFingerprint("job2", "target", "function", "0x10", "fp-3");
        await store.saveFingerprint("job1", "target", "comment", "0x10", "fp-4");

        expect(await store.loadFingerprint("job1", "target", "function", "0x10")).toBe("fp-1");
        expect(await store.loadFingerprint("job1", "source", "function", "0x10")).toBe("fp-2");
        expect(await store.loadFingerprint("job2", "target", "function", "0x10")).toBe("fp-3");
        expect(await store.loadFingerprint("job1", "target", "comment", "0x10")).toBe("fp-4");
      });
    });

    describe("Fail Count Tracking", () => {
      it("should increment fail count", async () => {
        expect(await store.incrementFailCount("job1")).toBe(1);
        expect(await store.incrementFailCount("job1")).toBe(2);
      });

      it("should reset fail count", async () => {
        await store.incrementFailCount("job1");
        await store.incrementFailCount("job1");

        await store.resetFailCount("job1");

        expect(await store.getFailCount("job1")).toBe(0);
      });

      it("should track fail counts per job independently", async () => {
        await store.incrementFailCount("job1");
        await store.incrementFailCount("job1");
        await store.incrementFailCount("job2");

        expect(await store.getFailCount("job1")).toBe(2);
        expect(await store.getFailCount("job2")).toBe(1);
      });

      it("should return 0 for non-existent fail counts", async () => {
        expect(await store.getFailCount("job1")).toBe(0);
      });
    });

    describe("Job State", () => {
      it("should disable and check job state", async () => {
        expect(await store.isJobDisabled("job1")).toBe(false);

        await store.setJobDisabled("job1", new Date());
        expect(await store.isJobDisabled("job1")).toBe(true);
      });

      it("should track job state per job independently", async () => {
        await store.setJobDisabled("job1", new Date());

        expect(await store.isJobDisabled("job1")).toBe(true);
        expect(await store.isJobDisabled("job2")).toBe(false);
      });
    });

    describe("Run Logs", () => {
      it("should return runs for a job oldest first", async () => {
        await store.insertRun(createRun("run1", "job1", "success"));
        await store.insertRun(createRun("run2", "job2", "partial"));
        await store.insertRun(createRun("run3", "job1", "failed"));

        const runs = await store.getRuns("job1");
        expect(runs.map((run) => run.runId)).toEqual(["run1", "run3"]);
        expect(runs[1].status).toBe("failed");
      });

      it("should return an empty list for jobs without runs", async () => {
        expect(await store.getRuns("job1")).toEqual([]);
      });
    });
  });
}

runSyncStateContractTests(() => new InMemorySyncStateStore(), "InMemory");

describe("InMemorySyncStateStore helpers", () => {
  it("should re-enable a disabled job", async () => {
    const store = new InMemorySyncStateStore();
    const ts = new Date("2024-02-03T04:05:06Z");
    await store.setJobDisabled("job1", ts);

    expect(store.disabledAt("job1")).toBe(ts);

    store.enableJob("job1");
    expect(await store.isJobDisabled("job1")).toBe(false);
    expect(store.disabledAt("job1")).toBeUndefined();
  });

  it("should clear all data", async () => {
    const store = new InMemorySyncStateStore();
    await store.saveFingerprint("job1", "target", "patch", "0x20", "fp");
    await store.incrementFailCount("job1");
    await store.insertRun(createRun("run1", "job1", "success"));

    store.clear();

    expect(await store.loadFingerprint("job1", "target", "patch", "0x20")).toBeNull();
    expect(await store.getFailCount("job1")).toBe(0);
    expect(await store.getRuns("job1")).toEqual([]);
  });
});
