/**
 * Tests for the job runner and the backend registry.
 * Each test writes its config and snapshots to a fresh temporary directory.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { InMemoryBackend } from "@artisync/adapter-in-memory";
import { ConfigurationError, type KindStats, type Logger } from "@artisync/core";
import { InMemorySyncStateStore } from "@artisync/syncstate-in-memory";
import { loadBackend, loadSyncState, registerBackend } from "../src/loaders";
import { inspectPeer, runJobs } from "../src/runner";

const sourceSnapshot = {
  binary: { hash: "h1" },
  functions: [
    {
      addr: "0x1000",
      size: 16,
      name: "main",
      return_type: "int",
      stack_vars: [{ offset: -4, name: "x", type: "int", size: 4 }],
    },
  ],
  enums: [{ name: "color", members: { RED: 0 } }],
  patches: [{ addr: "0x1010", bytes: "9090", original: "7405" }],
};

function stats(partial: Partial<KindStats>): KindStats {
  return { listed: 0, changed: 0, unchanged: 0, skipped: 0, missing: 0, failed: 0, ...partial };
}

function createRecordingLogger(): { [K in keyof Logger]: jest.Mock } {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    critical: jest.fn(),
  };
}

describe("runner", () => {
  let dir: string;

  async function writeJson(name: string, value: unknown): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, JSON.stringify(value, null, 2), "utf-8");
    return file;
  }

  function pushJob(id: string, extra: object = {}): object {
    return {
      id,
      source: { backend: "in-memory", options: { snapshot: "source.json" } },
      target: { backend: "in-memory", options: { snapshot: "target.json", output: "out.json" } },
      kinds: ["function", "enum"],
      ...extra,
    };
  }

  async function writeConfig(jobs: object[]): Promise<string> {
    return writeJson("artisync.jsonc", { syncstate: { driver: "in-memory" }, jobs });
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "artisync-runner-"));
    await writeJson("source.json", sourceSnapshot);
    await writeJson("target.json", { binary: { hash: "h1" } });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("runJobs", () => {
    it("should sync a job and write the target database on close", async () => {
      const configPath = await writeConfig([pushJob("push")]);

      const [summary] = await runJobs(configPath);

      expect(summary.jobId).toBe("push");
      expect(summary.status).toBe("success");
      expect(summary.stats.kinds).toEqual({
        function: stats({ listed: 1, changed: 1 }),
        enum: stats({ listed: 1, changed: 1 }),
      });

      const output = JSON.parse(await fs.readFile(path.join(dir, "out.json"), "utf-8"));
      expect(output).toEqual({
        binary: { hash: "h1" },
        functions: [
          {
            addr: "0x1000",
            size: 16,
            name: "main",
            return_type: "int",
            stack_vars: [{ offset: -4, name: "x", type: "int", size: 4 }],
          },
        ],
        global_variables: [],
        structs: [],
        enums: [{ name: "color", members: { RED: 0 } }],
        comments: [],
        patches: [],
      });
    });

    it("should run only the selected jobs", async () => {
      const configPath = await writeConfig([pushJob("first"), pushJob("second", { kinds: ["enum"] })]);

      const results = await runJobs(configPath, { jobIds: ["second"] });

      expect(results.map((summary) => summary.jobId)).toEqual(["second"]);
      expect(Object.keys(results[0].stats.kinds)).toEqual(["enum"]);
    });

    it("should reject unknown job ids", async () => {
      const configPath = await writeConfig([pushJob("push")]);

      await expect(runJobs(configPath, { jobIds: ["push", "nope"] })).rejects.toThrow("Unknown job id(s): nope");
    });

    it("should skip unchanged artifacts when the state store is reused", async () => {
      const configPath = await writeConfig([pushJob("push")]);
      const stateStore = new InMemorySyncStateStore();

      await runJobs(configPath, { stateStore });
      const [second] = await runJobs(configPath, { stateStore });

      expect(second.stats.kinds.function).toEqual(stats({ listed: 1, skipped: 1 }));
      expect(await stateStore.getRuns("push")).toHaveLength(2);
    });

    it("should report a binary mismatch as a failed run", async () => {
      await writeJson("target.json", { binary: { hash: "h2" } });
      const configPath = await writeConfig([pushJob("push")]);

      const [summary] = await runJobs(configPath);

      expect(summary.status).toBe("failed");
      expect(summary.stats.reason).toBe("binary_mismatch");
      expect(summary.stats.errors).toEqual(["Binary mismatch: source=h1 target=h2"]);
    });

    it("should log job progress", async () => {
      const configPath = await writeConfig([pushJob("push")]);
      const logger = createRecordingLogger();

      await runJobs(configPath, { logger });

      expect(logger.info).toHaveBeenCalledWith("Running job: push");
      expect(logger.info).toHaveBeenCalledWith("Job 'push' completed: success");
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("should close both backends after each run", async () => {
      const source = new InMemoryBackend({ binaryHash: "h1" });
      const target = new InMemoryBackend({ binaryHash: "h1" });
      const sourceClose = jest.spyOn(source, "close");
      const targetClose = jest.spyOn(target, "close");
      registerBackend("recording", async (options) => (options.role === "source" ? source : target));
      const configPath = await writeConfig([
        {
          id: "closing",
          source: { backend: "recording", options: { role: "source" } },
          target: { backend: "recording", options: { role: "target" } },
        },
      ]);

      await runJobs(configPath);

      expect(sourceClose).toHaveBeenCalledTimes(1);
      expect(targetClose).toHaveBeenCalledTimes(1);
    });
  });

  describe("inspectPeer", () => {
    it("should count what a peer holds", async () => {
      const configPath = await writeConfig([pushJob("push")]);

      const inspection = await inspectPeer(configPath, "push", "source");

      expect(inspection.backend).toBe("in-memory");
      expect(inspection.binaryHash).toBe("h1");
      expect(inspection.counts).toEqual({
        function: 1,
        stackVariable: 1,
        globalVariable: 0,
        struct: 0,
        enum: 1,
        comment: 0,
        patch: 1,
      });
      expect(inspection.patches.map((patch) => [patch.addr, Array.from(patch.bytes)])).toEqual([
        [0x1010n, [0x90, 0x90]],
      ]);
    });
  });

  describe("loaders", () => {
    it("should reject unknown backends", async () => {
      await expect(loadBackend({ backend: "ghidra" }, { baseDir: dir })).rejects.toThrow(/^Unknown backend 'ghidra'/);
    });

    it("should wrap factory failures with the backend name", async () => {
      const load = loadBackend({ backend: "in-memory", options: { snapshot: "missing.json" } }, { baseDir: dir });

      await expect(load).rejects.toThrow(/^Failed to load backend 'in-memory': Failed to read snapshot /);
    });

    it("should reject unknown syncstate drivers", async () => {
      await expect(loadSyncState({ driver: "sqlite" }, { baseDir: dir })).rejects.toBeInstanceOf(ConfigurationError);
    });

    it("should create the in-memory syncstate store", async () => {
      expect(await loadSyncState({ driver: "in-memory" }, { baseDir: dir })).toBeInstanceOf(InMemorySyncStateStore);
    });
  });
});
