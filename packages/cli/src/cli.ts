#!/usr/bin/env node
/**
 * ArtiSync CLI - Main entry point
 */

import { Command } from "commander";
import * as path from "path";
import * as fs from "fs/promises";
import { config } from "dotenv";
import * as cron from "node-cron";
import { ARTIFACT_KINDS, consoleLogger, formatAddress, setLogger, type SyncStateStore } from "@artisync/core";
import { inspectPeer, runJobs } from "./runner.js";
import { loadConfig } from "./parser.js";
import { loadSyncState } from "./loaders.js";

// Load environment variables from .env file if it exists
config();
setLogger(consoleLogger);

const DEFAULT_CONFIG = "artisync.jsonc";

/**
 * Resolve the config path and exit if the file does not exist.
 */
async function requireConfig(configOption: string): Promise<string> {
  const configPath = path.resolve(configOption);
  try {
    await fs.access(configPath);
  } catch {
    console.error(`Error: Configuration file not found: ${configPath}`);
    process.exit(1);
  }
  return configPath;
}

const program = new Command();

program
  .name("artisync")
  .description("Synchronize reverse-engineering artifacts between decompiler backends")
  .version("0.1.0");

program
  .command("run")
  .description("Run sync jobs once")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .option("-j, --jobs <ids...>", "Specific job IDs to run (default: all jobs)")
  .action(async (options: { config: string; jobs?: string[] }) => {
    try {
      const configPath = await requireConfig(options.config);

      const results = await runJobs(configPath, { jobIds: options.jobs });

      console.log(`\nCompleted ${results.length} job(s)`);
      for (const summary of results) {
        const counts = Object.entries(summary.stats.kinds)
          .flatMap(([kind, stats]) => (stats ? [`${kind}=${stats.changed}/${stats.listed}`] : []))
          .join(" ");
        console.log(`  ${summary.jobId}: ${summary.status}${summary.stats.reason ? ` (${summary.stats.reason})` : ""} ${counts}`);
      }

      // Exit with error code if any job failed
      const hasFailures = results.some((r) => r.status === "failed");
      process.exit(hasFailures ? 1 : 0);
    } catch (error) {
      console.error("Error running jobs:", error);
      process.exit(1);
    }
  });

program
  .command("schedule")
  .description("Run sync jobs on their configured schedules")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action(async (options: { config: string }) => {
    try {
      const configPath = await requireConfig(options.config);

      // Load config to get schedules
      const parsed = await loadConfig(configPath);

      // One store for the lifetime of the scheduler so fingerprints and fail counts carry over
      const stateStore: SyncStateStore = await loadSyncState(parsed.syncstate, {
        baseDir: path.dirname(configPath),
      });

      console.log(`Starting scheduled sync jobs from ${configPath}`);
      console.log(`Found ${parsed.jobs.length} job(s)\n`);

      const scheduledJobs: Map<string, cron.ScheduledTask> = new Map();
      const running = new Set<string>();

      for (const jobConfig of parsed.jobs) {
        if (!jobConfig.schedule) {
          console.log(`Job '${jobConfig.id}' has no schedule (manual/CLI-only)`);
          continue;
        }

        if (!cron.validate(jobConfig.schedule)) {
          console.error(`Invalid cron expression for job '${jobConfig.id}': ${jobConfig.schedule}`);
          continue;
        }

        const task = cron.schedule(
          jobConfig.schedule,
          async () => {
            if (running.has(jobConfig.id)) {
              console.warn(`[${new Date().toISOString()}] Job '${jobConfig.id}' is still running, skipping this tick`);
              return;
            }
            running.add(jobConfig.id);
            console.log(`[${new Date().toISOString()}] Running scheduled job: ${jobConfig.id}`);
            try {
              await runJobs(configPath, { jobIds: [jobConfig.id], stateStore });
            } catch (error) {
              console.error(`[${new Date().toISOString()}] Error running job '${jobConfig.id}':`, error);
            } finally {
              running.delete(jobConfig.id);
            }
          },
          {
            scheduled: true,
            timezone: "UTC",
          }
        );

        scheduledJobs.set(jobConfig.id, task);
        console.log(`Scheduled job '${jobConfig.id}' with cron: ${jobConfig.schedule}`);
      }

      if (scheduledJobs.size === 0) {
        console.log("\nNo jobs with schedules found. Use 'artisync run' to run jobs manually.");
        process.exit(0);
      }

      console.log(`\n${scheduledJobs.size} job(s) scheduled. Press Ctrl+C to stop.`);

      process.on("SIGINT", () => {
        console.log("\nShutting down...");
        for (const [jobId, task] of scheduledJobs) {
          task.stop();
          console.log(`Stopped schedule for job '${jobId}'`);
        }
        process.exit(0);
      });

      // Keep process alive
      await new Promise(() => {}); // Never resolves
    } catch (error) {
      console.error("Error starting scheduled jobs:", error);
      process.exit(1);
    }
  });

program
  .command("validate")
  .description("Validate a configuration file without running jobs")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action(async (options: { config: string }) => {
    try {
      const configPath = await requireConfig(options.config);
      const parsed = await loadConfig(configPath);

      console.log(`✓ Configuration file is valid: ${configPath}`);
      console.log(`  SyncState: ${parsed.syncstate.driver}`);
      console.log(`  Jobs: ${parsed.jobs.length}`);

      for (const job of parsed.jobs) {
        console.log(
          `    - ${job.id}: ${job.source.backend} -> ${job.target.backend}` +
            (job.schedule ? ` (schedule: ${job.schedule})` : " (manual)")
        );
      }

      process.exit(0);
    } catch (error) {
      console.error("Configuration validation failed:", error);
      process.exit(1);
    }
  });

program
  .command("inspect")
  .description("Show what one peer of a job holds, without syncing")
  .argument("<job>", "Job ID")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .option("-s, --side <side>", "Peer to inspect: source or target", "source")
  .action(async (jobId: string, options: { config: string; side: string }) => {
    try {
      const configPath = await requireConfig(options.config);
      if (options.side !== "source" && options.side !== "target") {
        console.error(`Error: --side must be "source" or "target", got '${options.side}'`);
        process.exit(1);
      }

      const inspection = await inspectPeer(configPath, jobId, options.side);

      console.log(`Job '${jobId}', ${options.side} (${inspection.backend})`);
      console.log(`  Binary: ${inspection.binaryHash ?? "unknown"}`);
      for (const kind of ARTIFACT_KINDS) {
        console.log(`  ${kind}: ${inspection.counts[kind]}`);
      }
      for (const patch of inspection.patches) {
        console.log(`    ${formatAddress(patch.addr)} ${Buffer.from(patch.bytes).toString("hex")}`);
      }

      process.exit(0);
    } catch (error) {
      console.error("Inspection failed:", error);
      process.exit(1);
    }
  });

// Parse command line arguments
program.parse();
