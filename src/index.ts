import { enabledPlatforms, loadConfig } from "./config/env.js";
import { logger } from "./config/logger.js";
import { createAdapters } from "./adapters/index.js";
import { loadBatchFile } from "./core/batch-input.js";
import { AppDatabase } from "./core/db.js";
import { AutoDeleteTracker } from "./core/delete-tracker.js";
import { errorMessage } from "./core/errors.js";
import { LocalSchedulingQueue } from "./core/local-queue.js";
import { LibraryMediaPicker } from "./core/media-selector.js";
import { Orchestrator } from "./core/orchestrator.js";
import { SweepScheduler } from "./workers/sweeper.js";

async function boot(): Promise<void> {
  const appLogger = logger.child({ module: "index" });
  const config = loadConfig();
  logger.level = config.logLevel;

  const platforms = enabledPlatforms(config);
  appLogger.info({ nodeEnv: config.nodeEnv, runMode: config.runMode, platforms }, "Starting post dispatcher");

  if (platforms.length === 0) {
    throw new Error("No platform credentials configured. Check environment configuration.");
  }

  const db = new AppDatabase(config.dbPath);
  const queue = new LocalSchedulingQueue(db, { dispatchLeaseMs: config.sweep.dispatchLeaseMs });
  const deletions = new AutoDeleteTracker(db, config.deletion);
  const orchestrator = new Orchestrator({
    adapters: createAdapters(config),
    queue,
    deletions,
    settings: { retry: config.retry, ttl: config.ttl, sweepBatchSize: config.sweep.batchSize }
  });

  for (const result of await orchestrator.authenticateAll()) {
    if (!result.success) {
      appLogger.error(
        { platform: result.platform, error: result.error?.message },
        "Platform failed to authenticate; its posts will fail until credentials are fixed"
      );
    }
  }

  if (config.batch.file) {
    const picker = config.media.libraryDir
      ? new LibraryMediaPicker(config.media.libraryDir, db, { recentExclude: config.media.recentExclude })
      : undefined;

    const results = await orchestrator.processBatchInput(await loadBatchFile(config.batch.file), {
      ttl: config.batch.ttl,
      pickLibraryMedia: picker ? () => picker.pick() : undefined
    });

    for (const { index, result } of results) {
      if (result.success) {
        appLogger.info(
          { index, platform: result.platform, route: result.route, platformPostId: result.platformPostId, jobId: result.jobId },
          "Batch item dispatched"
        );
      } else {
        appLogger.warn({ index, platform: result.platform, error: result.error }, "Batch item failed");
      }
    }
  }

  const sweeper = new SweepScheduler({
    orchestrator,
    queue,
    intervalMs: config.sweep.intervalMs,
    retentionMs: config.sweep.queueRetentionMs
  });

  if (config.runMode === "once") {
    await sweeper.runOnce();
    await orchestrator.destroy();
    db.close();
    appLogger.info("Single pass complete");
    return;
  }

  sweeper.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    appLogger.info({ signal }, "Shutting down post dispatcher");

    await sweeper.stop();
    await orchestrator.destroy();
    db.close();

    appLogger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

boot().catch((error) => {
  logger.fatal({ error: errorMessage(error) }, "Failed to boot post dispatcher");
  process.exit(1);
});
