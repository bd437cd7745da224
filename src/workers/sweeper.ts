import { logger } from "../config/logger.js";
import { errorMessage } from "../core/errors.js";
import type { LocalSchedulingQueue } from "../core/local-queue.js";
import type { Orchestrator } from "../core/orchestrator.js";

export interface SweepSummary {
  published: number;
  publishFailed: number;
  deleted: number;
  deleteFailed: number;
  purged: number;
}

/**
 * Drives the two periodic sweeps: due local-queue posts, then due
 * auto-deletes. Overlapping ticks are skipped while one is running.
 */
export class SweepScheduler {
  private readonly log = logger.child({ module: "workers/sweeper" });
  private readonly orchestrator: Pick<Orchestrator, "processDueQueue" | "processDueDeletions">;
  private readonly queue: Pick<LocalSchedulingQueue, "purgeFinished">;
  private readonly intervalMs: number;
  private readonly retentionMs: number;
  private readonly clock: () => Date;

  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(params: {
    orchestrator: Pick<Orchestrator, "processDueQueue" | "processDueDeletions">;
    queue: Pick<LocalSchedulingQueue, "purgeFinished">;
    intervalMs: number;
    retentionMs: number;
    clock?: () => Date;
  }) {
    this.orchestrator = params.orchestrator;
    this.queue = params.queue;
    this.intervalMs = params.intervalMs;
    this.retentionMs = params.retentionMs;
    this.clock = params.clock ?? (() => new Date());
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.log.info({ intervalMs: this.intervalMs }, "Starting sweeps");

    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);

    void this.tick();
  }

  /** Stops the interval and waits for a running pass to finish. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      this.log.info("Waiting for the running sweep to finish");
      await this.inFlight;
    }
  }

  private tick(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.sweep().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async sweep(): Promise<void> {
    try {
      await this.runOnce();
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "Error while sweeping");
    }
  }

  /** One pass of both sweeps plus queue retention. */
  async runOnce(): Promise<SweepSummary> {
    const dispatched = await this.orchestrator.processDueQueue();
    const deletions = await this.orchestrator.processDueDeletions();

    let purged = 0;
    try {
      purged = this.queue.purgeFinished(new Date(this.clock().getTime() - this.retentionMs));
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, "Could not purge finished scheduled posts");
    }

    const summary: SweepSummary = {
      published: dispatched.filter((item) => item.result.success).length,
      publishFailed: dispatched.filter((item) => !item.result.success).length,
      deleted: deletions.filter((item) => item.outcome === "deleted" || item.outcome === "already-deleted").length,
      deleteFailed: deletions.filter((item) => item.outcome === "retry-scheduled" || item.outcome === "failed").length,
      purged
    };

    if (dispatched.length > 0 || deletions.length > 0 || purged > 0) {
      this.log.info(summary, "Sweep finished");
    }

    return summary;
  }
}
