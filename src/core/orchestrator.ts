import type { AdapterRegistry } from "../adapters/index.js";
import type { PlatformAdapter } from "../adapters/base.js";
import { logger, type Logger } from "../config/logger.js";
import { parseBatchInput, type BatchInputOptions, type ParsedBatchItem } from "./batch-input.js";
import { assertPublishable, supports, usesNativeScheduling } from "./capabilities.js";
import { AutoDeleteTracker } from "./delete-tracker.js";
import { toTextOnly } from "./descriptor.js";
import {
  AuthenticationError,
  MediaUploadError,
  NotFoundError,
  PostValidationError,
  errorMessage,
  toErrorInfo
} from "./errors.js";
import { LocalSchedulingQueue } from "./local-queue.js";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy, type RetryRuntime } from "./retry.js";
import { DEFAULT_TTL, DEFAULT_TTL_DURATIONS, deleteAtFor, resolveTtlMs, type TtlDurations } from "./ttl.js";
import type {
  AuthenticationResult,
  BatchItemResult,
  DeleteJob,
  DeleteJobStatus,
  DeletionResult,
  DispatchFailure,
  DispatchResult,
  DispatchRoute,
  PlatformName,
  PostDescriptor,
  PublishReceipt,
  QueueDispatchResult,
  ScheduledPost,
  TtlSelection
} from "./types.js";

export interface OrchestratorSettings {
  retry: RetryPolicy;
  ttl: TtlDurations;
  /** Upper bound on entries claimed per sweep. */
  sweepBatchSize: number;
}

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
  retry: DEFAULT_RETRY_POLICY,
  ttl: DEFAULT_TTL_DURATIONS,
  sweepBatchSize: 25
};

export interface OrchestratorDeps {
  adapters: AdapterRegistry;
  queue: LocalSchedulingQueue;
  deletions: AutoDeleteTracker;
  settings?: Partial<OrchestratorSettings>;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  log?: Logger;
}

export interface DispatchOptions {
  ttl?: TtlSelection;
}

export interface BatchDispatchOptions extends DispatchOptions, BatchInputOptions {}

type AuthState = { ok: true } | { ok: false; error: AuthenticationError };

function failure(platform: PlatformName | null, error: unknown): DispatchFailure {
  return { success: false, platform, platformPostId: null, error: toErrorInfo(error) };
}

/**
 * Entry point for publishing. Routes each descriptor to an immediate publish,
 * the platform's own scheduler or the local queue, registers auto-delete
 * deadlines and drives the two sweeps. No method rejects: every outcome is a
 * structured result.
 */
export class Orchestrator {
  private readonly log: Logger;
  private readonly adapters: AdapterRegistry;
  private readonly queue: LocalSchedulingQueue;
  private readonly deletions: AutoDeleteTracker;
  private readonly settings: OrchestratorSettings;
  private readonly clock: () => Date;
  private readonly runtime: RetryRuntime;
  private readonly auth = new Map<PlatformName, AuthState>();

  constructor(deps: OrchestratorDeps) {
    this.log = (deps.log ?? logger).child({ module: "core/orchestrator" });
    this.adapters = deps.adapters;
    this.queue = deps.queue;
    this.deletions = deps.deletions;
    this.settings = { ...DEFAULT_ORCHESTRATOR_SETTINGS, ...deps.settings };
    this.clock = deps.clock ?? (() => new Date());
    this.runtime = { sleep: deps.sleep, random: deps.random, log: deps.log };
  }

  private retrying<T>(platform: PlatformName, operation: string, call: () => Promise<T>): Promise<T> {
    return withRetry(call, this.settings.retry, { platform, operation }, this.runtime);
  }

  /**
   * Authenticates once per platform. A rejected credential is remembered for
   * the life of the process; other failures are retried on the next call.
   */
  private async authenticated(platform: PlatformName): Promise<PlatformAdapter> {
    const adapter = this.adapters.get(platform);
    if (!adapter) {
      throw new AuthenticationError(`No credentials configured for ${platform}`, { platform });
    }

    const state = this.auth.get(platform);
    if (state?.ok) {
      return adapter;
    }
    if (state) {
      throw state.error;
    }

    try {
      await this.retrying(platform, "authenticate", () => adapter.authenticate());
      this.auth.set(platform, { ok: true });
      return adapter;
    } catch (error) {
      if (error instanceof AuthenticationError) {
        this.auth.set(platform, { ok: false, error });
        this.log.error({ platform, error: error.message }, "Authentication rejected; platform disabled for this run");
      }
      throw error;
    }
  }

  private isFuture(scheduledAt: string | undefined, now: Date): scheduledAt is string {
    return scheduledAt !== undefined && Date.parse(scheduledAt) > now.getTime();
  }

  private registerDeletion(platform: PlatformName, platformPostId: string, deleteAt: Date): string | undefined {
    try {
      const job = this.deletions.register({ platform, platformPostId, deleteAt, now: this.clock() });
      return job.deleteAt;
    } catch (error) {
      this.log.error(
        { platform, platformPostId, error: errorMessage(error) },
        "Published but could not register the auto-delete deadline"
      );
      return undefined;
    }
  }

  /**
   * Publishes through the retry wrapper. A media failure gets one more
   * attempt, then the post goes out as text when the platform allows it.
   */
  private async publishWithMediaPolicy(
    adapter: PlatformAdapter,
    descriptor: PostDescriptor
  ): Promise<{ receipt: PublishReceipt; degradedToText: boolean }> {
    const { platform } = descriptor;
    const publish = (target: PostDescriptor) =>
      this.retrying(platform, "postImmediate", () => adapter.postImmediate(target));

    try {
      return { receipt: await publish(descriptor), degradedToText: false };
    } catch (error) {
      if (!(error instanceof MediaUploadError)) {
        throw error;
      }
      this.log.warn({ platform, error: error.message }, "Media upload failed; retrying publish once");
    }

    try {
      return { receipt: await publish(descriptor), degradedToText: false };
    } catch (error) {
      if (!(error instanceof MediaUploadError) || descriptor.media.length === 0 || !supports(platform, "text-only")) {
        throw error;
      }

      let textOnly: PostDescriptor;
      try {
        textOnly = toTextOnly(descriptor);
        assertPublishable(textOnly);
      } catch {
        throw error;
      }

      this.log.warn({ platform, error: error.message }, "Media upload failed twice; publishing text only");
      return { receipt: await publish(textOnly), degradedToText: true };
    }
  }

  private async publishImmediately(
    descriptor: PostDescriptor,
    ttl: TtlSelection,
    route: DispatchRoute,
    jobId?: string
  ): Promise<DispatchResult> {
    const { platform } = descriptor;

    try {
      resolveTtlMs(ttl, this.settings.ttl);
      assertPublishable(descriptor);

      const adapter = await this.authenticated(platform);
      const { receipt, degradedToText } = await this.publishWithMediaPolicy(adapter, descriptor);
      const deleteAt = this.registerDeletion(platform, receipt.id, deleteAtFor(this.clock(), ttl, this.settings.ttl));

      this.log.info({ platform, platformPostId: receipt.id, route, jobId, deleteAt, degradedToText }, "Post published");

      return {
        success: true,
        platform,
        route,
        platformPostId: receipt.id,
        ...(receipt.url ? { url: receipt.url } : {}),
        ...(jobId ? { jobId } : {}),
        ...(deleteAt ? { deleteAt } : {}),
        ...(degradedToText ? { degradedToText } : {})
      };
    } catch (error) {
      this.log.error({ platform, route, jobId, error: errorMessage(error) }, "Publish failed");
      return failure(platform, error);
    }
  }

  /** Publishes now, or hands a descriptor with a future time to `schedulePost`. */
  async postNow(descriptor: PostDescriptor, options: DispatchOptions = {}): Promise<DispatchResult> {
    if (this.isFuture(descriptor.scheduledAt, this.clock())) {
      return this.schedulePost(descriptor, options);
    }

    return this.publishImmediately(descriptor, options.ttl ?? DEFAULT_TTL, "immediate");
  }

  async schedulePost(descriptor: PostDescriptor, options: DispatchOptions = {}): Promise<DispatchResult> {
    const { platform, scheduledAt } = descriptor;
    const ttl = options.ttl ?? DEFAULT_TTL;

    if (!scheduledAt) {
      return failure(platform, new PostValidationError("Scheduling needs a scheduled time", { platform }));
    }

    const now = this.clock();
    if (!this.isFuture(scheduledAt, now)) {
      return this.publishImmediately(descriptor, ttl, "immediate");
    }

    try {
      resolveTtlMs(ttl, this.settings.ttl);
      assertPublishable(descriptor);

      if (usesNativeScheduling(descriptor, now)) {
        const adapter = await this.authenticated(platform);
        const receipt = await this.retrying(platform, "postScheduled", () => adapter.postScheduled(descriptor));
        const deleteAt = this.registerDeletion(
          platform,
          receipt.id,
          deleteAtFor(new Date(scheduledAt), ttl, this.settings.ttl)
        );

        this.log.info({ platform, platformPostId: receipt.id, scheduledAt, deleteAt }, "Post scheduled natively");

        return {
          success: true,
          platform,
          route: "native-scheduled",
          platformPostId: receipt.id,
          ...(receipt.url ? { url: receipt.url } : {}),
          ...(deleteAt ? { deleteAt } : {})
        };
      }

      if (!this.adapters.has(platform)) {
        throw new AuthenticationError(`No credentials configured for ${platform}`, { platform });
      }

      const job = this.queue.enqueue(descriptor, ttl, now);
      return { success: true, platform, route: "local-queue", platformPostId: null, jobId: job.jobId };
    } catch (error) {
      this.log.error({ platform, scheduledAt, error: errorMessage(error) }, "Scheduling failed");
      return failure(platform, error);
    }
  }

  /** Dispatches descriptors one after another, in input order. */
  async processBatch(descriptors: readonly PostDescriptor[], options: DispatchOptions = {}): Promise<BatchItemResult[]> {
    const results: BatchItemResult[] = [];

    for (const [index, descriptor] of descriptors.entries()) {
      results.push({ index, result: await this.postNow(descriptor, options) });
    }

    this.logBatch(results);
    return results;
  }

  /** Parses a decoded batch document and dispatches every valid entry in order. */
  async processBatchInput(raw: unknown, options: BatchDispatchOptions = {}): Promise<BatchItemResult[]> {
    let items: ParsedBatchItem[];
    try {
      items = await parseBatchInput(raw, { pickLibraryMedia: options.pickLibraryMedia });
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "Batch input rejected");
      return [{ index: 0, result: failure(null, error) }];
    }

    const results: BatchItemResult[] = [];
    for (const item of items) {
      if (item.error) {
        results.push({
          index: item.index,
          result: { success: false, platform: item.platform, platformPostId: null, error: item.error }
        });
        continue;
      }

      results.push({ index: item.index, result: await this.postNow(item.descriptor, options) });
    }

    this.logBatch(results);
    return results;
  }

  private logBatch(results: readonly BatchItemResult[]): void {
    const succeeded = results.filter((item) => item.result.success).length;
    this.log.info({ total: results.length, succeeded, failed: results.length - succeeded }, "Batch processed");
  }

  /** A published entry that cannot be marked stays dispatching until its lease fails it. */
  private recordPublished(jobId: string, platformPostId: string | null): void {
    if (!platformPostId) {
      return;
    }

    try {
      this.queue.markPublished(jobId, platformPostId, this.clock());
    } catch (error) {
      this.log.error({ jobId, platformPostId, error: errorMessage(error) }, "Could not mark scheduled post published");
    }
  }

  /** Nothing was published, so an entry that cannot be marked failed goes back to pending. */
  private recordFailed(jobId: string, message: string): void {
    try {
      this.queue.markFailed(jobId, message, this.clock());
      return;
    } catch (error) {
      this.log.error({ jobId, error: errorMessage(error) }, "Could not mark scheduled post failed; releasing it");
    }

    try {
      this.queue.release(jobId, this.clock());
    } catch (error) {
      this.log.error({ jobId, error: errorMessage(error) }, "Could not release scheduled post");
    }
  }

  /** Publishes every due local-queue entry claimed by this sweep. */
  async processDueQueue(): Promise<QueueDispatchResult[]> {
    const now = this.clock();

    let claimed: ScheduledPost[];
    try {
      claimed = this.queue.claimDue(now, this.settings.sweepBatchSize);
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "Could not claim due scheduled posts; will retry next sweep");
      return [];
    }

    const results: QueueDispatchResult[] = [];

    for (const job of claimed) {
      const result = await this.publishImmediately(job.descriptor, job.ttl, "local-queue", job.jobId);

      if (result.success) {
        this.recordPublished(job.jobId, result.platformPostId);
      } else {
        this.recordFailed(job.jobId, `${result.error.kind}: ${result.error.message}`);
      }

      results.push({ jobId: job.jobId, result });
    }

    if (results.length > 0) {
      this.log.info({ dispatched: results.length }, "Processed due scheduled posts");
    }

    return results;
  }

  private async removeFromPlatform(platform: PlatformName, platformPostId: string): Promise<"deleted" | "already-deleted"> {
    const adapter = await this.authenticated(platform);

    try {
      await this.retrying(platform, "deletePost", () => adapter.deletePost(platformPostId));
      return "deleted";
    } catch (error) {
      if (error instanceof NotFoundError) {
        return "already-deleted";
      }
      throw error;
    }
  }

  private async sweepDeletion(job: DeleteJob): Promise<DeletionResult> {
    const base = { platform: job.platform, platformPostId: job.platformPostId, jobId: job.id };

    try {
      const outcome = await this.removeFromPlatform(job.platform, job.platformPostId);
      this.deletions.markDeleted(job.id, this.clock());
      this.log.info({ ...base, outcome }, "Auto-deleted post");
      return { ...base, outcome };
    } catch (error) {
      const info = toErrorInfo(error);

      let status: DeleteJobStatus;
      try {
        status = this.deletions.recordFailure(job.id, `${info.kind}: ${info.message}`, this.clock());
      } catch (storeError) {
        this.log.error({ ...base, error: errorMessage(storeError) }, "Could not record deletion failure");
        return { ...base, outcome: "retry-scheduled", error: info };
      }

      if (status === "failed") {
        this.log.error({ ...base, error: info.message }, "Auto-delete gave up after the retry cap");
        return { ...base, outcome: "failed", error: info };
      }

      this.log.warn({ ...base, error: info.message }, "Auto-delete failed; retry scheduled");
      return { ...base, outcome: "retry-scheduled", error: info };
    }
  }

  /** Deletes every post whose time-to-live has run out. */
  async processDueDeletions(): Promise<DeletionResult[]> {
    let claimed: DeleteJob[];
    try {
      claimed = this.deletions.claimDue(this.clock(), this.settings.sweepBatchSize);
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "Could not claim due delete jobs; will retry next sweep");
      return [];
    }

    const results: DeletionResult[] = [];
    for (const job of claimed) {
      results.push(await this.sweepDeletion(job));
    }

    return results;
  }

  /**
   * Deletes a post right away. Deleting an already-removed post succeeds, and
   * a pending auto-delete job for the post is settled.
   */
  async deletePost(platform: PlatformName, platformPostId: string): Promise<DeletionResult> {
    try {
      const outcome = await this.removeFromPlatform(platform, platformPostId);

      try {
        const job = this.deletions.find(platform, platformPostId);
        if (job?.status === "pending") {
          this.deletions.markDeleted(job.id, this.clock());
        }
      } catch (error) {
        this.log.warn({ platform, platformPostId, error: errorMessage(error) }, "Could not settle auto-delete job");
      }

      this.log.info({ platform, platformPostId, outcome }, "Deleted post");
      return { platform, platformPostId, outcome };
    } catch (error) {
      this.log.error({ platform, platformPostId, error: errorMessage(error) }, "Delete failed");
      return { platform, platformPostId, outcome: "failed", error: toErrorInfo(error) };
    }
  }

  /** Removes a pending local-queue entry. False once it is dispatching or done. */
  cancelScheduledPost(jobId: string): boolean {
    try {
      const cancelled = this.queue.cancel(jobId);
      this.log.info({ jobId, cancelled }, cancelled ? "Cancelled scheduled post" : "Scheduled post not cancellable");
      return cancelled;
    } catch (error) {
      this.log.error({ jobId, error: errorMessage(error) }, "Could not cancel scheduled post");
      return false;
    }
  }

  async authenticateAll(): Promise<AuthenticationResult[]> {
    const results: AuthenticationResult[] = [];

    for (const platform of this.adapters.keys()) {
      try {
        await this.authenticated(platform);
        results.push({ platform, success: true });
      } catch (error) {
        results.push({ platform, success: false, error: toErrorInfo(error) });
      }
    }

    return results;
  }

  async destroy(): Promise<void> {
    for (const adapter of this.adapters.values()) {
      await adapter.destroy();
    }
  }
}
