import { randomUUID } from "node:crypto";
import { logger } from "../config/logger.js";
import { AppDatabase } from "./db.js";
import { SchedulingPersistenceError, errorMessage } from "./errors.js";
import { decodeDescriptor, decodeTtl, encodeDescriptor, encodeTtl } from "./job-serialization.js";
import type { PlatformName, PostDescriptor, ScheduledPost, ScheduledPostStatus, TtlSelection } from "./types.js";

interface ScheduledPostRow {
  job_id: string;
  platform: string;
  descriptor_json: string;
  scheduled_at: string;
  ttl_json: string;
  status: ScheduledPostStatus;
  platform_post_id: string | null;
  error: string | null;
  attempts: number;
  created_at: string;
  updated_at: string;
}

const COLUMNS = `job_id, platform, descriptor_json, scheduled_at, ttl_json, status,
  platform_post_id, error, attempts, created_at, updated_at`;

export const ABANDONED_DISPATCH_ERROR = "AbandonedDispatch: outcome unknown after the dispatch lease expired";

function toScheduledPost(row: ScheduledPostRow): ScheduledPost {
  return {
    jobId: row.job_id,
    descriptor: decodeDescriptor(row.descriptor_json),
    status: row.status,
    ttl: decodeTtl(row.ttl_json),
    platformPostId: row.platform_post_id,
    error: row.error,
    attempts: row.attempts,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function persistence<T>(what: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof SchedulingPersistenceError) {
      throw error;
    }
    throw new SchedulingPersistenceError(`${what}: ${errorMessage(error)}`, { cause: error });
  }
}

export interface LocalQueueOptions {
  /** How long an entry may stay dispatching before a sweep gives up on it. */
  dispatchLeaseMs?: number;
}

export const DEFAULT_DISPATCH_LEASE_MS = 30 * 60 * 1000;

/**
 * Persisted queue of posts waiting for their scheduled time on platforms
 * that cannot schedule natively. Entries move pending → dispatching →
 * published | failed; only pending entries are ever claimed or cancelled.
 */
export class LocalSchedulingQueue {
  private readonly log = logger.child({ module: "core/local-queue" });
  private readonly dispatchLeaseMs: number;

  constructor(
    private readonly db: AppDatabase,
    options: LocalQueueOptions = {}
  ) {
    this.dispatchLeaseMs = options.dispatchLeaseMs ?? DEFAULT_DISPATCH_LEASE_MS;
  }

  enqueue(descriptor: PostDescriptor, ttl: TtlSelection, now: Date): ScheduledPost {
    if (!descriptor.scheduledAt) {
      throw new SchedulingPersistenceError("Only descriptors with a scheduled time can be queued", {
        platform: descriptor.platform
      });
    }

    const jobId = randomUUID();
    const timestamp = now.toISOString();

    persistence("Could not store scheduled post", () =>
      this.db.connection
        .prepare(
          `
          INSERT INTO scheduled_posts (${COLUMNS})
          VALUES (?, ?, ?, ?, ?, 'pending', NULL, NULL, 0, ?, ?)
        `
        )
        .run(
          jobId,
          descriptor.platform,
          encodeDescriptor(descriptor),
          descriptor.scheduledAt,
          encodeTtl(ttl),
          timestamp,
          timestamp
        )
    );

    this.log.info(
      { jobId, platform: descriptor.platform, scheduledAt: descriptor.scheduledAt },
      "Queued post for local scheduling"
    );

    return {
      jobId,
      descriptor,
      status: "pending",
      ttl,
      platformPostId: null,
      error: null,
      attempts: 0,
      createdAt: timestamp,
      updatedAt: timestamp
    };
  }

  /**
   * Atomically moves due pending entries to dispatching and returns them.
   * A concurrent sweep sees them as dispatching and leaves them alone.
   * Entries left dispatching past the lease are marked failed first and
   * never claimed again, since their publish may have gone through.
   */
  claimDue(now: Date, limit: number): ScheduledPost[] {
    const timestamp = now.toISOString();
    const staleBefore = new Date(now.getTime() - this.dispatchLeaseMs).toISOString();

    const { abandoned, rows } = persistence("Could not claim due scheduled posts", () =>
      this.db.exclusive(() => {
        const stale = (
          this.db.connection
            .prepare("SELECT job_id FROM scheduled_posts WHERE status = 'dispatching' AND updated_at <= ?")
            .all(staleBefore) as Array<{ job_id: string }>
        ).map((row) => row.job_id);

        this.db.connection
          .prepare(
            `
            UPDATE scheduled_posts
            SET status = 'failed', error = ?, updated_at = ?
            WHERE status = 'dispatching' AND updated_at <= ?
          `
          )
          .run(ABANDONED_DISPATCH_ERROR, timestamp, staleBefore);

        const due = this.db.connection
          .prepare(
            `
            SELECT ${COLUMNS}
            FROM scheduled_posts
            WHERE status = 'pending' AND scheduled_at <= ?
            ORDER BY scheduled_at ASC, seq ASC
            LIMIT ?
          `
          )
          .all(timestamp, limit) as ScheduledPostRow[];

        const markDispatching = this.db.connection.prepare(
          `
          UPDATE scheduled_posts
          SET status = 'dispatching', attempts = attempts + 1, updated_at = ?
          WHERE job_id = ? AND status = 'pending'
        `
        );

        for (const row of due) {
          markDispatching.run(timestamp, row.job_id);
        }

        return {
          abandoned: stale,
          rows: due.map((row) => ({
            ...row,
            status: "dispatching" as const,
            attempts: row.attempts + 1,
            updated_at: timestamp
          }))
        };
      })
    );

    if (abandoned.length > 0) {
      this.log.warn({ jobIds: abandoned }, "Failed scheduled posts left dispatching past their lease");
    }

    const claimed: ScheduledPost[] = [];
    for (const row of rows) {
      try {
        claimed.push(toScheduledPost(row));
      } catch (error) {
        this.markFailed(row.job_id, errorMessage(error), now);
        this.log.error({ jobId: row.job_id, error: errorMessage(error) }, "Dropped unreadable scheduled post");
      }
    }

    return claimed;
  }

  markPublished(jobId: string, platformPostId: string, now: Date): void {
    persistence("Could not mark scheduled post published", () =>
      this.db.connection
        .prepare(
          `
          UPDATE scheduled_posts
          SET status = 'published', platform_post_id = ?, error = NULL, updated_at = ?
          WHERE job_id = ?
        `
        )
        .run(platformPostId, now.toISOString(), jobId)
    );
  }

  markFailed(jobId: string, error: string, now: Date): void {
    persistence("Could not mark scheduled post failed", () =>
      this.db.connection
        .prepare(
          `
          UPDATE scheduled_posts
          SET status = 'failed', error = ?, updated_at = ?
          WHERE job_id = ?
        `
        )
        .run(error, now.toISOString(), jobId)
    );
  }

  /** Returns a dispatching entry to pending, for a dispatch known not to have published. */
  release(jobId: string, now: Date): boolean {
    const result = persistence("Could not release scheduled post", () =>
      this.db.connection
        .prepare(
          `
          UPDATE scheduled_posts
          SET status = 'pending', updated_at = ?
          WHERE job_id = ? AND status = 'dispatching'
        `
        )
        .run(now.toISOString(), jobId)
    );

    return result.changes > 0;
  }

  /** Removes a pending entry. Returns false once it is dispatching or finished. */
  cancel(jobId: string): boolean {
    const result = persistence("Could not cancel scheduled post", () =>
      this.db.connection.prepare("DELETE FROM scheduled_posts WHERE job_id = ? AND status = 'pending'").run(jobId)
    );

    return result.changes > 0;
  }

  get(jobId: string): ScheduledPost | null {
    const row = this.db.connection
      .prepare(`SELECT ${COLUMNS} FROM scheduled_posts WHERE job_id = ?`)
      .get(jobId) as ScheduledPostRow | undefined;
    return row ? toScheduledPost(row) : null;
  }

  list(filter: { status?: ScheduledPostStatus; platform?: PlatformName } = {}): ScheduledPost[] {
    const rows = this.db.connection
      .prepare(
        `
        SELECT ${COLUMNS}
        FROM scheduled_posts
        WHERE (@status IS NULL OR status = @status)
          AND (@platform IS NULL OR platform = @platform)
        ORDER BY seq ASC
      `
      )
      .all({ status: filter.status ?? null, platform: filter.platform ?? null }) as ScheduledPostRow[];
    return rows.map(toScheduledPost);
  }

  /** Deletes published and failed entries last updated before `before`. */
  purgeFinished(before: Date): number {
    const result = persistence("Could not purge finished scheduled posts", () =>
      this.db.connection
        .prepare(
          `
          DELETE FROM scheduled_posts
          WHERE status IN ('published', 'failed') AND updated_at < ?
        `
        )
        .run(before.toISOString())
    );

    return result.changes;
  }
}
