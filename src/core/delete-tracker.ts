import { logger } from "../config/logger.js";
import { AppDatabase } from "./db.js";
import { SchedulingPersistenceError, errorMessage } from "./errors.js";
import type { DeleteJob, DeleteJobStatus, PlatformName } from "./types.js";

interface DeleteJobRow {
  id: number;
  platform: PlatformName;
  platform_post_id: string;
  delete_at: string;
  status: DeleteJobStatus;
  retry_count: number;
  last_error: string | null;
  created_at: string;
  updated_at: string;
}

export interface DeletionPolicy {
  maxRetries: number;
  retryDelayMs: number;
  leaseMs: number;
}

export const DEFAULT_DELETION_POLICY: DeletionPolicy = {
  maxRetries: 5,
  retryDelayMs: 15 * 60 * 1000,
  leaseMs: 10 * 60 * 1000
};

const COLUMNS = "id, platform, platform_post_id, delete_at, status, retry_count, last_error, created_at, updated_at";

function toDeleteJob(row: DeleteJobRow): DeleteJob {
  return {
    id: row.id,
    platform: row.platform,
    platformPostId: row.platform_post_id,
    deleteAt: row.delete_at,
    status: row.status,
    retryCount: row.retry_count,
    lastError: row.last_error,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function persistence<T>(what: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw new SchedulingPersistenceError(`${what}: ${errorMessage(error)}`, { cause: error });
  }
}

export class AutoDeleteTracker {
  private readonly log = logger.child({ module: "core/delete-tracker" });

  constructor(
    private readonly db: AppDatabase,
    private readonly policy: DeletionPolicy = DEFAULT_DELETION_POLICY
  ) {}

  /**
   * Records a deadline for a published post. Registering the same post twice
   * keeps the first job.
   */
  register(params: { platform: PlatformName; platformPostId: string; deleteAt: Date; now: Date }): DeleteJob {
    const timestamp = params.now.toISOString();

    return persistence("Could not register delete job", () => {
      this.db.connection
        .prepare(
          `
          INSERT INTO delete_jobs (platform, platform_post_id, delete_at, status, retry_count, last_error, leased_until, created_at, updated_at)
          VALUES (?, ?, ?, 'pending', 0, NULL, NULL, ?, ?)
          ON CONFLICT(platform, platform_post_id) DO NOTHING
        `
        )
        .run(params.platform, params.platformPostId, params.deleteAt.toISOString(), timestamp, timestamp);

      const row = this.db.connection
        .prepare(`SELECT ${COLUMNS} FROM delete_jobs WHERE platform = ? AND platform_post_id = ?`)
        .get(params.platform, params.platformPostId) as DeleteJobRow;

      this.log.info(
        { jobId: row.id, platform: row.platform, platformPostId: row.platform_post_id, deleteAt: row.delete_at },
        "Registered auto-delete deadline"
      );

      return toDeleteJob(row);
    });
  }

  /**
   * Leases due pending jobs so an overlapping sweep skips them until the
   * lease runs out.
   */
  claimDue(now: Date, limit: number): DeleteJob[] {
    const timestamp = now.toISOString();
    const leasedUntil = new Date(now.getTime() + this.policy.leaseMs).toISOString();

    return persistence("Could not claim due delete jobs", () =>
      this.db.exclusive(() => {
        const rows = this.db.connection
          .prepare(
            `
            SELECT ${COLUMNS}
            FROM delete_jobs
            WHERE status = 'pending'
              AND delete_at <= ?
              AND (leased_until IS NULL OR leased_until <= ?)
            ORDER BY delete_at ASC, id ASC
            LIMIT ?
          `
          )
          .all(timestamp, timestamp, limit) as DeleteJobRow[];

        const lease = this.db.connection.prepare("UPDATE delete_jobs SET leased_until = ? WHERE id = ?");
        for (const row of rows) {
          lease.run(leasedUntil, row.id);
        }

        return rows.map(toDeleteJob);
      })
    );
  }

  markDeleted(id: number, now: Date): void {
    persistence("Could not mark delete job done", () =>
      this.db.connection
        .prepare(
          `
          UPDATE delete_jobs
          SET status = 'deleted', leased_until = NULL, last_error = NULL, updated_at = ?
          WHERE id = ?
        `
        )
        .run(now.toISOString(), id)
    );
  }

  /**
   * Counts a failed deletion. Below the retry cap the job is pushed back
   * linearly; at the cap it becomes failed.
   */
  recordFailure(id: number, error: string, now: Date): DeleteJobStatus {
    return persistence("Could not record delete failure", () =>
      this.db.exclusive(() => {
        const row = this.db.connection
          .prepare("SELECT retry_count FROM delete_jobs WHERE id = ?")
          .get(id) as { retry_count: number } | undefined;

        if (!row) {
          throw new Error(`Delete job ${id} does not exist`);
        }

        const retryCount = row.retry_count + 1;
        const status: DeleteJobStatus = retryCount >= this.policy.maxRetries ? "failed" : "pending";
        const nextAttempt = new Date(now.getTime() + this.policy.retryDelayMs * retryCount).toISOString();

        this.db.connection
          .prepare(
            `
            UPDATE delete_jobs
            SET status = ?, retry_count = ?, last_error = ?, leased_until = NULL,
                delete_at = CASE WHEN ? = 'pending' THEN ? ELSE delete_at END,
                updated_at = ?
            WHERE id = ?
          `
          )
          .run(status, retryCount, error, status, nextAttempt, now.toISOString(), id);

        return status;
      })
    );
  }

  find(platform: PlatformName, platformPostId: string): DeleteJob | null {
    const row = this.db.connection
      .prepare(`SELECT ${COLUMNS} FROM delete_jobs WHERE platform = ? AND platform_post_id = ?`)
      .get(platform, platformPostId) as DeleteJobRow | undefined;
    return row ? toDeleteJob(row) : null;
  }

  list(filter: { status?: DeleteJobStatus } = {}): DeleteJob[] {
    const rows = this.db.connection
      .prepare(
        `
        SELECT ${COLUMNS}
        FROM delete_jobs
        WHERE (@status IS NULL OR status = @status)
        ORDER BY delete_at ASC, id ASC
      `
      )
      .all({ status: filter.status ?? null }) as DeleteJobRow[];
    return rows.map(toDeleteJob);
  }
}
