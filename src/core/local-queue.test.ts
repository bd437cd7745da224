import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppDatabase, IN_MEMORY } from "./db.js";
import { createPostDescriptor } from "./descriptor.js";
import { SchedulingPersistenceError } from "./errors.js";
import { ABANDONED_DISPATCH_ERROR, LocalSchedulingQueue } from "./local-queue.js";

const NOW = new Date("2026-04-01T10:00:00.000Z");

function scheduled(scheduledAt: string, text = "Weekend hours") {
  return createPostDescriptor({
    text,
    platform: "mastodon",
    postType: "image",
    media: [{ source: "https://cdn.example/hours.png", kind: "image", altText: "Opening hours" }],
    hashtags: ["hours"],
    scheduledAt
  });
}

describe("LocalSchedulingQueue", () => {
  let db: AppDatabase;
  let queue: LocalSchedulingQueue;

  beforeEach(() => {
    db = new AppDatabase(IN_MEMORY);
    queue = new LocalSchedulingQueue(db);
  });

  afterEach(() => {
    db.close();
  });

  it("stores the descriptor and ttl and reads them back", () => {
    const descriptor = scheduled("2026-04-01T12:00:00.000Z");
    const job = queue.enqueue(descriptor, { mode: "custom", durationMs: 5_000 }, NOW);

    const stored = queue.get(job.jobId);
    expect(stored?.descriptor).toEqual(descriptor);
    expect(stored?.ttl).toEqual({ mode: "custom", durationMs: 5_000 });
    expect(stored?.status).toBe("pending");
    expect(stored?.attempts).toBe(0);
  });

  it("refuses descriptors without a scheduled time", () => {
    const descriptor = createPostDescriptor({ text: "now", platform: "mastodon" });
    expect(() => queue.enqueue(descriptor, { mode: "test" }, NOW)).toThrow(SchedulingPersistenceError);
  });

  it("claims due entries in scheduled order, once", () => {
    const later = queue.enqueue(scheduled("2026-04-01T11:00:00.000Z", "later"), { mode: "test" }, NOW);
    const earlier = queue.enqueue(scheduled("2026-04-01T10:30:00.000Z", "earlier"), { mode: "test" }, NOW);
    queue.enqueue(scheduled("2026-04-02T10:00:00.000Z", "tomorrow"), { mode: "test" }, NOW);

    const claimAt = new Date("2026-04-01T11:00:00.000Z");
    const claimed = queue.claimDue(claimAt, 10);

    expect(claimed.map((job) => job.jobId)).toEqual([earlier.jobId, later.jobId]);
    expect(claimed.every((job) => job.status === "dispatching" && job.attempts === 1)).toBe(true);
    expect(queue.claimDue(claimAt, 10)).toEqual([]);
  });

  it("honours the claim limit", () => {
    queue.enqueue(scheduled("2026-04-01T10:10:00.000Z"), { mode: "test" }, NOW);
    queue.enqueue(scheduled("2026-04-01T10:20:00.000Z"), { mode: "test" }, NOW);

    expect(queue.claimDue(new Date("2026-04-01T11:00:00.000Z"), 1)).toHaveLength(1);
    expect(queue.list({ status: "pending" })).toHaveLength(1);
  });

  it("cancels only pending entries", () => {
    const job = queue.enqueue(scheduled("2026-04-01T10:10:00.000Z"), { mode: "test" }, NOW);
    queue.claimDue(new Date("2026-04-01T10:15:00.000Z"), 5);

    expect(queue.cancel(job.jobId)).toBe(false);
    expect(queue.cancel("missing")).toBe(false);
  });

  it("records outcomes and purges old finished entries", () => {
    const published = queue.enqueue(scheduled("2026-04-01T10:10:00.000Z"), { mode: "test" }, NOW);
    const failed = queue.enqueue(scheduled("2026-04-01T10:20:00.000Z"), { mode: "test" }, NOW);
    const pending = queue.enqueue(scheduled("2026-04-03T10:00:00.000Z"), { mode: "test" }, NOW);

    const finishedAt = new Date("2026-04-01T10:30:00.000Z");
    queue.markPublished(published.jobId, "109876", finishedAt);
    queue.markFailed(failed.jobId, "PlatformApiError: rejected", finishedAt);

    expect(queue.get(published.jobId)?.platformPostId).toBe("109876");
    expect(queue.get(failed.jobId)?.error).toBe("PlatformApiError: rejected");

    expect(queue.purgeFinished(new Date("2026-04-01T10:30:00.000Z"))).toBe(0);
    expect(queue.purgeFinished(new Date("2026-04-02T00:00:00.000Z"))).toBe(2);
    expect(queue.list().map((job) => job.jobId)).toEqual([pending.jobId]);
  });

  it("filters by platform", () => {
    queue.enqueue(scheduled("2026-04-01T10:10:00.000Z"), { mode: "test" }, NOW);

    expect(queue.list({ platform: "mastodon" })).toHaveLength(1);
    expect(queue.list({ platform: "twitter" })).toHaveLength(0);
  });

  it("returns a claimed entry to pending on release", () => {
    const job = queue.enqueue(scheduled("2026-04-01T09:00:00.000Z"), { mode: "test" }, NOW);
    queue.claimDue(NOW, 10);

    expect(queue.release(job.jobId, NOW)).toBe(true);
    expect(queue.release(job.jobId, NOW)).toBe(false);
    expect(queue.claimDue(NOW, 10).map((entry) => entry.jobId)).toEqual([job.jobId]);
    expect(queue.get(job.jobId)?.attempts).toBe(2);
  });

  it("fails entries left dispatching past the lease instead of reclaiming them", () => {
    const job = queue.enqueue(scheduled("2026-04-01T09:00:00.000Z"), { mode: "test" }, NOW);
    queue.claimDue(NOW, 10);

    expect(queue.claimDue(new Date("2026-04-01T10:29:00.000Z"), 10)).toEqual([]);
    expect(queue.get(job.jobId)?.status).toBe("dispatching");

    expect(queue.claimDue(new Date("2026-04-01T10:30:00.000Z"), 10)).toEqual([]);
    expect(queue.get(job.jobId)?.status).toBe("failed");
    expect(queue.get(job.jobId)?.error).toBe(ABANDONED_DISPATCH_ERROR);
  });

  it("takes the dispatch lease from its options", () => {
    const shortLease = new LocalSchedulingQueue(db, { dispatchLeaseMs: 60_000 });
    const job = shortLease.enqueue(scheduled("2026-04-01T09:00:00.000Z"), { mode: "test" }, NOW);
    shortLease.claimDue(NOW, 10);

    shortLease.claimDue(new Date("2026-04-01T10:01:00.000Z"), 10);
    expect(shortLease.get(job.jobId)?.status).toBe("failed");
  });
});
