import { PostValidationError } from "./errors.js";
import type { TtlMode, TtlSelection } from "./types.js";

export interface TtlDurations {
  testMs: number;
  productionMs: number;
}

export const DEFAULT_TTL_DURATIONS: TtlDurations = {
  testMs: 10 * 60 * 1000,
  productionMs: 24 * 60 * 60 * 1000
};

export const DEFAULT_TTL: TtlSelection = { mode: "production" };

export function resolveTtlMs(selection: TtlSelection, durations: TtlDurations): number {
  switch (selection.mode) {
    case "test":
      return durations.testMs;
    case "production":
      return durations.productionMs;
    case "custom":
      if (!Number.isFinite(selection.durationMs) || selection.durationMs <= 0) {
        throw new PostValidationError(`Custom ttl must be a positive duration, got ${selection.durationMs}`);
      }
      return selection.durationMs;
  }
}

export function ttlSelection(mode: TtlMode, customDurationMs?: number): TtlSelection {
  if (mode !== "custom") {
    return { mode };
  }

  if (customDurationMs === undefined) {
    throw new PostValidationError("Custom ttl mode requires a duration");
  }

  return { mode, durationMs: customDurationMs };
}

export function deleteAtFor(publishedAt: Date, selection: TtlSelection, durations: TtlDurations): Date {
  return new Date(publishedAt.getTime() + resolveTtlMs(selection, durations));
}
