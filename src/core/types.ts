export const PLATFORMS = ["twitter", "facebook", "instagram", "linkedin", "mastodon", "bluesky"] as const;
export type PlatformName = (typeof PLATFORMS)[number];

export const POST_TYPES = ["text", "image", "video", "reel", "story", "carousel"] as const;
export type PostType = (typeof POST_TYPES)[number];

export type MediaKind = "image" | "video";

export interface MediaItem {
  readonly source: string;
  readonly kind: MediaKind;
  readonly altText?: string;
}

/**
 * Platform-agnostic description of one intended post. Built through
 * `createPostDescriptor`, frozen afterwards.
 */
export interface PostDescriptor {
  readonly text: string;
  readonly platform: PlatformName;
  readonly postType: PostType;
  readonly media: readonly MediaItem[];
  readonly hashtags: readonly string[];
  readonly link?: string;
  /** ISO-8601 UTC timestamp; absent means publish immediately. */
  readonly scheduledAt?: string;
}

export type TtlMode = "test" | "production" | "custom";

export type TtlSelection =
  | { mode: "test" }
  | { mode: "production" }
  | { mode: "custom"; durationMs: number };

export type ScheduledPostStatus = "pending" | "dispatching" | "published" | "failed";

export interface ScheduledPost {
  jobId: string;
  descriptor: PostDescriptor;
  status: ScheduledPostStatus;
  ttl: TtlSelection;
  platformPostId: string | null;
  error: string | null;
  attempts: number;
  createdAt: string;
  updatedAt: string;
}

export type DeleteJobStatus = "pending" | "deleted" | "failed";

export interface DeleteJob {
  id: number;
  platformPostId: string;
  platform: PlatformName;
  deleteAt: string;
  status: DeleteJobStatus;
  retryCount: number;
  lastError: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface PublishReceipt {
  id: string;
  url?: string;
  scheduledFor?: string;
}

export type ErrorKind =
  | "AuthenticationError"
  | "UnsupportedCapabilityError"
  | "MediaUploadError"
  | "RateLimitError"
  | "NetworkError"
  | "NotFoundError"
  | "SchedulingPersistenceError"
  | "PostValidationError"
  | "PlatformApiError"
  | "NoMediaFoundError"
  | "UnknownError";

export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
}

export type DispatchRoute = "immediate" | "native-scheduled" | "local-queue";

export interface DispatchSuccess {
  success: true;
  platform: PlatformName;
  route: DispatchRoute;
  platformPostId: string | null;
  url?: string;
  jobId?: string;
  deleteAt?: string;
  degradedToText?: boolean;
}

export interface DispatchFailure {
  success: false;
  /** Null when the input never named a valid platform. */
  platform: PlatformName | null;
  platformPostId: null;
  error: ErrorInfo;
}

export type DispatchResult = DispatchSuccess | DispatchFailure;

export interface BatchItemResult {
  index: number;
  result: DispatchResult;
}

export interface QueueDispatchResult {
  jobId: string;
  result: DispatchResult;
}

export type DeletionOutcome = "deleted" | "already-deleted" | "retry-scheduled" | "failed";

export interface DeletionResult {
  platform: PlatformName;
  platformPostId: string;
  jobId?: number;
  outcome: DeletionOutcome;
  error?: ErrorInfo;
}

export interface AuthenticationResult {
  platform: PlatformName;
  success: boolean;
  error?: ErrorInfo;
}
