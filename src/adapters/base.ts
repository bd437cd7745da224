import type { PlatformName, PostDescriptor, PublishReceipt } from "../core/types.js";

export interface PlatformAdapter {
  readonly name: PlatformName;
  /** Verifies the credentials; throws `AuthenticationError` when they are rejected. */
  authenticate(): Promise<void>;
  postImmediate(descriptor: PostDescriptor): Promise<PublishReceipt>;
  /** Hands the post to the platform's own scheduler. */
  postScheduled(descriptor: PostDescriptor): Promise<PublishReceipt>;
  /** Throws `NotFoundError` when the post no longer exists. */
  deletePost(platformPostId: string): Promise<void>;
  destroy(): Promise<void>;
}
