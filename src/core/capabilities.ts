import { composePostText } from "./descriptor.js";
import { PostValidationError, UnsupportedCapabilityError } from "./errors.js";
import { countByCodePoints, countByGraphemes, countByTwitterRules, type LengthCounter } from "./text-length.js";
import type { MediaKind, PlatformName, PostDescriptor, PostType } from "./types.js";

export type Capability = "immediate" | "native-scheduling" | "media" | "stories" | "reels" | "text-only";

export interface CapabilityEntry {
  readonly capabilities: ReadonlySet<Capability>;
  readonly mediaKinds: ReadonlySet<MediaKind>;
  readonly maxTextLength: number;
  readonly countText: LengthCounter;
  readonly maxMediaItems: number;
  /** Post types the platform's own scheduler accepts. */
  readonly nativeSchedulingPostTypes: ReadonlySet<PostType>;
  /** How far ahead a native schedule may be set, in milliseconds. */
  readonly nativeSchedulingWindow?: { readonly minLeadMs: number; readonly maxLeadMs: number };
}

const MINUTE = 60 * 1000;
const DAY = 24 * 60 * MINUTE;
const NONE: ReadonlySet<PostType> = new Set();

const CAPABILITY_MATRIX: Readonly<Record<PlatformName, CapabilityEntry>> = Object.freeze({
  twitter: {
    capabilities: new Set<Capability>(["immediate", "media", "text-only"]),
    mediaKinds: new Set<MediaKind>(["image", "video"]),
    maxTextLength: 280,
    countText: countByTwitterRules,
    maxMediaItems: 4,
    nativeSchedulingPostTypes: NONE
  },
  facebook: {
    capabilities: new Set<Capability>(["immediate", "native-scheduling", "media", "stories", "reels", "text-only"]),
    mediaKinds: new Set<MediaKind>(["image", "video"]),
    maxTextLength: 63206,
    countText: countByCodePoints,
    maxMediaItems: 10,
    nativeSchedulingPostTypes: new Set<PostType>(["text", "image", "video", "reel", "carousel"]),
    nativeSchedulingWindow: { minLeadMs: 10 * MINUTE, maxLeadMs: 30 * DAY }
  },
  instagram: {
    capabilities: new Set<Capability>(["immediate", "media", "stories", "reels"]),
    mediaKinds: new Set<MediaKind>(["image", "video"]),
    maxTextLength: 2200,
    countText: countByCodePoints,
    maxMediaItems: 10,
    nativeSchedulingPostTypes: NONE
  },
  linkedin: {
    capabilities: new Set<Capability>(["immediate", "media", "text-only"]),
    mediaKinds: new Set<MediaKind>(["image", "video"]),
    maxTextLength: 3000,
    countText: countByCodePoints,
    maxMediaItems: 20,
    nativeSchedulingPostTypes: NONE
  },
  mastodon: {
    capabilities: new Set<Capability>(["immediate", "media", "text-only"]),
    mediaKinds: new Set<MediaKind>(["image", "video"]),
    maxTextLength: 500,
    countText: countByCodePoints,
    maxMediaItems: 4,
    nativeSchedulingPostTypes: NONE
  },
  bluesky: {
    capabilities: new Set<Capability>(["immediate", "media", "text-only"]),
    mediaKinds: new Set<MediaKind>(["image"]),
    maxTextLength: 300,
    countText: countByGraphemes,
    maxMediaItems: 4,
    nativeSchedulingPostTypes: NONE
  }
});

export function capabilities(platform: PlatformName): CapabilityEntry {
  return CAPABILITY_MATRIX[platform];
}

export function supports(platform: PlatformName, capability: Capability): boolean {
  return CAPABILITY_MATRIX[platform].capabilities.has(capability);
}

function requiredCapability(postType: PostType): Capability {
  switch (postType) {
    case "text":
      return "text-only";
    case "story":
      return "stories";
    case "reel":
      return "reels";
    case "image":
    case "video":
    case "carousel":
      return "media";
  }
}

/**
 * Throws when the descriptor cannot be published on its platform:
 * `UnsupportedCapabilityError` for post types or media kinds the platform
 * lacks, `PostValidationError` for text or media over the platform limits.
 */
export function assertPublishable(descriptor: PostDescriptor): void {
  const { platform, postType } = descriptor;
  const entry = capabilities(platform);

  if (!entry.capabilities.has("immediate")) {
    throw new UnsupportedCapabilityError(`${platform} does not support publishing`, { platform });
  }

  const capability = requiredCapability(postType);
  if (!entry.capabilities.has(capability)) {
    throw new UnsupportedCapabilityError(`${platform} does not support ${postType} posts`, { platform });
  }

  if (descriptor.media.length > 0 && !entry.capabilities.has("media")) {
    throw new UnsupportedCapabilityError(`${platform} does not support media attachments`, { platform });
  }

  for (const item of descriptor.media) {
    if (!entry.mediaKinds.has(item.kind)) {
      throw new UnsupportedCapabilityError(`${platform} does not accept ${item.kind} media`, { platform });
    }
  }

  if (descriptor.media.length > entry.maxMediaItems) {
    throw new PostValidationError(
      `${platform} accepts at most ${entry.maxMediaItems} media items, got ${descriptor.media.length}`,
      { platform }
    );
  }

  const length = entry.countText(composePostText(descriptor));
  if (length > entry.maxTextLength) {
    throw new PostValidationError(
      `Post text is ${length} characters; ${platform} allows ${entry.maxTextLength}`,
      { platform }
    );
  }
}

/**
 * True when the platform's own scheduler should take this post: the platform
 * schedules natively, accepts this post type and the time lies in its window.
 */
export function usesNativeScheduling(descriptor: PostDescriptor, now: Date): boolean {
  const entry = capabilities(descriptor.platform);
  if (!entry.capabilities.has("native-scheduling") || !entry.nativeSchedulingPostTypes.has(descriptor.postType)) {
    return false;
  }

  if (!descriptor.scheduledAt) {
    return false;
  }

  const window = entry.nativeSchedulingWindow;
  if (!window) {
    return true;
  }

  const leadMs = Date.parse(descriptor.scheduledAt) - now.getTime();
  return leadMs >= window.minLeadMs && leadMs <= window.maxLeadMs;
}
