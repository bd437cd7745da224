import { PostValidationError } from "./errors.js";
import type { MediaItem, MediaKind, PlatformName, PostDescriptor, PostType } from "./types.js";

export interface MediaItemInput {
  source: string;
  kind: MediaKind;
  altText?: string | null;
}

export interface PostDescriptorInput {
  text: string;
  platform: PlatformName;
  postType?: PostType;
  media?: readonly MediaItemInput[];
  hashtags?: Iterable<string>;
  link?: string | null;
  scheduledAt?: Date | string | null;
}

const MEDIA_REQUIRED: ReadonlySet<PostType> = new Set(["image", "video", "reel", "story", "carousel"]);
const VIDEO_FIRST: ReadonlySet<PostType> = new Set(["video", "reel"]);

export function postTypeRequiresMedia(postType: PostType): boolean {
  return MEDIA_REQUIRED.has(postType);
}

export function normalizeHashtags(hashtags: Iterable<string>): string[] {
  const seen = new Set<string>();
  const output: string[] = [];

  for (const raw of hashtags) {
    const tag = raw.trim().replace(/^#+/, "").trim();
    if (!tag) {
      continue;
    }

    const key = tag.toLowerCase();
    if (seen.has(key)) {
      continue;
    }

    seen.add(key);
    output.push(tag);
  }

  return output;
}

function normalizeLink(link: string): string {
  let parsed: URL;
  try {
    parsed = new URL(link);
  } catch {
    throw new PostValidationError(`Invalid link URL: ${link}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new PostValidationError(`Link must use http or https: ${link}`);
  }

  return link;
}

export function normalizeTimestamp(value: Date | string): string {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new PostValidationError(`Invalid scheduled time: ${String(value)}`);
  }

  return date.toISOString();
}

function freezeMedia(item: MediaItemInput): MediaItem {
  const source = item.source.trim();
  if (!source) {
    throw new PostValidationError("Media item source must not be empty");
  }

  return Object.freeze({
    source,
    kind: item.kind,
    ...(item.altText ? { altText: item.altText } : {})
  });
}

/**
 * Validates the input and returns a deep-frozen descriptor. Platform-level
 * limits (text length, media count) are checked later against the
 * capability matrix.
 */
export function createPostDescriptor(input: PostDescriptorInput): PostDescriptor {
  const postType = input.postType ?? "text";
  const media = (input.media ?? []).map(freezeMedia);

  if (postTypeRequiresMedia(postType) && media.length === 0) {
    throw new PostValidationError(`A ${postType} post requires at least one media item`);
  }

  if (postType === "text" && media.length > 0) {
    throw new PostValidationError("A text post cannot carry media; use image, video or carousel");
  }

  if (VIDEO_FIRST.has(postType) && media[0]?.kind !== "video") {
    throw new PostValidationError(`A ${postType} post requires a video as its first media item`);
  }

  const text = input.text.trim();
  if (!text && media.length === 0) {
    throw new PostValidationError("Post text must not be empty");
  }

  const descriptor: PostDescriptor = {
    text,
    platform: input.platform,
    postType,
    media: Object.freeze(media),
    hashtags: Object.freeze(normalizeHashtags(input.hashtags ?? [])),
    ...(input.link ? { link: normalizeLink(input.link) } : {}),
    ...(input.scheduledAt ? { scheduledAt: normalizeTimestamp(input.scheduledAt) } : {})
  };

  return Object.freeze(descriptor);
}

/** Copy of a descriptor reduced to a plain text post (media dropped). */
export function toTextOnly(descriptor: PostDescriptor): PostDescriptor {
  return createPostDescriptor({
    text: descriptor.text,
    platform: descriptor.platform,
    postType: "text",
    hashtags: descriptor.hashtags,
    link: descriptor.link,
    scheduledAt: descriptor.scheduledAt
  });
}

export function formatHashtags(hashtags: readonly string[]): string {
  return hashtags.map((tag) => `#${tag}`).join(" ");
}

/**
 * Body text as published: the text, then the hashtags, then the link, each
 * block separated by a blank line.
 */
export function composePostText(
  descriptor: PostDescriptor,
  options: { includeLink?: boolean } = {}
): string {
  const includeLink = options.includeLink ?? true;
  const blocks = [descriptor.text];

  if (descriptor.hashtags.length > 0) {
    blocks.push(formatHashtags(descriptor.hashtags));
  }

  if (includeLink && descriptor.link) {
    blocks.push(descriptor.link);
  }

  return blocks.filter((block) => block.length > 0).join("\n\n");
}
