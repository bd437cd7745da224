import { readFile } from "node:fs/promises";
import { z } from "zod";
import { logger } from "../config/logger.js";
import { createPostDescriptor, type MediaItemInput } from "./descriptor.js";
import { PostValidationError, errorMessage, toErrorInfo } from "./errors.js";
import {
  PLATFORMS,
  POST_TYPES,
  type ErrorInfo,
  type MediaItem,
  type PlatformName,
  type PostDescriptor
} from "./types.js";

const nullableString = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() !== "" ? value : undefined));

const mediaEntrySchema = z
  .object({
    url: z.string().min(1),
    kind: z.enum(["image", "video"]).optional(),
    type: z.enum(["image", "video"]).optional(),
    alt_text: nullableString
  })
  .transform((entry, ctx): MediaItemInput => {
    const kind = entry.kind ?? entry.type;
    if (!kind) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "media entry needs kind (or type)" });
      return z.NEVER;
    }
    return { source: entry.url, kind, altText: entry.alt_text };
  });

export const batchEntrySchema = z.object({
  text: z.string().default(""),
  platform: z.enum(PLATFORMS),
  post_type: z.enum(POST_TYPES).default("text"),
  media: z.array(mediaEntrySchema).default([]),
  hashtags: z.array(z.string()).default([]),
  link: nullableString,
  scheduled_time: nullableString
});

export type BatchEntry = z.infer<typeof batchEntrySchema>;

export type ParsedBatchItem =
  | { index: number; descriptor: PostDescriptor; error?: undefined }
  | { index: number; descriptor?: undefined; platform: PlatformName | null; error: ErrorInfo };

export interface BatchInputOptions {
  /** Supplies a library video for video and reel entries without media. */
  pickLibraryMedia?: () => Promise<MediaItem | null>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(entry)"}: ${issue.message}`).join("; ");
}

const platformField = z.object({ platform: z.enum(PLATFORMS) });

function platformOf(candidate: unknown): PlatformName | null {
  const parsed = platformField.safeParse(candidate);
  return parsed.success ? parsed.data.platform : null;
}

function needsLibraryVideo(entry: BatchEntry): boolean {
  return (entry.post_type === "video" || entry.post_type === "reel") && entry.media.length === 0;
}

async function toDescriptor(entry: BatchEntry, options: BatchInputOptions): Promise<PostDescriptor> {
  let postType = entry.post_type;
  let media: MediaItemInput[] = entry.media;

  if (needsLibraryVideo(entry)) {
    const picked = options.pickLibraryMedia ? await options.pickLibraryMedia() : null;
    if (picked) {
      media = [picked];
    } else {
      logger
        .child({ module: "core/batch-input" })
        .warn({ platform: entry.platform, postType }, "No library video available; posting text only");
      postType = "text";
    }
  }

  return createPostDescriptor({
    text: entry.text,
    platform: entry.platform,
    postType,
    media,
    hashtags: entry.hashtags,
    link: entry.link,
    scheduledAt: entry.scheduled_time
  });
}

/**
 * Turns a decoded batch document into descriptors, one slot per input entry.
 * A malformed entry becomes an error at its index and does not affect the rest.
 */
export async function parseBatchInput(raw: unknown, options: BatchInputOptions = {}): Promise<ParsedBatchItem[]> {
  if (!Array.isArray(raw)) {
    throw new PostValidationError("Batch input must be a JSON array of posts");
  }

  const items: ParsedBatchItem[] = [];

  for (const [index, candidate] of raw.entries()) {
    const parsed = batchEntrySchema.safeParse(candidate);
    if (!parsed.success) {
      items.push({
        index,
        platform: platformOf(candidate),
        error: { kind: "PostValidationError", message: `Invalid batch entry: ${formatIssues(parsed.error)}` }
      });
      continue;
    }

    try {
      items.push({ index, descriptor: await toDescriptor(parsed.data, options) });
    } catch (error) {
      items.push({ index, platform: parsed.data.platform, error: toErrorInfo(error) });
    }
  }

  return items;
}

export async function loadBatchFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    throw new PostValidationError(`Could not read batch file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new PostValidationError(`Batch file ${filePath} is not valid JSON`, { cause: error });
  }
}
