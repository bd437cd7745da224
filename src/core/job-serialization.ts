import { z } from "zod";
import { createPostDescriptor } from "./descriptor.js";
import { SchedulingPersistenceError } from "./errors.js";
import { PLATFORMS, POST_TYPES, type PostDescriptor, type TtlSelection } from "./types.js";

const storedDescriptorSchema = z.object({
  text: z.string(),
  platform: z.enum(PLATFORMS),
  postType: z.enum(POST_TYPES),
  media: z.array(
    z.object({
      source: z.string(),
      kind: z.enum(["image", "video"]),
      altText: z.string().optional()
    })
  ),
  hashtags: z.array(z.string()),
  link: z.string().optional(),
  scheduledAt: z.string().optional()
});

const storedTtlSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("test") }),
  z.object({ mode: z.literal("production") }),
  z.object({ mode: z.literal("custom"), durationMs: z.number().positive() })
]);

function parseJson(raw: string, what: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new SchedulingPersistenceError(`Stored ${what} is not valid JSON`, { cause: error });
  }
}

export function encodeDescriptor(descriptor: PostDescriptor): string {
  return JSON.stringify({
    text: descriptor.text,
    platform: descriptor.platform,
    postType: descriptor.postType,
    media: descriptor.media,
    hashtags: descriptor.hashtags,
    link: descriptor.link,
    scheduledAt: descriptor.scheduledAt
  });
}

export function decodeDescriptor(raw: string): PostDescriptor {
  const parsed = storedDescriptorSchema.safeParse(parseJson(raw, "descriptor"));
  if (!parsed.success) {
    throw new SchedulingPersistenceError(`Stored descriptor is malformed: ${parsed.error.message}`);
  }

  return createPostDescriptor(parsed.data);
}

export function encodeTtl(ttl: TtlSelection): string {
  return JSON.stringify(ttl);
}

export function decodeTtl(raw: string): TtlSelection {
  const parsed = storedTtlSchema.safeParse(parseJson(raw, "ttl"));
  if (!parsed.success) {
    throw new SchedulingPersistenceError(`Stored ttl is malformed: ${parsed.error.message}`);
  }

  return parsed.data;
}
