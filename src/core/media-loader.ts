import { readFile } from "node:fs/promises";
import path from "node:path";
import { MediaUploadError, NetworkError, RateLimitError, AuthenticationError, errorMessage } from "./errors.js";
import { HttpClient } from "./http.js";
import type { MediaItem, MediaKind, PlatformName } from "./types.js";

export interface LoadedMedia {
  data: Buffer;
  mimeType: string;
  filename: string;
  kind: MediaKind;
  altText?: string;
}

const EXTENSION_MIME: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".mp4": "video/mp4",
  ".mov": "video/quicktime",
  ".webm": "video/webm"
};

export function isRemoteSource(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

export function normalizeMimeType(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }

  const mime = value.split(";")[0].trim().toLowerCase();
  return mime && mime !== "application/octet-stream" ? mime : null;
}

function filenameOf(source: string): string {
  if (isRemoteSource(source)) {
    const name = path.posix.basename(new URL(source).pathname);
    return name || "media";
  }

  return path.basename(source);
}

export function inferMimeFromFileName(name: string): string | null {
  return EXTENSION_MIME[path.extname(name).toLowerCase()] ?? null;
}

export function inferMimeFromMagic(data: Buffer): string | null {
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return "image/jpeg";
  }
  if (data.length >= 8 && data[0] === 0x89 && data[1] === 0x50 && data[2] === 0x4e && data[3] === 0x47) {
    return "image/png";
  }
  if (data.length >= 6 && data.subarray(0, 6).toString("ascii") === "GIF89a") {
    return "image/gif";
  }
  if (data.length >= 12 && data.subarray(8, 12).toString("ascii") === "WEBP") {
    return "image/webp";
  }
  if (data.length >= 12 && data.subarray(4, 8).toString("ascii") === "ftyp") {
    return "video/mp4";
  }
  return null;
}

function fallbackMime(kind: MediaKind): string {
  return kind === "video" ? "video/mp4" : "image/jpeg";
}

/** Wraps a failure during a media step, keeping retryable and auth errors as they are. */
export function asMediaUploadError(platform: PlatformName, error: unknown, what: string): unknown {
  if (
    error instanceof MediaUploadError ||
    error instanceof RateLimitError ||
    error instanceof NetworkError ||
    error instanceof AuthenticationError
  ) {
    return error;
  }

  return new MediaUploadError(`${what}: ${errorMessage(error)}`, { platform, cause: error });
}

/**
 * Reads a media item's bytes from a URL or a local path. A missing file or
 * a rejected download is a `MediaUploadError`.
 */
export async function loadMedia(platform: PlatformName, item: MediaItem, http: HttpClient): Promise<LoadedMedia> {
  const filename = filenameOf(item.source);
  let data: Buffer;
  let headerMime: string | null = null;

  try {
    if (isRemoteSource(item.source)) {
      const response = await http.send(item.source);
      if (!response.ok) {
        throw new MediaUploadError(`Media download failed (${response.status}) for ${item.source}`, { platform });
      }
      headerMime = normalizeMimeType(response.headers.get("content-type"));
      data = Buffer.from(await response.arrayBuffer());
    } else {
      data = await readFile(item.source);
    }
  } catch (error) {
    throw asMediaUploadError(platform, error, `Could not load media ${item.source}`);
  }

  if (data.byteLength === 0) {
    throw new MediaUploadError(`Media ${item.source} is empty`, { platform });
  }

  return {
    data,
    mimeType: headerMime ?? inferMimeFromFileName(filename) ?? inferMimeFromMagic(data) ?? fallbackMime(item.kind),
    filename,
    kind: item.kind,
    altText: item.altText
  };
}

/** Platforms that fetch media themselves need a public URL. */
export function requireRemoteSource(platform: PlatformName, item: MediaItem): string {
  if (!isRemoteSource(item.source)) {
    throw new MediaUploadError(`${platform} needs a publicly reachable URL for media, got ${item.source}`, {
      platform
    });
  }

  return item.source;
}
