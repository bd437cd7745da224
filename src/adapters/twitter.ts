import type { TwitterCredentials } from "../config/env.js";
import { logger } from "../config/logger.js";
import { composePostText } from "../core/descriptor.js";
import {
  AuthenticationError,
  MediaUploadError,
  PlatformApiError,
  UnsupportedCapabilityError,
  errorMessage
} from "../core/errors.js";
import { HttpClient, type HttpOptions } from "../core/http.js";
import { asMediaUploadError, loadMedia, type LoadedMedia } from "../core/media-loader.js";
import { sleep } from "../core/retry.js";
import type { PostDescriptor, PublishReceipt } from "../core/types.js";
import type { PlatformAdapter } from "./base.js";

const MEDIA_CHUNK_SIZE = 1_084_576;
const MEDIA_STATUS_MAX_POLLS = 120;

interface UploadProcessingInfo {
  state?: string;
  check_after_secs?: number;
  progress_percent?: number;
  error?: {
    code?: number;
    name?: string;
    message?: string;
  };
}

interface MediaUploadResponse {
  data?: {
    id?: string;
    processing_info?: UploadProcessingInfo;
  };
}

interface CreateTweetResponse {
  data?: {
    id?: string;
    text?: string;
  };
}

interface DeleteTweetResponse {
  data?: {
    deleted?: boolean;
  };
}

interface MeResponse {
  data?: {
    id?: string;
    username?: string;
  };
}

export interface TwitterAdapterOptions extends HttpOptions {
  sleep?: (ms: number) => Promise<void>;
}

export class TwitterAdapter implements PlatformAdapter {
  readonly name = "twitter" as const;
  private readonly log = logger.child({ module: "adapters/twitter" });
  private readonly http: HttpClient;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly apiBaseUrl: string;
  private username: string | null = null;

  constructor(
    private readonly credentials: TwitterCredentials,
    options: TwitterAdapterOptions = {}
  ) {
    this.http = new HttpClient(this.name, options);
    this.wait = options.sleep ?? sleep;
    this.apiBaseUrl = credentials.apiBaseUrl.replace(/\/$/, "");
  }

  private buildHeaders(extra?: Record<string, string>): Record<string, string> {
    return {
      authorization: `Bearer ${this.credentials.accessToken}`,
      ...extra
    };
  }

  private jsonInit(method: string, body: unknown): RequestInit {
    return {
      method,
      headers: this.buildHeaders({ "content-type": "application/json" }),
      body: JSON.stringify(body)
    };
  }

  async authenticate(): Promise<void> {
    const me = await this.http.json<MeResponse>(`${this.apiBaseUrl}/2/users/me`, {
      method: "GET",
      headers: this.buildHeaders()
    });

    if (!me.data?.id) {
      throw new AuthenticationError("X did not return the authenticated user", { platform: this.name });
    }

    this.username = me.data.username ?? null;
    this.log.info({ username: this.username, apiBaseUrl: this.apiBaseUrl }, "Authenticated with X");
  }

  private mediaCategory(media: LoadedMedia): "tweet_image" | "tweet_video" | "tweet_gif" {
    if (media.mimeType === "image/gif") {
      return "tweet_gif";
    }

    if (media.mimeType.startsWith("video/") || media.kind === "video") {
      return "tweet_video";
    }

    return "tweet_image";
  }

  private async setAltText(mediaId: string, media: LoadedMedia): Promise<void> {
    if (!media.altText) {
      return;
    }

    try {
      await this.http.request(
        `${this.apiBaseUrl}/2/media/metadata`,
        this.jsonInit("POST", {
          id: mediaId,
          metadata: { alt_text: { text: media.altText.slice(0, 1000) } }
        })
      );
    } catch (error) {
      this.log.warn({ mediaId, error: errorMessage(error) }, "Failed to attach X media alt text; continuing");
    }
  }

  private async waitForMediaProcessing(mediaId: string, processing: UploadProcessingInfo): Promise<void> {
    let info: UploadProcessingInfo | undefined = processing;

    for (let attempt = 0; attempt < MEDIA_STATUS_MAX_POLLS; attempt += 1) {
      const state = info?.state;

      if (!state || state === "succeeded") {
        return;
      }

      if (state === "failed") {
        const details = info?.error;
        throw new MediaUploadError(
          details?.message ??
            `X rejected media${details?.code ? ` with code ${details.code}` : ""}${details?.name ? ` (${details.name})` : ""}`,
          { platform: this.name }
        );
      }

      if (state !== "pending" && state !== "in_progress") {
        throw new MediaUploadError(`Unexpected X media processing state: ${state}`, { platform: this.name });
      }

      await this.wait(Math.max(1, info?.check_after_secs ?? 1) * 1000);

      const status = await this.http.json<MediaUploadResponse>(
        `${this.apiBaseUrl}/2/media/upload?${new URLSearchParams({ command: "STATUS", media_id: mediaId }).toString()}`,
        { method: "GET", headers: this.buildHeaders() }
      );

      info = status.data?.processing_info;
    }

    throw new MediaUploadError("Timed out while waiting for X media processing to finish", { platform: this.name });
  }

  private async uploadSingleMedia(media: LoadedMedia): Promise<string> {
    const initResponse = await this.http.json<MediaUploadResponse>(
      `${this.apiBaseUrl}/2/media/upload/initialize`,
      this.jsonInit("POST", {
        media_type: media.mimeType,
        total_bytes: media.data.byteLength,
        media_category: this.mediaCategory(media)
      })
    );

    const mediaId = initResponse.data?.id;
    if (!mediaId) {
      throw new MediaUploadError("X media initialize did not return an id", { platform: this.name });
    }

    const totalSegments = Math.ceil(media.data.byteLength / MEDIA_CHUNK_SIZE);

    for (let segmentIndex = 0; segmentIndex < totalSegments; segmentIndex += 1) {
      const start = segmentIndex * MEDIA_CHUNK_SIZE;
      const end = Math.min(start + MEDIA_CHUNK_SIZE, media.data.byteLength);

      const form = new FormData();
      form.set("segment_index", String(segmentIndex));
      form.set("media", new Blob([Uint8Array.from(media.data.subarray(start, end))], { type: media.mimeType }), media.filename);

      await this.http.request(`${this.apiBaseUrl}/2/media/upload/${encodeURIComponent(mediaId)}/append`, {
        method: "POST",
        headers: this.buildHeaders(),
        body: form
      });
    }

    const finalizeResponse = await this.http.json<MediaUploadResponse>(
      `${this.apiBaseUrl}/2/media/upload/${encodeURIComponent(mediaId)}/finalize`,
      { method: "POST", headers: this.buildHeaders() }
    );

    await this.setAltText(mediaId, media);

    if (finalizeResponse.data?.processing_info) {
      await this.waitForMediaProcessing(mediaId, finalizeResponse.data.processing_info);
    }

    return mediaId;
  }

  private async uploadMedia(descriptor: PostDescriptor): Promise<string[]> {
    const mediaIds: string[] = [];

    for (const item of descriptor.media) {
      try {
        const media = await loadMedia(this.name, item, this.http);
        mediaIds.push(await this.uploadSingleMedia(media));
      } catch (error) {
        throw asMediaUploadError(this.name, error, `X media upload failed for ${item.source}`);
      }
    }

    return mediaIds;
  }

  async postImmediate(descriptor: PostDescriptor): Promise<PublishReceipt> {
    const mediaIds = await this.uploadMedia(descriptor);
    const body: Record<string, unknown> = { text: composePostText(descriptor) };
    if (mediaIds.length > 0) {
      body.media = { media_ids: mediaIds };
    }

    const payload = await this.http.json<CreateTweetResponse>(`${this.apiBaseUrl}/2/tweets`, this.jsonInit("POST", body));
    const tweetId = payload.data?.id;
    if (!tweetId) {
      throw new PlatformApiError("X create tweet response missing id", { platform: this.name });
    }

    this.log.info({ tweetId, mediaCount: mediaIds.length }, "Published post to X");

    return {
      id: tweetId,
      url: this.username ? `https://x.com/${this.username}/status/${tweetId}` : `https://x.com/i/web/status/${tweetId}`
    };
  }

  async postScheduled(): Promise<PublishReceipt> {
    throw new UnsupportedCapabilityError("X has no scheduling API", { platform: this.name });
  }

  async deletePost(platformPostId: string): Promise<void> {
    const payload = await this.http.json<DeleteTweetResponse>(
      `${this.apiBaseUrl}/2/tweets/${encodeURIComponent(platformPostId)}`,
      { method: "DELETE", headers: this.buildHeaders() }
    );

    if (payload.data?.deleted === false) {
      throw new PlatformApiError(`X refused to delete post ${platformPostId}`, { platform: this.name });
    }
  }

  async destroy(): Promise<void> {
    this.log.info("X adapter stopped");
  }
}
