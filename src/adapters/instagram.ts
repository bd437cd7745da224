import type { InstagramCredentials } from "../config/env.js";
import { logger } from "../config/logger.js";
import { composePostText } from "../core/descriptor.js";
import { MediaUploadError, PlatformApiError, UnsupportedCapabilityError, errorMessage } from "../core/errors.js";
import type { HttpOptions } from "../core/http.js";
import { asMediaUploadError, requireRemoteSource } from "../core/media-loader.js";
import { sleep } from "../core/retry.js";
import type { MediaItem, PostDescriptor, PublishReceipt } from "../core/types.js";
import type { PlatformAdapter } from "./base.js";
import { GraphApiClient, type GraphParams } from "./graph-api.js";

const CONTAINER_POLL_INTERVAL_MS = 5_000;
const CONTAINER_MAX_POLLS = 60;

type ContainerStatus = "EXPIRED" | "ERROR" | "FINISHED" | "IN_PROGRESS" | "PUBLISHED";

interface GraphIdResponse {
  id?: string;
}

interface ContainerStatusResponse {
  status_code?: ContainerStatus;
  status?: string;
}

interface AccountResponse {
  id?: string;
  username?: string;
}

interface PermalinkResponse {
  permalink?: string;
}

export interface InstagramAdapterOptions extends HttpOptions {
  sleep?: (ms: number) => Promise<void>;
  pollIntervalMs?: number;
}

export class InstagramAdapter implements PlatformAdapter {
  readonly name = "instagram" as const;
  private readonly log = logger.child({ module: "adapters/instagram" });
  private readonly graph: GraphApiClient;
  private readonly accountId: string;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly pollIntervalMs: number;

  constructor(credentials: InstagramCredentials, options: InstagramAdapterOptions = {}) {
    this.graph = new GraphApiClient(this.name, credentials.graph, credentials.accessToken, options);
    this.accountId = credentials.accountId;
    this.wait = options.sleep ?? sleep;
    this.pollIntervalMs = options.pollIntervalMs ?? CONTAINER_POLL_INTERVAL_MS;
  }

  async authenticate(): Promise<void> {
    const account = await this.graph.get<AccountResponse>(this.accountId, { fields: "id,username" });
    this.log.info({ accountId: account.id ?? this.accountId, username: account.username }, "Authenticated with Instagram");
  }

  private mediaParams(item: MediaItem): GraphParams {
    const url = requireRemoteSource(this.name, item);
    return item.kind === "video" ? { video_url: url } : { image_url: url };
  }

  private async createContainer(params: GraphParams, source: string): Promise<string> {
    try {
      const response = await this.graph.post<GraphIdResponse>(`${this.accountId}/media`, params);
      if (!response.id) {
        throw new MediaUploadError(`Instagram returned no container id for ${source}`, { platform: this.name });
      }
      return response.id;
    } catch (error) {
      throw asMediaUploadError(this.name, error, `Instagram container creation failed for ${source}`);
    }
  }

  /** Polls until the container is ready; videos and carousels take a while. */
  private async waitForContainer(containerId: string): Promise<void> {
    for (let attempt = 0; attempt < CONTAINER_MAX_POLLS; attempt += 1) {
      const status = await this.graph.get<ContainerStatusResponse>(containerId, { fields: "status_code,status" });

      switch (status.status_code) {
        case "FINISHED":
        case "PUBLISHED":
        case undefined:
          return;
        case "ERROR":
        case "EXPIRED":
          throw new MediaUploadError(
            `Instagram container ${containerId} ${status.status_code.toLowerCase()}${status.status ? `: ${status.status}` : ""}`,
            { platform: this.name }
          );
        case "IN_PROGRESS":
          await this.wait(this.pollIntervalMs);
      }
    }

    throw new MediaUploadError(`Timed out waiting for Instagram container ${containerId}`, { platform: this.name });
  }

  private async buildContainer(descriptor: PostDescriptor): Promise<string> {
    const caption = composePostText(descriptor);
    const first = descriptor.media[0];

    switch (descriptor.postType) {
      case "image":
        if (descriptor.media.length > 1) {
          return this.buildCarousel(descriptor, caption);
        }
        return this.createContainer({ ...this.mediaParams(first), caption, alt_text: first.altText }, first.source);
      case "video":
      case "reel":
        return this.createContainer(
          {
            media_type: "REELS",
            video_url: requireRemoteSource(this.name, first),
            caption,
            share_to_feed: true
          },
          first.source
        );
      case "story":
        return this.createContainer({ ...this.mediaParams(first), media_type: "STORIES" }, first.source);
      case "carousel":
        return this.buildCarousel(descriptor, caption);
      case "text":
        throw new UnsupportedCapabilityError("Instagram does not support text-only posts", { platform: this.name });
    }
  }

  private async buildCarousel(descriptor: PostDescriptor, caption: string): Promise<string> {
    if (descriptor.media.length < 2) {
      throw new UnsupportedCapabilityError("An Instagram carousel needs at least two media items", { platform: this.name });
    }

    const children: string[] = [];
    for (const item of descriptor.media) {
      const params: GraphParams =
        item.kind === "video"
          ? { media_type: "VIDEO", video_url: requireRemoteSource(this.name, item), is_carousel_item: true }
          : { image_url: requireRemoteSource(this.name, item), is_carousel_item: true };
      const childId = await this.createContainer(params, item.source);
      if (item.kind === "video") {
        await this.waitForContainer(childId);
      }
      children.push(childId);
    }

    return this.createContainer({ media_type: "CAROUSEL", children: children.join(","), caption }, "carousel");
  }

  private async permalink(mediaId: string): Promise<string | undefined> {
    try {
      const response = await this.graph.get<PermalinkResponse>(mediaId, { fields: "permalink" });
      return response.permalink;
    } catch (error) {
      this.log.warn({ mediaId, error: errorMessage(error) }, "Could not read Instagram permalink");
      return undefined;
    }
  }

  async postImmediate(descriptor: PostDescriptor): Promise<PublishReceipt> {
    const containerId = await this.buildContainer(descriptor);
    await this.waitForContainer(containerId);

    const published = await this.graph.post<GraphIdResponse>(`${this.accountId}/media_publish`, {
      creation_id: containerId
    });
    if (!published.id) {
      throw new PlatformApiError("Instagram media_publish response missing id", { platform: this.name });
    }

    this.log.info({ mediaId: published.id, postType: descriptor.postType }, "Published post to Instagram");
    return { id: published.id, url: await this.permalink(published.id) };
  }

  async postScheduled(): Promise<PublishReceipt> {
    throw new UnsupportedCapabilityError("Instagram has no scheduling API", { platform: this.name });
  }

  async deletePost(platformPostId: string): Promise<void> {
    await this.graph.delete<unknown>(platformPostId);
  }

  async destroy(): Promise<void> {
    this.log.info("Instagram adapter stopped");
  }
}
