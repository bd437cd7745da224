import type { FacebookCredentials } from "../config/env.js";
import { logger } from "../config/logger.js";
import { composePostText } from "../core/descriptor.js";
import { MediaUploadError, PlatformApiError, UnsupportedCapabilityError } from "../core/errors.js";
import { readPayload, type HttpOptions } from "../core/http.js";
import { asMediaUploadError, isRemoteSource, loadMedia } from "../core/media-loader.js";
import type { MediaItem, PostDescriptor, PublishReceipt } from "../core/types.js";
import type { PlatformAdapter } from "./base.js";
import { GraphApiClient, graphErrorFor, type GraphParams } from "./graph-api.js";

interface GraphIdResponse {
  id?: string;
  post_id?: string;
}

interface UploadSessionResponse {
  video_id?: string;
  upload_url?: string;
}

interface PageResponse {
  id?: string;
  name?: string;
}

interface SuccessResponse {
  success?: boolean;
  post_id?: string;
}

/** Unpublished scheduling parameters, or nothing for an immediate post. */
function scheduleParams(scheduledAt: string | undefined): GraphParams {
  if (!scheduledAt) {
    return {};
  }

  return {
    published: false,
    scheduled_publish_time: Math.floor(Date.parse(scheduledAt) / 1000)
  };
}

export class FacebookAdapter implements PlatformAdapter {
  readonly name = "facebook" as const;
  private readonly log = logger.child({ module: "adapters/facebook" });
  private readonly graph: GraphApiClient;
  private readonly pageId: string;

  constructor(credentials: FacebookCredentials, options: HttpOptions = {}) {
    this.graph = new GraphApiClient(this.name, credentials.graph, credentials.accessToken, options);
    this.pageId = credentials.pageId;
  }

  async authenticate(): Promise<void> {
    const page = await this.graph.get<PageResponse>(this.pageId, { fields: "id,name" });
    this.log.info({ pageId: page.id ?? this.pageId, pageName: page.name }, "Authenticated with Facebook page");
  }

  private receipt(id: string, scheduledAt?: string): PublishReceipt {
    return {
      id,
      url: `https://www.facebook.com/${id}`,
      ...(scheduledAt ? { scheduledFor: scheduledAt } : {})
    };
  }

  private requireId(response: GraphIdResponse, what: string): string {
    const id = response.post_id ?? response.id;
    if (!id) {
      throw new PlatformApiError(`Facebook ${what} response missing id`, { platform: this.name });
    }
    return id;
  }

  /** Photo or video upload by URL, or multipart when the source is a local file. */
  private async uploadToEdge(
    edge: "photos" | "videos",
    item: MediaItem,
    params: GraphParams
  ): Promise<GraphIdResponse> {
    const urlField = edge === "photos" ? "url" : "file_url";

    try {
      if (isRemoteSource(item.source)) {
        return await this.graph.post<GraphIdResponse>(`${this.pageId}/${edge}`, { ...params, [urlField]: item.source });
      }

      const media = await loadMedia(this.name, item, this.graph.http);
      const form = new FormData();
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          form.set(key, String(value));
        }
      }
      form.set("source", new Blob([Uint8Array.from(media.data)], { type: media.mimeType }), media.filename);
      return await this.graph.postForm<GraphIdResponse>(`${this.pageId}/${edge}`, form);
    } catch (error) {
      throw asMediaUploadError(this.name, error, `Facebook ${edge} upload failed for ${item.source}`);
    }
  }

  private async publishFeed(descriptor: PostDescriptor, scheduledAt?: string): Promise<PublishReceipt> {
    const response = await this.graph.post<GraphIdResponse>(`${this.pageId}/feed`, {
      message: composePostText(descriptor, { includeLink: false }),
      link: descriptor.link,
      ...scheduleParams(scheduledAt)
    });
    return this.receipt(this.requireId(response, "feed"), scheduledAt);
  }

  private async publishPhotos(descriptor: PostDescriptor, scheduledAt?: string): Promise<PublishReceipt> {
    const caption = composePostText(descriptor);

    if (descriptor.media.length === 1) {
      const response = await this.uploadToEdge("photos", descriptor.media[0], {
        caption,
        alt_text_custom: descriptor.media[0].altText,
        ...scheduleParams(scheduledAt)
      });
      return this.receipt(this.requireId(response, "photo"), scheduledAt);
    }

    if (descriptor.media.some((item) => item.kind !== "image")) {
      throw new UnsupportedCapabilityError("Facebook multi-media posts accept images only", { platform: this.name });
    }

    // Multi-photo: upload each photo unpublished, then attach them to one feed post.
    const attached: GraphParams = {};
    for (const [index, item] of descriptor.media.entries()) {
      const photo = await this.uploadToEdge("photos", item, {
        published: false,
        temporary: scheduledAt ? true : undefined,
        alt_text_custom: item.altText
      });
      if (!photo.id) {
        throw new MediaUploadError(`Facebook did not return a photo id for ${item.source}`, { platform: this.name });
      }
      attached[`attached_media[${index}]`] = JSON.stringify({ media_fbid: photo.id });
    }

    const response = await this.graph.post<GraphIdResponse>(`${this.pageId}/feed`, {
      message: caption,
      ...attached,
      ...scheduleParams(scheduledAt)
    });
    return this.receipt(this.requireId(response, "multi-photo"), scheduledAt);
  }

  private async publishVideo(descriptor: PostDescriptor, scheduledAt?: string): Promise<PublishReceipt> {
    const response = await this.uploadToEdge("videos", descriptor.media[0], {
      description: composePostText(descriptor),
      ...scheduleParams(scheduledAt)
    });
    return this.receipt(this.requireId(response, "video"), scheduledAt);
  }

  /** Sends video bytes (or a hosted URL) to a resumable upload session. */
  private async transferVideo(uploadUrl: string, item: MediaItem): Promise<void> {
    const headers: Record<string, string> = { authorization: `OAuth ${this.graph.token}` };
    let body: Blob | undefined;

    if (isRemoteSource(item.source)) {
      headers.file_url = item.source;
    } else {
      const media = await loadMedia(this.name, item, this.graph.http);
      body = new Blob([Uint8Array.from(media.data)], { type: media.mimeType });
      headers.offset = "0";
      headers.file_size = String(media.data.byteLength);
    }

    const response = await this.graph.http.send(uploadUrl, { method: "POST", headers, body });
    const payload = await readPayload(response);
    if (!response.ok) {
      throw graphErrorFor(this.name, response.status, payload, {});
    }
  }

  private async startVideoSession(edge: "video_reels" | "video_stories"): Promise<{ videoId: string; uploadUrl: string }> {
    const session = await this.graph.post<UploadSessionResponse>(`${this.pageId}/${edge}`, { upload_phase: "start" });
    if (!session.video_id || !session.upload_url) {
      throw new MediaUploadError(`Facebook ${edge} start phase returned no upload session`, { platform: this.name });
    }
    return { videoId: session.video_id, uploadUrl: session.upload_url };
  }

  private async publishReel(descriptor: PostDescriptor, scheduledAt?: string): Promise<PublishReceipt> {
    const item = descriptor.media[0];
    let videoId: string;

    try {
      const session = await this.startVideoSession("video_reels");
      videoId = session.videoId;
      await this.transferVideo(session.uploadUrl, item);
    } catch (error) {
      throw asMediaUploadError(this.name, error, `Facebook reel upload failed for ${item.source}`);
    }

    const finish = await this.graph.post<SuccessResponse>(`${this.pageId}/video_reels`, {
      upload_phase: "finish",
      video_id: videoId,
      description: composePostText(descriptor),
      video_state: scheduledAt ? "SCHEDULED" : "PUBLISHED",
      scheduled_publish_time: scheduledAt ? Math.floor(Date.parse(scheduledAt) / 1000) : undefined
    });

    if (finish.success === false) {
      throw new PlatformApiError("Facebook did not accept the reel", { platform: this.name });
    }

    return this.receipt(videoId, scheduledAt);
  }

  private async publishStory(descriptor: PostDescriptor): Promise<PublishReceipt> {
    const item = descriptor.media[0];

    if (item.kind === "image") {
      const photo = await this.uploadToEdge("photos", item, { published: false });
      if (!photo.id) {
        throw new MediaUploadError(`Facebook did not return a photo id for ${item.source}`, { platform: this.name });
      }

      const story = await this.graph.post<SuccessResponse>(`${this.pageId}/photo_stories`, { photo_id: photo.id });
      return this.receipt(story.post_id ?? photo.id);
    }

    let videoId: string;
    try {
      const session = await this.startVideoSession("video_stories");
      videoId = session.videoId;
      await this.transferVideo(session.uploadUrl, item);
    } catch (error) {
      throw asMediaUploadError(this.name, error, `Facebook story upload failed for ${item.source}`);
    }

    const story = await this.graph.post<SuccessResponse>(`${this.pageId}/video_stories`, {
      upload_phase: "finish",
      video_id: videoId
    });
    return this.receipt(story.post_id ?? videoId);
  }

  private async publish(descriptor: PostDescriptor, scheduledAt?: string): Promise<PublishReceipt> {
    switch (descriptor.postType) {
      case "text":
        return this.publishFeed(descriptor, scheduledAt);
      case "image":
      case "carousel":
        return this.publishPhotos(descriptor, scheduledAt);
      case "video":
        return this.publishVideo(descriptor, scheduledAt);
      case "reel":
        return this.publishReel(descriptor, scheduledAt);
      case "story":
        if (scheduledAt) {
          throw new UnsupportedCapabilityError("Facebook stories cannot be scheduled natively", { platform: this.name });
        }
        return this.publishStory(descriptor);
    }
  }

  async postImmediate(descriptor: PostDescriptor): Promise<PublishReceipt> {
    const receipt = await this.publish(descriptor);
    this.log.info({ postId: receipt.id, postType: descriptor.postType }, "Published post to Facebook");
    return receipt;
  }

  async postScheduled(descriptor: PostDescriptor): Promise<PublishReceipt> {
    if (!descriptor.scheduledAt) {
      throw new UnsupportedCapabilityError("A scheduled Facebook post needs a scheduled time", { platform: this.name });
    }

    const receipt = await this.publish(descriptor, descriptor.scheduledAt);
    this.log.info(
      { postId: receipt.id, postType: descriptor.postType, scheduledFor: descriptor.scheduledAt },
      "Scheduled post on Facebook"
    );
    return receipt;
  }

  async deletePost(platformPostId: string): Promise<void> {
    const response = await this.graph.delete<SuccessResponse>(platformPostId);
    if (response.success === false) {
      throw new PlatformApiError(`Facebook refused to delete post ${platformPostId}`, { platform: this.name });
    }
  }

  async destroy(): Promise<void> {
    this.log.info("Facebook adapter stopped");
  }
}
