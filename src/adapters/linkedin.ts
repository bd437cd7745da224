import type { LinkedInCredentials } from "../config/env.js";
import { logger } from "../config/logger.js";
import { MediaUploadError, PlatformApiError, UnsupportedCapabilityError } from "../core/errors.js";
import { HttpClient, type HttpOptions } from "../core/http.js";
import { asMediaUploadError, loadMedia, type LoadedMedia } from "../core/media-loader.js";
import type { MediaItem, PostDescriptor, PublishReceipt } from "../core/types.js";
import type { PlatformAdapter } from "./base.js";

const LITTLE_TEXT_RESERVED = /[\\|{}@[\]()<>#*_~]/g;

interface ImageUploadResponse {
  value?: {
    uploadUrl?: string;
    image?: string;
  };
}

interface VideoUploadResponse {
  value?: {
    video?: string;
    uploadToken?: string;
    uploadInstructions?: Array<{
      uploadUrl: string;
      firstByte: number;
      lastByte: number;
    }>;
  };
}

interface UserInfoResponse {
  sub?: string;
  name?: string;
}

type PostContent =
  | { media: { id: string; altText?: string } }
  | { multiImage: { images: Array<{ id: string; altText?: string }> } };

/** Escapes the characters LinkedIn's "little text" format reserves. */
export function escapeLittleText(text: string): string {
  return text.replace(LITTLE_TEXT_RESERVED, (char) => `\\${char}`);
}

/** Commentary with hashtags as hashtag templates and the link appended. */
export function linkedInCommentary(descriptor: PostDescriptor): string {
  const blocks = [escapeLittleText(descriptor.text)];

  if (descriptor.hashtags.length > 0) {
    blocks.push(descriptor.hashtags.map((tag) => `{hashtag|\\#|${escapeLittleText(tag)}}`).join(" "));
  }

  if (descriptor.link) {
    blocks.push(escapeLittleText(descriptor.link));
  }

  return blocks.filter((block) => block.length > 0).join("\n\n");
}

export class LinkedInAdapter implements PlatformAdapter {
  readonly name = "linkedin" as const;
  private readonly log = logger.child({ module: "adapters/linkedin" });
  private readonly http: HttpClient;
  private readonly apiBaseUrl: string;

  constructor(
    private readonly credentials: LinkedInCredentials,
    options: HttpOptions = {}
  ) {
    this.http = new HttpClient(this.name, options);
    this.apiBaseUrl = credentials.apiBaseUrl.replace(/\/$/, "");
  }

  private buildHeaders(extra?: Record<string, string>): Record<string, string> {
    return {
      authorization: `Bearer ${this.credentials.accessToken}`,
      "linkedin-version": this.credentials.apiVersion,
      "x-restli-protocol-version": "2.0.0",
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
    const info = await this.http.json<UserInfoResponse>(`${this.apiBaseUrl}/v2/userinfo`, {
      method: "GET",
      headers: { authorization: `Bearer ${this.credentials.accessToken}` }
    });
    this.log.info({ member: info.sub, author: this.credentials.authorUrn }, "Authenticated with LinkedIn");
  }

  private async uploadBytes(uploadUrl: string, bytes: Buffer, mimeType: string): Promise<Response> {
    const { response } = await this.http.request(uploadUrl, {
      method: "PUT",
      headers: {
        authorization: `Bearer ${this.credentials.accessToken}`,
        "content-type": mimeType
      },
      body: new Blob([Uint8Array.from(bytes)], { type: mimeType })
    });
    return response;
  }

  private async uploadImage(media: LoadedMedia): Promise<string> {
    const init = await this.http.json<ImageUploadResponse>(
      `${this.apiBaseUrl}/rest/images?action=initializeUpload`,
      this.jsonInit("POST", { initializeUploadRequest: { owner: this.credentials.authorUrn } })
    );

    const uploadUrl = init.value?.uploadUrl;
    const image = init.value?.image;
    if (!uploadUrl || !image) {
      throw new MediaUploadError("LinkedIn image initializeUpload returned no upload URL", { platform: this.name });
    }

    await this.uploadBytes(uploadUrl, media.data, media.mimeType);
    return image;
  }

  private async uploadVideo(media: LoadedMedia): Promise<string> {
    const init = await this.http.json<VideoUploadResponse>(
      `${this.apiBaseUrl}/rest/videos?action=initializeUpload`,
      this.jsonInit("POST", {
        initializeUploadRequest: {
          owner: this.credentials.authorUrn,
          fileSizeBytes: media.data.byteLength,
          uploadCaptions: false,
          uploadThumbnail: false
        }
      })
    );

    const video = init.value?.video;
    const instructions = init.value?.uploadInstructions ?? [];
    if (!video || instructions.length === 0) {
      throw new MediaUploadError("LinkedIn video initializeUpload returned no upload instructions", {
        platform: this.name
      });
    }

    const uploadedPartIds: string[] = [];
    for (const part of instructions) {
      const response = await this.uploadBytes(
        part.uploadUrl,
        media.data.subarray(part.firstByte, part.lastByte + 1),
        "application/octet-stream"
      );
      const etag = response.headers.get("etag");
      if (!etag) {
        throw new MediaUploadError("LinkedIn video part upload returned no etag", { platform: this.name });
      }
      uploadedPartIds.push(etag);
    }

    await this.http.request(
      `${this.apiBaseUrl}/rest/videos?action=finalizeUpload`,
      this.jsonInit("POST", {
        finalizeUploadRequest: {
          video,
          uploadToken: init.value?.uploadToken ?? "",
          uploadedPartIds
        }
      })
    );

    return video;
  }

  private async uploadItem(item: MediaItem): Promise<{ id: string; altText?: string }> {
    try {
      const media = await loadMedia(this.name, item, this.http);
      const id = media.kind === "video" ? await this.uploadVideo(media) : await this.uploadImage(media);
      return { id, ...(item.altText ? { altText: item.altText.slice(0, 4086) } : {}) };
    } catch (error) {
      throw asMediaUploadError(this.name, error, `LinkedIn media upload failed for ${item.source}`);
    }
  }

  private async buildContent(descriptor: PostDescriptor): Promise<PostContent | undefined> {
    if (descriptor.media.length === 0) {
      return undefined;
    }

    if (descriptor.media.length === 1) {
      return { media: await this.uploadItem(descriptor.media[0]) };
    }

    if (descriptor.media.some((item) => item.kind !== "image")) {
      throw new UnsupportedCapabilityError("LinkedIn multi-media posts accept images only", { platform: this.name });
    }

    const images: Array<{ id: string; altText?: string }> = [];
    for (const item of descriptor.media) {
      images.push(await this.uploadItem(item));
    }
    return { multiImage: { images } };
  }

  async postImmediate(descriptor: PostDescriptor): Promise<PublishReceipt> {
    const content = await this.buildContent(descriptor);

    const { response } = await this.http.request(
      `${this.apiBaseUrl}/rest/posts`,
      this.jsonInit("POST", {
        author: this.credentials.authorUrn,
        commentary: linkedInCommentary(descriptor),
        visibility: "PUBLIC",
        distribution: {
          feedDistribution: "MAIN_FEED",
          targetEntities: [],
          thirdPartyDistributionChannels: []
        },
        ...(content ? { content } : {}),
        lifecycleState: "PUBLISHED",
        isReshareDisabledByAuthor: false
      })
    );

    const postUrn = response.headers.get("x-restli-id") ?? response.headers.get("x-linkedin-id");
    if (!postUrn) {
      throw new PlatformApiError("LinkedIn post response missing x-restli-id", { platform: this.name });
    }

    this.log.info({ postUrn, postType: descriptor.postType }, "Published post to LinkedIn");
    return { id: postUrn, url: `https://www.linkedin.com/feed/update/${postUrn}/` };
  }

  async postScheduled(): Promise<PublishReceipt> {
    throw new UnsupportedCapabilityError("LinkedIn has no scheduling API", { platform: this.name });
  }

  async deletePost(platformPostId: string): Promise<void> {
    await this.http.request(`${this.apiBaseUrl}/rest/posts/${encodeURIComponent(platformPostId)}`, {
      method: "DELETE",
      headers: this.buildHeaders()
    });
  }

  async destroy(): Promise<void> {
    this.log.info("LinkedIn adapter stopped");
  }
}
