import { AtpAgent, RichText, type AppBskyEmbedImages } from "@atproto/api";
import type { BlueskyCredentials } from "../config/env.js";
import { logger } from "../config/logger.js";
import { composePostText } from "../core/descriptor.js";
import { AuthenticationError, UnsupportedCapabilityError } from "../core/errors.js";
import { HttpClient, classifyThrown, type HttpOptions } from "../core/http.js";
import { asMediaUploadError, loadMedia } from "../core/media-loader.js";
import type { PostDescriptor, PublishReceipt } from "../core/types.js";
import type { PlatformAdapter } from "./base.js";

export interface BlueskyAdapterOptions extends HttpOptions {
  /** Injected agent, for tests. */
  agent?: AtpAgent;
}

function postUrl(uri: string): string | undefined {
  const match = /^at:\/\/([^/]+)\/app\.bsky\.feed\.post\/([^/]+)$/.exec(uri);
  return match ? `https://bsky.app/profile/${match[1]}/post/${match[2]}` : undefined;
}

export class BlueskyAdapter implements PlatformAdapter {
  readonly name = "bluesky" as const;
  private readonly log = logger.child({ module: "adapters/bluesky" });
  private readonly agent: AtpAgent;
  private readonly http: HttpClient;

  constructor(
    private readonly credentials: BlueskyCredentials,
    options: BlueskyAdapterOptions = {}
  ) {
    this.agent = options.agent ?? new AtpAgent({ service: credentials.service });
    this.http = new HttpClient(this.name, options);
  }

  private async call<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw classifyThrown(this.name, error);
    }
  }

  async authenticate(): Promise<void> {
    const session = await this.call(() =>
      this.agent.login({
        identifier: this.credentials.identifier,
        password: this.credentials.password
      })
    );

    if (!session.success) {
      throw new AuthenticationError("Bluesky rejected the login", { platform: this.name });
    }

    this.log.info({ service: this.credentials.service, did: session.data.did }, "Authenticated with Bluesky");
  }

  private async uploadImages(descriptor: PostDescriptor): Promise<AppBskyEmbedImages.Main | undefined> {
    if (descriptor.media.length === 0) {
      return undefined;
    }

    const images: AppBskyEmbedImages.Image[] = [];
    for (const item of descriptor.media) {
      if (item.kind !== "image") {
        throw new UnsupportedCapabilityError("Bluesky posts accept images only", { platform: this.name });
      }

      try {
        const media = await loadMedia(this.name, item, this.http);
        const uploaded = await this.call(() =>
          this.agent.uploadBlob(Uint8Array.from(media.data), { encoding: media.mimeType })
        );
        images.push({ image: uploaded.data.blob, alt: item.altText ?? "" });
      } catch (error) {
        throw asMediaUploadError(this.name, error, `Bluesky image upload failed for ${item.source}`);
      }
    }

    return { $type: "app.bsky.embed.images", images };
  }

  async postImmediate(descriptor: PostDescriptor): Promise<PublishReceipt> {
    const embed = await this.uploadImages(descriptor);

    const richText = new RichText({ text: composePostText(descriptor) });
    await this.call(() => richText.detectFacets(this.agent));

    const created = await this.call(() =>
      this.agent.post({
        text: richText.text,
        facets: richText.facets,
        ...(embed ? { embed } : {}),
        createdAt: new Date().toISOString()
      })
    );

    this.log.info({ uri: created.uri, imageCount: embed?.images.length ?? 0 }, "Published post to Bluesky");
    return { id: created.uri, url: postUrl(created.uri) };
  }

  async postScheduled(): Promise<PublishReceipt> {
    throw new UnsupportedCapabilityError("Bluesky has no scheduling API", { platform: this.name });
  }

  async deletePost(platformPostId: string): Promise<void> {
    await this.call(() => this.agent.deletePost(platformPostId));
  }

  async destroy(): Promise<void> {
    this.log.info("Bluesky adapter stopped");
  }
}
