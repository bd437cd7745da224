import { createRestAPIClient } from "masto";
import type { MastodonCredentials } from "../config/env.js";
import { logger } from "../config/logger.js";
import { composePostText } from "../core/descriptor.js";
import { AuthenticationError, MediaUploadError, NetworkError, UnsupportedCapabilityError } from "../core/errors.js";
import { HttpClient, classifyThrown, type HttpOptions } from "../core/http.js";
import { asMediaUploadError, loadMedia } from "../core/media-loader.js";
import { sleep } from "../core/retry.js";
import type { PostDescriptor, PublishReceipt } from "../core/types.js";
import type { PlatformAdapter } from "./base.js";

const MEDIA_MAX_POLLS = 60;
const MEDIA_POLL_INTERVAL_MS = 2_000;

export type MastodonClient = ReturnType<typeof createRestAPIClient>;

export interface MastodonAdapterOptions extends HttpOptions {
  /** Injected client, for tests. */
  client?: MastodonClient;
  sleep?: (ms: number) => Promise<void>;
}

export class MastodonAdapter implements PlatformAdapter {
  readonly name = "mastodon" as const;
  private readonly log = logger.child({ module: "adapters/mastodon" });
  private readonly client: MastodonClient;
  private readonly http: HttpClient;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    private readonly credentials: MastodonCredentials,
    options: MastodonAdapterOptions = {}
  ) {
    this.client =
      options.client ??
      createRestAPIClient({
        url: credentials.instance,
        accessToken: credentials.accessToken,
        timeout: options.timeoutMs
      });
    this.http = new HttpClient(this.name, options);
    this.wait = options.sleep ?? sleep;
  }

  /** Runs a masto call with its errors mapped to the taxonomy. */
  private async call<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof Error && error.name === "MastoTimeoutError") {
        throw new NetworkError(`mastodon request timed out: ${error.message}`, { platform: this.name, cause: error });
      }
      throw classifyThrown(this.name, error);
    }
  }

  async authenticate(): Promise<void> {
    const account = await this.call(() => this.client.v1.accounts.verifyCredentials());
    if (!account.id) {
      throw new AuthenticationError("Mastodon did not return the authenticated account", { platform: this.name });
    }

    this.log.info({ instance: this.credentials.instance, acct: account.acct }, "Authenticated with Mastodon");
  }

  private async waitForProcessing(mediaId: string): Promise<void> {
    for (let attempt = 0; attempt < MEDIA_MAX_POLLS; attempt += 1) {
      const attachment = await this.call(() => this.client.v1.media.$select(mediaId).fetch());
      if (attachment.url) {
        return;
      }
      await this.wait(MEDIA_POLL_INTERVAL_MS);
    }

    throw new MediaUploadError(`Timed out waiting for Mastodon to process media ${mediaId}`, { platform: this.name });
  }

  private async uploadMedia(descriptor: PostDescriptor): Promise<string[]> {
    const mediaIds: string[] = [];

    for (const item of descriptor.media) {
      try {
        const media = await loadMedia(this.name, item, this.http);
        const file = new Blob([Uint8Array.from(media.data)], { type: media.mimeType });
        const uploaded = await this.call(() => this.client.v2.media.create({ file, description: media.altText }));
        if (!uploaded.url) {
          await this.waitForProcessing(uploaded.id);
        }
        mediaIds.push(uploaded.id);
      } catch (error) {
        throw asMediaUploadError(this.name, error, `Mastodon media upload failed for ${item.source}`);
      }
    }

    return mediaIds;
  }

  async postImmediate(descriptor: PostDescriptor): Promise<PublishReceipt> {
    const mediaIds = await this.uploadMedia(descriptor);

    const text = composePostText(descriptor);
    const status = await this.call(() =>
      mediaIds.length > 0
        ? this.client.v1.statuses.create({ status: text, mediaIds, visibility: "public" })
        : this.client.v1.statuses.create({ status: text, visibility: "public" })
    );

    this.log.info({ statusId: status.id, mediaCount: mediaIds.length }, "Published post to Mastodon");
    return { id: status.id, url: status.url ?? undefined };
  }

  async postScheduled(): Promise<PublishReceipt> {
    throw new UnsupportedCapabilityError("Mastodon scheduling is handled by the local queue", { platform: this.name });
  }

  async deletePost(platformPostId: string): Promise<void> {
    await this.call(() => this.client.v1.statuses.$select(platformPostId).remove());
  }

  async destroy(): Promise<void> {
    this.log.info("Mastodon adapter stopped");
  }
}
