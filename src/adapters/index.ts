import type { AppConfig } from "../config/env.js";
import type { HttpOptions } from "../core/http.js";
import type { PlatformName } from "../core/types.js";
import type { PlatformAdapter } from "./base.js";
import { BlueskyAdapter } from "./bluesky.js";
import { FacebookAdapter } from "./facebook.js";
import { InstagramAdapter } from "./instagram.js";
import { LinkedInAdapter } from "./linkedin.js";
import { MastodonAdapter } from "./mastodon.js";
import { TwitterAdapter } from "./twitter.js";

export type AdapterRegistry = ReadonlyMap<PlatformName, PlatformAdapter>;

/** One adapter per platform whose credentials are configured. */
export function createAdapters(config: AppConfig, options: HttpOptions = {}): AdapterRegistry {
  const http: HttpOptions = { timeoutMs: config.http.timeoutMs, ...options };
  const { platforms } = config;
  const adapters = new Map<PlatformName, PlatformAdapter>();

  if (platforms.twitter) {
    adapters.set("twitter", new TwitterAdapter(platforms.twitter, http));
  }
  if (platforms.facebook) {
    adapters.set("facebook", new FacebookAdapter(platforms.facebook, http));
  }
  if (platforms.instagram) {
    adapters.set("instagram", new InstagramAdapter(platforms.instagram, http));
  }
  if (platforms.linkedin) {
    adapters.set("linkedin", new LinkedInAdapter(platforms.linkedin, http));
  }
  if (platforms.mastodon) {
    adapters.set("mastodon", new MastodonAdapter(platforms.mastodon, http));
  }
  if (platforms.bluesky) {
    adapters.set("bluesky", new BlueskyAdapter(platforms.bluesky, http));
  }

  return adapters;
}

export type { PlatformAdapter } from "./base.js";
