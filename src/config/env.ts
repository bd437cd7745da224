import path from "node:path";
import { config as loadDotEnv } from "dotenv";
import { z } from "zod";
import type { DeletionPolicy } from "../core/delete-tracker.js";
import type { RetryPolicy } from "../core/retry.js";
import type { TtlDurations } from "../core/ttl.js";
import { PLATFORMS, type PlatformName, type TtlSelection } from "../core/types.js";

loadDotEnv();

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalUrl = z.preprocess(blankToUndefined, z.string().url().optional());
const optionalString = z.preprocess(blankToUndefined, z.string().optional());
const positiveInt = (fallback: number) => z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));
const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(fallback));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),

  DB_PATH: z.string().default("./data/dispatcher.db"),
  RUN_MODE: z.enum(["daemon", "once"]).default("daemon"),
  SWEEP_INTERVAL_MS: positiveInt(60_000),
  SWEEP_BATCH_SIZE: positiveInt(25),
  QUEUE_RETENTION_MS: positiveInt(30 * 24 * 60 * 60 * 1000),
  QUEUE_DISPATCH_LEASE_MS: positiveInt(30 * 60 * 1000),

  BATCH_FILE: optionalString,
  BATCH_TTL_MODE: z.enum(["test", "production", "custom"]).default("production"),
  BATCH_TTL_CUSTOM_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  TTL_TEST_MS: positiveInt(10 * 60 * 1000),
  TTL_PRODUCTION_MS: positiveInt(24 * 60 * 60 * 1000),

  RETRY_RATE_LIMIT_MAX_RETRIES: nonNegativeInt(5),
  RETRY_RATE_LIMIT_BASE_DELAY_MS: positiveInt(2_000),
  RETRY_RATE_LIMIT_MAX_TOTAL_WAIT_MS: positiveInt(5 * 60 * 1000),
  RETRY_NETWORK_MAX_ATTEMPTS: positiveInt(3),
  RETRY_NETWORK_DELAY_MS: positiveInt(2_000),

  DELETE_MAX_RETRIES: positiveInt(5),
  DELETE_RETRY_DELAY_MS: positiveInt(15 * 60 * 1000),
  DELETE_LEASE_MS: positiveInt(10 * 60 * 1000),

  HTTP_TIMEOUT_MS: positiveInt(30_000),
  MEDIA_LIBRARY_DIR: optionalString,
  MEDIA_RECENT_EXCLUDE: nonNegativeInt(5),

  TWITTER_ACCESS_TOKEN: optionalString,
  TWITTER_API_BASE_URL: z.string().url().default("https://api.x.com"),

  GRAPH_API_BASE_URL: z.string().url().default("https://graph.facebook.com"),
  GRAPH_API_VERSION: z.string().regex(/^v\d+\.\d+$/, "GRAPH_API_VERSION looks like v18.0").default("v18.0"),
  FACEBOOK_PAGE_ID: optionalString,
  FACEBOOK_ACCESS_TOKEN: optionalString,
  INSTAGRAM_ACCOUNT_ID: optionalString,
  INSTAGRAM_ACCESS_TOKEN: optionalString,

  LINKEDIN_ACCESS_TOKEN: optionalString,
  LINKEDIN_AUTHOR_URN: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^urn:li:(person|organization):[\w-]+$/, "LINKEDIN_AUTHOR_URN must be a person or organization URN")
      .optional()
  ),
  LINKEDIN_API_BASE_URL: z.string().url().default("https://api.linkedin.com"),
  LINKEDIN_API_VERSION: z.string().regex(/^\d{6}$/, "LINKEDIN_API_VERSION is YYYYMM").default("202405"),

  MASTODON_INSTANCE: optionalUrl,
  MASTODON_ACCESS_TOKEN: optionalString,

  BLUESKY_SERVICE: z.string().url().default("https://bsky.social"),
  BLUESKY_IDENTIFIER: optionalString,
  BLUESKY_PASSWORD: optionalString
});

export type RawEnv = z.infer<typeof envSchema>;

export interface TwitterCredentials {
  accessToken: string;
  apiBaseUrl: string;
}

export interface GraphApiSettings {
  baseUrl: string;
  version: string;
}

export interface FacebookCredentials {
  pageId: string;
  accessToken: string;
  graph: GraphApiSettings;
}

export interface InstagramCredentials {
  accountId: string;
  accessToken: string;
  graph: GraphApiSettings;
}

export interface LinkedInCredentials {
  accessToken: string;
  authorUrn: string;
  apiBaseUrl: string;
  apiVersion: string;
}

export interface MastodonCredentials {
  instance: string;
  accessToken: string;
}

export interface BlueskyCredentials {
  service: string;
  identifier: string;
  password: string;
}

/** Credentials per platform; a key is present only when its credentials are complete. */
export interface PlatformCredentials {
  twitter?: TwitterCredentials;
  facebook?: FacebookCredentials;
  instagram?: InstagramCredentials;
  linkedin?: LinkedInCredentials;
  mastodon?: MastodonCredentials;
  bluesky?: BlueskyCredentials;
}

export interface AppConfig {
  nodeEnv: RawEnv["NODE_ENV"];
  logLevel: RawEnv["LOG_LEVEL"];
  dbPath: string;
  runMode: RawEnv["RUN_MODE"];
  sweep: {
    intervalMs: number;
    batchSize: number;
    queueRetentionMs: number;
    dispatchLeaseMs: number;
  };
  batch: {
    file?: string;
    ttl: TtlSelection;
  };
  ttl: TtlDurations;
  retry: RetryPolicy;
  deletion: DeletionPolicy;
  http: {
    timeoutMs: number;
  };
  media: {
    libraryDir?: string;
    recentExclude: number;
  };
  platforms: PlatformCredentials;
}

function batchTtl(data: RawEnv): TtlSelection {
  if (data.BATCH_TTL_MODE !== "custom") {
    return { mode: data.BATCH_TTL_MODE };
  }

  if (data.BATCH_TTL_CUSTOM_MS === undefined) {
    throw new Error("Invalid environment variables:\nBATCH_TTL_CUSTOM_MS: required when BATCH_TTL_MODE=custom");
  }

  return { mode: "custom", durationMs: data.BATCH_TTL_CUSTOM_MS };
}

function platformCredentials(data: RawEnv): PlatformCredentials {
  const graph = { baseUrl: data.GRAPH_API_BASE_URL.replace(/\/$/, ""), version: data.GRAPH_API_VERSION };
  const credentials: PlatformCredentials = {};

  if (data.TWITTER_ACCESS_TOKEN) {
    credentials.twitter = {
      accessToken: data.TWITTER_ACCESS_TOKEN,
      apiBaseUrl: data.TWITTER_API_BASE_URL.replace(/\/$/, "")
    };
  }

  if (data.FACEBOOK_PAGE_ID && data.FACEBOOK_ACCESS_TOKEN) {
    credentials.facebook = { pageId: data.FACEBOOK_PAGE_ID, accessToken: data.FACEBOOK_ACCESS_TOKEN, graph };
  }

  // Instagram business accounts are reached through the linked Facebook page token.
  const instagramToken = data.INSTAGRAM_ACCESS_TOKEN ?? data.FACEBOOK_ACCESS_TOKEN;
  if (data.INSTAGRAM_ACCOUNT_ID && instagramToken) {
    credentials.instagram = { accountId: data.INSTAGRAM_ACCOUNT_ID, accessToken: instagramToken, graph };
  }

  if (data.LINKEDIN_ACCESS_TOKEN && data.LINKEDIN_AUTHOR_URN) {
    credentials.linkedin = {
      accessToken: data.LINKEDIN_ACCESS_TOKEN,
      authorUrn: data.LINKEDIN_AUTHOR_URN,
      apiBaseUrl: data.LINKEDIN_API_BASE_URL.replace(/\/$/, ""),
      apiVersion: data.LINKEDIN_API_VERSION
    };
  }

  if (data.MASTODON_INSTANCE && data.MASTODON_ACCESS_TOKEN) {
    credentials.mastodon = { instance: data.MASTODON_INSTANCE, accessToken: data.MASTODON_ACCESS_TOKEN };
  }

  if (data.BLUESKY_IDENTIFIER && data.BLUESKY_PASSWORD) {
    credentials.bluesky = {
      service: data.BLUESKY_SERVICE,
      identifier: data.BLUESKY_IDENTIFIER,
      password: data.BLUESKY_PASSWORD
    };
  }

  return credentials;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("\n");
    throw new Error(`Invalid environment variables:\n${details}`);
  }

  const data = parsed.data;

  return {
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    dbPath: path.isAbsolute(data.DB_PATH) ? data.DB_PATH : path.resolve(process.cwd(), data.DB_PATH),
    runMode: data.RUN_MODE,
    sweep: {
      intervalMs: data.SWEEP_INTERVAL_MS,
      batchSize: data.SWEEP_BATCH_SIZE,
      queueRetentionMs: data.QUEUE_RETENTION_MS,
      dispatchLeaseMs: data.QUEUE_DISPATCH_LEASE_MS
    },
    batch: {
      file: data.BATCH_FILE,
      ttl: batchTtl(data)
    },
    ttl: {
      testMs: data.TTL_TEST_MS,
      productionMs: data.TTL_PRODUCTION_MS
    },
    retry: {
      rateLimit: {
        maxRetries: data.RETRY_RATE_LIMIT_MAX_RETRIES,
        baseDelayMs: data.RETRY_RATE_LIMIT_BASE_DELAY_MS,
        maxTotalWaitMs: data.RETRY_RATE_LIMIT_MAX_TOTAL_WAIT_MS
      },
      network: {
        maxAttempts: data.RETRY_NETWORK_MAX_ATTEMPTS,
        delayMs: data.RETRY_NETWORK_DELAY_MS
      }
    },
    deletion: {
      maxRetries: data.DELETE_MAX_RETRIES,
      retryDelayMs: data.DELETE_RETRY_DELAY_MS,
      leaseMs: data.DELETE_LEASE_MS
    },
    http: {
      timeoutMs: data.HTTP_TIMEOUT_MS
    },
    media: {
      libraryDir: data.MEDIA_LIBRARY_DIR,
      recentExclude: data.MEDIA_RECENT_EXCLUDE
    },
    platforms: platformCredentials(data)
  };
}

export function enabledPlatforms(config: AppConfig): PlatformName[] {
  return PLATFORMS.filter((name) => config.platforms[name] !== undefined);
}
