import {
  AuthenticationError,
  NetworkError,
  NotFoundError,
  PlatformApiError,
  PublishingError,
  RateLimitError,
  errorMessage
} from "./errors.js";
import type { PlatformName } from "./types.js";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET"
]);

export function headersToRecord(headers: Headers): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [name, value] of headers.entries()) {
    output[name.toLowerCase()] = value;
  }
  return output;
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string" && value.trim() !== "") {
    const numeric = Number(value);
    if (Number.isFinite(numeric)) {
      return numeric;
    }
  }

  return undefined;
}

/**
 * Milliseconds until the platform allows another request, from `retry-after`
 * (seconds or HTTP date) or the epoch-second reset headers.
 */
export function parseRetryAfterMs(headers: Record<string, string>, now = Date.now()): number | undefined {
  const candidates: number[] = [];

  const retryAfter = headers["retry-after"];
  if (retryAfter) {
    const seconds = toNumber(retryAfter);
    if (seconds !== undefined && seconds >= 0) {
      candidates.push(now + seconds * 1000);
    } else {
      const date = Date.parse(retryAfter);
      if (Number.isFinite(date)) {
        candidates.push(date);
      }
    }
  }

  for (const name of ["x-rate-limit-reset", "ratelimit-reset", "x-ratelimit-reset"]) {
    const numeric = toNumber(headers[name]);
    if (numeric === undefined || numeric <= 0) {
      continue;
    }

    // Small values are relative seconds (IETF draft), large ones epoch seconds or ms.
    if (numeric < 1e9) {
      candidates.push(now + numeric * 1000);
    } else {
      candidates.push(numeric > 1e12 ? numeric : numeric * 1000);
    }
  }

  const future = candidates.filter((value) => value > now);
  if (future.length === 0) {
    return undefined;
  }

  return Math.max(...future) - now;
}

export function firstApiErrorMessage(payload: unknown): string | undefined {
  if (!payload || typeof payload !== "object") {
    return undefined;
  }

  const candidate = payload as {
    errors?: Array<{ message?: unknown }>;
    error?: unknown;
    detail?: unknown;
    title?: unknown;
    message?: unknown;
  };

  if (Array.isArray(candidate.errors) && candidate.errors[0] && typeof candidate.errors[0].message === "string") {
    return candidate.errors[0].message;
  }

  if (typeof candidate.error === "string") {
    return candidate.error;
  }

  if (candidate.error && typeof candidate.error === "object") {
    const nested = (candidate.error as { message?: unknown }).message;
    if (typeof nested === "string") {
      return nested;
    }
  }

  for (const value of [candidate.detail, candidate.title, candidate.message]) {
    if (typeof value === "string") {
      return value;
    }
  }

  return undefined;
}

export function extractStatusCode(error: unknown): number | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }

  const candidate = error as {
    code?: unknown;
    status?: unknown;
    statusCode?: unknown;
  };

  for (const value of [candidate.statusCode, candidate.status, candidate.code]) {
    if (typeof value === "number" && Number.isFinite(value) && value >= 100 && value < 600) {
      return value;
    }
  }

  return undefined;
}

/** Maps an HTTP status to the error taxonomy. */
export function errorForStatus(
  platform: PlatformName,
  statusCode: number,
  message: string,
  headers: Record<string, string> = {}
): PublishingError {
  const detail = `${platform} request failed (${statusCode}): ${message}`;

  if (statusCode === 401 || statusCode === 403) {
    return new AuthenticationError(detail, { platform });
  }

  if (statusCode === 404 || statusCode === 410) {
    return new NotFoundError(detail, { platform });
  }

  if (statusCode === 429) {
    return new RateLimitError(detail, { platform, retryAfterMs: parseRetryAfterMs(headers) });
  }

  if (statusCode === 408 || statusCode >= 500) {
    return new NetworkError(detail, { platform });
  }

  return new PlatformApiError(detail, { platform, statusCode });
}

function errorCode(error: unknown): string | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }

  const code = (error as { code?: unknown }).code;
  if (typeof code === "string") {
    return code;
  }

  return errorCode((error as { cause?: unknown }).cause);
}

/**
 * Normalizes anything a client library threw into the taxonomy. Errors that
 * already belong to it pass through.
 */
export function classifyThrown(platform: PlatformName, error: unknown): unknown {
  if (error instanceof PublishingError) {
    return error;
  }

  const statusCode = extractStatusCode(error);
  if (statusCode !== undefined) {
    const headers =
      error && typeof error === "object" && "headers" in error ? toHeaderRecord((error as { headers: unknown }).headers) : {};
    return errorForStatus(platform, statusCode, errorMessage(error), headers);
  }

  const code = errorCode(error);
  const isAbort = error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
  const isFetchFailure = error instanceof TypeError && error.message.includes("fetch failed");

  if (isAbort || isFetchFailure || (code !== undefined && TRANSIENT_ERROR_CODES.has(code))) {
    return new NetworkError(`${platform} request failed: ${errorMessage(error)}`, { platform, cause: error });
  }

  return error;
}

function toHeaderRecord(value: unknown): Record<string, string> {
  if (value instanceof Headers) {
    return headersToRecord(value);
  }

  const output: Record<string, string> = {};
  if (value && typeof value === "object") {
    for (const [name, entry] of Object.entries(value)) {
      if (typeof entry === "string") {
        output[name.toLowerCase()] = entry;
      }
    }
  }
  return output;
}

export async function readPayload(response: Response): Promise<unknown> {
  const rawText = await response.text();
  if (rawText.trim().length === 0) {
    return {};
  }

  try {
    return JSON.parse(rawText) as unknown;
  } catch {
    return { raw: rawText };
  }
}

function rawText(payload: unknown): string | undefined {
  if (payload && typeof payload === "object" && "raw" in payload) {
    const raw = (payload as { raw: unknown }).raw;
    return typeof raw === "string" ? raw : undefined;
  }
  return undefined;
}

/**
 * Thin fetch wrapper bound to one platform: applies the timeout, turns
 * transport failures into `NetworkError` and non-2xx responses into the
 * taxonomy.
 */
export class HttpClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(
    readonly platform: PlatformName,
    options: HttpOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  }

  async send(url: string | URL, init: RequestInit = {}): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        ...init,
        signal: init.signal ?? AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw classifyThrown(this.platform, error);
    }
  }

  async request(url: string | URL, init: RequestInit = {}): Promise<{ payload: unknown; response: Response }> {
    const response = await this.send(url, init);
    const payload = await readPayload(response);

    if (!response.ok) {
      const message =
        firstApiErrorMessage(payload) ?? rawText(payload) ?? (response.statusText || "request rejected");
      throw errorForStatus(this.platform, response.status, message, headersToRecord(response.headers));
    }

    return { payload, response };
  }

  async json<T>(url: string | URL, init: RequestInit = {}): Promise<T> {
    const { payload } = await this.request(url, init);
    return payload as T;
  }
}
