import type { GraphApiSettings } from "../config/env.js";
import { AuthenticationError, NotFoundError, PublishingError, RateLimitError } from "../core/errors.js";
import {
  HttpClient,
  errorForStatus,
  firstApiErrorMessage,
  headersToRecord,
  parseRetryAfterMs,
  readPayload,
  type HttpOptions
} from "../core/http.js";
import type { PlatformName } from "../core/types.js";

export type GraphParams = Record<string, string | number | boolean | undefined>;

interface GraphErrorBody {
  error?: {
    message?: string;
    code?: number;
    error_subcode?: number;
    is_transient?: boolean;
  };
}

const RATE_LIMIT_CODES = new Set([4, 17, 32, 613]);
const AUTH_CODES = new Set([102, 190]);

function graphErrorBody(payload: unknown): GraphErrorBody["error"] | undefined {
  if (!payload || typeof payload !== "object" || !("error" in payload)) {
    return undefined;
  }

  const error = (payload as GraphErrorBody).error;
  return error && typeof error === "object" ? error : undefined;
}

/**
 * Maps a Graph API failure to the taxonomy. Graph reports most failures as
 * HTTP 400 with an error code, so the code decides before the status does.
 */
export function graphErrorFor(
  platform: PlatformName,
  statusCode: number,
  payload: unknown,
  headers: Record<string, string>
): PublishingError {
  const body = graphErrorBody(payload);
  const message = body?.message ?? firstApiErrorMessage(payload) ?? `HTTP ${statusCode}`;
  const code = body?.code;
  const detail = `${platform} Graph API error${code !== undefined ? ` ${code}` : ""}: ${message}`;

  if (code !== undefined && RATE_LIMIT_CODES.has(code)) {
    return new RateLimitError(detail, { platform, retryAfterMs: parseRetryAfterMs(headers) });
  }

  if (code !== undefined && AUTH_CODES.has(code)) {
    return new AuthenticationError(detail, { platform });
  }

  if (code === 100 && body?.error_subcode === 33) {
    return new NotFoundError(detail, { platform });
  }

  return errorForStatus(platform, statusCode, message, headers);
}

function toSearchParams(params: GraphParams): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.set(key, String(value));
    }
  }
  return search;
}

/** Graph API calls for one token; the token travels as `access_token`. */
export class GraphApiClient {
  readonly http: HttpClient;
  private readonly baseUrl: string;

  constructor(
    readonly platform: PlatformName,
    private readonly settings: GraphApiSettings,
    private readonly accessToken: string,
    options: HttpOptions = {}
  ) {
    this.http = new HttpClient(platform, options);
    this.baseUrl = `${settings.baseUrl.replace(/\/$/, "")}/${settings.version}`;
  }

  get version(): string {
    return this.settings.version;
  }

  get token(): string {
    return this.accessToken;
  }

  url(nodePath: string, params: GraphParams = {}): string {
    const search = toSearchParams({ ...params, access_token: this.accessToken });
    return `${this.baseUrl}/${nodePath.replace(/^\//, "")}?${search.toString()}`;
  }

  async call<T>(url: string, init: RequestInit): Promise<T> {
    const response = await this.http.send(url, init);
    const payload = await readPayload(response);

    if (!response.ok || graphErrorBody(payload)) {
      throw graphErrorFor(this.platform, response.status, payload, headersToRecord(response.headers));
    }

    return payload as T;
  }

  get<T>(nodePath: string, params: GraphParams = {}): Promise<T> {
    return this.call<T>(this.url(nodePath, params), { method: "GET" });
  }

  post<T>(nodePath: string, params: GraphParams = {}): Promise<T> {
    return this.call<T>(`${this.baseUrl}/${nodePath.replace(/^\//, "")}`, {
      method: "POST",
      headers: { "content-type": "application/x-www-form-urlencoded" },
      body: toSearchParams({ ...params, access_token: this.accessToken }).toString()
    });
  }

  /** Multipart POST for uploads from local files. */
  postForm<T>(nodePath: string, form: FormData): Promise<T> {
    form.set("access_token", this.accessToken);
    return this.call<T>(`${this.baseUrl}/${nodePath.replace(/^\//, "")}`, { method: "POST", body: form });
  }

  delete<T>(nodePath: string): Promise<T> {
    return this.call<T>(this.url(nodePath), { method: "DELETE" });
  }
}
