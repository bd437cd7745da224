import { describe, expect, it, vi } from "vitest";
import { AuthenticationError, NetworkError, NotFoundError, PlatformApiError, RateLimitError } from "./errors.js";
import { HttpClient, classifyThrown, errorForStatus, firstApiErrorMessage, parseRetryAfterMs } from "./http.js";

describe("errorForStatus", () => {
  it("maps statuses to the error taxonomy", () => {
    expect(errorForStatus("linkedin", 401, "expired")).toBeInstanceOf(AuthenticationError);
    expect(errorForStatus("linkedin", 404, "gone")).toBeInstanceOf(NotFoundError);
    expect(errorForStatus("linkedin", 429, "slow")).toBeInstanceOf(RateLimitError);
    expect(errorForStatus("linkedin", 503, "down")).toBeInstanceOf(NetworkError);
    const rejected = errorForStatus("linkedin", 422, "bad field");
    expect(rejected).toBeInstanceOf(PlatformApiError);
    expect(rejected.message).toBe("linkedin request failed (422): bad field");
  });
});

describe("parseRetryAfterMs", () => {
  const now = 1_700_000_000_000;

  it("reads retry-after seconds", () => {
    expect(parseRetryAfterMs({ "retry-after": "30" }, now)).toBe(30_000);
  });

  it("reads epoch-second reset headers", () => {
    expect(parseRetryAfterMs({ "x-rate-limit-reset": "1700000060" }, now)).toBe(60_000);
  });

  it("ignores resets in the past", () => {
    expect(parseRetryAfterMs({ "x-rate-limit-reset": "1699999000" }, now)).toBeUndefined();
  });
});

describe("firstApiErrorMessage", () => {
  it("understands the common error bodies", () => {
    expect(firstApiErrorMessage({ errors: [{ message: "Duplicate" }] })).toBe("Duplicate");
    expect(firstApiErrorMessage({ error: { message: "Invalid token" } })).toBe("Invalid token");
    expect(firstApiErrorMessage({ detail: "Forbidden" })).toBe("Forbidden");
    expect(firstApiErrorMessage("nope")).toBeUndefined();
  });
});

describe("classifyThrown", () => {
  it("turns fetch failures into network errors", () => {
    const error = classifyThrown("mastodon", new TypeError("fetch failed"));
    expect(error).toBeInstanceOf(NetworkError);
    expect(error instanceof NetworkError && error.message).toBe("mastodon request failed: fetch failed");
  });

  it("maps library errors that carry a status code", () => {
    const error = Object.assign(new Error("Record not found"), { statusCode: 404 });
    expect(classifyThrown("mastodon", error)).toBeInstanceOf(NotFoundError);
  });

  it("leaves unknown errors alone", () => {
    const error = new Error("boom");
    expect(classifyThrown("mastodon", error)).toBe(error);
  });
});

describe("HttpClient", () => {
  it("returns the decoded payload on success", async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response(JSON.stringify({ id: "42" }), { status: 200 }));
    const client = new HttpClient("twitter", { fetchImpl });

    await expect(client.json<{ id: string }>("https://api.example/resource")).resolves.toEqual({ id: "42" });
    expect(fetchImpl.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it("treats an empty body as an empty object", async () => {
    const client = new HttpClient("twitter", { fetchImpl: async () => new Response(null, { status: 204 }) });

    await expect(client.json("https://api.example/resource")).resolves.toEqual({});
  });

  it("raises rate limits with the retry-after hint", async () => {
    const client = new HttpClient("twitter", {
      fetchImpl: async () =>
        new Response(JSON.stringify({ errors: [{ message: "Too Many Requests" }] }), {
          status: 429,
          headers: { "retry-after": "5" }
        })
    });

    const error = await client.json("https://api.example/resource").catch((thrown: unknown) => thrown);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error instanceof RateLimitError && error.retryAfterMs).toBe(5_000);
    expect(error instanceof RateLimitError && error.message).toBe("twitter request failed (429): Too Many Requests");
  });

  it("uses the raw body when the error is not JSON", async () => {
    const client = new HttpClient("twitter", {
      fetchImpl: async () => new Response("upstream exploded", { status: 502 })
    });

    const request = client.json("https://api.example/resource");
    await expect(request).rejects.toBeInstanceOf(NetworkError);
    await expect(request).rejects.toThrow("twitter request failed (502): upstream exploded");
  });

  it("classifies transport failures", async () => {
    const client = new HttpClient("twitter", {
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      }
    });

    await expect(client.send("https://api.example/resource")).rejects.toBeInstanceOf(NetworkError);
  });
});
