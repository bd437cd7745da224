import { beforeEach, describe, expect, it, vi } from "vitest";
import { createPostDescriptor } from "../core/descriptor.js";
import { AuthenticationError, NetworkError, NotFoundError } from "../core/errors.js";
import { stubFetch } from "../testing/fetch-stub.js";
import { MastodonAdapter } from "./mastodon.js";

const masto = vi.hoisted(() => {
  const verifyCredentials = vi.fn();
  const createStatus = vi.fn();
  const removeStatus = vi.fn();
  const createMedia = vi.fn();
  const fetchMedia = vi.fn();

  return {
    verifyCredentials,
    createStatus,
    removeStatus,
    createMedia,
    fetchMedia,
    client: {
      v1: {
        accounts: { verifyCredentials },
        statuses: { create: createStatus, $select: () => ({ remove: removeStatus }) },
        media: { $select: () => ({ fetch: fetchMedia }) }
      },
      v2: { media: { create: createMedia } }
    }
  };
});

vi.mock("masto", () => ({ createRestAPIClient: () => masto.client }));

const credentials = { instance: "https://mastodon.example", accessToken: "test-token" };

describe("MastodonAdapter", () => {
  let sleeps: number[];
  let adapter: MastodonAdapter;

  beforeEach(() => {
    sleeps = [];
    const { fetchImpl } = stubFetch(() => new Response(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0, 0])));
    adapter = new MastodonAdapter(credentials, {
      fetchImpl,
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    });
  });

  it("verifies the account", async () => {
    masto.verifyCredentials.mockResolvedValueOnce({ id: "1", acct: "shop" });
    await adapter.authenticate();

    masto.verifyCredentials.mockResolvedValueOnce({ id: "", acct: "" });
    await expect(adapter.authenticate()).rejects.toBeInstanceOf(AuthenticationError);
  });

  it("publishes a public status", async () => {
    masto.createStatus.mockResolvedValueOnce({ id: "110", url: "https://mastodon.example/@shop/110" });

    const receipt = await adapter.postImmediate(
      createPostDescriptor({ text: "Hello", platform: "mastodon", hashtags: ["news"] })
    );

    expect(receipt).toEqual({ id: "110", url: "https://mastodon.example/@shop/110" });
    expect(masto.createStatus).toHaveBeenCalledWith({ status: "Hello\n\n#news", visibility: "public" });
  });

  it("uploads media and waits for processing", async () => {
    masto.createMedia.mockResolvedValueOnce({ id: "a1", url: null });
    masto.fetchMedia.mockResolvedValueOnce({ id: "a1", url: null }).mockResolvedValueOnce({
      id: "a1",
      url: "https://files.mastodon.example/a1.png"
    });
    masto.createStatus.mockResolvedValueOnce({ id: "111", url: null });

    const receipt = await adapter.postImmediate(
      createPostDescriptor({
        text: "Logo",
        platform: "mastodon",
        postType: "image",
        media: [{ source: "https://cdn.example/logo.png", kind: "image", altText: "Shop logo" }]
      })
    );

    expect(receipt).toEqual({ id: "111", url: undefined });
    expect(masto.createMedia).toHaveBeenCalledWith({ file: expect.any(Blob), description: "Shop logo" });
    expect(masto.createStatus).toHaveBeenCalledWith({ status: "Logo", mediaIds: ["a1"], visibility: "public" });
    expect(sleeps).toEqual([2_000]);
  });

  it("maps a missing status to not found", async () => {
    masto.removeStatus.mockRejectedValueOnce(Object.assign(new Error("Record not found"), { statusCode: 404 }));

    await expect(adapter.deletePost("110")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("maps client timeouts to network errors", async () => {
    const timeout = new Error("Request timed out");
    timeout.name = "MastoTimeoutError";
    masto.createStatus.mockRejectedValueOnce(timeout);

    await expect(
      adapter.postImmediate(createPostDescriptor({ text: "Hello", platform: "mastodon" }))
    ).rejects.toBeInstanceOf(NetworkError);
  });
});
