import { describe, expect, it } from "vitest";
import { createPostDescriptor } from "../core/descriptor.js";
import { MediaUploadError, UnsupportedCapabilityError } from "../core/errors.js";
import { formBody, jsonResponse, noRoute, stubFetch, type RecordedRequest } from "../testing/fetch-stub.js";
import { InstagramAdapter } from "./instagram.js";

const credentials = {
  accountId: "1784",
  accessToken: "test-token",
  graph: { baseUrl: "https://graph.test", version: "v18.0" }
};

function adapterWith(handler: (request: RecordedRequest) => Response) {
  const sleeps: number[] = [];
  const stub = stubFetch(handler);
  const adapter = new InstagramAdapter(credentials, {
    fetchImpl: stub.fetchImpl,
    sleep: async (ms) => {
      sleeps.push(ms);
    }
  });
  return { adapter, requests: stub.requests, sleeps };
}

/** Answers container creation with the given ids and status checks with `statuses` in order. */
function graphRoutes(containerIds: string[], statuses: Record<string, string[]> = {}) {
  const pendingIds = [...containerIds];
  return (request: RecordedRequest): Response => {
    const path = request.url.pathname;
    if (request.method === "POST" && path === "/v18.0/1784/media") {
      return jsonResponse({ id: pendingIds.shift() });
    }
    if (request.method === "POST" && path === "/v18.0/1784/media_publish") {
      return jsonResponse({ id: "m1" });
    }
    if (request.method === "GET" && path === "/v18.0/m1") {
      return jsonResponse({ permalink: "https://www.instagram.com/p/abc/" });
    }
    if (request.method === "GET") {
      const id = path.replace("/v18.0/", "");
      const queue = statuses[id];
      return jsonResponse({ status_code: queue?.shift() ?? "FINISHED" });
    }
    return noRoute(request);
  };
}

describe("InstagramAdapter", () => {
  it("publishes an image through a media container", async () => {
    const { adapter, requests } = adapterWith(graphRoutes(["c1"]));

    const receipt = await adapter.postImmediate(
      createPostDescriptor({
        text: "New mural",
        platform: "instagram",
        postType: "image",
        hashtags: ["art"],
        media: [{ source: "https://cdn.example/mural.jpg", kind: "image", altText: "Painted wall" }]
      })
    );

    expect(receipt).toEqual({ id: "m1", url: "https://www.instagram.com/p/abc/" });
    expect(formBody(requests[0])).toEqual({
      image_url: "https://cdn.example/mural.jpg",
      caption: "New mural\n\n#art",
      alt_text: "Painted wall",
      access_token: "test-token"
    });
    expect(formBody(requests[2])).toEqual({ creation_id: "c1", access_token: "test-token" });
  });

  it("waits while a reel container is processing", async () => {
    const { adapter, requests, sleeps } = adapterWith(graphRoutes(["c2"], { c2: ["IN_PROGRESS", "FINISHED"] }));

    await adapter.postImmediate(
      createPostDescriptor({
        text: "Reel",
        platform: "instagram",
        postType: "reel",
        media: [{ source: "https://cdn.example/reel.mp4", kind: "video" }]
      })
    );

    expect(formBody(requests[0])).toMatchObject({
      media_type: "REELS",
      video_url: "https://cdn.example/reel.mp4",
      share_to_feed: "true"
    });
    expect(sleeps).toEqual([5_000]);
  });

  it("builds carousels from child containers", async () => {
    const { adapter, requests } = adapterWith(graphRoutes(["ca", "cb", "cc"]));

    await adapter.postImmediate(
      createPostDescriptor({
        text: "Two views",
        platform: "instagram",
        postType: "carousel",
        media: [
          { source: "https://cdn.example/1.jpg", kind: "image" },
          { source: "https://cdn.example/2.jpg", kind: "image" }
        ]
      })
    );

    expect(formBody(requests[0])).toMatchObject({ image_url: "https://cdn.example/1.jpg", is_carousel_item: "true" });
    expect(formBody(requests[2])).toMatchObject({ media_type: "CAROUSEL", children: "ca,cb", caption: "Two views" });
  });

  it("fails when the container errors", async () => {
    const { adapter } = adapterWith(graphRoutes(["c3"], { c3: ["ERROR"] }));

    const publish = adapter.postImmediate(
      createPostDescriptor({
        text: "x",
        platform: "instagram",
        postType: "image",
        media: [{ source: "https://cdn.example/x.jpg", kind: "image" }]
      })
    );

    await expect(publish).rejects.toBeInstanceOf(MediaUploadError);
    await expect(publish).rejects.toThrow("Instagram container c3 error");
  });

  it("needs public media URLs", async () => {
    const { adapter, requests } = adapterWith(graphRoutes(["c4"]));

    await expect(
      adapter.postImmediate(
        createPostDescriptor({
          text: "x",
          platform: "instagram",
          postType: "image",
          media: [{ source: "/srv/media/x.jpg", kind: "image" }]
        })
      )
    ).rejects.toBeInstanceOf(MediaUploadError);
    expect(requests).toHaveLength(0);
  });

  it("rejects text posts", async () => {
    const { adapter } = adapterWith(noRoute);

    await expect(
      adapter.postImmediate(createPostDescriptor({ text: "just words", platform: "instagram" }))
    ).rejects.toBeInstanceOf(UnsupportedCapabilityError);
  });
});
