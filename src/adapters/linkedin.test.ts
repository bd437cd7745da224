import { describe, expect, it } from "vitest";
import { createPostDescriptor } from "../core/descriptor.js";
import { NotFoundError, UnsupportedCapabilityError } from "../core/errors.js";
import { jsonBody, jsonResponse, noRoute, stubFetch, type RecordedRequest } from "../testing/fetch-stub.js";
import { LinkedInAdapter, escapeLittleText, linkedInCommentary } from "./linkedin.js";

const credentials = {
  accessToken: "test-token",
  authorUrn: "urn:li:organization:42",
  apiBaseUrl: "https://api.linkedin.test",
  apiVersion: "202405"
};

function adapterWith(handler: (request: RecordedRequest) => Response) {
  const stub = stubFetch(handler);
  return { adapter: new LinkedInAdapter(credentials, { fetchImpl: stub.fetchImpl }), requests: stub.requests };
}

describe("linkedInCommentary", () => {
  it("escapes reserved characters", () => {
    expect(escapeLittleText("Q&A (live) @noon #1")).toBe("Q&A \\(live\\) \\@noon \\#1");
  });

  it("renders hashtags as templates and appends the link", () => {
    const descriptor = createPostDescriptor({
      text: "Hiring",
      platform: "linkedin",
      hashtags: ["jobs"],
      link: "https://careers.example/open_roles"
    });

    expect(linkedInCommentary(descriptor)).toBe(
      "Hiring\n\n{hashtag|\\#|jobs}\n\nhttps://careers.example/open\\_roles"
    );
  });
});

describe("LinkedInAdapter", () => {
  it("creates a post and reads its urn from the response header", async () => {
    const { adapter, requests } = adapterWith((request) =>
      request.url.pathname === "/rest/posts"
        ? new Response(null, { status: 201, headers: { "x-restli-id": "urn:li:share:7001" } })
        : noRoute(request)
    );

    const receipt = await adapter.postImmediate(createPostDescriptor({ text: "Hello", platform: "linkedin" }));

    expect(receipt).toEqual({
      id: "urn:li:share:7001",
      url: "https://www.linkedin.com/feed/update/urn:li:share:7001/"
    });
    expect(requests[0]?.headers).toMatchObject({
      authorization: "Bearer test-token",
      "linkedin-version": "202405",
      "x-restli-protocol-version": "2.0.0"
    });
    expect(jsonBody(requests[0])).toMatchObject({
      author: "urn:li:organization:42",
      commentary: "Hello",
      visibility: "PUBLIC",
      lifecycleState: "PUBLISHED"
    });
  });

  it("uploads an image before posting", async () => {
    const { adapter, requests } = adapterWith((request) => {
      switch (`${request.method} ${request.url.hostname}${request.url.pathname}`) {
        case "GET cdn.example/team.png":
          return new Response(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 1, 2, 3, 4]));
        case "POST api.linkedin.test/rest/images":
          return jsonResponse({
            value: { uploadUrl: "https://upload.linkedin.test/img/1", image: "urn:li:image:C4D" }
          });
        case "PUT upload.linkedin.test/img/1":
          return new Response(null, { status: 201 });
        case "POST api.linkedin.test/rest/posts":
          return new Response(null, { status: 201, headers: { "x-restli-id": "urn:li:share:7002" } });
        default:
          return noRoute(request);
      }
    });

    await adapter.postImmediate(
      createPostDescriptor({
        text: "Team day",
        platform: "linkedin",
        postType: "image",
        media: [{ source: "https://cdn.example/team.png", kind: "image", altText: "The team" }]
      })
    );

    expect(requests[2]?.headers["content-type"]).toBe("image/png");
    expect(jsonBody(requests[3])).toMatchObject({
      content: { media: { id: "urn:li:image:C4D", altText: "The team" } }
    });
  });

  it("accepts images only in multi-media posts", async () => {
    const { adapter } = adapterWith(noRoute);

    await expect(
      adapter.postImmediate(
        createPostDescriptor({
          text: "Mixed",
          platform: "linkedin",
          postType: "carousel",
          media: [
            { source: "https://cdn.example/a.png", kind: "image" },
            { source: "https://cdn.example/b.mp4", kind: "video" }
          ]
        })
      )
    ).rejects.toBeInstanceOf(UnsupportedCapabilityError);
  });

  it("deletes by encoded urn", async () => {
    const { adapter, requests } = adapterWith(() => jsonResponse({ message: "Not Found" }, 404));

    await expect(adapter.deletePost("urn:li:share:7001")).rejects.toBeInstanceOf(NotFoundError);
    expect(requests[0]?.url.pathname).toBe("/rest/posts/urn%3Ali%3Ashare%3A7001");
  });
});
