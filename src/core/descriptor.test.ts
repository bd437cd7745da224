import { describe, expect, it } from "vitest";
import { composePostText, createPostDescriptor, normalizeHashtags, toTextOnly } from "./descriptor.js";
import { PostValidationError } from "./errors.js";

describe("createPostDescriptor", () => {
  it("normalizes text, hashtags and the scheduled time", () => {
    const descriptor = createPostDescriptor({
      text: "  Open house this weekend  ",
      platform: "linkedin",
      hashtags: ["#RealEstate", "realestate", " ##Open "],
      scheduledAt: "2026-05-01T09:30:00+02:00"
    });

    expect(descriptor).toEqual({
      text: "Open house this weekend",
      platform: "linkedin",
      postType: "text",
      media: [],
      hashtags: ["RealEstate", "Open"],
      scheduledAt: "2026-05-01T07:30:00.000Z"
    });
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.media)).toBe(true);
  });

  it("requires media for media post types", () => {
    expect(() => createPostDescriptor({ text: "hi", platform: "twitter", postType: "carousel" })).toThrow(
      "A carousel post requires at least one media item"
    );
  });

  it("rejects media on text posts", () => {
    expect(() =>
      createPostDescriptor({
        text: "hi",
        platform: "twitter",
        media: [{ source: "https://cdn.example/a.jpg", kind: "image" }]
      })
    ).toThrow(PostValidationError);
  });

  it("requires a video first for reels", () => {
    expect(() =>
      createPostDescriptor({
        text: "hi",
        platform: "facebook",
        postType: "reel",
        media: [{ source: "https://cdn.example/a.jpg", kind: "image" }]
      })
    ).toThrow("A reel post requires a video as its first media item");
  });

  it("rejects posts with neither text nor media", () => {
    expect(() => createPostDescriptor({ text: "   ", platform: "mastodon" })).toThrow("Post text must not be empty");
  });

  it("rejects non-http links and unparseable times", () => {
    expect(() => createPostDescriptor({ text: "hi", platform: "twitter", link: "ftp://files.example" })).toThrow(
      "Link must use http or https: ftp://files.example"
    );
    expect(() => createPostDescriptor({ text: "hi", platform: "twitter", scheduledAt: "next tuesday" })).toThrow(
      "Invalid scheduled time: next tuesday"
    );
  });

  it("drops blank alt text", () => {
    const descriptor = createPostDescriptor({
      text: "",
      platform: "mastodon",
      postType: "image",
      media: [{ source: " /srv/media/a.png ", kind: "image", altText: null }]
    });

    expect(descriptor.media).toEqual([{ source: "/srv/media/a.png", kind: "image" }]);
  });
});

describe("normalizeHashtags", () => {
  it("strips leading hashes and de-duplicates case-insensitively", () => {
    expect(normalizeHashtags(["#Tacos", "#tacos", "", "#", "Lunch"])).toEqual(["Tacos", "Lunch"]);
  });
});

describe("composePostText", () => {
  const descriptor = createPostDescriptor({
    text: "New menu",
    platform: "mastodon",
    hashtags: ["food", "spring"],
    link: "https://menu.example/spring"
  });

  it("joins text, hashtags and link with blank lines", () => {
    expect(composePostText(descriptor)).toBe("New menu\n\n#food #spring\n\nhttps://menu.example/spring");
  });

  it("can leave the link out", () => {
    expect(composePostText(descriptor, { includeLink: false })).toBe("New menu\n\n#food #spring");
  });
});

describe("toTextOnly", () => {
  it("keeps everything but the media", () => {
    const descriptor = createPostDescriptor({
      text: "Gallery",
      platform: "twitter",
      postType: "image",
      hashtags: ["art"],
      media: [{ source: "https://cdn.example/a.jpg", kind: "image" }],
      scheduledAt: "2026-05-01T07:30:00.000Z"
    });

    expect(toTextOnly(descriptor)).toEqual({
      text: "Gallery",
      platform: "twitter",
      postType: "text",
      media: [],
      hashtags: ["art"],
      scheduledAt: "2026-05-01T07:30:00.000Z"
    });
  });
});
