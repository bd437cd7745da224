import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadBatchFile, parseBatchInput } from "./batch-input.js";
import { PostValidationError } from "./errors.js";

describe("parseBatchInput", () => {
  it("builds descriptors from snake_case entries", async () => {
    const [item] = await parseBatchInput([
      {
        text: "Gallery night",
        platform: "facebook",
        post_type: "carousel",
        media: [
          { url: "https://cdn.example/1.jpg", type: "image", alt_text: "Front room" },
          { url: "https://cdn.example/2.jpg", kind: "image", alt_text: null }
        ],
        hashtags: ["#art"],
        link: "",
        scheduled_time: "2026-07-01T18:00:00Z"
      }
    ]);

    expect(item).toEqual({
      index: 0,
      descriptor: {
        text: "Gallery night",
        platform: "facebook",
        postType: "carousel",
        media: [
          { source: "https://cdn.example/1.jpg", kind: "image", altText: "Front room" },
          { source: "https://cdn.example/2.jpg", kind: "image" }
        ],
        hashtags: ["art"],
        scheduledAt: "2026-07-01T18:00:00.000Z"
      }
    });
  });

  it("reports a media entry without a kind", async () => {
    const [item] = await parseBatchInput([
      { text: "x", platform: "twitter", post_type: "image", media: [{ url: "https://cdn.example/1.jpg" }] }
    ]);

    expect(item).toEqual({
      index: 0,
      platform: "twitter",
      error: { kind: "PostValidationError", message: "Invalid batch entry: media.0: media entry needs kind (or type)" }
    });
  });

  it("fills video posts without media from the library", async () => {
    const pickLibraryMedia = vi.fn().mockResolvedValue({ source: "/srv/library/4_tour.mp4", kind: "video" });

    const [item] = await parseBatchInput([{ text: "Tour", platform: "instagram", post_type: "reel" }], {
      pickLibraryMedia
    });

    expect(pickLibraryMedia).toHaveBeenCalledTimes(1);
    expect(item?.descriptor?.postType).toBe("reel");
    expect(item?.descriptor?.media).toEqual([{ source: "/srv/library/4_tour.mp4", kind: "video" }]);
  });

  it("posts text when the library has nothing", async () => {
    const [item] = await parseBatchInput([{ text: "Tour", platform: "twitter", post_type: "video" }], {
      pickLibraryMedia: async () => null
    });

    expect(item?.descriptor?.postType).toBe("text");
    expect(item?.descriptor?.media).toEqual([]);
  });

  it("keeps going after a bad entry", async () => {
    const items = await parseBatchInput(["not an object", { text: "fine", platform: "mastodon" }]);

    expect(items[0]).toMatchObject({ index: 0, platform: null, error: { kind: "PostValidationError" } });
    expect(items[1]?.descriptor?.text).toBe("fine");
  });

  it("rejects input that is not a list", async () => {
    await expect(parseBatchInput({ text: "x" })).rejects.toThrow("Batch input must be a JSON array of posts");
  });
});

describe("loadBatchFile", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "batch-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("parses the file as JSON", async () => {
    const file = path.join(directory, "posts.json");
    await writeFile(file, '[{"text":"hi","platform":"twitter"}]');

    expect(await loadBatchFile(file)).toEqual([{ text: "hi", platform: "twitter" }]);
  });

  it("wraps unreadable and invalid files", async () => {
    const file = path.join(directory, "broken.json");
    await writeFile(file, "[{");

    await expect(loadBatchFile(file)).rejects.toThrow(`Batch file ${file} is not valid JSON`);
    await expect(loadBatchFile(path.join(directory, "absent.json"))).rejects.toBeInstanceOf(PostValidationError);
  });
});
