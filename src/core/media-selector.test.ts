import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppDatabase, IN_MEMORY } from "./db.js";
import { NoMediaFoundError } from "./errors.js";
import { LibraryMediaPicker, matchMediaFilename, selectMedia } from "./media-selector.js";

describe("matchMediaFilename", () => {
  it("accepts <id>_<name>.mp4", () => {
    expect(matchMediaFilename("18_branded.mp4")).toEqual({ filename: "18_branded.mp4", id: "18", label: "branded" });
    expect(matchMediaFilename("1_beachview.mp4")).toEqual({ filename: "1_beachview.mp4", id: "1", label: "beachview" });
  });

  it("rejects other shapes", () => {
    expect(matchMediaFilename("branded_18.mp4")).toBeNull();
    expect(matchMediaFilename("18_branded.mov")).toBeNull();
    expect(matchMediaFilename("18_.mp4")).toBeNull();
  });
});

describe("selectMedia", () => {
  const library = ["notes.txt", "3_city.mp4", "1_beach.mp4", "2_forest.mp4"];

  it("picks among matching files only", () => {
    expect(selectMedia(library, { random: () => 0 })).toBe("3_city.mp4");
    expect(selectMedia(library, { random: () => 0.999 })).toBe("2_forest.mp4");
  });

  it("skips excluded ids while others remain", () => {
    expect(selectMedia(library, { random: () => 0, exclude: ["3"] })).toBe("1_beach.mp4");
    expect(selectMedia(library, { random: () => 0, exclude: ["1", "2", "3"] })).toBe("3_city.mp4");
  });

  it("reads names through nameOf", () => {
    const entries = [{ name: "5_studio.mp4", size: 10 }];
    expect(selectMedia(entries, { nameOf: (entry) => entry.name })).toEqual({ name: "5_studio.mp4", size: 10 });
  });

  it("throws when nothing matches", () => {
    expect(() => selectMedia(["intro.mov", "readme.md"])).toThrow(NoMediaFoundError);
  });
});

describe("LibraryMediaPicker", () => {
  let directory: string;
  let db: AppDatabase;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "media-library-"));
    db = new AppDatabase(IN_MEMORY);
  });

  afterEach(async () => {
    db.close();
    await rm(directory, { recursive: true, force: true });
  });

  it("avoids the most recently used video", async () => {
    await writeFile(path.join(directory, "7_sunset.mp4"), "");
    await writeFile(path.join(directory, "9_harbor.mp4"), "");
    await writeFile(path.join(directory, "notes.txt"), "");

    const picker = new LibraryMediaPicker(directory, db, { random: () => 0 });

    expect(await picker.pick()).toEqual({ source: path.join(directory, "7_sunset.mp4"), kind: "video" });
    expect(await picker.pick()).toEqual({ source: path.join(directory, "9_harbor.mp4"), kind: "video" });
    expect(db.recentMediaIdentifiers(5)).toEqual(["9", "7"]);
  });

  it("returns null when the library has no usable file", async () => {
    await writeFile(path.join(directory, "clip.mov"), "");

    expect(await new LibraryMediaPicker(directory, db).pick()).toBeNull();
  });

  it("returns null when the directory is missing", async () => {
    expect(await new LibraryMediaPicker(path.join(directory, "absent"), db).pick()).toBeNull();
  });
});
