import { readdir } from "node:fs/promises";
import path from "node:path";
import { logger } from "../config/logger.js";
import { AppDatabase } from "./db.js";
import { NoMediaFoundError, errorMessage } from "./errors.js";
import type { MediaItem } from "./types.js";

/** `<numeric id>_<descriptor>.mp4`, nothing else. */
export const MEDIA_FILENAME_PATTERN = /^(\d+)_(.+)\.mp4$/;

export interface MediaFilenameMatch {
  filename: string;
  id: string;
  label: string;
}

export function matchMediaFilename(filename: string): MediaFilenameMatch | null {
  const match = MEDIA_FILENAME_PATTERN.exec(filename);
  if (!match) {
    return null;
  }

  return { filename, id: match[1], label: match[2] };
}

export interface SelectMediaOptions<T> {
  nameOf?: (entry: T) => string;
  /** Identifiers (numeric ids) to avoid when something else matches. */
  exclude?: Iterable<string>;
  random?: () => number;
}

/**
 * Picks one library entry whose name matches the filename pattern, uniformly
 * at random. Excluded ids are skipped unless nothing else is left.
 */
export function selectMedia<T>(library: readonly T[], options: SelectMediaOptions<T> = {}): T {
  const nameOf = options.nameOf ?? ((entry: T) => String(entry));
  const random = options.random ?? Math.random;
  const excluded = new Set(options.exclude ?? []);

  const matches = library.flatMap((entry) => {
    const match = matchMediaFilename(nameOf(entry));
    return match ? [{ entry, id: match.id }] : [];
  });

  if (matches.length === 0) {
    throw new NoMediaFoundError("No library file matches <id>_<name>.mp4");
  }

  const fresh = matches.filter((candidate) => !excluded.has(candidate.id));
  const pool = fresh.length > 0 ? fresh : matches;
  const index = Math.min(Math.floor(random() * pool.length), pool.length - 1);

  return pool[index].entry;
}

export interface LibraryPickerOptions {
  /** How many recent picks to avoid. */
  recentExclude?: number;
  random?: () => number;
  now?: () => Date;
}

/**
 * Video picker over a directory. The listing is read once; picks are
 * remembered in the store so later runs avoid repeating them.
 */
export class LibraryMediaPicker {
  private readonly log = logger.child({ module: "core/media-selector" });
  private listing: string[] | null = null;

  constructor(
    private readonly directory: string,
    private readonly db: AppDatabase,
    private readonly options: LibraryPickerOptions = {}
  ) {}

  private async files(): Promise<string[]> {
    if (this.listing === null) {
      const entries = await readdir(this.directory, { withFileTypes: true });
      this.listing = entries.filter((entry) => entry.isFile()).map((entry) => entry.name).sort();
    }

    return this.listing;
  }

  /** Returns a video item, or null when the library has nothing usable. */
  async pick(): Promise<MediaItem | null> {
    let files: string[];
    try {
      files = await this.files();
    } catch (error) {
      this.log.warn({ directory: this.directory, error: errorMessage(error) }, "Media library is not readable");
      return null;
    }

    const recent = this.db.recentMediaIdentifiers(this.options.recentExclude ?? 5);

    let filename: string;
    try {
      filename = selectMedia(files, { exclude: recent, random: this.options.random });
    } catch (error) {
      if (error instanceof NoMediaFoundError) {
        this.log.warn({ directory: this.directory }, "No matching video in media library");
        return null;
      }
      throw error;
    }

    const match = matchMediaFilename(filename);
    if (match) {
      this.db.recordMediaUse(match.id, (this.options.now ?? (() => new Date()))());
    }

    this.log.info({ filename }, "Picked library video");
    return { source: path.join(this.directory, filename), kind: "video" };
  }
}
