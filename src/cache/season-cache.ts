import { type SeasonRecord, seasonRecordSchema } from "./season-record.ts";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { seasonSlug } from "../site/urls.ts";

/** Scraped seasons are refreshed at most once a day. */
export const ONE_DAY_MS = 24 * 60 * 60 * 1000;

/** How old a cache file is, relative to the cache's maximum age. */
export type Freshness =
  | Readonly<{ state: "missing" }>
  | Readonly<{ state: "stale" | "fresh"; ageMs: number }>;

/**
 * Make a string safe to use as a file name: spaces become underscores, and anything that
 * isn't a letter, digit, underscore or hyphen is dropped.
 * @param name The string to clean
 * @returns the cleaned string
 */
export function sanitizeFilename(name: string) {
  return name.replaceAll(" ", "_").replaceAll(/[^\p{L}\p{N}_-]/gu, "");
}

/**
 * One JSON file per season in a directory. Files are only ever replaced whole.
 */
export class SeasonCache {
  /** Where the files live. Created on the first write. */
  readonly directory: string;

  /** Files younger than this are fresh. */
  readonly maxAgeMs: number;

  /**
   * @param directory Where to keep the files
   * @param maxAgeMs How long a file stays fresh, one day by default
   */
  constructor(directory: string, maxAgeMs = ONE_DAY_MS) {
    this.directory = directory;
    this.maxAgeMs = maxAgeMs;
  }

  /**
   * @param baseUrl A season page
   * @returns the cache file for that season
   */
  fileFor(baseUrl: string) {
    return path.join(
      this.directory,
      `${sanitizeFilename(seasonSlug(baseUrl))}.json`,
    );
  }

  /**
   * @param file A cache file
   * @param now The current time in epoch milliseconds
   * @returns whether the file exists, and if so whether it is young enough to reuse
   * @throws {Error} if the file exists but can't be inspected
   */
  async freshness(file: string, now = Date.now()): Promise<Freshness> {
    let stats;
    try {
      stats = await stat(file);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return { state: "missing" };
      }
      throw error;
    }

    const ageMs = now - stats.mtimeMs;
    return { state: ageMs < this.maxAgeMs ? "fresh" : "stale", ageMs };
  }

  /**
   * @param file A cache file
   * @returns the season stored in it
   * @throws {Error} if the file can't be read or doesn't hold a season
   */
  async read(file: string) {
    const text = await readFile(file, "utf8");
    return seasonRecordSchema.parse(JSON.parse(text));
  }

  /**
   * Replace a cache file with a new season.
   * @param file A cache file
   * @param record The season to store
   */
  async write(file: string, record: SeasonRecord) {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(
      file,
      JSON.stringify(seasonRecordSchema.encode(record), undefined, 2),
    );
  }
}
