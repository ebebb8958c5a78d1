import type { CheerioAPI } from "cheerio";

/** Every page we scrape lives under this origin. */
export const SITE_URL = "https://web.animerco.org/";

/** WordPress endpoint that answers the player's AJAX calls. */
export const ADMIN_AJAX_URL = new URL("/wp-admin/admin-ajax.php", SITE_URL);

/** The site serves a stripped down page to unknown user agents, so we pose as a desktop browser. */
export const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36";

/** Deadline for every request made to the site. */
export const REQUEST_TIMEOUT_MS = 10_000;

/** How many episode pages may be resolved at the same time. */
export const DEFAULT_MAX_WORKERS = 10;

/** Anything with the shape of the global `fetch`, so tests can swap in a fake. */
export type Fetcher = (
  input: URL | string,
  init?: RequestInit,
) => Promise<Response>;

/**
 * An episode with a resolved video player.
 */
export type Episode = Readonly<{
  /** Episode number, taken from the page URL or from its position in the list. */
  episode: number;
  /** The episode page on the site. */
  pageURL: URL;
  /** The third-party video player for this episode. */
  embedURL: URL;
  /** The kind of embed the site reported, typically "iframe". */
  type?: string | undefined;
}>;

/** Episodes keyed by their episode number, as a string. */
export type Episodes = Readonly<Record<string, Episode>>;

/** A season page, loaded and ready to query. */
export type SeasonPage = Readonly<{
  /** Where the page was fetched from, to resolve relative links against. */
  url: URL;
  /** The parsed page. */
  $: CheerioAPI;
}>;

/** A genre tag on a season page. */
export type Genre = Readonly<{
  text: string;
}>;

/**
 * The descriptive part of a season page, or why it couldn't be read.
 */
export type SeasonInfo =
  | Readonly<{
      genres: Genre[];
      /** The synopsis, when the page has one. */
      content?: string | undefined;
    }>
  | Readonly<{ error: string }>;

/**
 * Receives progress while the episodes of one season are resolved.
 */
export type EpisodeReporter = Readonly<{
  /** Called once, with the number of unique episode links about to be resolved. */
  found(total: number, rawCount: number): void;
  /** Called for each link as soon as it has been resolved or given up on. */
  settled(link: string, episode: Episode | undefined): void;
}>;

/** A reporter that drops everything. */
export const silentReporter: EpisodeReporter = {
  found: () => {},
  settled: () => {},
};
