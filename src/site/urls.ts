import { SITE_URL } from "./site.ts";

/** Name used for a season whose URL doesn't follow the `/seasons/<slug>/` layout. */
export const UNKNOWN_SEASON = "unknown_anime";

const seasonPattern = /^https:\/\/web\.animerco\.org\/seasons\/([^/]+)\//;

// "-12-" inside a slug, or "-12" at the very end (optionally followed by the trailing slash WordPress adds)
const episodeNumberPattern = /-(\d+)(?:-|\/?$)/;

/**
 * @param url Any string
 * @returns if the url points at the one site we know how to scrape
 */
export function isSiteUrl(url: string) {
  return url.startsWith(SITE_URL);
}

/**
 * @param url A season page, such as `https://web.animerco.org/seasons/one-piece/`
 * @returns the season's slug, or {@link UNKNOWN_SEASON}
 */
export function seasonSlug(url: string) {
  return seasonPattern.exec(url)?.[1] ?? UNKNOWN_SEASON;
}

/**
 * @param url An episode page, such as `https://web.animerco.org/episodes/one-piece-episode-12/`
 * @returns the episode number in the URL, if it has one that fits in a safe integer
 */
export function extractEpisodeNumber(url: string) {
  const digits = episodeNumberPattern.exec(url)?.[1];
  if (digits === undefined) {
    return;
  }

  // Dates and ids slugged into the URL ("-20240115123456789") are not episode numbers
  const episode = Number.parseInt(digits, 10);
  return Number.isSafeInteger(episode) ? episode : undefined;
}
