import {
  type EpisodeReporter,
  SITE_URL,
  type SeasonPage,
  silentReporter,
} from "./site/site.ts";
import { backgroundImageSource, seasonInfo } from "./site/season-page.ts";
import type { Animerco } from "./site/animerco.ts";
import type { ImageHost } from "./image-host/image-host.ts";
import type { SeasonCache } from "./cache/season-cache.ts";
import { describeError } from "./error-message.ts";
import { isSiteUrl } from "./site/urls.ts";

/** What happened to one season. */
export type ScrapeOutcome = "invalid-url" | "cached" | "failed" | "saved";

/** Everything {@link scrapeAndSave} talks to. */
export type ScrapeContext = Readonly<{
  site: Animerco;
  cache: SeasonCache;
  /** Where to re-host the season's poster. Without one, no image is stored. */
  imageHost?: ImageHost | undefined;
  /** Scrape even when the cache file is fresh. */
  force?: boolean | undefined;
  /** Builds the reporter told about a season's episodes as they resolve. */
  reporter?: ((baseUrl: string) => EpisodeReporter) | undefined;
  /** The clock, in epoch milliseconds. */
  now?: (() => number) | undefined;
}>;

/** How many seasons ended each way. */
export type ScrapeTally = Record<ScrapeOutcome, number>;

/** Everything {@link scrapeAll} needs on top of what each season needs. */
export type ScrapeAllContext = ScrapeContext &
  Readonly<{
    /** Pause between seasons, to be a good citizen towards the site. */
    pauseMs?: number | undefined;
    /** How to wait out the pause. */
    pause?: ((milliseconds: number) => Promise<void>) | undefined;
  }>;

/** Default for {@link ScrapeAllContext.pauseMs}. */
export const PAUSE_BETWEEN_SEASONS_MS = 1000;

const MS_PER_HOUR = 60 * 60 * 1000;
const MS_PER_SECOND = 1000;

/**
 * Scrape seasons one after the other, pausing between them. A season that throws is logged
 * and counted as failed, and the rest still run.
 * @param links Season pages, in the order to scrape them
 * @param context The site, cache and image host to use, and the pause between seasons
 * @returns how many seasons ended each way
 */
export async function scrapeAll(
  links: readonly string[],
  {
    pauseMs = PAUSE_BETWEEN_SEASONS_MS,
    pause = sleep,
    ...context
  }: ScrapeAllContext,
): Promise<ScrapeTally> {
  const tally: ScrapeTally = {
    saved: 0,
    cached: 0,
    failed: 0,
    "invalid-url": 0,
  };

  for (const [index, link] of links.entries()) {
    if (index > 0) {
      await pause(pauseMs);
    }

    try {
      tally[await scrapeAndSave(link, context)] += 1;
    } catch (error) {
      console.error(
        `An unexpected error occurred while scraping ${link}: ${describeError(error)}`,
      );
      tally.failed += 1;
    }
  }

  return tally;
}

/**
 * Scrape one season's episodes, poster and info, and store them in its cache file.
 * Skips the season when its cache file is younger than the cache's maximum age.
 * @param baseUrl The season page
 * @param context The site, cache and image host to use
 * @returns what happened. A failure to store the result is thrown instead.
 */
export async function scrapeAndSave(
  baseUrl: string,
  {
    site,
    cache,
    imageHost,
    force = false,
    reporter = () => silentReporter,
    now = Date.now,
  }: ScrapeContext,
): Promise<ScrapeOutcome> {
  if (!isSiteUrl(baseUrl)) {
    console.error(
      `Error: Invalid URL - ${baseUrl}. Only URLs from ${SITE_URL} are supported`,
    );
    return "invalid-url";
  }

  const file = cache.fileFor(baseUrl);

  if (!force) {
    const freshness = await cache.freshness(file, now());
    if (freshness.state === "fresh") {
      console.log(
        `Using cached data from ${file} (age: ${(freshness.ageMs / MS_PER_HOUR).toFixed(1)} hours)`,
      );
      return "cached";
    }
  }

  console.log(`Scraping data for: ${baseUrl}`);
  const startedAt = now();

  let page;
  try {
    page = await site.getSeasonPage(baseUrl);
  } catch (error) {
    console.warn(describeError(error));
    console.error(`Error: Failed to fetch episodes for ${baseUrl}`);
    return "failed";
  }

  const [episodes, imageURL] = await Promise.all([
    site.getEpisodes(page, reporter(baseUrl)),
    rehostBackground(page, imageHost),
  ]);

  await cache.write(file, {
    baseURL: page.url,
    imageURL,
    info: seasonInfo(page.$),
    episodes,
  });

  const elapsedSeconds = (now() - startedAt) / MS_PER_SECOND;
  console.log(
    `Successfully scraped and saved data for ${baseUrl} to ${file}`,
  );
  console.log(`Process completed in ${elapsedSeconds.toFixed(2)} seconds`);
  return "saved";
}

/**
 * @param page The season page
 * @param imageHost Where to upload the poster
 * @returns the re-hosted poster, if the page has one and the upload worked
 */
async function rehostBackground(
  page: SeasonPage,
  imageHost: ImageHost | undefined,
) {
  const source = backgroundImageSource(page);
  if (source === undefined || imageHost === undefined) {
    return;
  }

  return await imageHost.upload(source);
}

/**
 * @param milliseconds How long to wait
 */
async function sleep(milliseconds: number) {
  await new Promise((resolve) => setTimeout(resolve, milliseconds));
}
