import {
  ADMIN_AJAX_URL,
  DEFAULT_MAX_WORKERS,
  type Episode,
  type EpisodeReporter,
  type Episodes,
  type Fetcher,
  REQUEST_TIMEOUT_MS,
  type SeasonPage,
  USER_AGENT,
  silentReporter,
} from "./site.ts";
import { episodeLinks, postId } from "./season-page.ts";
import Bottleneck from "bottleneck";
import { LruCache } from "./lru-cache.ts";
import { describeError } from "../error-message.ts";
import { extractEpisodeNumber } from "./urls.ts";
import { load } from "cheerio";
import z from "zod";

/** How many episode pages to remember the post id of. */
const POST_ID_CACHE_SIZE = 128;

/** Options for {@link Animerco}. */
export type AnimercoOptions = Readonly<{
  /** Replaces the global fetch, for tests. */
  fetch?: Fetcher;
  /** The most episode pages to resolve at once. Defaults to {@link DEFAULT_MAX_WORKERS}. */
  maxWorkers?: number;
}>;

/**
 * Scrapes seasons and episode players from {@link https://web.animerco.org|Animerco}.
 *
 * Resolving an episode takes two requests: the episode page holds a hidden WordPress
 * post id, and the site's player AJAX endpoint turns that id into an embed URL.
 */
export class Animerco {
  /** Human-readable name for the site, used to prefix log lines. */
  readonly name = "Animerco" as const;

  /** The AJAX endpoint the site's own player calls. */
  readonly api = ADMIN_AJAX_URL;

  readonly #fetch: Fetcher;

  /** Caps how many episodes are being resolved at any moment. */
  readonly #limiter: Bottleneck;

  /** Post ids by episode page URL. Holds the pending lookup, so concurrent callers share one request. */
  readonly #postIds = new LruCache<string, Promise<string | undefined>>(
    POST_ID_CACHE_SIZE,
  );

  /**
   * @param options How to reach the site and how hard to hit it
   * @throws {RangeError} if maxWorkers isn't a positive integer
   */
  constructor({
    fetch = globalThis.fetch,
    maxWorkers = DEFAULT_MAX_WORKERS,
  }: AnimercoOptions = {}) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(
        `[${this.name}] maxWorkers must be a positive integer, got ${maxWorkers.toString()}`,
      );
    }

    this.#fetch = fetch;
    this.#limiter = new Bottleneck({ maxConcurrent: maxWorkers });
  }

  /**
   * @param url A season page on the site
   * @returns the loaded page
   * @throws {Error} if the request fails or the response isn't okay
   */
  async getSeasonPage(url: string): Promise<SeasonPage> {
    const pageURL = new URL(url);
    return { url: pageURL, $: await this.#getPage(pageURL) };
  }

  /**
   * Get the WordPress post id hidden in an episode page. Lookups are cached per URL.
   * @param episodeUrl An episode page on the site
   * @returns the post id, or undefined if the page couldn't be fetched or has none
   */
  getPostId(episodeUrl: string) {
    return this.#postIds.getOrCreate(episodeUrl, async (url) => {
      try {
        return postId(await this.#getPage(new URL(url)));
      } catch (error) {
        console.warn(describeError(error));
        return undefined;
      }
    });
  }

  /**
   * Ask the site's player endpoint for an episode's embed.
   * @param episodeUrl An episode page on the site
   * @returns the raw body of the AJAX response, or undefined if it couldn't be retrieved
   */
  async getEpisodeEmbed(episodeUrl: string) {
    const post = await this.getPostId(episodeUrl);

    if (!post) {
      console.warn(`[${this.name}] Could not find postid for ${episodeUrl}`);
      return;
    }

    let response;
    try {
      response = await this.#fetch(this.api, {
        method: "POST",
        // The endpoint only answers requests that look like they came from the player script on the episode page
        /* eslint-disable @typescript-eslint/naming-convention -- HTTP headers can't be camelcase */
        headers: {
          "User-Agent": USER_AGENT,
          accept: "*/*",
          "accept-language": "en,en-GB;q=0.9,en-US;q=0.8",
          "content-type": "application/x-www-form-urlencoded; charset=UTF-8",
          "sec-fetch-dest": "empty",
          "sec-fetch-mode": "cors",
          "sec-fetch-site": "same-origin",
          "x-requested-with": "XMLHttpRequest",
          Referer: episodeUrl,
        },
        /* eslint-enable @typescript-eslint/naming-convention -- done with HTTP headers */
        body: new URLSearchParams({
          action: "player_ajax",
          post,
          // The first server in the player's list
          nume: "1",
          type: "tv",
        }),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (error) {
      console.warn(
        `[${this.name}] Failed to get embed for ${episodeUrl}: ${describeError(error)}`,
      );
      return;
    }

    if (!response.ok) {
      console.warn(
        `[${this.name}] Failed to get embed for ${episodeUrl}: ${response.status.toString()} ${response.statusText}`,
      );
      return;
    }

    return await response.text();
  }

  /**
   * Resolve one episode page into an {@link Episode}.
   * @param link An episode page on the site
   * @param position Where the link sits in the season's list, starting at 1. Used as the
   * episode number when the URL doesn't carry one.
   * @returns the episode, or undefined if any step failed
   */
  async resolveEpisode(
    link: string,
    position: number,
  ): Promise<Episode | undefined> {
    const episode = extractEpisodeNumber(link) ?? position;

    const embed = await this.getEpisodeEmbed(link);
    if (embed === undefined) {
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(embed);
    } catch {
      console.warn(
        `[${this.name}] Failed to parse JSON for episode ${episode.toString()}`,
      );
      return;
    }

    const player = this.#playerResp.safeParse(json);
    if (!player.success) {
      console.warn(
        `[${this.name}] Unexpected player response for episode ${episode.toString()}: ${z.prettifyError(player.error)}`,
      );
      return;
    }

    const { embedUrl, type } = player.data;
    if (!embedUrl) {
      console.warn(
        `[${this.name}] No embed URL for episode ${episode.toString()}`,
      );
      return;
    }

    // Some players come back protocol-relative ("//host/...")
    const embedURL = URL.canParse(embedUrl, link)
      ? new URL(embedUrl, link)
      : undefined;
    if (
      embedURL === undefined ||
      !["http:", "https:"].includes(embedURL.protocol)
    ) {
      console.warn(
        `[${this.name}] Embed URL for episode ${episode.toString()} is not a web address: ${embedUrl}`,
      );
      return;
    }

    return { episode, pageURL: new URL(link), embedURL, type };
  }

  /**
   * Resolve every episode listed on a season page, a few at a time.
   * @param page The season page
   * @param reporter Told how many episodes there are and when each one settles
   * @returns every episode that resolved, keyed by episode number. When two links claim
   * the same number, the one listed first wins.
   */
  async getEpisodes(
    page: SeasonPage,
    reporter: EpisodeReporter = silentReporter,
  ): Promise<Episodes> {
    const { links, rawCount } = episodeLinks(page);
    reporter.found(links.length, rawCount);

    const resolved = await Promise.all(
      links.map(async (link, index) => {
        let episode;
        try {
          episode = await this.#limiter.schedule(() =>
            this.resolveEpisode(link, index + 1),
          );
        } catch (error) {
          console.warn(
            `[${this.name}] Error processing ${link}: ${describeError(error)}`,
          );
        }
        reporter.settled(link, episode);
        return episode;
      }),
    );

    const episodes: Record<string, Episode> = {};
    for (const episode of resolved) {
      if (episode === undefined) {
        continue;
      }

      const key = episode.episode.toString();
      const claimed = episodes[key];
      if (claimed) {
        console.warn(
          `[${this.name}] ${episode.pageURL.href} is also episode ${key}, keeping ${claimed.pageURL.href}`,
        );
        continue;
      }
      episodes[key] = episode;
    }

    return episodes;
  }

  /**
   * @param url The page to fetch
   * @returns the loaded page
   * @throws {Error} if the request fails or the response isn't okay
   */
  async #getPage(url: URL) {
    let response;
    try {
      response = await this.#fetch(url, {
        /* eslint-disable-next-line @typescript-eslint/naming-convention -- "User-Agent" is a specific header */
        headers: { "User-Agent": USER_AGENT },
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (error) {
      throw new Error(`[${this.name}] Failed to retrieve page ${url.href}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new Error(
        `[${this.name}] Failed to retrieve page ${url.href}: ${response.status.toString()} ${response.statusText}`,
      );
    }

    return load(await response.text());
  }

  /** The player endpoint's answer. Either field may be missing when the episode has no player. */
  readonly #playerResp = z
    .object({
      /* eslint-disable @typescript-eslint/naming-convention -- this is the site's response, I don't name it */
      embed_url: z.string().nullish(),
      type: z.string().nullish(),
      /* eslint-enable @typescript-eslint/naming-convention -- done with the site's response */
    })
    .transform(({ embed_url, type }) => ({
      embedUrl: embed_url ?? undefined,
      type: type ?? undefined,
    }))
    .readonly();
}
