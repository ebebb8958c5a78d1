import type { Genre, SeasonInfo, SeasonPage } from "./site.ts";
import type { CheerioAPI } from "cheerio";

// Selectors match the site's WordPress theme. If the theme changes, these are what breaks.

/**
 * @param page A loaded season page
 * @returns every episode page linked from the season as an absolute URL, in page order
 * without duplicates, alongside how many links the page had before de-duplication
 */
export function episodeLinks({ url, $ }: SeasonPage) {
  const hrefs = $(".episodes-lists a[href]")
    .toArray()
    .map((anchor) => anchor.attribs["href"])
    .filter((href) => href !== undefined)
    .filter((href) => URL.canParse(href, url))
    .map((href) => new URL(href, url).href);

  // A Set keeps insertion order, so the first occurrence of a link decides its position
  const unique = [...new Set(hrefs)];

  return { links: unique, rawCount: hrefs.length };
}

/**
 * @param page A loaded season page
 * @returns the URL of the season's poster art, if the page has one
 */
export function backgroundImageSource({ url, $ }: SeasonPage) {
  // The image is lazy loaded, so the real source sits in data-src
  const source = $("div.anime-card.player a.image").first().attr("data-src");
  return source !== undefined && URL.canParse(source, url)
    ? new URL(source, url)
    : undefined;
}

/**
 * @param $ A loaded season page
 * @returns the season's genres and synopsis
 */
export function seasonInfo($: CheerioAPI): SeasonInfo {
  const mediaBox = $("div.media-box").first();
  if (mediaBox.length === 0) {
    return { error: "media-box not found" };
  }

  const genres = mediaBox
    .find("div.genres")
    .first()
    .find("a")
    .map((_index, anchor): Genre => ({ text: $(anchor).text().trim() }))
    .toArray();

  const paragraph = mediaBox.find("div.content").first().find("p").first();

  return {
    genres,
    content: paragraph.length > 0 ? paragraph.text().trim() : undefined,
  };
}

/**
 * @param $ A loaded episode page
 * @returns the WordPress post id the player AJAX call needs, if the page has one
 */
export function postId($: CheerioAPI) {
  return $('input[type="hidden"][name="postid"]').first().attr("value");
}
