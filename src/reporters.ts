import { Presets, SingleBar } from "cli-progress";
import type { EpisodeReporter } from "./site/site.ts";
import { seasonSlug } from "./site/urls.ts";

/**
 * @param baseUrl The season being scraped
 * @param log Where lines go
 * @returns a reporter that prints one line per resolved episode
 */
export function consoleReporter(
  baseUrl: string,
  log: (line: string) => void = console.log,
): EpisodeReporter {
  return {
    found: (total, rawCount) => {
      log(
        `Found ${rawCount.toString()} total links, ${total.toString()} unique links for ${baseUrl}`,
      );
    },
    settled: (_link, episode) => {
      if (episode) {
        log(
          `Found embed URL for episode ${episode.episode.toString()}: ${episode.embedURL.href}`,
        );
      }
    },
  };
}

/** The parts of a cli-progress bar a reporter drives. */
export type ProgressBar = Pick<SingleBar, "start" | "increment">;

/**
 * @param baseUrl The season being scraped
 * @param progressBar The bar to drive. Defaults to one drawn on stderr.
 * @returns a reporter that draws a progress bar over the season's episodes
 */
export function progressBarReporter(
  baseUrl: string,
  progressBar: ProgressBar = seasonProgressBar(baseUrl),
): EpisodeReporter {
  return {
    found: (total, rawCount) => {
      console.log(
        `Found ${rawCount.toString()} total links, ${total.toString()} unique links for ${baseUrl}`,
      );
      // An empty bar never completes, so it would never stop
      if (total > 0) {
        progressBar.start(total, 0, { episode: "-" });
      }
    },
    settled: (link, episode) => {
      progressBar.increment({
        episode: episode ? `#${episode.episode.toString()}` : `failed ${link}`,
      });
    },
  };
}

/**
 * Warnings printed while the bar is drawn finish the line of its last frame, and the bar
 * carries on below them.
 * @param baseUrl The season being scraped
 * @returns a bar labelled with the season's slug
 */
function seasonProgressBar(baseUrl: string) {
  return new SingleBar(
    {
      format: `${seasonSlug(baseUrl)} {bar} {percentage}% | ETA: {eta}s | {value}/{total} | Last: {episode}`,
      stopOnComplete: true,
      clearOnComplete: true,
      hideCursor: true,
      gracefulExit: true,
    },
    Presets.shades_grey,
  );
}
