import { consoleReporter, progressBarReporter } from "./reporters.ts";
import { Animerco } from "./site/animerco.ts";
import type { ImageHost } from "./image-host/image-host.ts";
import { ImgBB, imgbbEnvSchema } from "./image-host/imgbb.ts";
import { SeasonCache } from "./cache/season-cache.ts";
import { createCliInterface } from "./cli-interface.ts";
import { describeError } from "./error-message.ts";
import { loadLinks } from "./links-file.ts";
import path from "node:path";
import process from "node:process";
import { scrapeAll } from "./scrape.ts";
import shuffle from "knuth-shuffle-seeded";
import z from "zod";

const MS_PER_HOUR = 60 * 60 * 1000;

const cliArguments = createCliInterface().parse().opts();

let imageHost: ImageHost | undefined;
{
  const imgbbEnvironment = imgbbEnvSchema.safeParse(process.env);

  if (imgbbEnvironment.success) {
    imageHost = new ImgBB(imgbbEnvironment.data.IMGBB_API_KEY);
  } else {
    console.warn(
      "Skipping background image uploads as required env variables are not defined:",
    );
    console.warn(z.prettifyError(imgbbEnvironment.error));
  }
}

let links = await loadLinks(cliArguments.links).catch((error: unknown) => {
  console.error(describeError(error));
  process.exit(1);
});

// If any testing flags are provided, filter the links down
if (cliArguments.testLessTitles) {
  const seed =
    typeof cliArguments.testLessTitles === "number"
      ? cliArguments.testLessTitles
      : Math.floor(Math.random() * Number.MAX_SAFE_INTEGER);

  console.log(`[--test-less-titles] seed: ${seed.toString()}`);

  // Take 10% (but at least 1 element)
  const PERCENTAGE = 0.1;
  links = shuffle([...links], seed).slice(
    0,
    Math.max(1, links.length * PERCENTAGE),
  );
} else if (cliArguments.testTitle) {
  const substrings = cliArguments.testTitle;
  links = links.filter((link) =>
    substrings.some((substring) => link.includes(substring)),
  );
  console.log(`[--test-title] Only scraping ${links.join(", ")}`);
}

if (links.length === 0) {
  console.log(`No anime links found in '${cliArguments.links}'.`);
  process.exit(0);
}

const site = new Animerco({ maxWorkers: cliArguments.workers });
const cache = new SeasonCache(
  path.resolve(cliArguments.cacheDir),
  cliArguments.maxAgeHours * MS_PER_HOUR,
);
// A progress bar only makes sense on a terminal; piped output gets one line per episode
const reporter =
  cliArguments.progress && process.stdout.isTTY
    ? progressBarReporter
    : consoleReporter;

const tally = await scrapeAll(links, {
  site,
  cache,
  imageHost,
  force: cliArguments.force,
  reporter,
});

console.log(); // newline
console.log(
  `Saved ${tally.saved.toString()}, reused ${tally.cached.toString()} cached, failed ${(tally.failed + tally["invalid-url"]).toString()} of ${links.length.toString()} seasons in ${cache.directory}`,
);
