import {
  Command,
  InvalidArgumentError,
  Option,
} from "@commander-js/extra-typings";
import { DEFAULT_LINKS_FILE } from "./links-file.ts";
import { DEFAULT_MAX_WORKERS } from "./site/site.ts";

/** Default for --max-age-hours: refresh a season at most once a day. */
const DEFAULT_MAX_AGE_HOURS = 24;

/**
 * @returns a fresh command line parser. Each parse needs its own, since commander keeps state.
 */
export function createCliInterface() {
  return new Command()
    .name("animerco-cache")
    .description(
      "Scrape every season listed in the links file and cache its episodes as JSON, one file per season.",
    )
    .addOption(
      new Option(
        "-l, --links <file>",
        'A JSON file shaped like { "anime_links": ["https://web.animerco.org/seasons/..."] }',
      ).default(DEFAULT_LINKS_FILE),
    )
    .addOption(
      new Option(
        "-c, --cache-dir <directory>",
        "Where to write one JSON file per season",
      ).default("cache"),
    )
    .addOption(
      new Option(
        "-w, --workers <count>",
        "How many episode pages to resolve at the same time",
      )
        .argParser(parseArgumentToPositiveInt)
        .default(DEFAULT_MAX_WORKERS),
    )
    .addOption(
      new Option(
        "--max-age-hours <hours>",
        "Reuse a season's cache file while it is younger than this",
      )
        .argParser(parseArgumentToPositiveNumber)
        .default(DEFAULT_MAX_AGE_HOURS),
    )
    .addOption(
      new Option("-f, --force", "Scrape every season, even fresh ones").default(
        false,
      ),
    )
    .addOption(
      new Option(
        "--no-progress",
        "Print a line per resolved episode instead of a progress bar",
      ),
    )
    .addOption(
      new Option(
        "--test-less-titles [seed]",
        "Internal testing flag. Only scrape a random 10% of the links. Optionally takes a seed to scrape the same links again, assuming the links file hasn't changed.",
      )
        .argParser(parseArgumentToInt)
        .default(false)
        .hideHelp()
        .conflicts(["testTitle"]),
    )
    .addOption(
      new Option(
        "--test-title <substrings...>",
        "Internal testing flag. Only scrape links which contain any of the substrings provided here.",
      )
        .hideHelp()
        .conflicts(["testLessTitles"]),
    );
}

/**
 * @param input A CLI argument to be parsed into a number
 * @returns parsed value
 * @throws {InvalidArgumentError} if the input is not a number
 */
function parseArgumentToInt(input: string): number {
  const parsedValue = Number.parseInt(input);
  if (Number.isNaN(parsedValue)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsedValue;
}

/**
 * @param input A CLI argument to be parsed into a whole number above zero
 * @returns parsed value
 * @throws {InvalidArgumentError} if the input is not a positive integer
 */
function parseArgumentToPositiveInt(input: string): number {
  const parsedValue = Number(input);
  if (!Number.isInteger(parsedValue) || parsedValue < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsedValue;
}

/**
 * @param input A CLI argument to be parsed into a number above zero
 * @returns parsed value
 * @throws {InvalidArgumentError} if the input is not a positive number
 */
function parseArgumentToPositiveNumber(input: string): number {
  const parsedValue = Number(input);
  if (!Number.isFinite(parsedValue) || parsedValue <= 0) {
    throw new InvalidArgumentError("Not a positive number.");
  }
  return parsedValue;
}
