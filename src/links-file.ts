import JSON5 from "json5";
import { readFile } from "node:fs/promises";
import z from "zod";

/** The file the season URLs are read from when no other is given. */
export const DEFAULT_LINKS_FILE = "all_anime_links.json";

/** A list of season pages to scrape. */
const linksFileSchema = z
  .object({
    /* eslint-disable-next-line @typescript-eslint/naming-convention -- existing file format */
    anime_links: z.array(z.string()).default([]),
  })
  .transform(({ anime_links }) =>
    anime_links.map((link) => link.trim()).filter((link) => link !== ""),
  )
  .readonly();

/**
 * Read the season pages to scrape. The file is parsed as JSON5, so comments and trailing
 * commas are fine.
 * @param file Path to a file shaped like `{ "anime_links": ["https://..."] }`
 * @returns the links, trimmed, without blank entries
 * @throws {Error} if the file is missing, isn't valid JSON, or isn't shaped like a links file
 */
export async function loadLinks(file: string) {
  let text;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new Error(`Error: The file '${file}' was not found.`, {
        cause: error,
      });
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON5.parse(text);
  } catch (error) {
    throw new Error(
      `Error: Failed to decode JSON from '${file}'. Please ensure it's a valid JSON file.`,
      { cause: error },
    );
  }

  const links = linksFileSchema.safeParse(json);
  if (!links.success) {
    throw new Error(
      `Error: '${file}' is not a links file:\n${z.prettifyError(links.error)}`,
    );
  }

  return links.data;
}
