import type { Episodes, SeasonInfo } from "../site/site.ts";
import { P, match } from "ts-pattern";
import z from "zod";

/**
 * Everything we know about one season. The contents of a cache file.
 */
export type SeasonRecord = Readonly<{
  /** The season page this record was scraped from. */
  baseURL: URL;
  /** The season's poster art, re-hosted. Missing when there was none or the upload failed. */
  imageURL?: URL | undefined;
  /** Genres and synopsis. */
  info?: SeasonInfo | undefined;
  /** Every episode that resolved. */
  episodes: Episodes;
}>;

// Other tools read these files, so the keys, nulls and snake_case stay as they are.

/**
 * Any http(s) address. Players are often served from bare IPs or single-label hosts,
 * which `z.httpUrl()` turns away.
 */
const webUrlSchema = z.url({ protocol: /^https?$/ });

/* eslint-disable @typescript-eslint/naming-convention -- the file's keys, I don't name them */
const fileEpisodeSchema = z.object({
  episode: z.int().nonnegative(),
  page_url: webUrlSchema,
  embed_url: webUrlSchema,
  type: z.string().nullable(),
});

const fileInfoSchema = z.union([
  z.object({
    genres: z.array(z.object({ text: z.string() })),
    content: z.string().nullable(),
  }),
  z.object({ error: z.string() }),
]);

const fileRecordSchema = z
  .object({
    success: z.literal(true),
    base_url: z.httpUrl(),
    imgUrl: z.httpUrl().nullable(),
    info: fileInfoSchema.nullable(),
    episodes: z.record(z.string(), fileEpisodeSchema),
  })
  .refine(
    ({ episodes }) =>
      Object.entries(episodes).every(
        ([key, episode]) => key === episode.episode.toString(),
      ),
    { message: "Every episode must be keyed by its own episode number" },
  );
/* eslint-enable @typescript-eslint/naming-convention -- done with the file's keys */

const episodeSchema = z.object({
  episode: z.int().nonnegative(),
  pageURL: z.instanceof(URL),
  embedURL: z.instanceof(URL),
  type: z.string().optional(),
});

const seasonInfoSchema = z.union([
  z.object({
    genres: z.array(z.object({ text: z.string() }).readonly()),
    content: z.string().optional(),
  }),
  z.object({ error: z.string() }),
]);

const seasonRecordShape = z.object({
  baseURL: z.instanceof(URL),
  imageURL: z.instanceof(URL).optional(),
  info: seasonInfoSchema.optional(),
  episodes: z.record(z.string(), episodeSchema.readonly()),
}) satisfies z.ZodType<SeasonRecord>;

/**
 * Converts between a cache file's JSON and a {@link SeasonRecord}. Decode what was read from
 * disk, encode what is about to be written.
 */
export const seasonRecordSchema = z.codec(fileRecordSchema, seasonRecordShape, {
  decode: (file) => ({
    baseURL: new URL(file.base_url),
    imageURL: file.imgUrl === null ? undefined : new URL(file.imgUrl),
    info: match(file.info)
      .with(P.nullish, () => undefined)
      .with({ error: P.string }, ({ error }) => ({ error }))
      .with({ genres: P.array() }, ({ genres, content }) => ({
        genres,
        content: content ?? undefined,
      }))
      .exhaustive(),
    episodes: Object.fromEntries(
      Object.entries(file.episodes).map(([key, episode]) => [
        key,
        {
          episode: episode.episode,
          pageURL: new URL(episode.page_url),
          embedURL: new URL(episode.embed_url),
          type: episode.type ?? undefined,
        },
      ]),
    ),
  }),
  encode: (record) => ({
    success: true as const,
    base_url: record.baseURL.href,
    // eslint-disable-next-line unicorn/no-null -- the file format uses null for missing values
    imgUrl: record.imageURL?.href ?? null,
    info: match(record.info)
      // eslint-disable-next-line unicorn/no-null -- the file format uses null for missing values
      .with(P.nullish, () => null)
      .with({ error: P.string }, ({ error }) => ({ error }))
      .with({ genres: P.array() }, ({ genres, content }) => ({
        genres,
        // eslint-disable-next-line unicorn/no-null -- the file format uses null for missing values
        content: content ?? null,
      }))
      .exhaustive(),
    episodes: Object.fromEntries(
      Object.entries(record.episodes).map(([key, episode]) => [
        key,
        {
          episode: episode.episode,
          page_url: episode.pageURL.href,
          embed_url: episode.embedURL.href,
          // eslint-disable-next-line unicorn/no-null -- the file format uses null for missing values
          type: episode.type ?? null,
        },
      ]),
    ),
  }),
});
