import type { Fetcher } from "../site/site.ts";
import type { ImageHost } from "./image-host.ts";
import { describeError } from "../error-message.ts";
import pThrottle from "p-throttle";
import z from "zod";

/** Deadline for an upload. ImgBB fetches the image itself before answering, so it gets longer than a page load. */
const UPLOAD_TIMEOUT_MS = 15_000;

/** The API key ImgBB issues per account. */
export const imgbbEnvSchema = z
  .object({
    /* eslint-disable-next-line @typescript-eslint/naming-convention -- Matching identifier with environment variable */
    IMGBB_API_KEY: z.string().min(1),
  })
  .readonly();

/** Options for {@link ImgBB}. */
export type ImgBBOptions = Readonly<{
  /** Replaces the global fetch, for tests. */
  fetch?: Fetcher;
}>;

/**
 * Uploads images to {@link https://imgbb.com|ImgBB} by URL. See the {@link https://api.imgbb.com|API docs}.
 */
export class ImgBB implements ImageHost {
  /** Human-readable name for the host. */
  readonly name = "ImgBB" as const;

  /** Upload endpoint. */
  readonly api = new URL("https://api.imgbb.com/1/upload");

  readonly #key: string;

  readonly #fetch: Fetcher;

  /**
   * @param key An ImgBB API key
   * @param options How to reach ImgBB
   */
  constructor(key: string, { fetch = globalThis.fetch }: ImgBBOptions = {}) {
    this.#key = key;
    this.#fetch = fetch;
  }

  /**
   * @param imageUrl A publicly reachable image for ImgBB to copy
   * @returns the URL ImgBB serves the copy from, or undefined if the upload failed
   */
  async upload(imageUrl: URL) {
    let response;
    try {
      response = await this.#throttledUpload(imageUrl);
    } catch (error) {
      console.warn(`[${this.name}] Upload error: ${describeError(error)}`);
      return;
    }

    if (!response.ok) {
      console.warn(
        `[${this.name}] Upload failed: ${response.status.toString()} ${response.statusText}`,
      );
      return;
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      console.warn(
        `[${this.name}] Upload answered with invalid JSON: ${describeError(error)}`,
      );
      return;
    }

    const body = this.#imgbbResp.safeParse(json);
    if (!body.success) {
      console.warn(
        `[${this.name}] Unexpected upload response: ${z.prettifyError(body.error)}`,
      );
      return;
    }

    if (!body.data.success) {
      console.warn(`[${this.name}] Upload failed:`, json);
      return;
    }

    return new URL(body.data.data.url);
  }

  /**
   * Send at most one upload per second.
   * @param imageUrl The image to upload
   * @returns ImgBB's raw response
   */
  readonly #throttledUpload = pThrottle({
    limit: 1,
    interval: 1000,
    /* eslint-disable-next-line unicorn/consistent-function-scoping -- we never want to make unthrottled requests, so this arrow function must be defined within the throttle */
  })((imageUrl: URL) =>
    this.#fetch(this.api, {
      method: "POST",
      // Exactly two fields: the key and where to fetch the image from
      body: new URLSearchParams({ key: this.#key, image: imageUrl.href }),
      signal: AbortSignal.timeout(UPLOAD_TIMEOUT_MS),
    }),
  );

  /** ImgBB's answer to an upload. */
  readonly #imgbbResp = z
    .discriminatedUnion("success", [
      z.object({
        success: z.literal(true),
        data: z.object({ url: z.httpUrl() }),
      }),
      z.object({ success: z.literal(false) }),
    ])
    .readonly();
}
