/**
 * A service that re-hosts images, so the cache doesn't point at the site's own (hotlink protected) files.
 */
export type ImageHost = Readonly<{
  /** A user-friendly name of the host. */
  name: string;
  /** The URL uploads are sent to. */
  api: URL;
  /**
   * @param imageUrl Where the host should fetch the image from
   * @returns where the host now serves the image, or undefined if the upload failed
   */
  upload(imageUrl: URL): Promise<URL | undefined>;
}>;
