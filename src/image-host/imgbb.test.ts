import { FakeFetch, formBody } from "../testing/fake-fetch.ts";
import { ImgBB, imgbbEnvSchema } from "./imgbb.ts";
import { afterEach, beforeEach, mock, suite, test } from "node:test";
import assert from "node:assert/strict";

const UPLOAD_URL = "https://api.imgbb.com/1/upload";
const COVER = new URL(
  "https://web.animerco.org/wp-content/uploads/test-show-cover.jpg",
);

suite("ImgBB", () => {
  /** Every console.warn made during the current test. */
  let warnings: unknown[][];

  beforeEach(() => {
    warnings = [];
    mock.method(console, "warn", (...data: unknown[]) => {
      warnings.push(data);
    });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  test("Uploads by URL with the key and the image as form fields", async () => {
    const fake = new FakeFetch().on(
      UPLOAD_URL,
      JSON.stringify({
        success: true,
        status: 200,
        data: { id: "abc123", url: "https://i.ibb.co/abc123/test-show-cover.jpg" },
      }),
    );
    const imgbb = new ImgBB("test-secret", { fetch: fake.fetch });

    const hosted = await imgbb.upload(COVER);

    assert.equal(hosted?.href, "https://i.ibb.co/abc123/test-show-cover.jpg");

    const [upload] = fake.requestsTo(UPLOAD_URL);
    assert.ok(upload);
    assert.equal(upload.method, "POST");
    assert.deepEqual([...formBody(upload).entries()], [
      ["key", "test-secret"],
      ["image", COVER.href],
    ]);
  });

  test("An unsuccessful upload yields no URL", async () => {
    const answer = { success: false, error: { message: "Invalid API v1 key." } };
    const fake = new FakeFetch().on(UPLOAD_URL, JSON.stringify(answer));
    const imgbb = new ImgBB("test-secret", { fetch: fake.fetch });

    assert.equal(await imgbb.upload(COVER), undefined);
    assert.deepEqual(warnings, [["[ImgBB] Upload failed:", answer]]);
  });

  test("An error status yields no URL", async () => {
    const fake = new FakeFetch().on(
      UPLOAD_URL,
      () => new Response("{}", { status: 400, statusText: "Bad Request" }),
    );
    const imgbb = new ImgBB("test-secret", { fetch: fake.fetch });

    assert.equal(await imgbb.upload(COVER), undefined);
    assert.deepEqual(warnings, [["[ImgBB] Upload failed: 400 Bad Request"]]);
  });

  test("A response that isn't JSON yields no URL", async () => {
    const fake = new FakeFetch().on(UPLOAD_URL, "<html>maintenance</html>");
    const imgbb = new ImgBB("test-secret", { fetch: fake.fetch });

    assert.equal(await imgbb.upload(COVER), undefined);
    assert.equal(warnings.length, 1);
  });

  test("A network failure yields no URL", async () => {
    const fake = new FakeFetch().on(UPLOAD_URL, () => {
      throw new TypeError("fetch failed");
    });
    const imgbb = new ImgBB("test-secret", { fetch: fake.fetch });

    assert.equal(await imgbb.upload(COVER), undefined);
    assert.deepEqual(warnings, [["[ImgBB] Upload error: fetch failed"]]);
  });

  test("Uploads are at least a second apart", async () => {
    const sentAt: number[] = [];
    const fake = new FakeFetch().on(UPLOAD_URL, () => {
      sentAt.push(performance.now());
      return new Response(
        JSON.stringify({
          success: true,
          data: { url: "https://i.ibb.co/abc123/test-show-cover.jpg" },
        }),
      );
    });
    const imgbb = new ImgBB("test-secret", { fetch: fake.fetch });

    const hosted = await Promise.all([imgbb.upload(COVER), imgbb.upload(COVER)]);

    assert.deepEqual(
      hosted.map((url) => url?.href),
      [
        "https://i.ibb.co/abc123/test-show-cover.jpg",
        "https://i.ibb.co/abc123/test-show-cover.jpg",
      ],
    );
    const [first, second] = sentAt;
    assert.ok(first !== undefined && second !== undefined);
    assert.ok(second - first >= 950);
  });

  test("The API key comes from the environment", () => {
    assert.equal(
      imgbbEnvSchema.safeParse({ IMGBB_API_KEY: "test-secret" }).success,
      true,
    );
    assert.equal(imgbbEnvSchema.safeParse({}).success, false);
    assert.equal(imgbbEnvSchema.safeParse({ IMGBB_API_KEY: "" }).success, false);
  });
});
