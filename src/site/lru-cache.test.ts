import { suite, test } from "node:test";
import { LruCache } from "./lru-cache.ts";
import assert from "node:assert/strict";

suite("LRU cache", () => {
  test("Holds at most its capacity, dropping the oldest entry", () => {
    const cache = new LruCache<string, number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.set("c", 3);

    assert.equal(cache.size, 2);
    assert.equal(cache.get("a"), undefined);
    assert.equal(cache.get("b"), 2);
    assert.equal(cache.get("c"), 3);
  });

  test("Reading an entry keeps it around", () => {
    const cache = new LruCache<string, number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    // "a" is now the most recently used, so "b" goes next
    cache.get("a");
    cache.set("c", 3);

    assert.equal(cache.get("a"), 1);
    assert.equal(cache.get("b"), undefined);
  });

  test("Overwriting an entry doesn't grow the cache", () => {
    const cache = new LruCache<string, number>(2);
    cache.set("a", 1);
    cache.set("a", 10);

    assert.equal(cache.size, 1);
    assert.equal(cache.get("a"), 10);
  });

  test("getOrCreate only creates on a miss", () => {
    const cache = new LruCache<string, number>(4);
    let created = 0;
    const create = (key: string) => {
      created += 1;
      return key.length;
    };

    assert.equal(cache.getOrCreate("four", create), 4);
    assert.equal(cache.getOrCreate("four", create), 4);
    assert.equal(created, 1);
  });

  test("Capacity must be a positive integer", () => {
    assert.throws(() => new LruCache<string, number>(0), RangeError);
    assert.throws(() => new LruCache<string, number>(1.5), RangeError);
  });
});
