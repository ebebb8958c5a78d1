/**
 * A Map that forgets its least recently used entry once it holds more than `capacity` entries.
 * Values can't be undefined, so a miss is never confused with a stored value.
 */
export class LruCache<Key, Value extends NonNullable<unknown>> {
  /** Entries, least recently used first. A Map iterates in insertion order, so re-inserting marks an entry as used. */
  readonly #entries = new Map<Key, Value>();

  /** The most entries this cache will hold. */
  readonly capacity: number;

  /**
   * @param capacity The most entries to hold at once, at least 1
   * @throws {RangeError} if capacity isn't a positive integer
   */
  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `LruCache capacity must be a positive integer, got ${capacity.toString()}`,
      );
    }
    this.capacity = capacity;
  }

  /** How many entries the cache currently holds. */
  get size() {
    return this.#entries.size;
  }

  /**
   * @param key The key to look up
   * @returns the cached value, marking it as recently used
   */
  get(key: Key) {
    const value = this.#entries.get(key);
    if (value !== undefined) {
      this.#entries.delete(key);
      this.#entries.set(key, value);
    }
    return value;
  }

  /**
   * @param key The key to store under
   * @param value The value to store
   */
  set(key: Key, value: Value) {
    this.#entries.delete(key);
    this.#entries.set(key, value);

    for (const oldest of this.#entries.keys()) {
      if (this.#entries.size <= this.capacity) {
        break;
      }
      this.#entries.delete(oldest);
    }
  }

  /**
   * Look up `key`, creating and caching the value with `create` on a miss.
   * @param key The key to look up
   * @param create Builds the value when it isn't cached
   * @returns the cached or newly created value
   */
  getOrCreate(key: Key, create: (key: Key) => Value) {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = create(key);
    this.set(key, value);
    return value;
  }
}
