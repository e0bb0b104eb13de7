import { InvalidArgumentError } from "./errors.js";
import type { CacheItemInterface, FetchResult, ItemFetcher, Ttl } from "./types.js";
import { durationToMs, isDuration, validateTag } from "./utils.js";

/**
 * Where the item's stored state comes from.
 * - unresolved: nothing read yet, `fetch` runs on first access
 * - loading: a fetch is in flight, concurrent readers share it
 * - resolved: stored state has been applied (or there was none to load)
 */
type LoadState =
  | { status: "unresolved"; fetch: ItemFetcher }
  | { status: "loading"; promise: Promise<void> }
  | { status: "resolved" };

const RESOLVED: LoadState = { status: "resolved" };

/**
 * A single cache entry handed out by FileCachePool.
 *
 * Items obtained from the pool load their stored state lazily: value, hit
 * state, expiration and previous tags are read from storage the first time
 * one of them is needed, and never again for the same instance once the read
 * succeeds. A failed read is not remembered: the next access fetches again.
 */
export class CacheItem implements CacheItemInterface {
  private readonly key: string;
  private value: unknown = null;
  private hasValue = false;
  private expiration: number | null = null;
  private tags = new Set<string>();
  private previousTags: string[] = [];
  private state: LoadState;

  // Caller decisions that a later fetch must not overwrite
  private valueSet = false;
  private expirationSet = false;

  /**
   * @param fetch Loader for the stored state. Without one the item is an
   * empty miss.
   */
  constructor(key: string, fetch?: ItemFetcher) {
    this.key = key;
    this.state = fetch ? { status: "unresolved", fetch } : RESOLVED;
  }

  getKey(): string {
    return this.key;
  }

  /**
   * Replace the value and mark the item as a hit. Value, hit state and
   * expiration from storage no longer apply to this item.
   */
  set(value: unknown): this {
    this.value = value;
    this.hasValue = true;
    this.valueSet = true;
    return this;
  }

  /**
   * @returns The value, or null when the item is not a hit
   */
  async get<T = unknown>(): Promise<T | null> {
    if (!(await this.isHit())) {
      return null;
    }
    return this.value as T;
  }

  async isHit(): Promise<boolean> {
    await this.resolve();
    if (!this.hasValue) {
      return false;
    }
    return this.expiration === null || this.expiration > Date.now();
  }

  /**
   * Expire at an absolute time: a Date, epoch milliseconds, or null for never.
   */
  expiresAt(expiration: Date | number | null): this {
    if (expiration === null) {
      this.expiration = null;
    } else if (expiration instanceof Date) {
      const time = expiration.getTime();
      if (Number.isNaN(time)) {
        throw new InvalidArgumentError("Cache item expiresAt received an invalid Date.");
      }
      this.expiration = time;
    } else if (Number.isInteger(expiration)) {
      this.expiration = expiration;
    } else {
      throw new InvalidArgumentError(
        "Cache item ttl/expiresAt must be an integer timestamp in milliseconds or a Date.",
      );
    }
    this.expirationSet = true;
    return this;
  }

  /**
   * Expire after a number of seconds or a Duration. null means never.
   */
  expiresAfter(time: Ttl): this {
    if (time === null) {
      this.expiration = null;
    } else if (typeof time === "number") {
      if (!Number.isInteger(time)) {
        throw new InvalidArgumentError("Cache item ttl/expiresAfter must be an integer number of seconds.");
      }
      this.expiration = Date.now() + time * 1000;
    } else if (isDuration(time)) {
      this.expiration = Date.now() + durationToMs(time);
    } else {
      throw new InvalidArgumentError(
        "Cache item ttl/expiresAfter must be an integer number of seconds or a Duration.",
      );
    }
    this.expirationSet = true;
    return this;
  }

  async getExpirationTimestamp(): Promise<number | null> {
    await this.resolve();
    return this.expiration;
  }

  /**
   * Tags added in this session, not yet persisted
   */
  getTags(): string[] {
    return [...this.tags];
  }

  /**
   * Replace the current tags. Duplicates collapse.
   */
  setTags(tags: Iterable<string>): this {
    const next = new Set<string>();
    for (const tag of tags) {
      if (next.has(tag)) continue;
      validateTag(tag);
      next.add(tag);
    }
    this.tags = next;
    return this;
  }

  /**
   * Tags the item carried in storage when it was fetched
   */
  async getPreviousTags(): Promise<string[]> {
    await this.resolve();
    return [...this.previousTags];
  }

  /**
   * Make this item look freshly fetched: current tags become previous tags.
   * @internal
   */
  moveCurrentTagsToPrevious(): void {
    this.previousTags = [...this.tags];
    this.tags = new Set();
  }

  /**
   * A resolved copy that carries no pending fetch.
   * @internal
   */
  async snapshot(): Promise<CacheItem> {
    await this.resolve();
    const copy = new CacheItem(this.key);
    copy.value = this.value;
    copy.hasValue = this.hasValue;
    copy.expiration = this.expiration;
    copy.tags = new Set(this.tags);
    copy.previousTags = [...this.previousTags];
    copy.valueSet = this.valueSet;
    copy.expirationSet = this.expirationSet;
    return copy;
  }

  private resolve(): Promise<void> {
    const state = this.state;
    if (state.status === "resolved") return Promise.resolve();
    if (state.status === "loading") return state.promise;

    const promise = state.fetch().then(
      (result) => {
        this.apply(result);
        this.state = RESOLVED;
      },
      (err: unknown) => {
        // Allow the next access to retry
        this.state = state;
        throw err;
      },
    );
    this.state = { status: "loading", promise };
    return promise;
  }

  private apply([hit, value, tags, expiresAt]: FetchResult): void {
    this.previousTags = [...new Set(tags)];
    if (this.valueSet) return;
    this.hasValue = hit;
    this.value = value;
    if (!this.expirationSet) {
      this.expiration = expiresAt;
    }
  }
}
