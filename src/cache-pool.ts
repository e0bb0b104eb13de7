import { pino, type Logger } from "pino";
import { CacheItem } from "./cache-item.js";
import { CachePoolError, InvalidArgumentError, StorageError } from "./errors.js";
import { LocalFileSystem, type StorageAdapter } from "./local-file-system.js";
import { decodeItem, encodeItem, type StoredItem } from "./record.js";
import { v8Serializer, type Serializer } from "./serializer.js";
import { TagIndex } from "./tag-index.js";
import {
  DEFAULT_OPTIONS,
  type CacheItemInterface,
  type CachePoolOptions,
  type FetchResult,
} from "./types.js";
import { isExpired, resolveFilePath, tagListName, validateKey, validateTag } from "./utils.js";

const MISS: FetchResult = [false, null, [], null];

/**
 * FileCachePool - a persistent key/value cache over a plain file store.
 *
 * Features:
 * - One file per item under a configurable folder
 * - Tags with bulk invalidation, backed by one key list per tag
 * - Deferred writes, visible to reads on this pool before commit()
 * - TTL support with lazy expiration on read
 * - Corrupt or unreadable records degrade to cache misses
 */
export class FileCachePool {
  private readonly storage: StorageAdapter;
  private readonly serializer: Serializer;
  private readonly logger: Logger;
  private readonly tags: TagIndex;
  private folder: string;
  private initialized = false;
  private closed = false;

  /** Pending items by key, committed in insertion order */
  private deferred = new Map<string, CacheItem>();

  constructor(options: CachePoolOptions = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    this.folder = opts.folder;
    this.storage = opts.storage ?? new LocalFileSystem(opts.dir);
    this.serializer = opts.serializer ?? v8Serializer;
    this.logger = opts.logger ?? pino({ name: "tagged-file-cache", enabled: false });
    this.tags = new TagIndex(this.storage, this.serializer, () => this.folder);
  }

  /**
   * Create the cache folder on first use
   */
  private async init(): Promise<void> {
    if (this.initialized) return;
    await this.storage.createDirectory(this.folder);
    this.initialized = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new CachePoolError("Cache pool is closed");
    }
  }

  /**
   * Switch the folder used by later operations
   */
  setFolder(folder: string): void {
    this.folder = folder;
    this.initialized = false;
  }

  /**
   * Get an item. Nothing is read until the item's state is first needed.
   * Deferred items are returned as copies that look freshly fetched.
   */
  async getItem(key: string): Promise<CacheItem> {
    this.assertOpen();
    this.checkKey(key, "getItem");
    return this.loadItem(key);
  }

  /**
   * Get one item per key, in key order
   */
  async getItems(keys: readonly string[]): Promise<CacheItem[]> {
    this.assertOpen();
    for (const key of keys) {
      this.checkKey(key, "getItems");
    }
    return Promise.all(keys.map((key) => this.loadItem(key)));
  }

  async hasItem(key: string): Promise<boolean> {
    const item = await this.getItem(key);
    return item.isHit();
  }

  /**
   * Drop deferred items and remove every record and tag list
   */
  async clear(): Promise<boolean> {
    this.assertOpen();
    this.deferred.clear();

    try {
      await this.storage.deleteDirectory(this.folder);
      await this.storage.createDirectory(this.folder);
      this.initialized = true;
      return true;
    } catch (err) {
      return this.report(err, "clear");
    }
  }

  async deleteItem(key: string): Promise<boolean> {
    return this.deleteItems([key]);
  }

  /**
   * Delete items and their tag memberships. Missing keys are not an error.
   */
  async deleteItems(keys: readonly string[]): Promise<boolean> {
    this.assertOpen();
    for (const key of keys) {
      this.checkKey(key, "deleteItems");
    }

    let deleted = true;
    for (const key of keys) {
      this.deferred.delete(key);
      // Commit first so tag changes of other deferred items are on disk
      // before this key's memberships are cleaned up
      await this.commit();

      try {
        await this.init();
        await this.removeTagEntries(new CacheItem(key, () => this.fetchItem(key)));
        await this.storage.delete(this.getFilePath(key));
      } catch (err) {
        this.report(err, "deleteItems");
        deleted = false;
      }
    }
    return deleted;
  }

  /**
   * Persist an item. An item whose expiration has passed is deleted instead.
   *
   * The record is encoded before any tag list changes. New memberships are
   * added before the write and stale ones dropped after it, so a failed save
   * leaves the stored record reachable through every tag it carries.
   * @returns false when storage failed (the failure is logged)
   */
  async save(item: CacheItemInterface): Promise<boolean> {
    this.assertOpen();
    const own = this.checkItem(item, "save");

    try {
      await this.init();

      const expiresAt = await own.getExpirationTimestamp();
      if (isExpired(expiresAt)) {
        await this.removeTagEntries(own);
        return await this.deleteItem(own.getKey());
      }

      const file = this.getFilePath(own.getKey());
      const data = encodeItem(this.serializer, [await own.get(), own.getTags(), expiresAt]);
      const previous = new Set(await own.getPreviousTags());
      const current = new Set(own.getTags());

      for (const tag of current) {
        if (!previous.has(tag)) {
          await this.tags.appendListItem(tagListName(tag), own.getKey());
        }
      }
      await this.storage.write(file, data);
      for (const tag of previous) {
        if (!current.has(tag)) {
          await this.tags.removeListItem(tagListName(tag), own.getKey());
        }
      }
      return true;
    } catch (err) {
      return this.report(err, "save");
    }
  }

  /**
   * Queue an item for the next commit(). Storage is not touched.
   */
  async saveDeferred(item: CacheItemInterface): Promise<boolean> {
    this.assertOpen();
    const own = this.checkItem(item, "saveDeferred");
    this.checkKey(own.getKey(), "saveDeferred");
    this.deferred.set(own.getKey(), own);
    return true;
  }

  /**
   * Save every deferred item in insertion order. The queue is emptied even
   * when some saves fail.
   * @returns true if every save succeeded
   */
  async commit(): Promise<boolean> {
    this.assertOpen();
    const pending = [...this.deferred.values()];
    this.deferred.clear();

    let saved = true;
    for (const item of pending) {
      if (!(await this.save(item))) {
        saved = false;
      }
    }
    return saved;
  }

  async invalidateTag(tag: string): Promise<boolean> {
    return this.invalidateTags([tag]);
  }

  /**
   * Delete every item carrying any of the tags, then the tag lists
   * themselves. Lists are kept when a delete fails so a retry finds the
   * remaining members.
   */
  async invalidateTags(tags: readonly string[]): Promise<boolean> {
    this.assertOpen();
    for (const tag of tags) {
      this.checkTag(tag);
    }

    // Deferred members must be in the lists before they are read
    await this.commit();

    const keys: string[] = [];
    try {
      await this.init();
      for (const tag of tags) {
        keys.push(...(await this.tags.getList(tagListName(tag))));
      }
    } catch (err) {
      return this.fail(err, "invalidateTags");
    }

    const success = await this.deleteItems(keys);
    if (!success) {
      return false;
    }

    try {
      for (const tag of tags) {
        await this.tags.removeList(tagListName(tag));
      }
      return true;
    } catch (err) {
      return this.report(err, "invalidateTags");
    }
  }

  /**
   * Commit deferred items and close the pool.
   * After closing, all operations will throw.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    await this.commit();
    this.closed = true;
  }

  private async loadItem(key: string): Promise<CacheItem> {
    const pending = this.deferred.get(key);
    if (pending) {
      try {
        const copy = await pending.snapshot();
        copy.moveCurrentTagsToPrevious();
        return copy;
      } catch (err) {
        return this.fail(err, "getItem");
      }
    }

    return new CacheItem(key, () =>
      this.fetchItem(key).catch((err: unknown) => this.fail(err, "getItem")),
    );
  }

  /**
   * Read a record. Unreadable or corrupt records are misses; expired ones are
   * evicted together with their tag memberships.
   */
  private async fetchItem(key: string): Promise<FetchResult> {
    const file = this.getFilePath(key);

    let record: StoredItem;
    try {
      record = decodeItem(this.serializer, await this.storage.read(file), file);
    } catch (err) {
      if (!(err instanceof StorageError && err.code === "ENOENT")) {
        this.logger.debug({ err, key }, "Discarding unreadable cache record");
      }
      return MISS;
    }

    const [value, tags, expiresAt] = record;
    if (isExpired(expiresAt)) {
      for (const tag of tags) {
        await this.tags.removeListItem(tagListName(tag), key);
      }
      await this.storage.delete(file);
      return MISS;
    }

    return [true, value, tags, expiresAt];
  }

  private async removeTagEntries(item: CacheItem): Promise<void> {
    for (const tag of await item.getPreviousTags()) {
      await this.tags.removeListItem(tagListName(tag), item.getKey());
    }
  }

  private getFilePath(key: string): string {
    return resolveFilePath(this.folder, key);
  }

  private checkKey(key: string, operation: string): void {
    try {
      validateKey(key);
    } catch (err) {
      this.fail(err, operation);
    }
  }

  private checkTag(tag: string): void {
    try {
      validateTag(tag);
    } catch (err) {
      this.fail(err, "invalidateTags");
    }
  }

  private checkItem(item: CacheItemInterface, operation: string): CacheItem {
    if (!(item instanceof CacheItem)) {
      this.fail(
        new InvalidArgumentError(
          "Cache items are not transferable between pools. Item MUST be a CacheItem.",
        ),
        operation,
      );
    }
    return item;
  }

  /**
   * Log and raise. Invalid arguments and pool errors keep their identity,
   * anything else is wrapped.
   */
  private fail(err: unknown, operation: string): never {
    if (err instanceof InvalidArgumentError) {
      this.logger.warn({ err, operation }, err.message);
      throw err;
    }

    this.logger.error({ err, operation }, `Cache operation "${operation}" failed`);
    if (err instanceof CachePoolError) {
      throw err;
    }
    throw new CachePoolError(`Exception thrown when executing "${operation}".`, { cause: err });
  }

  /**
   * Failure of an operation that reports through its return value: log it and
   * return false. Invalid arguments are still raised.
   */
  private report(err: unknown, operation: string): false {
    if (err instanceof InvalidArgumentError) {
      this.fail(err, operation);
    }
    this.logger.error({ err, operation }, `Cache operation "${operation}" failed`);
    return false;
  }
}
