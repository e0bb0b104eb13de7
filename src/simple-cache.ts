import type { FileCachePool } from "./cache-pool.js";
import type { Ttl } from "./types.js";

/**
 * Value-level facade over a FileCachePool: get/set by key without handling
 * items. Keys follow the pool's validation rules.
 */
export class SimpleCache {
  constructor(private readonly pool: FileCachePool) {}

  async get<T = unknown>(key: string, defaultValue: T | null = null): Promise<T | null> {
    const item = await this.pool.getItem(key);
    if (!(await item.isHit())) {
      return defaultValue;
    }
    return item.get<T>();
  }

  /**
   * @param ttl Seconds, a Duration, or null/omitted to never expire
   */
  async set(key: string, value: unknown, ttl: Ttl = null): Promise<boolean> {
    const item = await this.pool.getItem(key);
    item.set(value).expiresAfter(ttl);
    return this.pool.save(item);
  }

  async delete(key: string): Promise<boolean> {
    return this.pool.deleteItem(key);
  }

  async clear(): Promise<boolean> {
    return this.pool.clear();
  }

  async has(key: string): Promise<boolean> {
    return this.pool.hasItem(key);
  }

  /**
   * @returns A map in key order; misses map to `defaultValue`
   */
  async getMultiple<T = unknown>(
    keys: Iterable<string>,
    defaultValue: T | null = null,
  ): Promise<Map<string, T | null>> {
    const items = await this.pool.getItems([...keys]);
    const values = new Map<string, T | null>();
    for (const item of items) {
      values.set(item.getKey(), (await item.isHit()) ? await item.get<T>() : defaultValue);
    }
    return values;
  }

  /**
   * Store several values in one commit
   */
  async setMultiple(
    values: Iterable<readonly [string, unknown]> | Record<string, unknown>,
    ttl: Ttl = null,
  ): Promise<boolean> {
    const entries: (readonly [string, unknown])[] = isIterable(values)
      ? [...values]
      : Object.entries(values);
    const items = await this.pool.getItems(entries.map(([key]) => key));

    let queued = true;
    for (const [index, item] of items.entries()) {
      item.set(entries[index][1]).expiresAfter(ttl);
      queued = (await this.pool.saveDeferred(item)) && queued;
    }
    return (await this.pool.commit()) && queued;
  }

  async deleteMultiple(keys: Iterable<string>): Promise<boolean> {
    return this.pool.deleteItems([...keys]);
  }
}

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}
