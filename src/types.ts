import type { Logger } from "pino";
import type { Serializer } from "./serializer.js";
import type { StorageAdapter } from "./local-file-system.js";

/**
 * Configuration options for FileCachePool
 *
 * @remarks
 * **Known Limitations:**
 * - Tag lists are rewritten whole on every change. Two pools sharing one
 *   directory can lose each other's tag updates (last writer wins).
 * - Values must be accepted by the serializer (the default rejects functions
 *   and symbols).
 */
export interface CachePoolOptions {
  /** Root directory of the default LocalFileSystem (default: ./.cache) */
  dir?: string;
  /** Sub-folder holding item records and tag lists (default: cache) */
  folder?: string;
  /** Storage adapter. When given, `dir` is ignored. */
  storage?: StorageAdapter;
  /** Value codec (default: v8Serializer) */
  serializer?: Serializer;
  /** Logging sink (default: a disabled pino logger) */
  logger?: Logger;
}

/**
 * A relative span of time for expiresAfter(). Every component must be an integer.
 */
export interface Duration {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
}

/** Seconds, a Duration, or null for no expiry */
export type Ttl = number | Duration | null;

/**
 * Result of loading an item from storage:
 * hit flag, value, tags stored with it, expiration timestamp in ms.
 */
export type FetchResult = readonly [
  hit: boolean,
  value: unknown,
  tags: readonly string[],
  expiresAt: number | null,
];

/** Deferred loader bound to an item by the pool */
export type ItemFetcher = () => Promise<FetchResult>;

/**
 * The item surface callers work with. The pool only accepts its own CacheItem
 * implementation back.
 */
export interface CacheItemInterface {
  getKey(): string;
  get<T = unknown>(): Promise<T | null>;
  isHit(): Promise<boolean>;
  set(value: unknown): this;
  expiresAt(expiration: Date | number | null): this;
  expiresAfter(time: Ttl): this;
}

export const DEFAULT_OPTIONS = {
  dir: ".cache",
  folder: "cache",
};
