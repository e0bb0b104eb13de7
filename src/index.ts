export { FileCachePool } from "./cache-pool.js";
export { CacheItem } from "./cache-item.js";
export { SimpleCache } from "./simple-cache.js";
export { TagIndex } from "./tag-index.js";
export { LocalFileSystem } from "./local-file-system.js";
export type { StorageAdapter } from "./local-file-system.js";
export { v8Serializer } from "./serializer.js";
export type { Serializer } from "./serializer.js";
export {
  CachePoolError,
  CorruptRecordError,
  InvalidArgumentError,
  StorageError,
} from "./errors.js";
export { DEFAULT_OPTIONS } from "./types.js";
export type {
  CacheItemInterface,
  CachePoolOptions,
  Duration,
  FetchResult,
  ItemFetcher,
  Ttl,
} from "./types.js";
