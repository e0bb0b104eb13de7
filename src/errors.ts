/**
 * Raised for a malformed key, tag, expiration, or an item that was not created
 * by a FileCachePool. Never swallowed by the pool.
 */
export class InvalidArgumentError extends Error {
  override readonly name = "InvalidArgumentError";
}

/**
 * Raised by pool operations that do not report failure through their return
 * value, and by any operation on a closed pool.
 */
export class CachePoolError extends Error {
  override readonly name = "CachePoolError";
}

/**
 * A stored record or tag list that could not be decoded.
 */
export class CorruptRecordError extends Error {
  override readonly name = "CorruptRecordError";

  constructor(
    message: string,
    readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/**
 * I/O failure in a storage adapter.
 */
export class StorageError extends Error {
  override readonly name = "StorageError";
  /** errno code of the underlying failure (e.g. ENOENT), when there is one */
  readonly code: string | undefined;

  constructor(
    message: string,
    readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.code = errnoCode(options?.cause);
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
