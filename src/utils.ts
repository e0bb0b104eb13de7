import { InvalidArgumentError } from "./errors.js";
import type { Duration } from "./types.js";

/** Separator between the "tag" prefix and a tag name in tag list names */
export const TAG_SEPARATOR = "!";

const RESERVED_CHARACTERS = /[{}()/\\@:]/;
const FILE_NAME = /^[a-zA-Z0-9_.! ]+$/;

/**
 * Check if a cache entry has expired
 */
export function isExpired(expiresAt: number | null): boolean {
  return expiresAt !== null && Date.now() >= expiresAt;
}

/**
 * Reject empty keys and keys using the reserved characters {}()/\@:
 */
export function validateKey(key: string): void {
  if (typeof key !== "string" || key.length === 0) {
    throw new InvalidArgumentError("Cache key cannot be an empty string");
  }
  if (RESERVED_CHARACTERS.test(key)) {
    throw new InvalidArgumentError(
      `Invalid key: "${key}". The key contains one or more characters reserved for future extension: {}()/\\@:`,
    );
  }
}

export function validateTag(tag: string): void {
  if (typeof tag !== "string") {
    throw new InvalidArgumentError(`Cache tag must be string, "${typeof tag}" given`);
  }
  if (tag.length === 0) {
    throw new InvalidArgumentError("Cache tag length must be greater than zero");
  }
  if (RESERVED_CHARACTERS.test(tag)) {
    throw new InvalidArgumentError(`Cache tag "${tag}" contains reserved characters {}()/\\@:`);
  }
}

/**
 * Name of the list holding every key tagged with `tag`
 */
export function tagListName(tag: string): string {
  return `tag${TAG_SEPARATOR}${tag}`;
}

/**
 * Map a key or list name to its file under `folder`. Names that passed
 * validateKey can still fail here: files are limited to [a-zA-Z0-9_.! ].
 */
export function resolveFilePath(folder: string, name: string): string {
  if (!FILE_NAME.test(name)) {
    throw new InvalidArgumentError(
      `Invalid key "${name}". Valid filenames must match [a-zA-Z0-9_.! ].`,
    );
  }
  return `${folder}/${name}`;
}

const DURATION_UNITS = ["days", "hours", "minutes", "seconds"] as const;

/**
 * A plain object naming at least one of days, hours, minutes or seconds, and
 * nothing else
 */
export function isDuration(value: unknown): value is Duration {
  if (typeof value !== "object" || value === null) return false;
  if (Object.getPrototypeOf(value) !== Object.prototype) return false;
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((key) => DURATION_UNITS.some((unit) => unit === key));
}

/**
 * Convert a Duration to milliseconds
 */
export function durationToMs(duration: Duration): number {
  const { days = 0, hours = 0, minutes = 0, seconds = 0 } = duration;
  for (const part of [days, hours, minutes, seconds]) {
    if (!Number.isInteger(part)) {
      throw new InvalidArgumentError("Duration components must be integers.");
    }
  }
  return (((days * 24 + hours) * 60 + minutes) * 60 + seconds) * 1000;
}
