import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { FileCachePool } from "../src/cache-pool.js";
import { InvalidArgumentError } from "../src/errors.js";
import { SimpleCache } from "../src/simple-cache.js";
import { createTestPool } from "./test-utils.js";

describe("SimpleCache", () => {
  let pool: FileCachePool;
  let cache: SimpleCache;

  beforeEach(() => {
    pool = createTestPool("simple");
    cache = new SimpleCache(pool);
  });

  afterEach(async () => {
    await pool.close();
  });

  describe("get/set", () => {
    it("should store and retrieve values", async () => {
      expect(await cache.set("key", { name: "test", nested: { value: 123 } })).toBe(true);
      expect(await cache.get("key")).toEqual({ name: "test", nested: { value: 123 } });
    });

    it("should return the default for missing keys", async () => {
      expect(await cache.get("missing")).toBeNull();
      expect(await cache.get("missing", "fallback")).toBe("fallback");
    });

    it("should return a stored null instead of the default", async () => {
      await cache.set("key", null);
      expect(await cache.get("key", "fallback")).toBeNull();
    });

    it("should overwrite existing values", async () => {
      await cache.set("key", "value1");
      await cache.set("key", "value2");
      expect(await cache.get("key")).toBe("value2");
    });

    it("should share entries with the pool", async () => {
      await cache.set("key", "value");
      const item = await pool.getItem("key");
      expect(await item.get()).toBe("value");
    });

    it("should reject invalid keys", async () => {
      await expect(cache.get("bad:key")).rejects.toThrow(InvalidArgumentError);
      await expect(cache.set("bad:key", 1)).rejects.toThrow(InvalidArgumentError);
      await expect(cache.has("bad:key")).rejects.toThrow(InvalidArgumentError);
    });
  });

  describe("ttl", () => {
    it("should keep values with a positive ttl", async () => {
      await cache.set("key", "value", 60);
      expect(await cache.has("key")).toBe(true);
    });

    it("should accept a Duration", async () => {
      await cache.set("key", "value", { minutes: 5 });
      expect(await cache.get("key")).toBe("value");
    });

    it("should delete the entry for a ttl of zero or less", async () => {
      await cache.set("key", "value");

      expect(await cache.set("key", "new value", 0)).toBe(true);
      expect(await cache.has("key")).toBe(false);

      await cache.set("key", "value");
      expect(await cache.set("key", "new value", -5)).toBe(true);
      expect(await cache.get("key", "gone")).toBe("gone");
    });

    it("should expire values after the ttl", async () => {
      await cache.set("key", "value", 1);
      expect(await cache.has("key")).toBe(true);

      await new Promise((r) => setTimeout(r, 1100));
      expect(await cache.has("key")).toBe(false);
    });
  });

  describe("delete/clear", () => {
    it("should delete a key", async () => {
      await cache.set("key", "value");
      expect(await cache.delete("key")).toBe(true);
      expect(await cache.has("key")).toBe(false);
    });

    it("should clear every key", async () => {
      await cache.set("a", 1);
      await cache.set("b", 2);

      expect(await cache.clear()).toBe(true);
      expect(await cache.has("a")).toBe(false);
      expect(await cache.has("b")).toBe(false);
    });
  });

  describe("multiple keys", () => {
    it("should get values in key order with defaults for misses", async () => {
      await cache.set("b", 2);

      const values = await cache.getMultiple(["a", "b", "c"], 0);
      expect([...values.entries()]).toEqual([
        ["a", 0],
        ["b", 2],
        ["c", 0],
      ]);
    });

    it("should set values from a record", async () => {
      expect(await cache.setMultiple({ a: 1, b: 2 })).toBe(true);
      expect(await cache.get("a")).toBe(1);
      expect(await cache.get("b")).toBe(2);
    });

    it("should set values from an iterable of pairs", async () => {
      const values = new Map<string, string>([
        ["x", "one"],
        ["y", "two"],
      ]);

      expect(await cache.setMultiple(values)).toBe(true);
      expect(await cache.get("x")).toBe("one");
      expect(await cache.get("y")).toBe("two");
    });

    it("should delete entries when set with an expired ttl", async () => {
      await cache.set("a", 1);

      expect(await cache.setMultiple({ a: 2, b: 3 }, 0)).toBe(true);
      expect(await cache.has("a")).toBe(false);
      expect(await cache.has("b")).toBe(false);
    });

    it("should delete several keys", async () => {
      await cache.setMultiple({ a: 1, b: 2, c: 3 });

      expect(await cache.deleteMultiple(["a", "b"])).toBe(true);
      expect(await cache.has("a")).toBe(false);
      expect(await cache.has("b")).toBe(false);
      expect(await cache.has("c")).toBe(true);
    });

    it("should reject the batch when any key is invalid", async () => {
      await expect(cache.setMultiple({ a: 1, "b/c": 2 })).rejects.toThrow(InvalidArgumentError);
      expect(await cache.has("a")).toBe(false);
    });
  });
});
