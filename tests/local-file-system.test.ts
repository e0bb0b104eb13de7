import { describe, it, expect, beforeEach } from "vitest";
import { promises as fs } from "fs";
import { join } from "path";
import { StorageError } from "../src/errors.js";
import { LocalFileSystem } from "../src/local-file-system.js";
import { createTestStorage, testDir } from "./test-utils.js";

const ROOT = testDir("local-fs");

describe("LocalFileSystem", () => {
  let storage: LocalFileSystem;

  beforeEach(() => {
    storage = createTestStorage("local-fs");
  });

  describe("read/write", () => {
    it("should store and read back bytes", async () => {
      await storage.write("cache/key", Buffer.from("value"));
      expect((await storage.read("cache/key")).toString()).toBe("value");
    });

    it("should overwrite existing files", async () => {
      await storage.write("key", Buffer.from("value1"));
      await storage.write("key", Buffer.from("value2"));
      expect((await storage.read("key")).toString()).toBe("value2");
    });

    it("should create parent directories", async () => {
      await storage.write("a/b/c/key", Buffer.from("deep"));
      expect(await storage.directoryExists("a/b/c")).toBe(true);
    });

    it("should resolve paths with a leading slash against the root", async () => {
      await storage.write("/cache/key", Buffer.from("value"));
      expect((await storage.read("cache/key")).toString()).toBe("value");
    });

    it("should leave no temporary files behind", async () => {
      await storage.write("cache/key", Buffer.from("value"));
      expect(await fs.readdir(join(ROOT, "cache"))).toEqual(["key"]);
    });

    it("should write files readable by the owner only", async () => {
      await storage.write("cache/key", Buffer.from("value"));
      const stat = await fs.stat(join(ROOT, "cache", "key"));
      expect(stat.mode & 0o777).toBe(0o600);
    });

    it("should throw a StorageError for missing files", async () => {
      const failure = await storage.read("missing").catch((err: unknown) => err);
      expect(failure).toBeInstanceOf(StorageError);
      expect(failure).toMatchObject({
        message: "Unable to read the file missing",
        path: "missing",
        code: "ENOENT",
      });
    });
  });

  describe("delete", () => {
    it("should remove a file", async () => {
      await storage.write("key", Buffer.from("value"));
      await storage.delete("key");
      expect(await storage.fileExists("key")).toBe(false);
    });

    it("should ignore missing files", async () => {
      await expect(storage.delete("missing")).resolves.toBeUndefined();
    });
  });

  describe("directories", () => {
    it("should create and detect directories", async () => {
      expect(await storage.directoryExists("cache")).toBe(false);
      await storage.createDirectory("cache");
      expect(await storage.directoryExists("cache")).toBe(true);
      expect(await storage.fileExists("cache")).toBe(false);
    });

    it("should create directories idempotently", async () => {
      await storage.createDirectory("cache");
      await expect(storage.createDirectory("cache")).resolves.toBeUndefined();
    });

    it("should delete a directory with its contents", async () => {
      await storage.write("cache/one", Buffer.from("1"));
      await storage.write("cache/sub/two", Buffer.from("2"));

      await storage.deleteDirectory("cache");
      expect(await storage.directoryExists("cache")).toBe(false);
      expect(await storage.fileExists("cache/one")).toBe(false);
    });

    it("should ignore missing directories", async () => {
      await expect(storage.deleteDirectory("missing")).resolves.toBeUndefined();
    });

    it("should not report a directory as a file", async () => {
      await storage.write("key", Buffer.from("value"));
      expect(await storage.fileExists("key")).toBe(true);
      expect(await storage.directoryExists("key")).toBe(false);
    });
  });
});
