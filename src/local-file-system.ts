import { promises as fs } from "fs";
import { basename, dirname, join } from "path";
import { randomBytes } from "crypto";
import { StorageError } from "./errors.js";

/**
 * Byte-level storage under a single root. Paths are relative to that root.
 */
export interface StorageAdapter {
  /** Read a whole file. Throws StorageError if it is missing or unreadable. */
  read(path: string): Promise<Buffer>;
  /** Replace a file, creating parent directories as needed */
  write(path: string, contents: Buffer): Promise<void>;
  /** Remove a file. No-op if it does not exist. */
  delete(path: string): Promise<void>;
  fileExists(path: string): Promise<boolean>;
  createDirectory(path: string): Promise<void>;
  /** Remove a directory and everything below it. No-op if it does not exist. */
  deleteDirectory(path: string): Promise<void>;
  directoryExists(path: string): Promise<boolean>;
}

const FILE_MODE = 0o600;
const DIR_MODE = 0o700;

/**
 * StorageAdapter over the local file system
 */
export class LocalFileSystem implements StorageAdapter {
  private readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  /**
   * Resolve a path against the root (leading separators are ignored)
   */
  private prefixPath(path: string): string {
    return join(this.root, path.replace(/^[\\/]+/, ""));
  }

  /**
   * Generate a temporary path next to the target so the rename stays on one device
   */
  private getTempPath(location: string): string {
    const id = randomBytes(8).toString("hex");
    return join(dirname(location), `.${basename(location)}.${id}.tmp`);
  }

  /**
   * Atomic file write: write to temp, then rename
   */
  private async atomicWrite(location: string, contents: Buffer): Promise<void> {
    const tempPath = this.getTempPath(location);
    try {
      await fs.writeFile(tempPath, contents, { mode: FILE_MODE });
      await fs.rename(tempPath, location);
    } catch (err) {
      // Clean up temp file on failure
      await fs.rm(tempPath, { force: true });
      throw err;
    }
  }

  async read(path: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.prefixPath(path));
    } catch (err) {
      throw new StorageError(`Unable to read the file ${path}`, path, { cause: err });
    }
  }

  async write(path: string, contents: Buffer): Promise<void> {
    const location = this.prefixPath(path);
    try {
      await fs.mkdir(dirname(location), { recursive: true, mode: DIR_MODE });
      await this.atomicWrite(location, contents);
    } catch (err) {
      throw new StorageError(`Unable to write file ${path}`, path, { cause: err });
    }
  }

  async delete(path: string): Promise<void> {
    try {
      await fs.rm(this.prefixPath(path), { force: true });
    } catch (err) {
      throw new StorageError(`Unable to delete the file ${path}`, path, { cause: err });
    }
  }

  async fileExists(path: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.prefixPath(path));
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async createDirectory(path: string): Promise<void> {
    try {
      await fs.mkdir(this.prefixPath(path), { recursive: true, mode: DIR_MODE });
    } catch (err) {
      throw new StorageError(`Unable to create the directory ${path}`, path, { cause: err });
    }
  }

  async deleteDirectory(path: string): Promise<void> {
    try {
      await fs.rm(this.prefixPath(path), { recursive: true, force: true });
    } catch (err) {
      throw new StorageError(`Unable to delete the directory ${path}`, path, { cause: err });
    }
  }

  async directoryExists(path: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.prefixPath(path));
      return stat.isDirectory();
    } catch {
      return false;
    }
  }
}
