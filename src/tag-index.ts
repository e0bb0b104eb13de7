import type { StorageAdapter } from "./local-file-system.js";
import type { Serializer } from "./serializer.js";
import { decodeList, encodeList } from "./record.js";
import { resolveFilePath } from "./utils.js";

/**
 * Named lists of item keys, one file per list. The storage only offers
 * whole-file reads and writes, so every change rewrites the full list.
 */
export class TagIndex {
  constructor(
    private readonly storage: StorageAdapter,
    private readonly serializer: Serializer,
    private readonly folder: () => string,
  ) {}

  private getFilePath(name: string): string {
    return resolveFilePath(this.folder(), name);
  }

  /**
   * Read a list, creating it empty first if it does not exist yet
   */
  async getList(name: string): Promise<string[]> {
    const file = this.getFilePath(name);
    if (!(await this.storage.fileExists(file))) {
      await this.storage.write(file, encodeList(this.serializer, []));
    }
    return decodeList(this.serializer, await this.storage.read(file), file);
  }

  async appendListItem(name: string, key: string): Promise<void> {
    const list = await this.getList(name);
    list.push(key);
    await this.storage.write(this.getFilePath(name), encodeList(this.serializer, list));
  }

  /**
   * Drop every occurrence of `key` from the list
   */
  async removeListItem(name: string, key: string): Promise<void> {
    const list = await this.getList(name);
    const remaining = list.filter((entry) => entry !== key);
    await this.storage.write(this.getFilePath(name), encodeList(this.serializer, remaining));
  }

  async removeList(name: string): Promise<void> {
    await this.storage.delete(this.getFilePath(name));
  }
}
