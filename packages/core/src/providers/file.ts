import fs from "node:fs/promises";
import path from "node:path";
import {ProviderError, ProviderErrorCode} from "../errors.js";
import {MemoryProvider} from "./memory.js";

/**
 * Provider over the content of a file. The file is read once by `open`, reads
 * and writes act on that copy until `flush` writes it back.
 */
export class FileProvider extends MemoryProvider {
  readonly path: string;

  private constructor(filepath: string, content: Uint8Array) {
    super(content);
    this.path = filepath;
  }

  static async open(filepath: string): Promise<FileProvider> {
    const absolute = path.resolve(filepath);
    const stat = await fs.stat(absolute);
    if (!stat.isFile()) {
      throw new ProviderError({code: ProviderErrorCode.FILE, path: absolute});
    }
    return new FileProvider(absolute, await fs.readFile(absolute));
  }

  /**
   * Write the content to the opened file, or to `filepath`
   */
  async flush(filepath: string = this.path): Promise<void> {
    await fs.writeFile(filepath, this.cache);
  }

  toString(): string {
    return `FileProvider(${this.path}, ${this.size})`;
  }
}
