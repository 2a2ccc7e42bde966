import {ProviderError, ProviderErrorCode} from "../errors.js";
import {Provider} from "./provider.js";

/**
 * Provider over an in-memory byte array. Address 0 is the first byte.
 */
export class MemoryProvider implements Provider {
  protected cache: Uint8Array;

  constructor(content: Uint8Array | number = 0) {
    this.cache = typeof content === "number" ? new Uint8Array(content) : Uint8Array.from(content);
  }

  get size(): number {
    return this.cache.length;
  }

  /** Copy of the current content */
  get content(): Uint8Array {
    return Uint8Array.from(this.cache);
  }

  read(address: number, count: number): Uint8Array {
    this.checkRange(address, count);
    return this.cache.slice(address, address + count);
  }

  write(buffer: Uint8Array, address: number, count: number): void {
    this.checkRange(address, count);
    this.cache.set(buffer.subarray(0, count), address);
  }

  private checkRange(address: number, count: number): void {
    if (!Number.isInteger(address) || !Number.isInteger(count) || address < 0 || count < 0 || address + count > this.size) {
      throw new ProviderError({code: ProviderErrorCode.OUT_OF_RANGE, address, count, size: this.size});
    }
  }
}
