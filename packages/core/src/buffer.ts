/**
 * Growable byte buffer fields are serialized into. Serialization appends, fields
 * that share a packed group with the previous field merge into its last bytes.
 */
export class ByteBuffer {
  private bytes: Uint8Array;
  private size: number;

  constructor(initial?: Uint8Array | number) {
    if (initial instanceof Uint8Array) {
      this.bytes = Uint8Array.from(initial);
      this.size = initial.length;
    } else {
      this.size = initial ?? 0;
      this.bytes = new Uint8Array(Math.max(this.size, 16));
    }
  }

  get length(): number {
    return this.size;
  }

  /**
   * View into the written bytes, valid until the next append
   */
  subarray(start = 0, end = this.size): Uint8Array {
    return this.bytes.subarray(Math.min(start, this.size), Math.min(end, this.size));
  }

  append(data: Uint8Array): void {
    this.reserve(this.size + data.length);
    this.bytes.set(data, this.size);
    this.size += data.length;
  }

  /**
   * Overwrite written bytes at `offset`
   */
  set(data: Uint8Array, offset: number): void {
    if (offset < 0 || offset + data.length > this.size) {
      throw new RangeError(`write of ${data.length} bytes at ${offset} outside buffer of ${this.size} bytes`);
    }
    this.bytes.set(data, offset);
  }

  toBytes(): Uint8Array {
    return this.bytes.slice(0, this.size);
  }

  private reserve(capacity: number): void {
    if (capacity <= this.bytes.length) return;
    const bytes = new Uint8Array(Math.max(capacity, this.bytes.length * 2));
    bytes.set(this.bytes.subarray(0, this.size));
    this.bytes = bytes;
  }
}
