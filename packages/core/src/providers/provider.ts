/**
 * Addressable byte source a pointer reads its data from and writes patches to.
 * `read` must return exactly `count` bytes.
 */
export interface Provider {
  read(address: number, count: number): Uint8Array;
  write(buffer: Uint8Array, address: number, count: number): void;
  /** Number of addressable bytes, when known */
  readonly size?: number;
}

export function isProvider(value: unknown): value is Provider {
  return (
    typeof value === "object" &&
    value !== null &&
    "read" in value &&
    typeof value.read === "function" &&
    "write" in value &&
    typeof value.write === "function"
  );
}
