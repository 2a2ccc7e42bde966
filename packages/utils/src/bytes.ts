import {toBufferLE, toBigIntLE, toBufferBE, toBigIntBE} from "bigint-buffer";

export type Endianness = "le" | "be";

const hexByByte: string[] = [];

/**
 * Render bytes as a `0x` prefixed lowercase hex string
 */
export function toHexString(bytes: Uint8Array): string {
  let hex = "0x";
  for (const byte of bytes) {
    if (!hexByByte[byte]) {
      hexByByte[byte] = byte < 16 ? "0" + byte.toString(16) : byte.toString(16);
    }
    hex += hexByByte[byte];
  }
  return hex;
}

/**
 * Render bytes as hex without prefix
 */
export function toHex(bytes: Uint8Array): string {
  return toHexString(bytes).slice(2);
}

export function isHex(hex: string): boolean {
  return /^(0x)?([0-9a-fA-F]{2})*$/.test(hex);
}

/**
 * Parse a hex string, with or without `0x` prefix
 */
export function fromHex(hex: string): Uint8Array {
  if (!isHex(hex)) {
    throw new Error(`hex string must have an even number of hex digits, got ${hex}`);
  }
  return new Uint8Array(Buffer.from(hex.startsWith("0x") ? hex.slice(2) : hex, "hex"));
}

/**
 * Return a byte array from a number or BigInt
 */
export function intToBytes(value: bigint | number, length: number, endianness: Endianness = "le"): Buffer {
  return bigIntToBytes(BigInt(value), length, endianness);
}

export function bigIntToBytes(value: bigint, length: number, endianness: Endianness = "le"): Buffer {
  if (value < 0) {
    throw new Error("value must be a positive bigint, got " + value);
  }
  if (endianness === "le") {
    return toBufferLE(value, length);
  }
  if (endianness === "be") {
    return toBufferBE(value, length);
  }
  throw new Error("endianness must be either 'le' or 'be'");
}

export function bytesToBigInt(value: Uint8Array, endianness: Endianness = "le"): bigint {
  if (value.length === 0) {
    return BigInt(0);
  }
  // bigint-buffer takes a Buffer, wrap the same memory
  const buffer = Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  if (endianness === "le") {
    return toBigIntLE(buffer);
  }
  if (endianness === "be") {
    return toBigIntBE(buffer);
  }
  throw new Error("endianness must be either 'le' or 'be'");
}

/**
 * Copy `bytes` into a new array of `length`, truncating or zero-filling the tail
 */
export function fitBytes(bytes: Uint8Array, length: number): Uint8Array {
  const out = new Uint8Array(length);
  out.set(bytes.subarray(0, length));
  return out;
}
