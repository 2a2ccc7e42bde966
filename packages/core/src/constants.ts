import type {ByteOrder} from "./byteOrder.js";

/** Byte order used to decode and encode when the caller does not pass one */
export const DEFAULT_BYTE_ORDER: Exclude<ByteOrder, "auto"> = "little";

/**
 * Discriminant of every item in a layout tree
 */
export enum ItemClass {
  Field = 1,
  Container = 2,
  Pointer = 3,
  Structure = 10,
  Sequence = 11,
  Array = 12,
  Stream = 20,
  String = 21,
  Float = 30,
  Double = 31,
  Decimal = 40,
  Bit = 41,
  Byte = 42,
  Char = 43,
  Signed = 44,
  Unsigned = 45,
  Bitset = 46,
  Bool = 47,
  Enum = 48,
  Scaled = 49,
  Fraction = 50,
  Bipolar = 51,
  Unipolar = 52,
  Datetime = 53,
  IPv4Address = 54,
}

/** Largest address reachable through a 32-bit pointer */
export const MAX_ADDRESS = 0xffffffff;

/** Bytes fetched per round while a string pointer searches for its terminator */
export const AUTO_STRING_BLOCK_SIZE = 64;
