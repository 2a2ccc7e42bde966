import {DataByteOrder} from "./byteOrder.js";

/**
 * Location of a field while a layout tree is walked. Every indexing, decode and
 * encode step takes an `Index` and returns the one for the next field.
 */
export type Index = {
  /** Byte offset in the buffer */
  readonly byte: number;
  /** Bit offset within the aligned group starting at `byte` */
  readonly bit: number;
  /** Absolute address in the data source */
  readonly address: number;
  /** Address where the data of the enclosing pointer starts */
  readonly baseAddress: number;
  /** Set when a variable sized member changed its size and the bytes must be fetched again */
  readonly update: boolean;
};

export function createIndex(index: Partial<Index> = {}): Index {
  return {
    byte: index.byte ?? 0,
    bit: index.bit ?? 0,
    address: index.address ?? 0,
    baseAddress: index.baseAddress ?? 0,
    update: index.update ?? false,
  };
}

/**
 * Group of bytes a field is packed into, and the bit where the field starts in it
 */
export type Alignment = {
  readonly byteSize: number;
  readonly bitOffset: number;
};

export function createAlignment(byteSize = 0, bitOffset = 0): Alignment {
  return {byteSize, bitOffset};
}

/**
 * Bytes to write into a data source to apply an edit of one item.
 * With `inject` the write merges `buffer` into the current content, replacing only
 * `bitSize` bits starting at `bitOffset` of the first byte.
 */
export type Patch = {
  readonly buffer: Uint8Array;
  readonly address: number;
  readonly byteOrder: DataByteOrder;
  readonly bitSize: number;
  readonly bitOffset: number;
  readonly inject: boolean;
};

export function formatIndex(index: Index): string {
  return `Index(byte=${index.byte}, bit=${index.bit}, address=0x${index.address.toString(16)})`;
}
