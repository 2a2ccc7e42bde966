import {Endianness} from "@binlayout/utils";
import {DEFAULT_BYTE_ORDER} from "./constants.js";
import {ByteOrderError, ByteOrderErrorCode} from "./errors.js";

export type ByteOrder = "auto" | "big" | "little";
export type DataByteOrder = Exclude<ByteOrder, "auto">;

export const byteOrders: readonly ByteOrder[] = ["auto", "big", "little"];

/**
 * Validate a byte order coming from untyped input
 */
export function parseByteOrder(value: unknown, owner: string): ByteOrder {
  if (typeof value !== "string") {
    throw new ByteOrderError({code: ByteOrderErrorCode.TYPE, owner, value: String(value)});
  }
  const byteOrder = byteOrders.find((order) => order === value);
  if (byteOrder === undefined) {
    throw new ByteOrderError({code: ByteOrderErrorCode.VALUE, owner, value});
  }
  return byteOrder;
}

/**
 * `auto` decodes with the default byte order
 */
export function resolveByteOrder(byteOrder: ByteOrder | undefined): DataByteOrder {
  return byteOrder === undefined || byteOrder === "auto" ? DEFAULT_BYTE_ORDER : byteOrder;
}

export function toEndianness(byteOrder: ByteOrder): Endianness {
  return resolveByteOrder(byteOrder) === "big" ? "be" : "le";
}
