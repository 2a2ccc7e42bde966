import {Logger} from "@binlayout/utils";
import {ByteOrder, resolveByteOrder} from "./byteOrder.js";

/**
 * Settings threaded through every traversal. Passed by value, a callee that needs
 * other settings for a sub-tree derives a new object.
 */
export type CodingOptions = {
  /** Byte order used to decode and encode fields that do not declare their own */
  readonly byteOrder: ByteOrder;
  /** Follow pointers into the data they reference */
  readonly nested: boolean;
};

export function codingOptions(opts: Partial<CodingOptions> = {}, nestedDefault = false): CodingOptions {
  return {
    byteOrder: resolveByteOrder(opts.byteOrder),
    nested: opts.nested ?? nestedDefault,
  };
}

export type ReadOptions = {
  /** Follow pointers found in the data that was read, defaults to true */
  nested?: boolean;
  /** Read the data of a pointer with address 0 */
  nullAllowed?: boolean;
  logger?: Logger;
};

export type ViewOptions = {
  nested?: boolean;
  /** Keys used instead of the attribute names when several attributes are viewed */
  fieldnames?: readonly string[];
};
