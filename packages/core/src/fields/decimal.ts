import {bigIntClamp, bytesToBigInt, divmod, fitBytes, intToBytes, toSafeNumber} from "@binlayout/utils";
import {ByteBuffer} from "../buffer.js";
import {ByteOrder, DataByteOrder, resolveByteOrder, toEndianness} from "../byteOrder.js";
import {ItemClass} from "../constants.js";
import {Index} from "../cursor.js";
import {FieldErrorCode} from "../errors.js";
import {FieldInput, FieldMetadata, FieldValue} from "../interface.js";
import {CodingOptions} from "../options.js";
import {Field} from "./field.js";

export type DecimalOptions = {
  /** Bytes of the group the field is packed into, `ceil(bitSize / 8)` when omitted */
  alignTo?: number;
  signed?: boolean;
  byteOrder?: ByteOrder;
};

const integerLiteral = /^\s*([+-])?(0[xX][0-9a-fA-F]+|0[oO][0-7]+|0[bB][01]+|\d+)\s*$/;

/**
 * Parse a decimal, `0x`, `0o` or `0b` integer literal with optional sign.
 * Returns null for anything else.
 */
export function parseIntegerLiteral(text: string): bigint | null {
  const match = integerLiteral.exec(text);
  if (match === null) {
    return null;
  }
  const value = BigInt(match[2]);
  return match[1] === "-" ? -value : value;
}

/**
 * Base of every integer backed field. Stores a bigint of `bitSize` bits, signed or
 * unsigned, and packs it into an aligned group of 1 to 8 bytes.
 */
export abstract class DecimalField<T extends FieldValue> extends Field<T, bigint> {
  protected raw = 0n;
  private readonly _signed: boolean;

  constructor(bitSize: number, opts: DecimalOptions = {}) {
    super(0, 0, opts.byteOrder);
    this._signed = opts.signed ?? false;
    if (opts.alignTo) {
      this.setAlignment(opts.alignTo);
      this.setBitSize(bitSize);
    } else {
      this.setBitSize(bitSize, true);
    }
  }

  get signed(): boolean {
    return this._signed;
  }

  max(): bigint {
    return this.signed ? (1n << BigInt(this.bitSize - 1)) - 1n : this.bitMask();
  }

  min(): bigint {
    return this.signed ? -(1n << BigInt(this.bitSize - 1)) : 0n;
  }

  bitMask(): bigint {
    return (1n << BigInt(this.bitSize)) - 1n;
  }

  /** Stored integer without loss of precision */
  toBigInt(): bigint {
    return this.raw;
  }

  unpack(buffer: Uint8Array, index: Index = this.index, opts: Partial<CodingOptions> = {}): bigint {
    const byteOrder = resolveByteOrder(opts.byteOrder);
    const groupSize = this.alignByteSize;
    const content = fitBytes(buffer.subarray(index.byte, index.byte + groupSize), groupSize);

    let value = bytesToBigInt(content, toEndianness(byteOrder));
    value >>= BigInt(index.bit);
    value &= this.bitMask();
    value = this.convertByteOrder(value, byteOrder, index);

    if (value > this.max()) {
      value -= 1n << BigInt(this.bitSize);
    }
    return value;
  }

  pack(buffer?: ByteBuffer, opts: Partial<CodingOptions> = {}): Uint8Array {
    const byteOrder = resolveByteOrder(opts.byteOrder);
    const endianness = toEndianness(byteOrder);
    const groupSize = this.alignByteSize;
    const start = this.index.byte;
    const end = start + groupSize;

    let value = bigIntClamp(this.raw, this.min(), this.max()) & this.bitMask();
    value = this.convertByteOrder(value, byteOrder, this.index);
    value <<= BigInt(this.index.bit);

    // A sibling in the same group was packed before, merge into its bytes
    if (buffer !== undefined && buffer.length === end) {
      value |= bytesToBigInt(buffer.subarray(start, end), endianness);
      buffer.set(intToBytes(value, groupSize, endianness), start);
      return new Uint8Array(0);
    }
    return intToBytes(value, groupSize, endianness);
  }

  describe(name?: string, opts?: {nested?: boolean}): FieldMetadata {
    return {
      ...super.describe(name, opts),
      max: toSafeNumber(this.max()),
      min: toSafeNumber(this.min()),
      signed: this.signed,
    };
  }

  /**
   * Convert an assigned value to the stored integer, clamped to `[min(), max()]`
   */
  protected toDecimal(value: FieldInput, encoding?: "ascii"): bigint {
    let decimal: bigint;
    if (typeof value === "bigint") {
      decimal = value;
    } else if (typeof value === "number") {
      if (Number.isNaN(value)) {
        throw this.fieldError({code: FieldErrorCode.VALUE, value: String(value)});
      }
      if (!Number.isFinite(value)) {
        return value > 0 ? this.max() : this.min();
      }
      decimal = BigInt(Math.trunc(value));
    } else if (typeof value === "boolean") {
      decimal = value ? 1n : 0n;
    } else if (typeof value === "string") {
      decimal = encoding === "ascii" ? this.fromAscii(value) : this.fromLiteral(value);
    } else {
      throw this.fieldError({code: FieldErrorCode.TYPE, value: "Uint8Array"});
    }
    return bigIntClamp(decimal, this.min(), this.max());
  }

  /**
   * Read an assigned value as floating point number, infinite values pass
   */
  protected toNumber(value: FieldInput): number {
    let num: number;
    if (typeof value === "string") {
      num = value.trim() === "" ? NaN : Number(value);
    } else if (value instanceof Uint8Array) {
      throw this.fieldError({code: FieldErrorCode.TYPE, value: "Uint8Array"});
    } else {
      num = Number(value);
    }
    if (Number.isNaN(num)) {
      throw this.fieldError({code: FieldErrorCode.VALUE, value: String(value)});
    }
    return num;
  }

  /**
   * Set the aligned group. With `autoAlign` the group is the smallest one that
   * holds a bit at `bitOffset`.
   */
  protected setAlignment(byteSize: number, bitOffset = 0, autoAlign = false): void {
    const size = autoAlign ? Math.floor(bitOffset / 8) + 1 : byteSize;
    if (
      !Number.isInteger(size) ||
      size < 1 ||
      size > 8 ||
      !Number.isInteger(bitOffset) ||
      bitOffset < 0 ||
      bitOffset > 63 ||
      bitOffset >= size * 8
    ) {
      throw this.fieldError({code: FieldErrorCode.ALIGNMENT, byteSize: size, bitOffset});
    }
    this.alignByteSize = size;
    this.alignBitOffset = bitOffset;
  }

  protected setBitSize(bitSize: number, autoAlign = false): void {
    if (!Number.isInteger(bitSize) || bitSize < 1 || bitSize > 64) {
      throw this.fieldError({code: FieldErrorCode.SIZE, bitSize});
    }
    const groupSize = Math.ceil(bitSize / 8);
    if (autoAlign) {
      this.alignByteSize = groupSize;
    } else if (groupSize > this.alignByteSize) {
      throw this.fieldError({code: FieldErrorCode.ALIGNMENT, byteSize: this.alignByteSize, bitOffset: this.alignBitOffset});
    }
    this._bitSize = bitSize;
  }

  /**
   * Swap the bytes of `value` when the field declares its own byte order and it
   * differs from the order the group is decoded with
   */
  private convertByteOrder(value: bigint, byteOrder: DataByteOrder, index: Index): bigint {
    if (this.byteOrder === "auto" || this.byteOrder === byteOrder) {
      return value;
    }
    const [fieldBytes, remainder] = divmod(this.bitSize, 8);
    if (fieldBytes < 1) {
      return value;
    }
    if (remainder !== 0) {
      throw this.fieldError({code: FieldErrorCode.GROUP_BYTE_ORDER, byteOrder}, index);
    }
    if (fieldBytes === 1) {
      return value;
    }
    return bytesToBigInt(intToBytes(value, fieldBytes, "le"), "be");
  }

  private fromAscii(value: string): bigint {
    const code = value.charCodeAt(0);
    if (Number.isNaN(code)) {
      throw this.fieldError({code: FieldErrorCode.VALUE, value});
    }
    if (code > 0x7f) {
      throw this.fieldError({code: FieldErrorCode.VALUE_ENCODING, value, encoding: "ascii"});
    }
    return BigInt(code);
  }

  private fromLiteral(value: string): bigint {
    const decimal = parseIntegerLiteral(value);
    if (decimal === null) {
      throw this.fieldError({code: FieldErrorCode.VALUE, value});
    }
    return decimal;
  }
}

/**
 * Integer field of 1 to 64 bits
 *
 * ```ts
 * const counter = new Decimal(16, {signed: true});
 * counter.value = -40000; // clamped to -32768
 * ```
 */
export class Decimal extends DecimalField<number> {
  get itemType(): ItemClass {
    return ItemClass.Decimal;
  }

  get value(): number {
    return Number(this.raw);
  }

  set value(value: FieldInput) {
    this.raw = this.toDecimal(value);
  }
}

export class Signed extends Decimal {
  constructor(bitSize: number, opts: Omit<DecimalOptions, "signed"> = {}) {
    super(bitSize, {...opts, signed: true});
  }

  get itemType(): ItemClass {
    return ItemClass.Signed;
  }
}

/**
 * Unsigned integer viewed as a `0x` prefixed hex string
 */
export class Unsigned extends DecimalField<string> {
  constructor(bitSize: number, opts: Omit<DecimalOptions, "signed"> = {}) {
    super(bitSize, {...opts, signed: false});
  }

  get itemType(): ItemClass {
    return ItemClass.Unsigned;
  }

  get value(): string {
    return `0x${this.raw.toString(16)}`;
  }

  set value(value: FieldInput) {
    this.raw = this.toDecimal(value);
  }
}
