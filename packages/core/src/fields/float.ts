import {clamp, fitBytes} from "@binlayout/utils";
import {ByteBuffer} from "../buffer.js";
import {ByteOrder, resolveByteOrder} from "../byteOrder.js";
import {ItemClass} from "../constants.js";
import {Index} from "../cursor.js";
import {FieldErrorCode} from "../errors.js";
import {FieldInput, FieldMetadata} from "../interface.js";
import {CodingOptions} from "../options.js";
import {Field} from "./field.js";

/**
 * IEEE-754 number occupying a whole byte aligned group. The field's own byte
 * order replaces the decode byte order.
 */
export abstract class FloatingField extends Field<number, number> {
  protected raw = 0;

  constructor(bitSize: 32 | 64, byteOrder: ByteOrder = "auto") {
    super(bitSize, bitSize / 8, byteOrder);
  }

  abstract max(): number;

  min(): number {
    return -this.max();
  }

  get value(): number {
    return this.raw;
  }

  set value(value: FieldInput) {
    this.raw = this.toFloat(value);
  }

  unpack(buffer: Uint8Array, index: Index = this.index, opts: Partial<CodingOptions> = {}): number {
    if (index.bit !== 0) {
      throw this.fieldError({code: FieldErrorCode.INDEX}, index);
    }
    const size = this.alignByteSize;
    const content = Buffer.from(fitBytes(buffer.subarray(index.byte, index.byte + size), size));
    return this.read(content, this.isBigEndian(opts));
  }

  pack(_buffer?: ByteBuffer, opts: Partial<CodingOptions> = {}): Uint8Array {
    if (this.index.bit !== 0) {
      throw this.fieldError({code: FieldErrorCode.INDEX});
    }
    const content = Buffer.alloc(this.alignByteSize);
    this.write(content, this.raw, this.isBigEndian(opts));
    return new Uint8Array(content);
  }

  describe(name?: string, opts?: {nested?: boolean}): FieldMetadata {
    return {...super.describe(name, opts), max: this.max(), min: this.min()};
  }

  protected abstract read(content: Buffer, bigEndian: boolean): number;
  protected abstract write(content: Buffer, value: number, bigEndian: boolean): void;

  private isBigEndian(opts: Partial<CodingOptions>): boolean {
    const byteOrder = this.byteOrder === "auto" ? opts.byteOrder : this.byteOrder;
    return resolveByteOrder(byteOrder) === "big";
  }

  private toFloat(value: FieldInput): number {
    let float: number;
    if (typeof value === "string") {
      float = value.trim() === "" ? NaN : Number(value);
    } else if (value instanceof Uint8Array) {
      throw this.fieldError({code: FieldErrorCode.TYPE, value: "Uint8Array"});
    } else {
      float = Number(value);
    }
    if (Number.isNaN(float)) {
      throw this.fieldError({code: FieldErrorCode.VALUE, value: String(value)});
    }
    return clamp(float, this.min(), this.max());
  }
}

/** Single precision, 4 bytes */
export class Float extends FloatingField {
  constructor(byteOrder?: ByteOrder) {
    super(32, byteOrder);
  }

  get itemType(): ItemClass {
    return ItemClass.Float;
  }

  max(): number {
    return (2 - 2 ** -23) * 2 ** 127;
  }

  protected read(content: Buffer, bigEndian: boolean): number {
    return bigEndian ? content.readFloatBE(0) : content.readFloatLE(0);
  }

  protected write(content: Buffer, value: number, bigEndian: boolean): void {
    if (bigEndian) content.writeFloatBE(value, 0);
    else content.writeFloatLE(value, 0);
  }
}

/** Double precision, 8 bytes */
export class Double extends FloatingField {
  constructor(byteOrder?: ByteOrder) {
    super(64, byteOrder);
  }

  get itemType(): ItemClass {
    return ItemClass.Double;
  }

  max(): number {
    return Number.MAX_VALUE;
  }

  protected read(content: Buffer, bigEndian: boolean): number {
    return bigEndian ? content.readDoubleBE(0) : content.readDoubleLE(0);
  }

  protected write(content: Buffer, value: number, bigEndian: boolean): void {
    if (bigEndian) content.writeDoubleBE(value, 0);
    else content.writeDoubleLE(value, 0);
  }
}
