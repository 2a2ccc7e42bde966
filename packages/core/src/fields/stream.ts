import {fitBytes, fromHex, isHex, toHex} from "@binlayout/utils";
import {ByteBuffer} from "../buffer.js";
import {ItemClass} from "../constants.js";
import {Index} from "../cursor.js";
import {FieldErrorCode} from "../errors.js";
import {FieldInput} from "../interface.js";
import {CodingOptions} from "../options.js";
import {Field} from "./field.js";

/**
 * Byte sequence of variable length viewed as hex string. The field is its own
 * group, `bitSize` is always `length * 8`.
 */
export class Stream extends Field<string, Uint8Array> {
  protected raw: Uint8Array = new Uint8Array(0);

  constructor(capacity = 0) {
    super();
    this.resize(capacity);
  }

  get itemType(): ItemClass {
    return ItemClass.Stream;
  }

  get name(): string {
    const type = ItemClass[this.itemType];
    return this.length > 0 ? `${type}${this.length}` : type;
  }

  get length(): number {
    return this.raw.length;
  }

  get value(): string {
    return toHex(this.raw);
  }

  /** Hex string or bytes, truncated or zero padded to the current length */
  set value(value: FieldInput) {
    this.raw = this.toStream(value, "hex");
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.raw);
  }

  /**
   * Change the length to `capacity` bytes, keeping the leading bytes and padding
   * with zeros
   */
  resize(capacity: number): void {
    const length = Math.max(Math.trunc(capacity), 0);
    if (length !== this.raw.length) {
      this.raw = fitBytes(this.raw, length);
    }
    this._bitSize = length * 8;
    this.alignByteSize = length;
  }

  unpack(buffer: Uint8Array, index: Index = this.index, _opts?: Partial<CodingOptions>): Uint8Array {
    if (index.bit !== 0) {
      throw this.fieldError({code: FieldErrorCode.INDEX}, index);
    }
    return fitBytes(buffer.subarray(index.byte, index.byte + this.length), this.length);
  }

  pack(_buffer?: ByteBuffer, _opts?: Partial<CodingOptions>): Uint8Array {
    if (this.index.bit !== 0) {
      throw this.fieldError({code: FieldErrorCode.INDEX});
    }
    return Uint8Array.from(this.raw);
  }

  protected toStream(value: FieldInput, encoding: "ascii" | "hex"): Uint8Array {
    let bytes: Uint8Array;
    if (value instanceof Uint8Array) {
      bytes = value;
    } else if (typeof value !== "string") {
      throw this.fieldError({code: FieldErrorCode.TYPE, value: typeof value});
    } else if (encoding === "hex") {
      if (!isHex(value)) {
        throw this.fieldError({code: FieldErrorCode.VALUE, value});
      }
      bytes = fromHex(value);
    } else {
      bytes = encodeAscii(value, (text) => this.fieldError({code: FieldErrorCode.VALUE_ENCODING, value: text, encoding}));
    }
    return fitBytes(bytes, this.length);
  }
}

/**
 * ASCII text in a byte sequence of fixed capacity, viewed up to the first NUL
 */
export class StringField extends Stream {
  get itemType(): ItemClass {
    return ItemClass.String;
  }

  get value(): string {
    const end = this.raw.indexOf(0);
    return Buffer.from(end >= 0 ? this.raw.subarray(0, end) : this.raw).toString("latin1");
  }

  /** Text is truncated or NUL padded to the current length */
  set value(value: FieldInput) {
    this.raw = this.toStream(value, "ascii");
  }

  isTerminated(): boolean {
    return this.raw.indexOf(0) >= 0;
  }
}

function encodeAscii(text: string, onError: (text: string) => Error): Uint8Array {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code > 0x7f) {
      throw onError(text);
    }
    bytes[i] = code;
  }
  return bytes;
}
