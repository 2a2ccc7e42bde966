import {divmod} from "@binlayout/utils";
import {ByteBuffer} from "../buffer.js";
import {ByteOrder, parseByteOrder} from "../byteOrder.js";
import {ItemClass} from "../constants.js";
import {Alignment, createAlignment, createIndex, formatIndex, Index} from "../cursor.js";
import {FieldError, FieldErrorCode} from "../errors.js";
import {AttributeValue, FieldAttribute, FieldInput, FieldMetadata, FieldValue} from "../interface.js";
import {CodingOptions} from "../options.js";
import type {Pointer} from "../pointers/pointer.js";

/**
 * Leaf of a layout tree: a typed value of `bitSize` bits that decodes itself from a
 * buffer and encodes itself into one.
 *
 * `T` is the type `value` reports, `S` the type the field stores and moves
 * through `unpack` / `pack`.
 */
export abstract class Field<T extends FieldValue = FieldValue, S = unknown> {
  protected abstract raw: S;
  protected _bitSize: number;
  protected alignByteSize: number;
  protected alignBitOffset = 0;
  private _index: Index = createIndex();
  private _byteOrder: ByteOrder;

  constructor(bitSize = 0, alignTo = 0, byteOrder: ByteOrder = "auto") {
    this._bitSize = bitSize;
    this.alignByteSize = alignTo;
    this._byteOrder = parseByteOrder(byteOrder, new.target.name);
  }

  abstract get itemType(): ItemClass;

  abstract get value(): T;
  abstract set value(value: FieldInput);

  /**
   * Decode the stored value of this field from `buffer` at `index`.
   * Bytes missing at the end of `buffer` read as zero.
   */
  abstract unpack(buffer: Uint8Array, index?: Index, opts?: Partial<CodingOptions>): S;

  /**
   * Encode the stored value. Returns the bytes to append to `buffer`, an empty
   * array when the value was merged into the last bytes of `buffer` instead.
   */
  abstract pack(buffer?: ByteBuffer, opts?: Partial<CodingOptions>): Uint8Array;

  /** Type name and size, e.g. `Unsigned16` */
  get name(): string {
    return `${ItemClass[this.itemType]}${this.bitSize}`;
  }

  get bitSize(): number {
    return this._bitSize;
  }

  get alignment(): Alignment {
    return createAlignment(this.alignByteSize, this.alignBitOffset);
  }

  get byteOrder(): ByteOrder {
    return this._byteOrder;
  }

  set byteOrder(byteOrder: ByteOrder) {
    this._byteOrder = parseByteOrder(byteOrder, this.name);
  }

  get index(): Index {
    return this._index;
  }

  /**
   * Place the field. Fields other than single bits take their bit offset in the
   * aligned group from `index.bit`.
   */
  set index(index: Index) {
    const {byte, bit, address} = index;
    const location = {field: this.name, byte, bit};

    if (byte < 0 || bit < 0 || bit > 64) {
      throw new FieldError({code: FieldErrorCode.INDEX, ...location});
    }

    const groupSize = Math.ceil((this.bitSize + bit) / 8);
    if (this.alignByteSize < groupSize) {
      throw new FieldError({code: FieldErrorCode.GROUP_SIZE, byteSize: this.alignByteSize, required: groupSize, ...location});
    }

    if (!this.isBit()) {
      this.alignBitOffset = bit;
    } else if (this.alignBitOffset !== bit) {
      throw new FieldError({code: FieldErrorCode.GROUP_OFFSET, bitOffset: this.alignBitOffset, ...location});
    }

    if (address < 0) {
      throw new FieldError({code: FieldErrorCode.ADDRESS, address, ...location});
    }

    this._index = index;
  }

  isBit(): boolean {
    return false;
  }

  isPointer(): this is Pointer {
    return false;
  }

  /**
   * Assign `index` to the field and return the index of the next field. The byte
   * offset advances once the bits placed so far fill the aligned group.
   */
  indexField(index: Index = this.index): Index {
    this.index = index;

    let {byte, bit, address} = index;
    bit += this.bitSize;
    const [groupSize, offset] = divmod(bit, 8);

    if (this.alignByteSize === groupSize) {
      if (offset !== 0) {
        throw new FieldError({
          code: FieldErrorCode.GROUP_SIZE,
          field: this.name,
          byte: index.byte,
          bit: index.bit,
          byteSize: this.alignByteSize,
          required: groupSize + 1,
        });
      }
      byte += this.alignByteSize;
      address += this.alignByteSize;
      bit = 0;
    }

    return {...index, byte, bit, address};
  }

  deserialize(buffer: Uint8Array, index: Index = createIndex(), opts: Partial<CodingOptions> = {}): Index {
    this.index = index;
    this.raw = this.unpack(buffer, index, opts);
    return this.indexField(index);
  }

  serialize(buffer: ByteBuffer, index: Index = createIndex(), opts: Partial<CodingOptions> = {}): Index {
    this.index = index;
    buffer.append(this.pack(buffer, opts));
    return this.indexField(index);
  }

  describe(name?: string, _opts?: {nested?: boolean}): FieldMetadata {
    return {
      address: this.index.address,
      alignment: [this.alignByteSize, this.alignBitOffset],
      class: this.name,
      index: [this.index.byte, this.index.bit],
      name: name || this.name,
      order: this.byteOrder,
      size: this.bitSize,
      type: ItemClass[ItemClass.Field],
      value: this.value,
    };
  }

  attribute(attribute: FieldAttribute): AttributeValue {
    switch (attribute) {
      case "value":
        return this.value;
      case "name":
        return this.name;
      case "bitSize":
        return this.bitSize;
      case "byteOrder":
        return this.byteOrder;
      case "alignment":
        return this.alignment;
      case "index":
        return this.index;
    }
  }

  /**
   * Shallow copy with the same prototype. Stored values are replaced on assignment,
   * never mutated, so the copy evolves independently.
   */
  clone(): this {
    const copy = Object.create(Object.getPrototypeOf(this)) as this;
    return Object.assign(copy, this);
  }

  toString(): string {
    return `${this.name}(${formatIndex(this.index)}, ${this.bitSize}, ${String(this.value)})`;
  }

  protected fieldError(type: DistributiveOmit<FieldErrorTypeOf, "field" | "byte" | "bit">, index = this.index): FieldError {
    return new FieldError({...type, field: this.name, byte: index.byte, bit: index.bit});
  }
}

type FieldErrorTypeOf = ConstructorParameters<typeof FieldError>[0];
type DistributiveOmit<T, K extends keyof T> = T extends unknown ? Omit<T, K> : never;
