import {bytesToBigInt, fromHex, intToBytes, isHex, toHex} from "@binlayout/utils";
import {ByteBuffer} from "../buffer.js";
import {ByteOrder, DataByteOrder, parseByteOrder, toEndianness} from "../byteOrder.js";
import {DEFAULT_BYTE_ORDER, ItemClass} from "../constants.js";
import {assignField, describeValue, isContainer, isContentRecord, isField, isMixin, Member, viewField} from "../containers/container.js";
import {createIndex, Index, Patch} from "../cursor.js";
import {
  ContainerError,
  ContainerErrorCode,
  FieldError,
  FieldErrorCode,
  PointerError,
  PointerErrorCode,
} from "../errors.js";
import {DecimalField} from "../fields/decimal.js";
import {
  DataContainer,
  FieldAttribute,
  FieldContent,
  FieldInput,
  FieldItem,
  FieldMetadata,
  View,
} from "../interface.js";
import {getDefaultLogger} from "../logger.js";
import {CodingOptions, ReadOptions, ViewOptions} from "../options.js";
import {isProvider, Provider} from "../providers/provider.js";

export type PointerOptions = {
  /** Initial address, an offset from the base address for relative pointers */
  address?: number;
  /** Byte order of the referenced data */
  dataOrder?: DataByteOrder;
  /** Bit size of the address field */
  bitSize?: number;
  alignTo?: number;
  /** Byte order of the address field itself */
  fieldOrder?: ByteOrder;
  /** Address is an offset from the base address of the enclosing data */
  relative?: boolean;
};

/**
 * Unsigned address field that references data in a `Provider`.
 *
 * The pointer owns its data: reading fetches `dataSize` bytes at `address` into the
 * pointer's byte stream and decodes the data from it. Data that changes its size
 * while it is decoded sets `update` on the returned index, the pointer then reads
 * again with the new size.
 *
 * ```ts
 * const pointer = new Pointer(new Structure({length: new Decimal(16), flags: new Byte()}));
 * pointer.value = 0x100;
 * pointer.readFrom(new MemoryProvider(image));
 * ```
 */
export class Pointer<D extends Member | null = Member | null> extends DecimalField<string> implements DataContainer {
  private _data: D;
  protected dataStream: Uint8Array = new Uint8Array(0);
  private _dataByteOrder: DataByteOrder;
  private readonly relative: boolean;

  constructor(data: D, opts: PointerOptions = {}) {
    super(opts.bitSize ?? 32, {alignTo: opts.alignTo, byteOrder: opts.fieldOrder, signed: false});
    this._data = this.checkData(data);
    this._dataByteOrder = this.parseDataByteOrder(opts.dataOrder ?? DEFAULT_BYTE_ORDER);
    this.relative = opts.relative ?? false;
    if (opts.address !== undefined) {
      this.value = opts.address;
    }
  }

  get itemType(): ItemClass {
    return ItemClass.Pointer;
  }

  isPointer(): this is Pointer {
    return true;
  }

  get value(): string {
    return `0x${this.raw.toString(16)}`;
  }

  set value(value: FieldInput) {
    this.raw = this.toDecimal(value);
  }

  get data(): D {
    return this._data;
  }

  set data(data: D) {
    this._data = this.checkData(data);
  }

  /** Absolute address of the data */
  get address(): number {
    const value = this.rawAddress();
    return this.relative ? value + this.index.baseAddress : value;
  }

  /** Address the data of this pointer is relative to */
  get baseAddress(): number {
    return this.relative ? this.index.baseAddress : this.rawAddress();
  }

  get dataByteOrder(): DataByteOrder {
    return this._dataByteOrder;
  }

  set dataByteOrder(byteOrder: DataByteOrder) {
    this._dataByteOrder = this.parseDataByteOrder(byteOrder);
  }

  /** Bytes last read for or serialized from the data, as hex string */
  get bytestream(): string {
    return toHex(this.dataStream);
  }

  set bytestream(value: string | Uint8Array) {
    if (typeof value === "string") {
      if (!isHex(value)) {
        throw this.fieldError({code: FieldErrorCode.VALUE, value});
      }
      this.dataStream = fromHex(value);
    } else {
      this.dataStream = Uint8Array.from(value);
    }
  }

  /** Bytes to read for the data */
  get dataSize(): number {
    const data = this._data;
    if (isContainer(data)) {
      const [bytes, bits] = data.containerSize();
      return bytes + Math.ceil(bits / 8);
    }
    if (isField(data)) {
      return Math.ceil(data.bitSize / 8);
    }
    return 0;
  }

  isNull(): boolean {
    return this.raw === 0n;
  }

  /**
   * Decode the data from `buffer`, or from the byte stream when `buffer` is empty.
   * Pointers inside the data are not followed.
   */
  deserializeData(buffer: Uint8Array = new Uint8Array(0), byteOrder: DataByteOrder = this._dataByteOrder): Index {
    const index = this.dataIndex();
    if (this._data === null) {
      return index;
    }
    const source = buffer.length > 0 ? buffer : this.dataStream;
    return this._data.deserialize(source, index, {byteOrder, nested: false});
  }

  /** Encode the data without following pointers inside it */
  serializeData(byteOrder: DataByteOrder = this._dataByteOrder): Uint8Array {
    const buffer = new ByteBuffer();
    if (this._data !== null) {
      this._data.serialize(buffer, this.dataIndex(), {byteOrder, nested: false});
    }
    return buffer.toBytes();
  }

  /**
   * Assign an index to every field of the data, starting at the data address
   */
  indexData(): void {
    const data = this._data;
    const index = this.dataIndex();
    if (isContainer(data)) {
      data.indexFields(index, {nested: true});
    } else if (isField(data)) {
      data.indexField(index);
      if (data.isPointer()) {
        data.indexData();
      }
    }
  }

  indexFields(index: Index = this.index, opts: Partial<CodingOptions> = {}): Index {
    const next = this.indexField(index);
    const data = this._data;
    if (isContainer(data)) {
      data.indexFields(this.dataIndex(), opts);
    } else if (isField(data)) {
      if (opts.nested && data.isPointer()) {
        data.indexFields(this.dataIndex(), opts);
      } else {
        data.indexField(this.dataIndex());
      }
    }
    return next;
  }

  deserialize(buffer: Uint8Array, index: Index = createIndex(), opts: Partial<CodingOptions> = {}): Index {
    const next = super.deserialize(buffer, index, opts);
    if (this._data !== null && opts.nested) {
      this._data.deserialize(this.dataStream, this.dataIndex(), {...opts, byteOrder: this._dataByteOrder});
    }
    return next;
  }

  serialize(buffer: ByteBuffer, index: Index = createIndex(), opts: Partial<CodingOptions> = {}): Index {
    const next = super.serialize(buffer, index, opts);
    if (this._data !== null && opts.nested) {
      const stream = new ByteBuffer();
      this._data.serialize(stream, this.dataIndex(), {...opts, byteOrder: this._dataByteOrder});
      this.dataStream = stream.toBytes();
    }
    return next;
  }

  /**
   * Read the data at `address` from `provider`. A null pointer reads nothing and
   * resets the data unless `nullAllowed` is set.
   */
  readFrom(provider: Provider, opts: ReadOptions = {}): void {
    const data = this._data;
    if (data === null) {
      return;
    }
    if (!isProvider(provider)) {
      throw new PointerError({code: PointerErrorCode.PROVIDER_TYPE, pointer: this.name, value: describeValue(provider)});
    }

    const {nullAllowed = false, nested = true} = opts;
    const logger = opts.logger ?? getDefaultLogger();

    if (!nullAllowed && this.isNull()) {
      logger.debug("Null pointer, data reset", {pointer: this.name});
      this.dataStream = new Uint8Array(0);
      this.deserializeData();
      return;
    }

    let index: Index;
    do {
      const address = this.address;
      const count = this.dataSize;
      logger.debug("Read pointer data", {pointer: this.name, address, count});

      const bytes = provider.read(address, count);
      if (bytes.length !== count) {
        throw new PointerError({
          code: PointerErrorCode.READ_SIZE,
          pointer: this.name,
          address,
          expected: count,
          actual: bytes.length,
        });
      }
      this.dataStream = Uint8Array.from(bytes);

      index = this.deserializeData();
      if (index.bit !== 0) {
        throw new ContainerError({code: ContainerErrorCode.LENGTH, container: this.name, byte: index.byte, bit: index.bit});
      }
    } while (index.update);

    // nullAllowed applies to this pointer only, nested null pointers reset
    if (nested && isMixin(data)) {
      data.readFrom(provider, {...opts, nullAllowed: false});
    }
  }

  /**
   * Bytes to write into the data source to store `item`, a member of the data.
   * Returns null for a container without fields.
   */
  patch(item: Member, byteOrder: DataByteOrder = DEFAULT_BYTE_ORDER): Patch | null {
    this.indexData();

    if (isContainer(item)) {
      const [bytes, bits] = item.containerSize();
      if (bits !== 0) {
        throw new ContainerError({code: ContainerErrorCode.LENGTH, container: item.name, byte: bytes, bit: bits});
      }
      const field = item.firstField();
      if (field === null) {
        return null;
      }
      const {index} = field;
      if (index.bit !== 0) {
        throw new FieldError({code: FieldErrorCode.INDEX, field: field.name, byte: index.byte, bit: index.bit});
      }

      const buffer = new ByteBuffer(index.byte);
      item.serialize(buffer, index, {byteOrder});
      const content = buffer.toBytes().subarray(index.byte);
      this.checkPatchSize(item.name, bytes, content.length);

      return {buffer: content, address: index.address, byteOrder, bitSize: bytes * 8, bitOffset: 0, inject: false};
    }

    const {index, alignment} = item;
    if (index.bit !== alignment.bitOffset) {
      throw new FieldError({
        code: FieldErrorCode.GROUP_OFFSET,
        field: item.name,
        byte: index.byte,
        bit: index.bit,
        bitOffset: alignment.bitOffset,
      });
    }

    const buffer = new ByteBuffer(index.byte);
    item.serialize(buffer, index, {byteOrder});
    const content = buffer.toBytes().subarray(index.byte);
    this.checkPatchSize(item.name, alignment.byteSize, content.length);

    // Cut the bytes holding the field out of its aligned group
    const bitOffset = alignment.bitOffset % 8;
    const patchOffset = Math.floor(alignment.bitOffset / 8);
    const patchSize = Math.ceil((bitOffset + item.bitSize) / 8);
    const inject = item.bitSize % 8 !== 0 || bitOffset !== 0;

    let start: number;
    let stop: number;
    if (byteOrder === "big") {
      start = alignment.byteSize - (patchOffset + patchSize);
      stop = alignment.byteSize - patchOffset;
    } else {
      start = patchOffset;
      stop = start + patchSize;
    }

    return {
      buffer: content.slice(start, stop),
      address: index.address + start,
      byteOrder,
      bitSize: item.bitSize,
      bitOffset,
      inject,
    };
  }

  /**
   * Write `item`, a member of the data, to `provider`. Items that do not cover
   * whole bytes are merged into the bytes the provider holds.
   */
  writeTo(
    provider: Provider,
    item: Member,
    byteOrder: DataByteOrder = DEFAULT_BYTE_ORDER,
    opts: Pick<ReadOptions, "logger"> = {}
  ): void {
    const patch = this.patch(item, byteOrder);
    if (patch === null) {
      return;
    }
    if (!isProvider(provider)) {
      throw new PointerError({code: PointerErrorCode.PROVIDER_TYPE, pointer: this.name, value: describeValue(provider)});
    }

    const logger = opts.logger ?? getDefaultLogger();
    const {address, buffer, inject} = patch;
    logger.debug("Write pointer data", {pointer: this.name, item: item.name, address, count: buffer.length, inject});

    if (!inject) {
      provider.write(buffer, address, buffer.length);
      return;
    }

    const endianness = toEndianness(patch.byteOrder);
    const current = provider.read(address, buffer.length);
    if (current.length !== buffer.length) {
      throw new PointerError({
        code: PointerErrorCode.READ_SIZE,
        pointer: this.name,
        address,
        expected: buffer.length,
        actual: current.length,
      });
    }
    const fieldMask = ((1n << BigInt(patch.bitSize)) - 1n) << BigInt(patch.bitOffset);
    const groupMask = (1n << BigInt(buffer.length * 8)) - 1n;
    const value = (bytesToBigInt(current, endianness) & ~fieldMask & groupMask) | bytesToBigInt(buffer, endianness);
    provider.write(intToBytes(value, buffer.length, endianness), address, buffer.length);
  }

  /**
   * Assign `{value, data}` content, `data` is assigned to the referenced data
   */
  initializeFields(content: FieldContent): void {
    if (!isContentRecord(content)) {
      throw new ContainerError({
        code: ContainerErrorCode.CONTENT,
        container: this.name,
        expected: "an object",
        value: describeValue(content),
      });
    }
    for (const [name, value] of Object.entries(content)) {
      const data = this._data;
      if (name === "value") {
        assignField(this, value);
      } else if (name === "data" && isMixin(data)) {
        data.initializeFields(value);
      } else if (name === "data" && isField(data)) {
        assignField(data, value);
      } else {
        throw new ContainerError({code: ContainerErrorCode.MEMBER_NAME, container: this.name, member: name});
      }
    }
  }

  viewFields(attributes: readonly FieldAttribute[] = ["value"], opts: ViewOptions = {}): {[key: string]: View} {
    const view: {[key: string]: View} = {};
    if (attributes.length > 1) {
      for (const attribute of attributes) {
        view[attribute] = this.attribute(attribute);
      }
    } else {
      view.value = this.attribute(attributes[0] ?? "value");
    }

    const data = this._data;
    if (isContainer(data)) {
      view.data = data.viewFields(attributes, opts);
    } else if (isField(data)) {
      view.data = opts.nested && data.isPointer() ? data.viewFields(attributes, opts) : viewField(data, attributes, opts.fieldnames);
    } else {
      view.data = null;
    }
    return view;
  }

  fieldItems(path = "", opts: Pick<ViewOptions, "nested"> = {}): FieldItem[] {
    const items: FieldItem[] = [[path || "field", this]];
    const dataPath = path ? `${path}.data` : "data";
    const data = this._data;
    if (isContainer(data)) {
      items.push(...data.fieldItems(dataPath, opts));
    } else if (isField(data)) {
      if (opts.nested && data.isPointer()) {
        items.push(...data.fieldItems(dataPath, opts));
      } else {
        items.push([dataPath, data]);
      }
    }
    return items;
  }

  describe(name?: string, opts: Pick<ViewOptions, "nested"> = {}): FieldMetadata {
    const className = this.constructor.name;
    const metadata: FieldMetadata = {
      ...super.describe(name, opts),
      class: className,
      name: name || className,
      type: ItemClass[ItemClass.Pointer],
    };
    const nested = opts.nested ?? true;
    if (nested && this._data !== null) {
      metadata.member = [this._data.describe("data", {nested})];
    }
    return metadata;
  }

  private dataIndex(): Index {
    return createIndex({address: this.address, baseAddress: this.baseAddress});
  }

  private rawAddress(): number {
    const address = Number(this.raw);
    if (!Number.isSafeInteger(address)) {
      throw this.fieldError({code: FieldErrorCode.ADDRESS, address});
    }
    return address;
  }

  private checkData(data: D): D {
    if (data !== null && !isField(data) && !isContainer(data)) {
      throw new ContainerError({
        code: ContainerErrorCode.MEMBER_TYPE,
        container: this.name,
        member: "data",
        value: describeValue(data),
      });
    }
    return data;
  }

  private parseDataByteOrder(value: unknown): DataByteOrder {
    const byteOrder = parseByteOrder(value, this.name);
    if (byteOrder === "auto") {
      throw this.fieldError({code: FieldErrorCode.BYTE_ORDER, byteOrder});
    }
    return byteOrder;
  }

  private checkPatchSize(item: string, expected: number, actual: number): void {
    if (expected !== actual) {
      throw new PointerError({code: PointerErrorCode.PATCH_SIZE, pointer: this.name, item, expected, actual});
    }
  }
}

/**
 * Pointer whose address is an offset from the base address of the data it is
 * part of
 */
export class RelativePointer<D extends Member | null = Member | null> extends Pointer<D> {
  constructor(data: D, opts: Omit<PointerOptions, "relative"> = {}) {
    super(data, {...opts, relative: true});
  }
}
