import {describe, it, expect, vi} from "vitest";
import {
  ArrayPointer,
  ByteBuffer,
  CodingOptions,
  ContainerErrorCode,
  createIndex,
  Decimal,
  FieldErrorCode,
  Index,
  MemoryProvider,
  Pointer,
  PointerErrorCode,
  Provider,
  RelativePointer,
  Stream,
  StringPointer,
  Structure,
  StructurePointer,
  structurePointer,
} from "../../src/index.js";
import {getMockedLogger} from "../utils/logger.js";

function image(size: number, content: {[address: number]: number[]}): MemoryProvider {
  const bytes = new Uint8Array(size);
  for (const [address, data] of Object.entries(content)) {
    bytes.set(data, Number(address));
  }
  return new MemoryProvider(bytes);
}

describe("Pointer", () => {
  it("should be a 32 bit unsigned address by default", () => {
    const pointer = new Pointer(new Decimal(16));
    expect(pointer.name).toBe("Pointer32");
    expect(pointer.value).toBe("0x0");
    expect(pointer.isNull()).toBe(true);
    expect(pointer.isPointer()).toBe(true);
    expect(pointer.dataSize).toBe(2);
    expect(pointer.dataByteOrder).toBe("little");

    pointer.value = -1;
    expect(pointer.value).toBe("0x0");
    pointer.value = 0x100000000;
    expect(pointer.value).toBe("0xffffffff");
  });

  it("should read its data at the address", () => {
    const provider = image(0x20, {0x10: [0x34, 0x12]});
    const pointer = new Pointer(new Decimal(16), {address: 0x10});

    pointer.readFrom(provider);
    expect(pointer.data.value).toBe(0x1234);
    expect(pointer.bytestream).toBe("3412");
    expect(pointer.data.index).toEqual(createIndex({address: 0x10, baseAddress: 0x10}));
  });

  it("should decode its data in the data byte order", () => {
    const provider = image(0x20, {0x10: [0x34, 0x12]});
    const pointer = new Pointer(new Decimal(16), {address: 0x10, dataOrder: "big"});
    pointer.readFrom(provider);
    expect(pointer.data.value).toBe(0x3412);
  });

  it("should not read through a null pointer", () => {
    const provider = image(4, {0: [1, 2]});
    const read = vi.spyOn(provider, "read");
    const pointer = new Pointer(new Decimal(16));
    pointer.data.value = 7;

    pointer.readFrom(provider);
    expect(read).not.toHaveBeenCalled();
    expect(pointer.data.value).toBe(0);

    pointer.readFrom(provider, {nullAllowed: true});
    expect(read).toHaveBeenCalledWith(0, 2);
    expect(pointer.data.value).toBe(0x201);
  });

  it("should reset null pointers inside its data even when null is allowed for itself", () => {
    const provider = image(0x20, {0x00: [0xaa, 0xbb], 0x10: [0, 0, 0, 0]});
    const read = vi.spyOn(provider, "read");
    const inner = new Pointer(new Decimal(16));
    const outer = new StructurePointer(new Structure({inner}), {address: 0x10});
    inner.data.value = 7;

    outer.readFrom(provider, {nullAllowed: true});
    expect(read.mock.calls).toEqual([[0x10, 4]]);
    expect(inner.isNull()).toBe(true);
    expect(inner.data.value).toBe(0);
  });

  it("should reject addresses beyond the safe integer range", () => {
    const pointer = new Pointer(new Decimal(8), {bitSize: 64});
    pointer.value = BigInt("0x1000000000000001");
    expect(pointer.value).toBe("0x1000000000000001");
    expect(() => pointer.address).toThrowErrorCode(FieldErrorCode.ADDRESS);
    expect(() => pointer.baseAddress).toThrowErrorCode(FieldErrorCode.ADDRESS);

    pointer.value = 0x1000;
    expect(pointer.address).toBe(0x1000);
  });

  it("should ignore providers without data", () => {
    const pointer = new Pointer(null, {address: 1});
    const provider = image(4, {});
    const read = vi.spyOn(provider, "read");
    pointer.readFrom(provider);
    expect(read).not.toHaveBeenCalled();
    expect(pointer.dataSize).toBe(0);
    expect(pointer.viewFields()).toEqual({value: "0x1", data: null});
  });

  it("should fail when the provider returns fewer bytes", () => {
    const provider: Provider = {read: () => new Uint8Array(1), write: vi.fn()};
    const pointer = new Pointer(new Decimal(16), {address: 4});
    expect(() => pointer.readFrom(provider)).toThrowErrorCode(PointerErrorCode.READ_SIZE);
  });

  it("should log each read", () => {
    const logger = getMockedLogger();
    const pointer = new Pointer(new Decimal(8), {address: 2});
    pointer.readFrom(image(4, {}), {logger});
    expect(logger.debug).toHaveBeenCalledWith("Read pointer data", {pointer: "Pointer32", address: 2, count: 1});
  });

  it("should decode and encode its data from the byte stream when nested", () => {
    const pointer = new Pointer(new Decimal(16));
    pointer.bytestream = "3412";
    pointer.deserialize(Uint8Array.from([0x10, 0, 0, 0]), createIndex(), {nested: true});
    expect(pointer.value).toBe("0x10");
    expect(pointer.data.value).toBe(0x1234);

    pointer.data.value = 7;
    const buffer = new ByteBuffer();
    pointer.serialize(buffer, createIndex(), {nested: true});
    expect(buffer.toBytes()).toEqual(Uint8Array.from([0x10, 0, 0, 0]));
    expect(pointer.bytestream).toBe("0700");
    expect(pointer.serializeData()).toEqual(Uint8Array.from([7, 0]));
  });

  it("should decode its data from a given buffer", () => {
    const pointer = new Pointer(new Decimal(16), {address: 0x20});
    expect(pointer.deserializeData(Uint8Array.from([5, 0]))).toEqual(createIndex({byte: 2, address: 0x22, baseAddress: 0x20}));
    expect(pointer.data.value).toBe(5);
  });

  it("should assign value and data", () => {
    const pointer = new Pointer(new Decimal(8));
    pointer.initializeFields({value: 0x30, data: 5});
    expect(pointer.viewFields()).toEqual({value: "0x30", data: 5});
    expect(() => pointer.initializeFields({other: 1})).toThrowErrorCode(ContainerErrorCode.MEMBER_NAME);
  });

  it("should describe itself with its data", () => {
    const pointer = new Pointer(new Decimal(8), {address: 0x20});
    pointer.indexData();
    expect(pointer.describe()).toEqual({
      address: 0,
      alignment: [4, 0],
      class: "Pointer",
      index: [0, 0],
      name: "Pointer",
      order: "auto",
      size: 32,
      type: "Pointer",
      value: "0x20",
      max: 4294967295,
      min: 0,
      signed: false,
      member: [
        {
          address: 0x20,
          alignment: [1, 0],
          class: "Decimal8",
          index: [0, 0],
          name: "data",
          order: "auto",
          size: 8,
          type: "Field",
          value: 0,
          max: 255,
          min: 0,
          signed: false,
        },
      ],
    });
  });
});

describe("nested pointers", () => {
  // 0x00: pointer to 0x08
  // 0x08: count 42, 16-bit pointer to 0x10
  // 0x10: "ABC"
  const provider = image(0x20, {0x00: [0x08, 0, 0, 0], 0x08: [0x2a, 0x00, 0x10, 0x00], 0x10: [0x41, 0x42, 0x43, 0x00]});

  function layout(): {root: Structure; header: StructurePointer; count: Decimal; label: StringPointer} {
    const count = new Decimal(16);
    const label = new StringPointer(4, {bitSize: 16});
    const header = new StructurePointer(new Structure({count, label}));
    const root = new Structure({header});
    return {root, header, count, label};
  }

  it("should follow pointers in the data it read", () => {
    const {root, count, label} = layout();
    root.deserialize(provider.read(0, 4));
    root.readFrom(provider);

    expect(count.value).toBe(42);
    expect(label.data.value).toBe("ABC");
    expect(root.viewFields(["value"], {nested: true})).toEqual({
      header: {value: "0x8", data: {count: 42, label: {value: "0x10", data: "ABC"}}},
    });
  });

  it("should stop at the first level without nested", () => {
    const {root, count, label} = layout();
    root.deserialize(provider.read(0, 4));
    root.readFrom(provider, {nested: false});

    expect(count.value).toBe(42);
    expect(label.value).toBe("0x10");
    expect(label.data.value).toBe("");
  });

  it("should index the data at the addresses", () => {
    const {root, header, count, label} = layout();
    header.value = 8;
    label.value = 0x10;
    root.indexFields(createIndex(), {nested: true});

    expect(count.index.address).toBe(0x08);
    expect(label.index.address).toBe(0x0a);
    expect(label.data.index.address).toBe(0x10);
  });

  it("should list nested fields by path", () => {
    const {root} = layout();
    expect(root.fieldItems("", {nested: true}).map(([path]) => path)).toEqual([
      "header",
      "header.data.count",
      "header.data.label",
      "header.data.label.data",
    ]);
    expect(root.fieldItems().map(([path]) => path)).toEqual(["header"]);
  });
});

describe("StructurePointer", () => {
  it("should count the members of its data apart from its own bit size", () => {
    const pointer = new StructurePointer(new Structure({a: new Decimal(8), b: new Decimal(8)}));
    expect(pointer.size).toBe(2);
    expect(pointer.bitSize).toBe(32);
    expect(pointer.keys()).toEqual(["a", "b"]);
  });
});

describe("RelativePointer", () => {
  it("should add the base address of the enclosing data", () => {
    const provider = image(0x10, {0x08: [0x04], 0x0c: [0x99]});
    const entry = new RelativePointer(new Decimal(8), {bitSize: 8});
    const table = structurePointer({entry}, {address: 0x08});

    table.readFrom(provider);
    expect(entry.value).toBe("0x4");
    expect(entry.baseAddress).toBe(0x08);
    expect(entry.address).toBe(0x0c);
    expect(entry.data.value).toBe(0x99);
  });
});

class Message extends Structure {
  readonly count = this.add("count", new Decimal(8));
  readonly payload = this.add("payload", new Stream());

  deserialize(buffer: Uint8Array, index: Index = createIndex(), opts: Partial<CodingOptions> = {}): Index {
    const next = super.deserialize(buffer, index, opts);
    if (this.payload.length !== this.count.value) {
      this.payload.resize(this.count.value);
      return {...next, update: true};
    }
    return next;
  }
}

describe("variable sized data", () => {
  it("should read again once the data resized itself", () => {
    const provider = image(0x30, {0x20: [3, 0xaa, 0xbb, 0xcc]});
    const logger = getMockedLogger();
    const pointer = new StructurePointer(new Message(), {address: 0x20});

    pointer.readFrom(provider, {logger});
    expect(pointer.data.payload.value).toBe("aabbcc");
    expect(pointer.dataSize).toBe(4);
    expect(logger.debug.mock.calls).toEqual([
      ["Read pointer data", {pointer: "Pointer32", address: 0x20, count: 1}],
      ["Read pointer data", {pointer: "Pointer32", address: 0x20, count: 4}],
    ]);
  });
});

describe("ArrayPointer", () => {
  it("should read all elements", () => {
    const pointer = new ArrayPointer(new Decimal(8), 3, {address: 2});
    pointer.readFrom(image(8, {2: [7, 8, 9]}));
    expect([...pointer].map((element) => element.value)).toEqual([7, 8, 9]);
    expect(pointer.viewFields()).toEqual({value: "0x2", data: [7, 8, 9]});

    pointer.resize(4);
    expect(pointer.dataSize).toBe(4);
    expect(pointer.append().value).toBe(0);
    expect(pointer.length).toBe(5);
  });
});

describe("patch", () => {
  function nibbles(): {pointer: StructurePointer; low: Decimal; high: Decimal} {
    const low = new Decimal(4);
    const high = new Decimal(4);
    return {pointer: new StructurePointer(new Structure({low, high}), {address: 0x100}), low, high};
  }

  it("should cut a bit field out of its group", () => {
    const {pointer, high} = nibbles();
    high.value = 0xa;
    expect(pointer.patch(high)).toEqual({
      buffer: Uint8Array.from([0xa0]),
      address: 0x100,
      byteOrder: "little",
      bitSize: 4,
      bitOffset: 4,
      inject: true,
    });
  });

  it("should merge injected bits into the provider", () => {
    const {pointer, high} = nibbles();
    const provider = image(0x101, {0x100: [0x35]});
    high.value = 0xa;
    pointer.writeTo(provider, high);
    expect(provider.read(0x100, 1)).toEqual(Uint8Array.from([0xa5]));
  });

  it("should write a whole container without injecting", () => {
    const {pointer, low, high} = nibbles();
    low.value = 5;
    high.value = 0xa;
    const patch = pointer.patch(pointer.data);
    expect(patch).toEqual({
      buffer: Uint8Array.from([0xa5]),
      address: 0x100,
      byteOrder: "little",
      bitSize: 8,
      bitOffset: 0,
      inject: false,
    });

    const provider = image(0x101, {});
    pointer.writeTo(provider, pointer.data);
    expect(provider.read(0x100, 1)).toEqual(Uint8Array.from([0xa5]));
  });

  it("should pick the bytes of a field in a wider group", () => {
    const a = new Decimal(12, {alignTo: 2});
    const b = new Decimal(4, {alignTo: 2});
    const pointer = structurePointer({a, b}, {address: 0x10});
    b.value = 0xf;

    expect(pointer.patch(b)).toMatchObject({buffer: Uint8Array.from([0xf0]), address: 0x11, bitSize: 4, bitOffset: 4});
    expect(pointer.patch(b, "big")).toMatchObject({buffer: Uint8Array.from([0xf0]), address: 0x10, bitSize: 4, bitOffset: 4});
  });

  it("should write whole byte fields in the byte order given", () => {
    const value = new Decimal(16);
    const pointer = structurePointer({value}, {address: 2});
    const provider = image(4, {});
    value.value = 0x1234;

    pointer.writeTo(provider, value, "big");
    expect(provider.content).toEqual(Uint8Array.from([0, 0, 0x12, 0x34]));
  });

  it("should skip containers without fields", () => {
    const pointer = structurePointer({empty: new Structure()}, {address: 2});
    const provider = image(4, {});
    const write = vi.spyOn(provider, "write");
    const empty = pointer.get("empty");

    expect(empty).toBeInstanceOf(Structure);
    if (empty instanceof Structure) {
      expect(pointer.patch(empty)).toBeNull();
      pointer.writeTo(provider, empty);
    }
    expect(write).not.toHaveBeenCalled();
  });

  it("should reject a container that does not end on a byte", () => {
    const pointer = structurePointer({a: new Decimal(4, {alignTo: 1})}, {address: 2});
    expect(() => pointer.patch(pointer.data)).toThrowErrorCode(ContainerErrorCode.LENGTH);
  });
});
