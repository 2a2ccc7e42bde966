import {describe, it, expect} from "vitest";
import {
  Bipolar,
  Bit,
  ContainerErrorCode,
  createIndex,
  Datetime,
  Decimal,
  Double,
  Enum,
  FieldErrorCode,
  Float,
  IPv4Address,
  Pointer,
  Stream,
  StringField,
  Structure,
  Unipolar,
  Unsigned,
} from "../../src/index.js";

class Header extends Structure {
  readonly magic = this.add("magic", new Unsigned(16));
  readonly length = this.add("length", new Decimal(8));
  readonly ready = new Bit(0);
  readonly error = new Bit(1);
  readonly reserved = new Decimal(6, {alignTo: 1});
  readonly flags = this.add("flags", new Structure({ready: this.ready, error: this.error, reserved: this.reserved}));
}

describe("Structure", () => {
  it("should keep members in declaration order", () => {
    const header = new Header();
    expect(header.keys()).toEqual(["magic", "length", "flags"]);
    expect(header.size).toBe(3);
    expect(header.containerSize()).toEqual([4, 0]);
    expect(header.firstField()).toBe(header.magic);
    expect(header.name).toBe("Header");
  });

  it("should decode all members", () => {
    const header = new Header();
    expect(header.deserialize(Uint8Array.from([0x4b, 0x4f, 0x05, 0x06]))).toEqual(createIndex({byte: 4, address: 4}));
    expect(header.viewFields()).toEqual({magic: "0x4f4b", length: 5, flags: {ready: 0, error: 1, reserved: 1}});
  });

  it("should encode all members", () => {
    const header = new Header();
    header.magic.value = 0x1234;
    header.length.value = 2;
    header.ready.value = 1;
    header.reserved.value = 3;
    expect(header.toBytes()).toEqual(Uint8Array.from([0x34, 0x12, 0x02, 0x0d]));
    expect(header.toBytes({byteOrder: "big"})).toEqual(Uint8Array.from([0x12, 0x34, 0x02, 0x0d]));
  });

  it("should view several attributes under other names", () => {
    const header = new Header();
    expect(header.viewFields(["name", "bitSize"], {fieldnames: ["type", "size"]})).toEqual({
      magic: {type: "Unsigned16", size: 16},
      length: {type: "Decimal8", size: 8},
      flags: {
        ready: {type: "Bit", size: 1},
        error: {type: "Bit", size: 1},
        reserved: {type: "Decimal6", size: 6},
      },
    });
  });

  it("should list fields by path", () => {
    const header = new Header();
    expect(header.fieldItems().map(([path]) => path)).toEqual(["magic", "length", "flags.ready", "flags.error", "flags.reserved"]);
    expect(header.fieldItems("header")[2]).toEqual(["header.flags.ready", header.ready]);
  });

  it("should assign nested content", () => {
    const header = new Header();
    header.initializeFields({length: 9, flags: {ready: 1, reserved: "0x3"}});
    expect(header.viewFields()).toEqual({magic: "0x0", length: 9, flags: {ready: 1, error: 0, reserved: 3}});
  });

  it("should reject content of another shape", () => {
    const header = new Header();
    expect(() => header.initializeFields({nope: 1})).toThrowErrorCode(ContainerErrorCode.MEMBER_NAME);
    expect(() => header.initializeFields([1])).toThrowErrorCode(ContainerErrorCode.CONTENT);
    expect(() => header.initializeFields({length: [1]})).toThrowErrorCode(FieldErrorCode.TYPE);
  });

  it("should describe members with their index", () => {
    const header = new Header();
    header.indexFields(createIndex({address: 0x100}));
    const metadata = header.describe();
    expect(metadata).toMatchObject({class: "Header", name: "Header", size: 3, type: "Structure"});
    expect(metadata.member[0]).toEqual({
      address: 0x100,
      alignment: [2, 0],
      class: "Unsigned16",
      index: [0, 0],
      name: "magic",
      order: "auto",
      size: 16,
      type: "Field",
      value: "0x0",
      max: 65535,
      min: 0,
      signed: false,
    });
    expect(metadata.member[2]).toMatchObject({class: "Structure", name: "flags", size: 3, type: "Structure"});
  });

  it("should reject duplicate and invalid names", () => {
    const header = new Header();
    expect(() => header.add("magic", new Decimal(8))).toThrowErrorCode(ContainerErrorCode.MEMBER_NAME);
    expect(() => header.set("1st", new Decimal(8))).toThrowErrorCode(ContainerErrorCode.MEMBER_NAME);
  });

  it("should wrap plain members into a structure", () => {
    const record = new Structure({id: new Decimal(8), point: {x: new Decimal(8), y: new Decimal(8)}});
    expect(record.get("point")).toBeInstanceOf(Structure);
    record.deserialize(Uint8Array.from([1, 2, 3]));
    expect(record.viewFields()).toEqual({id: 1, point: {x: 2, y: 3}});
  });

  it("should replace and delete members", () => {
    const record = new Structure({a: new Decimal(8), b: new Decimal(8)});
    const wide = new Decimal(16);
    record.set("a", wide);
    expect(record.get("a")).toBe(wide);
    expect(record.keys()).toEqual(["a", "b"]);
    expect(record.delete("b")).toBe(true);
    expect(record.has("b")).toBe(false);
    expect(record.containerSize()).toEqual([2, 0]);
  });

  it("should report a size that is not byte aligned", () => {
    const record = new Structure({a: new Decimal(4, {alignTo: 1})});
    expect(record.containerSize()).toEqual([0, 4]);
  });
});

class Record extends Structure {
  readonly mode = this.add("mode", new Enum(8, {enumeration: {idle: 0, run: 1}}));
  readonly ratio = this.add("ratio", new Float());
  readonly total = this.add("total", new Double());
  readonly gain = this.add("gain", new Bipolar(2, 16));
  readonly level = this.add("level", new Unipolar(2, 16));
  readonly tag = this.add("tag", new Stream(2));
  readonly label = this.add("label", new StringField(4));
  readonly stamp = this.add("stamp", new Datetime());
  readonly host = this.add("host", new IPv4Address());
  readonly link = new Pointer(new Decimal(16));
  readonly inner = this.add("inner", new Structure({link: this.link}));
}

describe("round trip", () => {
  const content = {
    mode: "run",
    ratio: 1.5,
    total: -2,
    gain: -100,
    level: 150,
    tag: "beef",
    label: "AB",
    stamp: "2024-02-29 12:34:56",
    host: "192.168.0.1",
    inner: {link: {value: 0x40, data: 0x1234}},
  };

  it("should decode every field kind it encoded", () => {
    const record = new Record();
    record.initializeFields(content);
    const bytes = record.toBytes({nested: true});
    expect(bytes.length).toBe(35);
    expect(bytes.subarray(0, 5)).toEqual(Uint8Array.from([0x01, 0x00, 0x00, 0xc0, 0x3f]));
    expect(bytes.subarray(31)).toEqual(Uint8Array.from([0x40, 0x00, 0x00, 0x00]));
    expect(record.link.bytestream).toBe("3412");

    const copy = new Record();
    copy.link.bytestream = record.link.bytestream;
    expect(copy.deserialize(bytes, createIndex(), {nested: true})).toEqual(createIndex({byte: 35, address: 35}));
    expect(copy.viewFields(["value"], {nested: true})).toEqual({
      mode: "run",
      ratio: 1.5,
      total: -2,
      gain: -100,
      level: 150,
      tag: "beef",
      label: "AB",
      stamp: "2024-02-29 12:34:56",
      host: "192.168.0.1",
      inner: {link: {value: "0x40", data: 0x1234}},
    });
  });
});
