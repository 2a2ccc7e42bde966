import {describe, it, expect} from "vitest";
import {Bit, Bitset, Bool, Byte, Char, createIndex, Decimal, FieldErrorCode, Structure} from "../../src/index.js";

describe("Bit", () => {
  it("should align to the smallest group holding its bit", () => {
    expect(new Bit(5).alignment).toEqual({byteSize: 1, bitOffset: 5});
    expect(new Bit(8).alignment).toEqual({byteSize: 2, bitOffset: 8});
    expect(new Bit(3, 4).alignment).toEqual({byteSize: 4, bitOffset: 3});
    expect(new Bit(0).name).toBe("Bit");
    expect(new Bit(0).isBit()).toBe(true);
  });

  it("should reject bit numbers outside its group", () => {
    expect(() => new Bit(64)).toThrowErrorCode(FieldErrorCode.ALIGNMENT);
    expect(() => new Bit(8, 1)).toThrowErrorCode(FieldErrorCode.ALIGNMENT);
  });

  it("should reject a placement at another bit", () => {
    expect(() => new Bit(3).indexField(createIndex())).toThrowErrorCode(FieldErrorCode.GROUP_OFFSET);
  });

  it("should map flags of a status byte", () => {
    const ready = new Bit(0);
    const error = new Bit(1);
    const rest = new Decimal(6, {alignTo: 1});
    const status = new Structure({ready, error, rest});

    expect(status.deserialize(Uint8Array.from([0xb6]))).toEqual(createIndex({byte: 1, address: 1}));
    expect([ready.value, error.value, rest.value]).toEqual([0, 1, 0x2d]);

    ready.value = 1;
    error.value = 0;
    rest.value = 3;
    expect(status.toBytes()).toEqual(Uint8Array.from([0x0d]));
  });
});

describe("Byte", () => {
  it("should view one byte as hex", () => {
    const field = new Byte();
    expect(field.name).toBe("Byte");
    expect(field.value).toBe("0x0");
    field.value = 0x41;
    expect(field.value).toBe("0x41");
    field.value = 0x1ff;
    expect(field.value).toBe("0xff");
  });
});

describe("Char", () => {
  it("should store a character code", () => {
    const field = new Char();
    field.value = "A";
    expect(field.value).toBe("A");
    expect(field.toBigInt()).toBe(BigInt(65));
    field.value = 66;
    expect(field.value).toBe("B");
  });

  it("should reject text that is not ASCII", () => {
    const field = new Char();
    expect(() => (field.value = "é")).toThrowErrorCode(FieldErrorCode.VALUE_ENCODING);
    expect(() => (field.value = "")).toThrowErrorCode(FieldErrorCode.VALUE);
  });
});

describe("Bitset", () => {
  it("should view all bits", () => {
    const field = new Bitset(8);
    field.value = 5;
    expect(field.value).toBe("0b00000101");
    expect(field.name).toBe("Bitset8");
  });
});

describe("Bool", () => {
  it("should be true for any non zero value", () => {
    const field = new Bool(8);
    expect(field.value).toBe(false);
    field.value = 2;
    expect(field.value).toBe(true);
    field.value = false;
    expect(field.value).toBe(false);
  });
});
