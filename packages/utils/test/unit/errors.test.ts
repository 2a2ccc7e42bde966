import {describe, it, expect} from "vitest";
import {BinlayoutError, isEmptyObject, isPlainObject} from "../../src/index.js";

describe("BinlayoutError", () => {
  it("should default the message to the code", () => {
    const error = new BinlayoutError({code: "SAMPLE_ERROR"});
    expect(error.message).toBe("SAMPLE_ERROR");
  });

  it("should expose metadata and stack", () => {
    const error = new BinlayoutError({code: "SAMPLE_ERROR", field: "flags", byte: 2}, "bad flags");
    error.stack = "$STACK";
    expect(error.message).toBe("bad flags");
    expect(error.getMetadata()).toEqual({code: "SAMPLE_ERROR", field: "flags", byte: 2});
    expect(error.toObject()).toEqual({code: "SAMPLE_ERROR", field: "flags", byte: 2, stack: "$STACK"});
  });

  it("should stringify non primitive metadata", () => {
    const error = new BinlayoutError({code: "SAMPLE_ERROR", value: BigInt(7), flag: true});
    expect(error.getMetadata()).toEqual({code: "SAMPLE_ERROR", value: "7", flag: "true"});
  });
});

describe("objects", () => {
  it("isPlainObject", () => {
    expect(isPlainObject({a: 1})).toBe(true);
    expect(isPlainObject([1])).toBe(false);
    expect(isPlainObject(new Uint8Array(1))).toBe(false);
    expect(isPlainObject(null)).toBe(false);
  });

  it("isEmptyObject", () => {
    expect(isEmptyObject({})).toBe(true);
    expect(isEmptyObject({a: 1})).toBe(false);
  });
});
