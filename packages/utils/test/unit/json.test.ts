import {describe, it, expect} from "vitest";
import {BinlayoutError, Json, logCtxToJson, logCtxToString} from "../../src/index.js";

describe("Json helper", () => {
  type TestCase = {
    id: string;
    arg: unknown;
    json: Json;
    str: string;
  };

  const testCases: (TestCase | (() => TestCase))[] = [
    // Basic types
    {id: "undefined", arg: undefined, json: undefined, str: "undefined"},
    {id: "null", arg: null, json: "null", str: "null"},
    {id: "boolean", arg: true, json: true, str: "true"},
    {id: "number", arg: 123, json: 123, str: "123"},
    {id: "bigint", arg: BigInt(123), json: "123", str: "123"},
    {id: "string", arg: "hello", json: "hello", str: "hello"},
    {id: "symbol", arg: Symbol("foo"), json: "Symbol(foo)", str: "Symbol(foo)"},
    {id: "bytes", arg: Uint8Array.from([0xab, 0x01]), json: "0xab01", str: "0xab01"},

    // Arrays
    {id: "array of basic types", arg: [1, 2, 3], json: [1, 2, 3], str: "1, 2, 3"},
    {id: "array of arrays", arg: [[1, 2]], json: ["[object]"], str: "[object]"},

    // Objects
    {id: "object of basic types", arg: {a: 1, b: BigInt(2)}, json: {a: 1, b: "2"}, str: "a=1, b=2"},
    {id: "object of objects", arg: {a: {b: 1}}, json: {a: "[object]"}, str: "a=[object]"},

    // Errors
    () => {
      const error = new Error("foo");
      error.stack = "$STACK";
      return {id: "Error", arg: error, json: {message: "foo", stack: "$STACK"}, str: "foo\n$STACK"};
    },
    () => {
      const error = new BinlayoutError({code: "SAMPLE_ERROR", byte: 12, bit: 3});
      error.stack = "$STACK";
      return {
        id: "BinlayoutError",
        arg: error,
        json: {code: "SAMPLE_ERROR", byte: 12, bit: 3, stack: "$STACK"},
        str: "code=SAMPLE_ERROR, byte=12, bit=3\n$STACK",
      };
    },
  ];

  for (const testCase of testCases) {
    const {id, arg, json, str} = typeof testCase === "function" ? testCase() : testCase;
    it(`${id} toJson`, () => {
      expect(logCtxToJson(arg)).toEqual(json);
    });
    it(`${id} toString`, () => {
      expect(logCtxToString(arg)).toBe(str);
    });
  }
});
