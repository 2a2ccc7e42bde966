import {toHexString} from "./bytes.js";
import {BinlayoutError} from "./errors.js";

export type Json = string | number | boolean | null | undefined | Json[] | {[key: string]: Json};

/**
 * Renders any log Context to JSON up to one level of depth.
 *
 * Nested values past the first level render as `[object]`, consumers of the logger
 * should send pre-formated data if they require nesting.
 */
export function logCtxToJson(arg: unknown, recursive = false): Json {
  switch (typeof arg) {
    case "bigint":
    case "symbol":
    case "function":
      return arg.toString();

    case "object": {
      if (arg === null) return "null";

      if (arg instanceof Uint8Array) {
        return toHexString(arg);
      }

      // Break early at the first level for anything that may nest
      if (recursive) {
        return "[object]";
      }

      if (arg instanceof Error) {
        const metadata: {[key: string]: Json} =
          arg instanceof BinlayoutError ? {...arg.getMetadata()} : {message: arg.message};
        if (arg.stack) metadata.stack = arg.stack;
        return metadata;
      }

      if (Array.isArray(arg)) {
        return arg.map((item) => logCtxToJson(item, true));
      }

      const output: {[key: string]: Json} = {};
      for (const [key, value] of Object.entries(arg)) {
        output[key] = logCtxToJson(value, true);
      }
      return output;
    }

    // Already valid JSON
    case "number":
    case "string":
    case "undefined":
    case "boolean":
      return arg;
  }
  return String(arg);
}

/**
 * Renders any log Context to a string up to one level of depth.
 */
export function logCtxToString(arg: unknown, recursive = false): string {
  switch (typeof arg) {
    case "bigint":
    case "symbol":
    case "function":
      return arg.toString();

    case "object": {
      if (arg === null) return "null";

      if (arg instanceof Uint8Array) {
        return toHexString(arg);
      }

      if (recursive) {
        return "[object]";
      }

      if (arg instanceof Error) {
        const metadata = arg instanceof BinlayoutError ? logCtxToString(arg.getMetadata()) : arg.message;
        return `${metadata}\n${arg.stack || ""}`;
      }

      if (Array.isArray(arg)) {
        return arg.map((item) => logCtxToString(item, true)).join(", ");
      }

      return Object.entries(arg)
        .map(([key, value]) => `${key}=${logCtxToString(value, true)}`)
        .join(", ");
    }

    case "number":
    case "string":
    case "undefined":
    case "boolean":
    default:
      return String(arg);
  }
}
