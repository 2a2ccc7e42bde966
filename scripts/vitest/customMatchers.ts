import {expect} from "vitest";
import {BinlayoutError} from "@binlayout/utils";

expect.extend({
  toThrowErrorCode(received: unknown, code: string) {
    if (typeof received !== "function") {
      return {
        pass: false,
        message: () => "Received value must be a function",
      };
    }

    try {
      received();
    } catch (e) {
      const actual = e instanceof BinlayoutError ? String(e.type.code) : undefined;
      if (actual === code) {
        return {
          message: () => `Function threw error code ${code}`,
          pass: true,
        };
      }

      return {
        pass: false,
        message: () =>
          actual === undefined
            ? `Expected error code ${code}, but got ${e instanceof Error ? e.message : String(e)}`
            : `Expected error code ${code}, but got ${actual}`,
        actual,
        expected: code,
      };
    }

    return {
      pass: false,
      message: () => `Expected error code ${code}, but function did not throw`,
    };
  },
});
