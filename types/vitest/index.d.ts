// eslint-disable-next-line @typescript-eslint/no-unused-vars
import * as vitest from "vitest";

interface CustomMatchers<R = unknown> {
  /**
   * Calls the received function and passes when it throws a `BinlayoutError` with `code`
   *
   * @example
   * ```ts
   * expect(() => new Decimal(65)).toThrowErrorCode(FieldErrorCode.SIZE);
   * ```
   */
  toThrowErrorCode(code: string): R;
}

declare module "vitest" {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  interface Assertion<T = any> extends CustomMatchers<T> {}
  interface AsymmetricMatchersContaining extends CustomMatchers {}
}
