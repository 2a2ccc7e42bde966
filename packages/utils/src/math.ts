/**
 * Return the min number between two big numbers.
 */
export function bigIntMin(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/**
 * Return the max number between two big numbers.
 */
export function bigIntMax(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

export function intDiv(dividend: number, divisor: number): number {
  return Math.floor(dividend / divisor);
}

/**
 * `[floor(dividend / divisor), dividend mod divisor]`
 */
export function divmod(dividend: number, divisor: number): [number, number] {
  const quotient = intDiv(dividend, divisor);
  return [quotient, dividend - quotient * divisor];
}

/**
 * Limit `value` to `[min, max]`, `max` wins when the bounds cross.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function bigIntClamp(value: bigint, min: bigint, max: bigint): bigint {
  return bigIntMin(bigIntMax(value, min), max);
}

/**
 * Returns a number when `value` fits into the safe integer range
 */
export function toSafeNumber(value: bigint): number | bigint {
  const num = Number(value);
  return Number.isSafeInteger(num) ? num : value;
}
