import {ByteOrder} from "../byteOrder.js";
import {ItemClass} from "../constants.js";
import {FieldErrorCode} from "../errors.js";
import {FieldInput} from "../interface.js";
import {DecimalField, parseIntegerLiteral} from "./decimal.js";

const dateTimePattern = /^\s*(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})\s*$/;

/**
 * Parse `YYYY-MM-DD HH:MM:SS` as UTC, returns seconds since the epoch or null
 */
export function parseUtcDateTime(text: string): number | null {
  const match = dateTimePattern.exec(text);
  if (match === null) {
    return null;
  }
  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
  const millis = Date.UTC(year, month - 1, day, hours, minutes, seconds);
  const date = new Date(millis);
  // Date.UTC rolls over, 2024-02-30 would become March 1st
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day || hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  return millis / 1000;
}

export function formatUtcDateTime(seconds: number): string {
  return new Date(seconds * 1000).toISOString().slice(0, 19).replace("T", " ");
}

/**
 * 32-bit unix timestamp viewed as UTC `YYYY-MM-DD HH:MM:SS`
 */
export class Datetime extends DecimalField<string> {
  constructor(byteOrder?: ByteOrder) {
    super(32, {byteOrder});
  }

  get itemType(): ItemClass {
    return ItemClass.Datetime;
  }

  get value(): string {
    return formatUtcDateTime(Number(this.raw));
  }

  /** Takes seconds since the epoch, as number or integer literal, or a date string */
  set value(value: FieldInput) {
    if (typeof value !== "string" || parseIntegerLiteral(value) !== null) {
      this.raw = this.toDecimal(value);
      return;
    }
    const seconds = parseUtcDateTime(value);
    if (seconds === null) {
      throw this.fieldError({code: FieldErrorCode.VALUE, value});
    }
    this.raw = this.toDecimal(seconds);
  }
}
