import {isIPv4} from "node:net";
import {ByteOrder} from "../byteOrder.js";
import {ItemClass} from "../constants.js";
import {FieldErrorCode} from "../errors.js";
import {FieldInput} from "../interface.js";
import {DecimalField} from "./decimal.js";

const MAX_IPV4 = 0xffffffffn;

/**
 * 32-bit address viewed as dotted quad, most significant octet first
 */
export class IPv4Address extends DecimalField<string> {
  constructor(byteOrder?: ByteOrder) {
    super(32, {byteOrder});
  }

  get itemType(): ItemClass {
    return ItemClass.IPv4Address;
  }

  get value(): string {
    return [24n, 16n, 8n, 0n].map((shift) => String((this.raw >> shift) & 0xffn)).join(".");
  }

  set value(value: FieldInput) {
    if (typeof value === "string") {
      if (!isIPv4(value)) {
        throw this.fieldError({code: FieldErrorCode.VALUE, value});
      }
      this.raw = value.split(".").reduce((address, octet) => (address << 8n) | BigInt(octet), 0n);
      return;
    }
    if (typeof value === "number" || typeof value === "bigint") {
      // Out of range addresses are rejected, not clamped
      const address = typeof value === "number" && Number.isInteger(value) ? BigInt(value) : value;
      if (typeof address !== "bigint" || address < 0n || address > MAX_IPV4) {
        throw this.fieldError({code: FieldErrorCode.VALUE, value: String(value)});
      }
      this.raw = address;
      return;
    }
    throw this.fieldError({code: FieldErrorCode.TYPE, value: typeof value === "boolean" ? "boolean" : "Uint8Array"});
  }
}
