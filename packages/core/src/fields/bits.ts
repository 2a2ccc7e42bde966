import {ItemClass} from "../constants.js";
import {FieldInput} from "../interface.js";
import {Decimal, DecimalField, DecimalOptions} from "./decimal.js";

/**
 * Single bit at a fixed position of its group. Without `alignTo` the group is the
 * smallest one that holds bit `number`.
 */
export class Bit extends Decimal {
  constructor(number: number, alignTo?: number) {
    super(1, {alignTo});
    this.setAlignment(alignTo ?? 0, number, alignTo === undefined);
  }

  get itemType(): ItemClass {
    return ItemClass.Bit;
  }

  get name(): string {
    return ItemClass[this.itemType];
  }

  isBit(): boolean {
    return true;
  }
}

/**
 * One byte viewed as a `0x` prefixed hex string
 */
export class Byte extends DecimalField<string> {
  constructor(alignTo?: number) {
    super(8, {alignTo});
  }

  get itemType(): ItemClass {
    return ItemClass.Byte;
  }

  get name(): string {
    return ItemClass[this.itemType];
  }

  get value(): string {
    return `0x${this.raw.toString(16)}`;
  }

  set value(value: FieldInput) {
    this.raw = this.toDecimal(value);
  }
}

/**
 * One ASCII character
 */
export class Char extends DecimalField<string> {
  constructor(alignTo?: number) {
    super(8, {alignTo});
  }

  get itemType(): ItemClass {
    return ItemClass.Char;
  }

  get name(): string {
    return ItemClass[this.itemType];
  }

  get value(): string {
    return String.fromCharCode(Number(this.raw));
  }

  /** Takes the first character of a string, numbers are stored as char code */
  set value(value: FieldInput) {
    this.raw = this.toDecimal(value, typeof value === "string" ? "ascii" : undefined);
  }
}

/**
 * Unsigned integer viewed as a `0b` prefixed binary string of `bitSize` digits
 */
export class Bitset extends DecimalField<string> {
  constructor(bitSize: number, opts: Omit<DecimalOptions, "signed"> = {}) {
    super(bitSize, {...opts, signed: false});
  }

  get itemType(): ItemClass {
    return ItemClass.Bitset;
  }

  get value(): string {
    return `0b${this.raw.toString(2).padStart(this.bitSize, "0")}`;
  }

  set value(value: FieldInput) {
    this.raw = this.toDecimal(value);
  }
}

export class Bool extends DecimalField<boolean> {
  constructor(bitSize: number, opts: Omit<DecimalOptions, "signed"> = {}) {
    super(bitSize, {...opts, signed: false});
  }

  get itemType(): ItemClass {
    return ItemClass.Bool;
  }

  get value(): boolean {
    return this.raw !== 0n;
  }

  set value(value: FieldInput) {
    this.raw = this.toDecimal(value);
  }
}
