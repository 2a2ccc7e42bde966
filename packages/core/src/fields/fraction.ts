import {bigIntClamp, clamp} from "@binlayout/utils";
import {ItemClass} from "../constants.js";
import {FieldInput, FieldMetadata} from "../interface.js";
import {DecimalField, DecimalOptions} from "./decimal.js";

export type FractionOptions = Omit<DecimalOptions, "signed"> & {
  /** Top bit is a sign bit instead of an integer bit */
  signed?: boolean;
};

/**
 * Fixed point percentage. The stored bits split into an optional sign bit,
 * `bitsInteger` integer bits and the remaining fraction bits; the value is
 * `(integer + fraction / 2^fractionBits) * 100`, negated when the sign bit is set.
 * Storage is always unsigned.
 */
export class Fraction extends DecimalField<number> {
  readonly bitsInteger: number;
  readonly signedFraction: boolean;

  constructor(bitsInteger: number, bitSize: number, opts: FractionOptions = {}) {
    super(bitSize, {alignTo: opts.alignTo, byteOrder: opts.byteOrder, signed: false});
    this.bitsInteger = clamp(Math.trunc(bitsInteger), 1, this.bitSize);
    this.signedFraction = this.bitSize > 1 && (opts.signed ?? false);
  }

  get itemType(): ItemClass {
    return ItemClass.Fraction;
  }

  get name(): string {
    return `${ItemClass[this.itemType]}${this.bitsInteger}.${this.bitSize}`;
  }

  get value(): number {
    return this.asFloat(this.raw);
  }

  set value(value: FieldInput) {
    this.raw = this.toFraction(value);
  }

  get bitsFraction(): number {
    return Math.max(this.bitSize - this.bitsInteger, 0);
  }

  asFloat(value: bigint): number {
    const bitsFraction = BigInt(this.bitsFraction);
    const fraction = Number(value & ((1n << bitsFraction) - 1n)) / 2 ** this.bitsFraction;

    if (this.signedFraction) {
      const signBit = 1n << BigInt(this.bitSize - 1);
      const factor = (value & signBit) !== 0n ? -100 : 100;
      const integer = Number((value & (signBit - 1n)) >> bitsFraction);
      return (integer + fraction) * factor;
    }
    return (Number(value >> bitsFraction) + fraction) * 100;
  }

  toFraction(value: FieldInput): bigint {
    const bitsFraction = BigInt(this.bitsFraction);
    // Keep the number finite, BigInt() throws on infinity
    let normalized = clamp(this.toNumber(value), -Number.MAX_VALUE, Number.MAX_VALUE) / 100;

    if (this.signedFraction) {
      const signBit = 1n << BigInt(this.bitSize - 1);
      const integer = BigInt(Math.abs(Math.trunc(normalized))) << bitsFraction;
      const fraction = BigInt(Math.trunc(Math.abs(normalized - Math.trunc(normalized)) * 2 ** this.bitsFraction));
      const magnitude = bigIntClamp(integer | fraction, 0n, signBit - 1n);
      return this.toDecimal(normalized < 0 ? magnitude | signBit : magnitude);
    }

    normalized = Math.max(normalized, 0);
    const integer = BigInt(Math.trunc(normalized)) << bitsFraction;
    const fraction = BigInt(Math.trunc((normalized - Math.trunc(normalized)) * 2 ** this.bitsFraction));
    return this.toDecimal(bigIntClamp(integer | fraction, 0n, this.bitMask()));
  }

  describe(name?: string, opts?: {nested?: boolean}): FieldMetadata {
    return {...super.describe(name, opts), signed: this.signedFraction};
  }
}

/** Signed percentage, e.g. `new Bipolar(2, 16)` spans -199.99 to 199.99 */
export class Bipolar extends Fraction {
  constructor(bitsInteger: number, bitSize: number, opts: Omit<FractionOptions, "signed"> = {}) {
    super(bitsInteger, bitSize, {...opts, signed: true});
  }

  get itemType(): ItemClass {
    return ItemClass.Bipolar;
  }
}

export class Unipolar extends Fraction {
  constructor(bitsInteger: number, bitSize: number, opts: Omit<FractionOptions, "signed"> = {}) {
    super(bitsInteger, bitSize, {...opts, signed: false});
  }

  get itemType(): ItemClass {
    return ItemClass.Unipolar;
  }
}
