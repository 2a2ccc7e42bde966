import {ItemClass} from "../constants.js";
import {FieldInput, FieldMetadata} from "../interface.js";
import {DecimalField, DecimalOptions} from "./decimal.js";

/**
 * Signed integer viewed as `stored / scalingBase * scale`, where the scaling base is
 * a quarter of the value range
 */
export class Scaled extends DecimalField<number> {
  scale: number;

  constructor(scale: number, bitSize: number, opts: Omit<DecimalOptions, "signed"> = {}) {
    super(bitSize, {...opts, signed: true});
    this.scale = scale;
  }

  get itemType(): ItemClass {
    return ItemClass.Scaled;
  }

  get value(): number {
    return this.asFloat(this.raw);
  }

  set value(value: FieldInput) {
    this.raw = this.toScaled(value);
  }

  scalingBase(): number {
    return 2 ** (this.bitSize - 1) / 2;
  }

  asFloat(value: bigint): number {
    return (Number(value) / this.scalingBase()) * this.scale;
  }

  toScaled(value: FieldInput): bigint {
    return this.toDecimal((this.toNumber(value) / this.scale) * this.scalingBase());
  }

  describe(name?: string, opts?: {nested?: boolean}): FieldMetadata {
    return {...super.describe(name, opts), scale: this.scale};
  }
}
