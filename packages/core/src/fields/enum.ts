import {ItemClass} from "../constants.js";
import {FieldErrorCode} from "../errors.js";
import {FieldInput} from "../interface.js";
import {DecimalField, DecimalOptions, parseIntegerLiteral} from "./decimal.js";

/**
 * Symbol table of an Enum field. A numeric TypeScript `enum` satisfies it, its
 * reverse mapping entries are ignored.
 */
export type Enumeration = {readonly [symbol: string]: number | string};

export function enumerationName(enumeration: Enumeration, value: number): string | undefined {
  for (const [name, member] of Object.entries(enumeration)) {
    if (member === value) return name;
  }
  return undefined;
}

export function enumerationValue(enumeration: Enumeration, name: string): number | undefined {
  const member = Object.prototype.hasOwnProperty.call(enumeration, name) ? enumeration[name] : undefined;
  return typeof member === "number" ? member : undefined;
}

export type EnumOptions = Omit<DecimalOptions, "signed"> & {enumeration?: Enumeration};

/**
 * Unsigned integer viewed as the symbol of its enumeration, or as the plain
 * integer when no symbol has that value
 *
 * ```ts
 * enum Mode { idle = 0, run = 1 }
 * const mode = new Enum(8, {enumeration: Mode});
 * mode.value = "run";
 * ```
 */
export class Enum extends DecimalField<string | number> {
  readonly enumeration: Enumeration | null;

  constructor(bitSize: number, opts: EnumOptions = {}) {
    super(bitSize, {alignTo: opts.alignTo, byteOrder: opts.byteOrder, signed: false});
    this.enumeration = opts.enumeration ?? null;
  }

  get itemType(): ItemClass {
    return ItemClass.Enum;
  }

  get value(): string | number {
    const value = Number(this.raw);
    if (this.enumeration !== null) {
      return enumerationName(this.enumeration, value) ?? value;
    }
    return value;
  }

  /** Strings are read as integer literal first, then looked up as symbol */
  set value(value: FieldInput) {
    if (typeof value !== "string") {
      this.raw = this.toDecimal(value);
      return;
    }
    const literal = parseIntegerLiteral(value);
    if (literal !== null) {
      this.raw = this.toDecimal(literal);
      return;
    }
    const member = this.enumeration !== null ? enumerationValue(this.enumeration, value) : undefined;
    if (member === undefined || member < 0) {
      throw this.fieldError({code: FieldErrorCode.VALUE, value});
    }
    this.raw = this.toDecimal(member);
  }
}
