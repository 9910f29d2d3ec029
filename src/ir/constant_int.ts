import { IRInvariantError } from "../errors/ir_errors.js";
import { type IntType, intType, Value, ValueKind } from "./ir_value.js";

/**
 * Fixed-width integer constant. The bit pattern is kept in [0, 2^bits);
 * all arithmetic wraps modulo 2^bits.
 */
export class ConstantInt extends Value {
  readonly kind = ValueKind.Constant as const;
  declare readonly type: IntType;
  readonly bits: bigint;

  private constructor(type: IntType, bits: bigint) {
    super(type);
    this.bits = bits;
  }

  /**
   * Create a constant from a signed or unsigned integer, truncated to `width`.
   */
  static get(width: number | IntType, value: bigint | number): ConstantInt {
    const type = typeof width === "number" ? intType(width) : width;
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
      throw new IRInvariantError(`Constant is not a safe integer: ${value}`);
    }
    return new ConstantInt(type, BigInt.asUintN(type.bits, BigInt(value)));
  }

  get width(): number {
    return this.type.bits;
  }

  get signedValue(): bigint {
    return BigInt.asIntN(this.width, this.bits);
  }

  get unsignedValue(): bigint {
    return this.bits;
  }

  isZero(): boolean {
    return this.bits === 0n;
  }

  isOne(): boolean {
    return this.bits === 1n;
  }

  /** Exactly one bit set in the unsigned pattern. */
  isPowerOfTwo(): boolean {
    return this.bits !== 0n && (this.bits & (this.bits - 1n)) === 0n;
  }

  exactLog2(): number {
    if (!this.isPowerOfTwo()) {
      throw new IRInvariantError(
        `exactLog2 of non power of two ${this.signedValue}`,
      );
    }
    return this.bits.toString(2).length - 1;
  }

  addN(amount: bigint | number): ConstantInt {
    return ConstantInt.get(this.type, this.bits + BigInt(amount));
  }

  subN(amount: bigint | number): ConstantInt {
    return ConstantInt.get(this.type, this.bits - BigInt(amount));
  }

  /** Bit-exact equality; constants of different widths never compare equal. */
  equals(other: ConstantInt): boolean {
    return this.width === other.width && this.bits === other.bits;
  }

  toString(): string {
    return this.signedValue.toString();
  }
}

export const isConstantInt = (value: Value): value is ConstantInt => {
  return value.kind === ValueKind.Constant;
};
