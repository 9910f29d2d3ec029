import { describe, expect, it } from "vitest";
import { IRInvariantError } from "../../../src/errors/ir_errors.js";
import { ConstantInt } from "../../../src/ir/constant_int.js";

describe("ConstantInt", () => {
  it("wraps values into the declared width", () => {
    expect(ConstantInt.get(8, 300).unsignedValue).toBe(44n);
    const minusOne = ConstantInt.get(8, -1);
    expect(minusOne.unsignedValue).toBe(255n);
    expect(minusOne.signedValue).toBe(-1n);
    expect(minusOne.toString()).toBe("-1");
  });

  it("tests powers of two on the unsigned bit pattern", () => {
    expect(ConstantInt.get(32, 16).isPowerOfTwo()).toBe(true);
    expect(ConstantInt.get(32, 6).isPowerOfTwo()).toBe(false);
    expect(ConstantInt.get(32, 0).isPowerOfTwo()).toBe(false);
    // 0x80 is the sign bit of an i8
    expect(ConstantInt.get(8, -128).isPowerOfTwo()).toBe(true);
    expect(ConstantInt.get(8, -128).exactLog2()).toBe(7);
  });

  it("computes exact base-2 logarithms", () => {
    expect(ConstantInt.get(32, 1).exactLog2()).toBe(0);
    expect(ConstantInt.get(64, 1n << 40n).exactLog2()).toBe(40);
    expect(() => ConstantInt.get(32, 12).exactLog2()).toThrow(
      IRInvariantError,
    );
  });

  it("adds and subtracts modulo the width", () => {
    expect(ConstantInt.get(8, 255).addN(1).unsignedValue).toBe(0n);
    expect(ConstantInt.get(8, 0).subN(1).unsignedValue).toBe(255n);
    expect(ConstantInt.get(16, 7).addN(1).width).toBe(16);
  });

  it("compares bit patterns at equal widths only", () => {
    expect(ConstantInt.get(32, 5).equals(ConstantInt.get(32, 5))).toBe(true);
    expect(ConstantInt.get(8, -1).equals(ConstantInt.get(8, 255))).toBe(true);
    expect(ConstantInt.get(8, 5).equals(ConstantInt.get(16, 5))).toBe(false);
  });

  it("recognises zero and one", () => {
    expect(ConstantInt.get(32, 0).isZero()).toBe(true);
    expect(ConstantInt.get(32, 1).isOne()).toBe(true);
    expect(ConstantInt.get(1, -1).isOne()).toBe(true);
  });
});
