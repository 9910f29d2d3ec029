import { type ConstantInt, isConstantInt } from "../../constant_int.js";
import type { Instruction } from "../../ir_instruction.js";
import type { Value } from "../../ir_value.js";

export interface ConstantOperand {
  constant: ConstantInt;
  other: Value;
}

/**
 * Find the constant operand of a two-operand instruction, checking operand 0
 * first. Only meaningful as-is for commutative opcodes.
 */
export const getConstantOperand = (
  inst: Instruction,
): ConstantOperand | null => {
  const lhs = inst.getOperand(0);
  const rhs = inst.getOperand(1);
  if (isConstantInt(lhs)) {
    return { constant: lhs, other: rhs };
  }
  if (isConstantInt(rhs)) {
    return { constant: rhs, other: lhs };
  }
  return null;
};

/**
 * Divisor must be operand 1; a leading constant does not count.
 */
export const getConstantDivisor = (
  inst: Instruction,
): ConstantOperand | null => {
  const divisor = inst.getOperand(1);
  if (!isConstantInt(divisor)) return null;
  return { constant: divisor, other: inst.getOperand(0) };
};
