import type { BasicBlock } from "../../basic_block.js";
import { ConstantInt } from "../../constant_int.js";
import { Instruction, Opcode } from "../../ir_instruction.js";
import type { OptimizationStats } from "../stats.js";
import {
  type ConstantOperand,
  getConstantDivisor,
  getConstantOperand,
} from "../utils/operands.js";
import { replaceUses } from "../utils/rewrite.js";

type RewriteKind = "identity" | "strength";

/**
 * Algebraic identities and strength reduction over one block.
 * Instructions inserted while walking are visited too.
 */
export const algebraicSimplification = (
  block: BasicBlock,
  stats?: OptimizationStats,
): boolean => {
  let changed = false;

  for (const inst of block) {
    const rewrite = trySimplifyInstruction(inst);
    if (!rewrite) continue;
    changed = true;
    if (stats) {
      if (rewrite === "identity") stats.identities++;
      else stats.strengthReductions++;
    }
  }

  return changed;
};

export const trySimplifyInstruction = (
  inst: Instruction,
): RewriteKind | null => {
  switch (inst.opcode) {
    case Opcode.Add:
      return trySimplifyAdd(inst);
    case Opcode.Mul:
      return trySimplifyMul(inst);
    case Opcode.SDiv:
      return trySimplifySDiv(inst);
    default:
      return null;
  }
};

const trySimplifyAdd = (inst: Instruction): RewriteKind | null => {
  const operand = getConstantOperand(inst);
  if (!operand || !operand.constant.isZero()) return null;
  return replaceUses(inst, operand.other) ? "identity" : null;
};

// x * 0 is never folded to 0; it matches the 2^k - 1 shape with k = 0.
const trySimplifyMul = (inst: Instruction): RewriteKind | null => {
  const operand = getConstantOperand(inst);
  if (!operand) return null;
  const { constant, other } = operand;

  if (constant.isOne()) {
    return replaceUses(inst, other) ? "identity" : null;
  }

  if (constant.isPowerOfTwo()) {
    const shift = insertShiftLeft(inst, operand, constant);
    inst.replaceAllUsesWith(shift);
    return "strength";
  }

  const below = constant.subN(1);
  if (below.isPowerOfTwo()) {
    const shift = insertShiftLeft(inst, operand, below);
    const sum = Instruction.createBinary(Opcode.Add, shift, other);
    sum.insertAfter(shift);
    inst.replaceAllUsesWith(sum);
    return "strength";
  }

  const above = constant.addN(1);
  if (above.isPowerOfTwo()) {
    const shift = insertShiftLeft(inst, operand, above);
    const difference = Instruction.createBinary(Opcode.Sub, shift, other);
    difference.insertAfter(shift);
    inst.replaceAllUsesWith(difference);
    return "strength";
  }

  return null;
};

// Logical shift: only equal to signed division for non-negative dividends.
const trySimplifySDiv = (inst: Instruction): RewriteKind | null => {
  const operand = getConstantDivisor(inst);
  if (!operand) return null;
  const { constant, other } = operand;

  if (constant.isOne()) {
    return replaceUses(inst, other) ? "identity" : null;
  }

  if (constant.isPowerOfTwo()) {
    const shift = Instruction.createBinary(
      Opcode.LShr,
      other,
      ConstantInt.get(constant.type, constant.exactLog2()),
    );
    shift.insertAfter(inst);
    inst.replaceAllUsesWith(shift);
    return "strength";
  }

  return null;
};

const insertShiftLeft = (
  inst: Instruction,
  operand: ConstantOperand,
  power: ConstantInt,
): Instruction => {
  const shift = Instruction.createBinary(
    Opcode.Shl,
    operand.other,
    ConstantInt.get(operand.constant.type, power.exactLog2()),
  );
  shift.insertAfter(inst);
  return shift;
};
