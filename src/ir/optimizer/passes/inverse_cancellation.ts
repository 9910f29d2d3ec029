import type { BasicBlock } from "../../basic_block.js";
import type { ConstantInt } from "../../constant_int.js";
import { type Instruction, Opcode } from "../../ir_instruction.js";
import type { OptimizationStats } from "../stats.js";
import { getConstantOperand } from "../utils/operands.js";
import { replaceUses } from "../utils/rewrite.js";

const oppositeOpcode = (opcode: Opcode): Opcode | null => {
  switch (opcode) {
    case Opcode.Add:
      return Opcode.Sub;
    case Opcode.Sub:
      return Opcode.Add;
    default:
      return null;
  }
};

/**
 * Collapse (x + C) - C and (x - C) + C into x.
 *
 * Only immediate users are inspected, and the constant may sit in either
 * operand of both instructions. The user's other operand is not checked
 * against the producer; the use edge already ties them together.
 */
export const inverseCancellation = (
  block: BasicBlock,
  stats?: OptimizationStats,
): boolean => {
  let changed = false;

  for (const inst of block) {
    const opposite = oppositeOpcode(inst.opcode);
    if (!opposite) continue;

    const operand = getConstantOperand(inst);
    if (!operand) continue;

    for (const user of [...inst.users]) {
      if (!cancels(user, opposite, operand.constant)) continue;
      if (replaceUses(user, operand.other)) {
        changed = true;
        if (stats) stats.cancellations++;
      }
    }
  }

  return changed;
};

const cancels = (
  user: Instruction,
  opposite: Opcode,
  constant: ConstantInt,
): boolean => {
  if (user.opcode !== opposite) return false;
  const userOperand = getConstantOperand(user);
  if (!userOperand) return false;
  return userOperand.constant.equals(constant);
};
