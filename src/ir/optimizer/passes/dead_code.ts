import type { BasicBlock } from "../../basic_block.js";
import type { OptimizationStats } from "../stats.js";

/**
 * Dead code elimination
 * Single forward sweep erasing binary arithmetic with no users. Anything else
 * (loads, stores, calls, returns) stays regardless of use count.
 */
export const deadCodeElimination = (
  block: BasicBlock,
  stats?: OptimizationStats,
): boolean => {
  let changed = false;
  let inst = block.first;

  while (inst) {
    if (inst.isBinaryOp() && !inst.hasUses()) {
      inst = inst.eraseFromParent();
      changed = true;
      if (stats) stats.erasedInstructions++;
    } else {
      inst = inst.next;
    }
  }

  return changed;
};
