import type { Instruction } from "../../ir_instruction.js";
import type { Value } from "../../ir_value.js";

/**
 * Redirect every use of `inst` to `replacement`.
 * Returns whether any use was actually redirected.
 */
export const replaceUses = (inst: Instruction, replacement: Value): boolean => {
  if (!inst.hasUses()) return false;
  inst.replaceAllUsesWith(replacement);
  return true;
};
