/**
 * Textual IR printer
 */

import type { BasicBlock } from "./basic_block.js";
import { isConstantInt } from "./constant_int.js";
import type { IRFunction, IRModule } from "./ir_function.js";
import { type Instruction, Opcode } from "./ir_instruction.js";
import {
  type IRType,
  sameType,
  typeToString,
  type Value,
} from "./ir_value.js";

/**
 * Assigns `%<n>` names to unnamed values, skipping names already taken.
 */
export class SlotTracker {
  private readonly slots = new Map<Value, string>();

  constructor(fn: IRFunction) {
    const taken = new Set<string>();
    const values: Value[] = [...fn.args];
    for (const block of fn.blocks) {
      values.push(...block);
    }
    for (const value of values) {
      if (value.name !== undefined) taken.add(value.name);
    }

    let next = 0;
    for (const value of values) {
      if (value.name !== undefined) {
        this.slots.set(value, value.name);
        continue;
      }
      if (value.type.kind === "void") continue;
      while (taken.has(String(next))) next++;
      this.slots.set(value, String(next));
      next++;
    }
  }

  nameOf(value: Value): string {
    return this.slots.get(value) ?? value.name ?? "?";
  }
}

/**
 * A literal whose type differs from `expected` carries its own type, as in
 * `i8 5`.
 */
export const printOperand = (
  value: Value,
  slots: SlotTracker,
  expected?: IRType,
): string => {
  if (isConstantInt(value)) {
    if (expected && !sameType(value.type, expected)) {
      return `${typeToString(value.type)} ${value.toString()}`;
    }
    return value.toString();
  }
  return `%${slots.nameOf(value)}`;
};

export const printInstruction = (
  inst: Instruction,
  slots: SlotTracker,
): string => {
  const type = typeToString(inst.type);
  // Load and call operands are not required to share the instruction type.
  const operands = inst.operands.map((op) =>
    printOperand(op, slots, inst.isBinaryOp() ? undefined : inst.type),
  );
  const result = inst.type.kind === "void" ? "" : `%${slots.nameOf(inst)} = `;

  switch (inst.opcode) {
    case Opcode.Store: {
      const [value, address] = inst.operands;
      if (!value || !address) return `store ${operands.join(", ")}`;
      return `store ${typeToString(value.type)} ${printOperand(value, slots)}, ${printOperand(address, slots, value.type)}`;
    }
    case Opcode.Ret: {
      const value = inst.operands[0];
      if (!value) return "ret void";
      return `ret ${typeToString(value.type)} ${printOperand(value, slots)}`;
    }
    case Opcode.Call:
      return `${result}call ${type} @${inst.callee ?? "?"}(${operands.join(", ")})`;
    case Opcode.Load:
      if (operands.length === 0) return `${result}load ${type}`;
      return `${result}load ${type} ${operands.join(", ")}`;
    default:
      return `${result}${inst.opcode} ${type} ${operands.join(", ")}`;
  }
};

const printBlock = (block: BasicBlock, slots: SlotTracker): string => {
  const lines = [`${block.label}:`];
  for (const inst of block) {
    lines.push(`  ${printInstruction(inst, slots)}`);
  }
  return lines.join("\n");
};

export const printFunction = (fn: IRFunction): string => {
  const slots = new SlotTracker(fn);
  const params = fn.args
    .map((arg) => `${typeToString(arg.type)} %${slots.nameOf(arg)}`)
    .join(", ");
  const returns =
    fn.returnType.kind === "void" ? "" : ` -> ${typeToString(fn.returnType)}`;
  const lines = [`func @${fn.name}(${params})${returns} {`];
  for (const block of fn.blocks) {
    lines.push(printBlock(block, slots));
  }
  lines.push("}");
  return lines.join("\n");
};

export const printModule = (module: IRModule): string => {
  if (module.functions.length === 0) return "";
  return `${module.functions.map(printFunction).join("\n\n")}\n`;
};
