/**
 * Structural and use-list checks for in-memory IR.
 * Reports problems as errors; never throws except from assertValid.
 */

import { ErrorCollector } from "../errors/error_collector.js";
import { IRError, type IRSite } from "../errors/ir_errors.js";
import type { BasicBlock } from "./basic_block.js";
import { isConstantInt } from "./constant_int.js";
import type { IRFunction, IRModule } from "./ir_function.js";
import { type Instruction, isInstruction, Opcode } from "./ir_instruction.js";
import {
  sameType,
  typeToString,
  type Value,
  ValueKind,
  VOID_TYPE,
} from "./ir_value.js";

const describeValue = (value: Value): string => {
  if (isConstantInt(value)) return `i${value.width} ${value.toString()}`;
  if (value.name) return `%${value.name}`;
  if (isInstruction(value)) return `<unnamed ${value.opcode}>`;
  return "<unnamed argument>";
};

class FunctionVerifier {
  private readonly errors: IRError[] = [];
  private readonly defined = new Set<Value>();
  private readonly seen = new Set<Value>();
  private readonly placed = new Set<Instruction>();

  constructor(private readonly fn: IRFunction) {}

  run(): IRError[] {
    const linked = new Map<BasicBlock, Instruction[]>();
    for (const block of this.fn.blocks) {
      const insts = [...this.walkLinks(block)];
      for (const inst of insts) this.placed.add(inst);
      linked.set(block, insts);
    }

    for (const arg of this.fn.args) {
      this.defined.add(arg);
      this.seen.add(arg);
    }

    for (const block of this.fn.blocks) {
      if (block.parent !== this.fn) {
        this.report(
          block,
          `Block '${block.label}' is not owned by @${this.fn.name}`,
        );
      }
      for (const inst of linked.get(block) ?? []) {
        this.checkInstruction(block, inst);
        this.defined.add(inst);
        this.seen.add(inst);
      }
    }

    for (const value of this.seen) {
      this.checkUsers(value);
    }

    return this.errors;
  }

  private *walkLinks(block: BasicBlock): Generator<Instruction> {
    let prev: Instruction | null = null;
    let count = 0;
    for (let inst = block.first; inst; inst = inst.next) {
      if (inst.parent !== block) {
        this.report(
          block,
          `${describeValue(inst)} is linked into '${block.label}' but its parent differs`,
        );
      }
      if (inst.prev !== prev) {
        this.report(
          block,
          `${describeValue(inst)} has an inconsistent prev link`,
        );
      }
      count++;
      if (count > block.size) {
        this.report(
          block,
          `Block '${block.label}' links more instructions than its size`,
        );
        return;
      }
      yield inst;
      prev = inst;
    }
    if (block.last !== prev) {
      this.report(
        block,
        `Block '${block.label}' has an inconsistent last link`,
      );
    }
    if (count !== block.size) {
      this.report(
        block,
        `Block '${block.label}' size ${block.size} does not match ${count} linked instruction(s)`,
      );
    }
  }

  private checkInstruction(block: BasicBlock, inst: Instruction): void {
    for (const operand of inst.operands) {
      this.seen.add(operand);
      if (!operand.users.has(inst)) {
        this.report(
          block,
          `${describeValue(operand)} is an operand of ${describeValue(inst)} but does not list it as a user`,
        );
      }
      if (
        operand.kind === ValueKind.Argument &&
        !this.fn.args.some((arg) => arg === operand)
      ) {
        this.report(
          block,
          `${describeValue(operand)} is an argument of another function`,
        );
      }
      if (isInstruction(operand) && !this.defined.has(operand)) {
        const reason = this.placed.has(operand)
          ? "is used before its definition"
          : "is not placed in this function";
        this.report(
          block,
          `${describeValue(operand)} ${reason} (in ${describeValue(inst)})`,
        );
      }
    }

    if (inst.isBinaryOp()) {
      if (inst.type.kind !== "int") {
        this.report(block, `${describeValue(inst)} must have an integer type`);
      }
      if (inst.numOperands !== 2) {
        this.report(
          block,
          `${describeValue(inst)} has ${inst.numOperands} operand(s), expected 2`,
        );
      }
      for (const operand of inst.operands) {
        if (!sameType(operand.type, inst.type)) {
          this.report(
            block,
            `${describeValue(inst)} operand ${describeValue(operand)} has type ${typeToString(operand.type)}, expected ${typeToString(inst.type)}`,
          );
        }
      }
    }

    if (inst.opcode === Opcode.Ret) {
      const value = inst.operands[0];
      const actual = value ? value.type : VOID_TYPE;
      if (inst.numOperands > 1 || !sameType(actual, this.fn.returnType)) {
        this.report(
          block,
          `ret returns ${typeToString(actual)}, expected ${typeToString(this.fn.returnType)}`,
        );
      }
    }
  }

  private checkUsers(value: Value): void {
    for (const user of value.users) {
      if (!user.operands.includes(value)) {
        this.report(
          user.parent,
          `${describeValue(value)} lists ${describeValue(user)} as a user but is not one of its operands`,
        );
      }
      if (!this.placed.has(user)) {
        this.report(
          user.parent,
          `${describeValue(value)} has a user ${describeValue(user)} that is not placed in @${this.fn.name}`,
        );
      }
    }
  }

  private report(block: BasicBlock | null, message: string): void {
    const site: IRSite = { functionName: this.fn.name };
    if (block) site.blockLabel = block.label;
    this.errors.push(new IRError("VerifyError", message, { site }));
  }
}

export const verifyFunction = (fn: IRFunction): IRError[] => {
  return new FunctionVerifier(fn).run();
};

export const verifyModule = (module: IRModule): IRError[] => {
  return module.functions.flatMap((fn) => verifyFunction(fn));
};

export const assertValid = (target: IRModule | IRFunction): void => {
  const collector = new ErrorCollector();
  collector.addAll(
    "functions" in target ? verifyModule(target) : verifyFunction(target),
  );
  collector.throwIfErrors();
};
