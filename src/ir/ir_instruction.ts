/**
 * IR instruction definitions
 */

import { IRInvariantError } from "../errors/ir_errors.js";
import type { BasicBlock } from "./basic_block.js";
import {
  type IRType,
  sameType,
  typeToString,
  Value,
  ValueKind,
  VOID_TYPE,
} from "./ir_value.js";

/**
 * Instruction opcodes
 */
export enum Opcode {
  Add = "add",
  Sub = "sub",
  Mul = "mul",
  SDiv = "sdiv",
  Shl = "shl",
  LShr = "lshr",
  Load = "load",
  Store = "store",
  Call = "call",
  Ret = "ret",
}

export type BinaryOpcode =
  | Opcode.Add
  | Opcode.Sub
  | Opcode.Mul
  | Opcode.SDiv
  | Opcode.Shl
  | Opcode.LShr;

const BINARY_OPCODES: ReadonlySet<Opcode> = new Set([
  Opcode.Add,
  Opcode.Sub,
  Opcode.Mul,
  Opcode.SDiv,
  Opcode.Shl,
  Opcode.LShr,
]);

export const isBinaryOpcode = (opcode: Opcode): opcode is BinaryOpcode => {
  return BINARY_OPCODES.has(opcode);
};

const OPCODES_BY_NAME: ReadonlyMap<string, Opcode> = new Map(
  Object.values(Opcode).map((opcode) => [opcode, opcode]),
);

export const parseOpcode = (name: string): Opcode | undefined => {
  return OPCODES_BY_NAME.get(name);
};

export interface InstructionOptions {
  name?: string;
  callee?: string;
}

/**
 * A single instruction. Its result is itself a value; operand slots keep the
 * operands' user sets in sync. Placement in a block is managed by BasicBlock.
 */
export class Instruction extends Value {
  readonly kind = ValueKind.Instruction as const;
  readonly callee?: string;

  // Intrusive list links, maintained by BasicBlock
  parent: BasicBlock | null = null;
  prev: Instruction | null = null;
  next: Instruction | null = null;

  private readonly operandList: Value[] = [];

  constructor(
    readonly opcode: Opcode,
    type: IRType,
    operands: Value[],
    options: InstructionOptions = {},
  ) {
    super(type, options.name);
    this.callee = options.callee;
    for (const operand of operands) {
      this.operandList.push(operand);
      operand.users.add(this);
    }
  }

  /**
   * Create a binary arithmetic instruction typed after its operands.
   */
  static createBinary(
    opcode: BinaryOpcode,
    lhs: Value,
    rhs: Value,
    name?: string,
  ): Instruction {
    if (lhs.type.kind !== "int" || !sameType(lhs.type, rhs.type)) {
      throw new IRInvariantError(
        `Operand types of ${opcode} must be equal integers, got ${typeToString(lhs.type)} and ${typeToString(rhs.type)}`,
      );
    }
    return new Instruction(opcode, lhs.type, [lhs, rhs], { name });
  }

  static createLoad(type: IRType, operands: Value[], name?: string): Instruction {
    return new Instruction(Opcode.Load, type, operands, { name });
  }

  static createStore(value: Value, address: Value): Instruction {
    return new Instruction(Opcode.Store, VOID_TYPE, [value, address]);
  }

  static createCall(
    type: IRType,
    callee: string,
    args: Value[],
    name?: string,
  ): Instruction {
    return new Instruction(Opcode.Call, type, args, { name, callee });
  }

  static createRet(value?: Value): Instruction {
    return new Instruction(Opcode.Ret, VOID_TYPE, value ? [value] : []);
  }

  get numOperands(): number {
    return this.operandList.length;
  }

  get operands(): readonly Value[] {
    return this.operandList;
  }

  getOperand(index: number): Value {
    const operand = this.operandList[index];
    if (operand === undefined) {
      throw new IRInvariantError(
        `Operand ${index} out of range for ${this.opcode} with ${this.operandList.length} operand(s)`,
      );
    }
    return operand;
  }

  isBinaryOp(): boolean {
    return isBinaryOpcode(this.opcode);
  }

  /**
   * Rewrite every operand slot holding `from` to hold `to`.
   * Returns whether any slot changed.
   */
  replaceUsesOfWith(from: Value, to: Value): boolean {
    let replaced = false;
    for (let i = 0; i < this.operandList.length; i++) {
      if (this.operandList[i] === from) {
        this.operandList[i] = to;
        replaced = true;
      }
    }
    if (replaced) {
      from.users.delete(this);
      to.users.add(this);
    }
    return replaced;
  }

  /**
   * Release every operand, leaving the instruction with none.
   */
  dropAllReferences(): void {
    for (const operand of this.operandList) {
      operand.users.delete(this);
    }
    this.operandList.length = 0;
  }

  insertAfter(position: Instruction): void {
    const block = position.parent;
    if (!block) {
      throw new IRInvariantError("Cannot insert after a detached instruction");
    }
    block.insertAfter(this, position);
  }

  insertBefore(position: Instruction): void {
    const block = position.parent;
    if (!block) {
      throw new IRInvariantError("Cannot insert before a detached instruction");
    }
    block.insertBefore(this, position);
  }

  /**
   * Unlink from the parent block and release operands.
   * Returns the instruction that followed this one.
   */
  eraseFromParent(): Instruction | null {
    if (this.hasUses()) {
      throw new IRInvariantError(
        `Cannot erase ${this.opcode} instruction that still has ${this.users.size} user(s)`,
      );
    }
    const block = this.parent;
    if (!block) {
      throw new IRInvariantError("Cannot erase a detached instruction");
    }
    const next = block.remove(this);
    this.dropAllReferences();
    return next;
  }
}

export const isInstruction = (value: Value): value is Instruction => {
  return value.kind === ValueKind.Instruction;
};
