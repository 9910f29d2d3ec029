import { IRInvariantError } from "../errors/ir_errors.js";
import type { BasicBlock } from "./basic_block.js";
import { ConstantInt } from "./constant_int.js";
import { type BinaryOpcode, Instruction, Opcode } from "./ir_instruction.js";
import { type IRType, typeToString, type Value } from "./ir_value.js";

export type OperandLike = Value | number | bigint;

/**
 * IRBuilder - appends instructions to a block
 *
 * Usage:
 *   const fn = new IRFunction("f", intType(32), [{ type: intType(32), name: "x" }]);
 *   const builder = new IRBuilder(fn.addBlock("entry"));
 *   const y = builder.mul(fn.args[0], 4, "y");
 *   builder.ret(y);
 *
 * Numeric operands become constants of the other operand's type.
 */
export class IRBuilder {
  private block: BasicBlock | null;

  constructor(block?: BasicBlock) {
    this.block = block ?? null;
  }

  setInsertPoint(block: BasicBlock): void {
    this.block = block;
  }

  getInsertBlock(): BasicBlock | null {
    return this.block;
  }

  add(lhs: OperandLike, rhs: OperandLike, name?: string): Instruction {
    return this.binary(Opcode.Add, lhs, rhs, name);
  }

  sub(lhs: OperandLike, rhs: OperandLike, name?: string): Instruction {
    return this.binary(Opcode.Sub, lhs, rhs, name);
  }

  mul(lhs: OperandLike, rhs: OperandLike, name?: string): Instruction {
    return this.binary(Opcode.Mul, lhs, rhs, name);
  }

  sdiv(lhs: OperandLike, rhs: OperandLike, name?: string): Instruction {
    return this.binary(Opcode.SDiv, lhs, rhs, name);
  }

  shl(lhs: OperandLike, rhs: OperandLike, name?: string): Instruction {
    return this.binary(Opcode.Shl, lhs, rhs, name);
  }

  lshr(lhs: OperandLike, rhs: OperandLike, name?: string): Instruction {
    return this.binary(Opcode.LShr, lhs, rhs, name);
  }

  binary(
    opcode: BinaryOpcode,
    lhs: OperandLike,
    rhs: OperandLike,
    name?: string,
  ): Instruction {
    const type = this.inferOperandType(opcode, lhs, rhs);
    return this.insert(
      Instruction.createBinary(
        opcode,
        this.materialize(lhs, type),
        this.materialize(rhs, type),
        name,
      ),
    );
  }

  load(type: IRType, operands: Value[] = [], name?: string): Instruction {
    return this.insert(Instruction.createLoad(type, operands, name));
  }

  store(value: Value, address: Value): Instruction {
    return this.insert(Instruction.createStore(value, address));
  }

  call(
    type: IRType,
    callee: string,
    args: Value[] = [],
    name?: string,
  ): Instruction {
    return this.insert(Instruction.createCall(type, callee, args, name));
  }

  ret(value?: Value): Instruction {
    return this.insert(Instruction.createRet(value));
  }

  private insert(inst: Instruction): Instruction {
    if (!this.block) {
      throw new IRInvariantError("IRBuilder has no insertion block");
    }
    return this.block.append(inst);
  }

  private inferOperandType(
    opcode: BinaryOpcode,
    lhs: OperandLike,
    rhs: OperandLike,
  ): IRType {
    if (typeof lhs === "object") return lhs.type;
    if (typeof rhs === "object") return rhs.type;
    throw new IRInvariantError(
      `Cannot infer the type of ${opcode} with two literal operands`,
    );
  }

  private materialize(operand: OperandLike, type: IRType): Value {
    if (typeof operand === "object") return operand;
    if (type.kind !== "int") {
      throw new IRInvariantError(
        `Literal operand needs an integer type, got ${typeToString(type)}`,
      );
    }
    return ConstantInt.get(type, operand);
  }
}
