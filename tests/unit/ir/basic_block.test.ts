import { describe, expect, it } from "vitest";
import { IRInvariantError } from "../../../src/errors/ir_errors.js";
import { BasicBlock } from "../../../src/ir/basic_block.js";
import { ConstantInt } from "../../../src/ir/constant_int.js";
import { Instruction, Opcode } from "../../../src/ir/ir_instruction.js";
import { Argument, intType } from "../../../src/ir/ir_value.js";

const i32 = intType(32);

const makeAdd = (x: Argument, value: number, name: string) =>
  Instruction.createBinary(Opcode.Add, x, ConstantInt.get(i32, value), name);

const names = (block: BasicBlock) =>
  block.instructions().map((inst) => inst.name);

describe("BasicBlock", () => {
  it("keeps program order across append and insertion", () => {
    const x = new Argument(i32, 0, "x");
    const block = new BasicBlock("entry");
    const a = block.append(makeAdd(x, 1, "a"));
    const c = block.append(makeAdd(x, 3, "c"));
    block.insertAfter(makeAdd(x, 2, "b"), a);
    block.insertBefore(makeAdd(x, 0, "z"), a);
    block.insertAfter(makeAdd(x, 4, "d"), c);

    expect(names(block)).toEqual(["z", "a", "b", "c", "d"]);
    expect(block.size).toBe(5);
    expect(block.first?.name).toBe("z");
    expect(block.last?.name).toBe("d");
  });

  it("returns the following instruction when removing", () => {
    const x = new Argument(i32, 0, "x");
    const block = new BasicBlock("entry");
    const a = block.append(makeAdd(x, 1, "a"));
    const b = block.append(makeAdd(x, 2, "b"));

    expect(block.remove(a)).toBe(b);
    expect(block.remove(b)).toBeNull();
    expect(block.isEmpty()).toBe(true);
    expect(block.first).toBeNull();
    expect(block.last).toBeNull();
    expect(a.parent).toBeNull();
  });

  it("visits instructions inserted after the current one", () => {
    const x = new Argument(i32, 0, "x");
    const block = new BasicBlock("entry");
    block.append(makeAdd(x, 1, "a"));
    block.append(makeAdd(x, 2, "b"));

    const visited: (string | undefined)[] = [];
    for (const inst of block) {
      visited.push(inst.name);
      if (inst.name === "a") {
        makeAdd(x, 9, "inserted").insertAfter(inst);
      }
    }

    expect(visited).toEqual(["a", "inserted", "b"]);
  });

  it("continues past an instruction erased during the walk", () => {
    const x = new Argument(i32, 0, "x");
    const block = new BasicBlock("entry");
    block.append(makeAdd(x, 1, "a"));
    block.append(makeAdd(x, 2, "b"));
    block.append(makeAdd(x, 3, "c"));

    const visited: (string | undefined)[] = [];
    for (const inst of block) {
      visited.push(inst.name);
      if (inst.name === "b") inst.eraseFromParent();
    }

    expect(visited).toEqual(["a", "b", "c"]);
    expect(names(block)).toEqual(["a", "c"]);
  });

  it("rejects placing an instruction twice", () => {
    const x = new Argument(i32, 0, "x");
    const block = new BasicBlock("entry");
    const a = block.append(makeAdd(x, 1, "a"));

    expect(() => block.append(a)).toThrow(IRInvariantError);
    expect(() => new BasicBlock("other").append(a)).toThrow(
      "Instruction is already placed in block 'entry'",
    );
  });

  it("rejects positions owned by another block", () => {
    const x = new Argument(i32, 0, "x");
    const first = new BasicBlock("first");
    const second = new BasicBlock("second");
    const a = first.append(makeAdd(x, 1, "a"));

    expect(() => second.insertAfter(makeAdd(x, 2, "b"), a)).toThrow(
      "Instruction does not belong to block 'second'",
    );
    expect(() => makeAdd(x, 3, "c").insertAfter(makeAdd(x, 4, "d"))).toThrow(
      "Cannot insert after a detached instruction",
    );
  });
});
