import { describe, expect, it } from "vitest";
import { IRParseError } from "../../../src/errors/ir_errors.js";
import { ConstantInt, isConstantInt } from "../../../src/ir/constant_int.js";
import { Opcode } from "../../../src/ir/ir_instruction.js";
import { parseFunction, parseModule } from "../../../src/ir/ir_parser.js";

const header = "func @f(i32 %x) -> i32 {";

const parseError = (text: string): IRParseError => {
  try {
    parseModule(text, "case.lir");
  } catch (err) {
    if (err instanceof IRParseError) return err;
    throw err;
  }
  throw new Error("expected a parse error");
};

describe("IR parser", () => {
  it("builds functions, blocks and a consistent use-def graph", () => {
    const fn = parseFunction(`
      func @scale(i32 %x) -> i32 {
      entry:
        %a = load i32 %x
        %b = mul i32 %a, 4
        %c = add i32 %b, 0
        ret i32 %c
      }
    `);

    expect(fn.name).toBe("scale");
    expect(fn.returnType).toEqual({ kind: "int", bits: 32 });
    expect(fn.args.map((arg) => arg.name)).toEqual(["x"]);
    expect(fn.blocks.map((block) => block.label)).toEqual(["entry"]);

    const [a, b, c, ret] = fn.blocks[0]?.instructions() ?? [];
    expect(a?.opcode).toBe(Opcode.Load);
    expect(b?.opcode).toBe(Opcode.Mul);
    expect(c?.opcode).toBe(Opcode.Add);
    expect(ret?.opcode).toBe(Opcode.Ret);
    expect(b?.getOperand(0)).toBe(a);
    expect(c?.getOperand(0)).toBe(b);
    expect(ret?.getOperand(0)).toBe(c);
    const users = [...(a?.users ?? [])];
    expect(users).toHaveLength(1);
    expect(users[0]).toBe(b);

    const four = b?.getOperand(1);
    expect(four && isConstantInt(four) ? four.unsignedValue : null).toBe(4n);
  });

  it("reduces integer literals to the instruction width", () => {
    const fn = parseFunction(`
      func @f(i8 %x) -> i8 {
        %a = add i8 %x, 300
        %b = add i8 %a, -1
        ret i8 %b
      }
    `);
    const [a, b] = fn.blocks[0]?.instructions() ?? [];
    const wrapped = a?.getOperand(1);
    const negative = b?.getOperand(1);

    expect(wrapped && isConstantInt(wrapped) && wrapped.equals(ConstantInt.get(8, 44))).toBe(true);
    expect(
      negative && isConstantInt(negative) ? negative.signedValue : null,
    ).toBe(-1n);
  });

  it("opens an entry block for instructions before any label", () => {
    const fn = parseFunction(`
      ; leading comment
      func @f(i32 %x) -> i32 {

        ret i32 %x ; trailing comment
      }
    `);
    expect(fn.blocks.map((block) => block.label)).toEqual(["entry"]);
    expect(fn.blocks[0]?.size).toBe(1);
  });

  it("parses every instruction form across several functions", () => {
    const module = parseModule(`
      func @main(i32 %p, i32 %v) {
      entry:
        %a = load i32 %p
        %z = load i32
        store i32 %a, %p
        %r = call i32 @g(%a, 3)
        call void @sink(%r, %z)
        br.next:
        ret void
      }

      func @g(i32 %a, i32 %b) -> i32 {
        ret i32 7
      }
    `);

    expect(module.functions.map((fn) => fn.name)).toEqual(["main", "g"]);
    const main = module.functions[0];
    expect(main?.blocks.map((block) => block.label)).toEqual([
      "entry",
      "br.next",
    ]);
    const call = main?.blocks[0]?.instructions()[3];
    expect(call?.opcode).toBe(Opcode.Call);
    expect(call?.callee).toBe("g");
    expect(call?.numOperands).toBe(2);
  });

  it("reports undefined values with their location", () => {
    const err = parseError(`${header}\nentry:\n  %a = add i32 %y, 1\n}`);
    expect(err.code).toBe("UndefinedValue");
    expect(err.message).toBe("Use of undefined value %y");
    expect(err.location).toEqual({ filePath: "case.lir", line: 3, column: 16 });
  });

  it("rejects forward references", () => {
    const err = parseError(
      `${header}\n  %a = add i32 %b, 1\n  %b = add i32 %x, 1\n  ret i32 %a\n}`,
    );
    expect(err.code).toBe("UndefinedValue");
    expect(err.location.line).toBe(2);
  });

  it("reports operand type mismatches", () => {
    const err = parseError(`${header}\n  %b = add i64 %x, 1\n}`);
    expect(err.code).toBe("TypeMismatch");
    expect(err.message).toBe("%x has type i32, expected i64");
    expect(err.location.column).toBe(16);
  });

  it("reports return type mismatches", () => {
    const err = parseError(`${header}\n  ret i64 %x\n}`);
    expect(err.code).toBe("TypeMismatch");
    expect(err.message).toBe("ret i64 in function returning i32");
    expect(err.location.column).toBe(7);
  });

  it("rejects typed literals of another width in arithmetic", () => {
    const err = parseError(`${header}\n  %a = add i32 %x, i8 1\n}`);
    expect(err.code).toBe("TypeMismatch");
    expect(err.message).toBe("1 has type i8, expected i32");
    expect(err.location.column).toBe(20);
  });

  it("reports duplicate definitions", () => {
    const err = parseError(`${header}\n  %x = add i32 %x, 1\n}`);
    expect(err.code).toBe("DuplicateDefinition");
    expect(err.message).toBe("Value %x is already defined");
    expect(err.location.column).toBe(3);

    const block = parseError(`${header}\nentry:\nentry:\n}`);
    expect(block.code).toBe("DuplicateDefinition");
    expect(block.location.line).toBe(3);
  });

  it("reports unknown opcodes and types", () => {
    const opcode = parseError(`${header}\n  %a = frob i32 %x\n}`);
    expect(opcode.code).toBe("SyntaxError");
    expect(opcode.message).toBe("Unknown opcode 'frob'");
    expect(opcode.location.column).toBe(8);

    const type = parseError(`${header}\n  %a = add f32 %x, 1\n}`);
    expect(type.message).toBe("Unknown type 'f32'");
  });

  it("reports an unterminated function at its header", () => {
    const err = parseError(`\n${header}\n  ret i32 %x\n`);
    expect(err.message).toBe("Function @f is missing its closing '}'");
    expect(err.location).toEqual({ filePath: "case.lir", line: 2, column: 1 });
  });

  it("rejects names on instructions without a result", () => {
    const err = parseError(`${header}\n  %s = store i32 %x, %x\n  ret i32 %x\n}`);
    expect(err.message).toBe("store does not produce a value and cannot be named");
  });
});
