/**
 * Textual IR parser. Line oriented; stops at the first error.
 */

import {
  type IRErrorCode,
  IRParseError,
  type IRSourceLocation,
} from "../errors/ir_errors.js";
import type { BasicBlock } from "./basic_block.js";
import { ConstantInt } from "./constant_int.js";
import { IRFunction, IRModule, type ParameterSpec } from "./ir_function.js";
import {
  Instruction,
  isBinaryOpcode,
  Opcode,
  parseOpcode,
} from "./ir_instruction.js";
import {
  type IRType,
  intType,
  sameType,
  typeToString,
  type Value,
  VOID_TYPE,
} from "./ir_value.js";

enum TokenKind {
  Word = "Word",
  Local = "Local",
  Global = "Global",
  Integer = "Integer",
  Punct = "Punct",
}

interface Token {
  kind: TokenKind;
  text: string;
  column: number;
}

const NAME_CHAR = /[A-Za-z0-9_.$]/;
const PUNCTUATION = new Set(["(", ")", ",", "{", "}", ":", "="]);

const DEFAULT_FILE_PATH = "<inline>";

class LineCursor {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly fail: (
      code: Exclude<IRErrorCode, "VerifyError">,
      message: string,
      column: number,
    ) => never,
    private readonly endColumn: number,
  ) {}

  peek(offset = 0): Token | undefined {
    return this.tokens[this.index + offset];
  }

  atEnd(): boolean {
    return this.index >= this.tokens.length;
  }

  column(): number {
    return this.peek()?.column ?? this.endColumn;
  }

  next(expected: string): Token {
    const token = this.tokens[this.index];
    if (!token) {
      return this.fail("SyntaxError", `Expected ${expected}`, this.endColumn);
    }
    this.index++;
    return token;
  }

  expect(kind: TokenKind, expected: string): Token {
    const token = this.next(expected);
    if (token.kind !== kind) {
      return this.fail(
        "SyntaxError",
        `Expected ${expected}, found '${token.text}'`,
        token.column,
      );
    }
    return token;
  }

  expectPunct(text: string): Token {
    const token = this.next(`'${text}'`);
    if (token.kind !== TokenKind.Punct || token.text !== text) {
      return this.fail(
        "SyntaxError",
        `Expected '${text}', found '${token.text}'`,
        token.column,
      );
    }
    return token;
  }

  acceptPunct(text: string): boolean {
    const token = this.peek();
    if (token?.kind === TokenKind.Punct && token.text === text) {
      this.index++;
      return true;
    }
    return false;
  }

  expectEnd(): void {
    const token = this.peek();
    if (token) {
      this.fail("SyntaxError", `Unexpected '${token.text}'`, token.column);
    }
  }
}

interface FunctionScope {
  fn: IRFunction;
  values: Map<string, Value>;
  block: BasicBlock | null;
}

class IRParser {
  private readonly module = new IRModule();
  private scope: FunctionScope | null = null;
  private line = 0;
  private scopeLine = 0;

  constructor(
    private readonly text: string,
    private readonly filePath: string,
  ) {}

  parse(): IRModule {
    const lines = this.text.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      this.line = i + 1;
      const raw = lines[i] ?? "";
      const commentAt = raw.indexOf(";");
      const content = commentAt >= 0 ? raw.slice(0, commentAt) : raw;
      const tokens = this.tokenize(content);
      if (tokens.length === 0) continue;
      this.parseLine(
        new LineCursor(
          tokens,
          (code, message, column) => this.fail(code, message, column),
          content.length + 1,
        ),
      );
    }
    if (this.scope) {
      this.line = this.scopeLine;
      this.fail(
        "SyntaxError",
        `Function @${this.scope.fn.name} is missing its closing '}'`,
        1,
      );
    }
    return this.module;
  }

  private fail(
    code: Exclude<IRErrorCode, "VerifyError">,
    message: string,
    column: number,
  ): never {
    const location: IRSourceLocation = {
      filePath: this.filePath,
      line: this.line,
      column,
    };
    throw new IRParseError(code, message, location);
  }

  private tokenize(content: string): Token[] {
    const tokens: Token[] = [];
    let i = 0;
    while (i < content.length) {
      const ch = content.charAt(i);
      const column = i + 1;
      if (/\s/.test(ch)) {
        i++;
        continue;
      }
      if (ch === "-" && content.charAt(i + 1) === ">") {
        tokens.push({ kind: TokenKind.Punct, text: "->", column });
        i += 2;
        continue;
      }
      if (PUNCTUATION.has(ch)) {
        tokens.push({ kind: TokenKind.Punct, text: ch, column });
        i++;
        continue;
      }
      if (ch === "%" || ch === "@") {
        let end = i + 1;
        while (end < content.length && NAME_CHAR.test(content.charAt(end))) {
          end++;
        }
        if (end === i + 1) {
          return this.fail(
            "SyntaxError",
            `Expected a name after '${ch}'`,
            column,
          );
        }
        tokens.push({
          kind: ch === "%" ? TokenKind.Local : TokenKind.Global,
          text: content.slice(i + 1, end),
          column,
        });
        i = end;
        continue;
      }
      if (/[0-9-]/.test(ch)) {
        const match = /^-?[0-9]+/.exec(content.slice(i));
        if (!match) {
          return this.fail("SyntaxError", `Unexpected '${ch}'`, column);
        }
        tokens.push({ kind: TokenKind.Integer, text: match[0], column });
        i += match[0].length;
        continue;
      }
      if (NAME_CHAR.test(ch)) {
        let end = i;
        while (end < content.length && NAME_CHAR.test(content.charAt(end))) {
          end++;
        }
        tokens.push({
          kind: TokenKind.Word,
          text: content.slice(i, end),
          column,
        });
        i = end;
        continue;
      }
      return this.fail("SyntaxError", `Unexpected '${ch}'`, column);
    }
    return tokens;
  }

  private parseLine(cursor: LineCursor): void {
    const first = cursor.peek();
    if (!first) return;

    if (!this.scope) {
      if (first.kind === TokenKind.Word && first.text === "func") {
        this.parseFunctionHeader(cursor);
        return;
      }
      return this.fail(
        "SyntaxError",
        `Expected 'func', found '${first.text}'`,
        first.column,
      );
    }

    if (first.kind === TokenKind.Punct && first.text === "}") {
      cursor.next("'}'");
      cursor.expectEnd();
      this.scope = null;
      return;
    }

    const second = cursor.peek(1);
    if (
      first.kind === TokenKind.Word &&
      second?.kind === TokenKind.Punct &&
      second.text === ":"
    ) {
      this.parseLabel(cursor, this.scope);
      return;
    }

    this.parseInstruction(cursor, this.scope);
  }

  private parseFunctionHeader(cursor: LineCursor): void {
    cursor.next("'func'");
    const name = cursor.expect(TokenKind.Global, "a function name").text;
    if (this.module.getFunction(name)) {
      this.fail(
        "DuplicateDefinition",
        `Function @${name} is already defined`,
        cursor.column(),
      );
    }

    cursor.expectPunct("(");
    const params: ParameterSpec[] = [];
    const seen = new Set<string>();
    if (!cursor.acceptPunct(")")) {
      do {
        const type = this.parseType(cursor);
        if (type.kind === "void") {
          this.fail(
            "TypeMismatch",
            "Parameters cannot be void",
            cursor.column(),
          );
        }
        const param = cursor.expect(TokenKind.Local, "a parameter name");
        if (seen.has(param.text)) {
          this.fail(
            "DuplicateDefinition",
            `Parameter %${param.text} is already defined`,
            param.column,
          );
        }
        seen.add(param.text);
        params.push({ type, name: param.text });
      } while (cursor.acceptPunct(","));
      cursor.expectPunct(")");
    }

    let returnType: IRType = VOID_TYPE;
    if (cursor.acceptPunct("->")) {
      returnType = this.parseType(cursor);
    }
    cursor.expectPunct("{");
    cursor.expectEnd();

    const fn = this.module.addFunction(
      new IRFunction(name, returnType, params),
    );
    const values = new Map<string, Value>();
    for (const arg of fn.args) {
      if (arg.name !== undefined) values.set(arg.name, arg);
    }
    this.scope = { fn, values, block: null };
    this.scopeLine = this.line;
  }

  private parseLabel(cursor: LineCursor, scope: FunctionScope): void {
    const label = cursor.next("a label");
    cursor.expectPunct(":");
    cursor.expectEnd();
    if (scope.fn.getBlock(label.text)) {
      this.fail(
        "DuplicateDefinition",
        `Block '${label.text}' is already defined`,
        label.column,
      );
    }
    scope.block = scope.fn.addBlock(label.text);
  }

  private parseInstruction(cursor: LineCursor, scope: FunctionScope): void {
    let resultName: Token | null = null;
    let opcodeToken = cursor.next("an instruction");
    if (opcodeToken.kind === TokenKind.Local) {
      resultName = opcodeToken;
      cursor.expectPunct("=");
      opcodeToken = cursor.next("an opcode");
    }
    const opcode =
      opcodeToken.kind === TokenKind.Word
        ? parseOpcode(opcodeToken.text)
        : undefined;
    if (!opcode) {
      return this.fail(
        "SyntaxError",
        `Unknown opcode '${opcodeToken.text}'`,
        opcodeToken.column,
      );
    }

    const typeColumn = cursor.column();
    const type = this.parseType(cursor);
    const inst = this.buildInstruction(cursor, scope, opcode, type, typeColumn);
    cursor.expectEnd();

    if (resultName) {
      if (inst.type.kind === "void") {
        this.fail(
          "SyntaxError",
          `${opcode} does not produce a value and cannot be named`,
          resultName.column,
        );
      }
      if (scope.values.has(resultName.text)) {
        this.fail(
          "DuplicateDefinition",
          `Value %${resultName.text} is already defined`,
          resultName.column,
        );
      }
      inst.name = resultName.text;
      scope.values.set(resultName.text, inst);
    }

    if (!scope.block) {
      scope.block = scope.fn.addBlock("entry");
    }
    scope.block.append(inst);
  }

  private buildInstruction(
    cursor: LineCursor,
    scope: FunctionScope,
    opcode: Opcode,
    type: IRType,
    typeColumn: number,
  ): Instruction {
    if (isBinaryOpcode(opcode)) {
      if (type.kind === "void") {
        return this.fail(
          "TypeMismatch",
          `${opcode} needs an integer type`,
          typeColumn,
        );
      }
      const lhs = this.parseOperand(cursor, scope, type, true);
      cursor.expectPunct(",");
      const rhs = this.parseOperand(cursor, scope, type, true);
      return Instruction.createBinary(opcode, lhs, rhs);
    }

    switch (opcode) {
      case Opcode.Load: {
        if (type.kind === "void") {
          return this.fail(
            "TypeMismatch",
            "load needs an integer type",
            typeColumn,
          );
        }
        const operands = cursor.atEnd()
          ? []
          : this.parseOperandList(cursor, scope, type);
        return Instruction.createLoad(type, operands);
      }
      case Opcode.Store: {
        if (type.kind === "void") {
          return this.fail(
            "TypeMismatch",
            "store needs an integer type",
            typeColumn,
          );
        }
        const value = this.parseOperand(cursor, scope, type, true);
        cursor.expectPunct(",");
        const address = this.parseOperand(cursor, scope, type, false);
        return Instruction.createStore(value, address);
      }
      case Opcode.Call: {
        const callee = cursor.expect(TokenKind.Global, "a callee").text;
        cursor.expectPunct("(");
        let args: Value[] = [];
        if (!cursor.acceptPunct(")")) {
          args = this.parseOperandList(cursor, scope, type);
          cursor.expectPunct(")");
        }
        return Instruction.createCall(type, callee, args);
      }
      case Opcode.Ret: {
        if (!sameType(type, scope.fn.returnType)) {
          return this.fail(
            "TypeMismatch",
            `ret ${typeToString(type)} in function returning ${typeToString(scope.fn.returnType)}`,
            typeColumn,
          );
        }
        if (type.kind === "void") return Instruction.createRet();
        return Instruction.createRet(
          this.parseOperand(cursor, scope, type, true),
        );
      }
      default:
        return this.fail(
          "SyntaxError",
          `Unsupported opcode '${opcode}'`,
          typeColumn,
        );
    }
  }

  private parseOperandList(
    cursor: LineCursor,
    scope: FunctionScope,
    type: IRType,
  ): Value[] {
    const operands: Value[] = [];
    do {
      operands.push(this.parseOperand(cursor, scope, type, false));
    } while (cursor.acceptPunct(","));
    return operands;
  }

  /**
   * Resolve `%name`, an integer literal or a typed literal such as `i8 5`.
   * Bare literals take `type`; references and typed literals must match it
   * when `strict` is set.
   */
  private parseOperand(
    cursor: LineCursor,
    scope: FunctionScope,
    type: IRType,
    strict: boolean,
  ): Value {
    const token = cursor.next("an operand");
    if (token.kind === TokenKind.Word) {
      const literalType = this.typeFromToken(token);
      const literal = cursor.expect(TokenKind.Integer, "an integer literal");
      if (literalType.kind === "void") {
        return this.fail(
          "TypeMismatch",
          "Integer literal needs an integer type",
          token.column,
        );
      }
      if (strict && !sameType(literalType, type)) {
        return this.fail(
          "TypeMismatch",
          `${literal.text} has type ${typeToString(literalType)}, expected ${typeToString(type)}`,
          token.column,
        );
      }
      return ConstantInt.get(literalType, BigInt(literal.text));
    }
    if (token.kind === TokenKind.Integer) {
      if (type.kind === "void") {
        return this.fail(
          "TypeMismatch",
          "Integer literal needs an integer type",
          token.column,
        );
      }
      return ConstantInt.get(type, BigInt(token.text));
    }
    if (token.kind !== TokenKind.Local) {
      return this.fail(
        "SyntaxError",
        `Expected an operand, found '${token.text}'`,
        token.column,
      );
    }
    const value = scope.values.get(token.text);
    if (!value) {
      return this.fail(
        "UndefinedValue",
        `Use of undefined value %${token.text}`,
        token.column,
      );
    }
    if (strict && !sameType(value.type, type)) {
      return this.fail(
        "TypeMismatch",
        `%${token.text} has type ${typeToString(value.type)}, expected ${typeToString(type)}`,
        token.column,
      );
    }
    return value;
  }

  private parseType(cursor: LineCursor): IRType {
    return this.typeFromToken(cursor.expect(TokenKind.Word, "a type"));
  }

  private typeFromToken(token: Token): IRType {
    if (token.text === "void") return VOID_TYPE;
    const match = /^i([0-9]+)$/.exec(token.text);
    const bits = match ? Number(match[1]) : 0;
    if (bits < 1) {
      return this.fail(
        "SyntaxError",
        `Unknown type '${token.text}'`,
        token.column,
      );
    }
    return intType(bits);
  }
}

export const parseModule = (
  text: string,
  filePath: string = DEFAULT_FILE_PATH,
): IRModule => {
  return new IRParser(text, filePath).parse();
};

export const parseFunction = (
  text: string,
  filePath: string = DEFAULT_FILE_PATH,
): IRFunction => {
  const module = parseModule(text, filePath);
  const fn = module.functions[0];
  if (!fn || module.functions.length !== 1) {
    throw new IRParseError(
      "SyntaxError",
      `Expected exactly one function, found ${module.functions.length}`,
      { filePath, line: 1, column: 1 },
    );
  }
  return fn;
};
