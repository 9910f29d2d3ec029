/**
 * IR value hierarchy: everything that can be read as an operand
 */

import { IRInvariantError } from "../errors/ir_errors.js";
import type { Instruction } from "./ir_instruction.js";

/**
 * IR value kinds
 */
export enum ValueKind {
  Constant = "Constant",
  Argument = "Argument",
  Instruction = "Instruction",
}

export interface IntType {
  kind: "int";
  bits: number;
}

export interface VoidType {
  kind: "void";
}

export type IRType = IntType | VoidType;

export const VOID_TYPE: VoidType = { kind: "void" };

export const intType = (bits: number): IntType => {
  if (!Number.isInteger(bits) || bits < 1) {
    throw new IRInvariantError(`Invalid integer width: ${bits}`);
  }
  return { kind: "int", bits };
};

export const sameType = (a: IRType, b: IRType): boolean => {
  if (a.kind === "void" || b.kind === "void") return a.kind === b.kind;
  return a.bits === b.bits;
};

export const typeToString = (type: IRType): string => {
  return type.kind === "void" ? "void" : `i${type.bits}`;
};

/**
 * Base class of all values. Owns the set of instructions reading it.
 */
export abstract class Value {
  abstract readonly kind: ValueKind;
  readonly users = new Set<Instruction>();

  constructor(
    readonly type: IRType,
    public name?: string,
  ) {}

  hasUses(): boolean {
    return this.users.size > 0;
  }

  hasNUses(count: number): boolean {
    return this.users.size === count;
  }

  /**
   * Redirect every operand slot that reads this value to `replacement`.
   * Leaves this value without users; nothing is erased.
   */
  replaceAllUsesWith(replacement: Value): void {
    if (replacement === this) {
      throw new IRInvariantError("Cannot replace a value with itself");
    }
    if (!sameType(this.type, replacement.type)) {
      throw new IRInvariantError(
        `Cannot replace ${typeToString(this.type)} value with ${typeToString(replacement.type)} value`,
      );
    }
    for (const user of [...this.users]) {
      user.replaceUsesOfWith(this, replacement);
    }
  }
}

/**
 * Function parameter
 */
export class Argument extends Value {
  readonly kind = ValueKind.Argument as const;

  constructor(
    type: IRType,
    readonly index: number,
    name?: string,
  ) {
    super(type, name);
  }
}
