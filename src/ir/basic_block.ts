import { IRInvariantError } from "../errors/ir_errors.js";
import type { IRFunction } from "./ir_function.js";
import type { Instruction } from "./ir_instruction.js";

/**
 * Straight-line sequence of instructions, kept as an intrusive doubly linked
 * list so instructions can be inserted and erased while the block is walked.
 */
export class BasicBlock {
  parent: IRFunction | null = null;
  first: Instruction | null = null;
  last: Instruction | null = null;
  private count = 0;

  constructor(readonly label: string) {}

  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  append(inst: Instruction): Instruction {
    this.claim(inst);
    inst.prev = this.last;
    if (this.last) {
      this.last.next = inst;
    } else {
      this.first = inst;
    }
    this.last = inst;
    this.count++;
    return inst;
  }

  insertAfter(inst: Instruction, position: Instruction): Instruction {
    this.assertOwned(position);
    this.claim(inst);
    inst.prev = position;
    inst.next = position.next;
    if (position.next) {
      position.next.prev = inst;
    } else {
      this.last = inst;
    }
    position.next = inst;
    this.count++;
    return inst;
  }

  insertBefore(inst: Instruction, position: Instruction): Instruction {
    this.assertOwned(position);
    this.claim(inst);
    inst.next = position;
    inst.prev = position.prev;
    if (position.prev) {
      position.prev.next = inst;
    } else {
      this.first = inst;
    }
    position.prev = inst;
    this.count++;
    return inst;
  }

  /**
   * Unlink an instruction without touching its operands.
   * Returns the instruction that followed it.
   */
  remove(inst: Instruction): Instruction | null {
    this.assertOwned(inst);
    const next = inst.next;
    if (inst.prev) {
      inst.prev.next = next;
    } else {
      this.first = next;
    }
    if (next) {
      next.prev = inst.prev;
    } else {
      this.last = inst.prev;
    }
    inst.parent = null;
    inst.prev = null;
    inst.next = null;
    this.count--;
    return next;
  }

  /**
   * Walk the block in order. After each step the walk continues from the
   * current instruction's successor, so instructions inserted right after it
   * are visited; if the current instruction was removed, from the successor
   * it had when it was visited.
   */
  *[Symbol.iterator](): Generator<Instruction, void, undefined> {
    let current = this.first;
    while (current) {
      const saved = current.next;
      yield current;
      current = current.parent === this ? current.next : saved;
    }
  }

  instructions(): Instruction[] {
    return [...this];
  }

  private claim(inst: Instruction): void {
    if (inst.parent) {
      throw new IRInvariantError(
        `Instruction is already placed in block '${inst.parent.label}'`,
      );
    }
    inst.parent = this;
  }

  private assertOwned(inst: Instruction): void {
    if (inst.parent !== this) {
      throw new IRInvariantError(
        `Instruction does not belong to block '${this.label}'`,
      );
    }
  }
}
