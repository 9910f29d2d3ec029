import { IRInvariantError } from "../errors/ir_errors.js";
import { BasicBlock } from "./basic_block.js";
import { Argument, type IRType } from "./ir_value.js";

export interface ParameterSpec {
  type: IRType;
  name?: string;
}

/**
 * Function: arguments plus blocks in program order
 */
export class IRFunction {
  readonly args: Argument[];
  readonly blocks: BasicBlock[] = [];

  constructor(
    readonly name: string,
    readonly returnType: IRType,
    params: ParameterSpec[] = [],
  ) {
    this.args = params.map(
      (param, index) => new Argument(param.type, index, param.name),
    );
  }

  addBlock(label: string): BasicBlock {
    if (this.blocks.some((block) => block.label === label)) {
      throw new IRInvariantError(
        `Block '${label}' already exists in function '${this.name}'`,
      );
    }
    const block = new BasicBlock(label);
    block.parent = this;
    this.blocks.push(block);
    return block;
  }

  getBlock(label: string): BasicBlock | undefined {
    return this.blocks.find((block) => block.label === label);
  }

  instructionCount(): number {
    return this.blocks.reduce((total, block) => total + block.size, 0);
  }
}

/**
 * Translation unit: functions in definition order
 */
export class IRModule {
  readonly functions: IRFunction[] = [];

  addFunction(fn: IRFunction): IRFunction {
    if (this.getFunction(fn.name)) {
      throw new IRInvariantError(`Function '${fn.name}' is already defined`);
    }
    this.functions.push(fn);
    return fn;
  }

  getFunction(name: string): IRFunction | undefined {
    return this.functions.find((fn) => fn.name === name);
  }
}
