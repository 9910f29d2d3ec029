/**
 * Local peephole optimizer for a block-structured integer IR
 */

export {
  BatchOptimizer,
  type BatchOptimizerOptions,
  type BatchResult,
  runRounds,
} from "./batch/batch_optimizer.js";
export { discoverIRFiles } from "./batch/file_discovery.js";
export { ErrorCollector } from "./errors/error_collector.js";
export {
  AggregateIRError,
  IRError,
  type IRErrorCode,
  IRInvariantError,
  IRParseError,
  type IRSite,
  type IRSourceLocation,
} from "./errors/ir_errors.js";
export { BasicBlock } from "./ir/basic_block.js";
export { ConstantInt, isConstantInt } from "./ir/constant_int.js";
export { IRBuilder, type OperandLike } from "./ir/ir_builder.js";
export { IRFunction, IRModule, type ParameterSpec } from "./ir/ir_function.js";
export {
  type BinaryOpcode,
  Instruction,
  isBinaryOpcode,
  isInstruction,
  Opcode,
} from "./ir/ir_instruction.js";
export { parseFunction, parseModule } from "./ir/ir_parser.js";
export {
  printFunction,
  printInstruction,
  printModule,
  SlotTracker,
} from "./ir/ir_printer.js";
export {
  Argument,
  type IntType,
  type IRType,
  intType,
  Value,
  ValueKind,
  VOID_TYPE,
} from "./ir/ir_value.js";
export { assertValid, verifyFunction, verifyModule } from "./ir/ir_verifier.js";
export * from "./ir/optimizer/index.js";
