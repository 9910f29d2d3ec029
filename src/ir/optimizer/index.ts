export {
  LocalOptimizer,
  type LocalOptimizerOptions,
  optimizeBlock,
  optimizeFunction,
  optimizeModule,
} from "./local_optimizer.js";
export { algebraicSimplification } from "./passes/algebraic_simplification.js";
export { deadCodeElimination } from "./passes/dead_code.js";
export { inverseCancellation } from "./passes/inverse_cancellation.js";
export { createStats, type OptimizationStats } from "./stats.js";
export {
  type ConstantOperand,
  getConstantDivisor,
  getConstantOperand,
} from "./utils/operands.js";
